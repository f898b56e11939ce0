import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import initSqlJs, { type Database, type SqlJsStatic } from 'sql.js';
import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { EventPipeline, KoboDatabase, MissingSourceError } from '../src';

const SCHEMA = `
  CREATE TABLE AnalyticsEvents (
    Id TEXT PRIMARY KEY,
    Type TEXT NOT NULL,
    Timestamp TEXT NOT NULL,
    Attributes TEXT,
    Metrics TEXT
  );
  CREATE TABLE content (
    ContentID TEXT NOT NULL,
    ContentType INTEGER NOT NULL,
    Title TEXT,
    Attribution TEXT
  );
  CREATE TABLE Bookmark (
    BookmarkID TEXT PRIMARY KEY,
    VolumeID TEXT,
    Text TEXT,
    ChapterProgress REAL,
    DateCreated TEXT
  );
`;

function insertEvent(db: Database, id: string, type: string, timestamp: string, attributes: unknown, metrics: unknown) {
  db.run('INSERT INTO AnalyticsEvents (Id, Type, Timestamp, Attributes, Metrics) VALUES (?, ?, ?, ?, ?)', [
    id,
    type,
    timestamp,
    typeof attributes === 'string' ? attributes : JSON.stringify(attributes),
    typeof metrics === 'string' ? metrics : JSON.stringify(metrics)
  ]);
}

describe('KoboDatabase', () => {
  let SQL: SqlJsStatic;
  let connection: Database;

  beforeAll(async () => {
    SQL = await initSqlJs();
  });

  beforeEach(() => {
    connection = new SQL.Database();
    connection.run(SCHEMA);

    insertEvent(connection, 'e5', 'LeaveContent', '2024-03-01T10:05:00Z', { volumeid: 'book1', progress: '10' }, {
      SecondsRead: 300,
      PagesTurned: 5,
      ButtonPressCount: 10
    });
    insertEvent(connection, 'e1', 'OpenContent', '2024-03-01T10:00:00Z', { volumeid: 'book1', progress: '0' }, {});
    insertEvent(connection, 'e2', 'DictionaryLookup', '2024-03-01T10:01:00Z', { Word: 'test', Dictionary: 'en' }, {});
    insertEvent(connection, 'e3', 'BrightnessAdjusted', '2024-03-01T10:02:00Z', { Method: 'Slider' }, { NewBrightness: 50 });
    insertEvent(connection, 'e4', 'NaturalLightAdjusted', '2024-03-01T10:03:00Z', { Method: 'Slider' }, { NewNaturalLight: 20 });
    insertEvent(connection, 'e6', 'AppStart', '2024-03-01T09:00:00Z', {}, {});

    const content = 'INSERT INTO content (ContentID, ContentType, Title, Attribution) VALUES (?, ?, ?, ?)';
    connection.run(content, ['book1', 6, 'Book One', 'Author One']);
    connection.run(content, ['book1!chapter1', 9, 'Chapter One', null]);

    const bookmark = 'INSERT INTO Bookmark (BookmarkID, VolumeID, Text, ChapterProgress, DateCreated) VALUES (?, ?, ?, ?, ?)';
    connection.run(bookmark, ['bm1', 'book1', 'Some text', 0.5, '2024-03-01T10:04:00Z']);
    connection.run(bookmark, ['bm2', 'book1', '', 0.7, '2024-03-01T10:04:30Z']);
  });

  afterEach(() => {
    connection.close();
  });

  it('translates vendor rows into raw events in time order', () => {
    const database = new KoboDatabase(connection);

    const events = database.readEvents(null);

    expect(events.map((event) => [event.id, event.typeTag])).toEqual([
      ['e1', 'SessionStart'],
      ['e2', 'DictionaryLookup'],
      ['e3', 'BrightnessChange'],
      ['e4', 'BrightnessChange'],
      ['e5', 'SessionEnd'],
      ['bm1', 'BookmarkAdded']
    ]);
    expect(events[4]).toEqual({
      id: 'e5',
      typeTag: 'SessionEnd',
      timestamp: '2024-03-01T10:05:00Z',
      bookId: 'book1',
      fields: { progress: '10', secondsRead: 300, pagesTurned: 5, buttonPressCount: 10 }
    });
  });

  it('reads only the vendor types a tag set maps to', () => {
    const database = new KoboDatabase(connection);

    const events = database.readEvents(new Set(['BrightnessChange']));

    expect(events.map((event) => event.fields.mode)).toEqual(['manual', 'natural-light']);
    expect(events.map((event) => event.fields.value)).toEqual([50, 20]);
  });

  it('feeds the pipeline end to end', () => {
    const result = new EventPipeline().analyze(new KoboDatabase(connection));

    expect(result.diagnostics.unrecognized).toEqual([]);
    expect(result.sessions?.sessions).toEqual([
      {
        bookId: 'book1',
        bookTitle: 'Book One',
        startTime: new Date('2024-03-01T10:00:00Z'),
        endTime: new Date('2024-03-01T10:05:00Z'),
        durationSeconds: 300,
        pagesTurned: 0,
        implicitlyClosed: false,
        startProgress: 0,
        endProgress: 10,
        reported: { secondsRead: 300, pagesTurned: 5, buttonPressCount: 10 }
      }
    ]);
    expect(result.terms).toEqual([
      { term: 'test', dictionary: 'en', bookId: null, timestamp: new Date('2024-03-01T10:01:00Z') }
    ]);
    expect(result.brightness?.events.map((event) => [event.value, event.mode])).toEqual([
      [50, 'manual'],
      [20, 'natural-light']
    ]);
    expect(result.bookmarks).toEqual([
      { bookId: 'book1', location: '0.5', note: 'Some text', timestamp: new Date('2024-03-01T10:04:00Z') }
    ]);
    expect(result.books).toEqual([{ id: 'book1', title: 'Book One', authors: 'Author One' }]);
  });

  it('reads only whole books from the content table', () => {
    const database = new KoboDatabase(connection);

    expect(database.readBooks(new Set(['book1', 'book1!chapter1', 'missing']))).toEqual([
      { id: 'book1', title: 'Book One', authors: 'Author One' }
    ]);
  });

  it('downgrades rows with undecodable payloads', () => {
    insertEvent(connection, 'e7', 'OpenContent', '2024-03-01T11:00:00Z', '{not json', '');

    const result = new EventPipeline().analyze(new KoboDatabase(connection), { selection: 'reading-sessions' });

    expect(result.diagnostics.unrecognized.map((event) => event.raw.id)).toEqual(['e7']);
  });

  it('reports a database without an events table as a missing source', () => {
    connection.run('DROP TABLE AnalyticsEvents');
    const database = new KoboDatabase(connection);

    expect(() => database.readEvents(null)).toThrow(MissingSourceError);
    expect(() => database.readEvents(null)).toThrow('Device database has no AnalyticsEvents table');
  });

  it('exposes the device totals as session metrics', () => {
    const sessions = new EventPipeline().analyze(new KoboDatabase(connection), { selection: 'reading-sessions' }).sessions;

    expect(sessions?.average('pagesTurned')).toBe(0);
    expect(sessions?.average('reportedPagesTurned')).toBe(5);
    expect(sessions?.average('buttonPressCount')).toBe(10);
    expect(sessions?.average('secondsRead')).toBe(300);
  });

  it('leaves an injected connection open', () => {
    new KoboDatabase(connection).close();

    expect(() => connection.exec('SELECT 1')).not.toThrow();
  });

  describe('open', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'reader-log-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('loads a database file and closes it afterwards', async () => {
      const filePath = path.join(dir, 'KoboReader.sqlite');
      fs.writeFileSync(filePath, connection.export());

      const database = await KoboDatabase.open(filePath);
      const result = new EventPipeline().analyze(database, { selection: 'dictionary-lookups' });
      database.close();

      expect(result.terms?.map((lookup) => lookup.term)).toEqual(['test']);
      expect(() => database.readEvents(null)).toThrow(MissingSourceError);
    });

    it('reports a missing file as a missing source', async () => {
      await expect(KoboDatabase.open(path.join(dir, 'absent.sqlite'))).rejects.toThrow(MissingSourceError);
      await expect(KoboDatabase.open(path.join(dir, 'absent.sqlite'))).rejects.toThrow('Device database not found at');
    });

    it('reports a file that is not a database when it is read', async () => {
      const filePath = path.join(dir, 'notes.txt');
      fs.writeFileSync(filePath, 'plain text, not a database\n'.repeat(400));

      const database = await KoboDatabase.open(filePath);

      expect(() => database.readEvents(null)).toThrow(MissingSourceError);
      database.close();
    });
  });
});
