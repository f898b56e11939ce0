import { promises as fsp } from 'node:fs';
import initSqlJs, { type Database as SqlJsDatabase, type SqlJsStatic } from 'sql.js';
import type { Book, RawEvent } from '@shared/types';
import { logger } from '@shared/logger';
import { BOOK_CONTENT_TYPE, VENDOR_EVENT_TYPES } from './defaults';
import { MissingSourceError } from './errors';
import type { RowSource } from './rowSource';

type SqlValue = string | number | null | Uint8Array;
type SqlRow = Record<string, SqlValue>;

export type KoboDatabaseOptions = {
  // Closed by `close()`; connections handed in by the caller stay open.
  ownsConnection?: boolean;
};

type AnalyticsEventRow = {
  Id: string;
  Type: string;
  Timestamp: string;
  Attributes: string | null;
  Metrics: string | null;
};

type BookmarkRow = {
  BookmarkID: string;
  VolumeID: string | null;
  Text: string | null;
  ChapterProgress: number | null;
  DateCreated: string | null;
};

type ContentRow = {
  ContentID: string;
  Title: string | null;
  Attribution: string | null;
};

function text(value: unknown): string | null {
  if (typeof value === 'string') return value.trim() || null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

function isFileMissing(error: unknown) {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read-only row source over the reader's own SQLite file. The file is loaded
 * into an in-memory sql.js database and never written back. Vendor event names
 * are translated to event tags here; the JSON payload columns are decoded but
 * not validated, which is the classifier's job.
 */
export class KoboDatabase implements RowSource {
  private static sqlJsInit: Promise<SqlJsStatic> | null = null;

  private static getSqlJs(): Promise<SqlJsStatic> {
    if (!KoboDatabase.sqlJsInit) {
      KoboDatabase.sqlJsInit = initSqlJs().catch((error: unknown) => {
        KoboDatabase.sqlJsInit = null;
        throw error;
      });
    }
    return KoboDatabase.sqlJsInit;
  }

  /** Loads the device database file. Fails with `MissingSourceError` when it cannot be read. */
  static async open(filePath: string): Promise<KoboDatabase> {
    let bytes: Uint8Array;
    try {
      bytes = await fsp.readFile(filePath);
    } catch (error) {
      if (isFileMissing(error)) {
        throw new MissingSourceError(`Device database not found at ${filePath}`, error);
      }
      throw new MissingSourceError(`Device database at ${filePath} could not be read: ${errorMessage(error)}`, error);
    }

    logger.info('Opening device database at', filePath);
    const SQL = await KoboDatabase.getSqlJs();
    try {
      return new KoboDatabase(new SQL.Database(bytes), { ownsConnection: true });
    } catch (error) {
      throw new MissingSourceError(`Device database at ${filePath} could not be opened`, error);
    }
  }

  private readonly ownsConnection: boolean;

  constructor(private readonly driver: SqlJsDatabase, options: KoboDatabaseOptions = {}) {
    this.ownsConnection = options.ownsConnection ?? false;
  }

  readEvents(tags: ReadonlySet<string> | null): RawEvent[] {
    const vendorTypes = Object.entries(VENDOR_EVENT_TYPES)
      .filter(([, mapping]) => !tags || tags.has(mapping.tag))
      .map(([vendorType]) => vendorType);
    const wantsBookmarks = !tags || tags.has('BookmarkAdded');

    const events: RawEvent[] = [];
    if (vendorTypes.length > 0) {
      this.requireTable('AnalyticsEvents');
      const placeholders = vendorTypes.map(() => '?').join(', ');
      const rows = this.query(
        `SELECT Id, Type, Timestamp, Attributes, Metrics FROM AnalyticsEvents
         WHERE Type IN (${placeholders})
         ORDER BY Timestamp ASC, rowid ASC`,
        vendorTypes
      ) as AnalyticsEventRow[];
      for (const row of rows) events.push(this.toRawEvent(row));
    }

    if (wantsBookmarks) {
      this.requireTable('Bookmark');
      const rows = this.query(
        `SELECT BookmarkID, VolumeID, Text, ChapterProgress, DateCreated FROM Bookmark
         WHERE Text IS NOT NULL AND Text != ''
         ORDER BY DateCreated ASC, rowid ASC`,
        []
      ) as BookmarkRow[];
      for (const row of rows) {
        events.push({
          id: row.BookmarkID,
          typeTag: 'BookmarkAdded',
          timestamp: row.DateCreated ?? '',
          bookId: text(row.VolumeID),
          fields: { location: row.ChapterProgress, note: row.Text }
        });
      }
    }

    return events;
  }

  readBooks(bookIds: ReadonlySet<string>): Book[] {
    if (bookIds.size === 0) return [];
    if (!this.hasTable('content')) {
      logger.warn('Device database has no content table; book titles are unavailable');
      return [];
    }
    const ids = Array.from(bookIds);
    const placeholders = ids.map(() => '?').join(', ');
    const rows = this.query(
      `SELECT ContentID, Title, Attribution FROM content
       WHERE ContentType = ? AND ContentID IN (${placeholders})
       ORDER BY ContentID ASC`,
      [BOOK_CONTENT_TYPE, ...ids]
    ) as ContentRow[];

    const books: Book[] = [];
    for (const row of rows) {
      const title = text(row.Title);
      if (!title) continue;
      books.push({ id: row.ContentID, title, authors: text(row.Attribution) ?? '' });
    }
    return books;
  }

  close() {
    if (this.ownsConnection) this.driver.close();
  }

  private toRawEvent(row: AnalyticsEventRow): RawEvent {
    const attributes = this.decodeJson(row, 'Attributes');
    const metrics = this.decodeJson(row, 'Metrics');
    const mapping = VENDOR_EVENT_TYPES[row.Type];
    const tag: string = mapping?.tag ?? row.Type;
    const volumeId = text(attributes.volumeid);

    let fields: Record<string, unknown>;
    switch (tag) {
      case 'SessionStart':
        fields = { progress: attributes.progress, title: attributes.title, authors: attributes.attribution };
        break;
      case 'SessionEnd':
        fields = {
          progress: attributes.progress,
          secondsRead: metrics.SecondsRead,
          pagesTurned: metrics.PagesTurned,
          buttonPressCount: metrics.ButtonPressCount
        };
        break;
      case 'DictionaryLookup':
        fields = { term: attributes.Word, dictionary: attributes.Dictionary };
        break;
      case 'BrightnessChange':
        fields = {
          value: metrics.NewBrightness ?? metrics.NewNaturalLight,
          mode: mapping?.mode,
          method: attributes.Method
        };
        break;
      default:
        fields = { ...attributes, ...metrics };
    }

    return { id: row.Id, typeTag: tag, timestamp: row.Timestamp, bookId: volumeId, fields };
  }

  private decodeJson(row: AnalyticsEventRow, column: 'Attributes' | 'Metrics'): Record<string, unknown> {
    const raw = row[column];
    if (!raw || !raw.trim()) return {};
    try {
      const parsed: unknown = JSON.parse(raw);
      if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
        return { ...parsed };
      }
    } catch (error) {
      logger.warn(`Undecodable ${column} on event ${row.Id}:`, errorMessage(error));
      return {};
    }
    logger.warn(`Unexpected ${column} shape on event ${row.Id}`);
    return {};
  }

  private query(sql: string, params: SqlValue[]): SqlRow[] {
    try {
      const stmt = this.driver.prepare(sql);
      const rows: SqlRow[] = [];
      try {
        stmt.bind(params);
        while (stmt.step()) rows.push(stmt.getAsObject());
        return rows;
      } finally {
        stmt.free();
      }
    } catch (error) {
      throw new MissingSourceError(`Device database query failed: ${errorMessage(error)}`, error);
    }
  }

  private hasTable(name: string): boolean {
    const rows = this.query("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?", [name]);
    return rows.length > 0;
  }

  private requireTable(name: string) {
    if (!this.hasTable(name)) {
      throw new MissingSourceError(`Device database has no ${name} table`);
    }
  }
}
