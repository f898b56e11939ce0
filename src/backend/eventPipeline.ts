import type {
  Book,
  Bookmark,
  ClassifiedEvent,
  DictionaryLookup,
  ParseDiagnostics,
  ReadingSession,
  Selection,
  UnrecognizedEvent
} from '@shared/types';
import { logger } from '@shared/logger';
import { resolveAnalysisOptions, type AnalysisOptions } from './config';
import { EventClassifier } from './eventClassifier';
import { extractBookmarks, extractBrightness, extractDictionaryLookups } from './extractors';
import type { RowSource } from './rowSource';
import { planExtraction } from './selection';
import { SessionReconstructor } from './sessionReconstructor';
import { BrightnessHistory, ReadingSessions } from './statistics';

export type AnalysisResult = {
  selection: Selection;
  sessions?: ReadingSessions;
  terms?: DictionaryLookup[];
  brightness?: BrightnessHistory;
  bookmarks?: Bookmark[];
  books?: Book[];
  diagnostics: ParseDiagnostics;
};

/**
 * Reads rows from a source, classifies them once, and routes the classified
 * events to whichever extractors the selection asks for. Collections that were
 * not selected are left out of the result rather than computed and dropped.
 */
export class EventPipeline {
  constructor(
    private readonly classifier = new EventClassifier(),
    private readonly reconstructor = new SessionReconstructor()
  ) { }

  analyze(source: RowSource, options: Partial<AnalysisOptions> = {}): AnalysisResult {
    const { selection, minSessionSeconds } = resolveAnalysisOptions(options);
    const plan = planExtraction(selection);

    const rows = source.readEvents(plan.tags);
    const events = rows.map((row, index) => this.classifier.classify(row, index));
    const unrecognized = events.filter((event): event is UnrecognizedEvent => event.kind === 'unrecognized');

    logger.info(`Parsed ${rows.length} rows for selection "${selection}"`);
    if (unrecognized.length > 0) {
      logger.warn(`Skipped ${unrecognized.length} unrecognized rows; first: ${unrecognized[0].reason}`);
    }

    const result: AnalysisResult = {
      selection,
      diagnostics: { totalRows: rows.length, unrecognized }
    };

    if (plan.sessions) {
      const { sessions, orphans } = this.reconstructor.reconstruct(events);
      const collection = new ReadingSessions(sessions, orphans);
      result.sessions = minSessionSeconds > 0 ? collection.atLeast(minSessionSeconds) : collection;
    }
    if (plan.dictionaryLookups) result.terms = extractDictionaryLookups(events);
    if (plan.brightness) result.brightness = new BrightnessHistory(extractBrightness(events));
    if (plan.bookmarks) result.bookmarks = extractBookmarks(events);

    if (plan.books) {
      const books = this.resolveBooks(source, events, result);
      result.books = books;
      if (result.sessions) result.sessions = withBookTitles(result.sessions, books);
    }

    return result;
  }

  private resolveBooks(source: RowSource, events: readonly ClassifiedEvent[], result: AnalysisResult): Book[] {
    const referenced = new Set<string>();
    for (const session of result.sessions?.sessions ?? []) referenced.add(session.bookId);
    for (const orphan of result.sessions?.orphans ?? []) referenced.add(orphan.bookId);
    for (const lookup of result.terms ?? []) if (lookup.bookId) referenced.add(lookup.bookId);
    for (const bookmark of result.bookmarks ?? []) referenced.add(bookmark.bookId);
    if (referenced.size === 0) return [];

    const known = new Map(source.readBooks(referenced).map((book) => [book.id, book]));

    // Side-loaded books may be missing from the library table; session starts
    // then carry their own title and authors.
    const learned = new Map<string, Book>();
    for (const event of events) {
      if (event.kind !== 'session-start' || !event.title || learned.has(event.bookId)) continue;
      learned.set(event.bookId, { id: event.bookId, title: event.title, authors: event.authors ?? '' });
    }

    const books: Book[] = [];
    for (const id of referenced) {
      const book = known.get(id) ?? learned.get(id);
      if (book) books.push(book);
    }
    return books;
  }
}

function withBookTitles(collection: ReadingSessions, books: readonly Book[]): ReadingSessions {
  const titles = new Map(books.map((book) => [book.id, book.title]));
  const sessions = collection.sessions.map((session): ReadingSession => {
    const title = titles.get(session.bookId);
    return title && session.bookTitle !== title ? { ...session, bookTitle: title } : session;
  });
  return new ReadingSessions(sessions, collection.orphans);
}
