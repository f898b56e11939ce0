import type {
  Bookmark,
  BrightnessEvent,
  ClassifiedEvent,
  DictionaryLookup,
  TermFrequency
} from '@shared/types';

export function extractDictionaryLookups(events: readonly ClassifiedEvent[]): DictionaryLookup[] {
  const seen = new Set<string>();
  const lookups: DictionaryLookup[] = [];
  for (const event of events) {
    if (event.kind !== 'dictionary-lookup') continue;
    const key = JSON.stringify([event.term, event.bookId, event.timestamp.getTime()]);
    if (seen.has(key)) continue;
    seen.add(key);
    const lookup: DictionaryLookup = { term: event.term, bookId: event.bookId, timestamp: event.timestamp };
    if (event.dictionary) lookup.dictionary = event.dictionary;
    lookups.push(lookup);
  }
  return lookups;
}

export function extractBrightness(events: readonly ClassifiedEvent[]): BrightnessEvent[] {
  const history: Array<BrightnessEvent & { index: number }> = [];
  for (const event of events) {
    if (event.kind !== 'brightness-change') continue;
    history.push({ timestamp: event.timestamp, value: event.value, mode: event.mode, index: event.index });
  }
  history.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.index - b.index);
  return history.map(({ timestamp, value, mode }) => ({ timestamp, value, mode }));
}

export function extractBookmarks(events: readonly ClassifiedEvent[]): Bookmark[] {
  const bookmarks: Bookmark[] = [];
  for (const event of events) {
    if (event.kind !== 'bookmark-added') continue;
    const bookmark: Bookmark = { bookId: event.bookId, location: event.location, timestamp: event.timestamp };
    if (event.note) bookmark.note = event.note;
    bookmarks.push(bookmark);
  }
  return bookmarks;
}

function compareText(a: string, b: string) {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** How often each term was looked up, most frequent first. */
export function summarizeTerms(lookups: readonly DictionaryLookup[]): TermFrequency[] {
  const counts = new Map<string, TermFrequency>();
  for (const lookup of lookups) {
    const key = JSON.stringify([lookup.term, lookup.dictionary ?? null]);
    const entry = counts.get(key);
    if (entry) {
      entry.count += 1;
      continue;
    }
    const fresh: TermFrequency = { term: lookup.term, count: 1 };
    if (lookup.dictionary) fresh.dictionary = lookup.dictionary;
    counts.set(key, fresh);
  }
  return Array.from(counts.values()).sort((a, b) => b.count - a.count || compareText(a.term, b.term));
}
