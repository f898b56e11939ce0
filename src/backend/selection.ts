import type { EventTag, Selection } from '@shared/types';

export type ExtractionPlan = {
  sessions: boolean;
  dictionaryLookups: boolean;
  brightness: boolean;
  bookmarks: boolean;
  books: boolean;
  // null means every row the source has
  tags: ReadonlySet<EventTag> | null;
};

const SESSION_TAGS: EventTag[] = ['SessionStart', 'SessionEnd', 'PageTurn'];

export function planExtraction(selection: Selection): ExtractionPlan {
  switch (selection) {
    case 'all':
      return { sessions: true, dictionaryLookups: true, brightness: true, bookmarks: true, books: true, tags: null };
    case 'reading-sessions':
      return { ...nothing(), sessions: true, books: true, tags: new Set(SESSION_TAGS) };
    case 'dictionary-lookups':
      return { ...nothing(), dictionaryLookups: true, books: true, tags: new Set<EventTag>(['DictionaryLookup']) };
    case 'bookmarks':
      return { ...nothing(), bookmarks: true, books: true, tags: new Set<EventTag>(['BookmarkAdded']) };
    case 'brightness':
      return { ...nothing(), brightness: true, tags: new Set<EventTag>(['BrightnessChange']) };
    default: {
      const exhaustive: never = selection;
      return exhaustive;
    }
  }
}

function nothing(): Omit<ExtractionPlan, 'tags'> {
  return { sessions: false, dictionaryLookups: false, brightness: false, bookmarks: false, books: false };
}
