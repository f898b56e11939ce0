export type EventTag =
  | 'SessionStart'
  | 'SessionEnd'
  | 'PageTurn'
  | 'DictionaryLookup'
  | 'BrightnessChange'
  | 'BookmarkAdded';

export type RawTimestamp = string | number | Date;

export type RawEvent = {
  id?: string;
  typeTag: string;
  timestamp: RawTimestamp;
  bookId: string | null;
  fields: Record<string, unknown>;
};

export type LightMode = 'manual' | 'natural-light';

export type SessionMetrics = {
  secondsRead?: number;
  pagesTurned?: number;
  buttonPressCount?: number;
};

type EventBase = {
  index: number;
  bookId: string | null;
  timestamp: Date;
};

export type SessionStartEvent = EventBase & {
  kind: 'session-start';
  bookId: string;
  progress?: number;
  title?: string;
  authors?: string;
};

export type SessionEndEvent = EventBase & SessionMetrics & {
  kind: 'session-end';
  bookId: string;
  progress?: number;
};

export type PageTurnEvent = EventBase & {
  kind: 'page-turn';
  bookId: string;
};

export type DictionaryLookupEvent = EventBase & {
  kind: 'dictionary-lookup';
  term: string;
  dictionary?: string;
};

export type BrightnessChangeEvent = EventBase & {
  kind: 'brightness-change';
  value: number;
  mode: LightMode;
};

export type BookmarkAddedEvent = EventBase & {
  kind: 'bookmark-added';
  bookId: string;
  location: string;
  note?: string;
};

export type UnrecognizedEvent = {
  kind: 'unrecognized';
  index: number;
  bookId: string | null;
  timestamp: Date | null;
  reason: string;
  raw: RawEvent;
};

export type ClassifiedEvent =
  | SessionStartEvent
  | SessionEndEvent
  | PageTurnEvent
  | DictionaryLookupEvent
  | BrightnessChangeEvent
  | BookmarkAddedEvent
  | UnrecognizedEvent;

export type RecognizedEvent = Exclude<ClassifiedEvent, UnrecognizedEvent>;

export type ReadingSession = {
  bookId: string;
  bookTitle?: string;
  startTime: Date;
  endTime: Date;
  durationSeconds: number;
  pagesTurned: number;
  implicitlyClosed: boolean;
  startProgress?: number;
  endProgress?: number;
  reported?: SessionMetrics;
};

export type OrphanSpan = {
  kind: 'open-session' | 'dangling-end';
  bookId: string;
  timestamp: Date;
  pagesTurned: number;
};

// `pagesTurned` counts PageTurn rows. The device's own totals from session ends
// are read through `secondsRead`, `reportedPagesTurned` and `buttonPressCount`.
export type ReadingMetric =
  | 'duration'
  | 'pagesTurned'
  | 'secondsRead'
  | 'reportedPagesTurned'
  | 'buttonPressCount'
  | 'progressDelta';

export type DictionaryLookup = {
  term: string;
  dictionary?: string;
  bookId: string | null;
  timestamp: Date;
};

export type TermFrequency = {
  term: string;
  dictionary?: string;
  count: number;
};

export type BrightnessEvent = {
  timestamp: Date;
  value: number;
  mode: LightMode;
};

export type Bookmark = {
  bookId: string;
  location: string;
  timestamp: Date;
  note?: string;
};

export type Book = {
  id: string;
  title: string;
  authors: string;
};

export type Selection = 'all' | 'reading-sessions' | 'dictionary-lookups' | 'bookmarks' | 'brightness';

export type ParseDiagnostics = {
  totalRows: number;
  unrecognized: UnrecognizedEvent[];
};
