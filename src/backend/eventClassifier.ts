import type { ClassifiedEvent, EventTag, LightMode, RawEvent, RecognizedEvent } from '@shared/types';
import { parseInstant } from '@shared/time';
import { count, formatValidationError, nonEmptyString, optionalOf, percentage, z } from './validation';

type DecodeContext = { index: number; timestamp: Date };

type Decoder = (input: Record<string, unknown>, context: DecodeContext) => RecognizedEvent;

const lightMode = z
  .string()
  .transform((value) => value.trim().toLowerCase().replace(/[\s_-]/g, ''))
  .pipe(z.enum(['manual', 'naturallight']))
  .transform((value): LightMode => (value === 'manual' ? 'manual' : 'natural-light'));

const location = z.union([nonEmptyString, z.number().finite().transform((value) => String(value))]);

const sessionStartSchema = z.object({
  bookId: nonEmptyString,
  progress: optionalOf(percentage),
  title: optionalOf(nonEmptyString),
  authors: optionalOf(nonEmptyString)
});

const sessionEndSchema = z.object({
  bookId: nonEmptyString,
  progress: optionalOf(percentage),
  secondsRead: optionalOf(count),
  pagesTurned: optionalOf(count),
  buttonPressCount: optionalOf(count)
});

const pageTurnSchema = z.object({ bookId: nonEmptyString });

const dictionaryLookupSchema = z.object({
  bookId: optionalOf(nonEmptyString),
  term: nonEmptyString,
  dictionary: optionalOf(nonEmptyString)
});

const brightnessChangeSchema = z.object({
  value: percentage,
  mode: lightMode
});

const bookmarkAddedSchema = z.object({
  bookId: nonEmptyString,
  location,
  note: optionalOf(nonEmptyString)
});

const DECODER_TABLE: Array<[EventTag, Decoder]> = [
  [
    'SessionStart',
    (input, context) => ({ kind: 'session-start', ...context, ...sessionStartSchema.parse(input) })
  ],
  [
    'SessionEnd',
    (input, context) => ({ kind: 'session-end', ...context, ...sessionEndSchema.parse(input) })
  ],
  [
    'PageTurn',
    (input, context) => ({ kind: 'page-turn', ...context, ...pageTurnSchema.parse(input) })
  ],
  [
    'DictionaryLookup',
    (input, context) => {
      const { bookId, ...rest } = dictionaryLookupSchema.parse(input);
      return { kind: 'dictionary-lookup', ...context, ...rest, bookId: bookId ?? null };
    }
  ],
  [
    'BrightnessChange',
    (input, context) => {
      const bookId = input.bookId;
      return {
        kind: 'brightness-change',
        ...context,
        bookId: typeof bookId === 'string' && bookId ? bookId : null,
        ...brightnessChangeSchema.parse(input)
      };
    }
  ],
  [
    'BookmarkAdded',
    (input, context) => ({ kind: 'bookmark-added', ...context, ...bookmarkAddedSchema.parse(input) })
  ]
];

const DECODERS: ReadonlyMap<string, Decoder> = new Map(DECODER_TABLE);

/**
 * Maps raw log rows onto the closed set of event variants. Total: anything that
 * cannot be decoded becomes an `unrecognized` event carrying the raw row and the
 * reason, so one bad row never stops the rows after it.
 */
export class EventClassifier {
  classify(raw: RawEvent, index = 0): ClassifiedEvent {
    const timestamp = parseInstant(raw.timestamp);
    const tag = typeof raw.typeTag === 'string' ? raw.typeTag.trim() : '';

    const decode = DECODERS.get(tag);
    if (!decode) {
      return this.unrecognized(raw, index, timestamp, `unknown type tag "${tag}"`);
    }
    if (!timestamp) {
      return this.unrecognized(raw, index, null, 'timestamp: could not be decoded');
    }

    try {
      return decode({ ...raw.fields, bookId: raw.bookId }, { index, timestamp });
    } catch (error) {
      return this.unrecognized(raw, index, timestamp, `${tag} ${formatValidationError(error)}`);
    }
  }

  private unrecognized(raw: RawEvent, index: number, timestamp: Date | null, reason: string): ClassifiedEvent {
    return {
      kind: 'unrecognized',
      index,
      bookId: raw.bookId ?? null,
      timestamp,
      reason,
      raw
    };
  }
}
