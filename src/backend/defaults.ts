import type { EventTag, LightMode, Selection } from '@shared/types';

export const DEFAULT_SELECTION: Selection = 'all';

// Vendor AnalyticsEvents.Type values and the tag each one is read as.
export const VENDOR_EVENT_TYPES: Record<string, { tag: EventTag; mode?: LightMode }> = {
  OpenContent: { tag: 'SessionStart' },
  LeaveContent: { tag: 'SessionEnd' },
  DictionaryLookup: { tag: 'DictionaryLookup' },
  BrightnessAdjusted: { tag: 'BrightnessChange', mode: 'manual' },
  NaturalLightAdjusted: { tag: 'BrightnessChange', mode: 'natural-light' }
};

// content.ContentType of a whole book (chapters and other parts use other values).
export const BOOK_CONTENT_TYPE = 6;
