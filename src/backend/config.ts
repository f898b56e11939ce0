import type { Selection } from '@shared/types';
import { DEFAULT_SELECTION } from './defaults';
import { InvalidArgumentError } from './errors';
import { formatValidationError, z } from './validation';

export type AnalysisOptions = {
  selection: Selection;
  minSessionSeconds: number;
};

const SELECTIONS = ['all', 'reading-sessions', 'dictionary-lookups', 'bookmarks', 'brightness'] as const satisfies readonly Selection[];

const optionsSchema = z
  .object({
    selection: z.enum(SELECTIONS).default(DEFAULT_SELECTION),
    minSessionSeconds: z.coerce.number().finite().nonnegative().default(0)
  })
  .strict();

/** Validates caller-supplied options, filling defaults for anything left out. */
export function resolveAnalysisOptions(input: unknown = {}): AnalysisOptions {
  const parsed = optionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new InvalidArgumentError(formatValidationError(parsed.error));
  }
  return parsed.data;
}
