import { ZodError, z } from 'zod';

export function formatValidationError(error: unknown): string {
  if (error instanceof ZodError) {
    const first = error.issues[0];
    if (!first) return 'Invalid value';
    const path = first.path.length ? first.path.join('.') : 'value';
    return `${path}: ${first.message}`;
  }
  if (error instanceof Error) return error.message;
  return 'Unknown error';
}

// Device columns hold numbers as text as often as not.
const numericText = z.preprocess(
  (input) => (typeof input === 'string' && input.trim() !== '' ? Number(input.trim()) : input),
  z.number().finite()
);

export const percentage = numericText.pipe(z.number().int().min(0).max(100));

export const count = numericText.pipe(z.number().int().nonnegative());

export const nonEmptyString = z.string().trim().min(1);

export function optionalOf<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((input) => (input === null || input === '' ? undefined : input), schema.optional());
}

export { z };
