/*
  Console-backed logger shared by the pipeline and the row sources. Warnings and
  errors go to stderr.
*/
export const logger = {
  info: (...args: unknown[]) => console.log('[info]', ...args),
  warn: (...args: unknown[]) => console.warn('[warn]', ...args),
  error: (...args: unknown[]) => console.error('[error]', ...args)
};
