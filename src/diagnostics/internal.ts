const INTERNAL_ERROR_NAME = 'InternalLayoutError';

/**
 * Abort the current layout pass: an upstream pass handed us an inconsistent symbol table.
 */
export function internalError(message: string): never {
  throw Object.assign(new Error(message), { name: INTERNAL_ERROR_NAME });
}

export function isInternalLayoutError(err: unknown): err is Error {
  return err instanceof Error && err.name === INTERNAL_ERROR_NAME;
}
