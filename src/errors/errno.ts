/**
 * Node system errors can come from another realm (Jest's sandbox), so check
 * the shape rather than `instanceof Error`.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return isErrnoException(error) && error.code === code;
}
