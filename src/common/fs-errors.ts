/**
 * True when error is a Node system error carrying one of the given codes
 *
 * @example
 * hasErrorCode(error, 'ENOENT', 'ENOTDIR')
 */
export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    codes.includes(error.code)
  );
}
