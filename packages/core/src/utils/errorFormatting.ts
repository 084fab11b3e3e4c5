/**
 * Formats an unknown error into a readable string message.
 * Errors carrying a string `code` (verification and key set errors, Node system errors)
 * are prefixed with it.
 *
 * @param error - The error to format (can be Error, string, or any other type)
 * @returns Formatted error message string
 *
 * @example
 * ```typescript
 * formatError(new KeySetError('E_KEY_SET_INVALID', 'Key set response is not JSON'));
 * // Returns: '[E_KEY_SET_INVALID] Key set response is not JSON'
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    const code = 'code' in error ? error.code : undefined;
    return typeof code === 'string' ? `[${code}] ${error.message}` : error.message;
  }
  return String(error);
}
