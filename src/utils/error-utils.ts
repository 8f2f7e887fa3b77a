export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof Reflect.get(error, 'code') === 'string'
  );
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
