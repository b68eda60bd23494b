/** Any error class, whatever its constructor arguments. */
export type ErrorClass<T extends Error> = new (...args: never[]) => T;

/**
 * Matches by prototype first, then by name so errors crossing realms (or
 * re-created from a message) are still recognised.
 */
function matchesErrorClass<T extends Error>(errorClass: ErrorClass<T>, current: Error): current is T {
  return (
    current instanceof errorClass ||
    current.name === errorClass.name ||
    (errorClass.name !== '' && typeof current.message === 'string' && current.message.startsWith(errorClass.name))
  );
}

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  let current: unknown = err;
  while (current instanceof Error) {
    if (matchesErrorClass(errorClass, current)) {
      return current;
    }

    current = current.cause;
  }

  return null;
}
