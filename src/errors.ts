/**
 * Bad user or stored input (unknown timezone, malformed time of day).
 * Recovered locally; never shown to the user as a crash.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * The store could not be reached or did not answer in time.
 */
export class TransientStoreError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "TransientStoreError";
  }
}

/**
 * A notification could not be delivered.
 */
export class DispatchError extends Error {
  constructor(
    message: string,
    readonly chatId: number,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "DispatchError";
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? `${e.name}: ${e.message}` : String(e);
}
