/**
 * A filter draft was rejected before entering the filter set.
 */
export class FilterValidationError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(errors.join(', '));
    this.name = 'FilterValidationError';
    this.errors = errors;
  }
}

/**
 * A persisted document could not be read or failed validation.
 * Raised at startup only; callers must refuse to run.
 */
export class StoreCorruptionError extends Error {
  readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(`Persisted state at ${filePath} is unreadable: ${reason}`);
    this.name = 'StoreCorruptionError';
    this.filePath = filePath;
  }
}

/**
 * A pending decision request was withdrawn before anyone answered it.
 */
export class RequestWithdrawnError extends Error {
  readonly requestId: string;

  constructor(requestId: string) {
    super(`Decision request ${requestId} was withdrawn`);
    this.name = 'RequestWithdrawnError';
    this.requestId = requestId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
