export class DuplicateJobError extends Error {
  constructor(public readonly itemId: string) {
    super(`Item already queued: ${itemId}`);
    this.name = 'DuplicateJobError';
  }
}

export class InvalidCatalogIdError extends Error {
  constructor(public readonly catalogId: string) {
    super(`Invalid catalog id: ${catalogId}`);
    this.name = 'InvalidCatalogIdError';
  }
}

export class EmptyQueueError extends Error {
  constructor() {
    super('Queue is empty');
    this.name = 'EmptyQueueError';
  }
}

export class JobNotFoundError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job not found: ${jobId}`);
    this.name = 'JobNotFoundError';
  }
}

/**
 * A transfer that could not be opened or broke mid-stream.
 * `status` is the HTTP status when the server answered with a non-success code.
 */
export class TransferError extends Error {
  constructor(
    message: string,
    public readonly status: number | null = null,
  ) {
    super(message);
    this.name = 'TransferError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
