export class DedupeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid settings, or a server that refuses us before any group
 * is touched. The only error that ends a run.
 */
export class ConfigurationError extends DedupeError {}

export class InvalidGroupError extends DedupeError {
  constructor(
    readonly groupId: string,
    readonly size: number
  ) {
    super(`Duplicate group ${groupId} has ${size} asset(s), at least 2 are required`);
  }
}

export class ApiRequestError extends DedupeError {
  constructor(
    readonly operation: string,
    readonly status: number | null,
    readonly responseBody: string | null,
    options?: { cause?: unknown }
  ) {
    super(
      status === null
        ? `${operation} failed: no response from server`
        : `${operation} failed with HTTP ${status}${responseBody ? `: ${responseBody}` : ''}`,
      options
    );
  }
}

export class RequestTimeoutError extends ApiRequestError {
  constructor(operation: string, readonly timeoutSeconds: number, options?: { cause?: unknown }) {
    super(operation, null, null, options);
    this.message = `${operation} timed out after ${timeoutSeconds}s`;
  }
}

export class TransferError extends DedupeError {
  constructor(
    readonly groupId: string,
    readonly winnerId: string,
    readonly loserIds: readonly string[],
    options?: { cause?: unknown }
  ) {
    super(
      `Metadata transfer to ${winnerId} failed for group ${groupId}: ${describeError(options?.cause)}`,
      options
    );
  }
}

export class DeletionError extends DedupeError {
  constructor(readonly assetIds: readonly string[], options?: { cause?: unknown }) {
    super(`Deletion of ${assetIds.length} asset(s) failed: ${describeError(options?.cause)}`, options);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
