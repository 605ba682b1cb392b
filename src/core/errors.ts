/**
 * The model could not be reached after every retry. Fatal for the current
 * paper, never for the batch.
 */
export class TransportError extends Error {
  readonly status?: number;
  readonly code?: string;
  readonly retryCount: number;

  constructor(message: string, options: { status?: number; code?: string; retryCount: number; cause?: unknown }) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "TransportError";
    this.status = options.status;
    this.code = options.code;
    this.retryCount = options.retryCount;
  }
}

/** Tool arguments that do not parse or do not match the tool's schema. */
export class InvalidArguments extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "InvalidArguments";
    this.issues = issues;
  }
}

/**
 * A collaborator (text extractor, simulator, reference store, file system)
 * failed. `details` travels back to the model so it can repair its input.
 */
export class CollaboratorFailure extends Error {
  readonly collaborator: string;
  readonly details: Record<string, unknown>;

  constructor(collaborator: string, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "CollaboratorFailure";
    this.collaborator = collaborator;
    this.details = details;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
