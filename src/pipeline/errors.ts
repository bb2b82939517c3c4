// Every pipeline error carries the HTTP status the server answers with.
export class PipelineError extends Error {
  constructor(message: string, readonly code: string, readonly statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or out-of-range input. Raised before any state is touched. */
export class ValidationError extends PipelineError {
  constructor(readonly errs: string[]) {
    super(`invalid input: ${errs.join(', ')}`, 'validation', 400);
  }
}

export class PersistenceUnavailable extends PipelineError {
  constructor(what: string, cause: unknown) {
    super(`${what} unavailable: ${errorMessage(cause)}`, 'persistence_unavailable', 503, { cause });
  }
}

export class SubscriberTransportError extends PipelineError {
  constructor(readonly subscriberId: string, cause: unknown) {
    super(`subscriber ${subscriberId} transport failed: ${errorMessage(cause)}`, 'subscriber_transport', 500, { cause });
  }
}

export class AnsweringServiceUnavailable extends PipelineError {
  constructor(reason: string, cause?: unknown) {
    super(`answering service unavailable: ${reason}`, 'answering_unavailable', 502, { cause });
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e ?? 'error');
}
