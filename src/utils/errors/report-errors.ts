/**
 * Base class for failures inside the report pipeline. The orchestrator turns
 * any of these into a FAILED result for the owner being processed.
 */
export class ReportPipelineError extends Error {
  public readonly name: string;

  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ReportPipelineError';
  }
}

/**
 * Error thrown when a timezone override cannot be resolved to a fixed offset
 */
export class InvalidTimezoneError extends ReportPipelineError {
  public readonly name: string;

  constructor(timezone: string) {
    super(`Invalid timezone "${timezone}"`, 'INVALID_TIMEZONE');
    this.name = 'InvalidTimezoneError';
  }
}

/**
 * Error thrown when the record store fails during retrieval
 */
export class FetchError extends ReportPipelineError {
  public readonly name: string;

  constructor(message: string, cause?: unknown) {
    super(message, 'FETCH_ERROR', cause);
    this.name = 'FetchError';
  }
}

/**
 * Error thrown for an unsupported template selector or a broken render
 */
export class RenderError extends ReportPipelineError {
  public readonly name: string;

  constructor(message: string, cause?: unknown) {
    super(message, 'RENDER_ERROR', cause);
    this.name = 'RenderError';
  }
}

/**
 * Error thrown when the document, its inline assets and attachments disagree
 */
export class ComposeError extends ReportPipelineError {
  public readonly name: string;

  constructor(message: string) {
    super(message, 'COMPOSE_ERROR');
    this.name = 'ComposeError';
  }
}

/**
 * Error thrown when the email transport rejects a message
 */
export class TransportError extends ReportPipelineError {
  public readonly name: string;

  constructor(message: string, cause?: unknown) {
    super(message, 'TRANSPORT_ERROR', cause);
    this.name = 'TransportError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
