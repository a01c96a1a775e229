/**
 * Error taxonomy for ragtalk
 */

/**
 * Base class for every error raised by ragtalk.
 * The triggering error, if any, is kept as `cause` and appended to the stack.
 */
export class RagError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    const { cause } = options;
    super(cause instanceof Error ? `${message}: ${cause.message}` : message, { cause });
    this.name = 'RagError';
    if (cause instanceof Error && cause.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Invalid settings, detected when a component is constructed or config is loaded.
 */
export class ConfigurationError extends RagError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * A document could not be ingested. The caller may retry that document.
 */
export class IngestionError extends RagError {
  constructor(
    message: string,
    public readonly documentId: string,
    options: { cause?: unknown } = {}
  ) {
    super(message, options);
    this.name = 'IngestionError';
  }
}

/** Phase of a turn in which a collaborator failed */
export type TurnPhase = 'retrieval' | 'generation';

/**
 * Base for per-turn failures. The turn is abandoned; the session stays usable.
 */
export class TurnError extends RagError {
  constructor(
    message: string,
    public readonly phase: TurnPhase,
    options: { cause?: unknown } = {}
  ) {
    super(message, options);
    this.name = 'TurnError';
  }
}

/** The vector store query failed */
export class RetrievalError extends TurnError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, 'retrieval', options);
    this.name = 'RetrievalError';
  }
}

/** The completion service failed */
export class GenerationError extends TurnError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, 'generation', options);
    this.name = 'GenerationError';
  }
}

/**
 * A question was asked while the session was still answering another one.
 */
export class PipelineBusyError extends RagError {
  constructor(message = 'A question is already being answered in this session') {
    super(message);
    this.name = 'PipelineBusyError';
  }
}

/**
 * A document file could not be read.
 */
export class DocumentError extends RagError {
  constructor(
    message: string,
    public readonly path: string,
    options: { cause?: unknown } = {}
  ) {
    super(message, options);
    this.name = 'DocumentError';
  }
}
