/**
 * Error taxonomy for the question-answering pipeline.
 *
 * Every error carries the pipeline `stage` it originated in so that transports
 * can surface a message naming the failing step.
 */
export type PipelineStage =
  | "config"
  | "upload"
  | "extraction"
  | "chunking"
  | "embedding"
  | "indexing"
  | "retrieval"
  | "generation"
  | "lookup"
  | "request";

export class PipelineError extends Error {
  public readonly stage: PipelineStage;

  public constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(`[${stage}] ${message}`, options);
    this.name = "PipelineError";
    this.stage = stage;
  }
}

/** Bad chunking parameters or inconsistent runtime configuration. */
export class InvalidConfigurationError extends PipelineError {
  public constructor(message: string, stage: PipelineStage = "config") {
    super(stage, message);
    this.name = "InvalidConfigurationError";
  }
}

/** Embedding call failed (after retries) or returned a malformed payload. */
export class EmbeddingServiceError extends PipelineError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("embedding", message, options);
    this.name = "EmbeddingServiceError";
  }
}

export class DimensionMismatchError extends PipelineError {
  public readonly expected: number;
  public readonly actual: number;

  public constructor(expected: number, actual: number, stage: PipelineStage = "indexing") {
    super(stage, `Vector dimension ${actual} does not match index dimension ${expected}`);
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

/** LLM call failed after the retry policy was exhausted, or answered with nothing usable. */
export class GenerationError extends PipelineError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("generation", message, options);
    this.name = "GenerationError";
  }
}

export class NotFoundError extends PipelineError {
  public readonly kind: "document" | "conversation";
  public readonly id: string;

  public constructor(kind: "document" | "conversation", id: string) {
    super("lookup", `Unknown ${kind} id: ${id}`);
    this.name = "NotFoundError";
    this.kind = kind;
    this.id = id;
  }
}

export class InvalidUploadError extends PipelineError {
  public constructor(message: string) {
    super("upload", message);
    this.name = "InvalidUploadError";
  }
}

export class ExtractionError extends PipelineError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("extraction", message, options);
    this.name = "ExtractionError";
  }
}

export class InvalidRequestError extends PipelineError {
  public constructor(message: string) {
    super("request", message);
    this.name = "InvalidRequestError";
  }
}

/** The caller abandoned the operation (client disconnect, explicit abort). */
export class CancelledError extends PipelineError {
  public constructor(stage: PipelineStage) {
    super(stage, "Operation cancelled by caller");
    this.name = "CancelledError";
  }
}

/** Throws {@link CancelledError} if the signal has already fired. */
export function throwIfCancelled(signal: AbortSignal | undefined, stage: PipelineStage): void {
  if (signal?.aborted) throw new CancelledError(stage);
}
