export type QaErrorCode =
  | "INVALID_CONFIG"
  | "EMBEDDING_SERVICE"
  | "GENERATION_SERVICE"
  | "INDEX_NOT_BUILT"
  | "CORPUS";

export class QaError extends Error {
  readonly code: QaErrorCode;

  constructor(code: QaErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "QaError";
    this.code = code;
  }
}

export class InvalidConfigError extends QaError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
    this.name = "InvalidConfigError";
  }
}

export class EmbeddingServiceError extends QaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EMBEDDING_SERVICE", message, options);
    this.name = "EmbeddingServiceError";
  }
}

export class GenerationServiceError extends QaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GENERATION_SERVICE", message, options);
    this.name = "GenerationServiceError";
  }
}

export class IndexNotBuiltError extends QaError {
  constructor(message = "Retrieval index has not been built or loaded yet") {
    super("INDEX_NOT_BUILT", message);
    this.name = "IndexNotBuiltError";
  }
}

export class CorpusError extends QaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CORPUS", message, options);
    this.name = "CorpusError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
