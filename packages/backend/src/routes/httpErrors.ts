import type { ApiErrorResponse } from "@siteqa/shared";
import { QaError, type QaErrorCode } from "../errors.js";

const statusByCode: Record<QaErrorCode, number> = {
  INDEX_NOT_BUILT: 503,
  EMBEDDING_SERVICE: 502,
  GENERATION_SERVICE: 502,
  INVALID_CONFIG: 500,
  CORPUS: 500
};

const messageByCode: Record<QaErrorCode, string> = {
  INDEX_NOT_BUILT: "Retrieval index is not ready",
  EMBEDDING_SERVICE: "Embedding service failed",
  GENERATION_SERVICE: "Answer generation failed",
  INVALID_CONFIG: "Server misconfigured",
  CORPUS: "Corpus error"
};

export function toHttpError(error: unknown): { status: number; body: ApiErrorResponse } {
  if (error instanceof QaError) {
    return {
      status: statusByCode[error.code],
      body: { error: messageByCode[error.code], code: error.code, reason: error.message }
    };
  }
  return {
    status: 500,
    body: { error: "Internal server error", code: "INTERNAL" }
  };
}
