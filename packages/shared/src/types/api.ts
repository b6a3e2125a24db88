import type { Classification, SessionSummary, SessionTurn } from "./session.js";

export interface ApiErrorResponse {
  error: string;
  code?: string;
  reason?: string;
  details?: unknown;
}

export interface SourceReference {
  chunkId: string;
  documentId: string;
  title: string;
  url?: string;
  score: number;
  snippet: string;
}

export interface AskRequest {
  sessionId: string;
  question: string;
}

export interface AskResponse {
  sessionId: string;
  question: string;
  answer: string;
  inDomain: boolean;
  answerFound: boolean;
  classification: Classification;
  sources: SourceReference[];
  retrievedCount: number;
  processingTimeMs: number;
}

export interface ListSessionsResponse {
  total: number;
  sessions: SessionSummary[];
}

export interface SessionDetailResponse {
  session: SessionSummary & {
    turns: SessionTurn[];
  };
}

export interface IndexStatsResponse {
  ready: boolean;
  chunkCount: number;
  documentCount: number;
  vocabularySize: number;
  dimension: number;
  builtAt: string | null;
  embeddingModel: string | null;
}

export type ServiceCheckStatus = "ok" | "failed" | "not_configured" | "not_built";

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec: number;
  activeSessions: number;
  checks: {
    index: ServiceCheckStatus;
    llm: ServiceCheckStatus;
  };
  memoryUsage: {
    rss: number;
    heapUsed: number;
    heapTotal: number;
  };
}
