export type LLMRole = "system" | "user" | "assistant";

export interface LLMMessage {
  role: LLMRole;
  content: string;
}

export type TokenUsagePhase = "classification" | "generation" | "embedding";

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  responseFormat?: "json" | "text";
  phase?: TokenUsagePhase;
}

export interface EmbeddingProvider {
  generateEmbedding(text: string): Promise<number[]>;
}

export interface LLMServiceLike extends EmbeddingProvider {
  complete(messages: LLMMessage[], options?: CompletionOptions): Promise<string>;
  streamCompletion(messages: LLMMessage[], options?: CompletionOptions): AsyncGenerator<string>;
}

export interface LLMConfig {
  apiKey: string;
  baseURL?: string;
  chatModel: string;
  embeddingModel: string;
  embeddingApiKey?: string;
  embeddingBaseURL?: string;
  embeddingDimensions?: number;
  temperature?: number;
  maxTokens?: number;
  maxConcurrent?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  requestsPerMinute?: number;
  timeoutMs?: number;
}

export interface CallLimitConfig {
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
}

export interface TokenUsageRecord {
  phase: TokenUsagePhase;
  model: string;
  promptTokens: number;
  completionTokens: number;
  timestamp: Date;
}

export interface UsageLike {
  prompt_tokens?: number;
  completion_tokens?: number;
}

export interface CompletionRequest {
  model: string;
  messages: LLMMessage[];
  temperature: number;
  maxTokens: number;
  json: boolean;
}

export interface CompletionResponse {
  choices: Array<{ message: { content: string | null } }>;
  usage?: UsageLike | null;
}

export interface CompletionStreamChunk {
  choices: Array<{ delta?: { content?: string | null } }>;
  usage?: UsageLike | null;
}

export interface EmbeddingRequest {
  model: string;
  input: string;
  dimensions?: number;
}

export interface EmbeddingResponse {
  data: Array<{ embedding: number[] }>;
  usage?: UsageLike | null;
}

/** The slice of an OpenAI-compatible API the service talks to. */
export interface OpenAICompatibleClient {
  createCompletion(request: CompletionRequest): Promise<CompletionResponse>;
  streamCompletion(request: CompletionRequest, signal?: AbortSignal): Promise<AsyncIterable<CompletionStreamChunk>>;
  createEmbedding(request: EmbeddingRequest): Promise<EmbeddingResponse>;
}
