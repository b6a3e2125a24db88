import { appConfig } from "../config.js";
import { CallLimiter } from "./CallLimiter.js";
import { createOpenAIClient, wrapOpenAI } from "./openaiClient.js";
import type {
  CompletionOptions,
  CompletionRequest,
  LLMConfig,
  LLMMessage,
  LLMServiceLike,
  OpenAICompatibleClient,
  TokenUsagePhase,
  TokenUsageRecord,
  UsageLike
} from "./llmTypes.js";

type NormalizedLLMConfig = LLMConfig & {
  baseURL: string;
  temperature: number;
  maxTokens: number;
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
};

const MAX_USAGE_RECORDS = 1000;

export class LLMService implements LLMServiceLike {
  private readonly client: OpenAICompatibleClient;
  private readonly embeddingClient: OpenAICompatibleClient;
  private readonly limiter: CallLimiter;
  private readonly usageRecords: TokenUsageRecord[] = [];
  private readonly config: NormalizedLLMConfig;

  constructor(
    config: LLMConfig,
    deps?: {
      client?: OpenAICompatibleClient;
      embeddingClient?: OpenAICompatibleClient;
      limiter?: CallLimiter;
    }
  ) {
    this.config = {
      ...config,
      baseURL: config.baseURL ?? "https://openrouter.ai/api/v1",
      temperature: config.temperature ?? 0.1,
      maxTokens: config.maxTokens ?? 1024,
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 2,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 60,
      timeoutMs: config.timeoutMs ?? 30_000
    };

    this.client =
      deps?.client ??
      wrapOpenAI(
        createOpenAIClient({
          apiKey: this.config.apiKey,
          baseURL: this.config.baseURL,
          timeoutMs: this.config.timeoutMs
        })
      );

    if (deps?.embeddingClient) {
      this.embeddingClient = deps.embeddingClient;
    } else if (config.embeddingApiKey && config.embeddingBaseURL) {
      this.embeddingClient = wrapOpenAI(
        createOpenAIClient({
          apiKey: config.embeddingApiKey,
          baseURL: config.embeddingBaseURL,
          timeoutMs: this.config.timeoutMs
        })
      );
    } else {
      this.embeddingClient = this.client;
    }

    this.limiter =
      deps?.limiter ??
      new CallLimiter({
        maxConcurrent: this.config.maxConcurrent,
        maxRetries: this.config.maxRetries,
        retryDelayMs: this.config.retryDelayMs,
        requestsPerMinute: this.config.requestsPerMinute,
        timeoutMs: this.config.timeoutMs
      });
  }

  static fromEnv(): LLMService {
    const openai = appConfig.LLM_PROVIDER === "openai";

    const config: LLMConfig = {
      apiKey: openai ? appConfig.OPENAI_API_KEY : appConfig.OPENROUTER_API_KEY,
      baseURL: openai ? appConfig.OPENAI_BASE_URL : appConfig.OPENROUTER_BASE_URL,
      chatModel: openai ? appConfig.OPENAI_CHAT_MODEL : appConfig.OPENROUTER_CHAT_MODEL,
      embeddingModel: openai ? appConfig.OPENAI_EMBEDDING_MODEL : appConfig.OPENROUTER_EMBEDDING_MODEL,
      maxConcurrent: appConfig.LLM_MAX_CONCURRENT,
      maxRetries: appConfig.LLM_MAX_RETRIES,
      retryDelayMs: appConfig.LLM_RETRY_DELAY_MS,
      requestsPerMinute: appConfig.LLM_REQUESTS_PER_MINUTE,
      timeoutMs: appConfig.CALL_TIMEOUT_MS
    };

    if (appConfig.EMBEDDING_API_KEY) {
      config.embeddingApiKey = appConfig.EMBEDDING_API_KEY;
    }
    if (appConfig.EMBEDDING_BASE_URL) {
      config.embeddingBaseURL = appConfig.EMBEDDING_BASE_URL;
    }
    if (appConfig.EMBEDDING_DIMENSIONS !== undefined) {
      config.embeddingDimensions = appConfig.EMBEDDING_DIMENSIONS;
    }

    return new LLMService(config);
  }

  get chatModel(): string {
    return this.config.chatModel;
  }

  get embeddingModel(): string {
    return this.config.embeddingModel;
  }

  async complete(messages: LLMMessage[], options: CompletionOptions = {}): Promise<string> {
    const response = await this.limiter.run(() => this.client.createCompletion(this.toRequest(messages, options)));
    this.recordUsage(options.phase ?? "generation", this.config.chatModel, response.usage);
    return response.choices[0]?.message.content ?? "";
  }

  async *streamCompletion(messages: LLMMessage[], options: CompletionOptions = {}): AsyncGenerator<string> {
    const request = this.toRequest(messages, options);
    const stream = this.limiter.stream((signal) => this.client.streamCompletion(request, signal));

    let usage: UsageLike | null | undefined;
    for await (const chunk of stream) {
      usage = chunk.usage ?? usage;
      const delta = chunk.choices[0]?.delta?.content;
      if (delta) {
        yield delta;
      }
    }

    this.recordUsage(options.phase ?? "generation", this.config.chatModel, usage);
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const response = await this.limiter.run(() =>
      this.embeddingClient.createEmbedding(
        this.config.embeddingDimensions !== undefined
          ? { model: this.config.embeddingModel, input: text, dimensions: this.config.embeddingDimensions }
          : { model: this.config.embeddingModel, input: text }
      )
    );

    this.recordUsage("embedding", this.config.embeddingModel, response.usage);
    return response.data[0]?.embedding ?? [];
  }

  getUsageRecords(limit = 200): TokenUsageRecord[] {
    return this.usageRecords.slice(-Math.max(1, limit));
  }

  private toRequest(messages: LLMMessage[], options: CompletionOptions): CompletionRequest {
    return {
      model: this.config.chatModel,
      messages,
      temperature: options.temperature ?? this.config.temperature,
      maxTokens: options.maxTokens ?? this.config.maxTokens,
      json: options.responseFormat === "json"
    };
  }

  private recordUsage(phase: TokenUsagePhase, model: string, usage: UsageLike | null | undefined): void {
    this.usageRecords.push({
      phase,
      model,
      promptTokens: usage?.prompt_tokens ?? 0,
      completionTokens: usage?.completion_tokens ?? 0,
      timestamp: new Date()
    });
    if (this.usageRecords.length > MAX_USAGE_RECORDS) {
      this.usageRecords.splice(0, this.usageRecords.length - MAX_USAGE_RECORDS);
    }
  }
}

export function safeJsonParse(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch {
    const match = input.match(/\{[\s\S]*\}/);
    if (!match) {
      return null;
    }
    try {
      return JSON.parse(match[0]);
    } catch {
      return null;
    }
  }
}
