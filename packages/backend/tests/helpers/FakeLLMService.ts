import type {
  CompletionOptions,
  EmbeddingProvider,
  LLMMessage,
  LLMServiceLike
} from "../../src/services/llmTypes.js";
import { ConceptEmbedder } from "./ConceptEmbedder.js";

interface FakeLLMServiceOptions {
  classificationReply?: string | Error;
  answerChunks?: string[];
  answerError?: Error;
  embedder?: EmbeddingProvider;
}

export interface RecordedCall {
  messages: LLMMessage[];
  options: CompletionOptions;
}

export const inDomainReply = JSON.stringify({ label: "in_domain", confidence: 0.9, reason: "about the company" });
export const offDomainReply = JSON.stringify({ label: "off_domain", confidence: 0.8, reason: "small talk" });

export class FakeLLMService implements LLMServiceLike {
  readonly completeCalls: RecordedCall[] = [];
  readonly streamCalls: RecordedCall[] = [];

  classificationReply: string | Error;
  answerChunks: string[];
  answerError: Error | null;
  private readonly embedder: EmbeddingProvider;

  constructor(options: FakeLLMServiceOptions = {}) {
    this.classificationReply = options.classificationReply ?? inDomainReply;
    this.answerChunks = options.answerChunks ?? ["Our plans ", "start at 500 dollars [2]."];
    this.answerError = options.answerError ?? null;
    this.embedder = options.embedder ?? new ConceptEmbedder();
  }

  async complete(messages: LLMMessage[], options: CompletionOptions = {}): Promise<string> {
    this.completeCalls.push({ messages, options });
    if (this.classificationReply instanceof Error) {
      throw this.classificationReply;
    }
    return this.classificationReply;
  }

  async *streamCompletion(messages: LLMMessage[], options: CompletionOptions = {}): AsyncGenerator<string> {
    this.streamCalls.push({ messages, options });
    for (const chunk of this.answerChunks) {
      yield chunk;
    }
    if (this.answerError) {
      throw this.answerError;
    }
  }

  async generateEmbedding(text: string): Promise<number[]> {
    return this.embedder.generateEmbedding(text);
  }
}
