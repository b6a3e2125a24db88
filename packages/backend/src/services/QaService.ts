import type {
  Classification,
  RetrievedChunk,
  SessionTurn,
  SourceReference
} from "@siteqa/shared";
import { GenerationServiceError, describeError } from "../errors.js";
import {
  NO_ANSWER_TEXT,
  buildAnswerSystemPrompt,
  buildGeneralSystemPrompt,
  indicatesNoAnswer,
  type OrganizationProfile
} from "../prompts/index.js";
import type { RetrieverLike } from "../retrieval/HybridRetriever.js";
import { logger } from "../utils/logger.js";
import { trimSnippet } from "../utils/text.js";
import type { LLMMessage, LLMServiceLike } from "./llmTypes.js";
import type { QueryClassifierLike } from "./QueryClassifier.js";
import type { SessionMemory } from "./SessionMemory.js";

export type QaState = "RECEIVED" | "CLASSIFIED" | "RETRIEVED" | "SKIPPED" | "GENERATED" | "RECORDED";

export interface QaResult {
  sessionId: string;
  question: string;
  answer: string;
  inDomain: boolean;
  classification: Classification;
  sources: SourceReference[];
  answerFound: boolean;
  retrievedCount: number;
}

export type QaStreamEvent =
  | {
      type: "classification";
      classification: Classification;
    }
  | {
      type: "sources";
      sources: SourceReference[];
      retrievedCount: number;
    }
  | {
      type: "delta";
      delta: string;
    }
  | {
      type: "done";
      result: QaResult;
    };

export interface QaServiceOptions {
  organization: OrganizationProfile;
  generationHistoryTurns: number;
  classifierHistoryTurns: number;
  maxChunkContextLength: number;
  snippetLength: number;
  inDomainTemperature: number;
  offDomainTemperature: number;
  maxTokens: number;
}

const defaultOptions: QaServiceOptions = {
  organization: { name: "the company", profile: "" },
  generationHistoryTurns: 5,
  classifierHistoryTurns: 3,
  maxChunkContextLength: 1200,
  snippetLength: 200,
  inDomainTemperature: 0.1,
  offDomainTemperature: 0.7,
  maxTokens: 1000
};

function lastTurns(turns: readonly SessionTurn[], count: number): SessionTurn[] {
  return count > 0 ? turns.slice(-count) : [];
}

export class QaService {
  private readonly options: QaServiceOptions;

  constructor(
    private readonly classifier: QueryClassifierLike,
    private readonly retriever: RetrieverLike,
    private readonly memory: SessionMemory,
    private readonly llm: LLMServiceLike,
    options: Partial<QaServiceOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  async ask(sessionId: string, question: string): Promise<QaResult> {
    let result: QaResult | null = null;

    for await (const event of this.streamAnswer(sessionId, question)) {
      if (event.type === "done") {
        result = event.result;
      }
    }

    if (!result) {
      throw new GenerationServiceError("Answer stream finished without a result");
    }
    return result;
  }

  /**
   * Runs one question through classification, retrieval and generation. The turn is
   * recorded just before `done`; a consumer that stops earlier leaves the session as it was.
   */
  async *streamAnswer(sessionId: string, question: string): AsyncGenerator<QaStreamEvent> {
    this.trace(sessionId, "RECEIVED");
    const history = await this.memory.recent(
      sessionId,
      Math.max(this.options.generationHistoryTurns, this.options.classifierHistoryTurns)
    );

    const classification = await this.classifier.classify(
      question,
      lastTurns(history, this.options.classifierHistoryTurns)
    );
    this.trace(sessionId, "CLASSIFIED", {
      label: classification.label,
      confidence: classification.confidence,
      degraded: classification.degraded
    });
    yield { type: "classification", classification };

    let chunks: RetrievedChunk[] = [];
    if (classification.inDomain) {
      chunks = await this.retriever.retrieve(question);
      this.trace(sessionId, "RETRIEVED", { retrievedCount: chunks.length });
    } else {
      this.trace(sessionId, "SKIPPED");
    }

    const sources = chunks.map((item) => this.toSource(item));
    yield { type: "sources", sources, retrievedCount: chunks.length };

    let answer = "";
    const nothingRetrieved = classification.inDomain && chunks.length === 0;
    if (nothingRetrieved) {
      answer = NO_ANSWER_TEXT;
      yield { type: "delta", delta: answer };
    } else {
      const messages = this.buildMessages(
        question,
        classification.inDomain,
        chunks,
        lastTurns(history, this.options.generationHistoryTurns)
      );
      const stream = this.llm.streamCompletion(messages, {
        temperature: classification.inDomain
          ? this.options.inDomainTemperature
          : this.options.offDomainTemperature,
        maxTokens: this.options.maxTokens,
        phase: "generation"
      });

      try {
        for await (const delta of stream) {
          if (delta.length === 0) {
            continue;
          }
          answer += delta;
          yield { type: "delta", delta };
        }
      } catch (error) {
        throw new GenerationServiceError(`Answer generation failed: ${describeError(error)}`, {
          cause: error
        });
      }

      if (answer.trim().length === 0) {
        answer = NO_ANSWER_TEXT;
        yield { type: "delta", delta: answer };
      }
    }
    this.trace(sessionId, "GENERATED", { answerLength: answer.length });

    await this.memory.append(sessionId, {
      question,
      answer,
      timestamp: new Date(),
      label: classification.label,
      degraded: classification.degraded
    });
    this.trace(sessionId, "RECORDED");

    yield {
      type: "done",
      result: {
        sessionId,
        question,
        answer,
        inDomain: classification.inDomain,
        classification,
        sources,
        answerFound: !nothingRetrieved && !indicatesNoAnswer(answer),
        retrievedCount: chunks.length
      }
    };
  }

  private buildMessages(
    question: string,
    inDomain: boolean,
    chunks: readonly RetrievedChunk[],
    history: readonly SessionTurn[]
  ): LLMMessage[] {
    const systemPrompt = inDomain
      ? buildAnswerSystemPrompt(this.options.organization, chunks, this.options.maxChunkContextLength)
      : buildGeneralSystemPrompt(this.options.organization);

    const messages: LLMMessage[] = [{ role: "system", content: systemPrompt }];
    for (const turn of history) {
      messages.push({ role: "user", content: turn.question });
      messages.push({ role: "assistant", content: turn.answer });
    }
    messages.push({ role: "user", content: question });
    return messages;
  }

  private toSource(item: RetrievedChunk): SourceReference {
    const source: SourceReference = {
      chunkId: item.chunkId,
      documentId: item.chunk.documentId,
      title: item.chunk.documentTitle,
      score: item.score,
      snippet: trimSnippet(item.chunk.text, this.options.snippetLength)
    };
    if (item.chunk.documentUrl !== undefined) {
      source.url = item.chunk.documentUrl;
    }
    return source;
  }

  private trace(sessionId: string, state: QaState, details: Record<string, unknown> = {}): void {
    logger.debug({ sessionId, state, ...details }, "QA request state");
  }
}
