import { describe, expect, it, vi } from "vitest";
import { CallLimiter, CallTimeoutError } from "../../../src/services/CallLimiter.js";
import { LLMService, safeJsonParse } from "../../../src/services/LLMService.js";
import type {
  CompletionStreamChunk,
  OpenAICompatibleClient
} from "../../../src/services/llmTypes.js";

function createStream(chunks: CompletionStreamChunk[]): AsyncIterable<CompletionStreamChunk> {
  return {
    async *[Symbol.asyncIterator]() {
      for (const chunk of chunks) {
        yield chunk;
      }
    }
  };
}

function createClient(overrides: Partial<OpenAICompatibleClient> = {}): OpenAICompatibleClient {
  return {
    createCompletion: vi.fn().mockResolvedValue({
      choices: [{ message: { content: "{\"label\":\"in_domain\"}" } }],
      usage: { prompt_tokens: 10, completion_tokens: 5 }
    }),
    streamCompletion: vi.fn().mockResolvedValue(createStream([])),
    createEmbedding: vi.fn().mockResolvedValue({
      data: [{ embedding: [0.1, 0.2, 0.3] }],
      usage: { prompt_tokens: 3 }
    }),
    ...overrides
  };
}

const limiter = () =>
  new CallLimiter({
    maxConcurrent: 5,
    maxRetries: 0,
    retryDelayMs: 1,
    requestsPerMinute: 200,
    timeoutMs: 5000
  });

describe("LLMService", () => {
  it("sends completion options and records usage per phase", async () => {
    const client = createClient();
    const service = new LLMService(
      { apiKey: "test-secret", chatModel: "chat-model", embeddingModel: "embed-model" },
      { client, limiter: limiter() }
    );

    const reply = await service.complete([{ role: "user", content: "Is this about you?" }], {
      temperature: 0,
      maxTokens: 200,
      responseFormat: "json",
      phase: "classification"
    });

    expect(reply).toBe("{\"label\":\"in_domain\"}");
    expect(client.createCompletion).toHaveBeenCalledWith({
      model: "chat-model",
      messages: [{ role: "user", content: "Is this about you?" }],
      temperature: 0,
      maxTokens: 200,
      json: true
    });
    expect(service.getUsageRecords()).toEqual([
      expect.objectContaining({ phase: "classification", model: "chat-model", promptTokens: 10, completionTokens: 5 })
    ]);
  });

  it("streams deltas and records usage from the final chunk", async () => {
    const client = createClient({
      streamCompletion: vi.fn().mockResolvedValue(
        createStream([
          { choices: [{ delta: { content: "Hello, " } }] },
          { choices: [{ delta: { content: "" } }] },
          { choices: [{ delta: { content: "world." } }] },
          { choices: [], usage: { prompt_tokens: 12, completion_tokens: 4 } }
        ])
      )
    });
    const service = new LLMService(
      { apiKey: "test-secret", chatModel: "chat-model", embeddingModel: "embed-model", temperature: 0.3 },
      { client, limiter: limiter() }
    );

    const deltas: string[] = [];
    for await (const delta of service.streamCompletion([{ role: "user", content: "hi" }])) {
      deltas.push(delta);
    }

    expect(deltas).toEqual(["Hello, ", "world."]);
    expect(client.streamCompletion).toHaveBeenCalledWith(
      expect.objectContaining({ temperature: 0.3, maxTokens: 1024, json: false }),
      expect.any(AbortSignal)
    );
    expect(service.getUsageRecords()[0]).toMatchObject({
      phase: "generation",
      promptTokens: 12,
      completionTokens: 4
    });
  });

  it("fails a stream that stops sending and aborts the upstream request", async () => {
    let upstreamSignal: AbortSignal | undefined;
    const stalled: AsyncIterable<CompletionStreamChunk> = {
      async *[Symbol.asyncIterator]() {
        yield { choices: [{ delta: { content: "Our prices" } }] };
        await new Promise<void>(() => undefined);
      }
    };
    const client = createClient({
      streamCompletion: async (_request, signal) => {
        upstreamSignal = signal;
        return stalled;
      }
    });
    const service = new LLMService(
      { apiKey: "test-secret", chatModel: "chat-model", embeddingModel: "embed-model" },
      { client, limiter: new CallLimiter({ maxRetries: 0, timeoutMs: 50 }) }
    );

    const deltas: string[] = [];
    const consume = async () => {
      for await (const delta of service.streamCompletion([{ role: "user", content: "What do you charge?" }])) {
        deltas.push(delta);
      }
    };

    await expect(consume()).rejects.toBeInstanceOf(CallTimeoutError);
    expect(deltas).toEqual(["Our prices"]);
    expect(upstreamSignal?.aborted).toBe(true);
  });

  it("uses a separate embedding client and passes dimensions", async () => {
    const client = createClient();
    const embeddingClient = createClient();
    const service = new LLMService(
      {
        apiKey: "test-secret",
        chatModel: "chat-model",
        embeddingModel: "embed-model",
        embeddingDimensions: 3
      },
      { client, embeddingClient, limiter: limiter() }
    );

    await expect(service.generateEmbedding("pricing")).resolves.toEqual([0.1, 0.2, 0.3]);
    expect(embeddingClient.createEmbedding).toHaveBeenCalledWith({
      model: "embed-model",
      input: "pricing",
      dimensions: 3
    });
    expect(client.createEmbedding).not.toHaveBeenCalled();
    expect(service.getUsageRecords()[0]).toMatchObject({ phase: "embedding", promptTokens: 3 });
    expect(service.embeddingModel).toBe("embed-model");
  });

  it("returns an empty string or vector when the provider sends nothing", async () => {
    const client = createClient({
      createCompletion: vi.fn().mockResolvedValue({ choices: [] }),
      createEmbedding: vi.fn().mockResolvedValue({ data: [] })
    });
    const service = new LLMService(
      { apiKey: "test-secret", chatModel: "chat-model", embeddingModel: "embed-model" },
      { client, limiter: limiter() }
    );

    await expect(service.complete([{ role: "user", content: "hi" }])).resolves.toBe("");
    await expect(service.generateEmbedding("hi")).resolves.toEqual([]);
  });

  it("parses JSON wrapped in prose", () => {
    expect(safeJsonParse("{\"a\":1}")).toEqual({ a: 1 });
    expect(safeJsonParse("Sure! {\"label\":\"off_domain\"} Hope that helps")).toEqual({ label: "off_domain" });
    expect(safeJsonParse("no json here")).toBeNull();
  });
});
