import OpenAI from "openai";
import type { CompletionRequest, LLMMessage, OpenAICompatibleClient } from "./llmTypes.js";

function toMessageParam(message: LLMMessage) {
  switch (message.role) {
    case "system":
      return { role: "system" as const, content: message.content };
    case "user":
      return { role: "user" as const, content: message.content };
    case "assistant":
      return { role: "assistant" as const, content: message.content };
  }
}

function toCompletionParams(request: CompletionRequest) {
  return {
    model: request.model,
    temperature: request.temperature,
    max_tokens: request.maxTokens,
    messages: request.messages.map(toMessageParam),
    response_format: request.json ? { type: "json_object" as const } : { type: "text" as const }
  };
}

export function createOpenAIClient(options: { apiKey: string; baseURL: string; timeoutMs: number }): OpenAI {
  // retries and timeouts are owned by CallLimiter
  return new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    maxRetries: 0,
    timeout: options.timeoutMs
  });
}

export function wrapOpenAI(openai: OpenAI): OpenAICompatibleClient {
  return {
    createCompletion: (request) =>
      openai.chat.completions.create({ ...toCompletionParams(request), stream: false }),
    streamCompletion: (request, signal) =>
      openai.chat.completions.create(
        {
          ...toCompletionParams(request),
          stream: true,
          stream_options: { include_usage: true }
        },
        signal ? { signal } : undefined
      ),
    createEmbedding: (request) =>
      openai.embeddings.create(
        request.dimensions !== undefined
          ? { model: request.model, input: request.input, dimensions: request.dimensions }
          : { model: request.model, input: request.input }
      )
  };
}
