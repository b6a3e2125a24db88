import type { RetrievedChunk } from "@siteqa/shared";
import { trimSnippet } from "../utils/text.js";
import type { OrganizationProfile } from "./classification.js";

export const NO_ANSWER_TEXT = "I cannot answer this question based on the information available.";

const uncertaintyPhrases = [
  "cannot answer",
  "can't answer",
  "no information",
  "not able to find",
  "could not find",
  "couldn't find",
  "don't know",
  "do not know",
  "не могу ответить",
  "нет информации",
  "информации нет",
  "не могу найти",
  "не знаю",
  "не удалось найти"
];

/** True when the answer admits that the context did not contain what was asked. */
export function indicatesNoAnswer(answer: string): boolean {
  const normalized = answer.toLowerCase().replace(/[’‘]/g, "'");
  return uncertaintyPhrases.some((phrase) => normalized.includes(phrase));
}

export function formatChunkContext(chunks: readonly RetrievedChunk[], maxChunkLength: number): string {
  return chunks
    .map(({ chunk }, index) => {
      const source = chunk.documentUrl ? `${chunk.documentTitle} (${chunk.documentUrl})` : chunk.documentTitle;
      return `[${index + 1}] ${source}\n${trimSnippet(chunk.text, maxChunkLength)}`;
    })
    .join("\n\n");
}

export function buildAnswerSystemPrompt(
  organization: OrganizationProfile,
  chunks: readonly RetrievedChunk[],
  maxChunkLength: number
): string {
  return `
You are the website assistant of ${organization.name}. Answer using only the numbered excerpts below.

Excerpts from the ${organization.name} website:
${formatChunkContext(chunks, maxChunkLength)}

Rules:
1. Use only facts from the excerpts; take the conversation so far into account for follow-up questions.
2. If the excerpts do not contain the answer, say: "${NO_ANSWER_TEXT}"
3. Do not invent facts, names or numbers.
4. Cite the excerpts you used as [1], [2] and so on.
5. Answer briefly, in the language of the question.
`.trim();
}

export function buildGeneralSystemPrompt(organization: OrganizationProfile): string {
  return `
You are a friendly assistant on the website of ${organization.name}. The current question is not about
${organization.name}, so answer it helpfully from general knowledge, briefly and politely, in the
language of the question.
`.trim();
}
