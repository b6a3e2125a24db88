import { z } from "zod";
import type { Classification, SessionTurn } from "@siteqa/shared";
import { describeError } from "../errors.js";
import {
  buildClassificationSystemPrompt,
  buildClassificationUserPrompt,
  type OrganizationProfile
} from "../prompts/index.js";
import { logger } from "../utils/logger.js";
import { safeJsonParse } from "./LLMService.js";
import type { LLMServiceLike } from "./llmTypes.js";

const rawLabels = ["in_domain", "off_domain", "unknown"] as const;
export type RawLabel = (typeof rawLabels)[number];

const classificationReplySchema = z.object({
  label: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(rawLabels)),
  confidence: z.coerce.number().min(0).max(1).catch(0.5),
  reason: z.string().default("")
});

export type ClassifierReply =
  | { kind: "labelled"; label: "in_domain" | "off_domain"; confidence: number; reason: string }
  | { kind: "unknown"; reason: string }
  | { kind: "unparseable"; raw: string };

export interface QueryClassifierOptions {
  enabled: boolean;
  organization: OrganizationProfile;
  maxTokens?: number;
}

export interface QueryClassifierLike {
  classify(question: string, history: readonly SessionTurn[]): Promise<Classification>;
}

const bareLabelPattern = /^["'`]?(in_domain|off_domain|unknown)["'`]?\.?$/;

function isRawLabel(value: string): value is RawLabel {
  return rawLabels.some((label) => label === value);
}

export function parseClassifierReply(raw: string): ClassifierReply {
  const bare = raw.trim().toLowerCase().match(bareLabelPattern)?.[1];
  if (bare !== undefined && isRawLabel(bare)) {
    return bare === "unknown"
      ? { kind: "unknown", reason: "" }
      : { kind: "labelled", label: bare, confidence: 0.5, reason: "" };
  }

  const parsed = classificationReplySchema.safeParse(safeJsonParse(raw));
  if (!parsed.success) {
    return { kind: "unparseable", raw };
  }

  const { label, confidence, reason } = parsed.data;
  return label === "unknown"
    ? { kind: "unknown", reason }
    : { kind: "labelled", label, confidence, reason };
}

function failOpen(reason: string): Classification {
  return {
    label: "in_domain",
    inDomain: true,
    confidence: 0,
    reason,
    degraded: true
  };
}

/**
 * Decides whether a question concerns the organization. Never throws: any failure
 * degrades to an in-domain verdict so retrieval still runs.
 */
export class QueryClassifier implements QueryClassifierLike {
  constructor(
    private readonly llm: LLMServiceLike,
    private readonly options: QueryClassifierOptions
  ) {}

  async classify(question: string, history: readonly SessionTurn[]): Promise<Classification> {
    if (!this.options.enabled) {
      return {
        label: "in_domain",
        inDomain: true,
        confidence: 1,
        reason: "classification disabled",
        degraded: false
      };
    }

    let raw: string;
    try {
      raw = await this.llm.complete(
        [
          { role: "system", content: buildClassificationSystemPrompt(this.options.organization) },
          { role: "user", content: buildClassificationUserPrompt(question, history) }
        ],
        {
          temperature: 0,
          maxTokens: this.options.maxTokens ?? 200,
          responseFormat: "json",
          phase: "classification"
        }
      );
    } catch (error) {
      logger.warn({ error: describeError(error) }, "Query classification failed, treating as in-domain");
      return failOpen(`classifier unavailable: ${describeError(error)}`);
    }

    const reply = parseClassifierReply(raw);
    switch (reply.kind) {
      case "labelled":
        return {
          label: reply.label,
          inDomain: reply.label === "in_domain",
          confidence: reply.confidence,
          reason: reply.reason,
          degraded: false
        };
      case "unknown":
        return failOpen(reply.reason ? `classifier undecided: ${reply.reason}` : "classifier undecided");
      case "unparseable":
        logger.warn({ reply: reply.raw.slice(0, 200) }, "Unparseable classifier reply, treating as in-domain");
        return failOpen("unparseable classifier reply");
    }
  }
}
