import type { ServiceCheckStatus } from "@siteqa/shared";
import { appConfig } from "../config.js";
import type { IndexSnapshotHolder } from "../retrieval/IndexSnapshot.js";

export function isLlmConfigured(): boolean {
  const apiKey = appConfig.LLM_PROVIDER === "openai" ? appConfig.OPENAI_API_KEY : appConfig.OPENROUTER_API_KEY;
  return apiKey.trim().length > 0;
}

export function checkLlmConfiguration(): ServiceCheckStatus {
  return isLlmConfigured() ? "ok" : "not_configured";
}

export function checkIndex(holder: IndexSnapshotHolder): ServiceCheckStatus {
  return holder.isReady() ? "ok" : "not_built";
}
