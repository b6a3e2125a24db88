import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8000),
  CORS_ORIGIN: z.string().default("*"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  INDEX_DB_PATH: z.string().default("data/index.db"),
  SESSION_DB_PATH: z.string().default("data/sessions.db"),
  CORPUS_PATH: z.string().default("data/crawled_data.json"),
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
  CHUNK_INCLUDE_TITLE: booleanFlag.default("true"),
  CHUNK_MAX_TITLE_LENGTH: z.coerce.number().int().min(0).default(100),
  MIN_DOCUMENT_LENGTH: z.coerce.number().int().min(0).default(50),
  BM25_K1: z.coerce.number().positive().default(1.5),
  BM25_B: z.coerce.number().min(0).max(1).default(0.75),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(4),
  LEXICAL_TOP_K: z.coerce.number().int().positive().optional(),
  VECTOR_TOP_K: z.coerce.number().int().positive().optional(),
  OVERFETCH_FACTOR: z.coerce.number().min(1).default(3),
  RRF_K: z.coerce.number().min(0).default(60),
  CLASSIFIER_ENABLED: booleanFlag.default("true"),
  CLASSIFIER_HISTORY_TURNS: z.coerce.number().int().min(0).default(3),
  SESSION_MAX_TURNS: z.coerce.number().int().positive().default(10),
  SESSION_TTL_HOURS: z.coerce.number().min(0).default(24),
  GENERATION_HISTORY_TURNS: z.coerce.number().int().min(0).default(5),
  CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  EMBEDDING_CONCURRENCY: z.coerce.number().int().positive().default(5),
  MAX_CHUNK_CONTEXT_LENGTH: z.coerce.number().int().positive().default(1200),
  SOURCE_SNIPPET_LENGTH: z.coerce.number().int().positive().default(200),
  ORGANIZATION_NAME: z.string().default("the company"),
  ORGANIZATION_PROFILE: z.string().default(""),
  LLM_PROVIDER: z.enum(["openrouter", "openai"]).default("openrouter"),
  OPENROUTER_API_KEY: z.string().default(""),
  OPENROUTER_BASE_URL: z.string().default("https://openrouter.ai/api/v1"),
  OPENROUTER_CHAT_MODEL: z.string().default("meta-llama/llama-3.3-70b-instruct"),
  OPENROUTER_EMBEDDING_MODEL: z.string().default("openai/text-embedding-3-small"),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_API_KEY: z.string().default(""),
  EMBEDDING_BASE_URL: z.string().default(""),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().optional(),
  LLM_MAX_CONCURRENT: z.coerce.number().int().positive().default(5),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().positive().default(1000),
  LLM_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(60)
});

export type AppConfig = z.infer<typeof envSchema>;
export const appConfig: AppConfig = envSchema.parse(process.env);
