import { isLogLevel } from "../utils/logger.js";
import type { LogLevel } from "../utils/logger.js";

const DEFAULT_SYSTEM_PROMPT = `You answer questions for a support FAQ.
- Be brief and friendly.
- Stay within the context you are given; do not invent policies, prices or links.
- If you are unsure, say so plainly.`;

export type Provider = "ollama" | "gemini";

export type Settings = {
  provider: Provider;
  googleApiKey?: string;
  ollamaBaseUrl: string;
  chatModel: string;
  embeddingModel: string;
  corpusPath: string;
  indexPath: string;
  systemPrompt: string;
  matchThreshold: number;
  embedTimeoutMs: number;
  completionTimeoutMs: number;
  indexConcurrency: number;
  logLevel: LogLevel;
};

type Env = Record<string, string | undefined>;

const MODEL_DEFAULTS: Record<Provider, { chat: string; embedding: string }> = {
  ollama: { chat: "llama3", embedding: "nomic-embed-text" },
  gemini: { chat: "gemini-2.5-flash", embedding: "gemini-embedding-001" }
};

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

function parseProvider(raw: string | undefined): Provider {
  const value = (raw ?? "ollama").trim().toLowerCase();
  if (value !== "ollama" && value !== "gemini") {
    throw new Error(`FAQDESK_PROVIDER must be "ollama" or "gemini" (got "${raw}")`);
  }
  return value;
}

function parseThreshold(raw: string | undefined): number {
  if (raw == null || raw.trim() === "") return 0.5;
  const value = Number.parseFloat(raw);
  if (!Number.isFinite(value) || value < -1 || value > 1) {
    throw new Error(`FAQDESK_MATCH_THRESHOLD must be a number in [-1, 1] (got "${raw}")`);
  }
  return value;
}

export function loadSettings(env: Env = process.env): Settings {
  const provider = parseProvider(env.FAQDESK_PROVIDER);
  const googleApiKey = env.GOOGLE_API_KEY ?? env.GEMINI_API_KEY;
  if (provider === "gemini" && !googleApiKey) {
    throw new Error("GOOGLE_API_KEY is required when FAQDESK_PROVIDER=gemini");
  }

  const logLevelRaw = (env.LOG_LEVEL ?? "info").toLowerCase();
  const logLevel: LogLevel = isLogLevel(logLevelRaw) ? logLevelRaw : "info";

  return {
    provider,
    googleApiKey,
    ollamaBaseUrl: env.FAQDESK_OLLAMA_BASE_URL ?? "http://localhost:11434",
    chatModel: env.FAQDESK_CHAT_MODEL ?? MODEL_DEFAULTS[provider].chat,
    embeddingModel: env.FAQDESK_EMBEDDING_MODEL ?? MODEL_DEFAULTS[provider].embedding,
    corpusPath: env.FAQDESK_CORPUS_PATH ?? "data/faq.json",
    indexPath: env.FAQDESK_INDEX_PATH ?? ".faqdesk/index.json",
    systemPrompt: env.FAQDESK_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    matchThreshold: parseThreshold(env.FAQDESK_MATCH_THRESHOLD),
    embedTimeoutMs: positiveInt(env, "FAQDESK_EMBED_TIMEOUT_MS", 45_000),
    completionTimeoutMs: positiveInt(env, "FAQDESK_COMPLETION_TIMEOUT_MS", 60_000),
    indexConcurrency: positiveInt(env, "FAQDESK_INDEX_CONCURRENCY", 4),
    logLevel
  };
}
