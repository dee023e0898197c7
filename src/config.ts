import path from "node:path";
import { readFile } from "node:fs/promises";
import { log } from "./logger.js";
import { ProviderConfigSchema } from "./schemas.js";
import type { ProviderConfig, TutorConfig } from "./types.js";

const DEFAULT_DATA_DIR = path.join("data", "chats");
const DEFAULT_OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";
const DEFAULT_OPENROUTER_MODEL = "deepseek/deepseek-chat-v3-0324:free";

function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
    const envValue = process.env[envVar];
    if (!envValue) {
      throw new Error(`Environment variable ${envVar} is not set`);
    }
    return envValue;
  });
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return value && typeof value === "object" && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

function positiveInt(cfg: Record<string, unknown>, key: string, fallback: number): number {
  const value = cfg[key];
  if (value === undefined) return fallback;
  if (typeof value === "number" && Number.isInteger(value) && value > 0) return value;
  log.warn(`ignoring invalid ${key}: expected a positive integer`);
  return fallback;
}

function numberInRange(
  cfg: Record<string, unknown>,
  key: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const value = cfg[key];
  if (value === undefined) return fallback;
  if (typeof value === "number" && Number.isFinite(value) && value >= min && value <= max) {
    return value;
  }
  log.warn(`ignoring invalid ${key}: expected a number in [${min}, ${max}]`);
  return fallback;
}

function parseProviders(raw: unknown): ProviderConfig[] | undefined {
  if (raw === undefined) return undefined;
  if (!Array.isArray(raw)) {
    log.warn("ignoring providers: expected an array");
    return undefined;
  }

  const providers: ProviderConfig[] = [];
  for (const entry of raw) {
    const parsed = ProviderConfigSchema.safeParse(entry);
    if (!parsed.success) {
      log.warn(`ignoring invalid provider entry: ${parsed.error.issues[0]?.message ?? "unknown"}`);
      continue;
    }
    const provider: ProviderConfig = { ...parsed.data };
    if (provider.apiKey) provider.apiKey = resolveEnvVars(provider.apiKey);
    if (providers.some((p) => p.id === provider.id)) {
      log.warn(`ignoring duplicate provider id: ${provider.id}`);
      continue;
    }
    providers.push(provider);
  }
  return providers;
}

/**
 * Without explicit providers, fall back to one OpenAI-compatible entry
 * (OpenRouter when its key is present, otherwise api.openai.com).
 */
function providersFromEnv(): ProviderConfig[] {
  const openRouterKey = process.env.OPENROUTER_API_KEY;
  if (openRouterKey) {
    return [
      {
        id: "openrouter",
        api: "openai-completions",
        baseUrl: DEFAULT_OPENROUTER_BASE_URL,
        model: process.env.TUTOR_MODEL ?? DEFAULT_OPENROUTER_MODEL,
        apiKey: openRouterKey,
      },
    ];
  }
  const openAiKey = process.env.OPENAI_API_KEY;
  if (openAiKey) {
    return [
      {
        id: "openai",
        api: "openai-completions",
        baseUrl: "https://api.openai.com/v1",
        model: process.env.TUTOR_MODEL ?? "gpt-4o-mini",
        apiKey: openAiKey,
      },
    ];
  }
  return [];
}

export function parseConfig(raw: unknown): TutorConfig {
  const cfg = asRecord(raw) ?? {};

  const dataDir =
    typeof cfg.dataDir === "string" && cfg.dataDir.length > 0
      ? cfg.dataDir
      : process.env.TUTOR_DATA_DIR ?? DEFAULT_DATA_DIR;

  const providers = parseProviders(cfg.providers) ?? providersFromEnv();
  if (providers.length === 0) {
    log.warn("no response providers configured; replies will use the local fallback");
  }

  return {
    dataDir,
    maxConcurrentJobs: positiveInt(cfg, "maxConcurrentJobs", 15),
    recentMessageLimit: positiveInt(cfg, "recentMessageLimit", 8),
    topicWindow: positiveInt(cfg, "topicWindow", 5),
    sessionGapMinutes: positiveInt(cfg, "sessionGapMinutes", 30),
    retentionDays: positiveInt(cfg, "retentionDays", 30),
    retentionKeepAtLeast: positiveInt(cfg, "retentionKeepAtLeast", 100),
    rateLimitMaxRequests: positiveInt(cfg, "rateLimitMaxRequests", 10),
    rateLimitWindowMs: positiveInt(cfg, "rateLimitWindowMs", 60_000),
    maxTextLength: positiveInt(cfg, "maxTextLength", 1000),
    maxAudioBytes: positiveInt(cfg, "maxAudioBytes", 20 * 1024 * 1024),
    providerTimeoutMs: positiveInt(cfg, "providerTimeoutMs", 30_000),
    providers,
    temperature: numberInRange(cfg, "temperature", 0.7, 0, 2),
    maxTokens: positiveInt(cfg, "maxTokens", 500),
    speechEnabled: cfg.speechEnabled !== false,
    debug: cfg.debug === true || process.env.TUTOR_DEBUG === "1",
  };
}

/** Read a JSON config file. A missing file yields the defaults. */
export async function loadConfigFile(configPath: string): Promise<TutorConfig> {
  let raw: unknown = {};
  try {
    raw = JSON.parse(await readFile(configPath, "utf-8"));
  } catch (err) {
    const code = err && typeof err === "object" && "code" in err ? err.code : undefined;
    if (code !== "ENOENT") throw err;
    log.debug(`config file not found at ${configPath}; using defaults`);
  }
  return parseConfig(raw);
}
