import { z } from "zod";
import { ValidationError } from "../utils/errors";
import { LoggerLevel } from "../utils/logger";

export const LanguageCodeSchema = z
  .string()
  .regex(/^[a-z]{2}$/, "Expected an ISO 639-1 code such as 'en'");

const SessionSchema = z.object({
  /** Idle time after which a session is swept */
  ttlMs: z.number().int().positive().default(30 * 60 * 1000),
  sweepIntervalMs: z.number().int().positive().default(60 * 1000),
  /** How long a turn waits for the conversation lock */
  lockTimeoutMs: z.number().int().positive().default(10 * 1000),
  /** Create sessions for unknown caller-supplied ids */
  implicitCreate: z.boolean().default(true),
});

const GenerationSchema = z.object({
  /** Completion attempts per turn, the first included */
  maxAttempts: z.number().int().min(1).default(3),
  backoffBaseMs: z.number().int().min(0).default(500),
  backoffMaxMs: z.number().int().min(0).default(5000),
  timeoutMs: z.number().int().positive().default(10 * 1000),
  maxOutputTokens: z.number().int().positive().default(300),
  temperature: z.number().min(0).max(2).default(0.7),
});

const DialogSchema = z.object({
  /** Bound on one slot extraction; on expiry the turn goes on without slots */
  extractionTimeoutMs: z.number().int().positive().default(10 * 1000),
});

const PromptSchema = z.object({
  maxPromptTokens: z.number().int().positive().default(3000),
  historyWindow: z.number().int().min(0).default(10),
});

const RetrievalSchema = z.object({
  topK: z.number().int().min(0).default(5),
  minScore: z.number().min(-1).max(1).nullable().default(null),
  timeoutMs: z.number().int().positive().default(5 * 1000),
});

const LanguageSchema = z.object({
  supported: z.array(LanguageCodeSchema).nonempty().default(["en", "es", "fr", "de", "ca", "ru"]),
  default: LanguageCodeSchema.default("en"),
  /** Working language of the script and the knowledge base */
  pivot: LanguageCodeSchema.default("en"),
  /** "pivot": generate in the pivot language and translate out; "session": generate in the user's language */
  generateIn: z.enum(["pivot", "session"]).default("pivot"),
  translationTimeoutMs: z.number().int().positive().default(5 * 1000),
  /** Bound on language detection and sentiment scoring */
  analysisTimeoutMs: z.number().int().positive().default(2 * 1000),
}).refine(
  (language) =>
    language.supported.includes(language.default) &&
    language.supported.includes(language.pivot),
  { message: "Default and pivot languages must be supported" }
);

const InputSchema = z.object({
  maxMessageLength: z.number().int().positive().default(500),
});

const ProviderEnum = z.enum(["openai", "anthropic", "gemini"]);

const ProviderSchema = z.object({
  name: ProviderEnum.default("openai"),
  model: z.string().min(1).default("gpt-4o-mini"),
  backupModels: z.array(z.string().min(1)).default([]),
  embeddingModel: z.string().min(1).default("text-embedding-3-small"),
  apiKey: z.string().nullable().default(null),
});

export const EngineConfigSchema = z.object({
  logLevel: z.nativeEnum(LoggerLevel).default(LoggerLevel.SILENT),
  session: SessionSchema.default({}),
  generation: GenerationSchema.default({}),
  dialog: DialogSchema.default({}),
  prompt: PromptSchema.default({}),
  retrieval: RetrievalSchema.default({}),
  language: LanguageSchema.default({}),
  input: InputSchema.default({}),
  provider: ProviderSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/**
 * Validate a partial configuration and fill in defaults
 */
export function resolveConfig(input: EngineConfigInput = {}): EngineConfig {
  return parseConfig(input);
}

function parseConfig(input: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError("Invalid engine configuration", {
      issues: result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      ),
    });
  }
  return result.data;
}

type EnvBinding = [variable: string, path: [string, string], parse: (raw: string) => unknown];

const int = (raw: string): unknown => (/^-?\d+$/.test(raw) ? Number(raw) : raw);
const num = (raw: string): unknown => (raw.trim() !== "" && !Number.isNaN(Number(raw)) ? Number(raw) : raw);
const bool = (raw: string): unknown =>
  raw === "true" || raw === "1" ? true : raw === "false" || raw === "0" ? false : raw;
const list = (raw: string): unknown =>
  raw.split(",").map((item) => item.trim()).filter((item) => item.length > 0);
const str = (raw: string): unknown => raw;

const ENV_BINDINGS: EnvBinding[] = [
  ["CONVERSA_SESSION_TTL_MS", ["session", "ttlMs"], int],
  ["CONVERSA_SWEEP_INTERVAL_MS", ["session", "sweepIntervalMs"], int],
  ["CONVERSA_LOCK_TIMEOUT_MS", ["session", "lockTimeoutMs"], int],
  ["CONVERSA_IMPLICIT_CREATE", ["session", "implicitCreate"], bool],
  ["CONVERSA_MAX_ATTEMPTS", ["generation", "maxAttempts"], int],
  ["CONVERSA_BACKOFF_BASE_MS", ["generation", "backoffBaseMs"], int],
  ["CONVERSA_BACKOFF_MAX_MS", ["generation", "backoffMaxMs"], int],
  ["CONVERSA_COMPLETION_TIMEOUT_MS", ["generation", "timeoutMs"], int],
  ["CONVERSA_MAX_OUTPUT_TOKENS", ["generation", "maxOutputTokens"], int],
  ["CONVERSA_TEMPERATURE", ["generation", "temperature"], num],
  ["CONVERSA_EXTRACTION_TIMEOUT_MS", ["dialog", "extractionTimeoutMs"], int],
  ["CONVERSA_MAX_PROMPT_TOKENS", ["prompt", "maxPromptTokens"], int],
  ["CONVERSA_HISTORY_WINDOW", ["prompt", "historyWindow"], int],
  ["CONVERSA_RETRIEVAL_TOP_K", ["retrieval", "topK"], int],
  ["CONVERSA_RETRIEVAL_MIN_SCORE", ["retrieval", "minScore"], num],
  ["CONVERSA_SUPPORTED_LANGUAGES", ["language", "supported"], list],
  ["CONVERSA_DEFAULT_LANGUAGE", ["language", "default"], str],
  ["CONVERSA_PIVOT_LANGUAGE", ["language", "pivot"], str],
  ["CONVERSA_GENERATE_IN", ["language", "generateIn"], str],
  ["CONVERSA_TRANSLATION_TIMEOUT_MS", ["language", "translationTimeoutMs"], int],
  ["CONVERSA_ANALYSIS_TIMEOUT_MS", ["language", "analysisTimeoutMs"], int],
  ["CONVERSA_RETRIEVAL_TIMEOUT_MS", ["retrieval", "timeoutMs"], int],
  ["CONVERSA_MAX_MESSAGE_LENGTH", ["input", "maxMessageLength"], int],
  ["CONVERSA_PROVIDER", ["provider", "name"], str],
  ["CONVERSA_MODEL", ["provider", "model"], str],
  ["CONVERSA_BACKUP_MODELS", ["provider", "backupModels"], list],
  ["CONVERSA_EMBEDDING_MODEL", ["provider", "embeddingModel"], str],
  ["CONVERSA_API_KEY", ["provider", "apiKey"], str],
];

/**
 * Build the configuration from CONVERSA_* environment variables
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): EngineConfig {
  const input: Record<string, unknown> = {};

  if (env.CONVERSA_LOG_LEVEL !== undefined) {
    input.logLevel = env.CONVERSA_LOG_LEVEL.toLowerCase();
  }

  for (const [variable, [section, key], parse] of ENV_BINDINGS) {
    const raw = env[variable];
    if (raw === undefined) {
      continue;
    }
    const existing = input[section];
    const target: Record<string, unknown> =
      typeof existing === "object" && existing !== null ? { ...existing } : {};
    target[key] = parse(raw);
    input[section] = target;
  }

  return parseConfig(input);
}
