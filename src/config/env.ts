import dotenv from "dotenv";
import { z } from "zod";
import { CHATBOT_PROVIDERS, ChatbotProvider } from "../clients/types";
import { formatIssues } from "../parsers/request-schema";
import { FUSION_METHODS, FusionConfig, ServiceId } from "../types";

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export interface DatabaseConfig {
  connectionString?: string;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  sslRequired: boolean;
}

export interface AppConfig {
  port: number;
  fusion: FusionConfig;
  verifier: { baseUrl: string; timeoutMs: number };
  chatbot: { baseUrl: string; timeoutMs: number; provider: ChatbotProvider; topK: number };
  timeouts: Readonly<Record<ServiceId, number>>;
  overallDeadlineMs: number;
  tracePersistTimeoutMs: number;
  traceStore: "postgres" | "memory";
  database: DatabaseConfig;
}

// `.env` files leave unset keys as empty strings; treat those as absent so defaults apply.
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === "string" && value.trim() === "" ? undefined : value), schema);

// setTimeout clamps anything above a signed 32-bit delay to 1ms.
const MAX_TIMER_MS = 2_147_483_647;

const Milliseconds = z.coerce.number().int().positive().max(MAX_TIMER_MS);

const EnvSchema = z.object({
  PORT: optional(z.coerce.number().int().min(0).max(65_535).default(8000)),
  THRESHOLD: optional(z.coerce.number().min(0).max(1).default(0.75)),
  MARGIN: optional(z.coerce.number().min(0).default(0.1)),
  FUSION_METHOD: optional(z.enum(FUSION_METHODS).default("delta")),
  VERIFIER_URL: optional(z.string().url().default("http://localhost:5000")),
  VERIFIER_TIMEOUT_MS: optional(Milliseconds.default(30_000)),
  CHATBOT_URL: optional(z.string().url().default("http://localhost:8081")),
  CHATBOT_TIMEOUT_MS: optional(Milliseconds.default(30_000)),
  CHATBOT_PROVIDER: optional(z.enum(CHATBOT_PROVIDERS).default("deepseek")),
  CHATBOT_TOP_K: optional(z.coerce.number().int().positive().default(4)),
  OVERALL_DEADLINE_MS: optional(Milliseconds.default(35_000)),
  TRACE_PERSIST_TIMEOUT_MS: optional(Milliseconds.default(2_000)),
  TRACE_STORE: optional(z.enum(["postgres", "memory"]).default("postgres")),
  DATABASE_URL: optional(z.string().optional()),
  PGHOST: optional(z.string().optional()),
  PGPORT: optional(z.coerce.number().int().positive().optional()),
  PGUSER: optional(z.string().optional()),
  PGPASSWORD: optional(z.string().optional()),
  PGDATABASE: optional(z.string().optional()),
  PGSSLMODE: optional(z.string().optional())
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }

  const vars = parsed.data;
  const fusion: FusionConfig = Object.freeze({
    threshold: vars.THRESHOLD,
    margin: vars.MARGIN,
    method: vars.FUSION_METHOD
  });

  return Object.freeze({
    port: vars.PORT,
    fusion,
    verifier: { baseUrl: vars.VERIFIER_URL, timeoutMs: vars.VERIFIER_TIMEOUT_MS },
    chatbot: {
      baseUrl: vars.CHATBOT_URL,
      timeoutMs: vars.CHATBOT_TIMEOUT_MS,
      provider: vars.CHATBOT_PROVIDER,
      topK: vars.CHATBOT_TOP_K
    },
    timeouts: Object.freeze({ verifier: vars.VERIFIER_TIMEOUT_MS, chatbot: vars.CHATBOT_TIMEOUT_MS }),
    overallDeadlineMs: vars.OVERALL_DEADLINE_MS,
    tracePersistTimeoutMs: vars.TRACE_PERSIST_TIMEOUT_MS,
    traceStore: vars.TRACE_STORE,
    database: {
      connectionString: vars.DATABASE_URL,
      host: vars.PGHOST,
      port: vars.PGPORT,
      user: vars.PGUSER,
      password: vars.PGPASSWORD,
      database: vars.PGDATABASE,
      sslRequired: vars.PGSSLMODE === "require"
    }
  });
}

/** Reads `.env` into `process.env`, then validates it. */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
