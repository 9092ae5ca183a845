/**
 * Process configuration, read from environment variables and validated
 * against a Typebox schema.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const EnvSchema = Type.Object({
  HOST: Type.String({ minLength: 1, default: "0.0.0.0" }),
  PORT: Type.Integer({ minimum: 0, maximum: 65535, default: 8080 }),
  NODE_ENV: Type.String({ default: "development" }),
  LOG_LEVEL: Type.Union(
    [
      Type.Literal("fatal"),
      Type.Literal("error"),
      Type.Literal("warn"),
      Type.Literal("info"),
      Type.Literal("debug"),
      Type.Literal("trace"),
      Type.Literal("silent"),
    ],
    { default: "info" },
  ),
  METRICS_PREFIX: Type.String({
    pattern: "^[a-zA-Z_:][a-zA-Z0-9_:]*$",
    default: "pods_operator",
  }),
  DEFAULT_METRICS: Type.Boolean({ default: true }),
  WATCH_NAMESPACE: Type.Optional(Type.String({ minLength: 1 })),
  WATCH_TIMEOUT_SECONDS: Type.Integer({ minimum: 1, default: 300 }),
  WATCH_INITIAL_BACKOFF_MS: Type.Integer({ minimum: 1, default: 1_000 }),
  WATCH_MAX_BACKOFF_MS: Type.Integer({ minimum: 1, default: 30_000 }),
  WATCH_BACKOFF_RESET_MS: Type.Integer({ minimum: 0, default: 60_000 }),
  WATCH_MAX_RETRIES: Type.Optional(Type.Integer({ minimum: 0 })),
  WATCH_AUTH_FAILURE_LIMIT: Type.Integer({ minimum: 1, default: 3 }),
});

export type Env = Static<typeof EnvSchema>;

// ---------------------------------------------------------------------------
// Resolved config
// ---------------------------------------------------------------------------

export interface WatchConfig {
  /** Restrict the watch to one namespace (cluster-wide when unset) */
  namespace?: string;
  timeoutSeconds: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  backoffResetMs: number;
  /** Consecutive-failure budget; unlimited when unset */
  maxRetries?: number;
  authFailureLimit: number;
}

export interface AppConfig {
  host: string;
  port: number;
  production: boolean;
  logLevel: Env["LOG_LEVEL"];
  metrics: {
    prefix: string;
    defaultMetrics: boolean;
  };
  watch: WatchConfig;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Read the configuration from `env`. Empty strings count as unset.
 * Throws a ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.properties)) {
    const value = env[key];
    if (value !== undefined && value !== "") raw[key] = value;
  }

  const value = Value.Default(EnvSchema, Value.Convert(EnvSchema, raw));
  if (!Value.Check(EnvSchema, value)) {
    const problems = [...Value.Errors(EnvSchema, value)].map(
      (e) => `${e.path.slice(1) || "env"}: ${e.message}`,
    );
    throw new ConfigError(problems);
  }

  if (value.WATCH_INITIAL_BACKOFF_MS > value.WATCH_MAX_BACKOFF_MS) {
    throw new ConfigError([
      "WATCH_INITIAL_BACKOFF_MS: must not exceed WATCH_MAX_BACKOFF_MS",
    ]);
  }

  return {
    host: value.HOST,
    port: value.PORT,
    production: value.NODE_ENV === "production",
    logLevel: value.LOG_LEVEL,
    metrics: {
      prefix: value.METRICS_PREFIX,
      defaultMetrics: value.DEFAULT_METRICS,
    },
    watch: {
      namespace: value.WATCH_NAMESPACE,
      timeoutSeconds: value.WATCH_TIMEOUT_SECONDS,
      initialBackoffMs: value.WATCH_INITIAL_BACKOFF_MS,
      maxBackoffMs: value.WATCH_MAX_BACKOFF_MS,
      backoffResetMs: value.WATCH_BACKOFF_RESET_MS,
      maxRetries: value.WATCH_MAX_RETRIES,
      authFailureLimit: value.WATCH_AUTH_FAILURE_LIMIT,
    },
  };
}
