import { z } from "zod";
import { DEFAULT_USER_AGENT } from "../checkers/http";
import { defaultLogLevel, logger, LogLevelSchema, type LogLevel } from "./logger";

const EnvSchema = z.object({
  // Server
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  HOST: z.string().min(1).default("0.0.0.0"),
  NODE_ENV: z.string().default("development"),
  CORS_ORIGIN: z.string().min(1).default("*"),

  // Store
  DATABASE_URL: z
    .string()
    .regex(/^postgres(ql)?:\/\//, "must be a postgres:// or postgresql:// URL")
    .optional(),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // Scheduler
  PROBE_TIMEOUT_SECONDS: z.coerce.number().positive().default(10),
  CYCLE_INTERVAL_SECONDS: z.coerce.number().positive().default(5),
  STORE_RETRY_INTERVAL_SECONDS: z.coerce.number().positive().default(60),
  MAX_CONCURRENT_PROBES: z.coerce.number().int().positive().default(50),
  USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),

  // Logging
  LOG_LEVEL: LogLevelSchema.optional(),
});

export interface Config {
  port: number;
  host: string;
  env: string;
  isDev: boolean;
  corsOrigin: string;
  databaseUrl: string | undefined;
  storeTimeoutMs: number;
  probeTimeoutSeconds: number;
  cycleIntervalMs: number;
  storeRetryIntervalMs: number;
  maxConcurrentProbes: number;
  userAgent: string;
  logLevel: LogLevel;
}

/**
 * Build the runtime configuration from an environment map.
 * Empty strings count as unset so a blank line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = EnvSchema.parse(cleaned);

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    env: parsed.NODE_ENV,
    isDev: parsed.NODE_ENV === "development",
    corsOrigin: parsed.CORS_ORIGIN,
    databaseUrl: parsed.DATABASE_URL,
    storeTimeoutMs: parsed.STORE_TIMEOUT_MS,
    probeTimeoutSeconds: parsed.PROBE_TIMEOUT_SECONDS,
    cycleIntervalMs: parsed.CYCLE_INTERVAL_SECONDS * 1000,
    storeRetryIntervalMs: parsed.STORE_RETRY_INTERVAL_SECONDS * 1000,
    maxConcurrentProbes: parsed.MAX_CONCURRENT_PROBES,
    userAgent: parsed.USER_AGENT,
    logLevel: parsed.LOG_LEVEL ?? defaultLogLevel(parsed.NODE_ENV),
  };
}

// Validate required config
export function validateConfig(config: Config): void {
  if (!config.databaseUrl) {
    logger.warn("DATABASE_URL not set. Scheduler will idle and the API will answer 503.");
  }

  logger.info(
    {
      env: config.env,
      port: config.port,
      database: config.databaseUrl ? redactUrl(config.databaseUrl) : null,
      probeTimeoutSeconds: config.probeTimeoutSeconds,
      cycleIntervalMs: config.cycleIntervalMs,
      storeRetryIntervalMs: config.storeRetryIntervalMs,
      maxConcurrentProbes: config.maxConcurrentProbes,
      logLevel: config.logLevel,
    },
    "Configuration loaded",
  );
}

/**
 * Strip credentials from a connection URL before it is logged
 */
export function redactUrl(raw: string): string {
  try {
    const url = new URL(raw);
    if (url.password) url.password = "***";
    return url.toString();
  } catch {
    return "<invalid url>";
  }
}
