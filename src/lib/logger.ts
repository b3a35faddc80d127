import pino from "pino";
import { z } from "zod";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export function defaultLogLevel(nodeEnv: string | undefined): LogLevel {
  return nodeEnv === "production" ? "info" : "debug";
}

/**
 * Level for an environment map. An invalid LOG_LEVEL falls back to the default
 * here; loadConfig rejects it with a validation error.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const parsed = LogLevelSchema.safeParse(env.LOG_LEVEL);
  return parsed.success ? parsed.data : defaultLogLevel(env.NODE_ENV || undefined);
}

const env = process.env.NODE_ENV || "development";
const isDev = env === "development";
const logLevel = resolveLogLevel(process.env);

const baseOptions: pino.LoggerOptions = {
  level: logLevel,
  base: { service: "sitepulse" },
  // Call sites log failures under `error`, not pino's default `err`
  serializers: { error: pino.stdSerializers.err },
};

export const logger = pino(
  isDev
    ? {
        ...baseOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname,service",
          },
        },
      }
    : baseOptions,
);

export type Logger = typeof logger;

/**
 * Logger tagged with the component that emits it
 */
export function childLogger(component: string): Logger {
  return logger.child({ component });
}

export default logger;
