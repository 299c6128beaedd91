import pino, { type LoggerOptions, stdTimeFunctions, type Logger as PinoLogger } from "pino";

export type LoggerBindings = Record<string, unknown>;

export type AppLogger = PinoLogger;

export type NormalizedError = {
  message: string;
  name?: string;
  stack?: string;
  code?: string | number;
  cause?: unknown;
};

type CreateLoggerOptions = {
  level?: string;
  serviceName?: string;
  bindings?: LoggerBindings;
  options?: LoggerOptions;
};

function resolveLevel(): string {
  const envLevel = process.env.LOG_LEVEL?.trim();
  return envLevel && envLevel.length > 0 ? envLevel : "info";
}

function resolveServiceName(): string {
  const envName = process.env.SERVICE_NAME?.trim();
  return envName && envName.length > 0 ? envName : "config-resolver";
}

function buildLoggerOptions(overrides?: LoggerOptions): LoggerOptions {
  const base: LoggerOptions = {
    level: resolveLevel(),
    base: { service: resolveServiceName() },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return overrides ? { ...base, ...overrides } : base;
}

export function createLogger(options: CreateLoggerOptions = {}): AppLogger {
  const loggerOptions = buildLoggerOptions(options.options);
  if (options.level) {
    loggerOptions.level = options.level;
  }
  if (options.serviceName) {
    loggerOptions.base = { ...(loggerOptions.base ?? {}), service: options.serviceName };
  }
  const logger = pino(loggerOptions);
  if (options.bindings && Object.keys(options.bindings).length > 0) {
    return logger.child(options.bindings);
  }
  return logger;
}

export const appLogger: AppLogger = createLogger({ bindings: { subsystem: "configuration" } });
export default appLogger;

function readCode(error: object): string | number | undefined {
  const candidate: unknown = Reflect.get(error, "code");
  if (typeof candidate === "string" || typeof candidate === "number") {
    return candidate;
  }
  return undefined;
}

function readCause(error: object): unknown {
  return "cause" in error ? Reflect.get(error, "cause") : undefined;
}

/**
 * Flattens anything thrown into a plain object pino can serialise. Store
 * drivers attach connection details to their errors, so only the message,
 * name, stack, code and cause chain are kept.
 */
export function normalizeError(error: unknown): NormalizedError {
  if (error instanceof Error) {
    const normalized: NormalizedError = {
      message: error.message,
      name: error.name,
    };
    if (error.stack) {
      normalized.stack = error.stack;
    }
    const code = readCode(error);
    if (code !== undefined) {
      normalized.code = code;
    }
    const cause = readCause(error);
    if (cause !== undefined) {
      normalized.cause = cause instanceof Error ? normalizeError(cause) : cause;
    }
    return normalized;
  }

  if (typeof error === "string") {
    return { message: error };
  }

  if (typeof error === "object" && error !== null) {
    const message: unknown = Reflect.get(error, "message");
    const normalized: NormalizedError = {
      message:
        typeof message === "string" && message.trim().length > 0
          ? message
          : safeStringify(error) ?? "Unknown error",
    };
    const code = readCode(error);
    if (code !== undefined) {
      normalized.code = code;
    }
    return normalized;
  }

  return { message: safeStringify(error) ?? String(error) };
}

function safeStringify(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}
