import type { FastifyBaseLogger } from "fastify";
import type pino from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const NODE_ENV = process.env.NODE_ENV ?? "development";

/** Serialize errors with type, message, stack and the dispatcher's error code and cause. */
function serializeErr(err: unknown): object {
  if (err instanceof Error) {
    const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
    return {
      type: err.constructor?.name ?? "Error",
      message: err.message,
      stack: err.stack,
      ...(code !== undefined ? { code } : {}),
      ...(err.cause !== undefined ? { cause: serializeErr(err.cause) } : {}),
    };
  }
  if (typeof err === "object" && err !== null) {
    return { type: "Object", raw: err };
  }
  return { type: typeof err, value: err };
}

/** Keys redacted from bindings (case-insensitive, nested). */
const SENSITIVE_KEYS = ["token", "authorization", "cookie", "password", "secret", "api_key", "apikey"];
const SENSITIVE_PATTERN = new RegExp(SENSITIVE_KEYS.join("|"), "i");

function redact(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (Array.isArray(value)) return value.map(redact);
  if (typeof value === "object") return redactContext(value);
  return value;
}

function redactContext(context: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(context)) {
    out[k] = SENSITIVE_PATTERN.test(k) ? "[REDACTED]" : redact(v);
  }
  return out;
}

const baseContext = {
  service: "alertmanager-dispatcher",
  env: NODE_ENV,
};

/** Pino options compatible with Fastify's logger (configuration object only). */
export type LoggerOptions = pino.LoggerOptions;

/** Create logger options for Fastify. Fastify creates the logger from this; do not pass a pino instance. */
export function createLoggerOptions(): LoggerOptions {
  const options: LoggerOptions = {
    level: LOG_LEVEL,
    base: baseContext,
    serializers: {
      err: (err: unknown) => serializeErr(err),
      error: (err: unknown) => serializeErr(err),
    },
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => redactContext(bindings),
    },
    redact: {
      paths: ["req.headers.authorization", "req.headers.cookie", "*.token", "*.password"],
      censor: "[REDACTED]",
    },
  };
  if (NODE_ENV !== "production") {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        messageFormat: "{msg}",
        ignore: "pid,hostname,service,env",
      },
    };
  }
  return options;
}

/** Child logger with bound context (component, handler name, ...). Sensitive keys are redacted. */
export function childLogger(parent: FastifyBaseLogger, context: Record<string, unknown>): FastifyBaseLogger {
  return parent.child(redactContext(context));
}
