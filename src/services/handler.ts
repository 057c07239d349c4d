import { z } from "zod";
import type { FastifyBaseLogger } from "fastify";
import { alertEventSchema, type AlertEvent } from "../types/alert.js";
import type { HandlerConfig, TestOptions } from "../types/config.js";
import { getServiceConfig } from "./config.js";
import { dispatchAlert } from "./dispatcher.js";
import { childLogger } from "../logger.js";
import { inc } from "../metrics.js";

export const DEFAULT_TEST_MESSAGE = "test alertmanager message";

/** The surface the alert-routing side calls into for one configured target. */
export interface AlertHandler {
  readonly config: HandlerConfig;
  /** Fire-and-forget: returns immediately, delivery failures are logged. */
  handle(event: AlertEvent): void;
}

export const testOptionsSchema = z.object({
  url: z.string(),
  "retry-folder": z.string().default(""),
  message: z.string().default(""),
});

export function defaultHandlerConfig(): HandlerConfig {
  const config = getServiceConfig();
  return { url: config.url, retryFolder: config.retryFolder };
}

/**
 * Target for a handler registered in the config file under `name`, its unset
 * fields filled from the service defaults. No name means the defaults; an
 * unknown name yields null.
 */
export function resolveHandlerConfig(name?: string): HandlerConfig | null {
  const config = getServiceConfig();
  if (name === undefined) return { url: config.url, retryFolder: config.retryFolder };
  if (!Object.hasOwn(config.handlers, name)) return null;
  const registered = config.handlers[name];
  return {
    url: registered.url ?? config.url,
    retryFolder: registered.retryFolder ?? config.retryFolder,
  };
}

/**
 * Wrap the dispatcher for the alerting pipeline. `handle` deliberately drops
 * the dispatch promise after attaching a logger to it: the pipeline never
 * waits on delivery and never sees its errors.
 */
export function createHandler(
  config: HandlerConfig,
  log: FastifyBaseLogger,
  context: Record<string, unknown> = {}
): AlertHandler {
  const handlerLog = childLogger(log, { component: "handler", ...context });
  return {
    config,
    handle(event: AlertEvent): void {
      inc("alerts_received_total");
      void dispatchAlert(config.url, config.retryFolder, event, handlerLog).catch((err: unknown) => {
        inc("alerts_failed_total");
        handlerLog.error({ event: "dispatch_failed", url: config.url, alertId: event.state.id, err }, "handler_dispatch_failed");
      });
    },
  };
}

/**
 * Self-test defaults. Unlike a bare options object, `retryFolder` is seeded
 * from the service config too, so a failed test stages its payload there and
 * not in the working directory.
 */
export function defaultTestOptions(): TestOptions {
  const config = getServiceConfig();
  return { url: config.url, retryFolder: config.retryFolder, message: DEFAULT_TEST_MESSAGE };
}

/** Parse self-test options in their external form (`url`, `retry-folder`, `message`). */
export function parseTestOptions(
  raw: unknown
): { ok: true; options: TestOptions } | { ok: false; error: string } {
  const parsed = testOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: "unexpected options type: expected { url, retry-folder?, message? }" };
  }
  return {
    ok: true,
    options: { url: parsed.data.url, retryFolder: parsed.data["retry-folder"], message: parsed.data.message },
  };
}

/** The zero-valued event sent by the self-test. */
export function emptyAlertEvent(): AlertEvent {
  return alertEventSchema.parse({});
}

/**
 * Send one empty event to `options.url` and reject with whatever the dispatch
 * rejects with. `options.message` is not part of the payload.
 */
export async function runTest(options: TestOptions, log: FastifyBaseLogger): Promise<void> {
  await dispatchAlert(options.url, options.retryFolder, emptyAlertEvent(), log);
}
