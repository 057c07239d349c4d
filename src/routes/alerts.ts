import { z } from "zod";
import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { alertEventSchema } from "../types/alert.js";
import { createHandler, resolveHandlerConfig } from "../services/handler.js";
import { reloadServiceConfigSafe } from "../services/config.js";
import { requireAuth } from "./auth.js";

/** Targets come from the config file only; a request can pick a named handler but not set a URL or folder. */
const alertRequestSchema = z
  .object({
    event: alertEventSchema,
    handler: z.string().min(1).optional(),
  })
  .strict();

export async function registerAlertsRoutes(app: FastifyInstance): Promise<void> {
  /** POST /alerts: hand one event to a handler. Returns 200 immediately; delivery runs in background. */
  app.post<{ Body: unknown }>("/alerts", async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    if (!requireAuth(req, reply)) return;
    const parsed = alertRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      req.log.warn({ component: "http", route: "POST /alerts", event: "validation_failed", err: parsed.error.flatten() }, "alert_rejected_invalid_payload");
      return reply.status(400).send({ ok: false, error: "Invalid alert payload" });
    }
    const { event, handler: handlerName } = parsed.data;
    const target = resolveHandlerConfig(handlerName);
    if (target === null) {
      req.log.warn({ component: "http", route: "POST /alerts", event: "unknown_handler", handler: handlerName }, "alert_rejected_unknown_handler");
      return reply.status(400).send({ ok: false, error: `unknown handler ${JSON.stringify(handlerName)}` });
    }
    const handler = createHandler(target, req.log, { route: "POST /alerts", handler: handlerName ?? "default" });
    req.log.info({ component: "http", route: "POST /alerts", event: "received", alertId: event.state.id, topic: event.topic }, "alert_received");
    handler.handle(event);
    return reply.status(200).send({ received: true });
  });

  /** Reload the config file without restart. An invalid file leaves the running config in place. */
  const handleReload = async (req: FastifyRequest, reply: FastifyReply) => {
    if (!requireAuth(req, reply)) return;
    const result = reloadServiceConfigSafe();
    if (!result.ok) {
      req.log.warn({ component: "http", route: "reload", event: "reload_failed", error: result.error }, "config_reload_failed");
      return reply.status(400).send({ ok: false, error: result.error });
    }
    req.log.info({ component: "http", route: "reload", event: "reloaded", enabled: result.config.enabled }, "config_reloaded");
    return reply.send({ ok: true, enabled: result.config.enabled });
  };

  app.get("/reload", handleReload);
  app.post("/reload", handleReload);
}
