import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { defaultTestOptions, parseTestOptions, runTest } from "../services/handler.js";
import { errorMessage } from "../errors.js";
import { requireAuth } from "./auth.js";

export async function registerTestRoutes(app: FastifyInstance): Promise<void> {
  /** GET /test-options: self-test defaults seeded from the current config. */
  app.get("/test-options", async (req: FastifyRequest, reply: FastifyReply) => {
    if (!requireAuth(req, reply)) return;
    const options = defaultTestOptions();
    return reply.send({ url: options.url, "retry-folder": options.retryFolder, message: options.message });
  });

  /** POST /test: dispatch one empty event to the given URL and report the outcome. */
  app.post<{ Body: unknown }>("/test", async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    if (!requireAuth(req, reply)) return;
    const parsed = parseTestOptions(req.body);
    if (!parsed.ok) {
      return reply.status(400).send({ ok: false, error: parsed.error });
    }
    try {
      await runTest(parsed.options, req.log);
    } catch (err) {
      req.log.warn({ component: "http", route: "POST /test", event: "test_failed", url: parsed.options.url, err }, "self_test_failed");
      return reply.status(502).send({ ok: false, error: errorMessage(err) });
    }
    req.log.info({ component: "http", route: "POST /test", event: "test_ok", url: parsed.options.url }, "self_test_ok");
    return reply.send({ ok: true });
  });
}
