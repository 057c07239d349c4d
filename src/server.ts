import Fastify from "fastify";
import { validateEnv } from "./env.js";
import { registerAlertsRoutes } from "./routes/alerts.js";
import { registerTestRoutes } from "./routes/self-test.js";
import { bootstrapServiceConfig } from "./services/config.js";
import { createLoggerOptions } from "./logger.js";
import { metricsText } from "./metrics.js";

validateEnv();

const port = Number(process.env.PORT) || 9095;

const app = Fastify({
  logger: createLoggerOptions(),
  genReqId: (req) => {
    const header = req.headers["x-request-id"];
    return typeof header === "string" ? header : `req-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
  },
});

app.get("/health", async (_, reply) => {
  return reply.send({ status: "ok" });
});

app.get("/metrics", async (_, reply) => {
  return reply.type("text/plain; version=0.0.4").send(metricsText());
});

await registerAlertsRoutes(app);
await registerTestRoutes(app);

async function start(): Promise<void> {
  try {
    bootstrapServiceConfig(app.log);
  } catch (err) {
    app.log.fatal({ component: "config", event: "invalid", err }, "config_invalid");
    process.exit(1);
  }
  try {
    await app.listen({ port, host: "0.0.0.0" });
    app.log.info({ component: "http", event: "listening", port, host: "0.0.0.0" }, "server_listening");
  } catch (err) {
    app.log.fatal({ component: "http", event: "listen_failed", err, port }, "server_listen_failed");
    process.exit(1);
  }
}

await start();
