import { timingSafeEqual } from "node:crypto";
import type { FastifyReply, FastifyRequest } from "fastify";

const BEARER = "Bearer ";

function getProvidedToken(req: FastifyRequest): string | undefined {
  const raw = req.headers.authorization;
  if (typeof raw !== "string") return undefined;
  return raw.startsWith(BEARER) ? raw.slice(BEARER.length).trim() : raw.trim();
}

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Enforces `AUTH_TOKEN` when set. Returns `true` when authorized; otherwise sends 401 and returns `false`.
 */
export function requireAuth(req: FastifyRequest, reply: FastifyReply): boolean {
  const expected = process.env.AUTH_TOKEN?.trim();
  if (!expected) return true;

  const provided = getProvidedToken(req);
  if (provided === undefined || !tokensMatch(provided, expected)) {
    req.log.warn({ component: "auth", event: "rejected", path: req.url, method: req.method }, "request_rejected_auth");
    void reply.status(401).send({ error: "Unauthorized" });
    return false;
  }
  return true;
}
