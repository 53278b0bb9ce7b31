// src/plugins/rate-limit.ts
// ============================================================================
// HTTP-Rate-Limit (festes Fenster pro Route + IP, Zaehler im CacheStore)
// - sensible Routen (OTP, Login, Refresh) mit niedrigerem Limit
// - Health/Metrics ausgenommen
// ============================================================================
import fp from "fastify-plugin";
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from "fastify";
import { apiError } from "../libs/error-response.js";

const SENSITIVE_ROUTES = new Set<string>([
  "/api/v1/auth",
  "/api/v1/auth/confirm",
  "/api/v1/auth/login",
  "/api/v1/tokens/refresh",
]);

// Health-Routen zuverlässig ausnehmen (ohne Query-String)
const SKIP = new Set<string>([
  "/",
  "/health",
  "/health/live",
  "/health/ready",
  "/health/redis",
  "/health/db",
  "/metrics",
  "/openapi.json",
]);

/** In onRequest ist die Route noch nicht "resolved": rohe URL ohne Query. */
function getStablePath(req: FastifyRequest): string {
  const raw = (req.raw?.url ?? req.url ?? "/").split("?")[0];
  const collapsed = raw.replace(/\/{2,}/g, "/");
  return collapsed.length > 1 ? collapsed.replace(/\/$/, "") : collapsed;
}

const rateLimitPlugin: FastifyPluginAsync = async (app) => {
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    const route = getStablePath(request);
    if (SKIP.has(route)) return;

    const { windowSec, max, sensitiveMax } = app.settings.rateLimit;
    const maxForRoute = SENSITIVE_ROUTES.has(route) ? sensitiveMax : max;

    let count = 0;
    let ttl = 0;
    try {
      const res = await app.deps.cache.incrWindow(`rate:${route}:${request.ip}`, windowSec);
      count = res.count;
      ttl = res.ttl;
    } catch (err) {
      // Fail-Open: bei Store-Fehler nicht blockieren
      request.log.warn({ err }, "rate_limit_store_error");
      count = 1;
      ttl = windowSec;
    }

    const blocked = count > maxForRoute;
    request.rate = { count, ttl, blocked, max: maxForRoute };

    if (blocked) {
      reply
        .header("RateLimit-Limit", String(maxForRoute))
        .header("RateLimit-Remaining", "0")
        .header("RateLimit-Reset", String(Math.max(1, ttl)))
        .header("Retry-After", String(Math.max(1, ttl)));

      return reply.status(429).send({
        ...apiError(429, "Too many requests."),
        reset_in_seconds: ttl,
      });
    }
  });

  // Header immer setzen (auch wenn nicht geblockt)
  app.addHook("onSend", async (request, reply, payload) => {
    if (request.rate) {
      const { count, ttl, max } = request.rate;
      const remaining = Math.max(0, max - count);

      reply
        .header("RateLimit-Limit", String(max))
        .header("RateLimit-Remaining", String(remaining))
        .header("RateLimit-Reset", String(Math.max(0, ttl)));
    }
    return payload;
  });
};

export default fp(rateLimitPlugin, { name: "rate-limit" });
