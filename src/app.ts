// src/app.ts
// ============================================================================
// Loyalty API (Fastify)
// ----------------------------------------------------------------------------
// Verantwortlichkeiten:
//  - Zentrales Fastify-Setup (Logger, Request-IDs, Timeouts, CORS, Rate-Limit)
//  - Abhaengigkeiten (Repositories, Cache, SMS) als app.deps, Settings als
//    app.settings; Tests reichen In-Memory-Varianten herein
//  - Auth-Kette: business-context -> auth -> realm-guard
//  - Routen: /api/v1/auth, /api/v1/tokens, /api/mobile/v1, /api/web/v1
//  - /health, /health/* , /metrics, /openapi.json
//  - Graceful Shutdown (deps.close via onClose)
// ============================================================================

import Fastify, {
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest,
  type FastifyServerOptions,
} from "fastify";
import cors from "@fastify/cors";
import { randomUUID } from "node:crypto";

import {
  createDefaultDeps,
  settingsFromEnv,
  type AppDeps,
  type AppSettings,
} from "./container.js";

import rateLimitPlugin from "./plugins/rate-limit.js";

// Reihenfolge / Auth-Chain
import businessContextPlugin from "./plugins/business-context.js";
import authPlugin from "./plugins/auth.js";
import realmGuardPlugin from "./plugins/realm-guard.js";

import { env } from "./libs/env.js";
import { ApiError } from "./libs/errors.js";
import { apiError } from "./libs/error-response.js";
import { mapDbError } from "./libs/error-map.js";
import { getRouteId } from "./libs/http.js";
import { recordHttpRequest, renderPrometheusMetrics } from "./libs/metrics.js";
import { REALMS } from "./libs/realm.js";

// Routen-Plugins
import authRoutes from "./modules/auth/routes.js";
import tokenRoutes from "./modules/tokens/routes.js";
import userRoutes from "./modules/users/routes.js";
import businessRoutes from "./modules/businesses/routes.js";

// ---------------------------------------------------------------------------
// Readiness-Flag (von server.ts über setReady() manipulierbar)
// ---------------------------------------------------------------------------

let isReady = false;

export function setReady(ready: boolean) {
  isReady = ready;
}

// Optionale Start-Parameter für Tests / spezielle Umgebungen
export type AppOptions = FastifyServerOptions & {
  enableCors?: boolean;
  corsOrigin?: string;
  deps?: AppDeps;
  settings?: AppSettings;
};

// ---------------------------------------------------------------------------
// API-Module registrieren (Business-Context/Auth/Realm-Guard + Routen)
// ---------------------------------------------------------------------------

async function registerApiModules(app: FastifyInstance) {
  await app.register(async (instance) => {
    // Kette (wichtig):
    // 1) X-Business-ID aus Header + Formatpruefung
    instance.register(businessContextPlugin);

    // 2) Auth (JWT -> request.user + Blacklist) fuer config.auth / config.realm
    instance.register(authPlugin);

    // 3) Guard: Token-Realm vs Routen-Realm, mobile: Business-Abgleich
    instance.register(realmGuardPlugin);

    // Danach erst Routes registrieren (damit Hooks greifen)

    // OTP anfordern / bestaetigen, Passwort-Login
    instance.register(authRoutes, { prefix: "/api/v1/auth" });

    // Refresh / ausgestellte Tokens / Widerruf
    instance.register(tokenRoutes, { prefix: "/api/v1/tokens" });

    // Realm-Oberflaechen
    for (const realm of REALMS) {
      instance.register(userRoutes, { prefix: `/api/${realm}/v1`, realm });
      instance.register(businessRoutes, { prefix: `/api/${realm}/v1`, realm });
    }
  });
}

// ---------------------------------------------------------------------------
// Health- und Observability-Routen
// ---------------------------------------------------------------------------

async function registerHealthRoutes(app: FastifyInstance) {
  // Basis-Info / Root
  app.get("/", async () => ({
    ok: true,
    service: env.SERVICE_NAME,
    ts: Date.now(),
  }));

  // OpenAPI Contract (optional per config)
  app.get("/openapi.json", async (_req, reply) => {
    if (!env.OPENAPI_ENABLED) {
      return reply.code(404).send(apiError(404, "Not found."));
    }

    return reply.send({
      openapi: "3.0.3",
      info: {
        title: "Loyalty API",
        version: "1.0.0",
      },
      components: {
        schemas: {
          ErrorResponse: {
            type: "object",
            properties: {
              description: { type: "string" },
              status: { type: "integer" },
              message: { type: "string" },
              details: { type: "object" },
            },
            required: ["description", "status", "message"],
          },
        },
      },
      paths: {
        "/api/v1/auth": { post: { summary: "Send an OTP code via SMS" } },
        "/api/v1/auth/confirm": { post: { summary: "Confirm OTP and issue tokens" } },
        "/api/v1/auth/login": { post: { summary: "Business owner login with password" } },
        "/api/v1/tokens/refresh": { post: { summary: "Rotate refresh token" } },
        "/api/v1/tokens/issued": { get: { summary: "List active access tokens" } },
        "/api/v1/tokens/logout": { post: { summary: "Revoke current token and its refresh family" } },
        "/api/v1/tokens/{jti}/revoke": { post: { summary: "Revoke one access token" } },
        "/api/v1/tokens/revoke-all": { post: { summary: "Revoke all other access tokens" } },
        "/api/mobile/v1/user": { get: { summary: "Current user as client of the token business" } },
        "/api/mobile/v1/business": { get: { summary: "Business of the token" } },
        "/api/web/v1/user": { get: { summary: "Current user with owned businesses" } },
        "/api/web/v1/businesses": { get: { summary: "Owned businesses" } },
        "/health/live": { get: { summary: "Liveness" } },
        "/health/ready": { get: { summary: "Readiness" } },
      },
    });
  });

  // Prometheus endpoint (optional per config)
  app.get("/metrics", async (_req, reply) => {
    if (!env.METRICS_ENABLED) {
      return reply.code(404).send(apiError(404, "Not found."));
    }
    reply.type("text/plain; version=0.0.4; charset=utf-8");
    return reply.send(renderPrometheusMetrics());
  });

  // Liveness-Check – lebt der Prozess?
  app.get("/health/live", async () => ({ status: "alive", pid: process.pid }));

  // Zentrales Health-Aggregat – Docker-Healthcheck hängt an /health
  app.get("/health", async (_req, reply) => {
    const services: Record<"redis" | "db", "ok" | "down" | "unknown"> = {
      redis: "unknown",
      db: "unknown",
    };

    let overall: "ok" | "degraded" | "down" = isReady ? "ok" : "degraded";

    try {
      const rh = await app.deps.cache.health();
      services.redis = rh.ok ? "ok" : "down";
      if (!rh.ok) overall = "down";
    } catch (err) {
      services.redis = "down";
      overall = "down";
      app.log.error({ err }, "health_redis_failed");
    }

    try {
      const dh = await app.deps.dbHealth();
      services.db = dh.ok ? "ok" : "down";
      if (!dh.ok) overall = "down";
    } catch (err) {
      services.db = "down";
      overall = "down";
      app.log.error({ err }, "health_db_failed");
    }

    return reply.code(overall === "down" ? 503 : 200).send({
      status: overall,
      env: env.NODE_ENV,
      ready: isReady,
      services,
      ts: new Date().toISOString(),
    });
  });

  // Readiness – für Loadbalancer/K8s
  app.get("/health/ready", async (_req: FastifyRequest, reply: FastifyReply) => {
    if (!isReady) {
      return reply.code(503).send({ status: "starting", ready: false });
    }

    let healthy = false;
    try {
      healthy = (await app.deps.cache.health()).ok;
    } catch (err) {
      app.log.warn({ err }, "health_ready_redis_failed");
    }

    if (!healthy) {
      return reply.code(503).send({ status: "degraded", ready: false });
    }

    return reply.send({ status: "ready", ready: true });
  });

  // Detail-Endpoints
  app.get("/health/redis", async (_req, reply) => {
    try {
      const rh = await app.deps.cache.health();
      return reply.code(rh.ok ? 200 : 503).send({ status: rh.ok ? "ok" : "down", ...rh });
    } catch (err) {
      app.log.error({ err }, "health_redis_failed");
      return reply.code(503).send({ status: "down" });
    }
  });

  app.get("/health/db", async (_req, reply) => {
    try {
      const dh = await app.deps.dbHealth();
      return reply.code(dh.ok ? 200 : 503).send({ status: dh.ok ? "ok" : "down", ...dh });
    } catch (err) {
      app.log.error({ err }, "health_db_failed");
      return reply.code(503).send({ status: "down" });
    }
  });
}

// ---------------------------------------------------------------------------
// Error-/NotFound-Handler
// Muss vor den Routen-Plugins gesetzt sein: gekapselte Kontexte erben den
// Handler nur, wenn er bei ihrer Registrierung schon existiert.
// ---------------------------------------------------------------------------

function registerErrorHandlers(app: FastifyInstance) {
  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ApiError) {
      if (err.statusCode >= 500) req.log.error({ err }, "request_failed");
      return reply
        .code(err.statusCode)
        .type("application/json")
        .send(apiError(err.statusCode, err.message, err.details));
    }

    const mappedDbError = mapDbError(err);
    if (mappedDbError) {
      req.log.warn({ err }, "db_constraint_error");
      return reply
        .code(mappedDbError.status)
        .type("application/json")
        .send(apiError(mappedDbError.status, mappedDbError.message));
    }

    const status = err.statusCode ?? (err.validation ? 400 : 500);
    if (status >= 500) {
      req.log.error({ err }, "unhandled_error");
      return reply
        .code(500)
        .type("application/json")
        .send(apiError(500, "Internal server error."));
    }

    return reply
      .code(status)
      .type("application/json")
      .send(apiError(status, err.message, err.validation));
  });

  app.setNotFoundHandler((req, reply) => {
    reply
      .code(404)
      .send(apiError(404, `Route ${req.method}:${req.url} not found`));
  });
}

// ---------------------------------------------------------------------------
// Haupt-Fabrikfunktion: baut eine Fastify-Instanz
// ---------------------------------------------------------------------------

export async function buildApp(opts: AppOptions = {}): Promise<FastifyInstance> {
  const {
    enableCors = true,
    corsOrigin: corsOriginFromOpts,
    logger = { level: env.LOG_LEVEL },
    deps: depsFromOpts,
    settings = settingsFromEnv(),
    ...rest
  } = opts;

  const app = Fastify({
    logger,
    trustProxy: env.TRUST_PROXY,
    requestIdHeader: env.REQUEST_ID_HEADER,
    requestIdLogLabel: "request_id",
    genReqId: () => randomUUID(),
    requestTimeout: 30_000,
    connectionTimeout: 10_000,
    keepAliveTimeout: 65_000,
    ...rest,
  });

  app.decorate("deps", depsFromOpts ?? createDefaultDeps(app.log));
  app.decorate("settings", settings);

  app.addHook("onRequest", async (request, reply) => {
    request.requestStartedAtNs = process.hrtime.bigint();
    reply.header(env.REQUEST_ID_HEADER, request.id);
  });

  app.addHook("onSend", async (_request, reply, payload) => {
    // Baseline Security Headers
    reply.header("X-Content-Type-Options", "nosniff");
    reply.header("Referrer-Policy", "no-referrer");
    reply.header("X-Frame-Options", "DENY");
    reply.header("Permissions-Policy", "geolocation=(), microphone=(), camera=()");
    reply.header("Content-Security-Policy", "frame-ancestors 'none'");
    return payload;
  });

  app.addHook("onResponse", async (request, reply) => {
    const started = request.requestStartedAtNs;
    if (!started) return;

    const durationNs = process.hrtime.bigint() - started;
    const durationSeconds = Number(durationNs) / 1_000_000_000;
    recordHttpRequest(
      request.method,
      getRouteId(request),
      reply.statusCode,
      durationSeconds,
    );
  });

  // CORS: "*" = jede Origin, sonst kommagetrennte Allowlist
  const corsOriginRaw = corsOriginFromOpts ?? env.CORS_ORIGIN;
  const corsAllowlist = corsOriginRaw
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean);

  if (enableCors) {
    await app.register(cors, {
      origin: (origin, cb) => {
        if (!origin || corsOriginRaw === "*") return cb(null, true);
        return cb(null, corsAllowlist.includes(origin));
      },
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Authorization", "Content-Type", "X-Business-ID", env.REQUEST_ID_HEADER],
      credentials: true,
      maxAge: 86_400,
    });
  }

  await app.register(rateLimitPlugin);

  // Verbindungen pruefen (onReady-Hook)
  app.addHook("onReady", async () => {
    try {
      await app.deps.connect();
      app.log.info("Backends connected");
    } catch (err) {
      app.log.error({ err }, "Backend initialization failed");
    }

    isReady = true;
    app.log.debug(app.printRoutes());
  });

  registerErrorHandlers(app);

  await registerApiModules(app);

  // Health & Observability
  await registerHealthRoutes(app);

  // Graceful Shutdown Hooks (werden von server.ts via app.close() getriggert)
  app.addHook("onClose", async () => {
    await app.deps.close();
  });

  return app;
}
