// src/plugins/auth.ts
// ============================================================================
// Auth-Plugin (Fastify)
// ----------------------------------------------------------------------------
// Für Routes mit config.auth === true oder config.realm:
// - Bearer Token extrahieren
// - Access Token verifizieren (Signatur, Issuer, Realm-Audience)
// - Blacklist (Redis) pruefen
// - req.user setzen
//
// Nicht in diesem Plugin:
// - Realm/Business-Abgleich (macht realm-guard.ts)
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyPluginAsync, FastifyRequest } from "fastify";
import { isHealthPath } from "../libs/http.js";
import { verifyAccessToken, type AccessTokenPayload } from "../libs/jwt.js";
import { sendApiError } from "../libs/error-response.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function routeNeedsAuth(req: FastifyRequest): boolean {
  const config = req.routeOptions.config;
  return config?.auth === true || config?.realm !== undefined;
}

export function extractBearerToken(authHeader: unknown): string | null {
  const raw =
    typeof authHeader === "string"
      ? authHeader
      : Array.isArray(authHeader) && typeof authHeader[0] === "string"
        ? authHeader[0]
        : undefined;

  if (!raw) return null;

  // toleriert: "Bearer <token>", "bearer <token>", extra spaces
  const m = raw.match(/^\s*Bearer\s+(.+)\s*$/i);
  const token = m?.[1]?.trim();
  return token && token.length > 0 ? token : null;
}

// ---------------------------------------------------------------------------
// Plugin
// ---------------------------------------------------------------------------

const authPlugin: FastifyPluginAsync = async (app) => {
  app.addHook("preHandler", async (req, reply) => {
    if (isHealthPath(req)) return;
    if (!routeNeedsAuth(req)) return;

    const token = extractBearerToken(req.headers.authorization);

    if (!token) {
      reply.header("WWW-Authenticate", 'Bearer realm="loyalty-api"');
      return sendApiError(reply, 401, "Access token is not provided");
    }

    let payload: AccessTokenPayload;
    try {
      payload = await verifyAccessToken(token);
    } catch (err) {
      req.log.debug({ err }, "access_token_rejected");
      reply.header("WWW-Authenticate", 'Bearer error="invalid_token"');
      return sendApiError(reply, 401, "Invalid access token");
    }

    // Store-Fehler propagieren (500), nicht als "gueltig" durchwinken
    if (await app.deps.cache.blacklistHas(payload.jti)) {
      reply.header("WWW-Authenticate", 'Bearer error="invalid_token"');
      return sendApiError(reply, 401, "Token has been revoked");
    }

    req.user = payload;
  });
};

export default fp(authPlugin, { name: "auth", dependencies: ["business-context"] });
