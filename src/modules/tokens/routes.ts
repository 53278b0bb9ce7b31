// src/modules/tokens/routes.ts
// ============================================================================
// Token-Routen (Prefix /api/v1/tokens)
// ----------------------------------------------------------------------------
// - POST /refresh        opaque Refresh-Token -> neues Paar (kein JWT)
// - GET  /issued         aktive Access-Tokens des Aufrufers
// - POST /logout         aktuelles Token + Refresh-Family widerrufen
// - POST /:jti/revoke    einzelnes eigenes Token widerrufen
// - POST /revoke-all     alle anderen eigenen Tokens widerrufen
// Alles ausser /refresh: config.auth (beliebiger Realm).
// ============================================================================

import type { FastifyInstance, FastifyRequest } from "fastify";
import { z } from "zod";
import { NotFoundError, UnauthorizedError } from "../../libs/errors.js";
import { clientMeta } from "../../libs/http.js";
import type { AccessTokenPayload } from "../../libs/jwt.js";
import {
  recordAuthRefreshReuseDetected,
  recordAuthRefreshSuccess,
} from "../../libs/metrics.js";
import { bodyObject, parseBody } from "../../libs/validation.js";
import {
  listIssuedTokens,
  logout,
  refreshTokens,
  RefreshReuseDetectedError,
  revokeAccessToken,
  revokeAllOtherTokens,
} from "./service.js";

const RefreshBody = bodyObject({
  refresh_token: z
    .string({ required_error: "refresh_token is required." })
    .min(1, "refresh_token is required.")
    .max(128, "Invalid refresh token"),
});

const JtiParam = z.string().uuid();

function requireUser(req: FastifyRequest): AccessTokenPayload {
  // auth-Plugin setzt req.user fuer config.auth-Routen
  if (!req.user) throw new UnauthorizedError("Access token is not provided");
  return req.user;
}

export default async function tokenRoutes(app: FastifyInstance) {
  app.post("/refresh", async (req, reply) => {
    const body = parseBody(RefreshBody, req.body, "Invalid refresh payload.");
    const meta = clientMeta(req);

    try {
      const pair = await refreshTokens(app.deps, app.settings.tokens, {
        refreshToken: body.refresh_token,
        ip: meta.ip,
        userAgent: meta.userAgent,
      });
      recordAuthRefreshSuccess();
      req.log.info({ family_id: pair.familyId }, "token_refreshed");

      return reply.send({
        access_token: pair.accessToken,
        refresh_token: pair.refreshToken,
      });
    } catch (err) {
      if (err instanceof RefreshReuseDetectedError) {
        recordAuthRefreshReuseDetected();
        req.log.warn("refresh_token_reuse_detected");
      }
      throw err;
    }
  });

  app.get("/issued", { config: { auth: true } }, async (req, reply) => {
    const tokens = await listIssuedTokens(app.deps, requireUser(req));
    return reply.send({ tokens });
  });

  app.post("/logout", { config: { auth: true } }, async (req, reply) => {
    const user = requireUser(req);
    await logout(app.deps, user);
    req.log.info({ user_id: user.sub, jti: user.jti }, "logout");
    return reply.send({ ok: true });
  });

  app.post<{ Params: { jti: string } }>(
    "/:jti/revoke",
    { config: { auth: true } },
    async (req, reply) => {
      const user = requireUser(req);
      const jti = JtiParam.safeParse(req.params.jti);
      if (!jti.success) throw new NotFoundError("Token not found");

      const result = await revokeAccessToken(app.deps, user, jti.data);
      req.log.info({ user_id: user.sub, jti: jti.data }, "token_revoked");
      return reply.send({ ok: true, revoked: result.revoked });
    },
  );

  app.post("/revoke-all", { config: { auth: true } }, async (req, reply) => {
    const user = requireUser(req);
    const count = await revokeAllOtherTokens(app.deps, user);
    req.log.info({ user_id: user.sub, count }, "tokens_revoked_all");
    return reply.send({ ok: true, tokens_revoked: count });
  });
}
