// src/plugins/realm-guard.ts
// ============================================================================
// Realm Guard (Policy Layer)
// ----------------------------------------------------------------------------
// Für Routes mit config.realm:
// - Token-Realm muss dem Routen-Realm entsprechen -> sonst 403
// - mobile: X-Business-ID (falls gesendet) muss dem biz-Claim entsprechen
//   -> bei mismatch 403
//
// auth.ts muss vorher laufen und request.user setzen.
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyPluginAsync } from "fastify";
import { isHealthPath } from "../libs/http.js";
import { sendApiError } from "../libs/error-response.js";

const realmGuardPlugin: FastifyPluginAsync = async (app) => {
  app.addHook("preHandler", async (request, reply) => {
    if (isHealthPath(request)) return;

    const routeRealm = request.routeOptions.config?.realm;
    if (!routeRealm) return;

    const user = request.user;
    if (!user) {
      return sendApiError(reply, 401, "Access token is not provided");
    }

    if (user.realm !== routeRealm) {
      request.log.warn(
        { token_realm: user.realm, route_realm: routeRealm },
        "realm_mismatch",
      );
      return sendApiError(reply, 403, "Forbidden");
    }

    if (routeRealm === "mobile" && request.businessCode && request.businessCode !== user.biz) {
      return sendApiError(reply, 403, "Business mismatch");
    }
  });
};

export default fp(realmGuardPlugin, {
  name: "realm-guard",
  dependencies: ["auth"],
});
