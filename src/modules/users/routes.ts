// src/modules/users/routes.ts
// ============================================================================
// GET /user  (Prefix /api/mobile/v1 bzw. /api/web/v1)
// Realm kommt als Plugin-Option, realm-guard prueft Token-Realm/Business.
// ============================================================================

import type { FastifyInstance } from "fastify";
import { UnauthorizedError } from "../../libs/errors.js";
import type { Realm } from "../../libs/realm.js";
import { getMobileProfile, getWebProfile } from "./service.js";

export type RealmRouteOptions = { realm: Realm };

export default async function userRoutes(app: FastifyInstance, opts: RealmRouteOptions) {
  const { realm } = opts;

  app.get("/user", { config: { realm } }, async (req, reply) => {
    if (!req.user) throw new UnauthorizedError("Access token is not provided");

    const profile =
      realm === "mobile"
        ? await getMobileProfile(app.deps, req.user)
        : await getWebProfile(app.deps, req.user);

    return reply.send(profile);
  });
}
