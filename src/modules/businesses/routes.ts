// src/modules/businesses/routes.ts
// ============================================================================
// - mobile: GET /business    Business des Tokens
// - web:    GET /businesses  eigene Businesses des Owners
// ============================================================================

import type { FastifyInstance } from "fastify";
import { UnauthorizedError } from "../../libs/errors.js";
import type { RealmRouteOptions } from "../users/routes.js";
import { getTokenBusiness, listOwnedBusinesses } from "./service.js";

export default async function businessRoutes(app: FastifyInstance, opts: RealmRouteOptions) {
  const { realm } = opts;

  if (realm === "mobile") {
    app.get("/business", { config: { realm } }, async (req, reply) => {
      if (!req.user) throw new UnauthorizedError("Access token is not provided");
      const business = await getTokenBusiness(app.deps.businesses, req.user);
      return reply.send({ business });
    });
    return;
  }

  app.get("/businesses", { config: { realm } }, async (req, reply) => {
    if (!req.user) throw new UnauthorizedError("Access token is not provided");
    const businesses = await listOwnedBusinesses(app.deps.businesses, req.user);
    return reply.send({ businesses });
  });
}
