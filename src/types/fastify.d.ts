// src/types/fastify.d.ts
// ============================================================================
// Fastify Type Augmentation
// ----------------------------------------------------------------------------
// - Instance Decorations: app.deps / app.settings (buildApp)
// - Request Decorations: request.user, request.businessCode, request.rate
// - Route Config: config.auth / config.realm
// Nur Type-Imports, keine Runtime-Imports.
// ============================================================================

import "fastify";

declare module "fastify" {
  interface FastifyContextConfig {
    /** Bearer-Token Pflicht, Realm egal (z. B. /api/v1/tokens/*). */
    auth?: boolean;

    /**
     * Bearer-Token Pflicht und Token-Realm muss passen (realm-guard.ts);
     * bei mobile zusaetzlich X-Business-ID vs Token-Business.
     */
    realm?: import("../libs/realm.js").Realm;
  }

  interface FastifyInstance {
    deps: import("../container.js").AppDeps;
    settings: import("../container.js").AppSettings;
  }

  interface FastifyRequest {
    /** Verifizierter JWT-Payload (nur bei auth/realm-Routen). */
    user?: import("../libs/jwt.js").AccessTokenPayload;

    /** X-Business-ID aus dem Header (unverifiziert, business-context.ts). */
    businessCode?: string;

    rate?: { count: number; ttl: number; blocked: boolean; max: number };

    requestStartedAtNs?: bigint;
  }
}
