// src/plugins/business-context.ts
// ============================================================================
// Business Context (Header Intake Only)
// ----------------------------------------------------------------------------
// - Liest X-Business-ID, prueft das Format
// - Speichert den Wert nur als request.businessCode (unverifiziert)
//
// Der Header ist NICHT vertrauenswuerdig:
// - /api/v1/auth*: waehlt das Business fuer OTP-Scope (Existenz prueft der Service)
// - mobile-Routen: nur Vergleichswert gegen den biz-Claim (realm-guard.ts)
//
// Reihenfolge:
// business-context -> auth -> realm-guard
// ============================================================================

import fp from "fastify-plugin";
import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import { isHealthPath, readHeader } from "../libs/http.js";
import { sendApiError } from "../libs/error-response.js";
import { BUSINESS_CODE_RE } from "../modules/businesses/types.js";

export const BUSINESS_HEADER = "x-business-id";

const businessContextPlugin: FastifyPluginAsync = async (fastify: FastifyInstance) => {
  fastify.addHook("preHandler", async (request, reply) => {
    if (isHealthPath(request)) return;

    const headerBusiness = readHeader(request.headers[BUSINESS_HEADER]);
    if (!headerBusiness) return;

    if (!BUSINESS_CODE_RE.test(headerBusiness)) {
      return sendApiError(reply, 400, "Invalid X-Business-ID header.");
    }

    request.businessCode = headerBusiness;
  });
};

export default fp(businessContextPlugin, { name: "business-context" });
