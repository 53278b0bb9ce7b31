// src/modules/auth/routes.ts
// ============================================================================
// Auth-Routen (realm-uebergreifend, ohne JWT)
// ----------------------------------------------------------------------------
// Endpoints (relativ zum Prefix /api/v1/auth):
// - POST /         OTP per SMS anfordern
// - POST /confirm  OTP bestaetigen -> Token-Paar
// - POST /login    Business-Owner mit Passwort -> Token-Paar (web)
//
// X-Business-ID (business-context.ts) gilt als Alternative zu body.business.
// ============================================================================

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { clientMeta } from "../../libs/http.js";
import { hashIpForLog, hashPhoneForLog } from "../../libs/pii.js";
import {
  bodyObject,
  businessField,
  otpField,
  parseBody,
  phoneField,
  realmField,
} from "../../libs/validation.js";
import { resolveOtpScope, requestOtp } from "../otp/service.js";
import { toBusinessDto } from "../businesses/types.js";
import { toUserDto } from "../users/types.js";
import { confirmOtp, loginWithPassword } from "./service.js";

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const OtpRequestBody = bodyObject({
  phone: phoneField,
  realm: realmField,
  business: businessField,
});

const OtpConfirmBody = bodyObject({
  phone: phoneField,
  otp: otpField,
  realm: realmField,
  business: businessField,
});

const LoginBody = bodyObject({
  phone: phoneField,
  password: z
    .string({ required_error: "Password is required." })
    .min(1, "Password is required.")
    .max(256, "Password is too long."),
});

export default async function authRoutes(app: FastifyInstance) {
  // -------------------------------------------------------------------------
  // POST /api/v1/auth
  // -------------------------------------------------------------------------
  app.post("/", async (req, reply) => {
    const body = parseBody(OtpRequestBody, req.body, "Invalid OTP request payload.");

    const { scope } = await resolveOtpScope(app.deps.businesses, {
      phone: body.phone,
      realm: body.realm,
      business: body.business,
      headerBusiness: req.businessCode,
    });

    const phoneHash = hashPhoneForLog(scope.phone);
    try {
      await requestOtp(app.deps, app.settings.otp, scope);
    } catch (err) {
      req.log.warn(
        { err, phone_hash: phoneHash, realm: scope.realm, business: scope.businessCode },
        "otp_request_failed",
      );
      throw err;
    }

    req.log.info(
      { phone_hash: phoneHash, realm: scope.realm, business: scope.businessCode },
      "otp_sent",
    );

    return reply.send({ success: true, message: "OTP sent successfully." });
  });

  // -------------------------------------------------------------------------
  // POST /api/v1/auth/confirm
  // -------------------------------------------------------------------------
  app.post("/confirm", async (req, reply) => {
    const body = parseBody(OtpConfirmBody, req.body, "Invalid OTP confirm payload.");

    try {
      const result = await confirmOtp(app.deps, app.settings, {
        phone: body.phone,
        otp: body.otp,
        realm: body.realm,
        business: body.business,
        headerBusiness: req.businessCode,
        meta: clientMeta(req),
      });

      req.log.info(
        {
          user_id: result.user.id,
          user_created: result.userCreated,
          realm: result.scope.realm,
          business: result.scope.businessCode,
        },
        "otp_confirmed",
      );

      return reply.send({
        access_token: result.tokens.accessToken,
        refresh_token: result.tokens.refreshToken,
      });
    } catch (err) {
      req.log.warn(
        { err, phone_hash: hashPhoneForLog(body.phone), ip_hash: hashIpForLog(req.ip || "unknown") },
        "otp_confirm_failed",
      );
      throw err;
    }
  });

  // -------------------------------------------------------------------------
  // POST /api/v1/auth/login
  // -------------------------------------------------------------------------
  app.post("/login", async (req, reply) => {
    const body = parseBody(LoginBody, req.body, "Invalid login payload.");

    try {
      const result = await loginWithPassword(app.deps, app.settings, {
        phone: body.phone,
        password: body.password,
        meta: clientMeta(req),
      });

      req.log.info({ user_id: result.user.id }, "login_success");

      return reply.send({
        user: toUserDto(result.user),
        businesses: result.businesses.map(toBusinessDto),
        access_token: result.tokens.accessToken,
        refresh_token: result.tokens.refreshToken,
      });
    } catch (err) {
      req.log.warn(
        { phone_hash: hashPhoneForLog(body.phone), ip_hash: hashIpForLog(req.ip || "unknown") },
        "login_failed",
      );
      throw err;
    }
  });
}
