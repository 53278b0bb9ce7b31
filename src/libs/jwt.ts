// src/libs/jwt.ts
// ============================================================================
// JWT-Hilfen (JOSE)
// ----------------------------------------------------------------------------
// Design:
// - HS256 Symmetric Key (JWT_SECRET_ACTIVE via env.ts, secrets-first)
// - JTI pro Token (Blacklist/Revoke möglich)
// - typ="access" im Payload
// - realm ist Pflicht und steckt zusätzlich in der Audience
//   ("<JWT_AUDIENCE>:<realm>"), damit ein Token nie realm-übergreifend gilt
// - biz (Business-Code) nur bei realm=mobile
// ============================================================================

import crypto from "node:crypto";
import { SignJWT, jwtVerify, type JWTPayload } from "jose";
import { env } from "./env.js";
import { REALMS, isRealm, type Realm } from "./realm.js";

// ---------------------------------------------------------------------------
// JWT Secret laden (secrets-first via env.ts)
// ---------------------------------------------------------------------------

const activeRawSecret = env.JWT_SECRET_ACTIVE ?? env.JWT_SECRET;
const previousRawSecret = env.JWT_SECRET_PREVIOUS;

if (!activeRawSecret) {
  throw new Error(
    "JWT Secret fehlt: setze JWT_SECRET_ACTIVE oder JWT_SECRET_ACTIVE_FILE (Legacy: JWT_SECRET).",
  );
}

const activeSecret = new TextEncoder().encode(activeRawSecret);
const previousSecret = previousRawSecret
  ? new TextEncoder().encode(previousRawSecret)
  : undefined;

const JWT_ISSUER = env.JWT_ISSUER;

export function audienceForRealm(realm: Realm): string {
  return `${env.JWT_AUDIENCE}:${realm}`;
}

const ACCEPTED_AUDIENCES = REALMS.map(audienceForRealm);

// ---------------------------------------------------------------------------
// Typdefinition Access-Token Payload
// ---------------------------------------------------------------------------

export interface AccessTokenPayload extends JWTPayload {
  sub: string;          // User-ID
  jti: string;          // Token-ID
  exp: number;
  iat: number;

  typ: "access";
  realm: Realm;
  biz?: string;         // Business-Code (nur mobile)
  sid: string;          // Refresh-Family
}

export type SignAccessTokenInput = {
  sub: string;
  realm: Realm;
  businessCode: string | null;
  familyId: string;
  ttlSec: number;
};

// ---------------------------------------------------------------------------
// Access-Token signieren
// ---------------------------------------------------------------------------

export async function signAccessToken(
  input: SignAccessTokenInput,
): Promise<{ token: string; jti: string; iat: number; exp: number }> {
  if (!input.sub) throw new Error("sub_missing");
  if (input.realm === "mobile" && !input.businessCode) {
    throw new Error("business_missing");
  }

  const jti = crypto.randomUUID();
  const iat = Math.floor(Date.now() / 1000);
  const exp = iat + input.ttlSec;

  const token = await new SignJWT({
    typ: "access",
    realm: input.realm,
    sid: input.familyId,
    ...(input.realm === "mobile" && input.businessCode ? { biz: input.businessCode } : {}),
  })
    .setProtectedHeader({
      alg: "HS256",
      ...(env.JWT_ACTIVE_KID ? { kid: env.JWT_ACTIVE_KID } : {}),
    })
    .setSubject(input.sub)
    .setJti(jti)
    .setIssuedAt(iat)
    .setExpirationTime(exp)
    .setIssuer(JWT_ISSUER)
    .setAudience(audienceForRealm(input.realm))
    .sign(activeSecret);

  return { token, jti, iat, exp };
}

// ---------------------------------------------------------------------------
// Access-Token verifizieren + Claims erzwingen
// ---------------------------------------------------------------------------

function audienceList(payload: JWTPayload): string[] {
  if (typeof payload.aud === "string") return [payload.aud];
  return Array.isArray(payload.aud) ? payload.aud : [];
}

export async function verifyAccessToken(token: string): Promise<AccessTokenPayload> {
  const verifyOptions = {
    issuer: JWT_ISSUER,
    audience: ACCEPTED_AUDIENCES,
    clockTolerance: env.JWT_CLOCK_SKEW_SEC,
  };

  let payload: JWTPayload;
  try {
    const verified = await jwtVerify(token, activeSecret, verifyOptions);
    payload = verified.payload;
  } catch (activeError) {
    if (!previousSecret) {
      throw activeError;
    }
    const verified = await jwtVerify(token, previousSecret, verifyOptions);
    payload = verified.payload;
  }

  if (payload.typ !== "access") {
    throw new Error("invalid_token_type");
  }

  const { sub, jti, exp, iat, realm, sid, biz } = payload;
  if (typeof sub !== "string" || !sub) throw new Error("sub_missing");
  if (typeof jti !== "string" || !jti) throw new Error("jti_missing");
  if (typeof exp !== "number" || typeof iat !== "number") throw new Error("timestamps_missing");
  if (typeof sid !== "string" || !sid) throw new Error("sid_missing");
  if (!isRealm(realm)) throw new Error("realm_invalid");

  // Audience und realm-Claim muessen zusammenpassen
  if (!audienceList(payload).includes(audienceForRealm(realm))) {
    throw new Error("realm_audience_mismatch");
  }

  let businessCode: string | undefined;
  if (realm === "mobile") {
    if (typeof biz !== "string" || !biz) throw new Error("business_missing");
    businessCode = biz;
  }

  return {
    ...payload,
    sub,
    jti,
    exp,
    iat,
    typ: "access",
    realm,
    sid,
    ...(businessCode ? { biz: businessCode } : {}),
  };
}
