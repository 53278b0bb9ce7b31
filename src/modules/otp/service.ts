// src/modules/otp/service.ts
// ============================================================================
// Business-Logik fuer OTP
// ----------------------------------------------------------------------------
// requestOtp:
//   Scope aufloesen -> Cooldown-Lock (SET NX) -> Kontingent (INCR-Fenster)
//   -> alte Codes widerrufen -> neuen Code speichern (nur Hash) -> SMS
// verifyOtpCode:
//   aktiven Code suchen -> Hash vergleichen -> atomar verbrauchen
// ============================================================================

import type { CacheStore } from "../../libs/cache.js";
import { generateNumericCode, hashOtpCode, matchesOtpHash } from "../../libs/crypto.js";
import { env } from "../../libs/env.js";
import {
  ApiError,
  BadRequestError,
  BusinessIdRequiredError,
  BusinessMismatchError,
  BusinessNotFoundError,
  InvalidPhoneError,
} from "../../libs/errors.js";
import { recordOtpRequest } from "../../libs/metrics.js";
import { sha256 } from "../../libs/pii.js";
import { normalizePhone } from "../../libs/phone.js";
import type { Realm } from "../../libs/realm.js";
import type { SmsSender } from "../../libs/sms.js";
import type { Business, BusinessRepository } from "../businesses/types.js";
import type {
  OtpCode,
  OtpRepository,
  OtpRequestInput,
  OtpRequestResult,
  OtpScope,
  OtpSettings,
} from "./types.js";

export class SmsCooldownError extends ApiError {
  constructor() {
    super(503, "Too many SMS");
    this.name = "SmsCooldownError";
  }
}

export class OtpExpiredError extends BadRequestError {
  constructor() {
    super("OTP code is expired");
    this.name = "OtpExpiredError";
  }
}

export function otpSettingsFromEnv(): OtpSettings {
  return {
    ttlSec: env.OTP_TTL_SEC,
    cooldownSec: env.OTP_COOLDOWN_SEC,
    quotaMax: env.OTP_QUOTA_MAX,
    quotaWindowSec: env.OTP_QUOTA_WINDOW_SEC,
    length: env.OTP_LENGTH,
    maxAttempts: env.OTP_MAX_ATTEMPTS,
  };
}

// ---------------------------------------------------------------------------
// Scope-Aufloesung (Telefon, Realm, Business)
// ---------------------------------------------------------------------------

function pickBusinessCode(
  bodyBusiness: string | null | undefined,
  headerBusiness: string | null | undefined,
): string | null {
  const body = bodyBusiness?.trim() || null;
  const header = headerBusiness?.trim() || null;
  if (body && header && body !== header) {
    throw new BusinessMismatchError();
  }
  return body ?? header;
}

export type ResolvedOtpScope = {
  scope: OtpScope;
  business: Business | null;
};

/**
 * Realm-Default: mobile, wenn ein Business angegeben ist, sonst web.
 * web ignoriert ein angegebenes Business.
 */
export async function resolveOtpScope(
  businesses: BusinessRepository,
  input: OtpRequestInput,
): Promise<ResolvedOtpScope> {
  const phone = normalizePhone(input.phone);
  if (!phone) throw new InvalidPhoneError();

  const businessCode = pickBusinessCode(input.business, input.headerBusiness);
  const realm: Realm = input.realm ?? (businessCode ? "mobile" : "web");

  if (realm === "web") {
    return { scope: { phone, realm, businessCode: null }, business: null };
  }

  if (!businessCode) throw new BusinessIdRequiredError();

  const business = await businesses.findByCode(businessCode);
  if (!business) throw new BusinessNotFoundError();

  return { scope: { phone, realm, businessCode: business.code }, business };
}

/** Cache-Key ohne Klartext-Telefonnummer */
export function otpScopeKey(scope: OtpScope): string {
  return sha256(`${scope.realm}|${scope.businessCode ?? "-"}|${scope.phone}`);
}

// ---------------------------------------------------------------------------
// Code ausstellen
// ---------------------------------------------------------------------------

export type OtpIssuerDeps = {
  otps: OtpRepository;
  cache: CacheStore;
  sms: SmsSender;
};

export async function requestOtp(
  deps: OtpIssuerDeps,
  settings: OtpSettings,
  scope: OtpScope,
  now: Date = new Date(),
): Promise<OtpRequestResult> {
  const scopeKey = otpScopeKey(scope);
  const cooldownKey = `otp:cooldown:${scopeKey}`;

  // Cooldown-Lock serialisiert auch parallele Anfragen fuer denselben Scope
  const claimed = await deps.cache.acquireLock(cooldownKey, settings.cooldownSec);
  if (!claimed) {
    recordOtpRequest("cooldown");
    throw new SmsCooldownError();
  }

  const quota = await deps.cache.incrWindow(`otp:quota:${scopeKey}`, settings.quotaWindowSec);
  if (quota.count > settings.quotaMax) {
    recordOtpRequest("quota");
    throw new SmsCooldownError();
  }

  await deps.otps.revokeActive(scope, now);

  const code = generateNumericCode(settings.length);
  const expiresAt = new Date(now.getTime() + settings.ttlSec * 1000);
  const record = await deps.otps.create({
    scope,
    codeHash: hashOtpCode(code),
    sentAt: now,
    expiresAt,
  });

  try {
    await deps.sms.sendOtp(scope.phone, code, settings.ttlSec);
  } catch (err) {
    // nicht zugestellter Code darf nicht gueltig bleiben, Cooldown freigeben
    await deps.otps.revoke(record.id, now);
    await deps.cache.releaseLock(cooldownKey);
    recordOtpRequest("sms_failed");
    throw err;
  }

  recordOtpRequest("sent");
  return { scope, expiresAt };
}

// ---------------------------------------------------------------------------
// Code pruefen + verbrauchen
// ---------------------------------------------------------------------------

export async function verifyOtpCode(
  otps: OtpRepository,
  settings: OtpSettings,
  scope: OtpScope,
  code: string,
  now: Date = new Date(),
): Promise<OtpCode> {
  const active = await otps.findLatestActive(scope, now);
  if (!active) throw new OtpExpiredError();

  if (!matchesOtpHash(code.trim(), active.codeHash)) {
    await otps.registerFailedAttempt(active.id, settings.maxAttempts, now);
    throw new OtpExpiredError();
  }

  // Verliert ein paralleler Confirm das Rennen, ist der Code schon verbraucht
  const consumed = await otps.consume(active.id, now);
  if (!consumed) throw new OtpExpiredError();

  return { ...active, usedAt: now };
}
