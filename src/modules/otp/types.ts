// src/modules/otp/types.ts
// ============================================================================
// Typen fuer OTP
// ----------------------------------------------------------------------------
// Zustandsmaschine eines Codes: issued -> consumed | expired | superseded
// (superseded = revoked_at gesetzt, durch neuen Code oder zu viele Fehlversuche)
// ============================================================================

import type { Realm } from "../../libs/realm.js";

export interface OtpRow {
  id: string;
  phone: string;
  realm: Realm;
  business_code: string | null;
  code_hash: string;
  attempts: number;
  sent_at: Date;
  expires_at: Date;
  used_at: Date | null;
  revoked_at: Date | null;
}

/** (phone, realm, business) - ein Code gilt nur in genau diesem Scope. */
export interface OtpScope {
  phone: string;
  realm: Realm;
  businessCode: string | null;
}

export interface OtpCode {
  id: string;
  phone: string;
  realm: Realm;
  businessCode: string | null;
  codeHash: string;
  attempts: number;
  sentAt: Date;
  expiresAt: Date;
  usedAt: Date | null;
  revokedAt: Date | null;
}

export type OtpState = "issued" | "consumed" | "expired" | "superseded";

export interface CreateOtpInput {
  scope: OtpScope;
  codeHash: string;
  sentAt: Date;
  expiresAt: Date;
}

export interface OtpRepository {
  /** Alle aktiven Codes des Scopes widerrufen (superseded). */
  revokeActive(scope: OtpScope, now: Date): Promise<number>;
  create(input: CreateOtpInput): Promise<OtpCode>;
  findLatestActive(scope: OtpScope, now: Date): Promise<OtpCode | null>;
  /** Fehlversuch zaehlen; bei maxAttempts wird der Code widerrufen. */
  registerFailedAttempt(id: string, maxAttempts: number, now: Date): Promise<number>;
  /** Atomar: nur erfolgreich, solange der Code noch aktiv ist. */
  consume(id: string, now: Date): Promise<boolean>;
  revoke(id: string, now: Date): Promise<void>;
  deleteExpired(before: Date): Promise<number>;
}

export interface OtpSettings {
  ttlSec: number;
  cooldownSec: number;
  quotaMax: number;
  quotaWindowSec: number;
  length: number;
  maxAttempts: number;
}

export interface OtpRequestInput {
  phone: string;
  realm?: Realm;
  business?: string | null;
  headerBusiness?: string | null;
}

export interface OtpRequestResult {
  scope: OtpScope;
  expiresAt: Date;
}

export function otpState(code: OtpCode, now: Date): OtpState {
  if (code.usedAt) return "consumed";
  if (code.revokedAt) return "superseded";
  if (code.expiresAt.getTime() <= now.getTime()) return "expired";
  return "issued";
}
