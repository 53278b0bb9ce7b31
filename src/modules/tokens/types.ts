// src/modules/tokens/types.ts
// ============================================================================
// Typen fuer Access-/Refresh-Tokens
// ----------------------------------------------------------------------------
// - Refresh-Tokens: opaque, nur token_hash gespeichert, Rotation per family_id
// - Access-Tokens: JWT, Datensatz pro jti fuer Auflisten/Widerrufen
// ============================================================================

import type { Realm } from "../../libs/realm.js";

export interface RefreshTokenRow {
  id: string;
  user_id: string;
  realm: Realm;
  business_code: string | null;
  token_hash: string;
  family_id: string;
  replaced_by: string | null;
  revoked_at: Date | null;
  created_at: Date;
  expires_at: Date;
}

export interface AccessTokenRow {
  jti: string;
  user_id: string;
  realm: Realm;
  business_code: string | null;
  family_id: string;
  ip_address: string | null;
  user_agent: string | null;
  issued_at: Date;
  expires_at: Date;
  revoked_at: Date | null;
}

export interface RefreshTokenRecord {
  id: string;
  userId: string;
  realm: Realm;
  businessCode: string | null;
  tokenHash: string;
  familyId: string;
  replacedBy: string | null;
  revokedAt: Date | null;
  createdAt: Date;
  expiresAt: Date;
}

export interface AccessTokenRecord {
  jti: string;
  userId: string;
  realm: Realm;
  businessCode: string | null;
  familyId: string;
  ipAddress: string | null;
  userAgent: string | null;
  issuedAt: Date;
  expiresAt: Date;
  revokedAt: Date | null;
}

/** Eigentuemer-Filter: User + Realm + Business */
export interface TokenOwner {
  userId: string;
  realm: Realm;
  businessCode: string | null;
}

export interface CreateRefreshTokenInput extends TokenOwner {
  tokenHash: string;
  familyId: string;
  createdAt: Date;
  expiresAt: Date;
}

export type CreateAccessTokenInput = Omit<AccessTokenRecord, "revokedAt">;

export interface TokenRepository {
  createRefreshToken(input: CreateRefreshTokenInput): Promise<RefreshTokenRecord>;
  findRefreshTokenByHash(tokenHash: string): Promise<RefreshTokenRecord | null>;
  /** Altes Token atomar als ersetzt markieren; false, wenn nicht mehr aktiv. */
  markRefreshTokenRotated(id: string, replacedById: string, now: Date): Promise<boolean>;
  deleteRefreshToken(id: string): Promise<void>;
  revokeRefreshFamily(familyId: string, now: Date): Promise<number>;

  createAccessToken(input: CreateAccessTokenInput): Promise<AccessTokenRecord>;
  findAccessToken(jti: string): Promise<AccessTokenRecord | null>;
  listActiveAccessTokens(owner: TokenOwner, now: Date): Promise<AccessTokenRecord[]>;
  /** Liefert die widerrufenen Datensaetze (fuer Blacklist-TTL). */
  revokeAccessTokens(jtis: string[], now: Date): Promise<AccessTokenRecord[]>;
  revokeAccessTokensByFamily(familyId: string, now: Date): Promise<AccessTokenRecord[]>;

  deleteExpired(before: Date): Promise<{ refresh: number; access: number }>;
}

export interface TokenSettings {
  accessTtlSec: number;
  refreshTtlSec: number;
}

export interface TokenPair {
  accessToken: string;
  accessTokenExpiresAt: number;
  refreshToken: string;
  refreshTokenExpiresAt: number;
  jti: string;
  familyId: string;
}

export interface IssueTokenInput extends TokenOwner {
  ip: string | null;
  userAgent: string | null;
}

export interface IssuedTokenDto {
  jti: string;
  ip_address: string | null;
  user_agent: string | null;
  issued_at: string;
  expires_at: string;
  current: boolean;
}
