// src/modules/tokens/service.ts
// ============================================================================
// Token-Service
// ----------------------------------------------------------------------------
// - Token-Paar ausstellen (neue Refresh-Family pro Login/Confirm)
// - Refresh mit Rotation; Wiederverwendung eines ersetzten Tokens
//   widerruft die komplette Family
// - Access-Tokens auflisten / widerrufen (DB + Redis-Blacklist)
// ============================================================================

import { randomUUID } from "node:crypto";
import type { CacheStore } from "../../libs/cache.js";
import { hashOpaqueToken } from "../../libs/crypto.js";
import { env } from "../../libs/env.js";
import { ApiError, NotFoundError } from "../../libs/errors.js";
import { signAccessToken, type AccessTokenPayload } from "../../libs/jwt.js";
import { recordTokensRevoked } from "../../libs/metrics.js";
import type {
  AccessTokenRecord,
  IssueTokenInput,
  IssuedTokenDto,
  TokenOwner,
  TokenPair,
  TokenRepository,
  TokenSettings,
} from "./types.js";

export class RefreshFailedError extends ApiError {
  constructor() {
    super(401, "Invalid refresh token");
    this.name = "RefreshFailedError";
  }
}

export class RefreshReuseDetectedError extends ApiError {
  constructor() {
    super(401, "Refresh token reuse detected");
    this.name = "RefreshReuseDetectedError";
  }
}

export type TokenDeps = {
  tokens: TokenRepository;
  cache: CacheStore;
};

export function tokenSettingsFromEnv(): TokenSettings {
  return {
    accessTtlSec: env.JWT_ACCESS_TTL,
    refreshTtlSec: env.REFRESH_TOKEN_TTL,
  };
}

function toEpochSec(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export function ownerFromClaims(claims: AccessTokenPayload): TokenOwner {
  return {
    userId: claims.sub,
    realm: claims.realm,
    businessCode: claims.biz ?? null,
  };
}

// ---------------------------------------------------------------------------
// Ausstellen
// ---------------------------------------------------------------------------

async function issueAccessToken(
  deps: TokenDeps,
  settings: TokenSettings,
  input: IssueTokenInput,
  familyId: string,
): Promise<{ token: string; jti: string; exp: number }> {
  const signed = await signAccessToken({
    sub: input.userId,
    realm: input.realm,
    businessCode: input.businessCode,
    familyId,
    ttlSec: settings.accessTtlSec,
  });

  await deps.tokens.createAccessToken({
    jti: signed.jti,
    userId: input.userId,
    realm: input.realm,
    businessCode: input.businessCode,
    familyId,
    ipAddress: input.ip,
    userAgent: input.userAgent,
    issuedAt: new Date(signed.iat * 1000),
    expiresAt: new Date(signed.exp * 1000),
  });

  return signed;
}

export async function issueTokenPair(
  deps: TokenDeps,
  settings: TokenSettings,
  input: IssueTokenInput,
  now: Date = new Date(),
): Promise<TokenPair> {
  const familyId = randomUUID();
  const refreshToken = randomUUID();
  const refreshExpiresAt = new Date(now.getTime() + settings.refreshTtlSec * 1000);

  await deps.tokens.createRefreshToken({
    userId: input.userId,
    realm: input.realm,
    businessCode: input.businessCode,
    tokenHash: hashOpaqueToken(refreshToken),
    familyId,
    createdAt: now,
    expiresAt: refreshExpiresAt,
  });

  const access = await issueAccessToken(deps, settings, input, familyId);

  return {
    accessToken: access.token,
    accessTokenExpiresAt: access.exp,
    refreshToken,
    refreshTokenExpiresAt: toEpochSec(refreshExpiresAt),
    jti: access.jti,
    familyId,
  };
}

// ---------------------------------------------------------------------------
// Refresh (Rotation)
// ---------------------------------------------------------------------------

export async function refreshTokens(
  deps: TokenDeps,
  settings: TokenSettings,
  params: { refreshToken: string; ip: string | null; userAgent: string | null },
  now: Date = new Date(),
): Promise<TokenPair> {
  const stored = await deps.tokens.findRefreshTokenByHash(hashOpaqueToken(params.refreshToken));
  if (!stored) {
    throw new RefreshFailedError();
  }

  if (stored.replacedBy) {
    await revokeFamily(deps, stored.familyId, now);
    throw new RefreshReuseDetectedError();
  }

  if (stored.revokedAt || stored.expiresAt.getTime() <= now.getTime()) {
    throw new RefreshFailedError();
  }

  // Neues Refresh-Token in derselben Family
  const newRefreshToken = randomUUID();
  const refreshExpiresAt = new Date(now.getTime() + settings.refreshTtlSec * 1000);
  const rotated = await deps.tokens.createRefreshToken({
    userId: stored.userId,
    realm: stored.realm,
    businessCode: stored.businessCode,
    tokenHash: hashOpaqueToken(newRefreshToken),
    familyId: stored.familyId,
    createdAt: now,
    expiresAt: refreshExpiresAt,
  });

  const oldTokenRotated = await deps.tokens.markRefreshTokenRotated(stored.id, rotated.id, now);
  if (!oldTokenRotated) {
    // paralleler Refresh hat gewonnen
    await deps.tokens.deleteRefreshToken(rotated.id);
    throw new RefreshFailedError();
  }

  const access = await issueAccessToken(
    deps,
    settings,
    {
      userId: stored.userId,
      realm: stored.realm,
      businessCode: stored.businessCode,
      ip: params.ip,
      userAgent: params.userAgent,
    },
    stored.familyId,
  );

  return {
    accessToken: access.token,
    accessTokenExpiresAt: access.exp,
    refreshToken: newRefreshToken,
    refreshTokenExpiresAt: toEpochSec(refreshExpiresAt),
    jti: access.jti,
    familyId: stored.familyId,
  };
}

// ---------------------------------------------------------------------------
// Widerruf
// ---------------------------------------------------------------------------

async function blacklistRecords(
  deps: TokenDeps,
  records: AccessTokenRecord[],
  now: Date,
): Promise<void> {
  const nowSec = toEpochSec(now);
  for (const record of records) {
    const ttl = Math.max(1, toEpochSec(record.expiresAt) - nowSec);
    await deps.cache.blacklistAdd(record.jti, ttl);
  }
  recordTokensRevoked(records.length);
}

async function revokeFamily(deps: TokenDeps, familyId: string, now: Date): Promise<number> {
  await deps.tokens.revokeRefreshFamily(familyId, now);
  const revoked = await deps.tokens.revokeAccessTokensByFamily(familyId, now);
  await blacklistRecords(deps, revoked, now);
  return revoked.length;
}

function isOwnedBy(record: AccessTokenRecord, owner: TokenOwner): boolean {
  return (
    record.userId === owner.userId &&
    record.realm === owner.realm &&
    record.businessCode === owner.businessCode
  );
}

export async function listIssuedTokens(
  deps: TokenDeps,
  claims: AccessTokenPayload,
  now: Date = new Date(),
): Promise<IssuedTokenDto[]> {
  const records = await deps.tokens.listActiveAccessTokens(ownerFromClaims(claims), now);
  return records.map((record) => ({
    jti: record.jti,
    ip_address: record.ipAddress,
    user_agent: record.userAgent,
    issued_at: record.issuedAt.toISOString(),
    expires_at: record.expiresAt.toISOString(),
    current: record.jti === claims.jti,
  }));
}

/** Einzelnes Token des Aufrufers widerrufen; fremde/unbekannte -> 404. */
export async function revokeAccessToken(
  deps: TokenDeps,
  claims: AccessTokenPayload,
  jti: string,
  now: Date = new Date(),
): Promise<{ revoked: boolean }> {
  const record = await deps.tokens.findAccessToken(jti);
  if (!record || !isOwnedBy(record, ownerFromClaims(claims))) {
    throw new NotFoundError("Token not found");
  }

  const revoked = await deps.tokens.revokeAccessTokens([jti], now);
  await blacklistRecords(deps, revoked, now);
  return { revoked: revoked.length > 0 };
}

/** Logout: aktuelles Access-Token + dessen Refresh-Family. */
export async function logout(
  deps: TokenDeps,
  claims: AccessTokenPayload,
  now: Date = new Date(),
): Promise<void> {
  const revoked = await deps.tokens.revokeAccessTokens([claims.jti], now);
  await blacklistRecords(deps, revoked, now);
  await deps.tokens.revokeRefreshFamily(claims.sid, now);
}

/** Alle anderen aktiven Tokens des Aufrufers (gleicher Realm/Business). */
export async function revokeAllOtherTokens(
  deps: TokenDeps,
  claims: AccessTokenPayload,
  now: Date = new Date(),
): Promise<number> {
  const active = await deps.tokens.listActiveAccessTokens(ownerFromClaims(claims), now);
  const others = active.filter((record) => record.jti !== claims.jti);

  const revoked = await deps.tokens.revokeAccessTokens(
    others.map((record) => record.jti),
    now,
  );
  await blacklistRecords(deps, revoked, now);

  for (const familyId of new Set(revoked.map((record) => record.familyId))) {
    if (familyId !== claims.sid) {
      await deps.tokens.revokeRefreshFamily(familyId, now);
    }
  }

  return revoked.length;
}
