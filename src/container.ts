// src/container.ts
// ============================================================================
// Abhaengigkeiten der App (Repositories, Cache, SMS) + Laufzeit-Settings
// ----------------------------------------------------------------------------
// buildApp() nimmt optional eigene deps/settings entgegen (Tests: In-Memory),
// sonst werden hier die Postgres-/Redis-Implementierungen verdrahtet.
// ============================================================================

import type { FastifyBaseLogger } from "fastify";
import type { CacheStore } from "./libs/cache.js";
import { checkDb, closeDb, dbHealth, pool } from "./libs/db.js";
import { env } from "./libs/env.js";
import { createRedisCacheStore, ensureRedis, getRedis, quitRedis } from "./libs/redis.js";
import { createSmsSender, type SmsSender } from "./libs/sms.js";
import { createPgBusinessRepository } from "./modules/businesses/repository.js";
import type { BusinessRepository } from "./modules/businesses/types.js";
import { createPgOtpRepository } from "./modules/otp/repository.js";
import { otpSettingsFromEnv } from "./modules/otp/service.js";
import type { OtpRepository, OtpSettings } from "./modules/otp/types.js";
import { createPgTokenRepository } from "./modules/tokens/repository.js";
import { tokenSettingsFromEnv } from "./modules/tokens/service.js";
import type { TokenRepository, TokenSettings } from "./modules/tokens/types.js";
import { createPgUserRepository } from "./modules/users/repository.js";
import type { UserRepository } from "./modules/users/types.js";

export interface AppDeps {
  otps: OtpRepository;
  users: UserRepository;
  businesses: BusinessRepository;
  tokens: TokenRepository;
  cache: CacheStore;
  sms: SmsSender;
  dbHealth(): Promise<{ ok: boolean; error?: string }>;
  /** Verbindungen beim Start pruefen (onReady) */
  connect(): Promise<void>;
  /** Verbindungen schliessen (onClose) */
  close(): Promise<void>;
}

export interface RateLimitSettings {
  windowSec: number;
  max: number;
  sensitiveMax: number;
}

export interface AppSettings {
  otp: OtpSettings;
  tokens: TokenSettings;
  rateLimit: RateLimitSettings;
}

export function settingsFromEnv(): AppSettings {
  return {
    otp: otpSettingsFromEnv(),
    tokens: tokenSettingsFromEnv(),
    rateLimit: {
      windowSec: env.RATE_LIMIT_WINDOW,
      max: env.RATE_LIMIT_MAX,
      sensitiveMax: env.RATE_LIMIT_AUTH_MAX,
    },
  };
}

export function createDefaultDeps(log: FastifyBaseLogger): AppDeps {
  return {
    otps: createPgOtpRepository(pool),
    users: createPgUserRepository(pool),
    businesses: createPgBusinessRepository(pool),
    tokens: createPgTokenRepository(pool),
    cache: createRedisCacheStore(getRedis()),
    sms: createSmsSender(log),
    dbHealth,

    async connect() {
      await ensureRedis();
      await checkDb();
    },

    async close() {
      try {
        await quitRedis();
        log.info("Redis connection closed");
      } catch (err) {
        log.warn({ err }, "Redis shutdown failed");
      }

      try {
        await closeDb();
        log.info("DB pool closed");
      } catch (err) {
        log.warn({ err }, "DB shutdown failed");
      }
    },
  };
}
