// src/libs/cache.ts
// ============================================================================
// CacheStore: kurzlebiger, geteilter Zustand (Cooldowns, Kontingente,
// Rate-Limits, Access-Token-Blacklist). Produktiv: Redis (libs/redis.ts).
// Keys sind logisch ("otp:cooldown:<hash>"), Namespace setzt die Implementierung.
// ============================================================================

export type WindowCounter = {
  count: number;
  ttl: number;
};

export type CacheHealth = {
  ok: boolean;
  [key: string]: unknown;
};

export interface CacheStore {
  /** SET NX EX: true, wenn der Key neu gesetzt wurde. */
  acquireLock(key: string, ttlSec: number): Promise<boolean>;
  releaseLock(key: string): Promise<void>;

  /** INCR + EXPIRE beim ersten Treffer (festes Fenster). */
  incrWindow(key: string, windowSec: number): Promise<WindowCounter>;

  blacklistAdd(jti: string, ttlSec: number): Promise<void>;
  blacklistHas(jti: string): Promise<boolean>;

  health(): Promise<CacheHealth>;
}
