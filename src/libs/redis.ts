// ============================================================================
// src/libs/redis.ts
// ----------------------------------------------------------------------------
// Redis-Integration (ioredis v5)
// - nutzt env.REDIS_URL oder granularen Fallback
// - globaler Singleton-Client, erst beim ersten Zugriff erzeugt
// - CacheStore-Implementierung (Locks, Fenster-Zaehler, Blacklist)
// ============================================================================
import { Redis } from "ioredis";
import { createHash } from "node:crypto";
import { env } from "./env.js";
import type { CacheHealth, CacheStore, WindowCounter } from "./cache.js";

// globaler Cache fuer Singleton (verhindert Mehrfachverbindungen im Dev)
const GLOBAL_KEY = "__loyalty_api_redis__" as const;
type GlobalWithRedis = typeof globalThis & { [GLOBAL_KEY]?: Redis };
const g: GlobalWithRedis = globalThis;

const SERVICE_NS = "auth";
const KEY_PART_RE = /^[a-z0-9_-]{1,128}$/;

// -----------------------------
// Client-Erzeugung
// -----------------------------
function createClient(): Redis {
  const url = env.REDIS_URL ?? "redis://localhost:6379";

  const client = new Redis(url, {
    lazyConnect: true,
    enableReadyCheck: true,
    enableAutoPipelining: true,
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => Math.min(1000 * times, 10_000),
  });

  client.on("connect", () => console.log("[redis] connect"));
  client.on("ready", () => console.log("[redis] ready"));
  client.on("error", (err) => console.error("[redis] error", err));
  client.on("end", () => console.log("[redis] end"));

  return client;
}

export function getRedis(): Redis {
  const existing = g[GLOBAL_KEY];
  if (existing) return existing;
  const client = createClient();
  g[GLOBAL_KEY] = client;
  return client;
}

// -----------------------------
// Health & Lifecycle
// -----------------------------
export async function ensureRedis() {
  const redis = getRedis();
  if (redis.status === "wait" || redis.status === "end") {
    await redis.connect();
  }
  await redis.ping();
}

export async function redisHealth(): Promise<CacheHealth> {
  const redis = getRedis();
  const pong = await redis.ping();
  return { ok: pong === "PONG", ping: pong, mode: redis.status };
}

export async function quitRedis() {
  const redis = g[GLOBAL_KEY];
  if (!redis) return;
  try {
    await redis.quit();
  } catch {
    redis.disconnect();
  } finally {
    delete g[GLOBAL_KEY];
  }
}

// -----------------------------
// Key-Helper
// -----------------------------
function hashKeyPart(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

function normalizedKeyPart(input: string): string {
  const value = input.trim().toLowerCase();
  if (KEY_PART_RE.test(value)) return value;
  return hashKeyPart(input);
}

export function redisKey(logicalKey: string): string {
  const parts = logicalKey.split(":").filter(Boolean).map(normalizedKeyPart);
  return [env.REDIS_NAMESPACE, SERVICE_NS, ...parts].join(":");
}

// -----------------------------
// Fenster-Zaehler (atomar per Lua)
// -----------------------------
// INCR + EXPIRE in einem Skript: ein Absturz dazwischen kann keinen Zaehler
// ohne TTL hinterlassen. Schluessel ohne TTL (TTL -1) bekommen das Fenster
// nachtraeglich gesetzt.
export const INCR_WINDOW_SCRIPT = `
local count = redis.call("INCR", KEYS[1])
local ttl = redis.call("TTL", KEYS[1])
if count == 1 or ttl < 0 then
  redis.call("EXPIRE", KEYS[1], ARGV[1])
  ttl = tonumber(ARGV[1])
end
return { count, ttl }
`;

export async function incrWindowAtomic(
  redis: Pick<Redis, "eval">,
  keyName: string,
  windowSec: number,
): Promise<WindowCounter> {
  const reply = await redis.eval(INCR_WINDOW_SCRIPT, 1, keyName, windowSec);
  if (!Array.isArray(reply)) throw new Error("redis_window_reply_invalid");

  const [count, ttl]: unknown[] = reply;
  if (typeof count !== "number" || typeof ttl !== "number") {
    throw new Error("redis_window_reply_invalid");
  }
  return { count, ttl };
}

// -----------------------------
// CacheStore auf Redis
// -----------------------------
export function createRedisCacheStore(redis: Redis = getRedis()): CacheStore {
  return {
    async acquireLock(key: string, ttlSec: number): Promise<boolean> {
      const result = await redis.set(redisKey(key), "1", "EX", Math.max(1, ttlSec), "NX");
      return result === "OK";
    },

    async releaseLock(key: string): Promise<void> {
      await redis.del(redisKey(key));
    },

    async incrWindow(key: string, windowSec: number): Promise<WindowCounter> {
      return incrWindowAtomic(redis, redisKey(key), windowSec);
    },

    async blacklistAdd(jti: string, ttlSec: number): Promise<void> {
      await redis.set(redisKey(`bl:access:${jti}`), "1", "EX", Math.max(1, ttlSec));
    },

    async blacklistHas(jti: string): Promise<boolean> {
      return (await redis.exists(redisKey(`bl:access:${jti}`))) === 1;
    },

    health: redisHealth,
  };
}
