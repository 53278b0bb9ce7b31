// src/libs/crypto.ts
// ============================================================================
// Passwort-Hashing (argon2id), Token-/OTP-Hashes, Zufallscodes
// ============================================================================

import { createHash, createHmac, randomInt, timingSafeEqual } from "node:crypto";
import argon2 from "argon2";
import { env } from "./env.js";

// ---------------------------------------------------------------------------
// Passwort hashen / pruefen
// ---------------------------------------------------------------------------

export async function hashPassword(plain: string): Promise<string> {
  return argon2.hash(plain, {
    type: argon2.argon2id,
    memoryCost: 2 ** 16, // 64 MiB
    timeCost: 3,
    parallelism: 1,
  });
}

export async function verifyPassword(
  hash: string,
  plain: string,
): Promise<boolean> {
  try {
    return await argon2.verify(hash, plain);
  } catch {
    // kaputter/fremder Hash zaehlt als Fehlversuch
    return false;
  }
}

// ---------------------------------------------------------------------------
// Opaque-Token hashen (Refresh)
// ---------------------------------------------------------------------------

export function hashOpaqueToken(token: string): string {
  return createHash("sha256").update(token, "utf8").digest("hex");
}

// ---------------------------------------------------------------------------
// OTP: HMAC mit Pepper (active/previous fuer Rotation)
// ---------------------------------------------------------------------------

export function hashOtpCode(code: string, pepper: string | undefined = env.TOKEN_PEPPER_ACTIVE): string {
  if (pepper && pepper.length > 0) {
    return createHmac("sha256", pepper).update(code, "utf8").digest("hex");
  }
  return hashOpaqueToken(code);
}

export function hashOtpCodeCandidates(code: string): string[] {
  const hashes = new Set<string>();
  hashes.add(hashOtpCode(code, env.TOKEN_PEPPER_ACTIVE));
  if (env.TOKEN_PEPPER_PREVIOUS) {
    hashes.add(hashOtpCode(code, env.TOKEN_PEPPER_PREVIOUS));
  }
  return [...hashes];
}

export function matchesOtpHash(code: string, storedHash: string): boolean {
  const stored = Buffer.from(storedHash, "hex");
  return hashOtpCodeCandidates(code).some((candidate) => {
    const buf = Buffer.from(candidate, "hex");
    return buf.length === stored.length && timingSafeEqual(buf, stored);
  });
}

/** Numerischer Code aus CSPRNG, fuehrende Nullen bleiben erhalten. */
export function generateNumericCode(length: number): string {
  let code = "";
  for (let i = 0; i < length; i += 1) {
    code += String(randomInt(0, 10));
  }
  return code;
}
