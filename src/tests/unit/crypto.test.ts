import { createHmac } from "node:crypto";
import { describe, expect, it } from "vitest";
import {
  generateNumericCode,
  hashOpaqueToken,
  hashOtpCode,
  hashPassword,
  matchesOtpHash,
  verifyPassword,
} from "../../libs/crypto.js";

describe("OTP hashing", () => {
  it("uses HMAC-SHA256 with the active pepper", () => {
    const expected = createHmac("sha256", "test-pepper").update("123456", "utf8").digest("hex");
    expect(hashOtpCode("123456")).toBe(expected);
  });

  it("matches only the same code", () => {
    const stored = hashOtpCode("123456");
    expect(matchesOtpHash("123456", stored)).toBe(true);
    expect(matchesOtpHash("654321", stored)).toBe(false);
  });

  it("does not match a hash made with an unknown pepper", () => {
    const stored = hashOtpCode("123456", "other-pepper");
    expect(matchesOtpHash("123456", stored)).toBe(false);
  });

  it("generates numeric codes of the requested length", () => {
    for (let i = 0; i < 20; i += 1) {
      expect(generateNumericCode(6)).toMatch(/^\d{6}$/);
    }
    expect(generateNumericCode(4)).toMatch(/^\d{4}$/);
  });
});

describe("opaque token hashing", () => {
  it("is plain SHA-256 hex", () => {
    expect(hashOpaqueToken("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    );
  });
});

describe("password hashing", () => {
  it("verifies the right password only", async () => {
    const hash = await hashPassword("Owner-Pass-1");
    expect(hash.startsWith("$argon2id$")).toBe(true);
    await expect(verifyPassword(hash, "Owner-Pass-1")).resolves.toBe(true);
    await expect(verifyPassword(hash, "wrong")).resolves.toBe(false);
  });

  it("treats a malformed hash as mismatch", async () => {
    await expect(verifyPassword("not-a-hash", "anything")).resolves.toBe(false);
  });
});
