import { describe, expect, it } from "vitest";
import { SignJWT, type JWTPayload } from "jose";
import { env } from "../../libs/env.js";
import { audienceForRealm, signAccessToken, verifyAccessToken } from "../../libs/jwt.js";

const encoder = new TextEncoder();
const secret = encoder.encode("test-secret");

const USER_ID = "00000000-0000-4000-8000-000000000002";
const JTI = "00000000-0000-4000-8000-000000000003";
const FAMILY_ID = "00000000-0000-4000-8000-000000000004";

function webToken(claims: JWTPayload = {}) {
  return new SignJWT({ typ: "access", realm: "web", sid: FAMILY_ID, ...claims })
    .setProtectedHeader({ alg: "HS256" })
    .setSubject(USER_ID)
    .setJti(JTI)
    .setIssuedAt()
    .setIssuer(env.JWT_ISSUER);
}

describe("access token signing", () => {
  it("binds mobile tokens to realm and business", async () => {
    const signed = await signAccessToken({
      sub: USER_ID,
      realm: "mobile",
      businessCode: "CAFE1",
      familyId: FAMILY_ID,
      ttlSec: 600,
    });

    expect(signed.exp - signed.iat).toBe(600);

    const payload = await verifyAccessToken(signed.token);
    expect(payload).toMatchObject({
      sub: USER_ID,
      jti: signed.jti,
      typ: "access",
      realm: "mobile",
      biz: "CAFE1",
      sid: FAMILY_ID,
      aud: "loyalty:mobile",
      iss: "loyalty-api",
    });
  });

  it("omits biz for web tokens", async () => {
    const signed = await signAccessToken({
      sub: USER_ID,
      realm: "web",
      businessCode: "CAFE1",
      familyId: FAMILY_ID,
      ttlSec: 600,
    });

    const payload = await verifyAccessToken(signed.token);
    expect(payload.realm).toBe("web");
    expect(payload.biz).toBeUndefined();
    expect(payload.aud).toBe(audienceForRealm("web"));
  });

  it("refuses mobile tokens without business", async () => {
    await expect(
      signAccessToken({
        sub: USER_ID,
        realm: "mobile",
        businessCode: null,
        familyId: FAMILY_ID,
        ttlSec: 600,
      }),
    ).rejects.toThrow("business_missing");
  });
});

describe("access token verification", () => {
  it("rejects a realm claim that does not match the audience", async () => {
    const token = await webToken({ realm: "mobile", biz: "CAFE1" })
      .setExpirationTime("15m")
      .setAudience("loyalty:web")
      .sign(secret);

    await expect(verifyAccessToken(token)).rejects.toThrow("realm_audience_mismatch");
  });

  it("rejects mobile tokens without biz claim", async () => {
    const token = await webToken({ realm: "mobile" })
      .setExpirationTime("15m")
      .setAudience("loyalty:mobile")
      .sign(secret);

    await expect(verifyAccessToken(token)).rejects.toThrow("business_missing");
  });

  it("rejects non-access token types", async () => {
    const token = await webToken({ typ: "refresh" })
      .setExpirationTime("15m")
      .setAudience("loyalty:web")
      .sign(secret);

    await expect(verifyAccessToken(token)).rejects.toThrow("invalid_token_type");
  });

  it("rejects tokens signed with another secret", async () => {
    const token = await webToken()
      .setExpirationTime("15m")
      .setAudience("loyalty:web")
      .sign(encoder.encode("other-secret"));

    await expect(verifyAccessToken(token)).rejects.toBeDefined();
  });

  it("rejects foreign audiences", async () => {
    const token = await webToken()
      .setExpirationTime("15m")
      .setAudience("loyalty")
      .sign(secret);

    await expect(verifyAccessToken(token)).rejects.toBeDefined();
  });
});

describe("JWT clock skew", () => {
  it("accepts token slightly in the future within tolerance", async () => {
    const token = await webToken()
      .setNotBefore("45s")
      .setExpirationTime("15m")
      .setAudience("loyalty:web")
      .sign(secret);

    await expect(verifyAccessToken(token)).resolves.toMatchObject({
      typ: "access",
      realm: "web",
      sid: FAMILY_ID,
    });
  });

  it("rejects token far in the future beyond tolerance", async () => {
    const token = await webToken()
      .setNotBefore("5m")
      .setExpirationTime("20m")
      .setAudience("loyalty:web")
      .sign(secret);

    await expect(verifyAccessToken(token)).rejects.toBeDefined();
  });
});
