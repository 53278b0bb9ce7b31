// tests/http/otp-confirm.test.ts
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { verifyAccessToken } from "../../libs/jwt.js";
import { buildTestApp, type TestContext } from "../support/test-app.js";

const PHONE = "+79991234567";
const START = Date.parse("2026-03-01T10:00:00.000Z");

let ctx: TestContext;

async function requestCode(payload: Record<string, string>): Promise<string> {
  const res = await ctx.app.inject({ method: "POST", url: "/api/v1/auth", payload });
  expect(res.statusCode).toBe(200);
  return ctx.sms.lastCodeFor(PHONE);
}

function otherCode(code: string): string {
  return code === "000000" ? "111111" : "000000";
}

describe("POST /api/v1/auth/confirm", () => {
  beforeEach(async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(START);
    ctx = await buildTestApp();
    await ctx.businesses.create({ code: "CAFE1", name: "Cafe One", ownerId: null }, new Date());
  });

  afterEach(async () => {
    await ctx.app.close();
    vi.useRealTimers();
  });

  it("issues a web token pair and creates the user", async () => {
    const otp = await requestCode({ phone: PHONE });

    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth/confirm",
      payload: { phone: PHONE, otp },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(Object.keys(body).sort()).toEqual(["access_token", "refresh_token"]);

    const claims = await verifyAccessToken(body.access_token);
    expect(claims.realm).toBe("web");
    expect(claims.biz).toBeUndefined();

    const user = await ctx.users.findByPhone(PHONE);
    expect(claims.sub).toBe(user?.id);
    expect(ctx.users.clients).toHaveLength(0);
  });

  it("issues a mobile token pair bound to the business", async () => {
    const otp = await requestCode({ phone: PHONE, business: "CAFE1" });

    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth/confirm",
      headers: { "x-business-id": "CAFE1" },
      payload: { phone: PHONE, otp },
    });

    expect(res.statusCode).toBe(200);
    const claims = await verifyAccessToken(res.json().access_token);
    expect(claims.realm).toBe("mobile");
    expect(claims.biz).toBe("CAFE1");

    expect(ctx.users.clients).toHaveLength(1);
    expect(ctx.users.clients[0]).toMatchObject({ userId: claims.sub, businessCode: "CAFE1" });
  });

  it("reuses the existing user on the next login", async () => {
    const first = await requestCode({ phone: PHONE });
    await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth/confirm",
      payload: { phone: PHONE, otp: first },
    });

    vi.setSystemTime(START + 31_000);
    const second = await requestCode({ phone: PHONE });
    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth/confirm",
      payload: { phone: PHONE, otp: second },
    });

    expect(res.statusCode).toBe(200);
    expect(ctx.users.users.size).toBe(1);
  });

  it("rejects a wrong code", async () => {
    const otp = await requestCode({ phone: PHONE });

    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth/confirm",
      payload: { phone: PHONE, otp: otherCode(otp) },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      description: "Bad Request",
      status: 400,
      message: "OTP code is expired",
    });
    expect(ctx.otps.codes[0]?.attempts).toBe(1);
  });

  it("rejects a code after its lifetime", async () => {
    const otp = await requestCode({ phone: PHONE });

    vi.setSystemTime(START + 301_000);
    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth/confirm",
      payload: { phone: PHONE, otp },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe("OTP code is expired");
  });

  it("accepts a code only once", async () => {
    const otp = await requestCode({ phone: PHONE });

    const first = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth/confirm",
      payload: { phone: PHONE, otp },
    });
    const second = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth/confirm",
      payload: { phone: PHONE, otp },
    });

    expect(first.statusCode).toBe(200);
    expect(second.statusCode).toBe(400);
    expect(second.json().message).toBe("OTP code is expired");
  });

  it("lets exactly one of two concurrent confirms win", async () => {
    const otp = await requestCode({ phone: PHONE });

    const results = await Promise.all([
      ctx.app.inject({ method: "POST", url: "/api/v1/auth/confirm", payload: { phone: PHONE, otp } }),
      ctx.app.inject({ method: "POST", url: "/api/v1/auth/confirm", payload: { phone: PHONE, otp } }),
    ]);

    expect(results.map((res) => res.statusCode).sort()).toEqual([200, 400]);
    expect(ctx.tokens.refreshTokens).toHaveLength(1);
  });

  it("does not accept a web code for a business login", async () => {
    const otp = await requestCode({ phone: PHONE });

    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth/confirm",
      payload: { phone: PHONE, otp, business: "CAFE1" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe("OTP code is expired");
  });

  it("treats a non-numeric code like a wrong one", async () => {
    await requestCode({ phone: PHONE });

    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth/confirm",
      payload: { phone: PHONE, otp: "abc" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      description: "Bad Request",
      status: 400,
      message: "OTP code is expired",
    });
    expect(ctx.otps.codes[0]?.attempts).toBe(1);
  });

  it("answers an unknown scope without issued code as expired", async () => {
    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth/confirm",
      payload: { phone: PHONE, otp: "12ab" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe("OTP code is expired");
  });

  it("requires a non-empty code", async () => {
    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth/confirm",
      payload: { phone: PHONE, otp: "  " },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe("OTP code is required");
  });

  it("rejects an invalid phone number before looking up codes", async () => {
    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth/confirm",
      payload: { phone: "abc", otp: "123456" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe("Invalid phone number");
  });
});
