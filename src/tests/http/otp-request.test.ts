// tests/http/otp-request.test.ts
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildTestApp, type TestContext } from "../support/test-app.js";

const PHONE = "+79991234567";
const START = Date.parse("2026-03-01T10:00:00.000Z");

let ctx: TestContext;

describe("POST /api/v1/auth", () => {
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

  it("sends an OTP for a web login", async () => {
    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      payload: { phone: "+7 (999) 123-45-67" },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ success: true, message: "OTP sent successfully." });
    expect(ctx.sms.sent).toHaveLength(1);
    expect(ctx.sms.sent[0]?.phone).toBe(PHONE);
    expect(ctx.otps.codes[0]).toMatchObject({ phone: PHONE, realm: "web", businessCode: null });
  });

  it("takes the business from X-Business-ID", async () => {
    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      headers: { "x-business-id": "CAFE1" },
      payload: { phone: PHONE },
    });

    expect(res.statusCode).toBe(200);
    expect(ctx.otps.codes[0]).toMatchObject({ realm: "mobile", businessCode: "CAFE1" });
  });

  it("rejects an invalid phone number", async () => {
    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      payload: { phone: "12" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      description: "Bad Request",
      status: 400,
      message: "Invalid phone number",
    });
    expect(ctx.sms.sent).toHaveLength(0);
  });

  it("rejects a missing phone number with details", async () => {
    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      payload: {},
    });

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.message).toBe("Invalid phone number");
    expect(body.details.fieldErrors.phone).toEqual(["Invalid phone number"]);
  });

  it("requires a request body", async () => {
    const res = await ctx.app.inject({ method: "POST", url: "/api/v1/auth" });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe("Request body is required.");
  });

  it("answers 503 during the cooldown", async () => {
    const first = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      payload: { phone: PHONE },
    });
    expect(first.statusCode).toBe(200);

    vi.setSystemTime(START + 29_000);
    const second = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      payload: { phone: PHONE },
    });

    expect(second.statusCode).toBe(503);
    expect(second.json()).toEqual({
      description: "Service Unavailable",
      status: 503,
      message: "Too many SMS",
    });
    expect(ctx.sms.sent).toHaveLength(1);
  });

  it("allows a new code after the cooldown and supersedes the old one", async () => {
    await ctx.app.inject({ method: "POST", url: "/api/v1/auth", payload: { phone: PHONE } });

    vi.setSystemTime(START + 31_000);
    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      payload: { phone: PHONE },
    });

    expect(res.statusCode).toBe(200);
    expect(ctx.otps.codes).toHaveLength(2);
    expect(ctx.otps.codes[0]?.revokedAt).not.toBeNull();
    expect(ctx.otps.codes[1]?.revokedAt).toBeNull();
  });

  it("stops after ten codes in the quota window", async () => {
    for (let i = 0; i < 10; i += 1) {
      vi.setSystemTime(START + i * 31_000);
      const res = await ctx.app.inject({
        method: "POST",
        url: "/api/v1/auth",
        payload: { phone: PHONE },
      });
      expect(res.statusCode).toBe(200);
    }

    vi.setSystemTime(START + 10 * 31_000);
    const blocked = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      payload: { phone: PHONE },
    });

    expect(blocked.statusCode).toBe(503);
    expect(blocked.json().message).toBe("Too many SMS");
    expect(ctx.sms.sent).toHaveLength(10);
  });

  it("requires a business for the mobile realm", async () => {
    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      payload: { phone: PHONE, realm: "mobile" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe("The business ID is required.");
  });

  it("rejects an unknown business", async () => {
    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      payload: { phone: PHONE, business: "NOPE" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe("Business does not exist");
  });

  it("rejects differing body and header business", async () => {
    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      headers: { "x-business-id": "CAFE2" },
      payload: { phone: PHONE, business: "CAFE1" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe("Business ID mismatch");
  });

  it("rejects a malformed X-Business-ID header", async () => {
    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      headers: { "x-business-id": "not a code!" },
      payload: { phone: PHONE },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe("Invalid X-Business-ID header.");
  });

  it("accepts only uppercase alphanumeric business codes", async () => {
    for (const business of ["cafe1", "CAFE_1", "CAFE-1"]) {
      const res = await ctx.app.inject({
        method: "POST",
        url: "/api/v1/auth",
        payload: { phone: PHONE, business },
      });
      expect(res.statusCode).toBe(400);
      expect(res.json().message).toBe("Invalid business ID");
    }

    const header = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      headers: { "x-business-id": "cafe1" },
      payload: { phone: PHONE },
    });
    expect(header.statusCode).toBe(400);
    expect(header.json().message).toBe("Invalid X-Business-ID header.");
  });

  it("rejects an unknown realm", async () => {
    const res = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      payload: { phone: PHONE, realm: "admin" },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe("Invalid realm");
  });

  it("answers 502 and frees the cooldown when the SMS gateway fails", async () => {
    ctx.sms.failNext = true;

    const failed = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      payload: { phone: PHONE },
    });

    expect(failed.statusCode).toBe(502);
    expect(failed.json()).toEqual({
      description: "Bad Gateway",
      status: 502,
      message: "SMS delivery failed",
    });
    expect(ctx.otps.codes[0]?.revokedAt).not.toBeNull();

    const retry = await ctx.app.inject({
      method: "POST",
      url: "/api/v1/auth",
      payload: { phone: PHONE },
    });
    expect(retry.statusCode).toBe(200);
  });
});
