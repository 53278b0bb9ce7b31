import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { hashOtpCode } from "../../libs/crypto.js";
import { SmsDeliveryError } from "../../libs/sms.js";
import {
  otpScopeKey,
  requestOtp,
  resolveOtpScope,
  SmsCooldownError,
  verifyOtpCode,
} from "../../modules/otp/service.js";
import type { OtpScope, OtpSettings } from "../../modules/otp/types.js";
import { MemoryCacheStore } from "../support/memory-cache.js";
import {
  MemoryBusinessRepository,
  MemoryOtpRepository,
} from "../support/memory-repositories.js";
import { RecordingSmsSender } from "../support/recording-sms.js";

const PHONE = "+79991234567";

const SETTINGS: OtpSettings = {
  ttlSec: 300,
  cooldownSec: 30,
  quotaMax: 3,
  quotaWindowSec: 3600,
  length: 6,
  maxAttempts: 3,
};

const WEB_SCOPE: OtpScope = { phone: PHONE, realm: "web", businessCode: null };

describe("resolveOtpScope", () => {
  let businesses: MemoryBusinessRepository;

  beforeEach(async () => {
    businesses = new MemoryBusinessRepository();
    await businesses.create({ code: "CAFE1", name: "Cafe One", ownerId: null }, new Date());
  });

  it("normalises the phone and defaults to web without business", async () => {
    const { scope, business } = await resolveOtpScope(businesses, { phone: "+7 999 123-45-67" });
    expect(scope).toEqual({ phone: PHONE, realm: "web", businessCode: null });
    expect(business).toBeNull();
  });

  it("defaults to mobile when a business is given", async () => {
    const { scope, business } = await resolveOtpScope(businesses, {
      phone: PHONE,
      headerBusiness: "CAFE1",
    });
    expect(scope).toEqual({ phone: PHONE, realm: "mobile", businessCode: "CAFE1" });
    expect(business?.name).toBe("Cafe One");
  });

  it("ignores the business for web", async () => {
    const { scope } = await resolveOtpScope(businesses, {
      phone: PHONE,
      realm: "web",
      business: "CAFE1",
    });
    expect(scope.businessCode).toBeNull();
  });

  it("rejects invalid phones", async () => {
    await expect(resolveOtpScope(businesses, { phone: "123" })).rejects.toThrow(
      "Invalid phone number",
    );
  });

  it("rejects differing body and header business", async () => {
    await expect(
      resolveOtpScope(businesses, { phone: PHONE, business: "CAFE1", headerBusiness: "CAFE2" }),
    ).rejects.toThrow("Business ID mismatch");
  });

  it("requires a business for mobile", async () => {
    await expect(
      resolveOtpScope(businesses, { phone: PHONE, realm: "mobile" }),
    ).rejects.toThrow("The business ID is required.");
  });

  it("rejects unknown businesses", async () => {
    await expect(
      resolveOtpScope(businesses, { phone: PHONE, business: "NOPE" }),
    ).rejects.toThrow("Business does not exist");
  });
});

describe("otpScopeKey", () => {
  it("separates realms and businesses", () => {
    const web = otpScopeKey(WEB_SCOPE);
    const mobile = otpScopeKey({ phone: PHONE, realm: "mobile", businessCode: "CAFE1" });
    expect(web).toMatch(/^[0-9a-f]{64}$/);
    expect(web).not.toBe(mobile);
  });
});

describe("requestOtp", () => {
  let otps: MemoryOtpRepository;
  let cache: MemoryCacheStore;
  let sms: RecordingSmsSender;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-03-01T10:00:00.000Z"));
    otps = new MemoryOtpRepository();
    cache = new MemoryCacheStore();
    sms = new RecordingSmsSender();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("stores only the hash and sends the code", async () => {
    const result = await requestOtp({ otps, cache, sms }, SETTINGS, WEB_SCOPE);

    expect(sms.sent).toHaveLength(1);
    const code = sms.lastCodeFor(PHONE);
    expect(code).toMatch(/^\d{6}$/);
    expect(sms.sent[0]?.ttlSec).toBe(300);

    expect(otps.codes).toHaveLength(1);
    expect(otps.codes[0]?.codeHash).toBe(hashOtpCode(code));
    expect(otps.codes[0]?.codeHash).not.toBe(code);
    expect(result.expiresAt.toISOString()).toBe("2026-03-01T10:05:00.000Z");
  });

  it("enforces the cooldown per scope", async () => {
    await requestOtp({ otps, cache, sms }, SETTINGS, WEB_SCOPE);

    await expect(requestOtp({ otps, cache, sms }, SETTINGS, WEB_SCOPE)).rejects.toBeInstanceOf(
      SmsCooldownError,
    );
    expect(sms.sent).toHaveLength(1);

    // anderer Scope ist nicht betroffen
    await requestOtp({ otps, cache, sms }, SETTINGS, {
      phone: PHONE,
      realm: "mobile",
      businessCode: "CAFE1",
    });
    expect(sms.sent).toHaveLength(2);
  });

  it("supersedes the previous code after the cooldown", async () => {
    await requestOtp({ otps, cache, sms }, SETTINGS, WEB_SCOPE);
    vi.setSystemTime(new Date("2026-03-01T10:00:31.000Z"));
    await requestOtp({ otps, cache, sms }, SETTINGS, WEB_SCOPE);

    expect(otps.codes).toHaveLength(2);
    expect(otps.codes[0]?.revokedAt?.toISOString()).toBe("2026-03-01T10:00:31.000Z");
    expect(otps.codes[1]?.revokedAt).toBeNull();

    const active = await otps.findLatestActive(WEB_SCOPE, new Date());
    expect(active?.id).toBe(otps.codes[1]?.id);
  });

  it("enforces the quota window", async () => {
    for (let i = 0; i < 3; i += 1) {
      vi.setSystemTime(new Date(Date.parse("2026-03-01T10:00:00.000Z") + i * 31_000));
      await requestOtp({ otps, cache, sms }, SETTINGS, WEB_SCOPE);
    }

    vi.setSystemTime(new Date(Date.parse("2026-03-01T10:00:00.000Z") + 3 * 31_000));
    await expect(requestOtp({ otps, cache, sms }, SETTINGS, WEB_SCOPE)).rejects.toThrow(
      "Too many SMS",
    );
    expect(sms.sent).toHaveLength(3);
  });

  it("revokes the code and releases the cooldown when delivery fails", async () => {
    sms.failNext = true;

    await expect(requestOtp({ otps, cache, sms }, SETTINGS, WEB_SCOPE)).rejects.toBeInstanceOf(
      SmsDeliveryError,
    );
    expect(otps.codes[0]?.revokedAt).not.toBeNull();

    await requestOtp({ otps, cache, sms }, SETTINGS, WEB_SCOPE);
    expect(sms.sent).toHaveLength(1);
  });
});

describe("verifyOtpCode", () => {
  let otps: MemoryOtpRepository;

  beforeEach(async () => {
    otps = new MemoryOtpRepository();
    await otps.create({
      scope: WEB_SCOPE,
      codeHash: hashOtpCode("123456"),
      sentAt: new Date("2026-03-01T10:00:00.000Z"),
      expiresAt: new Date("2026-03-01T10:05:00.000Z"),
    });
  });

  it("consumes a matching code once", async () => {
    const now = new Date("2026-03-01T10:01:00.000Z");
    const used = await verifyOtpCode(otps, SETTINGS, WEB_SCOPE, "123456", now);
    expect(used.usedAt).toEqual(now);

    await expect(verifyOtpCode(otps, SETTINGS, WEB_SCOPE, "123456", now)).rejects.toThrow(
      "OTP code is expired",
    );
  });

  it("rejects expired codes", async () => {
    await expect(
      verifyOtpCode(otps, SETTINGS, WEB_SCOPE, "123456", new Date("2026-03-01T10:05:00.000Z")),
    ).rejects.toThrow("OTP code is expired");
  });

  it("does not accept the code in another scope", async () => {
    await expect(
      verifyOtpCode(
        otps,
        SETTINGS,
        { phone: PHONE, realm: "mobile", businessCode: "CAFE1" },
        "123456",
        new Date("2026-03-01T10:01:00.000Z"),
      ),
    ).rejects.toThrow("OTP code is expired");
  });

  it("revokes the code after too many wrong guesses", async () => {
    const now = new Date("2026-03-01T10:01:00.000Z");
    for (let i = 0; i < 3; i += 1) {
      await expect(verifyOtpCode(otps, SETTINGS, WEB_SCOPE, "000000", now)).rejects.toThrow(
        "OTP code is expired",
      );
    }

    expect(otps.codes[0]?.attempts).toBe(3);
    expect(otps.codes[0]?.revokedAt).toEqual(now);
    await expect(verifyOtpCode(otps, SETTINGS, WEB_SCOPE, "123456", now)).rejects.toThrow(
      "OTP code is expired",
    );
  });
});
