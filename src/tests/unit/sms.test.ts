import Fastify from "fastify";
import { afterEach, describe, expect, it, vi } from "vitest";
import { HttpSmsSender, SmsDeliveryError, otpMessage } from "../../libs/sms.js";

const log = Fastify({ logger: false }).log;

function gateway(status: number) {
  return vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
    new Response(null, { status }),
  );
}

const sender = () =>
  new HttpSmsSender(
    { url: "http://sms.test/send", token: "test-token", sender: "Loyalty", timeoutMs: 1000 },
    log,
  );

describe("SMS sender", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("formats the OTP message in whole minutes", () => {
    expect(otpMessage("123456", 300)).toBe(
      "Your verification code is 123456. It expires in 5 min.",
    );
    expect(otpMessage("123456", 30)).toBe(
      "Your verification code is 123456. It expires in 1 min.",
    );
  });

  it("posts the message to the gateway", async () => {
    const fetchMock = gateway(200);
    vi.stubGlobal("fetch", fetchMock);

    await sender().sendOtp("+79991234567", "654321", 300);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://sms.test/send");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-token",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      to: "+79991234567",
      sender: "Loyalty",
      message: "Your verification code is 654321. It expires in 5 min.",
    });
  });

  it("maps gateway rejections to SmsDeliveryError", async () => {
    vi.stubGlobal("fetch", gateway(500));

    await expect(sender().sendOtp("+79991234567", "654321", 300)).rejects.toBeInstanceOf(
      SmsDeliveryError,
    );
  });

  it("maps network errors to SmsDeliveryError", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    await expect(sender().sendOtp("+79991234567", "654321", 300)).rejects.toMatchObject({
      statusCode: 502,
      message: "SMS delivery failed",
    });
  });
});
