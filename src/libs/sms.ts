// src/libs/sms.ts
// ============================================================================
// SMS-Versand (Provider austauschbar)
// ----------------------------------------------------------------------------
// - log:  Code wird nur geloggt (lokale Entwicklung)
// - http: POST JSON { to, sender, message } an SMS_GATEWAY_URL
// Fehler beim Versand werden als SmsDeliveryError (502) geworfen.
// ============================================================================

import type { FastifyBaseLogger } from "fastify";
import { env } from "./env.js";
import { ApiError } from "./errors.js";
import { maskPhone } from "./phone.js";

export interface SmsSender {
  readonly provider: string;
  sendOtp(phone: string, code: string, ttlSec: number): Promise<void>;
}

export class SmsDeliveryError extends ApiError {
  constructor() {
    super(502, "SMS delivery failed");
    this.name = "SmsDeliveryError";
  }
}

export function otpMessage(code: string, ttlSec: number): string {
  const minutes = Math.max(1, Math.ceil(ttlSec / 60));
  return `Your verification code is ${code}. It expires in ${minutes} min.`;
}

// ---------------------------------------------------------------------------
// log-Provider
// ---------------------------------------------------------------------------

export class LogSmsSender implements SmsSender {
  readonly provider = "log";

  constructor(private readonly log: FastifyBaseLogger) {}

  async sendOtp(phone: string, code: string, ttlSec: number): Promise<void> {
    this.log.warn(
      { phone: maskPhone(phone), message: otpMessage(code, ttlSec) },
      "sms_log_provider",
    );
  }
}

// ---------------------------------------------------------------------------
// http-Provider
// ---------------------------------------------------------------------------

export type HttpSmsOptions = {
  url: string;
  token?: string;
  sender: string;
  timeoutMs: number;
};

export class HttpSmsSender implements SmsSender {
  readonly provider = "http";

  constructor(
    private readonly opts: HttpSmsOptions,
    private readonly log: FastifyBaseLogger,
  ) {}

  async sendOtp(phone: string, code: string, ttlSec: number): Promise<void> {
    let res: Response;
    try {
      res = await fetch(this.opts.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...(this.opts.token ? { Authorization: `Bearer ${this.opts.token}` } : {}),
        },
        body: JSON.stringify({
          to: phone,
          sender: this.opts.sender,
          message: otpMessage(code, ttlSec),
        }),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
    } catch (err) {
      this.log.error({ err, phone: maskPhone(phone) }, "sms_gateway_unreachable");
      throw new SmsDeliveryError();
    }

    if (!res.ok) {
      this.log.error(
        { status: res.status, phone: maskPhone(phone) },
        "sms_gateway_rejected",
      );
      throw new SmsDeliveryError();
    }

    this.log.info({ phone: maskPhone(phone) }, "sms_sent");
  }
}

export function createSmsSender(log: FastifyBaseLogger): SmsSender {
  if (env.SMS_PROVIDER === "http" && env.SMS_GATEWAY_URL) {
    return new HttpSmsSender(
      {
        url: env.SMS_GATEWAY_URL,
        token: env.SMS_GATEWAY_TOKEN,
        sender: env.SMS_SENDER,
        timeoutMs: env.SMS_TIMEOUT_MS,
      },
      log,
    );
  }
  return new LogSmsSender(log);
}
