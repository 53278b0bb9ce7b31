// src/modules/auth/service.ts
// ============================================================================
// Authenticator
// ----------------------------------------------------------------------------
// - confirmOtp: OTP pruefen/verbrauchen -> User (und bei mobile den
//   Business-Client) anlegen falls noetig -> Token-Paar fuer Realm/Business
// - loginWithPassword: Business-Owner mit Passwort -> Token-Paar (web)
// ============================================================================

import type { AppDeps, AppSettings } from "../../container.js";
import { verifyPassword } from "../../libs/crypto.js";
import { ApiError, InvalidPhoneError } from "../../libs/errors.js";
import { recordAuthLogin, recordOtpConfirm } from "../../libs/metrics.js";
import { normalizePhone } from "../../libs/phone.js";
import { resolveOtpScope, verifyOtpCode } from "../otp/service.js";
import { issueTokenPair } from "../tokens/service.js";
import type { ConfirmInput, ConfirmResult, LoginInput, LoginResult } from "./types.js";

// Timing-Hardening: unbekannte User verifizieren gegen diesen Hash
const DUMMY_PASSWORD_HASH =
  "$argon2id$v=19$m=65536,t=3,p=1$IrPUm8rK8bWhiyu2hAQnIg$H2ht46hQgLVOe5TZB6EPU2nlPJ6jYFEbJgNUiLUbk9M";

export class LoginFailedError extends ApiError {
  constructor() {
    super(401, "Invalid credentials");
    this.name = "LoginFailedError";
  }
}

export type AuthDeps = Pick<
  AppDeps,
  "otps" | "users" | "businesses" | "tokens" | "cache"
>;

// ---------------------------------------------------------------------------
// OTP bestaetigen
// ---------------------------------------------------------------------------

export async function confirmOtp(
  deps: AuthDeps,
  settings: AppSettings,
  input: ConfirmInput,
  now: Date = new Date(),
): Promise<ConfirmResult> {
  const { scope, business } = await resolveOtpScope(deps.businesses, input);

  try {
    await verifyOtpCode(deps.otps, settings.otp, scope, input.otp, now);
  } catch (err) {
    recordOtpConfirm(false);
    throw err;
  }

  const { user, created } = await deps.users.getOrCreateByPhone(scope.phone, now);

  if (scope.realm === "mobile" && business) {
    await deps.users.getOrCreateClient(user.id, business, now);
  }

  const tokens = await issueTokenPair(
    deps,
    settings.tokens,
    {
      userId: user.id,
      realm: scope.realm,
      businessCode: scope.businessCode,
      ip: input.meta.ip,
      userAgent: input.meta.userAgent,
    },
    now,
  );

  recordOtpConfirm(true);
  return { user, userCreated: created, scope, tokens };
}

// ---------------------------------------------------------------------------
// Passwort-Login (web)
// ---------------------------------------------------------------------------

export async function loginWithPassword(
  deps: AuthDeps,
  settings: AppSettings,
  input: LoginInput,
  now: Date = new Date(),
): Promise<LoginResult> {
  const phone = normalizePhone(input.phone);
  if (!phone) throw new InvalidPhoneError();

  const user = await deps.users.findByPhone(phone);
  const ok = await verifyPassword(user?.passwordHash ?? DUMMY_PASSWORD_HASH, input.password);

  // bewusst generisch: keine Info, ob User existiert / ein Passwort hat
  if (!user || !user.passwordHash || !ok) {
    recordAuthLogin(false);
    throw new LoginFailedError();
  }

  const businesses = await deps.businesses.listByOwner(user.id);
  if (businesses.length === 0) {
    recordAuthLogin(false);
    throw new LoginFailedError();
  }

  const tokens = await issueTokenPair(
    deps,
    settings.tokens,
    {
      userId: user.id,
      realm: "web",
      businessCode: null,
      ip: input.meta.ip,
      userAgent: input.meta.userAgent,
    },
    now,
  );

  recordAuthLogin(true);
  return { user, businesses, tokens };
}
