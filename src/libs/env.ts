// src/libs/env.ts
// ============================================================================
// Zentrale Umgebungsvariablen-Verwaltung (Docker + Secrets-first) mit Zod
// ----------------------------------------------------------------------------
// Ziele
// - Keine .env-Abhängigkeit (kein dotenv)
// - Secrets bevorzugt aus *_FILE (Docker secrets) lesen
// - Fail-fast nur beim echten Service-Start (nicht bei Test-Imports)
// - Keine Secret-Werte loggen (nur [set]/[unset])
// ============================================================================

import { readFileSync } from "node:fs";
import { z } from "zod";

// ----------------------------------------------------------------------------
// Helpers: Secrets lesen
// ----------------------------------------------------------------------------

/**
 * Liest ein Secret aus einer Datei (Docker secrets: /run/secrets/*).
 * Wirft, wenn die Datei nicht lesbar oder leer ist.
 */
function readSecretFile(filePath: string | undefined, label: string): string | undefined {
  if (!filePath) return undefined;

  let value: string;
  try {
    value = readFileSync(filePath, "utf8");
  } catch {
    throw new Error(`${label} nicht lesbar: ${filePath}`);
  }

  const trimmed = value.replace(/\r?\n+$/, "").trim();
  if (!trimmed) throw new Error(`${label} ist leer: ${filePath}`);

  return trimmed;
}

/** *_FILE wird bevorzugt gelesen, ENV ist Fallback. */
function resolveFromFileOrEnv(opts: {
  envValue?: string;
  filePath?: string;
  label: string;
}): string | undefined {
  const fromFile = readSecretFile(opts.filePath, opts.label);
  if (fromFile && fromFile.trim() !== "") return fromFile;
  if (opts.envValue && opts.envValue.trim() !== "") return opts.envValue;
  return undefined;
}

function mask(value: unknown): string {
  if (value === undefined || value === null || value === "") return "[unset]";
  return "[set]";
}

// "0"/"false" sollen wirklich false sein (z.coerce.boolean macht daraus true)
const booleanFlag = (fallback: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .optional()
    .transform((value) => {
      if (value === undefined || value === "") return fallback;
      if (typeof value === "boolean") return value;
      return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
    });

// ----------------------------------------------------------------------------
// Schema: erwartet ENV + optional *_FILE
// ----------------------------------------------------------------------------

const EnvSchema = z.object({
  // --------------------------------------------------------------------------
  // Laufzeit / Server
  // --------------------------------------------------------------------------
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.string().default("info"),
  SERVICE_NAME: z.string().default("loyalty-api"),

  // --------------------------------------------------------------------------
  // CORS / Debug
  // --------------------------------------------------------------------------
  CORS_ORIGIN: z.string().default("*"),
  REQUEST_ID_HEADER: z.string().default("x-request-id"),
  TRUST_PROXY: booleanFlag(true),
  OPENAPI_ENABLED: booleanFlag(true),
  METRICS_ENABLED: booleanFlag(true),

  // --------------------------------------------------------------------------
  // Redis
  // - entweder REDIS_URL komplett
  // - oder granular (HOST/PORT/USERNAME/PASSWORD)
  // --------------------------------------------------------------------------
  REDIS_URL: z.string().optional(),
  REDIS_HOST: z.string().optional(),
  REDIS_PORT: z.coerce.number().int().optional(),
  REDIS_USERNAME: z.string().optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_PASSWORD_FILE: z.string().optional(),
  REDIS_NAMESPACE: z.string().default("loyalty"),

  // --------------------------------------------------------------------------
  // PostgreSQL
  // --------------------------------------------------------------------------
  DATABASE_URL: z.string().optional(),
  DATABASE_URL_FILE: z.string().optional(),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),

  // --------------------------------------------------------------------------
  // HTTP Rate Limit
  // --------------------------------------------------------------------------
  RATE_LIMIT_WINDOW: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_AUTH_MAX: z.coerce.number().int().positive().default(10),

  // --------------------------------------------------------------------------
  // OTP
  // --------------------------------------------------------------------------
  OTP_TTL_SEC: z.coerce.number().int().positive().default(300),
  OTP_COOLDOWN_SEC: z.coerce.number().int().positive().default(30),
  OTP_QUOTA_MAX: z.coerce.number().int().positive().default(10),
  OTP_QUOTA_WINDOW_SEC: z.coerce.number().int().positive().default(10_800),
  OTP_LENGTH: z.coerce.number().int().min(4).max(10).default(6),
  OTP_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),

  // --------------------------------------------------------------------------
  // SMS-Gateway
  // - log: Code landet nur im Log (Entwicklung)
  // - http: POST JSON an SMS_GATEWAY_URL
  // --------------------------------------------------------------------------
  SMS_PROVIDER: z.enum(["log", "http"]).default("log"),
  SMS_GATEWAY_URL: z.string().url().optional(),
  SMS_GATEWAY_TOKEN: z.string().optional(),
  SMS_GATEWAY_TOKEN_FILE: z.string().optional(),
  SMS_SENDER: z.string().default("Loyalty"),
  SMS_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),

  // --------------------------------------------------------------------------
  // JWT
  // - active/previous erlaubt Secret-Rotation ohne Downtime
  // --------------------------------------------------------------------------
  JWT_SECRET_ACTIVE: z.string().optional(),
  JWT_SECRET_ACTIVE_FILE: z.string().optional(),
  JWT_SECRET_PREVIOUS: z.string().optional(),
  JWT_SECRET_PREVIOUS_FILE: z.string().optional(),
  TOKEN_PEPPER_ACTIVE: z.string().optional(),
  TOKEN_PEPPER_ACTIVE_FILE: z.string().optional(),
  TOKEN_PEPPER_PREVIOUS: z.string().optional(),
  TOKEN_PEPPER_PREVIOUS_FILE: z.string().optional(),

  // Legacy-Variablen
  JWT_SECRET: z.string().optional(),
  JWT_SECRET_FILE: z.string().optional(),
  JWT_ACTIVE_KID: z.string().optional(),

  JWT_ISSUER: z.string().default("loyalty-api"),
  JWT_AUDIENCE: z.string().default("loyalty"),
  JWT_ACCESS_TTL: z.coerce.number().int().positive().default(60 * 60 * 24 * 7),
  REFRESH_TOKEN_TTL: z.coerce.number().int().positive().default(60 * 60 * 24 * 14),
  JWT_CLOCK_SKEW_SEC: z.coerce.number().int().min(0).max(300).default(60),

  STARTUP_VALIDATE_ENV: z.string().optional(),
});

// ----------------------------------------------------------------------------
// Secret-Resolution: *_FILE → konkrete Werte
// ----------------------------------------------------------------------------

const resolvedRedisPassword = resolveFromFileOrEnv({
  envValue: process.env.REDIS_PASSWORD,
  filePath: process.env.REDIS_PASSWORD_FILE,
  label: "REDIS_PASSWORD_FILE",
});

const resolvedDatabaseUrl = resolveFromFileOrEnv({
  envValue: process.env.DATABASE_URL,
  filePath: process.env.DATABASE_URL_FILE,
  label: "DATABASE_URL_FILE",
});

const resolvedSmsGatewayToken = resolveFromFileOrEnv({
  envValue: process.env.SMS_GATEWAY_TOKEN,
  filePath: process.env.SMS_GATEWAY_TOKEN_FILE,
  label: "SMS_GATEWAY_TOKEN_FILE",
});

const resolvedJwtSecretActive = resolveFromFileOrEnv({
  envValue: process.env.JWT_SECRET_ACTIVE ?? process.env.JWT_SECRET,
  filePath: process.env.JWT_SECRET_ACTIVE_FILE ?? process.env.JWT_SECRET_FILE,
  label: "JWT_SECRET_ACTIVE_FILE",
});

const resolvedJwtSecretPrevious = resolveFromFileOrEnv({
  envValue: process.env.JWT_SECRET_PREVIOUS,
  filePath: process.env.JWT_SECRET_PREVIOUS_FILE,
  label: "JWT_SECRET_PREVIOUS_FILE",
});

const resolvedTokenPepperActive = resolveFromFileOrEnv({
  envValue: process.env.TOKEN_PEPPER_ACTIVE ?? process.env.TOKEN_PEPPER,
  filePath: process.env.TOKEN_PEPPER_ACTIVE_FILE ?? process.env.TOKEN_PEPPER_FILE,
  label: "TOKEN_PEPPER_ACTIVE_FILE",
});

const resolvedTokenPepperPrevious = resolveFromFileOrEnv({
  envValue: process.env.TOKEN_PEPPER_PREVIOUS,
  filePath: process.env.TOKEN_PEPPER_PREVIOUS_FILE,
  label: "TOKEN_PEPPER_PREVIOUS_FILE",
});

// ----------------------------------------------------------------------------
// Parse & Normalize
// ----------------------------------------------------------------------------

const raw = EnvSchema.parse({
  ...process.env,
  REDIS_PASSWORD: resolvedRedisPassword,
  DATABASE_URL: resolvedDatabaseUrl,
  SMS_GATEWAY_TOKEN: resolvedSmsGatewayToken,
  JWT_SECRET_ACTIVE: resolvedJwtSecretActive,
  JWT_SECRET_PREVIOUS: resolvedJwtSecretPrevious,
  TOKEN_PEPPER_ACTIVE: resolvedTokenPepperActive,
  TOKEN_PEPPER_PREVIOUS: resolvedTokenPepperPrevious,
  JWT_SECRET: resolvedJwtSecretActive,
});

/**
 * Baut eine Redis-URL aus granularen Feldern, falls REDIS_URL nicht gesetzt ist.
 */
function buildRedisUrl(input: {
  REDIS_URL?: string;
  REDIS_HOST?: string;
  REDIS_PORT?: number;
  REDIS_USERNAME?: string;
  REDIS_PASSWORD?: string;
}): string | undefined {
  if (input.REDIS_URL) return input.REDIS_URL;

  const { REDIS_HOST, REDIS_PORT, REDIS_USERNAME, REDIS_PASSWORD } = input;
  if (!REDIS_HOST || !REDIS_PORT) return undefined;

  if (!REDIS_PASSWORD) return `redis://${REDIS_HOST}:${REDIS_PORT}`;

  const u = encodeURIComponent(REDIS_USERNAME ?? "default");
  const p = encodeURIComponent(REDIS_PASSWORD);
  return `redis://${u}:${p}@${REDIS_HOST}:${REDIS_PORT}`;
}

export const env = {
  ...raw,
  REQUEST_ID_HEADER: raw.REQUEST_ID_HEADER.toLowerCase(),
  REDIS_URL: buildRedisUrl(raw),
};

// ----------------------------------------------------------------------------
// Fail-fast: nur wenn Service wirklich startet
// ----------------------------------------------------------------------------
//
// Vitest importiert Module, bevor Setup-Dateien laufen → nicht in test crashen.
//
// Schalter:
// - STARTUP_VALIDATE_ENV=1 -> immer validieren (typisch im Container)
// - sonst: validate in development/production, nicht in test
//
const shouldValidate =
  process.env.STARTUP_VALIDATE_ENV === "1" ? true : env.NODE_ENV !== "test";

if (shouldValidate) {
  if (!env.DATABASE_URL) {
    throw new Error("DATABASE_URL fehlt: setze DATABASE_URL oder DATABASE_URL_FILE.");
  }
  if (!env.REDIS_URL) {
    throw new Error(
      "Redis-Konfiguration fehlt: setze REDIS_URL oder REDIS_HOST/REDIS_PORT (optional REDIS_PASSWORD_FILE).",
    );
  }

  if (env.NODE_ENV === "production" && !env.JWT_SECRET_ACTIVE) {
    throw new Error("JWT Secret fehlt: setze JWT_SECRET_ACTIVE oder JWT_SECRET_ACTIVE_FILE.");
  }
  if (env.NODE_ENV === "production" && !env.TOKEN_PEPPER_ACTIVE) {
    throw new Error("OTP-Pepper fehlt: setze TOKEN_PEPPER_ACTIVE oder TOKEN_PEPPER_ACTIVE_FILE.");
  }

  if (env.SMS_PROVIDER === "http" && !env.SMS_GATEWAY_URL) {
    throw new Error("SMS_GATEWAY_URL fehlt: ist Pflicht fuer SMS_PROVIDER=http.");
  }

  if (env.NODE_ENV === "production" && env.SMS_PROVIDER === "log") {
    // eslint-disable-next-line no-console
    console.warn("[env] WARNUNG: SMS_PROVIDER=log in Production verschickt keine SMS.");
  }

  if (env.NODE_ENV === "production" && env.CORS_ORIGIN === "*") {
    // eslint-disable-next-line no-console
    console.warn("[env] WARNUNG: In Production sollte CORS_ORIGIN nicht '*' sein.");
  }
}

// ----------------------------------------------------------------------------
// Debug-Ausgabe ohne Secrets
// ----------------------------------------------------------------------------

/**
 * Sichere Zusammenfassung der Konfiguration (ohne Secrets),
 * wird beim Startup einmal geloggt.
 */
export function logEnvSummary(
  log: (msg: string, extra?: unknown) => void = console.info,
) {
  const summary = {
    NODE_ENV: env.NODE_ENV,
    HOST: env.HOST,
    PORT: env.PORT,
    LOG_LEVEL: env.LOG_LEVEL,

    CORS_ORIGIN: env.CORS_ORIGIN,
    REQUEST_ID_HEADER: env.REQUEST_ID_HEADER,
    TRUST_PROXY: env.TRUST_PROXY,
    OPENAPI_ENABLED: env.OPENAPI_ENABLED,
    METRICS_ENABLED: env.METRICS_ENABLED,

    REDIS_URL: mask(env.REDIS_URL),
    REDIS_NAMESPACE: env.REDIS_NAMESPACE,
    DATABASE_URL: mask(env.DATABASE_URL),

    RATE_LIMIT_WINDOW: env.RATE_LIMIT_WINDOW,
    RATE_LIMIT_MAX: env.RATE_LIMIT_MAX,
    RATE_LIMIT_AUTH_MAX: env.RATE_LIMIT_AUTH_MAX,

    OTP_TTL_SEC: env.OTP_TTL_SEC,
    OTP_COOLDOWN_SEC: env.OTP_COOLDOWN_SEC,
    OTP_QUOTA_MAX: env.OTP_QUOTA_MAX,
    OTP_QUOTA_WINDOW_SEC: env.OTP_QUOTA_WINDOW_SEC,
    OTP_LENGTH: env.OTP_LENGTH,
    OTP_MAX_ATTEMPTS: env.OTP_MAX_ATTEMPTS,

    SMS_PROVIDER: env.SMS_PROVIDER,
    SMS_GATEWAY_URL: env.SMS_GATEWAY_URL ?? "[unset]",
    SMS_GATEWAY_TOKEN: mask(env.SMS_GATEWAY_TOKEN),

    JWT_SECRET_ACTIVE: mask(env.JWT_SECRET_ACTIVE),
    JWT_SECRET_PREVIOUS: mask(env.JWT_SECRET_PREVIOUS),
    TOKEN_PEPPER_ACTIVE: mask(env.TOKEN_PEPPER_ACTIVE),
    TOKEN_PEPPER_PREVIOUS: mask(env.TOKEN_PEPPER_PREVIOUS),
    JWT_ACTIVE_KID: env.JWT_ACTIVE_KID ?? "[unset]",
    JWT_ISSUER: env.JWT_ISSUER,
    JWT_AUDIENCE: env.JWT_AUDIENCE,
    JWT_ACCESS_TTL: env.JWT_ACCESS_TTL,
    REFRESH_TOKEN_TTL: env.REFRESH_TOKEN_TTL,
    JWT_CLOCK_SKEW_SEC: env.JWT_CLOCK_SKEW_SEC,
  };

  log("[env] configuration summary", summary);
}

export type Env = typeof env;
