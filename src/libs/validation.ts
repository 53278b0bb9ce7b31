// src/libs/validation.ts
// ============================================================================
// Zod-Helfer fuer Request-Bodies
// - parseBody wirft BadRequestError mit der ersten Issue-Message,
//   details = error.flatten()
// ============================================================================

import { z } from "zod";
import { BadRequestError } from "./errors.js";
import { REALMS } from "./realm.js";
import { BUSINESS_CODE_RE } from "../modules/businesses/types.js";

export function parseBody<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  fallbackMessage = "Invalid request payload.",
): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const message = parsed.error.issues[0]?.message ?? fallbackMessage;
    throw new BadRequestError(message, parsed.error.flatten());
  }
  return parsed.data;
}

export function bodyObject<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape, {
    required_error: "Request body is required.",
    invalid_type_error: "Request body must be a JSON object.",
  });
}

// Normalisierung/E.164-Pruefung passiert im Service (normalizePhone)
export const phoneField = z
  .string({
    required_error: "Invalid phone number",
    invalid_type_error: "Invalid phone number",
  })
  .min(1, "Invalid phone number")
  .max(32, "Invalid phone number");

export const realmField = z
  .enum(REALMS, { errorMap: () => ({ message: "Invalid realm" }) })
  .optional();

export const businessField = z
  .string({ invalid_type_error: "Invalid business ID" })
  .trim()
  .refine((value) => value === "" || BUSINESS_CODE_RE.test(value), "Invalid business ID")
  .nullish();

export const otpField = z
  .union([z.string(), z.number()], {
    errorMap: () => ({ message: "OTP code is required" }),
  })
  .transform((value) => String(value).trim())
  .pipe(
    z
      .string()
      .min(1, "OTP code is required")
      .max(32, "OTP code is expired"),
  );
