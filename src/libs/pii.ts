import { createHash } from "node:crypto";

export function sha256(value: string): string {
  return createHash("sha256").update(value, "utf8").digest("hex");
}

export function hashPhoneForLog(phone: string): string {
  return sha256(phone.trim());
}

export function hashIpForLog(ip: string): string {
  return sha256(ip.trim());
}
