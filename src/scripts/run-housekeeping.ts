// src/scripts/run-housekeeping.ts
// ============================================================================
// Abgelaufene OTP-Codes und Tokens loeschen (Cron / manuell)
//   node dist/scripts/run-housekeeping.js [--grace-hours=24]
// ============================================================================

import { closeDb, pool } from "../libs/db.js";
import { createPgOtpRepository } from "../modules/otp/repository.js";
import { createPgTokenRepository } from "../modules/tokens/repository.js";

function readArg(name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = process.argv.find((value) => value.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

async function main() {
  const graceHours = Number(readArg("grace-hours") ?? 24);
  if (!Number.isFinite(graceHours) || graceHours < 0) {
    throw new Error("--grace-hours must be a non-negative number.");
  }

  // Blacklist-Eintraege laufen in Redis selbst ab, hier nur Postgres
  const before = new Date(Date.now() - graceHours * 3600 * 1000);

  try {
    const otps = await createPgOtpRepository(pool).deleteExpired(before);
    const tokens = await createPgTokenRepository(pool).deleteExpired(before);

    console.log("housekeeping", {
      before: before.toISOString(),
      otp_codes: otps,
      refresh_tokens: tokens.refresh,
      access_tokens: tokens.access,
    });
  } finally {
    await closeDb();
  }
}

main().catch((err) => {
  console.error("housekeeping_failed", err);
  process.exit(1);
});
