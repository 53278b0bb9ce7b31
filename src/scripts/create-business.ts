// src/scripts/create-business.ts
// ============================================================================
// Business + Owner anlegen (Owner loggt sich per /api/v1/auth/login ein)
//   node dist/scripts/create-business.js --phone=+79991234567 \
//     --password=... --code=CAFE01 --name="Cafe"
// Existiert der Owner schon, wird nur das Passwort gesetzt.
// ============================================================================

import { hashPassword } from "../libs/crypto.js";
import { closeDb, pool } from "../libs/db.js";
import { normalizePhone } from "../libs/phone.js";
import { createPgBusinessRepository } from "../modules/businesses/repository.js";
import { BUSINESS_CODE_RE } from "../modules/businesses/types.js";
import { createPgUserRepository } from "../modules/users/repository.js";

function readArg(name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = process.argv.find((value) => value.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

function requireArg(name: string): string {
  const value = readArg(name)?.trim();
  if (!value) throw new Error(`--${name} is required.`);
  return value;
}

async function main() {
  const phone = normalizePhone(requireArg("phone"));
  if (!phone) throw new Error("--phone is not a valid phone number.");

  const password = requireArg("password");
  const code = requireArg("code");
  if (!BUSINESS_CODE_RE.test(code)) {
    throw new Error("--code must be 1-12 characters of [A-Z0-9].");
  }
  const name = readArg("name")?.trim() || code;

  const users = createPgUserRepository(pool);
  const businesses = createPgBusinessRepository(pool);
  const now = new Date();

  try {
    if (await businesses.findByCode(code)) {
      throw new Error(`Business ${code} already exists.`);
    }

    const { user, created } = await users.getOrCreateByPhone(phone, now);
    await users.setPassword(user.id, await hashPassword(password));

    const business = await businesses.create({ code, name, ownerId: user.id }, now);

    console.log("business_created", {
      business: business.code,
      owner_id: user.id,
      owner_created: created,
    });
  } finally {
    await closeDb();
  }
}

main().catch((err) => {
  console.error("create_business_failed", err);
  process.exit(1);
});
