// src/modules/otp/repository.ts
// ============================================================================
// Persistence fuer OTP-Codes (Tabelle otp_codes, nur code_hash gespeichert)
// ----------------------------------------------------------------------------
// business_code kann NULL sein (web) -> Vergleich via IS NOT DISTINCT FROM
// ============================================================================

import type { DbPool } from "../../libs/db.js";
import type { OtpCode, OtpRepository, OtpRow } from "./types.js";

const OTP_COLUMNS = `
  id,
  phone,
  realm,
  business_code,
  code_hash,
  attempts,
  sent_at,
  expires_at,
  used_at,
  revoked_at
`;

function toOtpCode(row: OtpRow): OtpCode {
  return {
    id: row.id,
    phone: row.phone,
    realm: row.realm,
    businessCode: row.business_code,
    codeHash: row.code_hash,
    attempts: row.attempts,
    sentAt: row.sent_at,
    expiresAt: row.expires_at,
    usedAt: row.used_at,
    revokedAt: row.revoked_at,
  };
}

export function createPgOtpRepository(db: DbPool): OtpRepository {
  return {
    async revokeActive(scope, now) {
      const { rowCount } = await db.query(
        `
          UPDATE otp_codes
          SET revoked_at = $4
          WHERE phone = $1
            AND realm = $2
            AND business_code IS NOT DISTINCT FROM $3
            AND used_at IS NULL
            AND revoked_at IS NULL
            AND expires_at > $4;
        `,
        [scope.phone, scope.realm, scope.businessCode, now],
      );
      return rowCount ?? 0;
    },

    async create(input) {
      const { rows } = await db.query<OtpRow>(
        `
          INSERT INTO otp_codes (phone, realm, business_code, code_hash, sent_at, expires_at)
          VALUES ($1, $2, $3, $4, $5, $6)
          RETURNING ${OTP_COLUMNS};
        `,
        [
          input.scope.phone,
          input.scope.realm,
          input.scope.businessCode,
          input.codeHash,
          input.sentAt,
          input.expiresAt,
        ],
      );
      if (!rows[0]) throw new Error("otp_insert_failed");
      return toOtpCode(rows[0]);
    },

    async findLatestActive(scope, now) {
      const { rows } = await db.query<OtpRow>(
        `
          SELECT ${OTP_COLUMNS}
          FROM otp_codes
          WHERE phone = $1
            AND realm = $2
            AND business_code IS NOT DISTINCT FROM $3
            AND used_at IS NULL
            AND revoked_at IS NULL
            AND expires_at > $4
          ORDER BY sent_at DESC
          LIMIT 1;
        `,
        [scope.phone, scope.realm, scope.businessCode, now],
      );
      return rows[0] ? toOtpCode(rows[0]) : null;
    },

    async registerFailedAttempt(id, maxAttempts, now) {
      const { rows } = await db.query<{ attempts: number }>(
        `
          UPDATE otp_codes
          SET
            attempts = attempts + 1,
            revoked_at = CASE WHEN attempts + 1 >= $2 THEN $3 ELSE revoked_at END
          WHERE id = $1
            AND used_at IS NULL
            AND revoked_at IS NULL
          RETURNING attempts;
        `,
        [id, maxAttempts, now],
      );
      return rows[0]?.attempts ?? maxAttempts;
    },

    async consume(id, now) {
      const { rowCount } = await db.query(
        `
          UPDATE otp_codes
          SET used_at = $2
          WHERE id = $1
            AND used_at IS NULL
            AND revoked_at IS NULL
            AND expires_at > $2;
        `,
        [id, now],
      );
      return (rowCount ?? 0) === 1;
    },

    async revoke(id, now) {
      await db.query(
        `UPDATE otp_codes SET revoked_at = $2 WHERE id = $1 AND revoked_at IS NULL;`,
        [id, now],
      );
    },

    async deleteExpired(before) {
      const { rowCount } = await db.query(
        `DELETE FROM otp_codes WHERE expires_at <= $1;`,
        [before],
      );
      return rowCount ?? 0;
    },
  };
}
