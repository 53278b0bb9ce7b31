// src/modules/tokens/repository.ts
// ============================================================================
// Token-Repository (refresh_tokens / access_tokens)
// - KEINE Business-Logik, nur Datenzugriff
// ============================================================================

import type { DbPool } from "../../libs/db.js";
import type {
  AccessTokenRecord,
  AccessTokenRow,
  RefreshTokenRecord,
  RefreshTokenRow,
  TokenRepository,
} from "./types.js";

const REFRESH_COLUMNS = `
  id,
  user_id,
  realm,
  business_code,
  token_hash,
  family_id,
  replaced_by,
  revoked_at,
  created_at,
  expires_at
`;

const ACCESS_COLUMNS = `
  jti,
  user_id,
  realm,
  business_code,
  family_id,
  ip_address,
  user_agent,
  issued_at,
  expires_at,
  revoked_at
`;

function toRefresh(row: RefreshTokenRow): RefreshTokenRecord {
  return {
    id: row.id,
    userId: row.user_id,
    realm: row.realm,
    businessCode: row.business_code,
    tokenHash: row.token_hash,
    familyId: row.family_id,
    replacedBy: row.replaced_by,
    revokedAt: row.revoked_at,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
  };
}

function toAccess(row: AccessTokenRow): AccessTokenRecord {
  return {
    jti: row.jti,
    userId: row.user_id,
    realm: row.realm,
    businessCode: row.business_code,
    familyId: row.family_id,
    ipAddress: row.ip_address,
    userAgent: row.user_agent,
    issuedAt: row.issued_at,
    expiresAt: row.expires_at,
    revokedAt: row.revoked_at,
  };
}

export function createPgTokenRepository(db: DbPool): TokenRepository {
  return {
    // -----------------------------------------------------------------------
    // Refresh Tokens (hash-only + rotation)
    // -----------------------------------------------------------------------

    async createRefreshToken(input) {
      const { rows } = await db.query<RefreshTokenRow>(
        `
          INSERT INTO refresh_tokens (
            user_id,
            realm,
            business_code,
            token_hash,
            family_id,
            created_at,
            expires_at
          )
          VALUES ($1, $2, $3, $4, $5, $6, $7)
          RETURNING ${REFRESH_COLUMNS};
        `,
        [
          input.userId,
          input.realm,
          input.businessCode,
          input.tokenHash,
          input.familyId,
          input.createdAt,
          input.expiresAt,
        ],
      );
      if (!rows[0]) throw new Error("refresh_insert_failed");
      return toRefresh(rows[0]);
    },

    async findRefreshTokenByHash(tokenHash) {
      const { rows } = await db.query<RefreshTokenRow>(
        `SELECT ${REFRESH_COLUMNS} FROM refresh_tokens WHERE token_hash = $1 LIMIT 1;`,
        [tokenHash],
      );
      return rows[0] ? toRefresh(rows[0]) : null;
    },

    async markRefreshTokenRotated(id, replacedById, now) {
      const res = await db.query(
        `
          UPDATE refresh_tokens
          SET
            revoked_at = $3,
            replaced_by = $2
          WHERE id = $1
            AND revoked_at IS NULL;
        `,
        [id, replacedById, now],
      );
      return (res.rowCount ?? 0) === 1;
    },

    async deleteRefreshToken(id) {
      await db.query(`DELETE FROM refresh_tokens WHERE id = $1;`, [id]);
    },

    async revokeRefreshFamily(familyId, now) {
      const res = await db.query(
        `
          UPDATE refresh_tokens
          SET revoked_at = $2
          WHERE family_id = $1
            AND revoked_at IS NULL;
        `,
        [familyId, now],
      );
      return res.rowCount ?? 0;
    },

    // -----------------------------------------------------------------------
    // Access Tokens
    // -----------------------------------------------------------------------

    async createAccessToken(input) {
      const { rows } = await db.query<AccessTokenRow>(
        `
          INSERT INTO access_tokens (
            jti,
            user_id,
            realm,
            business_code,
            family_id,
            ip_address,
            user_agent,
            issued_at,
            expires_at
          )
          VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
          RETURNING ${ACCESS_COLUMNS};
        `,
        [
          input.jti,
          input.userId,
          input.realm,
          input.businessCode,
          input.familyId,
          input.ipAddress,
          input.userAgent,
          input.issuedAt,
          input.expiresAt,
        ],
      );
      if (!rows[0]) throw new Error("access_insert_failed");
      return toAccess(rows[0]);
    },

    async findAccessToken(jti) {
      const { rows } = await db.query<AccessTokenRow>(
        `SELECT ${ACCESS_COLUMNS} FROM access_tokens WHERE jti = $1 LIMIT 1;`,
        [jti],
      );
      return rows[0] ? toAccess(rows[0]) : null;
    },

    async listActiveAccessTokens(owner, now) {
      const { rows } = await db.query<AccessTokenRow>(
        `
          SELECT ${ACCESS_COLUMNS}
          FROM access_tokens
          WHERE user_id = $1
            AND realm = $2
            AND business_code IS NOT DISTINCT FROM $3
            AND revoked_at IS NULL
            AND expires_at > $4
          ORDER BY issued_at DESC;
        `,
        [owner.userId, owner.realm, owner.businessCode, now],
      );
      return rows.map(toAccess);
    },

    async revokeAccessTokens(jtis, now) {
      if (jtis.length === 0) return [];
      const { rows } = await db.query<AccessTokenRow>(
        `
          UPDATE access_tokens
          SET revoked_at = $2
          WHERE jti = ANY($1::uuid[])
            AND revoked_at IS NULL
          RETURNING ${ACCESS_COLUMNS};
        `,
        [jtis, now],
      );
      return rows.map(toAccess);
    },

    async revokeAccessTokensByFamily(familyId, now) {
      const { rows } = await db.query<AccessTokenRow>(
        `
          UPDATE access_tokens
          SET revoked_at = $2
          WHERE family_id = $1
            AND revoked_at IS NULL
          RETURNING ${ACCESS_COLUMNS};
        `,
        [familyId, now],
      );
      return rows.map(toAccess);
    },

    async deleteExpired(before) {
      const refresh = await db.query(
        `DELETE FROM refresh_tokens WHERE expires_at <= $1;`,
        [before],
      );
      const access = await db.query(
        `DELETE FROM access_tokens WHERE expires_at <= $1;`,
        [before],
      );
      return { refresh: refresh.rowCount ?? 0, access: access.rowCount ?? 0 };
    },
  };
}
