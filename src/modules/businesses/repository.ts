// src/modules/businesses/repository.ts
// ============================================================================
// Business-Repository (PostgreSQL)
// ============================================================================

import type { DbPool } from "../../libs/db.js";
import type { Business, BusinessRepository, BusinessRow } from "./types.js";

const BUSINESS_COLUMNS = `id, code, name, owner_id, created_at`;

function toBusiness(row: BusinessRow): Business {
  return {
    id: row.id,
    code: row.code,
    name: row.name,
    ownerId: row.owner_id,
    createdAt: row.created_at,
  };
}

export function createPgBusinessRepository(db: DbPool): BusinessRepository {
  return {
    async findByCode(code) {
      const { rows } = await db.query<BusinessRow>(
        `SELECT ${BUSINESS_COLUMNS} FROM businesses WHERE code = $1 LIMIT 1;`,
        [code],
      );
      return rows[0] ? toBusiness(rows[0]) : null;
    },

    async listByOwner(ownerId) {
      const { rows } = await db.query<BusinessRow>(
        `
          SELECT ${BUSINESS_COLUMNS}
          FROM businesses
          WHERE owner_id = $1
          ORDER BY created_at ASC, code ASC;
        `,
        [ownerId],
      );
      return rows.map(toBusiness);
    },

    async create(input, now) {
      const { rows } = await db.query<BusinessRow>(
        `
          INSERT INTO businesses (code, name, owner_id, created_at)
          VALUES ($1, $2, $3, $4)
          RETURNING ${BUSINESS_COLUMNS};
        `,
        [input.code, input.name, input.ownerId, now],
      );
      if (!rows[0]) throw new Error("business_insert_failed");
      return toBusiness(rows[0]);
    },
  };
}
