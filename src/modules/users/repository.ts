// src/modules/users/repository.ts
// ============================================================================
// User-Repository (PostgreSQL)
// - Zugriff auf users / business_clients
// - KEINE Business-Logik, nur Datenzugriff
// ============================================================================

import type { DbPool } from "../../libs/db.js";
import type {
  BusinessClient,
  BusinessClientRow,
  User,
  UserRepository,
  UserRow,
} from "./types.js";

const USER_COLUMNS = `id, phone, is_admin, password_hash, created_at`;

function toUser(row: UserRow): User {
  return {
    id: row.id,
    phone: row.phone,
    isAdmin: row.is_admin,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

function toClient(row: BusinessClientRow): BusinessClient {
  return {
    id: row.id,
    userId: row.user_id,
    businessId: row.business_id,
    businessCode: row.business_code,
    registeredAt: row.registered_at,
  };
}

export function createPgUserRepository(db: DbPool): UserRepository {
  async function findClient(userId: string, businessId: string): Promise<BusinessClient | null> {
    const { rows } = await db.query<BusinessClientRow>(
      `
        SELECT
          bc.id,
          bc.user_id,
          bc.business_id,
          b.code AS business_code,
          bc.registered_at
        FROM business_clients bc
        JOIN businesses b
          ON b.id = bc.business_id
        WHERE bc.user_id = $1
          AND bc.business_id = $2
        LIMIT 1;
      `,
      [userId, businessId],
    );
    return rows[0] ? toClient(rows[0]) : null;
  }

  return {
    async findById(id) {
      const { rows } = await db.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users WHERE id = $1 LIMIT 1;`,
        [id],
      );
      return rows[0] ? toUser(rows[0]) : null;
    },

    async findByPhone(phone) {
      const { rows } = await db.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users WHERE phone = $1 LIMIT 1;`,
        [phone],
      );
      return rows[0] ? toUser(rows[0]) : null;
    },

    async getOrCreateByPhone(phone, now) {
      // ON CONFLICT DO NOTHING: parallele Confirms fuer dieselbe Nummer
      const inserted = await db.query<UserRow>(
        `
          INSERT INTO users (phone, created_at)
          VALUES ($1, $2)
          ON CONFLICT (phone) DO NOTHING
          RETURNING ${USER_COLUMNS};
        `,
        [phone, now],
      );
      if (inserted.rows[0]) {
        return { user: toUser(inserted.rows[0]), created: true };
      }

      const { rows } = await db.query<UserRow>(
        `SELECT ${USER_COLUMNS} FROM users WHERE phone = $1 LIMIT 1;`,
        [phone],
      );
      if (!rows[0]) throw new Error("user_upsert_failed");
      return { user: toUser(rows[0]), created: false };
    },

    async setPassword(userId, passwordHash) {
      await db.query(
        `UPDATE users SET password_hash = $2 WHERE id = $1;`,
        [userId, passwordHash],
      );
    },

    findClient,

    async getOrCreateClient(userId, business, now) {
      const inserted = await db.query<{ id: string; registered_at: Date }>(
        `
          INSERT INTO business_clients (user_id, business_id, registered_at)
          VALUES ($1, $2, $3)
          ON CONFLICT (user_id, business_id) DO NOTHING
          RETURNING id, registered_at;
        `,
        [userId, business.id, now],
      );
      const row = inserted.rows[0];
      if (row) {
        return {
          client: {
            id: row.id,
            userId,
            businessId: business.id,
            businessCode: business.code,
            registeredAt: row.registered_at,
          },
          created: true,
        };
      }

      const existing = await findClient(userId, business.id);
      if (!existing) throw new Error("business_client_upsert_failed");
      return { client: existing, created: false };
    },
  };
}
