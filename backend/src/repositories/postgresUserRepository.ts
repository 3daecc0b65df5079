import type { StoredUser, UpdateOutcome, UserRepository } from "../services/authService";
import type { InsertOutcome } from "../services/matchStore";
import { asNullableString, asNumber, asString, isUniqueViolation, type SqlClient } from "./postgresCore";

const USER_COLUMNS =
  "id, email, name, gender, birth_date, bio, avatar_url, password_salt_b64, password_hash_b64, created_at_ms, updated_at_ms";

function toUser(row: Record<string, unknown>): StoredUser {
  return {
    id: asString(row.id),
    email: asString(row.email),
    name: asString(row.name),
    gender: asNullableString(row.gender),
    birthDate: asNullableString(row.birth_date),
    bio: asNullableString(row.bio),
    avatarUrl: asNullableString(row.avatar_url),
    passwordSaltB64: asString(row.password_salt_b64),
    passwordHashB64: asString(row.password_hash_b64),
    createdAtMs: asNumber(row.created_at_ms),
    updatedAtMs: asNumber(row.updated_at_ms)
  };
}

export function createPostgresUserRepository(client: SqlClient): UserRepository {
  return {
    async insert(user: StoredUser): Promise<InsertOutcome> {
      try {
        await client.query(
          `INSERT INTO users (${USER_COLUMNS})
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
          [
            user.id,
            user.email,
            user.name,
            user.gender,
            user.birthDate,
            user.bio,
            user.avatarUrl,
            user.passwordSaltB64,
            user.passwordHashB64,
            user.createdAtMs,
            user.updatedAtMs
          ]
        );
        return "inserted";
      } catch (e: unknown) {
        if (isUniqueViolation(e, "users_email_key")) return "conflict";
        throw e;
      }
    },

    async findByEmail(email: string): Promise<StoredUser | null> {
      const res = await client.query(`SELECT ${USER_COLUMNS} FROM users WHERE email = $1`, [email]);
      const row = res.rows[0];
      return row ? toUser(row) : null;
    },

    async findById(userId: string): Promise<StoredUser | null> {
      const res = await client.query(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [userId]);
      const row = res.rows[0];
      return row ? toUser(row) : null;
    },

    async update(user: StoredUser): Promise<UpdateOutcome> {
      const res = await client.query(
        `UPDATE users
         SET name = $2, gender = $3, birth_date = $4, bio = $5, avatar_url = $6, updated_at_ms = $7
         WHERE id = $1`,
        [user.id, user.name, user.gender, user.birthDate, user.bio, user.avatarUrl, user.updatedAtMs]
      );
      return res.rowCount === 0 ? "missing" : "updated";
    }
  };
}
