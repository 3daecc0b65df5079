import { Pool } from "pg";

export type PostgresSettings = Readonly<{
  connectionString: string;
  ssl?: boolean;
  maxConnections: number;
  statementTimeoutMs: number;
  sourceEnvKey: "DATABASE_URL" | "POSTGRES_URL" | "POSTGRES_HOST";
}>;

/**
 * The slice of `pg.Pool` the repositories use. Tests hand in a scripted
 * client instead of a live pool.
 */
export type SqlClient = Readonly<{
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: ReadonlyArray<Record<string, unknown>>; rowCount: number | null }>;
}>;

export const DEFAULT_POSTGRES_MAX_CONNECTIONS = 20;
export const DEFAULT_STATEMENT_TIMEOUT_MS = 5_000;

const UNIQUE_VIOLATION = "23505";

function nonEmpty(value: string | undefined): string | null {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : null;
}

function parsePositiveInt(value: string | undefined, key: string, fallback: number): number {
  const raw = nonEmpty(value);
  if (raw === null) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${key} must be a positive integer.`);
  }
  return n;
}

function sslFromMode(mode: string | null): boolean {
  if (mode === null) return false;
  const m = mode.toLowerCase();
  return m === "require" || m === "verify-ca" || m === "verify-full" || m === "true";
}

function buildConnectionStringFromParts(env: NodeJS.ProcessEnv, host: string): string {
  const port = parsePositiveInt(env.POSTGRES_PORT, "POSTGRES_PORT", 5432);
  const user = nonEmpty(env.POSTGRES_USER) ?? "postgres";
  const password = env.POSTGRES_PASSWORD ?? "";
  const database = nonEmpty(env.POSTGRES_DB) ?? "postgres";
  const auth = password === "" ? encodeURIComponent(user) : `${encodeURIComponent(user)}:${encodeURIComponent(password)}`;
  return `postgres://${auth}@${host}:${port}/${encodeURIComponent(database)}`;
}

export function resolvePostgresSettingsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  statementTimeoutMs: number = DEFAULT_STATEMENT_TIMEOUT_MS
): PostgresSettings | null {
  const maxConnections = parsePositiveInt(
    env.POSTGRES_MAX_CONNECTIONS,
    "POSTGRES_MAX_CONNECTIONS",
    DEFAULT_POSTGRES_MAX_CONNECTIONS
  );
  const sslMode = nonEmpty(env.POSTGRES_SSL_MODE);

  const dbUrl = nonEmpty(env.DATABASE_URL);
  if (dbUrl) {
    return { connectionString: dbUrl, ssl: sslFromMode(sslMode), maxConnections, statementTimeoutMs, sourceEnvKey: "DATABASE_URL" };
  }
  const pgUrl = nonEmpty(env.POSTGRES_URL);
  if (pgUrl) {
    return { connectionString: pgUrl, ssl: sslFromMode(sslMode), maxConnections, statementTimeoutMs, sourceEnvKey: "POSTGRES_URL" };
  }
  const host = nonEmpty(env.POSTGRES_HOST);
  if (host) {
    return {
      connectionString: buildConnectionStringFromParts(env, host),
      ssl: sslFromMode(sslMode),
      maxConnections,
      statementTimeoutMs,
      sourceEnvKey: "POSTGRES_HOST"
    };
  }
  return null;
}

export function createPostgresPool(settings: PostgresSettings): Pool {
  return new Pool({
    connectionString: settings.connectionString,
    max: settings.maxConnections,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
    query_timeout: settings.statementTimeoutMs,
    statement_timeout: settings.statementTimeoutMs,
    ssl: settings.ssl === true ? { rejectUnauthorized: false } : undefined
  });
}

/** True for SQLSTATE 23505, optionally restricted to one named constraint. */
export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (typeof error !== "object" || error === null) return false;
  if (!("code" in error) || error.code !== UNIQUE_VIOLATION) return false;
  if (constraint === undefined) return true;
  return "constraint" in error && error.constraint === constraint;
}

export function asString(value: unknown): string {
  if (typeof value !== "string") {
    throw new Error(`Expected a text column, got ${typeof value}.`);
  }
  return value;
}

export function asNullableString(value: unknown): string | null {
  return value === null || value === undefined ? null : asString(value);
}

// BIGINT columns arrive as strings.
export function asNumber(value: unknown): number {
  const n = typeof value === "string" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isFinite(n)) {
    throw new Error(`Expected a numeric column, got ${typeof value}.`);
  }
  return n;
}

export async function ensurePostgresSchema(client: SqlClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS users (
      id TEXT COLLATE "C" PRIMARY KEY,
      email TEXT NOT NULL,
      name TEXT NOT NULL,
      gender TEXT,
      birth_date TEXT,
      bio TEXT,
      avatar_url TEXT,
      password_salt_b64 TEXT NOT NULL,
      password_hash_b64 TEXT NOT NULL,
      created_at_ms BIGINT NOT NULL,
      updated_at_ms BIGINT NOT NULL,
      CONSTRAINT users_email_key UNIQUE (email)
    )
  `);

  await client.query(`
    CREATE TABLE IF NOT EXISTS preferences (
      preference_id TEXT PRIMARY KEY,
      actor_id TEXT COLLATE "C" NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      target_id TEXT COLLATE "C" NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      decision TEXT NOT NULL CHECK (decision IN ('like', 'pass')),
      created_at_ms BIGINT NOT NULL,
      updated_at_ms BIGINT NOT NULL,
      CONSTRAINT preferences_actor_target_key UNIQUE (actor_id, target_id),
      CONSTRAINT preferences_not_self CHECK (actor_id <> target_id)
    )
  `);
  await client.query("CREATE INDEX IF NOT EXISTS idx_preferences_target_id ON preferences(target_id)");

  await client.query(`
    CREATE TABLE IF NOT EXISTS matches (
      match_id TEXT PRIMARY KEY,
      identity_low TEXT COLLATE "C" NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      identity_high TEXT COLLATE "C" NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      created_at_ms BIGINT NOT NULL,
      updated_at_ms BIGINT NOT NULL,
      CONSTRAINT matches_pair_key UNIQUE (identity_low, identity_high),
      CONSTRAINT matches_canonical_order CHECK (identity_low < identity_high)
    )
  `);
  await client.query("CREATE INDEX IF NOT EXISTS idx_matches_identity_high ON matches(identity_high)");

  await client.query(`
    CREATE TABLE IF NOT EXISTS chat_messages (
      seq BIGSERIAL PRIMARY KEY,
      message_id TEXT NOT NULL UNIQUE,
      match_id TEXT NOT NULL REFERENCES matches(match_id) ON DELETE CASCADE,
      sender_id TEXT NOT NULL,
      receiver_id TEXT NOT NULL,
      content TEXT NOT NULL,
      created_at_ms BIGINT NOT NULL
    )
  `);
  await client.query(
    "CREATE INDEX IF NOT EXISTS idx_chat_messages_match_created ON chat_messages(match_id, created_at_ms, seq)"
  );
}
