import { resolvePostgresSettingsFromEnv, type PostgresSettings } from "./repositories/postgresCore";
import { DEFAULT_JWT_TTL_SECONDS } from "./services/authService";
import { DEFAULT_STORAGE_TIMEOUT_MS } from "./services/storageGuard";

export type AppEnv = "DEVELOPMENT" | "TESTING" | "PRODUCTION";

export type ServerConfig = Readonly<{
  appEnv: AppEnv;
  port: number;
  jwtSecret: string;
  jwtTtlSeconds: number;
  storageTimeoutMs: number;
  corsAllowedOrigins: string;
  requireDatabase: boolean;
  postgres: PostgresSettings | null;
}>;

export const DEFAULT_PORT = 8080;
export const DEFAULT_CORS_ALLOWED_ORIGINS = "http://localhost:5174";

function nonEmpty(value: string | undefined): string | null {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : null;
}

function parsePositiveInt(value: string | undefined, key: string, fallback: number): number {
  const raw = nonEmpty(value);
  if (raw === null) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${key} must be a positive integer, got "${raw}".`);
  }
  return n;
}

function parseAppEnv(value: string | undefined): AppEnv {
  const raw = nonEmpty(value);
  if (raw === null) return "DEVELOPMENT";
  const upper = raw.toUpperCase();
  if (upper === "DEVELOPMENT" || upper === "TESTING" || upper === "PRODUCTION") return upper;
  throw new Error(`APP_ENV must be DEVELOPMENT, TESTING or PRODUCTION, got "${raw}".`);
}

/** Reads the server configuration once; throws on any invalid value. */
export function resolveServerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const jwtSecret = nonEmpty(env.JWT_SECRET);
  if (jwtSecret === null) {
    throw new Error("Missing JWT_SECRET environment variable.");
  }

  const storageTimeoutMs = parsePositiveInt(env.STORAGE_TIMEOUT_MS, "STORAGE_TIMEOUT_MS", DEFAULT_STORAGE_TIMEOUT_MS);
  const requireDatabase = env.REQUIRE_DATABASE?.trim().toLowerCase() === "true";
  const postgres = resolvePostgresSettingsFromEnv(env, storageTimeoutMs);
  if (requireDatabase && !postgres) {
    throw new Error(
      "REQUIRE_DATABASE=true but no PostgreSQL settings were found. Set DATABASE_URL, POSTGRES_URL or POSTGRES_HOST."
    );
  }

  return {
    appEnv: parseAppEnv(env.APP_ENV),
    port: parsePositiveInt(env.PORT, "PORT", DEFAULT_PORT),
    jwtSecret,
    jwtTtlSeconds: parsePositiveInt(env.JWT_TTL_SECONDS, "JWT_TTL_SECONDS", DEFAULT_JWT_TTL_SECONDS),
    storageTimeoutMs,
    corsAllowedOrigins: nonEmpty(env.CORS_ALLOWED_ORIGINS) ?? DEFAULT_CORS_ALLOWED_ORIGINS,
    requireDatabase,
    postgres
  };
}
