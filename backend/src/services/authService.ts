import crypto from "node:crypto";
import jwt from "jsonwebtoken";

import type { InsertOutcome } from "./matchStore";
import { createStorageGuard, type StorageGuard } from "./storageGuard";

export type ErrorCode =
  | "INVALID_INPUT"
  | "INVALID_SESSION"
  | "INVALID_CREDENTIALS"
  | "EMAIL_ALREADY_REGISTERED"
  | "STORAGE_UNAVAILABLE";

export type ServiceError = {
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
};

type ResultOk<T> = { ok: true; value: T };
type ResultErr = { ok: false; error: ServiceError };
export type Result<T> = ResultOk<T> | ResultErr;

export type StoredUser = Readonly<{
  id: string;
  email: string;
  name: string;
  gender: string | null;
  birthDate: string | null;
  bio: string | null;
  avatarUrl: string | null;
  passwordSaltB64: string;
  passwordHashB64: string;
  createdAtMs: number;
  updatedAtMs: number;
}>;

export type PublicUser = Readonly<{
  id: string;
  email: string;
  name: string;
  gender?: string;
  birthDate?: string;
  bio?: string;
  avatarUrl?: string;
  createdAtMs: number;
  updatedAtMs: number;
}>;

export type UserRepository = Readonly<{
  // Must be atomic against the unique email.
  insert(user: StoredUser): Promise<InsertOutcome>;
  findByEmail(email: string): Promise<StoredUser | null>;
  findById(userId: string): Promise<StoredUser | null>;
  update(user: StoredUser): Promise<UpdateOutcome>;
}>;

/** "missing" when no row carries the user's id. */
export type UpdateOutcome = "updated" | "missing";

export type AuthResult = Readonly<{
  token: string;
  user: PublicUser;
}>;

export type VerifiedToken = Readonly<{
  userId: string;
  email: string;
  expiresAtMs: number;
}>;

export type AuthService = Readonly<{
  register(email: string, password: string, name: string): Promise<Result<AuthResult>>;
  login(email: string, password: string): Promise<Result<AuthResult>>;
  issueJWT(user: Pick<StoredUser, "id" | "email">): Result<string>;
  verifyJWT(token: string): Result<VerifiedToken>;
}>;

export type AuthServiceDeps = Readonly<{
  users: UserRepository;
  jwtSecret: string;
  jwtTtlSeconds?: number;
  nowMs?: () => number;
  idGenerator?: () => string;
  storage?: StorageGuard;
}>;

export const DEFAULT_JWT_TTL_SECONDS = 60 * 60 * 24;
const PASSWORD_SCRYPT_N = 16384;
const PASSWORD_SCRYPT_R = 8;
const PASSWORD_SCRYPT_P = 1;
const PASSWORD_HASH_BYTES = 64;
const PASSWORD_SALT_BYTES = 16;
const MAX_NAME_LENGTH = 100;

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function isLikelyValidEmail(email: string): boolean {
  const value = normalizeEmail(email);
  if (value.length < 3) return false;
  const at = value.indexOf("@");
  if (at <= 0) return false;
  if (at !== value.lastIndexOf("@")) return false;
  const dot = value.indexOf(".", at + 2);
  if (dot === -1 || dot === value.length - 1) return false;
  return !/\s/.test(value);
}

function isStrongPassword(password: string): boolean {
  if (typeof password !== "string" || password.length < 10) return false;
  const hasLower = /[a-z]/.test(password);
  const hasUpper = /[A-Z]/.test(password);
  const hasDigit = /\d/.test(password);
  const hasSymbol = /[^A-Za-z0-9]/.test(password);
  return hasLower && hasUpper && hasDigit && hasSymbol;
}

function hashPassword(password: string, salt: Buffer): Buffer {
  return crypto.scryptSync(password, salt, PASSWORD_HASH_BYTES, {
    N: PASSWORD_SCRYPT_N,
    r: PASSWORD_SCRYPT_R,
    p: PASSWORD_SCRYPT_P
  });
}

function safeEqual(a: Buffer, b: Buffer): boolean {
  if (a.length !== b.length) return false;
  return crypto.timingSafeEqual(a, b);
}

export function toPublicUser(user: StoredUser): PublicUser {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    ...(user.gender !== null ? { gender: user.gender } : {}),
    ...(user.birthDate !== null ? { birthDate: user.birthDate } : {}),
    ...(user.bio !== null ? { bio: user.bio } : {}),
    ...(user.avatarUrl !== null ? { avatarUrl: user.avatarUrl } : {}),
    createdAtMs: user.createdAtMs,
    updatedAtMs: user.updatedAtMs
  };
}

export function createAuthService(deps: AuthServiceDeps): AuthService {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const idGenerator = deps.idGenerator ?? (() => crypto.randomUUID());
  const storage = deps.storage ?? createStorageGuard();
  const jwtTtlSeconds = deps.jwtTtlSeconds ?? DEFAULT_JWT_TTL_SECONDS;
  const { users, jwtSecret } = deps;

  if (typeof jwtSecret !== "string" || jwtSecret.trim() === "") {
    throw new Error("AuthService requires a non-empty jwtSecret.");
  }
  if (!Number.isInteger(jwtTtlSeconds) || jwtTtlSeconds <= 0) {
    throw new Error("AuthService requires a positive integer jwtTtlSeconds.");
  }

  function issueJWTInternal(user: Pick<StoredUser, "id" | "email">, issuedAtMs: number): string {
    const iat = Math.floor(issuedAtMs / 1000);
    return jwt.sign(
      {
        email: user.email,
        iat,
        exp: iat + jwtTtlSeconds
      },
      jwtSecret,
      {
        algorithm: "HS256",
        subject: user.id
      }
    );
  }

  return {
    async register(email: string, password: string, name: string): Promise<Result<AuthResult>> {
      if (typeof email !== "string" || !isLikelyValidEmail(email)) {
        return err("INVALID_INPUT", "Invalid email.");
      }
      if (!isStrongPassword(password)) {
        return err(
          "INVALID_INPUT",
          "Invalid password. Use at least 10 chars with uppercase, lowercase, number, and symbol."
        );
      }
      if (typeof name !== "string" || name.trim() === "") {
        return err("INVALID_INPUT", "Name is required.");
      }
      const trimmedName = name.trim();
      if (trimmedName.length > MAX_NAME_LENGTH) {
        return err("INVALID_INPUT", `Name must be at most ${MAX_NAME_LENGTH} characters.`, { max: MAX_NAME_LENGTH });
      }

      const salt = crypto.randomBytes(PASSWORD_SALT_BYTES);
      const hash = hashPassword(password, salt);
      const now = nowMs();
      const user: StoredUser = {
        id: idGenerator(),
        email: normalizeEmail(email),
        name: trimmedName,
        gender: null,
        birthDate: null,
        bio: null,
        avatarUrl: null,
        passwordSaltB64: salt.toString("base64"),
        passwordHashB64: hash.toString("base64"),
        createdAtMs: now,
        updatedAtMs: now
      };

      const inserted = await storage("users.insert", () => users.insert(user));
      if (!inserted.ok) return err(inserted.error.code, inserted.error.message, inserted.error.context);
      if (inserted.value === "conflict") {
        return err("EMAIL_ALREADY_REGISTERED", "Email already registered.");
      }

      return ok({ token: issueJWTInternal(user, now), user: toPublicUser(user) });
    },

    async login(email: string, password: string): Promise<Result<AuthResult>> {
      if (typeof email !== "string" || typeof password !== "string") {
        return err("INVALID_CREDENTIALS", "Invalid credentials.");
      }
      const found = await storage("users.findByEmail", () => users.findByEmail(normalizeEmail(email)));
      if (!found.ok) return err(found.error.code, found.error.message, found.error.context);
      const user = found.value;
      if (!user) {
        return err("INVALID_CREDENTIALS", "Invalid credentials.");
      }

      const salt = Buffer.from(user.passwordSaltB64, "base64");
      const expectedHash = Buffer.from(user.passwordHashB64, "base64");
      const actualHash = hashPassword(password, salt);
      if (!safeEqual(expectedHash, actualHash)) {
        return err("INVALID_CREDENTIALS", "Invalid credentials.");
      }

      return ok({ token: issueJWTInternal(user, nowMs()), user: toPublicUser(user) });
    },

    issueJWT(user: Pick<StoredUser, "id" | "email">): Result<string> {
      if (
        typeof user !== "object" ||
        user === null ||
        typeof user.id !== "string" ||
        user.id.trim() === "" ||
        typeof user.email !== "string" ||
        !isLikelyValidEmail(user.email)
      ) {
        return err("INVALID_INPUT", "Invalid user.");
      }
      return ok(issueJWTInternal({ id: user.id, email: normalizeEmail(user.email) }, nowMs()));
    },

    verifyJWT(token: string): Result<VerifiedToken> {
      if (typeof token !== "string" || token.trim() === "") {
        return err("INVALID_SESSION", "Invalid session.");
      }
      let decoded: string | jwt.JwtPayload;
      try {
        decoded = jwt.verify(token.trim(), jwtSecret, {
          algorithms: ["HS256"],
          clockTimestamp: Math.floor(nowMs() / 1000)
        });
      } catch (e: unknown) {
        if (e instanceof jwt.TokenExpiredError) {
          return err("INVALID_SESSION", "Session expired.");
        }
        return err("INVALID_SESSION", "Invalid session.");
      }
      if (typeof decoded === "string" || typeof decoded.sub !== "string" || decoded.sub.trim() === "") {
        return err("INVALID_SESSION", "Invalid session.");
      }
      const email = typeof decoded.email === "string" ? decoded.email : "";
      const expiresAtMs = typeof decoded.exp === "number" ? decoded.exp * 1000 : 0;
      return ok({ userId: decoded.sub, email, expiresAtMs });
    }
  };
}
