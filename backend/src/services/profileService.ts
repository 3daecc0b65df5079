import { toPublicUser, type PublicUser, type StoredUser, type UserRepository } from "./authService";
import type { MatchedUser } from "./matchingService";
import { createStorageGuard, type StorageGuard } from "./storageGuard";

export type ErrorCode = "INVALID_SESSION" | "INVALID_INPUT" | "USER_NOT_FOUND" | "STORAGE_UNAVAILABLE";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = Readonly<{ ok: true; value: T }>;
type ResultErr = Readonly<{ ok: false; error: ServiceError }>;
export type Result<T> = ResultOk<T> | ResultErr;

/** Fields a user may change on their own profile. Absent keys are left as they are. */
export type ProfileUpdate = Readonly<{
  name?: unknown;
  gender?: unknown;
  birthDate?: unknown;
  bio?: unknown;
  avatarUrl?: unknown;
}>;

export type ProfileService = Readonly<{
  getProfile(userId: string): Promise<Result<PublicUser>>;
  updateProfile(userId: string, update: ProfileUpdate): Promise<Result<PublicUser>>;
}>;

export type ProfileServiceDeps = Readonly<{
  users: UserRepository;
  nowMs?: () => number;
  storage?: StorageGuard;
}>;

const MAX_NAME_LENGTH = 100;
const MAX_GENDER_LENGTH = 32;
const MAX_BIO_LENGTH = 500;
const MAX_AVATAR_URL_LENGTH = 2048;

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  return { ok: false, error: context ? { code, message, context } : { code, message } };
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function asTrimmedString(v: unknown): string | null {
  if (typeof v !== "string") return null;
  const t = v.trim();
  return t.length ? t : null;
}

function validateName(v: unknown): Result<string> {
  const s = asTrimmedString(v);
  if (!s) return err("INVALID_INPUT", "Name is required.");
  if (s.length > MAX_NAME_LENGTH) {
    return err("INVALID_INPUT", `Name must be at most ${MAX_NAME_LENGTH} characters.`, { max: MAX_NAME_LENGTH });
  }
  return ok(s);
}

// null and "" clear the field.
function validateOptionalText(v: unknown, field: string, max: number): Result<string | null> {
  if (v === null) return ok(null);
  if (typeof v !== "string") return err("INVALID_INPUT", `${field} must be a string.`);
  const t = v.trim();
  if (t.length > max) return err("INVALID_INPUT", `${field} must be ${max} characters or fewer.`, { max });
  return ok(t.length ? t : null);
}

export function isValidBirthDate(value: string): boolean {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!m) return false;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function validateBirthDate(v: unknown): Result<string | null> {
  if (v === null || v === "") return ok(null);
  if (typeof v !== "string" || !isValidBirthDate(v.trim())) {
    return err("INVALID_INPUT", "birthDate must be a valid date formatted as YYYY-MM-DD.");
  }
  return ok(v.trim());
}

function validateAvatarUrl(v: unknown): Result<string | null> {
  const text = validateOptionalText(v, "avatarUrl", MAX_AVATAR_URL_LENGTH);
  if (!text.ok || text.value === null) return text;
  if (!/^https?:\/\/\S+$/i.test(text.value)) {
    return err("INVALID_INPUT", "avatarUrl must be an http(s) URL.");
  }
  return text;
}

export function toMatchedUser(user: StoredUser): MatchedUser {
  const profile = toPublicUser(user);
  return {
    id: profile.id,
    name: profile.name,
    gender: profile.gender,
    birthDate: profile.birthDate,
    bio: profile.bio,
    avatarUrl: profile.avatarUrl
  };
}

/** Resolves match counterparts to their public profile for match listings. */
export function createUserDirectory(users: UserRepository): Readonly<{
  getMatchedUser(userId: string): Promise<MatchedUser | null>;
}> {
  return {
    async getMatchedUser(userId: string): Promise<MatchedUser | null> {
      const user = await users.findById(userId);
      return user ? toMatchedUser(user) : null;
    }
  };
}

export function createProfileService(deps: ProfileServiceDeps): ProfileService {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const storage = deps.storage ?? createStorageGuard();
  const { users } = deps;

  async function loadUser(userId: string): Promise<Result<StoredUser>> {
    if (typeof userId !== "string" || userId.trim() === "") {
      return err("INVALID_SESSION", "Invalid session.");
    }
    const found = await storage("users.findById", () => users.findById(userId.trim()));
    if (!found.ok) return err(found.error.code, found.error.message, found.error.context);
    if (!found.value) return err("USER_NOT_FOUND", "User not found.");
    return ok(found.value);
  }

  return {
    async getProfile(userId: string): Promise<Result<PublicUser>> {
      const loaded = await loadUser(userId);
      if (!loaded.ok) return loaded;
      return ok(toPublicUser(loaded.value));
    },

    async updateProfile(userId: string, update: ProfileUpdate): Promise<Result<PublicUser>> {
      if (!isObject(update)) {
        return err("INVALID_INPUT", "Profile update must be an object.");
      }
      const loaded = await loadUser(userId);
      if (!loaded.ok) return loaded;
      const existing = loaded.value;

      let name = existing.name;
      if (update.name !== undefined) {
        const res = validateName(update.name);
        if (!res.ok) return res;
        name = res.value;
      }
      let gender = existing.gender;
      if (update.gender !== undefined) {
        const res = validateOptionalText(update.gender, "gender", MAX_GENDER_LENGTH);
        if (!res.ok) return res;
        gender = res.value;
      }
      let birthDate = existing.birthDate;
      if (update.birthDate !== undefined) {
        const res = validateBirthDate(update.birthDate);
        if (!res.ok) return res;
        birthDate = res.value;
      }
      let bio = existing.bio;
      if (update.bio !== undefined) {
        const res = validateOptionalText(update.bio, "bio", MAX_BIO_LENGTH);
        if (!res.ok) return res;
        bio = res.value;
      }
      let avatarUrl = existing.avatarUrl;
      if (update.avatarUrl !== undefined) {
        const res = validateAvatarUrl(update.avatarUrl);
        if (!res.ok) return res;
        avatarUrl = res.value;
      }

      const next: StoredUser = { ...existing, name, gender, birthDate, bio, avatarUrl, updatedAtMs: nowMs() };
      const saved = await storage("users.update", () => users.update(next));
      if (!saved.ok) return err(saved.error.code, saved.error.message, saved.error.context);
      if (saved.value === "missing") return err("USER_NOT_FOUND", "User not found.");
      return ok(toPublicUser(next));
    }
  };
}
