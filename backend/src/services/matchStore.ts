import crypto from "node:crypto";

import { canonicalizePair, type CanonicalPair, type Identity } from "./pairCanonicalizer";
import { createStorageGuard, type StorageGuard } from "./storageGuard";

export type ErrorCode = "INVALID_PAIR" | "INVALID_INPUT" | "STORAGE_UNAVAILABLE";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = Readonly<{ ok: true; value: T }>;
type ResultErr = Readonly<{ ok: false; error: ServiceError }>;
export type Result<T> = ResultOk<T> | ResultErr;

export type Match = Readonly<{
  matchId: string;
  identityLow: Identity;
  identityHigh: Identity;
  createdAtMs: number;
  updatedAtMs: number;
}>;

/** "conflict" means the row's unique key is already taken; the row was not written. */
export type InsertOutcome = "inserted" | "conflict";

export type MatchRepository = Readonly<{
  // Must be atomic against the unique (identityLow, identityHigh) key.
  insert(match: Match): Promise<InsertOutcome>;
  findByPair(identityLow: Identity, identityHigh: Identity): Promise<Match | null>;
  findById(matchId: string): Promise<Match | null>;
  // Newest first.
  listForIdentity(identity: Identity): Promise<ReadonlyArray<Match>>;
}>;

export type CreateIfAbsentResult = Readonly<{
  match: Match;
  created: boolean;
}>;

export type MatchStore = Readonly<{
  exists(a: Identity, b: Identity): Promise<Result<boolean>>;
  getByPair(a: Identity, b: Identity): Promise<Result<Match | null>>;
  getById(matchId: string): Promise<Result<Match | null>>;
  createIfAbsent(a: Identity, b: Identity): Promise<Result<CreateIfAbsentResult>>;
  listForIdentity(identity: Identity): Promise<Result<ReadonlyArray<Match>>>;
}>;

export type MatchStoreDeps = Readonly<{
  repo: MatchRepository;
  nowMs?: () => number;
  idGenerator?: () => string;
  storage?: StorageGuard;
}>;

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  return { ok: false, error: context ? { code, message, context } : { code, message } };
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

export function createMatchStore(deps: MatchStoreDeps): MatchStore {
  const repo = deps.repo;
  const nowMs = deps.nowMs ?? (() => Date.now());
  const idGenerator = deps.idGenerator ?? (() => crypto.randomUUID());
  const storage = deps.storage ?? createStorageGuard();

  async function findByPair(pair: CanonicalPair): Promise<Result<Match | null>> {
    const found = await storage("matches.findByPair", () => repo.findByPair(pair.identityLow, pair.identityHigh));
    if (!found.ok) return { ok: false, error: found.error };
    return ok(found.value);
  }

  return {
    async exists(a: Identity, b: Identity): Promise<Result<boolean>> {
      const pair = canonicalizePair(a, b);
      if (!pair.ok) return pair;
      const found = await findByPair(pair.value);
      if (!found.ok) return found;
      return ok(found.value !== null);
    },

    async getByPair(a: Identity, b: Identity): Promise<Result<Match | null>> {
      const pair = canonicalizePair(a, b);
      if (!pair.ok) return pair;
      return findByPair(pair.value);
    },

    async getById(matchId: string): Promise<Result<Match | null>> {
      if (!isNonEmptyString(matchId)) {
        return err("INVALID_INPUT", "Invalid match id.");
      }
      const found = await storage("matches.findById", () => repo.findById(matchId.trim()));
      if (!found.ok) return { ok: false, error: found.error };
      return ok(found.value);
    },

    async createIfAbsent(a: Identity, b: Identity): Promise<Result<CreateIfAbsentResult>> {
      const pair = canonicalizePair(a, b);
      if (!pair.ok) return pair;

      const now = nowMs();
      const candidate: Match = {
        matchId: idGenerator(),
        identityLow: pair.value.identityLow,
        identityHigh: pair.value.identityHigh,
        createdAtMs: now,
        updatedAtMs: now
      };

      const inserted = await storage("matches.insert", () => repo.insert(candidate));
      if (!inserted.ok) return { ok: false, error: inserted.error };
      if (inserted.value === "inserted") {
        return ok({ match: candidate, created: true });
      }

      // Another writer owns the pair; report its row.
      const existing = await findByPair(pair.value);
      if (!existing.ok) return existing;
      if (!existing.value) {
        return err("STORAGE_UNAVAILABLE", "Storage is temporarily unavailable.", {
          operation: "matches.findByPair",
          reason: "conflict_without_row"
        });
      }
      return ok({ match: existing.value, created: false });
    },

    async listForIdentity(identity: Identity): Promise<Result<ReadonlyArray<Match>>> {
      if (!isNonEmptyString(identity)) {
        return err("INVALID_INPUT", "Invalid user.");
      }
      const listed = await storage("matches.listForIdentity", () => repo.listForIdentity(identity.trim()));
      if (!listed.ok) return { ok: false, error: listed.error };
      return ok(listed.value);
    }
  };
}
