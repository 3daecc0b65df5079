import crypto from "node:crypto";

import type { CreateIfAbsentResult, InsertOutcome, Match, MatchStore } from "./matchStore";
import { counterpartOf, type Identity } from "./pairCanonicalizer";
import { createStorageGuard, type StorageGuard } from "./storageGuard";

export type Decision = "like" | "pass";

export type ErrorCode =
  | "INVALID_SESSION"
  | "INVALID_INPUT"
  | "INVALID_PAIR"
  | "INVALID_SELF_ACTION"
  | "DECISION_ALREADY_EXISTS"
  | "USER_NOT_FOUND"
  | "STORAGE_UNAVAILABLE";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = Readonly<{ ok: true; value: T }>;
type ResultErr = Readonly<{ ok: false; error: ServiceError }>;
export type Result<T> = ResultOk<T> | ResultErr;

export type Preference = Readonly<{
  preferenceId: string;
  actorId: Identity;
  targetId: Identity;
  decision: Decision;
  createdAtMs: number;
  updatedAtMs: number;
}>;

export type PreferenceRepository = Readonly<{
  // Must be atomic against the unique (actorId, targetId) key.
  insert(preference: Preference): Promise<InsertOutcome>;
  find(actorId: Identity, targetId: Identity): Promise<Preference | null>;
}>;

/**
 * Outcome of looking for the reciprocal like. `indeterminate` is a storage
 * failure and must never be read as `not_mutual`.
 */
export type MutualityCheck =
  | Readonly<{ kind: "mutual" }>
  | Readonly<{ kind: "not_mutual" }>
  | Readonly<{ kind: "indeterminate"; error: ServiceError }>;

export type RecordDecisionResult = Readonly<{
  preference: Preference;
  matched: boolean;
  matchCreated: boolean;
  match?: Match;
}>;

export type MatchedUser = Readonly<{
  id: Identity;
  name: string;
  gender?: string;
  birthDate?: string;
  bio?: string;
  avatarUrl?: string;
}>;

export type MatchSummary = Readonly<{
  matchId: string;
  matchedUser: MatchedUser;
  createdAtMs: number;
}>;

export type MatchingService = Readonly<{
  recordDecision(actorId: Identity, targetId: Identity, decision: unknown): Promise<Result<RecordDecisionResult>>;
  checkMutuality(actorId: Identity, targetId: Identity): Promise<MutualityCheck>;
  getDecision(actorId: Identity, targetId: Identity): Promise<Result<Preference | null>>;
  listMatches(identity: Identity): Promise<Result<ReadonlyArray<Match>>>;
  listMatchSummaries(identity: Identity): Promise<Result<ReadonlyArray<MatchSummary>>>;
}>;

export type MatchingServiceDeps = Readonly<{
  preferences: PreferenceRepository;
  matchStore: MatchStore;
  userDirectory?: Readonly<{
    getMatchedUser(userId: Identity): Promise<MatchedUser | null>;
  }>;
  nowMs?: () => number;
  idGenerator?: () => string;
  storage?: StorageGuard;
}>;

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

function isValidUserId(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

function isValidDecision(value: unknown): value is Decision {
  return value === "like" || value === "pass";
}

export function createMatchingService(deps: MatchingServiceDeps): MatchingService {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const idGenerator = deps.idGenerator ?? (() => crypto.randomUUID());
  const storage = deps.storage ?? createStorageGuard();
  const { preferences, matchStore, userDirectory } = deps;

  async function checkMutualityInternal(actorId: Identity, targetId: Identity): Promise<MutualityCheck> {
    const reciprocal = await storage("preferences.find", () => preferences.find(targetId, actorId));
    if (!reciprocal.ok) {
      return { kind: "indeterminate", error: reciprocal.error };
    }
    return reciprocal.value?.decision === "like" ? { kind: "mutual" } : { kind: "not_mutual" };
  }

  async function convergeOnMatch(
    preference: Preference
  ): Promise<Result<RecordDecisionResult>> {
    const mutuality = await checkMutualityInternal(preference.actorId, preference.targetId);
    if (mutuality.kind === "indeterminate") {
      return err("STORAGE_UNAVAILABLE", "Could not determine whether the like is mutual.", {
        ...mutuality.error.context,
        decisionRecorded: true
      });
    }
    if (mutuality.kind === "not_mutual") {
      return ok({ preference, matched: false, matchCreated: false });
    }

    const created: Result<CreateIfAbsentResult> = await matchStore.createIfAbsent(preference.actorId, preference.targetId);
    if (!created.ok) {
      return {
        ok: false,
        error: { ...created.error, context: { ...created.error.context, decisionRecorded: true } }
      };
    }
    return ok({
      preference,
      matched: true,
      matchCreated: created.value.created,
      match: created.value.match
    });
  }

  return {
    async recordDecision(actorId: Identity, targetId: Identity, decision: unknown): Promise<Result<RecordDecisionResult>> {
      if (!isValidUserId(actorId)) {
        return err("INVALID_SESSION", "Invalid session.");
      }
      if (!isValidUserId(targetId)) {
        return err("INVALID_INPUT", "Invalid target user.");
      }
      if (!isValidDecision(decision)) {
        return err("INVALID_INPUT", "Decision must be \"like\" or \"pass\".");
      }
      const actor = actorId.trim();
      const target = targetId.trim();
      if (actor === target) {
        return err("INVALID_SELF_ACTION", "You cannot like or pass yourself.");
      }
      if (userDirectory) {
        const found = await storage("users.getMatchedUser", () => userDirectory.getMatchedUser(target));
        if (!found.ok) return { ok: false, error: found.error };
        if (!found.value) return err("USER_NOT_FOUND", "User not found.");
      }

      const now = nowMs();
      const preference: Preference = {
        preferenceId: idGenerator(),
        actorId: actor,
        targetId: target,
        decision,
        createdAtMs: now,
        updatedAtMs: now
      };

      const inserted = await storage("preferences.insert", () => preferences.insert(preference));
      if (!inserted.ok) return { ok: false, error: inserted.error };

      if (inserted.value === "conflict") {
        const stored = await storage("preferences.find", () => preferences.find(actor, target));
        if (!stored.ok) return { ok: false, error: stored.error };
        const existing = stored.value;
        // A repeated like on a mutual pair converges on the pair's single match.
        if (existing && existing.decision === "like" && decision === "like") {
          const replay = await convergeOnMatch(existing);
          if (!replay.ok || replay.value.matched) return replay;
        }
        return err("DECISION_ALREADY_EXISTS", "You have already liked or passed this user.");
      }

      if (decision === "pass") {
        return ok({ preference, matched: false, matchCreated: false });
      }
      return convergeOnMatch(preference);
    },

    async checkMutuality(actorId: Identity, targetId: Identity): Promise<MutualityCheck> {
      if (!isValidUserId(actorId) || !isValidUserId(targetId)) {
        return { kind: "not_mutual" };
      }
      return checkMutualityInternal(actorId.trim(), targetId.trim());
    },

    async getDecision(actorId: Identity, targetId: Identity): Promise<Result<Preference | null>> {
      if (!isValidUserId(actorId) || !isValidUserId(targetId)) {
        return ok(null);
      }
      const found = await storage("preferences.find", () => preferences.find(actorId.trim(), targetId.trim()));
      if (!found.ok) return { ok: false, error: found.error };
      return ok(found.value);
    },

    async listMatches(identity: Identity): Promise<Result<ReadonlyArray<Match>>> {
      if (!isValidUserId(identity)) {
        return err("INVALID_SESSION", "Invalid session.");
      }
      return matchStore.listForIdentity(identity);
    },

    async listMatchSummaries(identity: Identity): Promise<Result<ReadonlyArray<MatchSummary>>> {
      if (!isValidUserId(identity)) {
        return err("INVALID_SESSION", "Invalid session.");
      }
      const listed = await matchStore.listForIdentity(identity);
      if (!listed.ok) return listed;

      const me = identity.trim();
      const summaries: MatchSummary[] = [];
      for (const match of listed.value) {
        const peerId = counterpartOf(match, me);
        if (!peerId) continue;
        let matchedUser: MatchedUser | null = { id: peerId, name: "" };
        if (userDirectory) {
          const peer = await storage("users.getMatchedUser", () => userDirectory.getMatchedUser(peerId));
          if (!peer.ok) return { ok: false, error: peer.error };
          matchedUser = peer.value;
        }
        // Accounts that no longer resolve are left out of the listing.
        if (!matchedUser) continue;
        summaries.push({ matchId: match.matchId, matchedUser, createdAtMs: match.createdAtMs });
      }
      return ok(summaries);
    }
  };
}
