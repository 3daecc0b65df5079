import crypto from "node:crypto";

import type { Match, MatchStore } from "./matchStore";
import { canonicalizePair, isPairMember, type Identity } from "./pairCanonicalizer";
import { createStorageGuard, type StorageGuard } from "./storageGuard";

export type ErrorCode =
  | "INVALID_SESSION"
  | "INVALID_INPUT"
  | "INVALID_PAIR"
  | "NO_ACTIVE_MATCH"
  | "NOT_A_MATCH_MEMBER"
  | "STORAGE_UNAVAILABLE";

export type ServiceError = Readonly<{
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}>;

type ResultOk<T> = Readonly<{ ok: true; value: T }>;
type ResultErr = Readonly<{ ok: false; error: ServiceError }>;
export type Result<T> = ResultOk<T> | ResultErr;

export type ChatMessage = Readonly<{
  messageId: string;
  matchId: string;
  senderId: Identity;
  receiverId: Identity;
  content: string;
  createdAtMs: number;
}>;

export type MessageRepository = Readonly<{
  append(message: ChatMessage): Promise<void>;
  // Oldest first; insertion order breaks ties.
  listByMatch(matchId: string): Promise<ReadonlyArray<ChatMessage>>;
}>;

export type SendMessageInput = Readonly<{
  receiverId: Identity;
  content: string;
  matchId?: string;
}>;

export type ChatService = Readonly<{
  authorize(requester: Identity, counterpart: Identity): Promise<Result<boolean>>;
  sendMessage(senderId: Identity, input: SendMessageInput): Promise<Result<ChatMessage>>;
  listMessages(requesterId: Identity, matchId: string): Promise<Result<ReadonlyArray<ChatMessage>>>;
}>;

export type ChatServiceDeps = Readonly<{
  messages: MessageRepository;
  matchStore: MatchStore;
  nowMs?: () => number;
  idGenerator?: () => string;
  storage?: StorageGuard;
  maxContentLength?: number;
}>;

export const DEFAULT_MAX_CONTENT_LENGTH = 2000;

const NO_ACTIVE_MATCH_MESSAGE = "No active match found between users.";
const NOT_A_MEMBER_MESSAGE = "Not authorized to view messages for this match.";

function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

function err(code: ErrorCode, message: string, context?: Record<string, unknown>): ResultErr {
  const error: ServiceError = context ? { code, message, context } : { code, message };
  return { ok: false, error };
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

export function createChatService(deps: ChatServiceDeps): ChatService {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const idGenerator = deps.idGenerator ?? (() => crypto.randomUUID());
  const storage = deps.storage ?? createStorageGuard();
  const maxContentLength = deps.maxContentLength ?? DEFAULT_MAX_CONTENT_LENGTH;
  const { messages, matchStore } = deps;

  if (!Number.isInteger(maxContentLength) || maxContentLength <= 0) {
    throw new Error("ChatService requires a positive integer maxContentLength.");
  }

  async function activeMatch(a: Identity, b: Identity): Promise<Result<Match | null>> {
    const pair = canonicalizePair(a, b);
    if (!pair.ok) return pair;
    return matchStore.getByPair(pair.value.identityLow, pair.value.identityHigh);
  }

  return {
    async authorize(requester: Identity, counterpart: Identity): Promise<Result<boolean>> {
      const found = await activeMatch(requester, counterpart);
      if (!found.ok) return found;
      return ok(found.value !== null);
    },

    async sendMessage(senderId: Identity, input: SendMessageInput): Promise<Result<ChatMessage>> {
      if (!isNonEmptyString(senderId)) {
        return err("INVALID_SESSION", "Invalid session.");
      }
      if (typeof input !== "object" || input === null || !isNonEmptyString(input.receiverId)) {
        return err("INVALID_INPUT", "Invalid receiver.");
      }
      if (typeof input.content !== "string") {
        return err("INVALID_INPUT", "Message content is required.");
      }
      const content = input.content.trim();
      if (content === "") {
        return err("INVALID_INPUT", "Message content is required.");
      }
      if (content.length > maxContentLength) {
        return err("INVALID_INPUT", `Message content must be at most ${maxContentLength} characters.`, {
          maxContentLength
        });
      }

      const sender = senderId.trim();
      const receiver = input.receiverId.trim();
      if (sender === receiver) {
        return err("NO_ACTIVE_MATCH", NO_ACTIVE_MATCH_MESSAGE);
      }

      const found = await activeMatch(sender, receiver);
      if (!found.ok) return found;
      const match = found.value;
      if (!match) {
        return err("NO_ACTIVE_MATCH", NO_ACTIVE_MATCH_MESSAGE);
      }
      if (input.matchId !== undefined && input.matchId !== match.matchId) {
        return err("NO_ACTIVE_MATCH", NO_ACTIVE_MATCH_MESSAGE);
      }

      const message: ChatMessage = {
        messageId: idGenerator(),
        matchId: match.matchId,
        senderId: sender,
        receiverId: receiver,
        content,
        createdAtMs: nowMs()
      };
      const appended = await storage("messages.append", () => messages.append(message));
      if (!appended.ok) return { ok: false, error: appended.error };
      return ok(message);
    },

    async listMessages(requesterId: Identity, matchId: string): Promise<Result<ReadonlyArray<ChatMessage>>> {
      if (!isNonEmptyString(requesterId)) {
        return err("INVALID_SESSION", "Invalid session.");
      }
      if (!isNonEmptyString(matchId)) {
        return err("INVALID_INPUT", "Invalid match id.");
      }

      const byId = await matchStore.getById(matchId);
      if (!byId.ok) return byId;
      const match = byId.value;
      if (!match || !isPairMember(match, requesterId)) {
        return err("NOT_A_MATCH_MEMBER", NOT_A_MEMBER_MESSAGE);
      }

      const requester = requesterId.trim();
      const counterpart = match.identityLow === requester ? match.identityHigh : match.identityLow;
      const allowed = await activeMatch(requester, counterpart);
      if (!allowed.ok) return allowed;
      if (!allowed.value) {
        return err("NOT_A_MATCH_MEMBER", NOT_A_MEMBER_MESSAGE);
      }

      const listed = await storage("messages.listByMatch", () => messages.listByMatch(match.matchId));
      if (!listed.ok) return { ok: false, error: listed.error };
      return ok(listed.value);
    }
  };
}
