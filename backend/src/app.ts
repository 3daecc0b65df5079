import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";

import type { NotificationType } from "./realtime/websocketGateway";
import type { AuthService, ServiceError as AuthError, VerifiedToken } from "./services/authService";
import type { ChatService, ServiceError as ChatError } from "./services/chatService";
import type { MatchingService, ServiceError as MatchingError } from "./services/matchingService";
import type { ProfileService, ServiceError as ProfileError } from "./services/profileService";

type AnyServiceError = AuthError | ChatError | MatchingError | ProfileError;

export type Notifier = Readonly<{
  notifyUser(userId: string, type: NotificationType, payload: unknown): number;
}>;

export type AppDeps = Readonly<{
  authService: AuthService;
  profileService: ProfileService;
  matchingService: MatchingService;
  chatService: ChatService;
  corsAllowedOrigins: string;
  notifier?: Notifier;
  onUnexpectedError?: (error: unknown, req: Request) => void;
}>;

export function statusForCode(code: AnyServiceError["code"]): number {
  return code === "INVALID_SESSION" || code === "INVALID_CREDENTIALS"
    ? 401
    : code === "NO_ACTIVE_MATCH" || code === "NOT_A_MATCH_MEMBER"
      ? 403
    : code === "USER_NOT_FOUND"
      ? 404
    : code === "DECISION_ALREADY_EXISTS" || code === "EMAIL_ALREADY_REGISTERED"
      ? 409
    : code === "STORAGE_UNAVAILABLE"
      ? 503
    : 400;
}

function sendError(res: Response, error: AnyServiceError): void {
  res.status(statusForCode(error.code)).json(error);
}

type AllowedOrigins = Readonly<{
  exact: ReadonlySet<string>;
  allowAny: boolean;
  wildcardSuffixes: ReadonlyArray<string>;
}>;

export function parseAllowedOrigins(raw: string): AllowedOrigins {
  const exact = new Set<string>();
  const wildcardSuffixes: string[] = [];
  let allowAny = false;
  const values = raw
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
  for (const value of values) {
    if (value === "*") {
      allowAny = true;
      continue;
    }
    const protoSplit = value.indexOf("://");
    const wildcardIndex = value.indexOf("*.");
    if (protoSplit > 0 && wildcardIndex === protoSplit + 3) {
      const suffix = value.slice(wildcardIndex + 1).trim().toLowerCase();
      if (suffix.length > 2 && suffix.startsWith(".")) {
        wildcardSuffixes.push(suffix);
        continue;
      }
    }
    exact.add(value);
  }
  return { exact, allowAny, wildcardSuffixes };
}

export function isOriginAllowed(origin: string, allowed: AllowedOrigins): boolean {
  if (allowed.allowAny) return true;
  if (allowed.exact.has(origin)) return true;
  let host = "";
  try {
    host = new URL(origin).hostname.toLowerCase();
  } catch {
    return false;
  }
  if (!host) return false;
  for (const suffix of allowed.wildcardSuffixes) {
    if (host.endsWith(suffix) && host !== suffix.slice(1)) {
      return true;
    }
  }
  return false;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isObject(body) ? body : {};
}

function getBearerToken(req: Request): string | null {
  const header = req.header("authorization");
  if (typeof header !== "string") return null;
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  return match ? match[1] : null;
}

function isJsonSyntaxError(e: unknown): boolean {
  return e instanceof SyntaxError && isObject(e) && e.type === "entity.parse.failed";
}

// Express 4 does not forward rejected promises to the error middleware.
function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    void handler(req, res).catch(next);
  };
}

export function createApp(deps: AppDeps): express.Express {
  const { authService, profileService, matchingService, chatService } = deps;
  const onUnexpectedError =
    deps.onUnexpectedError ??
    ((error: unknown, req: Request) => {
      const message = error instanceof Error ? error.stack ?? error.message : String(error);
      console.error(`[Pairwise] Unhandled error on ${req.method} ${req.path}: ${message}`);
    });

  function notify(userId: string, type: NotificationType, payload: unknown): void {
    if (!deps.notifier) return;
    try {
      deps.notifier.notifyUser(userId, type, payload);
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      console.error(`[Pairwise] Realtime notification "${type}" to ${userId} failed: ${message}`);
    }
  }

  function authenticate(req: Request): ReturnType<AuthService["verifyJWT"]> {
    return authService.verifyJWT(getBearerToken(req) ?? "");
  }

  const app = express();
  const allowedOrigins = parseAllowedOrigins(deps.corsAllowedOrigins);
  app.disable("x-powered-by");
  app.use((req, res, next) => {
    const originHeader = req.headers.origin;
    const origin = typeof originHeader === "string" ? originHeader.trim() : "";
    if (origin !== "" && isOriginAllowed(origin, allowedOrigins)) {
      res.setHeader("Access-Control-Allow-Origin", origin);
      res.setHeader("Vary", "Origin");
      res.setHeader("Access-Control-Allow-Methods", "GET,POST,PUT,PATCH,DELETE,OPTIONS");
      res.setHeader("Access-Control-Allow-Headers", "Content-Type,Authorization");
    }
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  });
  app.use(express.json({ limit: "16kb" }));

  app.get("/", (_req, res) => {
    res.status(200).json({ message: "Pairwise API" });
  });

  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok" });
  });

  // Accounts
  app.post(
    "/api/users",
    asyncRoute(async (req, res) => {
      const { email, password, name } = bodyOf(req);
      const result = await authService.register(
        typeof email === "string" ? email : "",
        typeof password === "string" ? password : "",
        typeof name === "string" ? name : ""
      );
      if (!result.ok) return sendError(res, result.error);
      res.status(201).json(result.value);
    })
  );

  app.post(
    "/api/users/sign_in",
    asyncRoute(async (req, res) => {
      const { email, password } = bodyOf(req);
      if (typeof email !== "string" || typeof password !== "string") {
        return sendError(res, { code: "INVALID_INPUT", message: "Email and password are required." });
      }
      const result = await authService.login(email, password);
      if (!result.ok) return sendError(res, result.error);
      res.status(200).json(result.value);
    })
  );

  // Tokens are stateless; the client discards its copy.
  app.delete("/api/users/sign_out", (req, res) => {
    const auth = authenticate(req);
    if (!auth.ok) return sendError(res, auth.error);
    res.status(200).json({ message: "Signed out." });
  });

  app.get(
    "/api/users/profile",
    asyncRoute(async (req, res) => {
      const auth = authenticate(req);
      if (!auth.ok) return sendError(res, auth.error);
      const result = await profileService.getProfile(auth.value.userId);
      if (!result.ok) return sendError(res, result.error);
      res.status(200).json({ user: result.value });
    })
  );

  const updateProfile = asyncRoute(async (req, res) => {
    const auth = authenticate(req);
    if (!auth.ok) return sendError(res, auth.error);
    const { name, gender, birthDate, bio, avatarUrl } = bodyOf(req);
    const result = await profileService.updateProfile(auth.value.userId, { name, gender, birthDate, bio, avatarUrl });
    if (!result.ok) return sendError(res, result.error);
    res.status(200).json({ user: result.value });
  });
  app.patch("/api/users/profile", updateProfile);
  app.put("/api/users/profile", updateProfile);

  // Matching
  async function decide(me: VerifiedToken, targetUserId: unknown, decision: unknown) {
    return matchingService.recordDecision(me.userId, typeof targetUserId === "string" ? targetUserId : "", decision);
  }

  app.post(
    "/api/likes",
    asyncRoute(async (req, res) => {
      const auth = authenticate(req);
      if (!auth.ok) return sendError(res, auth.error);
      const { targetUserId, status } = bodyOf(req);
      const result = await decide(auth.value, targetUserId, status);
      if (!result.ok) return sendError(res, result.error);

      const { preference, matched, matchCreated, match } = result.value;
      if (matchCreated && match) {
        notify(match.identityLow, "match_created", { match });
        notify(match.identityHigh, "match_created", { match });
      }
      res.status(201).json(match ? { like: preference, matched, match } : { like: preference, matched });
    })
  );

  app.post(
    "/api/passes",
    asyncRoute(async (req, res) => {
      const auth = authenticate(req);
      if (!auth.ok) return sendError(res, auth.error);
      const { targetUserId } = bodyOf(req);
      const result = await decide(auth.value, targetUserId, "pass");
      if (!result.ok) return sendError(res, result.error);
      res.status(201).json({ pass: result.value.preference });
    })
  );

  app.get(
    "/api/matches",
    asyncRoute(async (req, res) => {
      const auth = authenticate(req);
      if (!auth.ok) return sendError(res, auth.error);
      const result = await matchingService.listMatchSummaries(auth.value.userId);
      if (!result.ok) return sendError(res, result.error);
      res.status(200).json({ matches: result.value });
    })
  );

  // Chat
  app.post(
    "/api/messages",
    asyncRoute(async (req, res) => {
      const auth = authenticate(req);
      if (!auth.ok) return sendError(res, auth.error);
      const { receiverId, content, matchId } = bodyOf(req);
      if (matchId !== undefined && typeof matchId !== "string") {
        return sendError(res, { code: "INVALID_INPUT", message: "Invalid match id." });
      }
      const result = await chatService.sendMessage(auth.value.userId, {
        receiverId: typeof receiverId === "string" ? receiverId : "",
        content: typeof content === "string" ? content : "",
        matchId
      });
      if (!result.ok) return sendError(res, result.error);
      notify(result.value.receiverId, "message_created", { message: result.value });
      res.status(201).json({ message: result.value });
    })
  );

  app.get(
    "/api/matches/:matchId/messages",
    asyncRoute(async (req, res) => {
      const auth = authenticate(req);
      if (!auth.ok) return sendError(res, auth.error);
      const result = await chatService.listMessages(auth.value.userId, req.params.matchId);
      if (!result.ok) return sendError(res, result.error);
      res.status(200).json({ messages: result.value });
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ code: "NOT_FOUND", message: "Route not found." });
  });

  // Final error boundary.
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isJsonSyntaxError(error)) {
      sendError(res, { code: "INVALID_INPUT", message: "Request body must be valid JSON." });
      return;
    }
    onUnexpectedError(error, req);
    res.status(500).json({ code: "INTERNAL_ERROR", message: "Internal error." });
  });

  return app;
}
