import type { IncomingMessage } from "node:http";
import type { WebSocket, WebSocketServer } from "ws";

import type { Result, VerifiedToken } from "../services/authService";

export type ErrorCode = "INVALID_SESSION" | "INVALID_INPUT";

// Codes from the auth service pass through unchanged.
export type ServiceError = {
  code: string;
  message: string;
  context?: Record<string, unknown>;
};

export type MessageEnvelope = Readonly<{
  type: string;
  payload?: unknown;
}>;

export type AuthHandshakePayload = Readonly<{
  jwt: string;
}>;

export type NotificationType = "match_created" | "message_created";

export type WebsocketGatewayDeps = Readonly<{
  wss: WebSocketServer;
  authService: Readonly<{
    verifyJWT(token: string): Result<VerifiedToken>;
  }>;

  maxIncomingPayloadBytes?: number;
  maxOutgoingPayloadBytes?: number;
  heartbeatTimeoutMs?: number;
  /** Sockets that have not authenticated within this window are closed. */
  authTimeoutMs?: number;
  nowMs?: () => number;
}>;

export type WebsocketGateway = Readonly<{
  close(): Promise<void>;
  /** Sends to every authenticated socket of `userId`. Returns how many sockets were written to. */
  notifyUser(userId: string, type: NotificationType, payload: unknown): number;
}>;

const DEFAULT_MAX_INCOMING_PAYLOAD_BYTES = 2 * 1024;
const DEFAULT_MAX_OUTGOING_PAYLOAD_BYTES = 16 * 1024;
const DEFAULT_HEARTBEAT_TIMEOUT_MS = 45_000;
const DEFAULT_AUTH_TIMEOUT_MS = 10_000;

function makeError(code: ErrorCode, message: string, context?: Record<string, unknown>): ServiceError {
  return context ? { code, message, context } : { code, message };
}

function safeJsonParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function isEnvelope(value: unknown): value is MessageEnvelope {
  if (typeof value !== "object" || value === null) return false;
  return "type" in value && typeof value.type === "string";
}

function isAuthPayload(value: unknown): value is AuthHandshakePayload {
  if (typeof value !== "object" || value === null) return false;
  return "jwt" in value && typeof value.jwt === "string";
}

function toBuffer(data: Buffer | ArrayBuffer | Buffer[]): Buffer {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (Buffer.isBuffer(data)) return data;
  return Buffer.from(data);
}

function send(ws: WebSocket, type: string, payload: unknown): void {
  ws.send(JSON.stringify({ type, payload }));
}

function sendError(ws: WebSocket, error: ServiceError): void {
  send(ws, "error", error);
}

function closePolicy(ws: WebSocket): void {
  if (ws.readyState === ws.CLOSING || ws.readyState === ws.CLOSED) return;
  ws.close(1008, "Policy violation");
}

export function createWebsocketGateway(deps: WebsocketGatewayDeps): WebsocketGateway {
  const maxIncomingPayloadBytes = deps.maxIncomingPayloadBytes ?? DEFAULT_MAX_INCOMING_PAYLOAD_BYTES;
  const maxOutgoingPayloadBytes = deps.maxOutgoingPayloadBytes ?? DEFAULT_MAX_OUTGOING_PAYLOAD_BYTES;
  const heartbeatTimeoutMs = deps.heartbeatTimeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT_MS;
  const authTimeoutMs = deps.authTimeoutMs ?? DEFAULT_AUTH_TIMEOUT_MS;
  const nowMs = deps.nowMs ?? (() => Date.now());

  if (!Number.isFinite(maxIncomingPayloadBytes) || maxIncomingPayloadBytes <= 0) {
    throw new Error("websocketGateway requires a positive maxIncomingPayloadBytes.");
  }
  if (!Number.isFinite(maxOutgoingPayloadBytes) || maxOutgoingPayloadBytes <= 0) {
    throw new Error("websocketGateway requires a positive maxOutgoingPayloadBytes.");
  }
  if (!Number.isFinite(heartbeatTimeoutMs) || heartbeatTimeoutMs <= 0) {
    throw new Error("websocketGateway requires a positive heartbeatTimeoutMs.");
  }
  if (!Number.isFinite(authTimeoutMs) || authTimeoutMs <= 0) {
    throw new Error("websocketGateway requires a positive authTimeoutMs.");
  }

  const connections = new Set<WebSocket>();
  const userIdBySocket = new Map<WebSocket, string>();
  const lastHeartbeatBySocket = new Map<WebSocket, number>();
  const connectedAtBySocket = new Map<WebSocket, number>();

  function cleanup(ws: WebSocket): void {
    connections.delete(ws);
    connectedAtBySocket.delete(ws);
    userIdBySocket.delete(ws);
    lastHeartbeatBySocket.delete(ws);
  }

  function handleAuth(ws: WebSocket, payload: unknown): void {
    if (!isAuthPayload(payload) || payload.jwt.trim() === "") {
      sendError(ws, makeError("INVALID_SESSION", "Missing credentials."));
      closePolicy(ws);
      return;
    }

    const verified = deps.authService.verifyJWT(payload.jwt);
    if (!verified.ok) {
      sendError(ws, verified.error);
      closePolicy(ws);
      return;
    }

    userIdBySocket.set(ws, verified.value.userId);
    lastHeartbeatBySocket.set(ws, nowMs());
    send(ws, "auth_ok", { userId: verified.value.userId });
  }

  function handleEnvelope(ws: WebSocket, envelope: MessageEnvelope): void {
    if (envelope.type === "auth") {
      if (userIdBySocket.has(ws)) {
        sendError(ws, makeError("INVALID_INPUT", "Already authenticated."));
        closePolicy(ws);
        return;
      }
      handleAuth(ws, envelope.payload);
      return;
    }

    if (!userIdBySocket.has(ws)) {
      sendError(ws, makeError("INVALID_SESSION", "Authentication required."));
      closePolicy(ws);
      return;
    }

    if (envelope.type === "heartbeat") {
      lastHeartbeatBySocket.set(ws, nowMs());
      send(ws, "heartbeat_ok", { nowMs: nowMs() });
      return;
    }

    sendError(ws, makeError("INVALID_INPUT", "Unknown message type.", { type: envelope.type }));
    closePolicy(ws);
  }

  deps.wss.on("connection", (ws: WebSocket, _req: IncomingMessage) => {
    connections.add(ws);
    connectedAtBySocket.set(ws, nowMs());

    ws.on("close", () => cleanup(ws));
    ws.on("error", () => cleanup(ws));

    ws.on("message", (data: Buffer | ArrayBuffer | Buffer[]) => {
      const buffer = toBuffer(data);
      if (buffer.byteLength > maxIncomingPayloadBytes) {
        sendError(ws, makeError("INVALID_INPUT", "Payload too large.", { maxBytes: maxIncomingPayloadBytes }));
        closePolicy(ws);
        return;
      }

      const parsed = safeJsonParse(buffer.toString("utf8"));
      if (!parsed.ok || !isEnvelope(parsed.value)) {
        sendError(ws, makeError("INVALID_INPUT", "Invalid message envelope."));
        closePolicy(ws);
        return;
      }

      handleEnvelope(ws, parsed.value);
    });
  });

  const heartbeatTimer = setInterval(() => {
    const now = nowMs();
    for (const ws of connections) {
      const last = lastHeartbeatBySocket.get(ws);
      if (typeof last !== "number") {
        const connectedAt = connectedAtBySocket.get(ws) ?? now;
        if (now - connectedAt > authTimeoutMs) {
          sendError(ws, makeError("INVALID_SESSION", "Authentication timeout."));
          closePolicy(ws);
        }
        continue;
      }
      if (now - last > heartbeatTimeoutMs) {
        sendError(ws, makeError("INVALID_SESSION", "Heartbeat timeout."));
        closePolicy(ws);
      }
    }
  }, Math.min(heartbeatTimeoutMs, authTimeoutMs, 5_000));
  heartbeatTimer.unref();

  return {
    async close(): Promise<void> {
      clearInterval(heartbeatTimer);
      for (const ws of connections) {
        ws.terminate();
      }
      await new Promise<void>((resolve) => deps.wss.close(() => resolve()));
    },

    notifyUser(userId: string, type: NotificationType, payload: unknown): number {
      const message = JSON.stringify({ type, payload });
      const bytes = Buffer.byteLength(message, "utf8");
      if (bytes > maxOutgoingPayloadBytes) {
        throw new Error(`websocketGateway notification exceeds ${maxOutgoingPayloadBytes} bytes.`);
      }

      let delivered = 0;
      for (const ws of connections) {
        if (ws.readyState !== ws.OPEN) continue;
        if (userIdBySocket.get(ws) !== userId) continue;
        ws.send(message);
        delivered += 1;
      }
      return delivered;
    }
  };
}
