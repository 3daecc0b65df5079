import http from "node:http";
import { WebSocket, WebSocketServer } from "ws";

import { createWebsocketGateway } from "../backend/src/realtime/websocketGateway";
import { createInMemoryUserRepository } from "../backend/src/repositories/inMemoryUserRepository";
import { createAuthService, type AuthService } from "../backend/src/services/authService";

const NOW = 1_700_000_000_000;

function waitForOpen(ws: WebSocket): Promise<void> {
  return new Promise((resolve, reject) => {
    ws.once("open", () => resolve());
    ws.once("error", (e) => reject(e));
  });
}

function waitForClose(ws: WebSocket): Promise<number> {
  return new Promise((resolve) => {
    ws.once("close", (code) => resolve(code));
  });
}

function waitForMessage(ws: WebSocket): Promise<unknown> {
  return new Promise((resolve, reject) => {
    ws.once("message", (data) => {
      try {
        const text = Buffer.isBuffer(data) ? data.toString("utf8") : String(data);
        resolve(JSON.parse(text));
      } catch (e) {
        reject(e);
      }
    });
  });
}

async function closeClient(ws: WebSocket): Promise<void> {
  if (ws.readyState === ws.CLOSED) return;
  const closed = waitForClose(ws);
  ws.close();
  await closed;
}

async function createServer(): Promise<{
  url: string;
  wss: WebSocketServer;
  closeHttp(): Promise<void>;
}> {
  const server = http.createServer((_req, res) => {
    res.writeHead(200);
    res.end("ok");
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("unexpected address");
  const url = `ws://127.0.0.1:${address.port}`;
  const wss = new WebSocketServer({ server });
  return {
    url,
    wss,
    async closeHttp() {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  };
}

function createAuth(nowMs: () => number = () => NOW): AuthService {
  return createAuthService({ users: createInMemoryUserRepository(), jwtSecret: "test-secret", nowMs });
}

function tokenFor(authService: AuthService, id: string): string {
  const token = authService.issueJWT({ id, email: `${id}@example.com` });
  if (!token.ok) throw new Error("unreachable");
  return token.value;
}

async function connectAndAuth(url: string, token: string): Promise<WebSocket> {
  const ws = new WebSocket(url);
  await waitForOpen(ws);
  const reply = waitForMessage(ws);
  ws.send(JSON.stringify({ type: "auth", payload: { jwt: token } }));
  await reply;
  return ws;
}

describe("websocketGateway", () => {
  it("Given invalid gateway limits When createWebsocketGateway is called Then it throws", async () => {
    const authService = createAuth();
    const server = await createServer();

    try {
      expect(() => createWebsocketGateway({ wss: server.wss, authService, maxIncomingPayloadBytes: 0 })).toThrow(
        "websocketGateway requires a positive maxIncomingPayloadBytes."
      );
      expect(() => createWebsocketGateway({ wss: server.wss, authService, maxOutgoingPayloadBytes: -1 })).toThrow(
        "websocketGateway requires a positive maxOutgoingPayloadBytes."
      );
      expect(() => createWebsocketGateway({ wss: server.wss, authService, heartbeatTimeoutMs: 0 })).toThrow(
        "websocketGateway requires a positive heartbeatTimeoutMs."
      );
      expect(() => createWebsocketGateway({ wss: server.wss, authService, authTimeoutMs: 0 })).toThrow(
        "websocketGateway requires a positive authTimeoutMs."
      );
    } finally {
      await server.closeHttp();
    }
  });

  it("Given a valid token When a client sends an auth handshake Then the gateway responds with auth_ok", async () => {
    const authService = createAuth();
    const server = await createServer();
    const gateway = createWebsocketGateway({ wss: server.wss, authService, nowMs: () => NOW });
    const ws = new WebSocket(server.url);

    try {
      await waitForOpen(ws);
      const reply = waitForMessage(ws);
      ws.send(JSON.stringify({ type: "auth", payload: { jwt: tokenFor(authService, "u_a") } }));

      expect(await reply).toEqual({ type: "auth_ok", payload: { userId: "u_a" } });
    } finally {
      await closeClient(ws);
      await gateway.close();
      await server.closeHttp();
    }
  });

  it("Given a forged token When a client authenticates Then it gets INVALID_SESSION and a policy close", async () => {
    const authService = createAuth();
    const server = await createServer();
    const gateway = createWebsocketGateway({ wss: server.wss, authService });
    const ws = new WebSocket(server.url);

    try {
      await waitForOpen(ws);
      const reply = waitForMessage(ws);
      const closed = waitForClose(ws);
      ws.send(JSON.stringify({ type: "auth", payload: { jwt: "not-a-jwt" } }));

      expect(await reply).toEqual({ type: "error", payload: { code: "INVALID_SESSION", message: "Invalid session." } });
      expect(await closed).toBe(1008);
    } finally {
      await closeClient(ws);
      await gateway.close();
      await server.closeHttp();
    }
  });

  it("Given an unauthenticated socket When it sends a heartbeat Then authentication is required", async () => {
    const authService = createAuth();
    const server = await createServer();
    const gateway = createWebsocketGateway({ wss: server.wss, authService });
    const ws = new WebSocket(server.url);

    try {
      await waitForOpen(ws);
      const reply = waitForMessage(ws);
      const closed = waitForClose(ws);
      ws.send(JSON.stringify({ type: "heartbeat" }));

      expect(await reply).toEqual({
        type: "error",
        payload: { code: "INVALID_SESSION", message: "Authentication required." }
      });
      expect(await closed).toBe(1008);
    } finally {
      await closeClient(ws);
      await gateway.close();
      await server.closeHttp();
    }
  });

  it("Given a malformed envelope When it arrives Then the socket is closed", async () => {
    const authService = createAuth();
    const server = await createServer();
    const gateway = createWebsocketGateway({ wss: server.wss, authService });
    const ws = new WebSocket(server.url);

    try {
      await waitForOpen(ws);
      const reply = waitForMessage(ws);
      const closed = waitForClose(ws);
      ws.send("{not json");

      expect(await reply).toEqual({
        type: "error",
        payload: { code: "INVALID_INPUT", message: "Invalid message envelope." }
      });
      expect(await closed).toBe(1008);
    } finally {
      await closeClient(ws);
      await gateway.close();
      await server.closeHttp();
    }
  });

  it("Given an authenticated socket When it sends a heartbeat Then heartbeat_ok carries the server time", async () => {
    const authService = createAuth();
    const server = await createServer();
    const gateway = createWebsocketGateway({ wss: server.wss, authService, nowMs: () => NOW });
    const ws = await connectAndAuth(server.url, tokenFor(authService, "u_a"));

    try {
      const reply = waitForMessage(ws);
      ws.send(JSON.stringify({ type: "heartbeat" }));

      expect(await reply).toEqual({ type: "heartbeat_ok", payload: { nowMs: NOW } });
    } finally {
      await closeClient(ws);
      await gateway.close();
      await server.closeHttp();
    }
  });

  it("Given a silent authenticated socket When the heartbeat window passes Then it is closed", async () => {
    let now = NOW;
    const authService = createAuth(() => NOW);
    const server = await createServer();
    const gateway = createWebsocketGateway({
      wss: server.wss,
      authService,
      nowMs: () => now,
      heartbeatTimeoutMs: 50
    });
    const ws = await connectAndAuth(server.url, tokenFor(authService, "u_a"));

    try {
      const reply = waitForMessage(ws);
      const closed = waitForClose(ws);
      now = NOW + 1_000;

      expect(await reply).toEqual({ type: "error", payload: { code: "INVALID_SESSION", message: "Heartbeat timeout." } });
      expect(await closed).toBe(1008);
    } finally {
      await closeClient(ws);
      await gateway.close();
      await server.closeHttp();
    }
  });

  it("Given a socket that never authenticates When the auth window passes Then it is closed", async () => {
    let now = NOW;
    const authService = createAuth(() => NOW);
    const server = await createServer();
    const gateway = createWebsocketGateway({
      wss: server.wss,
      authService,
      nowMs: () => now,
      authTimeoutMs: 50
    });
    const ws = new WebSocket(server.url);

    try {
      await waitForOpen(ws);
      const reply = waitForMessage(ws);
      const closed = waitForClose(ws);
      now = NOW + 1_000;

      expect(await reply).toEqual({
        type: "error",
        payload: { code: "INVALID_SESSION", message: "Authentication timeout." }
      });
      expect(await closed).toBe(1008);
    } finally {
      await closeClient(ws);
      await gateway.close();
      await server.closeHttp();
    }
  });

  it("Given two users connected When notifyUser targets one Then only that user's socket receives it", async () => {
    const authService = createAuth();
    const server = await createServer();
    const gateway = createWebsocketGateway({ wss: server.wss, authService });
    const alice = await connectAndAuth(server.url, tokenFor(authService, "u_a"));
    const bob = await connectAndAuth(server.url, tokenFor(authService, "u_b"));

    try {
      const received = waitForMessage(alice);

      expect(gateway.notifyUser("u_a", "match_created", { matchId: "m-1" })).toBe(1);
      expect(await received).toEqual({ type: "match_created", payload: { matchId: "m-1" } });
      expect(gateway.notifyUser("u_c", "message_created", { messageId: "msg-1" })).toBe(0);
    } finally {
      await closeClient(alice);
      await closeClient(bob);
      await gateway.close();
      await server.closeHttp();
    }
  });

  it("Given a notification over the outgoing limit When notifyUser is called Then it throws", async () => {
    const authService = createAuth();
    const server = await createServer();
    const gateway = createWebsocketGateway({ wss: server.wss, authService, maxOutgoingPayloadBytes: 64 });

    try {
      expect(() => gateway.notifyUser("u_a", "message_created", { content: "x".repeat(100) })).toThrow(
        "websocketGateway notification exceeds 64 bytes."
      );
    } finally {
      await gateway.close();
      await server.closeHttp();
    }
  });
});
