import http from "node:http";

import { WebSocketServer } from "ws";

import { createApp } from "./app";
import { resolveServerConfigFromEnv } from "./config";
import { createWebsocketGateway } from "./realtime/websocketGateway";
import { createInMemoryMatchRepository } from "./repositories/inMemoryMatchRepository";
import { createInMemoryMessageRepository } from "./repositories/inMemoryMessageRepository";
import { createInMemoryPreferenceRepository } from "./repositories/inMemoryPreferenceRepository";
import { createInMemoryUserRepository } from "./repositories/inMemoryUserRepository";
import { createPostgresPool, ensurePostgresSchema } from "./repositories/postgresCore";
import { createPostgresMatchRepository } from "./repositories/postgresMatchRepository";
import { createPostgresMessageRepository } from "./repositories/postgresMessageRepository";
import { createPostgresPreferenceRepository } from "./repositories/postgresPreferenceRepository";
import { createPostgresUserRepository } from "./repositories/postgresUserRepository";
import { createAuthService } from "./services/authService";
import { createChatService } from "./services/chatService";
import { createMatchStore } from "./services/matchStore";
import { createMatchingService } from "./services/matchingService";
import { createProfileService, createUserDirectory } from "./services/profileService";
import { createStorageGuard } from "./services/storageGuard";

async function main(): Promise<void> {
  const config = resolveServerConfigFromEnv();

  const postgresPool = config.postgres ? createPostgresPool(config.postgres) : null;
  if (postgresPool) {
    await ensurePostgresSchema(postgresPool);
    console.log(`[Pairwise] Persistence mode: PostgreSQL (${config.postgres?.sourceEnvKey})`);
  } else {
    console.log("[Pairwise] Persistence mode: in-memory");
  }

  const users = postgresPool ? createPostgresUserRepository(postgresPool) : createInMemoryUserRepository();
  const preferences = postgresPool ? createPostgresPreferenceRepository(postgresPool) : createInMemoryPreferenceRepository();
  const matches = postgresPool ? createPostgresMatchRepository(postgresPool) : createInMemoryMatchRepository();
  const messages = postgresPool ? createPostgresMessageRepository(postgresPool) : createInMemoryMessageRepository();

  const storage = createStorageGuard({ timeoutMs: config.storageTimeoutMs });

  const authService = createAuthService({
    users,
    jwtSecret: config.jwtSecret,
    jwtTtlSeconds: config.jwtTtlSeconds,
    storage
  });
  const profileService = createProfileService({ users, storage });
  const matchStore = createMatchStore({ repo: matches, storage });
  const matchingService = createMatchingService({
    preferences,
    matchStore,
    userDirectory: createUserDirectory(users),
    storage
  });
  const chatService = createChatService({ messages, matchStore, storage });

  const server = http.createServer();
  const wss = new WebSocketServer({ server });
  const gateway = createWebsocketGateway({ wss, authService });

  const app = createApp({
    authService,
    profileService,
    matchingService,
    chatService,
    corsAllowedOrigins: config.corsAllowedOrigins,
    notifier: gateway
  });
  server.on("request", app);

  server.listen(config.port, () => {
    console.log(`[Pairwise] ${config.appEnv} backend listening on http://localhost:${config.port}`);
  });

  const shutdown = async (): Promise<void> => {
    console.log("[Pairwise] Shutting down.");
    await gateway.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (postgresPool) {
      await postgresPool.end();
    }
  };

  process.on("SIGINT", () => {
    void shutdown().finally(() => process.exit(0));
  });
  process.on("SIGTERM", () => {
    void shutdown().finally(() => process.exit(0));
  });
}

main().catch((e: unknown) => {
  const message = e instanceof Error ? e.message : String(e);
  console.error(`[Pairwise] Startup failed: ${message}`);
  process.exit(1);
});
