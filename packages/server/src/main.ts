import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { Context } from "hono";
import { randomUUID } from "node:crypto";
import type { AddressInfo } from "node:net";

import { RealScheduler } from "./adapters/RealScheduler.js";
import { WebSocketBus } from "./adapters/WebSocketBus.js";
import { createServerApp } from "./app.js";
import { loadServerConfig } from "./config.js";
import {
  InMemoryAccountGateway,
  InMemoryPresenceRegistry,
  InMemorySessionGateway,
  RealtimeGateway,
  dispatchCommand,
  isValidAccountId,
} from "./core.js";
import type { CommandContext } from "./core.js";
import { createConsoleLogger } from "./logger.js";

const POLICY_VIOLATION = 1008;

export async function startServer(): Promise<void> {
  const config = loadServerConfig(process.env);
  const logger = createConsoleLogger("rps-server");
  const sessionGateway = new InMemorySessionGateway();
  const accountGateway = new InMemoryAccountGateway(config.game.defaultRating);
  const presence = new InMemoryPresenceRegistry();
  const bus = new WebSocketBus(presence, logger);

  let scheduler: RealScheduler;

  const createContext = (): CommandContext => ({
    sessionGateway,
    accountGateway,
    bus,
    scheduler,
    config: config.game,
    logger,
  });

  scheduler = new RealScheduler({
    contextFactory: async (): Promise<CommandContext> => createContext(),
    logger,
  });

  const gateway = new RealtimeGateway({ presence, createContext, logger });

  const app = createServerApp({
    port: config.port,
    sessionGateway,
    accountGateway,
    logger,
    createContext,
    dispatch: dispatchCommand,
  });

  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws",
    upgradeWebSocket((c: Context) => {
      const connectionId = randomUUID();
      const accountId = Number(c.req.query("accountId"));

      return {
        onOpen(_event, ws): void {
          const rawSocket = ws.raw;
          if (!rawSocket || !isValidAccountId(accountId)) {
            logger.warn("WebSocket connection refused", { connectionId, accountId });
            ws.close(POLICY_VIOLATION, "Unknown account");
            return;
          }

          bus.attach(connectionId, rawSocket);
          gateway.connect(connectionId, accountId).catch((error: unknown) => {
            logger.warn("WebSocket connection refused", { connectionId, accountId, error });
            bus.detach(connectionId);
            ws.close(POLICY_VIOLATION, "Unknown account");
          });
        },
        onMessage(event): void {
          const raw = typeof event.data === "string" ? event.data : "";
          gateway.receive(connectionId, raw).catch((error: unknown) => {
            logger.error("Failed to handle WebSocket message", { connectionId, error });
          });
        },
        onClose(): void {
          bus.detach(connectionId);
          gateway.disconnect(connectionId).catch((error: unknown) => {
            logger.error("Failed to process disconnect", { connectionId, error });
          });
        },
        onError(error): void {
          logger.warn("WebSocket client error", { connectionId, error });
        },
      };
    }),
  );

  const server = serve({ fetch: app.fetch, port: config.port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);
}

startServer().catch((error: unknown) => {
  createConsoleLogger("rps-server").error("Failed to start server", { error });
  process.exit(1);
});
