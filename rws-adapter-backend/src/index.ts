// src/index.ts

import http from "http";
import { createApp } from "./app";
import { WebSocketManager } from "./utility/websocket";
import logger from "./utility/logger";
import { config } from "./config/config";
import { HttpResourceFetcher } from "./utility/httpFetcher";
import { ControllerSynchronizer } from "./services/synchronizer";
import { snapshotStoreInstance } from "./store/snapshotstore";
import { statusStoreInstance } from "./store/statusstore";
import { describeCause } from "./dataset/errors";

const fetcher = new HttpResourceFetcher({
  baseUrl: config.controller.baseUrl,
  username: config.controller.username,
  password: config.controller.password,
});

const synchronizer = new ControllerSynchronizer(
  fetcher,
  snapshotStoreInstance,
  statusStoreInstance,
  { timeoutMs: config.controller.requestTimeoutMs }
);

const app = createApp({
  snapshots: snapshotStoreInstance,
  status: statusStoreInstance,
  synchronizer,
});
const server = http.createServer(app);
const webSocketManager = new WebSocketManager(
  snapshotStoreInstance,
  statusStoreInstance
);

server.listen(config.application.port, "0.0.0.0", () => {
  logger.info(`Server is running on 0.0.0.0:${config.application.port}`);
});

webSocketManager.start(server);

synchronizer.refreshStaticInfo().catch((error: unknown) => {
  logger.warn(`Initial static info refresh failed: ${describeCause(error)}`);
});

function gracefulShutdown(signal: string) {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  statusStoreInstance.setControllerStatus("disconnected");

  webSocketManager
    .close()
    .then(() => {
      logger.info("WebSocket and HTTP server closed");
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.error(`Shutdown failed: ${describeCause(error)}`);
      process.exit(1);
    });

  setTimeout(() => {
    logger.info("Graceful shutdown timed out. Exiting...");
    process.exit(0);
  }, 5000).unref();
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));
