// src/utility/websocket.ts

import type { Server as HttpServer } from "http";
import { Server, Socket } from "socket.io";
import logger from "./logger";
import { IStatusData } from "../dataset/status";
import { SnapshotChange, SnapshotStore } from "../store/snapshotstore";
import { StatusStore } from "../store/statusstore";

export const socketEvents = {
  snapshot: "snapshotUpdate",
  status: "statusUpdate",
} as const;

/**
 * Pushes store changes to every connected client. A new client first gets
 * the current controller status.
 */
export class WebSocketManager {
  private readonly io: Server;
  private unsubscribers: (() => void)[] = [];

  constructor(
    private readonly snapshots: SnapshotStore,
    private readonly status: StatusStore
  ) {
    this.io = new Server({
      cors: {
        origin: "*",
        methods: ["GET", "POST"],
      },
    });
  }

  public start(server: HttpServer): void {
    this.io.attach(server);
    this.io.on("connection", (socket: Socket) => {
      logger.info(`New connection: ${socket.id}`);
      socket.emit(socketEvents.status, this.status.getAll());
      logger.debug(`${this.getClientCount()} client(s) connected.`);

      socket.on("disconnect", () => {
        logger.info(`Disconnected: ${socket.id}`);
      });
    });

    this.unsubscribers = [
      this.snapshots.onChange((change) => this.broadcastSnapshot(change)),
      this.status.onChange((status) => this.broadcastStatus(status)),
    ];
  }

  public broadcastSnapshot(change: SnapshotChange): void {
    this.io.emit(socketEvents.snapshot, change);
  }

  public broadcastStatus(status: IStatusData): void {
    this.io.emit(socketEvents.status, { status });
  }

  public getClientCount(): number {
    return this.io.engine.clientsCount;
  }

  /** Stops listening to the stores and closes socket.io with its HTTP server. */
  public close(): Promise<void> {
    this.unsubscribers.forEach((unsubscribe) => unsubscribe());
    this.unsubscribers = [];
    return new Promise((resolve) => {
      this.io.close(() => resolve());
    });
  }
}
