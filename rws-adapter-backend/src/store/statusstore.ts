// src/store/statusstore.ts

import logger from "../utility/logger";
import { ConnectionStatus, IStatusData } from "../dataset/status";

type StatusListener = (status: IStatusData) => void;

export class StatusStore {
  private store: IStatusData = {
    controller: "disconnected",
    lastSuccessfulRefresh: null,
    lastError: null,
  };
  private listeners = new Set<StatusListener>();

  public getAll(): { status: IStatusData } {
    return { status: { ...this.store } };
  }

  public onChange(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  public recordSuccess(at: Date = new Date()): void {
    this.store.lastSuccessfulRefresh = at.toISOString();
    this.store.lastError = null;
    this.applyControllerStatus("connected");
    this.pushUpdate();
  }

  public recordFailure(error: unknown): void {
    this.store.lastError =
      error instanceof Error ? error.message : String(error);
    this.applyControllerStatus("error");
    this.pushUpdate();
  }

  public setControllerStatus(status: ConnectionStatus): void {
    if (this.applyControllerStatus(status)) {
      this.pushUpdate();
    }
  }

  private applyControllerStatus(status: ConnectionStatus): boolean {
    if (this.store.controller === status) return false;
    this.store.controller = status;
    logger.info(`Controller Status Updated: ${status}`);
    return true;
  }

  private pushUpdate(): void {
    const snapshot = { ...this.store };
    this.listeners.forEach((listener) => listener(snapshot));
  }
}

export const statusStoreInstance = new StatusStore();
