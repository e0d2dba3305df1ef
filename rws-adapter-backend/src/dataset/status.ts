// src/dataset/status.ts

export type ConnectionStatus = "connected" | "disconnected" | "error";

/**
 * Status object kept by StatusStore and sent to the frontend.
 */
export interface IStatusData {
  controller: ConnectionStatus;
  lastSuccessfulRefresh: string | null; // ISO timestamp
  lastError: string | null;
}
