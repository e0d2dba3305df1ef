import http from "http";
import { io as connect, Socket as ClientSocket } from "socket.io-client";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IOSignalInfo } from "../src/dataset/signals";
import { SnapshotStore } from "../src/store/snapshotstore";
import { StatusStore } from "../src/store/statusstore";
import { WebSocketManager, socketEvents } from "../src/utility/websocket";
import { listen } from "./listen";

function nextEvent(client: ClientSocket, event: string): Promise<unknown> {
  return new Promise((resolve) => {
    client.once(event, resolve);
  });
}

describe("WebSocketManager", () => {
  let snapshots: SnapshotStore;
  let status: StatusStore;
  let manager: WebSocketManager;
  let client: ClientSocket;
  let greeting: Promise<unknown>;

  beforeEach(async () => {
    snapshots = new SnapshotStore();
    status = new StatusStore();
    const server = http.createServer();
    manager = new WebSocketManager(snapshots, status);
    manager.start(server);
    const url = await listen(server);

    client = connect(url, { transports: ["websocket"] });
    greeting = nextEvent(client, socketEvents.status);
  });

  afterEach(async () => {
    client.disconnect();
    await manager.close();
  });

  it("sends the current status to a new client", async () => {
    expect(await greeting).toEqual({
      status: {
        controller: "disconnected",
        lastSuccessfulRefresh: null,
        lastError: null,
      },
    });
  });

  it("broadcasts status changes", async () => {
    await greeting;
    const update = nextEvent(client, socketEvents.status);

    status.recordSuccess(new Date("2026-03-01T08:00:00.000Z"));

    expect(await update).toEqual({
      status: {
        controller: "connected",
        lastSuccessfulRefresh: "2026-03-01T08:00:00.000Z",
        lastError: null,
      },
    });
  });

  it("broadcasts snapshot changes as JSON", async () => {
    await greeting;
    const update = nextEvent(client, socketEvents.snapshot);

    snapshots.setSignals(
      IOSignalInfo.fromEntries([
        { name: "do1", value: true, kind: "digital" },
        { name: "ai1", value: 3.5, kind: "analog" },
      ])
    );

    expect(await update).toEqual({
      kind: "signals",
      value: {
        do1: { kind: "digital", value: true },
        ai1: { kind: "analog", value: 3.5 },
      },
    });
  });
});
