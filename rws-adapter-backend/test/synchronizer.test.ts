import { describe, expect, it } from "vitest";
import { collectDiagnostics } from "../src/dataset/diagnostics";
import {
  ControllerRequestError,
  PartialAggregateFailureError,
  RefreshCancelledError,
  RefreshTimeoutError,
} from "../src/dataset/errors";
import { rwsResources } from "../src/dataset/resources";
import { ControllerSynchronizer } from "../src/services/synchronizer";
import { SnapshotChange, SnapshotStore } from "../src/store/snapshotstore";
import { StatusStore } from "../src/store/statusstore";
import { FakeFetcher, heldReply } from "./fakeFetcher";
import { fixture } from "./fixtures";

function setup(fetcher: FakeFetcher, timeoutMs = 1000) {
  const snapshots = new SnapshotStore();
  const status = new StatusStore();
  const { sink, diagnostics } = collectDiagnostics();
  const synchronizer = new ControllerSynchronizer(fetcher, snapshots, status, {
    timeoutMs,
    sink,
  });
  const changes: SnapshotChange[] = [];
  snapshots.onChange((change) => changes.push(change));
  return { snapshots, status, synchronizer, diagnostics, changes };
}

function staticInfoController(): FakeFetcher {
  return new FakeFetcher()
    .reply(rwsResources.rapidTasks, fixture("rapid-tasks.xml"))
    .reply(rwsResources.system, fixture("system.xml"))
    .reply(rwsResources.controllerIdentity, fixture("identity.xml"));
}

describe("ControllerSynchronizer", () => {
  it("stores a complete static info snapshot", async () => {
    const { synchronizer, snapshots, status, diagnostics } = setup(
      staticInfoController()
    );

    const info = await synchronizer.refreshStaticInfo();

    expect(info.rapidTasks.map((task) => task.name)).toEqual([
      "T_ROB1",
      "T_LOGGER",
      "T_NEXT",
    ]);
    expect(info.systemInfo.systemType).toBe("Virtual");
    expect(snapshots.getStaticInfo()).toBe(info);
    expect(status.getAll().status.controller).toBe("connected");
    expect(diagnostics).toHaveLength(1);
  });

  it("keeps the previous snapshot when the system query fails", async () => {
    const fetcher = staticInfoController();
    const { synchronizer, snapshots, status } = setup(fetcher);
    const first = await synchronizer.refreshStaticInfo();

    fetcher.reply(
      rwsResources.controllerIdentity,
      new ControllerRequestError(rwsResources.controllerIdentity, 503)
    );

    await expect(synchronizer.refreshStaticInfo()).rejects.toBeInstanceOf(
      PartialAggregateFailureError
    );
    expect(snapshots.getStaticInfo()).toBe(first);
    expect(status.getAll().status).toMatchObject({
      controller: "error",
      lastError:
        "StaticInfo could not be assembled; failed parts: systemInfo (Request to /ctrl/identity failed with HTTP 503)",
    });
  });

  it("notifies only when a refresh changes the snapshot", async () => {
    const fetcher = new FakeFetcher().reply(
      rwsResources.ioSignals,
      fixture("signals.xml")
    );
    const { synchronizer, changes } = setup(fetcher);

    await synchronizer.refreshSignals();
    await synchronizer.refreshSignals();

    expect(changes.map((change) => change.kind)).toEqual(["signals"]);

    fetcher.reply(
      rwsResources.ioSignals,
      fixture("signals.xml").replace(
        '<span class="lvalue">3.5</span>',
        '<span class="lvalue">4.0</span>'
      )
    );
    const signals = await synchronizer.refreshSignals();

    expect(signals.readAnalog("ai1")).toBe(4);
    expect(changes).toHaveLength(2);
  });

  it("coalesces concurrent refreshes of the same kind", async () => {
    const held = heldReply();
    const fetcher = new FakeFetcher().reply(rwsResources.ioSignals, held.reply);
    const { synchronizer } = setup(fetcher);

    const first = synchronizer.refreshSignals();
    const second = synchronizer.refreshSignals();
    held.release(fixture("signals.xml"));

    const [a, b] = await Promise.all([first, second]);
    expect(a).toBe(b);
    expect(fetcher.requests).toEqual([rwsResources.ioSignals]);

    await synchronizer.refreshSignals();
    expect(fetcher.requests).toHaveLength(2);
  });

  it("refreshes different units independently", async () => {
    const fetcher = new FakeFetcher();
    for (const unit of ["ROB_1", "ROB_2"]) {
      fetcher
        .reply(rwsResources.mechanicalUnit(unit, "static"), fixture("mechunit-static.xml"))
        .reply(rwsResources.mechanicalUnit(unit, "dynamic"), fixture("mechunit-dynamic.xml"));
    }
    const { synchronizer, snapshots } = setup(fetcher);

    const [rob1, rob2] = await Promise.all([
      synchronizer.refreshMechanicalUnit("ROB_1"),
      synchronizer.refreshMechanicalUnit("ROB_2"),
    ]);

    expect(rob1.unit).toBe("ROB_1");
    expect(rob2.unit).toBe("ROB_2");
    expect(rob1.staticInfo.hasIntegratedUnit).toBe("TRACK_1");
    expect(rob1.dynamicInfo.coordSystem).toBe("wobj");
    expect(snapshots.getMechanicalUnitNames().sort()).toEqual(["ROB_1", "ROB_2"]);
    expect(fetcher.requests).toHaveLength(4);
  });

  it("times out and leaves the store untouched", async () => {
    const held = heldReply();
    const fetcher = new FakeFetcher().reply(rwsResources.ioSignals, held.reply);
    const { synchronizer, snapshots } = setup(fetcher, 20);

    await expect(synchronizer.refreshSignals()).rejects.toBeInstanceOf(
      RefreshTimeoutError
    );
    held.release(fixture("signals.xml"));
    expect(snapshots.getSignals()).toBeNull();
  });

  it("stops waiting when the caller cancels", async () => {
    const held = heldReply();
    const fetcher = new FakeFetcher().reply(rwsResources.ioSignals, held.reply);
    const { synchronizer, snapshots, status } = setup(fetcher);
    const controller = new AbortController();

    const refresh = synchronizer.refreshSignals({ signal: controller.signal });
    controller.abort();

    await expect(refresh).rejects.toBeInstanceOf(RefreshCancelledError);
    expect(snapshots.getSignals()).toBeNull();
    expect(status.getAll().status.controller).toBe("disconnected");
    held.release(fixture("signals.xml"));
  });

  it("does not start a refresh for an already cancelled signal", async () => {
    const fetcher = new FakeFetcher().reply(
      rwsResources.ioSignals,
      fixture("signals.xml")
    );
    const { synchronizer } = setup(fetcher);
    const controller = new AbortController();
    controller.abort();

    await expect(
      synchronizer.refreshSignals({ signal: controller.signal })
    ).rejects.toBeInstanceOf(RefreshCancelledError);
    expect(fetcher.requests).toEqual([]);
  });

  it("cancels a joining caller without affecting the running refresh", async () => {
    const held = heldReply();
    const fetcher = new FakeFetcher().reply(rwsResources.ioSignals, held.reply);
    const { synchronizer, snapshots } = setup(fetcher);
    const controller = new AbortController();

    const first = synchronizer.refreshSignals();
    const second = synchronizer.refreshSignals({ signal: controller.signal });
    controller.abort();

    await expect(second).rejects.toBeInstanceOf(RefreshCancelledError);

    held.release(fixture("signals.xml"));
    const signals = await first;
    expect(signals.readAnalog("ai1")).toBe(3.5);
    expect(snapshots.getSignals()).toBe(signals);
    expect(fetcher.requests).toEqual([rwsResources.ioSignals]);
  });

  it("keeps serving a joined caller after the first caller cancels", async () => {
    const held = heldReply();
    const fetcher = new FakeFetcher().reply(rwsResources.ioSignals, held.reply);
    const { synchronizer, snapshots, status } = setup(fetcher);
    const controller = new AbortController();

    const first = synchronizer.refreshSignals({ signal: controller.signal });
    const second = synchronizer.refreshSignals();
    controller.abort();

    await expect(first).rejects.toBeInstanceOf(RefreshCancelledError);

    held.release(fixture("signals.xml"));
    const signals = await second;
    expect(signals.readDigital("do1")).toBe(true);
    expect(snapshots.getSignals()).toBe(signals);
    expect(status.getAll().status.controller).toBe("connected");
    expect(fetcher.requests).toEqual([rwsResources.ioSignals]);
  });

  it("fetches options and modules on demand", async () => {
    const fetcher = new FakeFetcher()
      .reply(rwsResources.robotWareOptions, fixture("options.xml"))
      .reply(rwsResources.rapidModules("T_ROB1"), fixture("modules.xml"));
    const { synchronizer } = setup(fetcher);

    const options = await synchronizer.fetchRobotWareOptions();
    const modules = await synchronizer.fetchRapidModules("T_ROB1");

    expect(options.map((option) => option.name)).toEqual([
      "616-1 PC Interface",
      "623-1 Multitasking",
    ]);
    expect(modules).toEqual([
      { name: "BASE", type: "SysMod" },
      { name: "MainModule", type: "ProgMod" },
    ]);
  });
});
