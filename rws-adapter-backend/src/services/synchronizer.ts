// src/services/synchronizer.ts

import logger from "../utility/logger";
import { untilAborted, withDeadline } from "../utility/deadline";
import { ResourceFetcher } from "../utility/httpFetcher";
import { DiagnosticSink, logDiagnostic } from "../dataset/diagnostics";
import { RefreshCancelledError, describeCause } from "../dataset/errors";
import { RAPIDModuleInfo, RobotWareOptionInfo } from "../dataset/records";
import { rwsResources } from "../dataset/resources";
import { IOSignalInfo } from "../dataset/signals";
import { StaticInfo, assembleStaticInfo } from "../dataset/staticInfo";
import { parseIOSignalsResponse } from "../parsers/ioSignals";
import {
  parseMechanicalUnitDynamicResponse,
  parseMechanicalUnitStaticResponse,
} from "../parsers/mechanicalUnit";
import { parseRapidModulesResponse } from "../parsers/rapidModules";
import { parseRapidTasksResponse } from "../parsers/rapidTasks";
import { parseRobotWareOptionsResponse } from "../parsers/robotWareOptions";
import { parseSystemInfoResponse } from "../parsers/system";
import { MechanicalUnitSnapshot, SnapshotStore } from "../store/snapshotstore";
import { StatusStore } from "../store/statusstore";
import { KeyedCoalescer } from "./coalescer";

export interface SynchronizerOptions {
  timeoutMs: number;
  sink?: DiagnosticSink;
}

export interface RefreshOptions {
  signal?: AbortSignal;
}

/**
 * Fills the snapshot store from controller responses. A refresh either stores
 * a fully built entity or leaves the previous one in place. Concurrent
 * refreshes of the same kind share one controller round. That round is bound
 * only by the configured timeout; a caller's signal cancels that caller's
 * wait and nothing else.
 */
export class ControllerSynchronizer {
  private readonly staticInfoRefresh = new KeyedCoalescer<StaticInfo>();
  private readonly signalsRefresh = new KeyedCoalescer<IOSignalInfo>();
  private readonly unitRefresh = new KeyedCoalescer<MechanicalUnitSnapshot>();
  private readonly sink: DiagnosticSink;

  constructor(
    private readonly fetcher: ResourceFetcher,
    private readonly snapshots: SnapshotStore,
    private readonly status: StatusStore,
    private readonly options: SynchronizerOptions
  ) {
    this.sink = options.sink ?? logDiagnostic;
  }

  public refreshStaticInfo(options: RefreshOptions = {}): Promise<StaticInfo> {
    return this.join("static info", options, () =>
      this.staticInfoRefresh.run("staticInfo", () =>
        this.refresh(
          "static info",
          (signal) =>
            assembleStaticInfo({
              rapidTasks: async () =>
                parseRapidTasksResponse(
                  await this.fetcher.fetch(rwsResources.rapidTasks, signal),
                  this.sink
                ),
              systemInfo: async () => {
                const [system, identity] = await Promise.all([
                  this.fetcher.fetch(rwsResources.system, signal),
                  this.fetcher.fetch(rwsResources.controllerIdentity, signal),
                ]);
                return parseSystemInfoResponse(system, identity);
              },
            }),
          {},
          (info) => this.snapshots.setStaticInfo(info)
        )
      )
    );
  }

  public refreshSignals(options: RefreshOptions = {}): Promise<IOSignalInfo> {
    return this.join("signals", options, () =>
      this.signalsRefresh.run("signals", () =>
        this.refresh(
          "signals",
          async (signal) =>
            parseIOSignalsResponse(
              await this.fetcher.fetch(rwsResources.ioSignals, signal),
              this.sink
            ),
          {},
          (signals) => this.snapshots.setSignals(signals)
        )
      )
    );
  }

  public refreshMechanicalUnit(
    unit: string,
    options: RefreshOptions = {}
  ): Promise<MechanicalUnitSnapshot> {
    return this.join(`mechanical unit ${unit}`, options, () =>
      this.unitRefresh.run(unit, () =>
        this.refresh(
          `mechanical unit ${unit}`,
          async (signal) => {
            const staticPath = rwsResources.mechanicalUnit(unit, "static");
            const dynamicPath = rwsResources.mechanicalUnit(unit, "dynamic");
            const [staticXml, dynamicXml] = await Promise.all([
              this.fetcher.fetch(staticPath, signal),
              this.fetcher.fetch(dynamicPath, signal),
            ]);
            const snapshot: MechanicalUnitSnapshot = Object.freeze({
              unit,
              staticInfo: parseMechanicalUnitStaticResponse(
                staticXml,
                staticPath,
                this.sink
              ),
              dynamicInfo: parseMechanicalUnitDynamicResponse(
                dynamicXml,
                dynamicPath,
                this.sink
              ),
            });
            return snapshot;
          },
          {},
          (snapshot) => this.snapshots.setMechanicalUnit(snapshot)
        )
      )
    );
  }

  public fetchRobotWareOptions(
    options: RefreshOptions = {}
  ): Promise<RobotWareOptionInfo[]> {
    return this.refresh(
      "RobotWare options",
      async (signal) =>
        parseRobotWareOptionsResponse(
          await this.fetcher.fetch(rwsResources.robotWareOptions, signal)
        ),
      options
    );
  }

  public fetchRapidModules(
    task: string,
    options: RefreshOptions = {}
  ): Promise<RAPIDModuleInfo[]> {
    const path = rwsResources.rapidModules(task);
    return this.refresh(
      `RAPID modules of ${task}`,
      async (signal) =>
        parseRapidModulesResponse(await this.fetcher.fetch(path, signal), path),
      options
    );
  }

  private async join<T>(
    label: string,
    options: RefreshOptions,
    shared: () => Promise<T>
  ): Promise<T> {
    try {
      if (options.signal?.aborted) throw new RefreshCancelledError();
      return await untilAborted(shared(), options.signal);
    } catch (error) {
      if (error instanceof RefreshCancelledError) {
        logger.warn(`Wait for ${label} refresh cancelled.`);
      }
      throw error;
    }
  }

  private async refresh<T>(
    label: string,
    work: (signal: AbortSignal) => Promise<T>,
    options: RefreshOptions,
    commit?: (value: T) => void
  ): Promise<T> {
    try {
      const value = await withDeadline(work, {
        timeoutMs: this.options.timeoutMs,
        signal: options.signal,
      });
      commit?.(value);
      this.status.recordSuccess();
      return value;
    } catch (error) {
      if (error instanceof RefreshCancelledError) {
        logger.warn(`Refresh of ${label} cancelled.`);
      } else {
        logger.error(`Refresh of ${label} failed: ${describeCause(error)}`);
        this.status.recordFailure(error);
      }
      throw error;
    }
  }
}
