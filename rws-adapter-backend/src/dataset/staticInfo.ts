// src/dataset/staticInfo.ts

import { AggregatePartFailure, PartialAggregateFailureError } from "./errors";
import { RAPIDTaskInfo, SystemInfo } from "./records";

/**
 * The controller's static configuration as last observed. Both parts always
 * come from the same query round.
 */
export interface StaticInfo {
  /** In controller-reported order; may be empty. */
  readonly rapidTasks: readonly RAPIDTaskInfo[];
  readonly systemInfo: SystemInfo;
}

export interface StaticInfoQueries {
  rapidTasks: () => Promise<readonly RAPIDTaskInfo[]>;
  systemInfo: () => Promise<SystemInfo>;
}

export function createStaticInfo(
  rapidTasks: readonly RAPIDTaskInfo[],
  systemInfo: SystemInfo
): StaticInfo {
  return Object.freeze({
    rapidTasks: Object.freeze([...rapidTasks]),
    systemInfo,
  });
}

/**
 * Runs both constituent queries and builds the aggregate only if every one of
 * them succeeded.
 */
export async function assembleStaticInfo(
  queries: StaticInfoQueries
): Promise<StaticInfo> {
  const [tasks, system] = await Promise.allSettled([
    queries.rapidTasks(),
    queries.systemInfo(),
  ]);

  const failures: AggregatePartFailure[] = [];
  if (tasks.status === "rejected") {
    failures.push({ part: "rapidTasks", cause: tasks.reason });
  }
  if (system.status === "rejected") {
    failures.push({ part: "systemInfo", cause: system.reason });
  }
  if (tasks.status === "rejected" || system.status === "rejected") {
    throw new PartialAggregateFailureError("StaticInfo", failures);
  }

  return createStaticInfo(tasks.value, system.value);
}
