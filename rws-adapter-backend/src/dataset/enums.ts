// src/dataset/enums.ts

import { DiagnosticSink, logDiagnostic } from "./diagnostics";

export type RAPIDTaskExecutionState =
  | "unknown"
  | "ready"
  | "stopped"
  | "started"
  | "uninitialized";

/**
 * `none` means there is no unit; `undefined` means the controller reported a
 * type this client cannot resolve.
 */
export type MechanicalUnitType =
  | "none"
  | "tcp_robot"
  | "robot"
  | "single"
  | "undefined";

export type MechanicalUnitMode = "unknown" | "activated" | "deactivated";

export type CoordinateSystem = "base" | "world" | "tool" | "wobj" | "unknown";

interface EnumVocabulary<T extends string> {
  name: string;
  fallback: T;
  // keys are lower-case controller strings
  members: Readonly<Record<string, T>>;
}

const taskExecutionStates: EnumVocabulary<RAPIDTaskExecutionState> = {
  name: "RAPIDTaskExecutionState",
  fallback: "unknown",
  members: {
    read: "ready",
    ready: "ready",
    stop: "stopped",
    stopped: "stopped",
    star: "started",
    started: "started",
    unin: "uninitialized",
    uninitialized: "uninitialized",
  },
};

const mechanicalUnitTypes: EnumVocabulary<MechanicalUnitType> = {
  name: "MechanicalUnitType",
  fallback: "undefined",
  members: {
    none: "none",
    tcprobot: "tcp_robot",
    robot: "robot",
    single: "single",
  },
};

const mechanicalUnitModes: EnumVocabulary<MechanicalUnitMode> = {
  name: "MechanicalUnitMode",
  fallback: "unknown",
  members: {
    activated: "activated",
    deactivated: "deactivated",
  },
};

const coordinateSystems: EnumVocabulary<CoordinateSystem> = {
  name: "CoordinateSystem",
  fallback: "unknown",
  members: {
    base: "base",
    world: "world",
    tool: "tool",
    wobj: "wobj",
  },
};

function resolve<T extends string>(
  vocabulary: EnumVocabulary<T>,
  raw: string,
  field: string,
  sink: DiagnosticSink
): T {
  const key = raw.trim().toLowerCase();
  if (Object.prototype.hasOwnProperty.call(vocabulary.members, key)) {
    return vocabulary.members[key];
  }
  sink({
    kind: "unrecognized-enum-value",
    enumName: vocabulary.name,
    field,
    raw,
    fallback: vocabulary.fallback,
  });
  return vocabulary.fallback;
}

export function parseRAPIDTaskExecutionState(
  raw: string,
  sink: DiagnosticSink = logDiagnostic,
  field = "executionState"
): RAPIDTaskExecutionState {
  return resolve(taskExecutionStates, raw, field, sink);
}

export function parseMechanicalUnitType(
  raw: string,
  sink: DiagnosticSink = logDiagnostic,
  field = "type"
): MechanicalUnitType {
  return resolve(mechanicalUnitTypes, raw, field, sink);
}

export function parseMechanicalUnitMode(
  raw: string,
  sink: DiagnosticSink = logDiagnostic,
  field = "mode"
): MechanicalUnitMode {
  return resolve(mechanicalUnitModes, raw, field, sink);
}

export function parseCoordinateSystem(
  raw: string,
  sink: DiagnosticSink = logDiagnostic,
  field = "coordSystem"
): CoordinateSystem {
  return resolve(coordinateSystems, raw, field, sink);
}
