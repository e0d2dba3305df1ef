// src/dataset/records.ts

import { DiagnosticSink, logDiagnostic } from "./diagnostics";
import {
  CoordinateSystem,
  MechanicalUnitMode,
  MechanicalUnitType,
  RAPIDTaskExecutionState,
  parseCoordinateSystem,
  parseMechanicalUnitMode,
  parseMechanicalUnitType,
  parseRAPIDTaskExecutionState,
} from "./enums";
import { IncompleteResponseError } from "./errors";
import { FieldReader, RawFields } from "./fields";

/** Wire value the controller uses for "no integration relation". */
export const NO_INTEGRATED_UNIT = "NoIntegratedUnit";

/**
 * Configuration of a mechanical unit that does not change while the system is
 * running.
 */
export interface MechanicalUnitStaticInfo {
  readonly type: MechanicalUnitType;
  /** The RAPID task using the unit. */
  readonly taskName: string;
  readonly axes: number;
  /** Axes including those of an integrated unit. */
  readonly axesTotal: number;
  /** Unit this one is integrated into, or null. */
  readonly isIntegratedUnit: string | null;
  /** Unit integrated into this one, or null. */
  readonly hasIntegratedUnit: string | null;
}

/**
 * Configuration of a mechanical unit that can change at runtime. Empty names
 * mean nothing is active; `status` and `jogMode` are controller text.
 */
export interface MechanicalUnitDynamicInfo {
  readonly toolName: string;
  readonly wobjName: string;
  readonly payloadName: string;
  readonly totalPayloadName: string;
  readonly status: string;
  readonly mode: MechanicalUnitMode;
  readonly jogMode: string;
  readonly coordSystem: CoordinateSystem;
}

export interface SystemInfo {
  readonly robotWareVersion: string;
  readonly systemName: string;
  /** e.g. whether this is a virtual controller */
  readonly systemType: string;
  /** Enabled options in the order the controller reported them. */
  readonly systemOptions: readonly string[];
}

export interface RobotWareOptionInfo {
  readonly name: string;
  readonly description: string;
}

export interface RAPIDModuleInfo {
  readonly name: string;
  readonly type: string;
}

export interface RAPIDTaskInfo {
  readonly name: string;
  readonly isMotionTask: boolean;
  readonly isActive: boolean;
  readonly executionState: RAPIDTaskExecutionState;
}

export type RawMechanicalUnitStaticInfo = RawFields<
  | "type"
  | "taskName"
  | "axes"
  | "axesTotal"
  | "isIntegratedUnit"
  | "hasIntegratedUnit"
>;

export type RawMechanicalUnitDynamicInfo = RawFields<
  | "toolName"
  | "wobjName"
  | "payloadName"
  | "totalPayloadName"
  | "status"
  | "mode"
  | "jogMode"
  | "coordSystem"
>;

type SystemInfoTextField = "robotWareVersion" | "systemName" | "systemType";

export type RawSystemInfo = RawFields<SystemInfoTextField> & {
  systemOptions?: readonly string[] | null;
};

export type RawRobotWareOptionInfo = RawFields<"name" | "description">;

export type RawRAPIDModuleInfo = RawFields<"name" | "type">;

export type RawRAPIDTaskInfo = RawFields<
  "name" | "isMotionTask" | "isActive" | "executionState"
>;

export function integratedUnitFromWire(raw: string): string | null {
  return raw === NO_INTEGRATED_UNIT ? null : raw;
}

export function integratedUnitToWire(unit: string | null): string {
  return unit ?? NO_INTEGRATED_UNIT;
}

export function createMechanicalUnitStaticInfo(
  raw: RawMechanicalUnitStaticInfo,
  sink: DiagnosticSink = logDiagnostic
): MechanicalUnitStaticInfo {
  const fields = new FieldReader("MechanicalUnitStaticInfo", raw);
  return Object.freeze({
    type: parseMechanicalUnitType(fields.string("type"), sink),
    taskName: fields.string("taskName"),
    axes: fields.integer("axes"),
    axesTotal: fields.integer("axesTotal"),
    isIntegratedUnit: integratedUnitFromWire(fields.string("isIntegratedUnit")),
    hasIntegratedUnit: integratedUnitFromWire(
      fields.string("hasIntegratedUnit")
    ),
  });
}

export function createMechanicalUnitDynamicInfo(
  raw: RawMechanicalUnitDynamicInfo,
  sink: DiagnosticSink = logDiagnostic
): MechanicalUnitDynamicInfo {
  const fields = new FieldReader("MechanicalUnitDynamicInfo", raw);
  return Object.freeze({
    toolName: fields.string("toolName"),
    wobjName: fields.string("wobjName"),
    payloadName: fields.string("payloadName"),
    totalPayloadName: fields.string("totalPayloadName"),
    status: fields.string("status"),
    mode: parseMechanicalUnitMode(fields.string("mode"), sink),
    jogMode: fields.string("jogMode"),
    coordSystem: parseCoordinateSystem(fields.string("coordSystem"), sink),
  });
}

export function createSystemInfo(raw: RawSystemInfo): SystemInfo {
  const fields = new FieldReader<SystemInfoTextField>("SystemInfo", raw);
  const options = raw.systemOptions;
  if (options === undefined || options === null) {
    throw new IncompleteResponseError("SystemInfo", "systemOptions");
  }
  return Object.freeze({
    robotWareVersion: fields.string("robotWareVersion"),
    systemName: fields.string("systemName"),
    systemType: fields.string("systemType"),
    systemOptions: Object.freeze([...options]),
  });
}

export function createRobotWareOptionInfo(
  raw: RawRobotWareOptionInfo
): RobotWareOptionInfo {
  const fields = new FieldReader("RobotWareOptionInfo", raw);
  return Object.freeze({
    name: fields.string("name"),
    description: fields.string("description"),
  });
}

export function createRAPIDModuleInfo(
  raw: RawRAPIDModuleInfo
): RAPIDModuleInfo {
  const fields = new FieldReader("RAPIDModuleInfo", raw);
  return Object.freeze({
    name: fields.string("name"),
    type: fields.string("type"),
  });
}

export function createRAPIDTaskInfo(
  raw: RawRAPIDTaskInfo,
  sink: DiagnosticSink = logDiagnostic
): RAPIDTaskInfo {
  const fields = new FieldReader("RAPIDTaskInfo", raw);
  return Object.freeze({
    name: fields.string("name"),
    isMotionTask: fields.boolean("isMotionTask"),
    isActive: fields.boolean("isActive"),
    executionState: parseRAPIDTaskExecutionState(
      fields.string("executionState"),
      sink
    ),
  });
}
