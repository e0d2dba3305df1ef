// src/dataset/signals.ts

import { DiagnosticSink, logDiagnostic } from "./diagnostics";
import {
  IncompleteResponseError,
  TypeMismatchError,
  UnknownSignalError,
} from "./errors";
import { RawScalar, toBoolean } from "./fields";

export type IOSignalKind = "digital" | "analog";

export type IOSignalValue =
  | { readonly kind: "digital"; readonly value: boolean }
  | { readonly kind: "analog"; readonly value: number };

export interface RawSignalEntry {
  name: string;
  value: RawScalar;
  /** Fixed by the signal's definition on the controller. */
  kind: IOSignalKind;
}

/**
 * Maps a controller signal type (DI, DO, AI, AO, GI, GO) to the value kind it
 * carries. Group signals hold a number and are read as analog.
 */
export function resolveSignalKind(signalType: string): IOSignalKind | undefined {
  switch (signalType.trim().toUpperCase()) {
    case "DI":
    case "DO":
      return "digital";
    case "AI":
    case "AO":
    case "GI":
    case "GO":
      return "analog";
    default:
      return undefined;
  }
}

function toSignalValue(entry: RawSignalEntry): IOSignalValue {
  if (entry.kind === "digital") {
    const value = toBoolean(entry.value);
    if (value === undefined) {
      throw new IncompleteResponseError(
        "IOSignalInfo",
        entry.name,
        `is not a digital value ("${String(entry.value)}")`
      );
    }
    const signal: IOSignalValue = { kind: "digital", value };
    return Object.freeze(signal);
  }

  const value =
    typeof entry.value === "number"
      ? entry.value
      : typeof entry.value === "string" && entry.value.trim() !== ""
      ? Number(entry.value)
      : NaN;
  if (!Number.isFinite(value)) {
    throw new IncompleteResponseError(
      "IOSignalInfo",
      entry.name,
      `is not an analog value ("${String(entry.value)}")`
    );
  }
  const signal: IOSignalValue = { kind: "analog", value };
  return Object.freeze(signal);
}

/**
 * Current values of a named set of I/O signals. Built in one piece from a
 * complete controller response and never patched afterwards.
 */
export class IOSignalInfo {
  private readonly signals: ReadonlyMap<string, IOSignalValue>;

  private constructor(signals: Map<string, IOSignalValue>) {
    this.signals = signals;
    Object.freeze(this);
  }

  /**
   * One entry per distinct name; when a name repeats the last value wins and
   * the repeat is reported to `sink`.
   */
  public static fromEntries(
    entries: Iterable<RawSignalEntry>,
    sink: DiagnosticSink = logDiagnostic
  ): IOSignalInfo {
    const signals = new Map<string, IOSignalValue>();
    for (const entry of entries) {
      if (signals.has(entry.name)) {
        sink({ kind: "duplicate-signal", signal: entry.name });
      }
      signals.set(entry.name, toSignalValue(entry));
    }
    return new IOSignalInfo(signals);
  }

  public static empty(): IOSignalInfo {
    return new IOSignalInfo(new Map());
  }

  public get size(): number {
    return this.signals.size;
  }

  public has(name: string): boolean {
    return this.signals.has(name);
  }

  public names(): string[] {
    return Array.from(this.signals.keys());
  }

  public get(name: string): IOSignalValue | undefined {
    return this.signals.get(name);
  }

  public kindOf(name: string): IOSignalKind {
    return this.require(name).kind;
  }

  public readDigital(name: string): boolean {
    const signal = this.require(name);
    if (signal.kind !== "digital") {
      throw new TypeMismatchError(name, "digital", signal.kind);
    }
    return signal.value;
  }

  public readAnalog(name: string): number {
    const signal = this.require(name);
    if (signal.kind !== "analog") {
      throw new TypeMismatchError(name, "analog", signal.kind);
    }
    return signal.value;
  }

  public entries(): [string, IOSignalValue][] {
    return Array.from(this.signals.entries());
  }

  public equals(other: IOSignalInfo): boolean {
    if (other.size !== this.size) return false;
    for (const [name, signal] of this.signals) {
      const candidate = other.get(name);
      if (
        !candidate ||
        candidate.kind !== signal.kind ||
        candidate.value !== signal.value
      ) {
        return false;
      }
    }
    return true;
  }

  public toJSON(): Record<string, IOSignalValue> {
    return Object.fromEntries(this.signals);
  }

  private require(name: string): IOSignalValue {
    const signal = this.signals.get(name);
    if (!signal) {
      throw new UnknownSignalError(name);
    }
    return signal;
  }
}
