// src/store/snapshotstore.ts

import logger from "../utility/logger";
import { structurallyEqual } from "../dataset/equality";
import {
  MechanicalUnitDynamicInfo,
  MechanicalUnitStaticInfo,
} from "../dataset/records";
import { IOSignalInfo } from "../dataset/signals";
import { StaticInfo } from "../dataset/staticInfo";

export interface MechanicalUnitSnapshot {
  readonly unit: string;
  readonly staticInfo: MechanicalUnitStaticInfo;
  readonly dynamicInfo: MechanicalUnitDynamicInfo;
}

export type SnapshotChange =
  | { kind: "staticInfo"; value: StaticInfo }
  | { kind: "signals"; value: IOSignalInfo }
  | { kind: "mechanicalUnit"; value: MechanicalUnitSnapshot };

type SnapshotListener = (change: SnapshotChange) => void;

/**
 * Latest complete snapshot of each entity kind. Every setter replaces the
 * whole value; listeners hear only about values that differ from the previous
 * one.
 */
export class SnapshotStore {
  private staticInfo: StaticInfo | null = null;
  private signals: IOSignalInfo | null = null;
  private mechanicalUnits = new Map<string, MechanicalUnitSnapshot>();
  private listeners = new Set<SnapshotListener>();

  public getStaticInfo(): StaticInfo | null {
    return this.staticInfo;
  }

  public getSignals(): IOSignalInfo | null {
    return this.signals;
  }

  public getMechanicalUnit(unit: string): MechanicalUnitSnapshot | undefined {
    return this.mechanicalUnits.get(unit);
  }

  public getMechanicalUnitNames(): string[] {
    return Array.from(this.mechanicalUnits.keys());
  }

  public onChange(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  public setStaticInfo(next: StaticInfo): boolean {
    const changed = !structurallyEqual(this.staticInfo, next);
    this.staticInfo = next;
    if (changed) this.notify({ kind: "staticInfo", value: next });
    return changed;
  }

  public setSignals(next: IOSignalInfo): boolean {
    const changed = !structurallyEqual(this.signals, next);
    this.signals = next;
    if (changed) this.notify({ kind: "signals", value: next });
    return changed;
  }

  public setMechanicalUnit(next: MechanicalUnitSnapshot): boolean {
    const changed = !structurallyEqual(
      this.mechanicalUnits.get(next.unit),
      next
    );
    this.mechanicalUnits.set(next.unit, next);
    if (changed) this.notify({ kind: "mechanicalUnit", value: next });
    return changed;
  }

  private notify(change: SnapshotChange): void {
    logger.debug(`Snapshot changed: ${change.kind}`);
    this.listeners.forEach((listener) => listener(change));
  }
}

export const snapshotStoreInstance = new SnapshotStore();
