// src/dataset/equality.ts

import { IOSignalInfo } from "./signals";

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Value comparison for model entities: records, arrays of records, StaticInfo
 * and IOSignalInfo. Used to tell whether a refresh changed anything.
 */
export function structurallyEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;

  if (a instanceof IOSignalInfo || b instanceof IOSignalInfo) {
    return (
      a instanceof IOSignalInfo && b instanceof IOSignalInfo && a.equals(b)
    );
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item, index) => structurallyEqual(item, b[index]));
  }

  if (isPlainRecord(a) && isPlainRecord(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every(
      (key) =>
        Object.prototype.hasOwnProperty.call(b, key) &&
        structurallyEqual(a[key], b[key])
    );
  }

  return false;
}
