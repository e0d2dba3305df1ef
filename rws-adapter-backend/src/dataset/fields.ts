// src/dataset/fields.ts

import { IncompleteResponseError } from "./errors";

/** A field value as it comes out of a response parser, before validation. */
export type RawScalar = string | number | boolean | null | undefined;

export type RawFields<K extends string> = Partial<Record<K, RawScalar>>;

const booleanWords: Readonly<Record<string, boolean>> = {
  true: true,
  on: true,
  "1": true,
  false: false,
  off: false,
  "0": false,
};

/**
 * Reads required fields of one entity, throwing IncompleteResponseError
 * instead of falling back to a placeholder.
 */
export class FieldReader<K extends string> {
  constructor(
    private readonly entity: string,
    private readonly raw: RawFields<K>
  ) {}

  public string(field: K): string {
    const value = this.present(field);
    return typeof value === "string" ? value : String(value);
  }

  public integer(field: K): number {
    const value = this.present(field);
    if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
      return value;
    }
    if (typeof value === "string" && /^\d+$/.test(value.trim())) {
      return parseInt(value.trim(), 10);
    }
    throw new IncompleteResponseError(
      this.entity,
      field,
      `is not a non-negative integer ("${String(value)}")`
    );
  }

  public boolean(field: K): boolean {
    const value = this.present(field);
    const parsed = toBoolean(value);
    if (parsed === undefined) {
      throw new IncompleteResponseError(
        this.entity,
        field,
        `is not a boolean ("${String(value)}")`
      );
    }
    return parsed;
  }

  private present(field: K): string | number | boolean {
    const value = this.raw[field];
    if (value === undefined || value === null) {
      throw new IncompleteResponseError(this.entity, field);
    }
    return value;
  }
}

export function toBoolean(value: RawScalar): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") {
    return value === 1 ? true : value === 0 ? false : undefined;
  }
  if (typeof value === "string") {
    const key = value.trim().toLowerCase();
    return Object.prototype.hasOwnProperty.call(booleanWords, key)
      ? booleanWords[key]
      : undefined;
  }
  return undefined;
}
