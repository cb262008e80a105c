// src/dto/DtoProperty.ts
/**
 * Purpose:
 * - Immutable descriptor built for every attribute write.
 * - Owns attribute-name validation: names must be non-empty strings that do
 *   not parse as a number.
 *
 * Notes:
 * - `value` is currently identical to `rawValue`. convert() is the single
 *   place a typed coercion would hook in.
 */

import { DtoInvalidKeyError } from "./DtoErrors";
import { fail, ok, type DtoResult } from "./DtoResult";

export type DtoPropertyType =
  | "string"
  | "number"
  | "bigint"
  | "boolean"
  | "symbol"
  | "function"
  | "null"
  | "undefined"
  | "array"
  | "date"
  | "object";

// Integers, decimals, leading sign, exponent; surrounding whitespace tolerated.
const NUMERIC_KEY = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

export function isNumericKey(key: string): boolean {
  return NUMERIC_KEY.test(key);
}

/** True when `key` is usable as an attribute name. */
export function isValidAttributeKey(key: unknown): key is string {
  return typeof key === "string" && key.trim() !== "" && !isNumericKey(key);
}

export function inferPropertyType(value: unknown): DtoPropertyType {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Date) return "date";
  return typeof value;
}

export class DtoProperty {
  public readonly name: string;
  public readonly type: DtoPropertyType;
  public readonly rawValue: unknown;
  public readonly value: unknown;

  private constructor(name: string, rawValue: unknown, type: DtoPropertyType) {
    this.name = name;
    this.type = type;
    this.rawValue = rawValue;
    this.value = DtoProperty.convert(rawValue);
  }

  /** Build a descriptor. Throws DtoInvalidKeyError on a malformed name. */
  public static make(
    name: unknown,
    value: unknown,
    type?: DtoPropertyType
  ): DtoProperty {
    const result = DtoProperty.parse(name, value, type);
    if (!result.ok) throw result.error;
    return result.value;
  }

  public static parse(
    name: unknown,
    value: unknown,
    type?: DtoPropertyType
  ): DtoResult<DtoProperty> {
    if (typeof name !== "string") {
      return fail(new DtoInvalidKeyError(name, "must be a string"));
    }
    if (name.trim() === "") {
      return fail(new DtoInvalidKeyError(name, "must not be empty"));
    }
    if (isNumericKey(name)) {
      return fail(new DtoInvalidKeyError(name, "must not be numeric"));
    }

    return ok(new DtoProperty(name, value, type ?? inferPropertyType(value)));
  }

  private static convert(rawValue: unknown): unknown {
    return rawValue;
  }

  public toString(): string {
    return String(this.value);
  }
}
