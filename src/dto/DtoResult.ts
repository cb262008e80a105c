// src/dto/DtoResult.ts
import type { DtoError } from "./DtoErrors";

/** Outcome of a non-throwing container operation. */
export type DtoResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DtoError };

export function ok<T>(value: T): DtoResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: DtoError): DtoResult<T> {
  return { ok: false, error };
}
