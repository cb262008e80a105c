// src/dto/DtoRegistry.ts
/**
 * Purpose:
 * - Name → class table so DTOs can be addressed by a string type name
 *   (e.g. "UserDto") where a class reference is not at hand.
 *
 * Invariants:
 * - Keys are trimmed, non-empty strings.
 * - Only concrete Dto subclasses are accepted; a key is bound to one class.
 * - The registry only knows classes; it never constructs DTOs.
 */

import {
  isAbstractDtoClass,
  isDtoClass,
  type Dto,
  type DtoCtor,
} from "./Dto";
import { DtoInvalidArgumentError, DtoNotFoundError } from "./DtoErrors";

type DtoEntry = {
  key: string;
  ctor: DtoCtor;
};

function normalizeKey(key: unknown): string {
  return typeof key === "string" ? key.trim() : "";
}

/** Throws DtoInvalidArgumentError unless `ctor` is a concrete Dto subclass. */
export function assertInstantiableDto(ctor: unknown, label: string): void {
  if (!isDtoClass(ctor)) {
    throw new DtoInvalidArgumentError(`Dto class ${label} must extend Dto.`);
  }
  if (isAbstractDtoClass(ctor)) {
    throw new DtoInvalidArgumentError(
      `Dto class ${label} must be instantiable.`
    );
  }
}

export class DtoRegistry {
  private readonly byKey = new Map<string, DtoEntry>();

  /** Bind `ctor` under `key` (defaults to the class name). */
  public register<TDto extends Dto>(ctor: DtoCtor<TDto>, key?: string): this {
    const k = normalizeKey(key ?? ctor.name);
    if (!k) {
      throw new DtoInvalidArgumentError(
        "Dto registry key must be a non-empty string."
      );
    }

    assertInstantiableDto(ctor, k);

    const existing = this.byKey.get(k);
    if (existing && existing.ctor !== ctor) {
      throw new DtoInvalidArgumentError(
        `Dto registry key "${k}" is already bound to ${existing.ctor.name}.`
      );
    }

    this.byKey.set(k, { key: k, ctor });
    return this;
  }

  public has(key: string): boolean {
    return this.byKey.has(normalizeKey(key));
  }

  public resolve(key: string): DtoCtor {
    const k = normalizeKey(key);
    const hit = this.byKey.get(k);
    if (!hit) throw new DtoNotFoundError(k);
    return hit.ctor;
  }

  public unregister(key: string): boolean {
    return this.byKey.delete(normalizeKey(key));
  }

  public list(): string[] {
    return [...this.byKey.keys()];
  }
}

/** Registry used by the default DtoFactory. */
export const dtoRegistry = new DtoRegistry();
