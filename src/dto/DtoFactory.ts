// src/dto/DtoFactory.ts
/**
 * Purpose:
 * - Build a Dto from heterogeneous source data:
 *   plain objects, Maps, iterables of [key, value] pairs, other DTOs, and
 *   arbitrary class instances (their own enumerable fields).
 *
 * Behavior:
 * - The target is a Dto class or a name registered in the DtoRegistry.
 * - Source keys that are not strings, or are numeric, are dropped.
 * - Construction runs in quiet mode: entries rejected by the class's policies
 *   (not fillable, ...) are dropped instead of aborting the build. Quiet mode
 *   is switched off on the instance before it is returned.
 * - Only structural problems (bad target, no usable data) throw, always as
 *   DtoInvalidArgumentError.
 */

import { Dto, type DtoAttributes, type DtoCtor } from "./Dto";
import { DtoError, DtoInvalidArgumentError } from "./DtoErrors";
import { isValidAttributeKey } from "./DtoProperty";
import { assertInstantiableDto, dtoRegistry, DtoRegistry } from "./DtoRegistry";
import { bindLogger, serializeError, type DtoLogger } from "../logger/Logger";

let LOG: DtoLogger | null = null;
function log(): DtoLogger {
  if (!LOG) LOG = bindLogger({ component: "DtoFactory" });
  return LOG;
}

export type DtoTarget<TDto extends Dto = Dto> = DtoCtor<TDto> | string;

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value;
}

function isPair(item: unknown): item is readonly [unknown, unknown] {
  return Array.isArray(item) && item.length === 2;
}

export class DtoFactory {
  private static DEFAULT: DtoFactory | null = null;

  private readonly registry: DtoRegistry;

  constructor(registry: DtoRegistry = dtoRegistry) {
    this.registry = registry;
  }

  /** Build with the default factory (backed by the default registry). */
  public static make<TDto extends Dto>(
    sourceData: unknown,
    target: DtoTarget<TDto>
  ): TDto {
    const factory = (DtoFactory.DEFAULT ??= new DtoFactory());
    return factory.make(sourceData, target);
  }

  public make<TDto extends Dto>(
    sourceData: unknown,
    target: DtoTarget<TDto>
  ): TDto;
  public make(sourceData: unknown, target: DtoTarget): Dto {
    const ctor = this.resolveTarget(target);
    const data = DtoFactory.normalize(sourceData);

    const offered = Object.keys(data).length;
    if (offered === 0) {
      throw new DtoInvalidArgumentError(
        "Non-empty attributes must be provided."
      );
    }

    const dto = this.construct(ctor, data);
    dto.shouldBeSilent(false);

    log().debug(
      { dto: ctor.name, offered, accepted: dto.count() },
      "dto built"
    );

    return dto;
  }

  /** Flatten `source` into a name → value map of usable attribute keys. */
  public static normalize(source: unknown): DtoAttributes {
    if (source === null || typeof source !== "object") return {};

    if (source instanceof Dto) return source.all();

    if (isPlainObject(source)) {
      return DtoFactory.collect(Object.entries(source));
    }

    if (isIterable(source)) {
      return DtoFactory.collect(DtoFactory.pairsOf(source));
    }

    // Class instance: its own enumerable (public) fields.
    return DtoFactory.collect(Object.entries(source));
  }

  private static *pairsOf(
    source: Iterable<unknown>
  ): Generator<readonly [unknown, unknown]> {
    for (const item of source) {
      if (isPair(item)) yield item;
    }
  }

  private static collect(
    entries: Iterable<readonly [unknown, unknown]>
  ): DtoAttributes {
    // Map first: assigning "__proto__" onto an object literal sets its prototype.
    const out = new Map<string, unknown>();
    for (const [key, value] of entries) {
      if (isValidAttributeKey(key)) out.set(key, value);
    }
    return Object.fromEntries(out);
  }

  private resolveTarget(target: DtoTarget): DtoCtor {
    if (typeof target === "string") {
      const name = target.trim();
      if (!name) {
        throw new DtoInvalidArgumentError("Dto class must be provided.");
      }
      return this.registry.resolve(name);
    }

    if (typeof target !== "function") {
      throw new DtoInvalidArgumentError("Dto class must be provided.");
    }

    assertInstantiableDto(target, target.name || "<anonymous>");
    return target;
  }

  private construct(ctor: DtoCtor, data: DtoAttributes): Dto {
    try {
      return new ctor(data, { silent: true });
    } catch (err) {
      if (err instanceof DtoInvalidArgumentError) throw err;

      log().debug(
        { dto: ctor.name, err: serializeError(err) },
        "dto construction failed"
      );

      const reason = err instanceof DtoError ? err.code : "constructor threw";
      throw new DtoInvalidArgumentError(
        `Dto class ${ctor.name} could not be instantiated (${reason}).`,
        { cause: err }
      );
    }
  }
}
