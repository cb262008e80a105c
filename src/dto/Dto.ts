// src/dto/Dto.ts
/**
 * Purpose:
 * - Base class for attribute containers.
 * - Owns:
 *   • The attribute map, its `original` snapshot and the `dirty` set.
 *   • The one-way Uninitialized → Initialized transition.
 *   • Policy checks on every read and write (read-only, fillable whitelist,
 *     forbid overrides, unknown-attribute reads).
 *   • Quiet mode: failures absorbed instead of thrown.
 *
 * Declaring a DTO:
 *
 *   class UserDto extends Dto {
 *     static override readonly fillable = ["name", "email"];
 *     static override readonly capabilities = [DtoCapabilities.ReadOnly];
 *
 *     get name(): string | undefined {
 *       return this.getString("name");
 *     }
 *   }
 *
 * Invariants:
 * - Checks run in a fixed order (read-only, fillable, overrides) and all of
 *   them precede the single final assignment.
 * - `dirty` only ever holds names present in the attribute map.
 * - The constructor always fills, so a constructed instance is initialized.
 *
 * Notes:
 * - fillable/capabilities are static: subclass instance fields are not yet
 *   assigned while the base constructor runs its fill.
 * - trySet/tryGet/tryUnset are the non-throwing core; set/get/unset throw
 *   their failures unless the instance is in quiet mode.
 */

import { isDeepStrictEqual } from "node:util";
import {
  DtoNotFillableError,
  DtoOverrideForbiddenError,
  DtoReadOnlyError,
  DtoUnknownAttributeError,
  type DtoError,
} from "./DtoErrors";
import {
  mergeDtoOptions,
  resolveDtoOptions,
  type DtoCapability,
  type DtoOptionFlags,
} from "./DtoOptions";
import { DtoProperty } from "./DtoProperty";
import { fail, ok, type DtoResult } from "./DtoResult";
import type { IDto } from "./IDto";
import { bindLogger, type DtoLogger } from "../logger/Logger";

export type DtoAttributes = Record<string, unknown>;

export type DtoInput =
  | Readonly<DtoAttributes>
  | ReadonlyMap<string, unknown>;

export type DtoInit = {
  /** Start in quiet mode; the constructor's fill then drops rejected entries. */
  silent?: boolean;
  /** Per-instance override applied over the class capabilities. */
  options?: Readonly<Record<string, unknown>>;
};

export type DtoJsonOptions = {
  space?: string | number;
};

/** Concrete, constructible DTO class. */
export type DtoCtor<TDto extends Dto = Dto> = {
  new (attributes?: DtoInput, init?: DtoInit): TDto;
  readonly name: string;
  readonly fillable: readonly string[];
  readonly capabilities: readonly DtoCapability[];
  readonly isAbstractDto: boolean;
};

/** Static surface shared by every class in the Dto hierarchy. */
export type DtoClass = {
  readonly name: string;
  readonly prototype: unknown;
  readonly fillable: readonly string[];
  readonly capabilities: readonly DtoCapability[];
  readonly isAbstractDto: boolean;
};

let LOG: DtoLogger | null = null;
function log(): DtoLogger {
  if (!LOG) LOG = bindLogger({ component: "Dto" });
  return LOG;
}

export abstract class Dto implements IDto, Iterable<[string, unknown]> {
  /** Permitted attribute names; empty permits all. */
  public static readonly fillable: readonly string[] = [];

  /** Policies this class opts into. */
  public static readonly capabilities: readonly DtoCapability[] = [];

  /**
   * Marks a class the factory must not instantiate. Only an own declaration
   * counts, so subclasses of a marked class are instantiable again.
   */
  public static readonly isAbstractDto: boolean = true;

  private readonly _attributes = new Map<string, unknown>();
  private _original = new Map<string, unknown>();
  private readonly _dirty = new Map<string, unknown>();
  private _initialized = false;
  private _silent: boolean;
  private readonly _options: DtoOptionFlags;

  public constructor(attributes: DtoInput = {}, init: DtoInit = {}) {
    this._silent = init.silent === true;
    this._options = { ...resolveDtoOptions(this.dtoClass()) };
    if (init.options) this.setOptions(init.options);

    this.fill(attributes);
  }

  // ─────────────── Class surface ───────────────

  public getType(): string {
    return this.dtoClass().name;
  }

  public getFillable(): readonly string[] {
    return this.dtoClass().fillable;
  }

  private dtoClass(): DtoClass {
    const ctor: unknown = this.constructor;
    if (!isDtoClass(ctor)) {
      throw new Error(
        "DTO_CLASS_INVALID: instance constructor does not extend Dto."
      );
    }
    return ctor;
  }

  // ─────────────── Options & quiet mode ───────────────

  public getOptions(): Readonly<DtoOptionFlags> {
    return { ...this._options };
  }

  /** Merge recognized option keys (coerced to boolean); others are ignored. */
  public setOptions(options: Readonly<Record<string, unknown>>): this {
    const applied = mergeDtoOptions(this._options, options);
    if (applied.length > 0) {
      log().debug(
        { dto: this.getType(), applied, options: this._options },
        "dto options overridden"
      );
    }
    return this;
  }

  protected option(key: DtoCapability): boolean {
    return this._options[key];
  }

  public shouldBeSilent(silent: boolean): this {
    this._silent = silent;
    return this;
  }

  public isSilent(): boolean {
    return this._silent;
  }

  // ─────────────── Lifecycle ───────────────

  /** Apply every entry through set(), then initialize (once). */
  public fill(attributes: DtoInput = {}): this {
    const entries = isMapInput(attributes)
      ? attributes.entries()
      : Object.entries(attributes);

    for (const [name, value] of entries) {
      this.set(name, value);
    }

    this.initialize();
    return this;
  }

  public isInitialized(): boolean {
    return this._initialized;
  }

  protected initialize(): void {
    if (this._initialized) return;
    this.syncOriginal();
    this._initialized = true;
  }

  // ─────────────── Writes ───────────────

  public set(name: string, value: unknown): this {
    this.absorb(this.trySet(name, value));
    return this;
  }

  public trySet(name: unknown, value: unknown): DtoResult<DtoProperty> {
    const parsed = DtoProperty.parse(name, value);
    if (!parsed.ok) return parsed;

    const property = parsed.value;
    const rejection = this.validateSet(property);
    if (rejection) return fail(rejection);

    this.write(property);
    return ok(property);
  }

  public unset(name: string): this {
    this.absorb(this.tryUnset(name));
    return this;
  }

  /** Remove an attribute; resolves to whether it was present. */
  public tryUnset(name: string): DtoResult<boolean> {
    if (this.option("readOnly") && this._initialized) {
      return fail(new DtoReadOnlyError(name, this.getType()));
    }

    const existed = this._attributes.delete(name);
    this._dirty.delete(name);
    return ok(existed);
  }

  protected validateSet(property: DtoProperty): DtoError | undefined {
    const dtoName = this.getType();

    if (this.option("readOnly") && this._initialized) {
      return new DtoReadOnlyError(property.name, dtoName);
    }

    const fillable = this.getFillable();
    if (fillable.length > 0 && !fillable.includes(property.name)) {
      return new DtoNotFillableError(property.name, dtoName);
    }

    if (this.option("forbidsOverrides") && this.has(property.name)) {
      return new DtoOverrideForbiddenError(property.name, dtoName);
    }

    return undefined;
  }

  private write(property: DtoProperty): void {
    const { name, value } = property;

    if (this._attributes.has(name)) {
      if (this.differsFromOriginal(property)) {
        this._dirty.set(name, value);
      } else {
        this._dirty.delete(name);
      }
    } else {
      this._original.set(name, value);
    }

    this._attributes.set(name, value);
  }

  protected differsFromOriginal(property: DtoProperty): boolean {
    if (!this._original.has(property.name)) return true;
    return !isDeepStrictEqual(this._original.get(property.name), property.value);
  }

  // ─────────────── Reads ───────────────

  public get(name: string): unknown {
    const result = this.tryGet(name);
    if (result.ok) return result.value;
    return this.absorb(result);
  }

  public tryGet(name: string): DtoResult<unknown> {
    if (!this.option("ignoresUnknown") && !this.has(name)) {
      return fail(new DtoUnknownAttributeError(name, this.getType()));
    }
    return ok(this._attributes.get(name));
  }

  public has(name: string): boolean {
    return this._attributes.has(name);
  }

  /** String value of `name`, or undefined when absent or not a string. */
  protected getString(name: string): string | undefined {
    const v = this.get(name);
    return typeof v === "string" ? v : undefined;
  }

  /** Finite number value of `name`, or undefined. */
  protected getNumber(name: string): number | undefined {
    const v = this.get(name);
    return typeof v === "number" && Number.isFinite(v) ? v : undefined;
  }

  protected getBoolean(name: string): boolean | undefined {
    const v = this.get(name);
    return typeof v === "boolean" ? v : undefined;
  }

  public all(): DtoAttributes {
    return Object.fromEntries(this._attributes);
  }

  public toArray(): DtoAttributes {
    return this.all();
  }

  public count(): number {
    return this._attributes.size;
  }

  public [Symbol.iterator](): Iterator<[string, unknown]> {
    return new Map(this._attributes).entries();
  }

  // ─────────────── Change tracking ───────────────

  public getOriginal(): DtoAttributes;
  public getOriginal(name: string): unknown;
  public getOriginal(name?: string): unknown {
    if (name !== undefined) return this._original.get(name);
    return Object.fromEntries(this._original);
  }

  public getDirty(): DtoAttributes;
  public getDirty(name: string): unknown;
  public getDirty(name?: string): unknown {
    if (name !== undefined) return this._dirty.get(name);
    return Object.fromEntries(this._dirty);
  }

  public isDirty(name?: string): boolean {
    return name === undefined ? this._dirty.size > 0 : this._dirty.has(name);
  }

  /** Replace the original snapshot with the current attributes. */
  public syncOriginal(): this {
    this._original = new Map(this._attributes);
    return this;
  }

  // ─────────────── State & output ───────────────

  /** True when no stored value is set (every value is null/undefined). */
  public isEmpty(): boolean {
    for (const value of this._attributes.values()) {
      if (value !== null && value !== undefined) return false;
    }
    return true;
  }

  public isFilled(): boolean {
    return !this.isEmpty();
  }

  public toJson(options: DtoJsonOptions = {}): string {
    return JSON.stringify(this.all(), null, options.space);
  }

  public toJSON(): DtoAttributes {
    return this.all();
  }

  // ─────────────── Internals ───────────────

  private absorb(result: DtoResult<unknown>): undefined {
    if (!result.ok && !this._silent) throw result.error;
    return undefined;
  }
}

function isMapInput(input: DtoInput): input is ReadonlyMap<string, unknown> {
  return input instanceof Map;
}

export function isDtoClass(value: unknown): value is DtoClass {
  return (
    typeof value === "function" &&
    (value === Dto || value.prototype instanceof Dto)
  );
}

/** True when `cls` itself (not an ancestor) is marked abstract. */
export function isAbstractDtoClass(cls: DtoClass): boolean {
  return (
    Object.prototype.hasOwnProperty.call(cls, "isAbstractDto") &&
    cls.isAbstractDto
  );
}
