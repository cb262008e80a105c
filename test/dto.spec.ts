// test/dto.spec.ts
import { describe, it, expect } from "vitest";
import {
  DtoInvalidKeyError,
  DtoNotFillableError,
  DtoOverrideForbiddenError,
  DtoReadOnlyError,
  DtoUnknownAttributeError,
} from "../src/dto/DtoErrors";
import {
  FrozenUserDto,
  LenientDto,
  NarrowingDto,
  PlainDto,
  ProfileDto,
  ReadOnlyDto,
  StrictWriteDto,
  TypedDto,
  UserDto,
} from "./fixtures/dtos";

describe("Dto lifecycle", () => {
  it("is initialized once constructed, even without attributes", () => {
    const dto = new PlainDto();
    expect(dto.isInitialized()).toBe(true);
    expect(dto.count()).toBe(0);
  });

  it("snapshots the constructor attributes as original", () => {
    const dto = new PlainDto({ a: 1, b: "two" });
    expect(dto.getOriginal()).toEqual({ a: 1, b: "two" });
    expect(dto.getDirty()).toEqual({});
  });

  it("repeated empty fills leave original and dirty untouched", () => {
    const dto = new PlainDto({ a: 1 });
    dto.set("a", 2);

    dto.fill({});
    dto.fill({});

    expect(dto.isInitialized()).toBe(true);
    expect(dto.getOriginal()).toEqual({ a: 1 });
    expect(dto.getDirty()).toEqual({ a: 2 });
  });

  it("fills from a Map in iteration order; later entries win", () => {
    const dto = new PlainDto(
      new Map<string, unknown>([
        ["a", 1],
        ["b", 2],
      ])
    );
    dto.fill(new Map([["a", 3]]));

    expect(dto.all()).toEqual({ a: 3, b: 2 });
    expect(dto.getDirty("a")).toBe(3);
  });
});

describe("Dto.set / get / has", () => {
  it("returns what was set", () => {
    const dto = new PlainDto();
    dto.set("name", "Alex").set("tags", ["x"]);

    expect(dto.get("name")).toBe("Alex");
    expect(dto.get("tags")).toEqual(["x"]);
    expect(dto.has("name")).toBe(true);
    expect(dto.has("missing")).toBe(false);
  });

  it("rejects numeric keys on every container", () => {
    expect(() => new PlainDto().set("123", "x")).toThrow(DtoInvalidKeyError);
    expect(() => new LenientDto().set("123", "x")).toThrow(DtoInvalidKeyError);
  });

  it("throws UnknownAttribute when reading an absent name", () => {
    const dto = new PlainDto();
    expect(() => dto.get("nope")).toThrow(DtoUnknownAttributeError);
    expect(() => dto.get("nope")).toThrow(
      "DTO_UNKNOWN_ATTRIBUTE: Property [nope] was not found on PlainDto."
    );
  });

  it("yields undefined for absent names when ignoring unknown", () => {
    expect(new LenientDto().get("nope")).toBeUndefined();
  });

  it("treats an attribute set to null as present", () => {
    const dto = new PlainDto({ name: null });
    expect(dto.has("name")).toBe(true);
    expect(dto.get("name")).toBeNull();
  });
});

describe("Dto policies", () => {
  it("enforces the fillable whitelist", () => {
    const dto = new ProfileDto();

    expect(() => dto.set("c", 1)).toThrow(DtoNotFillableError);
    dto.set("a", 1);

    expect(dto.all()).toEqual({ a: 1 });
    expect(dto.getFillable()).toEqual(["a", "b"]);
  });

  it("rejects non-fillable names during construction", () => {
    expect(() => new UserDto({ name: "Alex", age: 30 })).toThrow(
      "DTO_NOT_FILLABLE: Property [age] is not fillable on UserDto."
    );
  });

  it("read-only permits the constructor fill but blocks later writes", () => {
    const dto = new ReadOnlyDto({ a: 1 });

    expect(dto.get("a")).toBe(1);
    expect(() => dto.set("a", 2)).toThrow(DtoReadOnlyError);
    expect(() => dto.set("b", 2)).toThrow(DtoReadOnlyError);
    expect(() => dto.unset("a")).toThrow(DtoReadOnlyError);
    expect(dto.all()).toEqual({ a: 1 });
  });

  it("read-only wins over the fillable check", () => {
    const dto = new FrozenUserDto({ name: "Alex" });
    expect(() => dto.set("email", "a@example.test")).toThrow(DtoReadOnlyError);
  });

  it("checks the whitelist before forbidding overrides", () => {
    const dto = new NarrowingDto({ a: 1 });

    expect(() => dto.set("a", 2)).toThrow(DtoOverrideForbiddenError);

    dto.narrow();
    expect(() => dto.set("a", 2)).toThrow(
      "DTO_NOT_FILLABLE: Property [a] is not fillable on NarrowingDto."
    );
    expect(dto.get("a")).toBe(1);
  });

  it("forbids overriding existing attributes", () => {
    const dto = new StrictWriteDto();
    dto.set("a", 1);

    expect(() => dto.set("a", 2)).toThrow(DtoOverrideForbiddenError);
    expect(dto.get("a")).toBe(1);
    expect(dto.getDirty()).toEqual({});
  });

  it("without the policy a second write succeeds and marks dirty", () => {
    const dto = new PlainDto();
    dto.set("a", 1);
    dto.set("a", 2);

    expect(dto.get("a")).toBe(2);
    expect(dto.getOriginal("a")).toBe(1);
    expect(dto.getDirty("a")).toBe(2);
  });

  it("resolves options from declared capabilities", () => {
    expect(new FrozenUserDto().getOptions()).toEqual({
      forbidsOverrides: false,
      ignoresUnknown: true,
      readOnly: true,
    });
  });

  it("setOptions merges recognized keys and coerces them to boolean", () => {
    const dto = new ReadOnlyDto({ a: 1 });
    dto.setOptions({ readOnly: 0, forbidsOverrides: "yes", colour: true });

    expect(dto.getOptions()).toEqual({
      forbidsOverrides: true,
      ignoresUnknown: false,
      readOnly: false,
    });
    expect(() => dto.set("a", 2)).toThrow(DtoOverrideForbiddenError);
    dto.set("b", 2);
    expect(dto.get("b")).toBe(2);
  });

  it("accepts per-instance options at construction", () => {
    const dto = new PlainDto({ a: 1 }, { options: { ignoresUnknown: true } });
    expect(dto.get("zzz")).toBeUndefined();
    expect(new PlainDto().getOptions().ignoresUnknown).toBe(false);
  });
});

describe("Dto change tracking", () => {
  it("keeps the first-assignment value as original", () => {
    const dto = new PlainDto();
    dto.set("a", 1);

    expect(dto.getOriginal("a")).toBe(1);
    expect(dto.getDirty("a")).toBeUndefined();
    expect(dto.isDirty()).toBe(false);
  });

  it("does not mark dirty when the value is deep-equal to original", () => {
    const dto = new PlainDto({ tags: ["a", "b"] });
    dto.set("tags", ["a", "b"]);

    expect(dto.isDirty("tags")).toBe(false);
  });

  it("drops the dirty entry when the original value is restored", () => {
    const dto = new PlainDto({ a: 1 });
    dto.set("a", 2);
    expect(dto.isDirty("a")).toBe(true);

    dto.set("a", 1);
    expect(dto.isDirty("a")).toBe(false);
    expect(dto.getDirty()).toEqual({});
  });

  it("syncOriginal replaces original but leaves dirty alone", () => {
    const dto = new PlainDto({ a: 1 });
    dto.set("a", 2);
    dto.syncOriginal();

    expect(dto.getOriginal()).toEqual({ a: 2 });
    expect(dto.getDirty()).toEqual({ a: 2 });
    expect(dto.isInitialized()).toBe(true);
  });

  it("unset removes the attribute and its dirty entry", () => {
    const dto = new PlainDto({ a: 1, b: 2 });
    dto.set("a", 5);
    dto.unset("a");

    expect(dto.has("a")).toBe(false);
    expect(dto.getDirty()).toEqual({});
    expect(dto.getOriginal("a")).toBe(1);
    expect(dto.tryUnset("a")).toEqual({ ok: true, value: false });
  });

  it("returns copies that do not write through", () => {
    const dto = new PlainDto({ a: 1 });
    const snapshot = dto.all();
    snapshot.a = 99;

    const original = dto.getOriginal();
    original.a = 42;

    expect(dto.get("a")).toBe(1);
    expect(dto.getOriginal("a")).toBe(1);
  });
});

describe("Dto state queries", () => {
  it("isEmpty is true when every stored value is null", () => {
    const dto = new PlainDto({ name: null });
    expect(dto.isEmpty()).toBe(true);
    expect(dto.isFilled()).toBe(false);

    dto.set("name", "x");
    expect(dto.isEmpty()).toBe(false);
    expect(dto.isFilled()).toBe(true);
  });

  it("isEmpty is true for a container with no attributes", () => {
    expect(new PlainDto().isEmpty()).toBe(true);
  });

  it("iterates over name/value pairs", () => {
    const dto = new PlainDto({ a: 1, b: 2 });
    expect([...dto]).toEqual([
      ["a", 1],
      ["b", 2],
    ]);
    expect(dto.count()).toBe(2);
  });

  it("reports its concrete class as type", () => {
    expect(new UserDto().getType()).toBe("UserDto");
  });
});

describe("Dto JSON", () => {
  it("encodes the attribute map", () => {
    const dto = new PlainDto({ name: "Alex", age: 30, tags: ["a"] });

    expect(dto.toJson()).toBe('{"name":"Alex","age":30,"tags":["a"]}');
    expect(JSON.parse(dto.toJson())).toEqual(dto.all());
  });

  it("honors the space option", () => {
    expect(new PlainDto({ a: 1 }).toJson({ space: 2 })).toBe('{\n  "a": 1\n}');
  });

  it("serializes through JSON.stringify", () => {
    expect(JSON.stringify({ user: new PlainDto({ a: 1 }) })).toBe(
      '{"user":{"a":1}}'
    );
  });

  it("propagates encoding failures", () => {
    const dto = new PlainDto({ big: 10n });
    expect(() => dto.toJson()).toThrow(TypeError);
  });
});

describe("Dto quiet mode", () => {
  it("absorbs write and read failures", () => {
    const dto = new UserDto({}, { silent: true });

    dto.set("age", 30);
    dto.set("123", "x");

    expect(dto.all()).toEqual({});
    expect(dto.get("age")).toBeUndefined();
  });

  it("drops rejected entries from the constructor fill", () => {
    const dto = new UserDto({ name: "Alex", age: 30 }, { silent: true });
    expect(dto.all()).toEqual({ name: "Alex" });
  });

  it("can be switched off again", () => {
    const dto = new UserDto({}, { silent: true }).shouldBeSilent(false);
    expect(dto.isSilent()).toBe(false);
    expect(() => dto.set("age", 30)).toThrow(DtoNotFillableError);
  });

  it("trySet reports the failure without throwing", () => {
    const result = new ReadOnlyDto().trySet("a", 1);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(DtoReadOnlyError);
  });

  it("trySet returns the descriptor on success", () => {
    const result = new PlainDto().trySet("score", 7);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.name).toBe("score");
      expect(result.value.type).toBe("number");
    }
  });
});

describe("typed accessors", () => {
  it("narrow stored values by type", () => {
    const dto = new TypedDto({ title: "Intro", score: 9, active: false });

    expect(dto.title).toBe("Intro");
    expect(dto.score).toBe(9);
    expect(dto.active).toBe(false);
  });

  it("yield undefined for mismatched types", () => {
    const dto = new TypedDto({ title: 5, score: "9", active: "yes" });

    expect(dto.title).toBeUndefined();
    expect(dto.score).toBeUndefined();
    expect(dto.active).toBeUndefined();
  });

  it("UserDto exposes name", () => {
    expect(new UserDto({ name: "Alex" }).name).toBe("Alex");
  });
});
