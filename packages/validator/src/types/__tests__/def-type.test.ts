import { describe, expect, it } from "vitest";
import {
  defTypeKey,
  defTypesEqual,
  formatDefType,
  funcType,
  globalType,
  instanceType,
  memoryType,
  moduleType,
  tableType,
} from "../index.js";

describe("def types", () => {
  it("ignores entry order in canonical keys", () => {
    const left = instanceType([
      ["b", funcType(["i32"])],
      ["a", globalType("i64", true)],
    ]);
    const right = instanceType({
      a: globalType("i64", true),
      b: funcType(["i32"]),
    });

    expect(defTypeKey(left)).toBe(defTypeKey(right));
    expect(defTypesEqual(left, right)).toBe(true);
  });

  it("compares leaf types exactly", () => {
    expect(defTypesEqual(funcType(["i32"]), funcType(["i32"]))).toBe(true);
    expect(defTypesEqual(funcType(["i32"]), funcType(["i64"]))).toBe(false);
    expect(defTypesEqual(funcType([], ["i32"]), funcType(["i32"]))).toBe(false);
    expect(
      defTypesEqual(memoryType({ min: 1 }), memoryType({ min: 1, max: 2 }))
    ).toBe(false);
    expect(
      defTypesEqual(tableType("funcref"), tableType("externref"))
    ).toBe(false);
    expect(defTypesEqual(globalType("i32"), globalType("i32", true))).toBe(false);
  });

  it("distinguishes module imports from exports", () => {
    const imported = moduleType({ imports: { f: funcType() } });
    const exported = moduleType({ exports: { f: funcType() } });
    expect(defTypesEqual(imported, exported)).toBe(false);
    expect(defTypeKey(imported)).not.toBe(defTypeKey(exported));
  });

  it("builds immutable values", () => {
    const type = funcType(["i32"]);
    expect(Object.isFrozen(type)).toBe(true);
  });

  it("formats types with sorted entries", () => {
    const type = moduleType({
      imports: {
        libc: instanceType({ memory: memoryType({ min: 1 }), malloc: funcType(["i32"], ["i32"]) }),
      },
      exports: { run: funcType() },
    });

    expect(formatDefType(type)).toBe(
      'module (imports { "libc": instance { "malloc": func (i32) -> (i32), "memory": memory 1 } }) (exports { "run": func () -> () })'
    );
    expect(formatDefType(instanceType())).toBe("instance {}");
    expect(formatDefType(tableType("funcref", { min: 1, max: 4 }))).toBe(
      "table 1 4 funcref"
    );
    expect(formatDefType(globalType("f32", true))).toBe("global mut f32");
  });
});
