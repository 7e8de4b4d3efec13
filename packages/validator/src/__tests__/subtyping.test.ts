import { describe, expect, it } from "vitest";
import {
  checkInstanceSubtype,
  checkModuleSubtype,
  explainSubtypeFailure,
  formatSubtypeMismatch,
  isSubtype,
} from "../subtyping.js";
import {
  funcType,
  globalType,
  instanceType,
  memoryType,
  moduleType,
  type DefType,
} from "../types/index.js";

const f = funcType();
const fI32 = funcType(["i32"]);

const universe: DefType[] = [
  f,
  fI32,
  globalType("i32"),
  instanceType(),
  instanceType({ a: f }),
  instanceType({ a: f, b: f }),
  instanceType({ a: fI32 }),
  instanceType({ a: instanceType() }),
  instanceType({ a: instanceType({ e: f }) }),
  moduleType(),
  moduleType({ exports: { a: f } }),
  moduleType({ imports: { a: f } }),
  moduleType({ imports: { a: f, b: f } }),
  moduleType({ imports: { a: instanceType({ e: f }) }, exports: { a: f } }),
  moduleType({ imports: { a: instanceType() }, exports: { a: f, b: f } }),
];

describe("subtyping", () => {
  it("relates instances by their exports", () => {
    expect(isSubtype(instanceType(), instanceType())).toBe(true);
    expect(isSubtype(instanceType({ "": f }), instanceType())).toBe(true);
    expect(isSubtype(instanceType(), instanceType({ "": f }))).toBe(false);
    expect(
      isSubtype(
        instanceType({ "": instanceType({ e: f }) }),
        instanceType({ "": instanceType() })
      )
    ).toBe(true);
  });

  it("treats func types by equality", () => {
    expect(isSubtype(f, f)).toBe(true);
    expect(isSubtype(fI32, f)).toBe(false);
    expect(isSubtype(funcType([], ["i32"]), funcType([], ["i64"]))).toBe(false);
    expect(isSubtype(globalType("i32"), globalType("i32", true))).toBe(false);
  });

  it("never relates different kinds", () => {
    expect(isSubtype(f, globalType("i32"))).toBe(false);
    expect(isSubtype(instanceType(), moduleType())).toBe(false);
  });

  it("allows instances with more exports", () => {
    const wide = instanceType({ a: f, b: fI32 });
    const narrow = instanceType({ a: f });
    expect(checkInstanceSubtype(wide, narrow)).toBe(true);
    expect(checkInstanceSubtype(narrow, wide)).toBe(false);
    expect(checkInstanceSubtype(wide, instanceType())).toBe(true);
  });

  it("compares nested instance exports covariantly", () => {
    expect(
      isSubtype(
        instanceType({ inner: instanceType({ a: f, b: f }) }),
        instanceType({ inner: instanceType({ a: f }) })
      )
    ).toBe(true);
    expect(
      isSubtype(instanceType({ a: f }), instanceType({ a: fI32 }))
    ).toBe(false);
  });

  it("allows modules that import less", () => {
    const importsNothing = moduleType();
    const importsSomething = moduleType({ imports: { "": instanceType() } });
    expect(checkModuleSubtype(importsNothing, importsSomething)).toBe(true);
    expect(checkModuleSubtype(importsSomething, importsNothing)).toBe(false);
  });

  it("allows modules whose imports are supertypes", () => {
    const needsNarrow = moduleType({ imports: { lib: instanceType({ a: f }) } });
    const needsWide = moduleType({
      imports: { lib: instanceType({ a: f, b: f }) },
    });
    expect(checkModuleSubtype(needsNarrow, needsWide)).toBe(true);
    expect(checkModuleSubtype(needsWide, needsNarrow)).toBe(false);
  });

  it("is reflexive and transitive", () => {
    universe.forEach((a) => expect(isSubtype(a, a)).toBe(true));
    universe.forEach((a) =>
      universe.forEach((b) =>
        universe.forEach((c) => {
          if (isSubtype(a, b) && isSubtype(b, c)) {
            expect(isSubtype(a, c)).toBe(true);
          }
        })
      )
    );
  });

  it("is monotone in exports and antitone in imports", () => {
    universe.forEach((a) =>
      universe.forEach((b) => {
        if (!isSubtype(a, b)) return;
        expect(
          isSubtype(moduleType({ exports: { x: a } }), moduleType({ exports: { x: b } }))
        ).toBe(true);
        expect(
          isSubtype(moduleType({ imports: { x: b } }), moduleType({ imports: { x: a } }))
        ).toBe(true);
        expect(
          isSubtype(instanceType({ x: a }), instanceType({ x: b }))
        ).toBe(true);
      })
    );
  });

  it("explains the first failing entry", () => {
    const mismatch = explainSubtypeFailure(
      instanceType({ memory: memoryType({ min: 1 }) }),
      instanceType({ malloc: funcType(["i32"], ["i32"]), memory: memoryType({ min: 1 }) })
    );
    expect(mismatch?.reason).toBe("missing-export");
    expect(mismatch?.path).toEqual([{ via: "export", name: "malloc" }]);
    expect(mismatch && formatSubtypeMismatch(mismatch)).toBe(
      "export \"malloc\": missing export of type 'func (i32) -> (i32)'"
    );
  });

  it("explains missing imports of the supertype", () => {
    const mismatch = explainSubtypeFailure(
      moduleType({ imports: { "": instanceType() } }),
      moduleType()
    );
    expect(mismatch && formatSubtypeMismatch(mismatch)).toBe(
      "import \"\": import of type 'instance {}' is not provided by the expected module type"
    );
  });

  it("explains nested leaf and kind mismatches", () => {
    const leaf = explainSubtypeFailure(
      moduleType({ exports: { run: instanceType({ go: f }) } }),
      moduleType({ exports: { run: instanceType({ go: fI32 }) } })
    );
    expect(leaf && formatSubtypeMismatch(leaf)).toBe(
      "export \"run\" > export \"go\": expected 'func (i32) -> ()', found 'func () -> ()'"
    );

    const kind = explainSubtypeFailure(globalType("i32"), f);
    expect(kind && formatSubtypeMismatch(kind)).toBe(
      "expected a func, found a global"
    );
    expect(explainSubtypeFailure(f, f)).toBeUndefined();
  });
});
