import binaryen from "binaryen";
import { describe, expect, it } from "vitest";
import { DiagnosticEmitter, rootLocation } from "../../diagnostics/index.js";
import { funcType, globalType, instanceType } from "../../types/index.js";
import { instantiate } from "../../instantiate.js";
import { validateModule } from "../../validate-module.js";
import { coreModuleType } from "../core-module-type.js";

const assemble = (text: string): Uint8Array => {
  const mod = binaryen.parseText(text);
  try {
    return mod.emitBinary();
  } finally {
    mod.dispose();
  }
};

const adder = assemble(`
(module
  (import "env" "log" (func $log (param i32)))
  (global $answer i32 (i32.const 42))
  (func $add (param i32 i32) (result i32)
    (i32.add (local.get 0) (local.get 1)))
  (export "add" (func $add))
  (export "answer" (global $answer)))
`);

// (module (import "" "f" (func (param i32)))), which parseText cannot express.
const emptyModuleNameImport = new Uint8Array([
  0x00, 0x61, 0x73, 0x6d, 0x01, 0x00, 0x00, 0x00,
  0x01, 0x05, 0x01, 0x60, 0x01, 0x7f, 0x00,
  0x02, 0x06, 0x01, 0x00, 0x01, 0x66, 0x00, 0x00,
]);

const ctx = () => ({
  diagnostics: new DiagnosticEmitter(),
  location: rootLocation("core.wasm"),
});

describe("coreModuleType", () => {
  it("groups two-level imports into instance imports", () => {
    const type = coreModuleType(adder, ctx());
    expect(Array.from(type.imports.keys())).toEqual(["env"]);
    expect(type.imports.get("env")).toEqual(
      instanceType({ log: funcType(["i32"]) })
    );
  });

  it("keeps imports whose module name is empty", () => {
    const type = coreModuleType(emptyModuleNameImport, ctx());
    expect(Array.from(type.imports.keys())).toEqual([""]);
    expect(type.imports.get("")).toEqual(instanceType({ f: funcType(["i32"]) }));
    expect(type.exports.size).toBe(0);

    const result = instantiate(type, []);
    expect(!result.ok && result.error.message).toBe(
      "missing argument for import '' of type 'instance { \"f\": func (i32) -> () }'"
    );
  });

  it("types function and global exports", () => {
    const type = coreModuleType(adder, ctx());
    expect(type.exports.get("add")).toEqual(funcType(["i32", "i32"], ["i32"]));
    expect(type.exports.get("answer")).toEqual(globalType("i32"));
  });

  it("links embedded core modules", () => {
    const result = validateModule([
      { kind: "import", name: "log", type: { kind: "func", params: ["i32"], results: [] } },
      { kind: "core-module", bytes: adder },
      {
        kind: "instance",
        instance: { kind: "tuple", args: [{ name: "log", ref: { sort: "func", index: 0 } }] },
      },
      {
        kind: "instance",
        instance: {
          kind: "instantiate",
          module: 0,
          args: [{ name: "env", ref: { sort: "instance", index: 0 } }],
        },
      },
      {
        kind: "alias",
        alias: { kind: "instance-export", instance: 1, name: "add", sort: "func" },
      },
      { kind: "export", name: "add", ref: { sort: "func", index: 1 } },
    ]);

    expect(result.ok && result.value.exports.get("add")).toEqual(
      funcType(["i32", "i32"], ["i32"])
    );
  });

  it("rejects instantiation without the core imports", () => {
    const result = validateModule([
      { kind: "core-module", bytes: adder },
      { kind: "instance", instance: { kind: "instantiate", module: 0, args: [] } },
    ]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        "missing argument for import 'env' of type 'instance { \"log\": func (i32) -> () }'"
      );
    }
  });
});
