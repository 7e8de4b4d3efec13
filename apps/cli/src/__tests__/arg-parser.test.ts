import { describe, expect, it } from "vitest";
import { getConfigFromCli, parseConfig } from "../config/arg-parser.js";

const runWithArgv = (argv: string[]) => {
  const originalArgv = process.argv;
  process.argv = argv;
  try {
    return getConfigFromCli();
  } finally {
    process.argv = originalArgv;
  }
};

describe("getConfigFromCli", () => {
  it("validates the given documents by default", () => {
    const config = runWithArgv(["node", "modlink", "a.json", "b.msgpack"]);
    expect(config).toEqual({
      command: "validate",
      files: ["a.json", "b.msgpack"],
      emitType: false,
      format: undefined,
      color: true,
    });
  });

  it("reads --emit-type and --no-color", () => {
    const config = runWithArgv([
      "node",
      "modlink",
      "--emit-type",
      "--no-color",
      "a.json",
    ]);
    expect(config.emitType).toBe(true);
    expect(config.color).toBe(false);
  });

  it("accepts a forced document format", () => {
    const config = runWithArgv(["node", "modlink", "--format", "MSGPACK", "doc.bin"]);
    expect(config.format).toBe("msgpack");
    expect(config.files).toEqual(["doc.bin"]);
  });
});

describe("parseConfig", () => {
  it("supports `modlink subtype`", () => {
    expect(parseConfig(["subtype", "sub.json", "super.json"])).toEqual({
      command: "subtype",
      files: ["sub.json", "super.json"],
      emitType: false,
      format: undefined,
      color: true,
    });
  });

  it("finds the subcommand after options", () => {
    const config = parseConfig(["--format", "json", "subtype", "a", "b"]);
    expect(config.command).toBe("subtype");
    expect(config.format).toBe("json");
    expect(config.files).toEqual(["a", "b"]);
  });

  it("supports `modlink core`", () => {
    const config = parseConfig(["--no-color", "core", "lib.wasm"]);
    expect(config.command).toBe("core");
    expect(config.files).toEqual(["lib.wasm"]);
    expect(config.color).toBe(false);
  });

  it("treats a document named like a later argument as a document", () => {
    const config = parseConfig(["main.json", "core"]);
    expect(config.command).toBe("validate");
    expect(config.files).toEqual(["main.json", "core"]);
  });
});
