import binaryen from "binaryen";
import {
  DiagnosticError,
  createMemoryDocumentHost,
  diagnosticFromCode,
} from "@modlink/validator";
import { describe, expect, it } from "vitest";
import type { ModlinkConfig } from "../config/types.js";
import { formatFatalError, runCli } from "../exec.js";

const func = (params: string[] = [], results: string[] = []) => ({
  kind: "func",
  params,
  results,
});

const files = {
  "/work/lib.json": JSON.stringify({
    definitions: [
      {
        kind: "import",
        name: "libc",
        type: { kind: "instance", exports: [{ name: "malloc", type: func(["i32"], ["i32"]) }] },
      },
      {
        kind: "alias",
        alias: { kind: "instance-export", instance: 0, name: "malloc", sort: "func" },
      },
      { kind: "export", name: "alloc", ref: { sort: "func", index: 0 } },
    ],
  }),
  "/work/bad.json": JSON.stringify([
    { kind: "export", name: "x", ref: { sort: "func", index: 0 } },
  ]),
  "/work/empty.json": JSON.stringify([]),
  "/work/needs-env.json": JSON.stringify([
    { kind: "import", name: "", type: { kind: "instance", exports: [] } },
  ]),
};

const coreBytes = (): Uint8Array => {
  const mod = binaryen.parseText(`
(module
  (func $noop)
  (export "noop" (func $noop)))
`);
  try {
    return mod.emitBinary();
  } finally {
    mod.dispose();
  }
};

const run = async (config: Partial<ModlinkConfig> & Pick<ModlinkConfig, "files">) => {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const exitCode = await runCli({
    config: { command: "validate", emitType: false, color: false, ...config },
    host: createMemoryDocumentHost({ files: { ...files, "/work/core.wasm": coreBytes() } }),
    io: { stdout: (line) => stdout.push(line), stderr: (line) => stderr.push(line) },
    color: false,
  });
  return { exitCode, stdout, stderr };
};

describe("runCli", () => {
  it("validates every document and reports failures", async () => {
    const { exitCode, stdout, stderr } = await run({
      files: ["/work/lib.json", "/work/bad.json"],
    });

    expect(exitCode).toBe(1);
    expect(stdout).toEqual(["ok /work/lib.json"]);
    expect(stderr).toEqual([
      [
        "ERROR [linking] LK0002: func index 0 is out of bounds (0 defined so far)",
        "  --> /work/bad.json#0",
        "  = hint: Definitions may only refer to definitions that appear before them.",
      ].join("\n"),
    ]);
  });

  it("keeps validating after a missing document", async () => {
    const { exitCode, stdout, stderr } = await run({
      files: ["/work/missing.json", "/work/lib.json"],
    });

    expect(exitCode).toBe(1);
    expect(stdout).toEqual(["ok /work/lib.json"]);
    expect(stderr).toEqual([
      [
        "ERROR [decode] DC0002: unable to read '/work/missing.json': File not found: /work/missing.json",
        "  --> /work/missing.json",
      ].join("\n"),
    ]);
  });

  it("prints module types with --emit-type", async () => {
    const { exitCode, stdout } = await run({
      files: ["/work/lib.json"],
      emitType: true,
    });

    expect(exitCode).toBe(0);
    expect(stdout).toHaveLength(1);
    expect(JSON.parse(stdout[0] ?? "")).toEqual({
      file: "/work/lib.json",
      type: {
        kind: "module",
        imports: [
          {
            name: "libc",
            type: {
              kind: "instance",
              exports: [{ name: "malloc", type: func(["i32"], ["i32"]) }],
            },
          },
        ],
        exports: [{ name: "alloc", type: func(["i32"], ["i32"]) }],
      },
    });
  });

  it("checks module subtyping", async () => {
    const holds = await run({
      command: "subtype",
      files: ["/work/empty.json", "/work/needs-env.json"],
    });
    expect(holds.exitCode).toBe(0);
    expect(holds.stdout).toEqual(["true"]);

    const fails = await run({
      command: "subtype",
      files: ["/work/needs-env.json", "/work/empty.json"],
    });
    expect(fails.exitCode).toBe(1);
    expect(fails.stdout).toEqual([
      "false: import \"\": import of type 'instance {}' is not provided by the expected module type",
    ]);
  });

  it("reports invalid documents before comparing", async () => {
    const { exitCode, stdout, stderr } = await run({
      command: "subtype",
      files: ["/work/bad.json", "/work/empty.json"],
    });
    expect(exitCode).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr).toHaveLength(1);
  });

  it("needs two documents for subtype", async () => {
    const { exitCode, stderr } = await run({
      command: "subtype",
      files: ["/work/empty.json"],
    });
    expect(exitCode).toBe(1);
    expect(stderr).toEqual(["subtype needs exactly two documents"]);
  });

  it("prints the type of a core module", async () => {
    const { exitCode, stdout } = await run({
      command: "core",
      files: ["/work/core.wasm"],
    });
    expect(exitCode).toBe(0);
    expect(JSON.parse(stdout.join("\n"))).toEqual({
      kind: "module",
      imports: [],
      exports: [{ name: "noop", type: func() }],
    });
  });
});

describe("formatFatalError", () => {
  it("renders diagnostic errors without color when asked", () => {
    const error = new DiagnosticError(
      diagnosticFromCode({
        code: "LK0007",
        params: { kind: "duplicate-argument", name: "libc" },
        location: { file: "main.json", path: [3] },
      })
    );
    expect(formatFatalError(error, { color: false })).toBe(
      "ERROR [linking] LK0007: argument name 'libc' is given more than once\n  --> main.json#3"
    );
  });

  it("renders other values as text", () => {
    expect(formatFatalError("stopped", { color: false })).toBe("stopped");
  });
});
