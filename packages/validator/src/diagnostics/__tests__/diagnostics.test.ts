import { describe, expect, it } from "vitest";
import {
  DiagnosticEmitter,
  DiagnosticError,
  captureDiagnostics,
  diagnosticFromCode,
  emitDiagnostic,
  formatDiagnostic,
  formatLocation,
  rootLocation,
} from "../index.js";

describe("diagnostics", () => {
  it("fills kind, phase and hints from the registry", () => {
    const diagnostic = diagnosticFromCode({
      code: "LK0002",
      params: { kind: "unbound-index", sort: "func", index: 3, length: 1 },
      location: { file: "main.json", path: [2] },
    });

    expect(diagnostic).toEqual({
      code: "LK0002",
      kind: "UnboundIndex",
      message: "func index 3 is out of bounds (1 defined so far)",
      severity: "error",
      phase: "linking",
      location: { file: "main.json", path: [2] },
      hints: [
        {
          message:
            "Definitions may only refer to definitions that appear before them.",
        },
      ],
    });
  });

  it("words alias depth errors by the available depth", () => {
    const topLevel = diagnosticFromCode({
      code: "LK0008",
      params: { kind: "alias-depth", count: 0, available: 0 },
      location: rootLocation(),
    });
    const nested = diagnosticFromCode({
      code: "LK0008",
      params: { kind: "alias-depth", count: 2, available: 1 },
      location: rootLocation(),
    });

    expect(topLevel.message).toBe(
      "outer alias depth 0 used in a module with no enclosing module"
    );
    expect(nested.message).toBe(
      "outer alias depth 2 exceeds the 1 enclosing module(s)"
    );
  });

  it("formats locations as definition paths", () => {
    expect(formatLocation({ file: "a.json", path: [] })).toBe("a.json");
    expect(formatLocation({ file: "a.json", path: [0, 4, 1] })).toBe(
      "a.json#0/4/1"
    );
  });

  it("formats a diagnostic on one line", () => {
    const diagnostic = diagnosticFromCode({
      code: "LK0007",
      params: { kind: "duplicate-argument", name: "libc" },
      location: { file: "a.json", path: [1] },
    });
    expect(formatDiagnostic(diagnostic)).toBe(
      "a.json#1 ERROR [linking] LK0007: argument name 'libc' is given more than once"
    );
  });

  it("throws through the emitter and records the diagnostic", () => {
    const emitter = new DiagnosticEmitter();
    const run = () =>
      emitDiagnostic({
        ctx: { diagnostics: emitter },
        code: "DC0001",
        params: { kind: "malformed-definition", reason: "name must be a string" },
        location: rootLocation("doc.json"),
      });

    expect(run).toThrow(DiagnosticError);
    expect(emitter.diagnostics).toHaveLength(1);
    expect(emitter.diagnostics[0]?.kind).toBe("MalformedDefinition");
    expect(emitter.diagnostics[0]?.phase).toBe("decode");
  });

  it("captures diagnostic errors as failed results", () => {
    const emitter = new DiagnosticEmitter();
    const result = captureDiagnostics(() =>
      emitDiagnostic({
        ctx: emitter,
        code: "CR0001",
        params: { kind: "core-validation-failed" },
        location: rootLocation(),
      })
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("core module failed validation");
      expect(result.error.kind).toBe("InvalidCoreModule");
    }
    expect(captureDiagnostics(() => 42)).toEqual({ ok: true, value: 42 });
  });

  it("lets other exceptions propagate", () => {
    expect(() =>
      captureDiagnostics(() => {
        throw new Error("boom");
      })
    ).toThrow("boom");
  });
});
