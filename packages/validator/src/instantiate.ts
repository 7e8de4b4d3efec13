import {
  DiagnosticEmitter,
  captureDiagnostics,
  emitDiagnostic,
  rootLocation,
  type DefinitionLocation,
  type Result,
} from "./diagnostics/index.js";
import { incrementValidatorPerfCounter } from "./perf.js";
import { explainSubtypeFailure, formatSubtypeMismatch } from "./subtyping.js";
import {
  formatDefType,
  instanceType,
  isDefKind,
  type DefType,
  type InstanceType,
  type ModuleType,
} from "./types/index.js";

export type NamedArg = { name: string; type: DefType };

type InstantiationContext = {
  diagnostics: DiagnosticEmitter;
  location: DefinitionLocation;
};

/**
 * Matches `args` against the imports of `module` by name. Order is
 * irrelevant and names the module does not import are ignored. Throws a
 * `DiagnosticError` through `ctx` on the first mismatch.
 */
export const checkInstantiation = (
  ctx: InstantiationContext,
  module: ModuleType,
  args: readonly NamedArg[]
): InstanceType => {
  incrementValidatorPerfCounter("instantiations");
  const byName = new Map<string, DefType>();
  for (const { name, type } of args) {
    if (byName.has(name)) {
      return emitDiagnostic({
        ctx,
        code: "LK0007",
        params: { kind: "duplicate-argument", name },
        location: ctx.location,
      });
    }
    byName.set(name, type);
  }

  for (const [name, expected] of module.imports) {
    const actual = byName.get(name);
    if (!actual) {
      return emitDiagnostic({
        ctx,
        code: "LK0006",
        params: {
          kind: "missing-import",
          name,
          expected: formatDefType(expected),
        },
        location: ctx.location,
      });
    }

    const mismatch = explainSubtypeFailure(actual, expected);
    if (mismatch) {
      return emitDiagnostic({
        ctx,
        code: "LK0005",
        params: {
          kind: "argument-not-subtype",
          name,
          expected: formatDefType(expected),
          actual: formatDefType(actual),
          reason:
            mismatch.path.length > 0 ? formatSubtypeMismatch(mismatch) : undefined,
        },
        location: ctx.location,
      });
    }
  }

  return instanceType(module.exports);
};

/** Host-side instantiation of a validated module type. */
export const instantiate = (
  module: ModuleType,
  args: readonly NamedArg[],
  { location = rootLocation("<host>") }: { location?: DefinitionLocation } = {}
): Result<InstanceType> =>
  captureDiagnostics(() =>
    checkInstantiation(
      { diagnostics: new DiagnosticEmitter(), location },
      module,
      args
    )
  );

export type ImportObject = {
  readonly [name: string]: DefType | ImportObject;
};

const isDefType = (value: DefType | ImportObject): value is DefType =>
  isDefKind(value.kind);

const importObjectToInstance = (value: ImportObject): InstanceType =>
  instanceType(
    Object.entries(value).map(([name, entry]): [string, DefType] => [
      name,
      isDefType(entry) ? entry : importObjectToInstance(entry),
    ])
  );

/**
 * Translates a JS-style import object into named arguments. Nested records
 * become instance types, so `{ env: { log: func } }` supplies an argument
 * `env` of type `instance { "log": func }`.
 */
export const namedArgsFromImportObject = (
  importObject: ImportObject
): NamedArg[] =>
  Object.entries(importObject).map(([name, value]) => ({
    name,
    type: isDefType(value) ? value : importObjectToInstance(value),
  }));
