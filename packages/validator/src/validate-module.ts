import { resolveAlias } from "./alias.js";
import { coreModuleType, type CoreModuleTyper } from "./core/core-module-type.js";
import type {
  DefRef,
  Definition,
  InstanceExpr,
  NamedRef,
  TypeEntry,
  TypeExpr,
} from "./definitions.js";
import {
  captureDiagnostics,
  emitDiagnostic,
  rootLocation,
  type Diagnostic,
  type Result,
} from "./diagnostics/index.js";
import { checkInstantiation } from "./instantiate.js";
import {
  incrementValidatorPerfCounter,
  isValidatorPerfEnabled,
  logValidatorPerfSummary,
  resetValidatorPerfCounters,
  snapshotValidatorPerfCounters,
} from "./perf.js";
import { Scope } from "./scope.js";
import {
  funcType,
  globalType,
  instanceType,
  memoryType,
  moduleType,
  tableType,
  type DefType,
  type InstanceType,
  type ModuleType,
} from "./types/index.js";

export type ValidatorState = "empty" | "accumulating" | "frozen" | "failed";

export type ModuleValidatorOptions = {
  scope?: Scope;
  coreModuleTyper?: CoreModuleTyper;
};

/**
 * Validates one module's definition sequence in order. Each definition may
 * only see what precedes it; the first error moves the validator to `failed`
 * and nothing after it is considered.
 */
export class ModuleValidator {
  readonly scope: Scope;
  #coreModuleTyper: CoreModuleTyper;
  #state: ValidatorState = "empty";
  #ordinal = 0;
  #failure?: Diagnostic;

  constructor({
    scope = new Scope(),
    coreModuleTyper = coreModuleType,
  }: ModuleValidatorOptions = {}) {
    this.scope = scope;
    this.#coreModuleTyper = coreModuleTyper;
  }

  get state(): ValidatorState {
    return this.#state;
  }

  get failure(): Diagnostic | undefined {
    return this.#failure;
  }

  push(definition: Definition): Result<void> {
    return this.#guard(() => this.#apply(definition));
  }

  finish(): Result<ModuleType> {
    if (this.#failure) {
      return { ok: false, error: this.#failure };
    }
    return this.#guard(() => this.#freeze());
  }

  #guard<T>(fn: () => T): Result<T> {
    this.#assertActive();
    const result = captureDiagnostics(fn);
    if (!result.ok) {
      this.#state = "failed";
      this.#failure = result.error;
    }
    return result;
  }

  #assertActive(): void {
    if (this.#state === "failed" || this.#state === "frozen") {
      throw new Error(`module validator is already ${this.#state}`);
    }
  }

  #freeze(): ModuleType {
    const type = this.scope.freeze();
    this.#state = "frozen";
    return type;
  }

  #apply(definition: Definition): void {
    this.#assertActive();
    this.#state = "accumulating";
    this.scope.moveCursor(this.#ordinal);
    this.#ordinal += 1;
    incrementValidatorPerfCounter("definitions");

    switch (definition.kind) {
      case "type":
        this.scope.declare("type", this.#resolveTypeExpr(definition.type));
        return;
      case "import":
        this.scope.declareNamed(
          "import",
          definition.name,
          this.#resolveTypeExpr(definition.type)
        );
        return;
      case "module":
        this.scope.declare("module", this.#validateNested(definition.definitions));
        return;
      case "core-module":
        this.scope.declare(
          "module",
          this.#coreModuleTyper(definition.bytes, {
            diagnostics: this.scope.diagnostics,
            location: this.scope.cursor,
          })
        );
        return;
      case "instance":
        this.scope.declare("instance", this.#resolveInstance(definition.instance));
        return;
      case "alias":
        resolveAlias(this.scope, definition.alias);
        return;
      case "export":
        this.scope.declareNamed(
          "export",
          definition.name,
          this.#resolveRef(definition.ref)
        );
        return;
    }
  }

  #validateNested(definitions: readonly Definition[]): ModuleType {
    const nested = new ModuleValidator({
      scope: this.scope.openChild(),
      coreModuleTyper: this.#coreModuleTyper,
    });
    definitions.forEach((definition) => nested.#apply(definition));
    return nested.#freeze();
  }

  #resolveRef({ sort, index }: DefRef): DefType {
    return this.scope.resolve(sort, index);
  }

  #resolveInstance(expr: InstanceExpr): InstanceType {
    if (expr.kind === "instantiate") {
      const module = this.scope.resolve("module", expr.module);
      const args = expr.args.map(({ name, ref }) => ({
        name,
        type: this.#resolveRef(ref),
      }));
      return checkInstantiation(
        { diagnostics: this.scope.diagnostics, location: this.scope.cursor },
        module,
        args
      );
    }

    return instanceType(this.#resolveTuple(expr.args));
  }

  #resolveTuple(args: readonly NamedRef[]): Map<string, DefType> {
    const exports = new Map<string, DefType>();
    for (const { name, ref } of args) {
      if (exports.has(name)) {
        return emitDiagnostic({
          ctx: this.scope,
          code: "LK0007",
          params: { kind: "duplicate-argument", name },
          location: this.scope.cursor,
        });
      }
      exports.set(name, this.#resolveRef(ref));
    }
    return exports;
  }

  #resolveEntries(
    entries: readonly TypeEntry[],
    entry: "import" | "export"
  ): Map<string, DefType> {
    const resolved = new Map<string, DefType>();
    for (const { name, type } of entries) {
      if (resolved.has(name)) {
        return emitDiagnostic({
          ctx: this.scope,
          code: "LK0001",
          params: { kind: "duplicate-type-entry", name, entry },
          location: this.scope.cursor,
        });
      }
      resolved.set(name, this.#resolveTypeExpr(type));
    }
    return resolved;
  }

  #resolveTypeExpr(expr: TypeExpr): DefType {
    switch (expr.kind) {
      case "type-ref":
        return this.scope.resolve("type", expr.index);
      case "func":
        return funcType(expr.params, expr.results);
      case "table":
        return tableType(expr.element, expr.limits);
      case "memory":
        return memoryType(expr.limits, expr.shared);
      case "global":
        return globalType(expr.value, expr.mutable);
      case "instance":
        return instanceType(this.#resolveEntries(expr.exports, "export"));
      case "module":
        return moduleType({
          imports: this.#resolveEntries(expr.imports, "import"),
          exports: this.#resolveEntries(expr.exports, "export"),
        });
    }
  }
}

export type ValidateModuleOptions = {
  /** Enclosing scope; the new module sits at the parent's current position. */
  parent?: Scope;
  /**
   * Label used in diagnostic locations. Under `parent` it replaces the
   * parent's file while keeping the parent's definition path.
   */
  file?: string;
  coreModuleTyper?: CoreModuleTyper;
};

const openScope = (parent: Scope | undefined, file: string | undefined): Scope => {
  if (!parent) return new Scope({ location: rootLocation(file) });
  return parent.openChild(
    file === undefined ? undefined : { file, path: parent.cursor.path }
  );
};

export const validateModule = (
  definitions: readonly Definition[],
  { parent, file, coreModuleTyper }: ValidateModuleOptions = {}
): Result<ModuleType> => {
  const perf = isValidatorPerfEnabled();
  if (perf) resetValidatorPerfCounters();
  const startedAt = perf ? performance.now() : 0;
  const scope = openScope(parent, file);
  const validator = new ModuleValidator({ scope, coreModuleTyper });

  let result: Result<ModuleType> | undefined;
  for (const definition of definitions) {
    const pushed = validator.push(definition);
    if (!pushed.ok) {
      result = pushed;
      break;
    }
  }
  result ??= validator.finish();

  if (perf) {
    logValidatorPerfSummary({
      file: scope.location.file,
      success: result.ok,
      elapsedMs: performance.now() - startedAt,
      counters: snapshotValidatorPerfCounters(),
      diagnostics: scope.diagnostics.diagnostics.length,
    });
  }

  return result;
};

export type ModuleInput = {
  file: string;
  definitions: readonly Definition[];
};

export type ModuleValidationReport = {
  results: readonly { file: string; result: Result<ModuleType> }[];
  diagnostics: readonly Diagnostic[];
};

/**
 * Validates modules that cannot refer to one another. A failure in one does
 * not stop the others; every failure is collected.
 */
export const validateModules = (
  inputs: readonly ModuleInput[],
  options: Omit<ValidateModuleOptions, "file" | "parent"> = {}
): ModuleValidationReport => {
  const results = inputs.map(({ file, definitions }) => ({
    file,
    result: validateModule(definitions, { ...options, file }),
  }));
  const diagnostics = results.flatMap(({ result }) =>
    result.ok ? [] : [result.error]
  );
  return { results, diagnostics };
};
