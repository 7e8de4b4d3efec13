import type { AliasTarget } from "./definitions.js";
import { emitDiagnostic } from "./diagnostics/index.js";
import { incrementValidatorPerfCounter } from "./perf.js";
import type { Scope } from "./scope.js";

type InstanceExportAlias = Extract<AliasTarget, { kind: "instance-export" }>;
type OuterAlias = Extract<AliasTarget, { kind: "outer" }>;

/**
 * Copies an export of an instance already in scope into the space of its
 * kind. The export list consulted is the one recorded when the instance was
 * defined.
 */
export const aliasInstanceExport = (
  scope: Scope,
  { instance, name, sort }: Omit<InstanceExportAlias, "kind">
): number => {
  incrementValidatorPerfCounter("aliases");
  const { exports } = scope.resolve("instance", instance);
  const found = exports.get(name);

  if (found && found.kind !== sort) {
    return emitDiagnostic({
      ctx: scope,
      code: "LK0003",
      params: {
        kind: "alias-export-kind",
        name,
        expected: sort,
        actual: found.kind,
      },
      location: scope.cursor,
    });
  }

  if (!found) {
    return emitDiagnostic({
      ctx: scope,
      code: "LK0004",
      params: { kind: "unbound-export", name, instance },
      location: scope.cursor,
    });
  }

  return scope.declareDef(found);
};

/**
 * Copies a module or type of an enclosing scope. Function, table, memory and
 * global definitions carry state and cannot be aliased outward.
 */
export const aliasOuter = (
  scope: Scope,
  { count, index, sort }: Omit<OuterAlias, "kind">
): number => {
  incrementValidatorPerfCounter("aliases");
  if (sort === "module") {
    return scope.declare("module", scope.resolveOuter(count, "module", index));
  }
  if (sort === "type") {
    return scope.declare("type", scope.resolveOuter(count, "type", index));
  }

  return emitDiagnostic({
    ctx: scope,
    code: "LK0003",
    params: { kind: "outer-alias-sort", sort },
    location: scope.cursor,
  });
};

export const resolveAlias = (scope: Scope, alias: AliasTarget): number =>
  alias.kind === "outer"
    ? aliasOuter(scope, alias)
    : aliasInstanceExport(scope, alias);
