import { incrementValidatorPerfCounter } from "./perf.js";
import {
  defTypesEqual,
  formatDefType,
  type DefType,
  type InstanceType,
  type ModuleType,
} from "./types/index.js";

export type SubtypePathSegment = { via: "import" | "export"; name: string };

export type SubtypeMismatch =
  | {
      reason: "missing-export" | "missing-import";
      path: readonly SubtypePathSegment[];
      expected: DefType;
    }
  | {
      reason: "kind-mismatch" | "leaf-mismatch";
      path: readonly SubtypePathSegment[];
      expected: DefType;
      actual: DefType;
    };

type NamedTypeMap = ReadonlyMap<string, DefType>;

/**
 * `sub <= sup` for name-keyed maps: every entry of `sup` must exist in `sub`
 * with a subtype. Extra entries of `sub` are ignored.
 */
const explainMap = (
  sub: NamedTypeMap,
  sup: NamedTypeMap,
  via: SubtypePathSegment["via"],
  path: readonly SubtypePathSegment[]
): SubtypeMismatch | undefined => {
  for (const [name, expected] of sup) {
    const entryPath = [...path, { via, name }];
    const actual = sub.get(name);
    if (!actual) {
      return {
        reason: via === "export" ? "missing-export" : "missing-import",
        path: entryPath,
        expected,
      };
    }
    const mismatch = explain(actual, expected, entryPath);
    if (mismatch) return mismatch;
  }
  return undefined;
};

const explain = (
  a: DefType,
  b: DefType,
  path: readonly SubtypePathSegment[]
): SubtypeMismatch | undefined => {
  if (a.kind !== b.kind) {
    return { reason: "kind-mismatch", path, expected: b, actual: a };
  }

  if (a.kind === "instance" && b.kind === "instance") {
    return explainMap(a.exports, b.exports, "export", path);
  }

  if (a.kind === "module" && b.kind === "module") {
    return (
      explainMap(a.exports, b.exports, "export", path) ??
      // Imports flip: the supertype's imports must satisfy the subtype's.
      explainMap(b.imports, a.imports, "import", path)
    );
  }

  return defTypesEqual(a, b)
    ? undefined
    : { reason: "leaf-mismatch", path, expected: b, actual: a };
};

/** First reason `a <= b` fails, or `undefined` when it holds. */
export const explainSubtypeFailure = (
  a: DefType,
  b: DefType
): SubtypeMismatch | undefined => explain(a, b, []);

export const isSubtype = (a: DefType, b: DefType): boolean => {
  incrementValidatorPerfCounter("subtype-checks");
  return explain(a, b, []) === undefined;
};

export const checkInstanceSubtype = (
  a: InstanceType,
  b: InstanceType
): boolean => isSubtype(a, b);

export const checkModuleSubtype = (a: ModuleType, b: ModuleType): boolean =>
  isSubtype(a, b);

const formatPath = (path: readonly SubtypePathSegment[]): string =>
  path.map(({ via, name }) => `${via} ${JSON.stringify(name)}`).join(" > ");

export const formatSubtypeMismatch = (mismatch: SubtypeMismatch): string => {
  const where = mismatch.path.length > 0 ? `${formatPath(mismatch.path)}: ` : "";
  switch (mismatch.reason) {
    case "missing-export":
      return `${where}missing export of type '${formatDefType(mismatch.expected)}'`;
    case "missing-import":
      return `${where}import of type '${formatDefType(mismatch.expected)}' is not provided by the expected module type`;
    case "kind-mismatch":
      return `${where}expected a ${mismatch.expected.kind}, found a ${mismatch.actual.kind}`;
    case "leaf-mismatch":
      return `${where}expected '${formatDefType(mismatch.expected)}', found '${formatDefType(mismatch.actual)}'`;
  }
};
