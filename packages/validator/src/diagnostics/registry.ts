import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
  ValidationErrorKind,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  kind: ValidationErrorKind;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

type DiagnosticParamsMap = {
  LK0001:
    | { kind: "duplicate-import"; name: string }
    | { kind: "duplicate-export"; name: string }
    | { kind: "duplicate-type-entry"; name: string; entry: "import" | "export" };
  LK0002: { kind: "unbound-index"; sort: string; index: number; length: number };
  LK0003:
    | {
        kind: "alias-export-kind";
        name: string;
        expected: string;
        actual: string;
      }
    | { kind: "outer-alias-sort"; sort: string };
  LK0004: { kind: "unbound-export"; name: string; instance: number };
  LK0005: {
    kind: "argument-not-subtype";
    name: string;
    expected: string;
    actual: string;
    reason?: string;
  };
  LK0006: { kind: "missing-import"; name: string; expected: string };
  LK0007: { kind: "duplicate-argument"; name: string };
  LK0008: { kind: "alias-depth"; count: number; available: number };
  DC0001: { kind: "malformed-definition"; reason: string };
  DC0002: { kind: "unreadable-document"; path: string; errorMessage: string };
  CR0001:
    | { kind: "unreadable-core-module"; errorMessage?: string }
    | { kind: "core-validation-failed" };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  LK0001: {
    code: "LK0001",
    kind: "DuplicateName",
    message: (params) => {
      switch (params.kind) {
        case "duplicate-import":
          return `duplicate import name '${params.name}'`;
        case "duplicate-export":
          return `duplicate export name '${params.name}'`;
        case "duplicate-type-entry":
          return `duplicate ${params.entry} name '${params.name}' in type`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "linking",
    hints: [
      {
        message:
          "Imports and exports have separate namespaces; a name may be imported and exported once each.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LK0001"]>,
  LK0002: {
    code: "LK0002",
    kind: "UnboundIndex",
    message: (params) =>
      `${params.sort} index ${params.index} is out of bounds (${params.length} defined so far)`,
    severity: "error",
    phase: "linking",
    hints: [
      {
        message:
          "Definitions may only refer to definitions that appear before them.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LK0002"]>,
  LK0003: {
    code: "LK0003",
    kind: "KindMismatch",
    message: (params) => {
      switch (params.kind) {
        case "alias-export-kind":
          return `export '${params.name}' is a ${params.actual}, not a ${params.expected}`;
        case "outer-alias-sort":
          return `outer aliases may only target modules and types, not ${params.sort}`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "linking",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LK0003"]>,
  LK0004: {
    code: "LK0004",
    kind: "UnboundExport",
    message: (params) =>
      `instance ${params.instance} has no export named '${params.name}'`,
    severity: "error",
    phase: "linking",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LK0004"]>,
  LK0005: {
    code: "LK0005",
    kind: "SubtypeError",
    message: (params) => {
      const base = `argument '${params.name}' of type '${params.actual}' is not a subtype of '${params.expected}'`;
      return params.reason ? `${base}: ${params.reason}` : base;
    },
    severity: "error",
    phase: "linking",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LK0005"]>,
  LK0006: {
    code: "LK0006",
    kind: "MissingImport",
    message: (params) =>
      `missing argument for import '${params.name}' of type '${params.expected}'`,
    severity: "error",
    phase: "linking",
    hints: [
      {
        message:
          "Arguments are matched by name; extra arguments are ignored but every import needs one.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LK0006"]>,
  LK0007: {
    code: "LK0007",
    kind: "DuplicateArgName",
    message: (params) => `argument name '${params.name}' is given more than once`,
    severity: "error",
    phase: "linking",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LK0007"]>,
  LK0008: {
    code: "LK0008",
    kind: "AliasDepthError",
    message: (params) =>
      params.available === 0
        ? `outer alias depth ${params.count} used in a module with no enclosing module`
        : `outer alias depth ${params.count} exceeds the ${params.available} enclosing module(s)`,
    severity: "error",
    phase: "linking",
    hints: [{ message: "Depth 0 names the immediately enclosing module." }],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LK0008"]>,
  DC0001: {
    code: "DC0001",
    kind: "MalformedDefinition",
    message: (params) => `malformed definition: ${params.reason}`,
    severity: "error",
    phase: "decode",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0001"]>,
  DC0002: {
    code: "DC0002",
    kind: "UnreadableDocument",
    message: (params) => `unable to read '${params.path}': ${params.errorMessage}`,
    severity: "error",
    phase: "decode",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0002"]>,
  CR0001: {
    code: "CR0001",
    kind: "InvalidCoreModule",
    message: (params) => {
      switch (params.kind) {
        case "unreadable-core-module":
          return params.errorMessage
            ? `unable to read core module: ${params.errorMessage}`
            : "unable to read core module";
        case "core-validation-failed":
          return "core module failed validation";
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "core",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["CR0001"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

const exhaustive = (_value: never): never => _value;
