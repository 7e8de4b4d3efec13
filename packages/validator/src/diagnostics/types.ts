export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase = "linking" | "decode" | "core";

export type ValidationErrorKind =
  | "DuplicateName"
  | "UnboundIndex"
  | "KindMismatch"
  | "UnboundExport"
  | "SubtypeError"
  | "MissingImport"
  | "DuplicateArgName"
  | "AliasDepthError"
  | "MalformedDefinition"
  | "UnreadableDocument"
  | "InvalidCoreModule";

/**
 * Where a definition sits in a document: `path` holds the ordinal of the
 * definition in the root sequence, then its ordinal inside each nested module.
 */
export interface DefinitionLocation {
  file: string;
  path: readonly number[];
}

export interface DiagnosticHint {
  message: string;
}

export interface Diagnostic {
  code: string;
  kind: ValidationErrorKind;
  message: string;
  severity: DiagnosticSeverity;
  location: DefinitionLocation;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
}

export type DiagnosticInput = {
  code: string;
  kind: ValidationErrorKind;
  message: string;
  location: DefinitionLocation;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: Diagnostic };
