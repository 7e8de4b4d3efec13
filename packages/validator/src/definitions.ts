import type {
  DefKind,
  FuncType,
  GlobalType,
  MemoryType,
  TableType,
} from "./types/index.js";

export type TypeEntry = { name: string; type: TypeExpr };

/** A type written in place, or a reference into the type index space. */
export type TypeExpr =
  | FuncType
  | TableType
  | MemoryType
  | GlobalType
  | { kind: "instance"; exports: readonly TypeEntry[] }
  | {
      kind: "module";
      imports: readonly TypeEntry[];
      exports: readonly TypeEntry[];
    }
  | { kind: "type-ref"; index: number };

export type DefRef = { sort: DefKind; index: number };

export type NamedRef = { name: string; ref: DefRef };

export type InstanceExpr =
  | { kind: "instantiate"; module: number; args: readonly NamedRef[] }
  | { kind: "tuple"; args: readonly NamedRef[] };

export type AliasTarget =
  | { kind: "instance-export"; instance: number; name: string; sort: DefKind }
  | { kind: "outer"; count: number; index: number; sort: DefKind | "type" };

export type TypeDefinition = { kind: "type"; type: TypeExpr };

export type ImportDefinition = { kind: "import"; name: string; type: TypeExpr };

export type ModuleDefinition = {
  kind: "module";
  definitions: readonly Definition[];
};

/** A nested core module, typed by the configured core module typer. */
export type CoreModuleDefinition = { kind: "core-module"; bytes: Uint8Array };

export type InstanceDefinition = { kind: "instance"; instance: InstanceExpr };

export type AliasDefinition = { kind: "alias"; alias: AliasTarget };

export type ExportDefinition = { kind: "export"; name: string; ref: DefRef };

export type Definition =
  | TypeDefinition
  | ImportDefinition
  | ModuleDefinition
  | CoreModuleDefinition
  | InstanceDefinition
  | AliasDefinition
  | ExportDefinition;
