export const VALUE_TYPES = [
  "i32",
  "i64",
  "f32",
  "f64",
  "v128",
  "funcref",
  "externref",
] as const;

export type ValueType = (typeof VALUE_TYPES)[number];

export type RefType = "funcref" | "externref";

export interface Limits {
  min: number;
  max?: number;
}

export interface FuncType {
  kind: "func";
  params: readonly ValueType[];
  results: readonly ValueType[];
}

export interface TableType {
  kind: "table";
  element: RefType;
  limits: Limits;
}

export interface MemoryType {
  kind: "memory";
  limits: Limits;
  shared: boolean;
}

export interface GlobalType {
  kind: "global";
  value: ValueType;
  mutable: boolean;
}

export interface InstanceType {
  kind: "instance";
  exports: ReadonlyMap<string, DefType>;
}

export interface ModuleType {
  kind: "module";
  imports: ReadonlyMap<string, DefType>;
  exports: ReadonlyMap<string, DefType>;
}

export type DefType =
  | FuncType
  | TableType
  | MemoryType
  | GlobalType
  | InstanceType
  | ModuleType;

export type DefKind = DefType["kind"];

export type DefTypeOfKind<K extends DefKind> = Extract<DefType, { kind: K }>;

export const DEF_KINDS: readonly DefKind[] = [
  "func",
  "table",
  "memory",
  "global",
  "instance",
  "module",
];

export const isValueType = (value: unknown): value is ValueType =>
  typeof value === "string" &&
  VALUE_TYPES.some((valueType) => valueType === value);

export const isDefKind = (value: unknown): value is DefKind =>
  typeof value === "string" && DEF_KINDS.some((kind) => kind === value);

export type NamedTypes =
  | ReadonlyMap<string, DefType>
  | Readonly<Record<string, DefType>>
  | readonly (readonly [string, DefType])[];

const isTypeMap = (
  entries: NamedTypes
): entries is ReadonlyMap<string, DefType> => entries instanceof Map;

const isEntryList = (
  entries: NamedTypes
): entries is readonly (readonly [string, DefType])[] => Array.isArray(entries);

const toTypeMap = (entries: NamedTypes = []): ReadonlyMap<string, DefType> => {
  if (isTypeMap(entries)) {
    return new Map(entries);
  }
  if (isEntryList(entries)) {
    return new Map(entries);
  }
  return new Map(Object.entries(entries));
};

export const funcType = (
  params: readonly ValueType[] = [],
  results: readonly ValueType[] = []
): FuncType =>
  Object.freeze<FuncType>({ kind: "func", params: [...params], results: [...results] });

export const tableType = (
  element: RefType,
  limits: Limits = { min: 0 }
): TableType => Object.freeze<TableType>({ kind: "table", element, limits: { ...limits } });

export const memoryType = (
  limits: Limits = { min: 0 },
  shared = false
): MemoryType => Object.freeze<MemoryType>({ kind: "memory", limits: { ...limits }, shared });

export const globalType = (value: ValueType, mutable = false): GlobalType =>
  Object.freeze<GlobalType>({ kind: "global", value, mutable });

export const instanceType = (exports?: NamedTypes): InstanceType =>
  Object.freeze<InstanceType>({ kind: "instance", exports: toTypeMap(exports) });

export const moduleType = ({
  imports,
  exports,
}: {
  imports?: NamedTypes;
  exports?: NamedTypes;
} = {}): ModuleType =>
  Object.freeze<ModuleType>({
    kind: "module",
    imports: toTypeMap(imports),
    exports: toTypeMap(exports),
  });

const limitsKey = ({ min, max }: Limits): string =>
  max === undefined ? `${min}` : `${min}..${max}`;

const mapKey = (entries: ReadonlyMap<string, DefType>): string =>
  Array.from(entries.entries())
    .sort(([left], [right]) => compareNames(left, right))
    .map(([name, type]) => `${JSON.stringify(name)}:${defTypeKey(type)}`)
    .join(",");

/** Code-unit order, so keys do not depend on the host locale. */
export const compareNames = (left: string, right: string): number =>
  left < right ? -1 : left > right ? 1 : 0;

/** Canonical form; entries of instance and module types are sorted by name. */
export const defTypeKey = (type: DefType): string => {
  switch (type.kind) {
    case "func":
      return `func(${type.params.join(" ")})->(${type.results.join(" ")})`;
    case "table":
      return `table(${type.element} ${limitsKey(type.limits)})`;
    case "memory":
      return `memory(${limitsKey(type.limits)}${type.shared ? " shared" : ""})`;
    case "global":
      return `global(${type.mutable ? "mut " : ""}${type.value})`;
    case "instance":
      return `instance{${mapKey(type.exports)}}`;
    case "module":
      return `module{imports{${mapKey(type.imports)}} exports{${mapKey(type.exports)}}}`;
  }
};

const limitsEqual = (a: Limits, b: Limits): boolean =>
  a.min === b.min && a.max === b.max;

const valueTypesEqual = (
  a: readonly ValueType[],
  b: readonly ValueType[]
): boolean => a.length === b.length && a.every((type, i) => type === b[i]);

const typeMapsEqual = (
  a: ReadonlyMap<string, DefType>,
  b: ReadonlyMap<string, DefType>
): boolean => {
  if (a.size !== b.size) return false;
  for (const [name, type] of a) {
    const other = b.get(name);
    if (!other || !defTypesEqual(type, other)) return false;
  }
  return true;
};

export const defTypesEqual = (a: DefType, b: DefType): boolean => {
  if (a === b) return true;
  switch (a.kind) {
    case "func":
      return (
        b.kind === "func" &&
        valueTypesEqual(a.params, b.params) &&
        valueTypesEqual(a.results, b.results)
      );
    case "table":
      return (
        b.kind === "table" &&
        a.element === b.element &&
        limitsEqual(a.limits, b.limits)
      );
    case "memory":
      return (
        b.kind === "memory" &&
        a.shared === b.shared &&
        limitsEqual(a.limits, b.limits)
      );
    case "global":
      return b.kind === "global" && a.value === b.value && a.mutable === b.mutable;
    case "instance":
      return b.kind === "instance" && typeMapsEqual(a.exports, b.exports);
    case "module":
      return (
        b.kind === "module" &&
        typeMapsEqual(a.imports, b.imports) &&
        typeMapsEqual(a.exports, b.exports)
      );
  }
};
