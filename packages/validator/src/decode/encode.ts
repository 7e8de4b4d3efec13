import {
  compareNames,
  type DefType,
  type FuncType,
  type GlobalType,
  type MemoryType,
  type TableType,
} from "../types/index.js";

export type EncodedEntry = { name: string; type: EncodedType };

/** JSON form of a type; it reads back as an inline type expression. */
export type EncodedType =
  | FuncType
  | TableType
  | MemoryType
  | GlobalType
  | { kind: "instance"; exports: EncodedEntry[] }
  | { kind: "module"; imports: EncodedEntry[]; exports: EncodedEntry[] };

const encodeEntries = (entries: ReadonlyMap<string, DefType>): EncodedEntry[] =>
  Array.from(entries.entries())
    .sort(([left], [right]) => compareNames(left, right))
    .map(([name, type]) => ({ name, type: encodeDefType(type) }));

export const encodeDefType = (type: DefType): EncodedType => {
  switch (type.kind) {
    case "func":
      return { kind: "func", params: [...type.params], results: [...type.results] };
    case "table":
      return { kind: "table", element: type.element, limits: { ...type.limits } };
    case "memory":
      return { kind: "memory", limits: { ...type.limits }, shared: type.shared };
    case "global":
      return { kind: "global", value: type.value, mutable: type.mutable };
    case "instance":
      return { kind: "instance", exports: encodeEntries(type.exports) };
    case "module":
      return {
        kind: "module",
        imports: encodeEntries(type.imports),
        exports: encodeEntries(type.exports),
      };
  }
};
