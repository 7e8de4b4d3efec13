import { compareNames, type DefType, type Limits } from "./def-type.js";

const formatLimits = ({ min, max }: Limits): string =>
  max === undefined ? `${min}` : `${min} ${max}`;

const formatEntries = (entries: ReadonlyMap<string, DefType>): string => {
  if (entries.size === 0) return "";
  const parts = Array.from(entries.entries())
    .sort(([left], [right]) => compareNames(left, right))
    .map(([name, type]) => `${JSON.stringify(name)}: ${formatDefType(type)}`);
  return ` ${parts.join(", ")} `;
};

export const formatDefType = (type: DefType): string => {
  switch (type.kind) {
    case "func":
      return `func (${type.params.join(", ")}) -> (${type.results.join(", ")})`;
    case "table":
      return `table ${formatLimits(type.limits)} ${type.element}`;
    case "memory":
      return `memory ${formatLimits(type.limits)}${type.shared ? " shared" : ""}`;
    case "global":
      return type.mutable ? `global mut ${type.value}` : `global ${type.value}`;
    case "instance":
      return `instance {${formatEntries(type.exports)}}`;
    case "module":
      return `module (imports {${formatEntries(type.imports)}}) (exports {${formatEntries(type.exports)}})`;
  }
};
