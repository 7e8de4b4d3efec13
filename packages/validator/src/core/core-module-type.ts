import binaryen from "binaryen";
import {
  emitDiagnostic,
  type DefinitionLocation,
  type DiagnosticEmitter,
} from "../diagnostics/index.js";
import {
  defTypesEqual,
  funcType,
  globalType,
  instanceType,
  memoryType,
  moduleType,
  tableType,
  type DefType,
  type ModuleType,
  type ValueType,
} from "../types/index.js";

export type CoreModuleContext = {
  diagnostics: DiagnosticEmitter;
  location: DefinitionLocation;
};

/** Derives the module type of an embedded core module. */
export type CoreModuleTyper = (
  bytes: Uint8Array,
  ctx: CoreModuleContext
) => ModuleType;

export const CORE_BINARYEN_FEATURES =
  binaryen.Features.ReferenceTypes |
  binaryen.Features.Multivalue |
  binaryen.Features.BulkMemory |
  binaryen.Features.SignExt |
  binaryen.Features.MutableGlobals |
  binaryen.Features.SIMD128 |
  binaryen.Features.Atomics |
  binaryen.Features.ExtendedConst;

const valueTypeOf = (type: binaryen.Type): ValueType | undefined => {
  switch (type) {
    case binaryen.i32:
      return "i32";
    case binaryen.i64:
      return "i64";
    case binaryen.f32:
      return "f32";
    case binaryen.f64:
      return "f64";
    case binaryen.v128:
      return "v128";
    case binaryen.funcref:
      return "funcref";
    case binaryen.externref:
      return "externref";
    default:
      return undefined;
  }
};

class UnsupportedCoreModule extends Error {}

const expandValueTypes = (type: binaryen.Type): ValueType[] =>
  binaryen.expandType(type).map((part) => {
    const valueType = valueTypeOf(part);
    if (!valueType) {
      throw new UnsupportedCoreModule(`unsupported value type ${part}`);
    }
    return valueType;
  });

const limitsOf = ({ initial, max }: { initial: number; max?: number }) =>
  max === undefined ? { min: initial } : { min: initial, max };

type CoreImport = { module: string; base: string; type: DefType };

const isNamedImport = ({
  module,
  base,
}: {
  module?: string | null;
  base?: string | null;
}): boolean => Boolean(module) || Boolean(base);

const readCoreTypes = (
  mod: binaryen.Module
): { imports: CoreImport[]; exports: [string, DefType][] } => {
  const imports: CoreImport[] = [];
  const addImport = (
    imported: boolean,
    module: string | null,
    base: string | null,
    type: DefType
  ) => {
    if (imported) imports.push({ module: module ?? "", base: base ?? "", type });
  };

  const functionType = (ref: binaryen.FunctionRef): DefType => {
    const info = binaryen.getFunctionInfo(ref);
    return funcType(expandValueTypes(info.params), expandValueTypes(info.results));
  };

  const globalTypeOf = (ref: binaryen.GlobalRef): DefType => {
    const info = binaryen.getGlobalInfo(ref);
    const [value] = expandValueTypes(info.type);
    if (!value) throw new UnsupportedCoreModule("global without a value type");
    return globalType(value, info.mutable);
  };

  // Element types are not exposed through binaryen's table info.
  const tableTypeOf = (ref: binaryen.TableRef): DefType =>
    tableType("funcref", limitsOf(binaryen.getTableInfo(ref)));

  const memoryTypeOf = (name?: string): DefType => {
    const info = mod.getMemoryInfo(name);
    return memoryType(limitsOf(info), info.shared);
  };

  // Import names may be empty, so functions and globals are told apart by
  // their missing body or initializer.
  for (let i = 0; i < mod.getNumFunctions(); i += 1) {
    const ref = mod.getFunctionByIndex(i);
    const info = binaryen.getFunctionInfo(ref);
    addImport(info.body === 0, info.module, info.base, functionType(ref));
  }

  for (let i = 0; i < mod.getNumGlobals(); i += 1) {
    const ref = mod.getGlobalByIndex(i);
    const info = binaryen.getGlobalInfo(ref);
    addImport(info.init === 0, info.module, info.base, globalTypeOf(ref));
  }

  for (let i = 0; i < mod.getNumTables(); i += 1) {
    const ref = mod.getTableByIndex(i);
    const info = binaryen.getTableInfo(ref);
    addImport(isNamedImport(info), info.module, info.base, tableTypeOf(ref));
  }

  if (mod.hasMemory()) {
    const info = mod.getMemoryInfo();
    addImport(isNamedImport(info), info.module, info.base, memoryTypeOf());
  }

  const exports: [string, DefType][] = [];
  for (let i = 0; i < mod.getNumExports(); i += 1) {
    const info = binaryen.getExportInfo(mod.getExportByIndex(i));
    switch (info.kind) {
      case binaryen.ExternalFunction:
        exports.push([info.name, functionType(mod.getFunction(info.value))]);
        break;
      case binaryen.ExternalGlobal:
        exports.push([info.name, globalTypeOf(mod.getGlobal(info.value))]);
        break;
      case binaryen.ExternalTable:
        exports.push([info.name, tableTypeOf(mod.getTable(info.value))]);
        break;
      case binaryen.ExternalMemory:
        exports.push([info.name, memoryTypeOf(info.value)]);
        break;
      default:
        throw new UnsupportedCoreModule(`unsupported export '${info.name}'`);
    }
  }

  return { imports, exports };
};

/**
 * Two-level core imports elaborate into instance imports: every
 * `(import "m" "f" ...)` contributes export `f` to an import `m` of instance
 * type.
 */
const elaborateImports = (imports: readonly CoreImport[]) => {
  const grouped = new Map<string, Map<string, DefType>>();
  for (const { module, base, type } of imports) {
    const fields = grouped.get(module) ?? new Map<string, DefType>();
    const existing = fields.get(base);
    if (existing && !defTypesEqual(existing, type)) {
      throw new UnsupportedCoreModule(
        `conflicting types for import '${module}' '${base}'`
      );
    }
    fields.set(base, type);
    grouped.set(module, fields);
  }
  return Array.from(grouped.entries()).map(
    ([module, fields]): [string, DefType] => [module, instanceType(fields)]
  );
};

const formatErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const readCoreModule = (
  bytes: Uint8Array,
  ctx: CoreModuleContext
): binaryen.Module => {
  try {
    return binaryen.readBinary(bytes);
  } catch (error) {
    return emitDiagnostic({
      ctx,
      code: "CR0001",
      params: {
        kind: "unreadable-core-module",
        errorMessage: formatErrorMessage(error),
      },
      location: ctx.location,
    });
  }
};

export const coreModuleType: CoreModuleTyper = (bytes, ctx) => {
  const mod = readCoreModule(bytes, ctx);
  try {
    mod.setFeatures(CORE_BINARYEN_FEATURES);
    if (!mod.validate()) {
      return emitDiagnostic({
        ctx,
        code: "CR0001",
        params: { kind: "core-validation-failed" },
        location: ctx.location,
      });
    }

    let types: ReturnType<typeof readCoreTypes>;
    let imports: [string, DefType][];
    try {
      types = readCoreTypes(mod);
      imports = elaborateImports(types.imports);
    } catch (error) {
      if (!(error instanceof UnsupportedCoreModule)) throw error;
      return emitDiagnostic({
        ctx,
        code: "CR0001",
        params: { kind: "unreadable-core-module", errorMessage: error.message },
        location: ctx.location,
      });
    }

    return moduleType({ imports, exports: types.exports });
  } finally {
    mod.dispose();
  }
};
