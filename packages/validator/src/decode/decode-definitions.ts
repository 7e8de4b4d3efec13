import { Buffer } from "node:buffer";
import type {
  AliasTarget,
  DefRef,
  Definition,
  InstanceExpr,
  NamedRef,
  TypeEntry,
  TypeExpr,
} from "../definitions.js";
import {
  DiagnosticEmitter,
  DiagnosticError,
  emitDiagnostic,
  rootLocation,
  type DefinitionLocation,
  type Result,
} from "../diagnostics/index.js";
import {
  DEF_KINDS,
  VALUE_TYPES,
  isDefKind,
  isValueType,
  type DefKind,
  type Limits,
  type RefType,
  type ValueType,
} from "../types/index.js";

type DecodeContext = {
  diagnostics: DiagnosticEmitter;
  location: DefinitionLocation;
  /** Loads the bytes of a core module referenced by path. */
  readCoreModule?: (path: string) => Promise<Uint8Array>;
};

type UnknownRecord = Record<string, unknown>;

const fail = (ctx: DecodeContext, field: string, expectation: string): never =>
  emitDiagnostic({
    ctx,
    code: "DC0001",
    params: { kind: "malformed-definition", reason: `${field} ${expectation}` },
    location: ctx.location,
  });

const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  !(value instanceof Uint8Array);

const expectRecord = (
  ctx: DecodeContext,
  field: string,
  value: unknown
): UnknownRecord => (isRecord(value) ? value : fail(ctx, field, "must be an object"));

const expectArray = (
  ctx: DecodeContext,
  field: string,
  value: unknown
): readonly unknown[] =>
  Array.isArray(value) ? value : fail(ctx, field, "must be an array");

const expectString = (ctx: DecodeContext, field: string, value: unknown): string =>
  typeof value === "string" ? value : fail(ctx, field, "must be a string");

const expectIndex = (ctx: DecodeContext, field: string, value: unknown): number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0
    ? value
    : fail(ctx, field, "must be a non-negative integer");

const optionalBoolean = (
  ctx: DecodeContext,
  field: string,
  value: unknown
): boolean => {
  if (value === undefined) return false;
  return typeof value === "boolean" ? value : fail(ctx, field, "must be a boolean");
};

const expectDefKind = (ctx: DecodeContext, field: string, value: unknown): DefKind =>
  isDefKind(value)
    ? value
    : fail(ctx, field, `must be one of ${DEF_KINDS.join(", ")}`);

const expectValueType = (
  ctx: DecodeContext,
  field: string,
  value: unknown
): ValueType =>
  isValueType(value)
    ? value
    : fail(ctx, field, `must be one of ${VALUE_TYPES.join(", ")}`);

const decodeValueTypes = (
  ctx: DecodeContext,
  field: string,
  value: unknown
): ValueType[] =>
  value === undefined
    ? []
    : expectArray(ctx, field, value).map((entry, i) =>
        expectValueType(ctx, `${field}[${i}]`, entry)
      );

const decodeLimits = (ctx: DecodeContext, field: string, value: unknown): Limits => {
  if (value === undefined) return { min: 0 };
  const record = expectRecord(ctx, field, value);
  const min = expectIndex(ctx, `${field}.min`, record.min);
  if (record.max === undefined) return { min };
  const max = expectIndex(ctx, `${field}.max`, record.max);
  return max < min ? fail(ctx, `${field}.max`, "must not be below min") : { min, max };
};

const decodeRefType = (ctx: DecodeContext, field: string, value: unknown): RefType =>
  value === "funcref" || value === "externref"
    ? value
    : fail(ctx, field, "must be funcref or externref");

const decodeEntries = (
  ctx: DecodeContext,
  field: string,
  value: unknown
): TypeEntry[] =>
  value === undefined
    ? []
    : expectArray(ctx, field, value).map((entry, i) => {
        const record = expectRecord(ctx, `${field}[${i}]`, entry);
        return {
          name: expectString(ctx, `${field}[${i}].name`, record.name),
          type: decodeTypeExpr(ctx, `${field}[${i}].type`, record.type),
        };
      });

const decodeTypeExpr = (
  ctx: DecodeContext,
  field: string,
  value: unknown
): TypeExpr => {
  const record = expectRecord(ctx, field, value);
  switch (record.kind) {
    case "type-ref":
      return { kind: "type-ref", index: expectIndex(ctx, `${field}.index`, record.index) };
    case "func":
      return {
        kind: "func",
        params: decodeValueTypes(ctx, `${field}.params`, record.params),
        results: decodeValueTypes(ctx, `${field}.results`, record.results),
      };
    case "table":
      return {
        kind: "table",
        element: decodeRefType(ctx, `${field}.element`, record.element),
        limits: decodeLimits(ctx, `${field}.limits`, record.limits),
      };
    case "memory":
      return {
        kind: "memory",
        limits: decodeLimits(ctx, `${field}.limits`, record.limits),
        shared: optionalBoolean(ctx, `${field}.shared`, record.shared),
      };
    case "global":
      return {
        kind: "global",
        value: expectValueType(ctx, `${field}.value`, record.value),
        mutable: optionalBoolean(ctx, `${field}.mutable`, record.mutable),
      };
    case "instance":
      return {
        kind: "instance",
        exports: decodeEntries(ctx, `${field}.exports`, record.exports),
      };
    case "module":
      return {
        kind: "module",
        imports: decodeEntries(ctx, `${field}.imports`, record.imports),
        exports: decodeEntries(ctx, `${field}.exports`, record.exports),
      };
    default:
      return fail(
        ctx,
        `${field}.kind`,
        `must be one of type-ref, ${DEF_KINDS.join(", ")}`
      );
  }
};

const decodeRef = (ctx: DecodeContext, field: string, value: unknown): DefRef => {
  const record = expectRecord(ctx, field, value);
  return {
    sort: expectDefKind(ctx, `${field}.sort`, record.sort),
    index: expectIndex(ctx, `${field}.index`, record.index),
  };
};

const decodeNamedRefs = (
  ctx: DecodeContext,
  field: string,
  value: unknown
): NamedRef[] =>
  value === undefined
    ? []
    : expectArray(ctx, field, value).map((entry, i) => {
        const record = expectRecord(ctx, `${field}[${i}]`, entry);
        return {
          name: expectString(ctx, `${field}[${i}].name`, record.name),
          ref: decodeRef(ctx, `${field}[${i}].ref`, record.ref),
        };
      });

const decodeInstanceExpr = (
  ctx: DecodeContext,
  field: string,
  value: unknown
): InstanceExpr => {
  const record = expectRecord(ctx, field, value);
  if (record.kind === "instantiate") {
    return {
      kind: "instantiate",
      module: expectIndex(ctx, `${field}.module`, record.module),
      args: decodeNamedRefs(ctx, `${field}.args`, record.args),
    };
  }
  if (record.kind === "tuple") {
    return { kind: "tuple", args: decodeNamedRefs(ctx, `${field}.args`, record.args) };
  }
  return fail(ctx, `${field}.kind`, "must be instantiate or tuple");
};

const decodeAlias = (
  ctx: DecodeContext,
  field: string,
  value: unknown
): AliasTarget => {
  const record = expectRecord(ctx, field, value);
  if (record.kind === "instance-export") {
    return {
      kind: "instance-export",
      instance: expectIndex(ctx, `${field}.instance`, record.instance),
      name: expectString(ctx, `${field}.name`, record.name),
      sort: expectDefKind(ctx, `${field}.sort`, record.sort),
    };
  }
  if (record.kind === "outer") {
    return {
      kind: "outer",
      count: expectIndex(ctx, `${field}.count`, record.count),
      index: expectIndex(ctx, `${field}.index`, record.index),
      sort:
        record.sort === "type"
          ? "type"
          : expectDefKind(ctx, `${field}.sort`, record.sort),
    };
  }
  return fail(ctx, `${field}.kind`, "must be instance-export or outer");
};

const readCoreModuleAt = async (
  ctx: DecodeContext,
  read: (path: string) => Promise<Uint8Array>,
  path: string
): Promise<Uint8Array> => {
  try {
    return await read(path);
  } catch (error) {
    return emitDiagnostic({
      ctx,
      code: "DC0002",
      params: {
        kind: "unreadable-document",
        path,
        errorMessage: error instanceof Error ? error.message : String(error),
      },
      location: ctx.location,
    });
  }
};

const decodeCoreModuleBytes = async (
  ctx: DecodeContext,
  record: UnknownRecord
): Promise<Uint8Array> => {
  if (record.bytes instanceof Uint8Array) return record.bytes;
  if (typeof record.bytes === "string") {
    return new Uint8Array(Buffer.from(record.bytes, "base64"));
  }
  if (typeof record.path === "string") {
    if (!ctx.readCoreModule) {
      return fail(ctx, "path", "cannot be loaded without a document host");
    }
    return readCoreModuleAt(ctx, ctx.readCoreModule, record.path);
  }
  return fail(ctx, "core-module", "needs a path or bytes");
};

const decodeDefinition = async (
  ctx: DecodeContext,
  value: unknown
): Promise<Definition> => {
  const record = expectRecord(ctx, "definition", value);
  switch (record.kind) {
    case "type":
      return { kind: "type", type: decodeTypeExpr(ctx, "type", record.type) };
    case "import":
      return {
        kind: "import",
        name: expectString(ctx, "name", record.name),
        type: decodeTypeExpr(ctx, "type", record.type),
      };
    case "module":
      return {
        kind: "module",
        definitions: await decodeSequence(
          ctx,
          expectArray(ctx, "definitions", record.definitions)
        ),
      };
    case "core-module":
      return { kind: "core-module", bytes: await decodeCoreModuleBytes(ctx, record) };
    case "instance":
      return {
        kind: "instance",
        instance: decodeInstanceExpr(ctx, "instance", record.instance),
      };
    case "alias":
      return { kind: "alias", alias: decodeAlias(ctx, "alias", record.alias) };
    case "export":
      return {
        kind: "export",
        name: expectString(ctx, "name", record.name),
        ref: decodeRef(ctx, "ref", record.ref),
      };
    default:
      return fail(
        ctx,
        "kind",
        "must be one of type, import, module, core-module, instance, alias, export"
      );
  }
};

const decodeSequence = async (
  ctx: DecodeContext,
  values: readonly unknown[]
): Promise<Definition[]> => {
  const definitions: Definition[] = [];
  for (const [ordinal, value] of values.entries()) {
    definitions.push(
      await decodeDefinition(
        {
          ...ctx,
          location: {
            file: ctx.location.file,
            path: [...ctx.location.path, ordinal],
          },
        },
        value
      )
    );
  }
  return definitions;
};

/**
 * Checks the shape of a pre-parsed definition stream. Accepts either
 * `{ "definitions": [...] }` or the bare array.
 */
export const decodeDefinitions = async (
  value: unknown,
  {
    file = "<input>",
    readCoreModule,
  }: {
    file?: string;
    readCoreModule?: (path: string) => Promise<Uint8Array>;
  } = {}
): Promise<Result<Definition[]>> => {
  const ctx: DecodeContext = {
    diagnostics: new DiagnosticEmitter(),
    location: rootLocation(file),
    readCoreModule,
  };

  try {
    const sequence = Array.isArray(value)
      ? value
      : expectArray(ctx, "definitions", expectRecord(ctx, "document", value).definitions);
    return { ok: true, value: await decodeSequence(ctx, sequence) };
  } catch (error) {
    if (error instanceof DiagnosticError) {
      return { ok: false, error: error.diagnostic };
    }
    throw error;
  }
};
