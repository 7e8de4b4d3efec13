import { decode } from "@msgpack/msgpack";
import type { Definition } from "../definitions.js";
import {
  diagnosticFromCode,
  rootLocation,
  type Result,
} from "../diagnostics/index.js";
import { decodeDefinitions } from "./decode-definitions.js";
import type { DocumentFormat, DocumentHost } from "./types.js";

export const inferDocumentFormat = (path: string): DocumentFormat =>
  path.endsWith(".msgpack") || path.endsWith(".mpk") ? "msgpack" : "json";

const formatErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const parseDocument = (
  bytes: Uint8Array,
  format: DocumentFormat
): { ok: true; value: unknown } | { ok: false; message: string } => {
  try {
    const value =
      format === "msgpack"
        ? decode(bytes)
        : JSON.parse(new TextDecoder().decode(bytes));
    return { ok: true, value };
  } catch (error) {
    return { ok: false, message: formatErrorMessage(error) };
  }
};

/**
 * Reads a definition document through `host`. Core modules referenced by
 * `path` are resolved against the document's directory. Files that cannot be
 * read are reported as `DC0002`.
 */
export const loadDefinitionDocument = async ({
  path,
  host,
  format = inferDocumentFormat(path),
}: {
  path: string;
  host: DocumentHost;
  format?: DocumentFormat;
}): Promise<Result<Definition[]>> => {
  const documentPath = host.path.resolve(path);
  let bytes: Uint8Array;
  try {
    bytes = await host.readFile(documentPath);
  } catch (error) {
    return {
      ok: false,
      error: diagnosticFromCode({
        code: "DC0002",
        params: {
          kind: "unreadable-document",
          path,
          errorMessage: formatErrorMessage(error),
        },
        location: rootLocation(path),
      }),
    };
  }

  const parsed = parseDocument(bytes, format);
  if (!parsed.ok) {
    return {
      ok: false,
      error: diagnosticFromCode({
        code: "DC0001",
        params: {
          kind: "malformed-definition",
          reason: `document is not valid ${format}: ${parsed.message}`,
        },
        location: rootLocation(path),
      }),
    };
  }

  const directory = host.path.dirname(documentPath);
  return decodeDefinitions(parsed.value, {
    file: path,
    readCoreModule: (corePath) =>
      host.readFile(host.path.resolve(host.path.join(directory, corePath))),
  });
};
