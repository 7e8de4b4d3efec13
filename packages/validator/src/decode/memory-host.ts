import { createPosixPathAdapter } from "./posix-path.js";
import type { DocumentHost, DocumentPathAdapter } from "./types.js";

export const createMemoryDocumentHost = ({
  files,
  pathAdapter = createPosixPathAdapter(),
}: {
  files: Record<string, string | Uint8Array>;
  pathAdapter?: DocumentPathAdapter;
}): DocumentHost => {
  const encoder = new TextEncoder();
  const normalized = new Map<string, Uint8Array>();

  Object.entries(files).forEach(([path, contents]) => {
    normalized.set(
      pathAdapter.resolve(path),
      typeof contents === "string" ? encoder.encode(contents) : contents
    );
  });

  return {
    path: pathAdapter,
    readFile: async (path: string) => {
      const resolved = pathAdapter.resolve(path);
      const file = normalized.get(resolved);
      if (file === undefined) {
        throw new Error(`File not found: ${resolved}`);
      }
      return file;
    },
  };
};
