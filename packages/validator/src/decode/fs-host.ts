import { readFile } from "node:fs/promises";
import path from "node:path";
import type { DocumentHost } from "./types.js";

export const createFsDocumentHost = (): DocumentHost => ({
  path: {
    resolve: path.resolve,
    join: path.join,
    dirname: path.dirname,
  },
  readFile: async (filePath: string) => new Uint8Array(await readFile(filePath)),
});
