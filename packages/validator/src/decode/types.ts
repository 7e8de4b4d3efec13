export interface DocumentPathAdapter {
  resolve(path: string): string;
  join(...parts: string[]): string;
  dirname(path: string): string;
}

/** File access for definition documents and the core modules they embed. */
export interface DocumentHost {
  path: DocumentPathAdapter;
  readFile(path: string): Promise<Uint8Array>;
}

export type DocumentFormat = "json" | "msgpack";
