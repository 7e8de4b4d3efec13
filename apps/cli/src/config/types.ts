import type { DocumentFormat } from "@modlink/validator";

export type ModlinkCommand = "validate" | "subtype" | "core";

export type ModlinkConfig = {
  command: ModlinkCommand;
  /** Definition documents, or the core module for `core`. */
  files: string[];
  /** Print validated module types as JSON. */
  emitType: boolean;
  /** Force the document format instead of inferring it from the extension. */
  format?: DocumentFormat;
  color: boolean;
};
