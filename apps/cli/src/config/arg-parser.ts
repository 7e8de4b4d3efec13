import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import type { DocumentFormat } from "@modlink/validator";
import type { ModlinkCommand, ModlinkConfig } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

const DOCUMENT_FORMATS = ["json", "msgpack"] as const;

const SUBCOMMANDS: readonly ModlinkCommand[] = ["subtype", "core"];

const parseDocumentFormat = (value: string): DocumentFormat => {
  const normalized = value.toLowerCase();
  if (normalized === "json" || normalized === "msgpack") {
    return normalized;
  }
  throw new InvalidArgumentError(
    `invalid document format "${value}" (allowed: ${DOCUMENT_FORMATS.join(", ")})`
  );
};

const createBaseCommand = ({
  name,
  description,
}: {
  name: string;
  description: string;
}): Command =>
  new Command()
    .name(name)
    .description(description)
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .option(
      "--format <format>",
      `document format (${DOCUMENT_FORMATS.join("|")}); inferred from the extension by default`,
      parseDocumentFormat
    )
    .option("--no-color", "disable colored diagnostics");

type ParsedOptions = {
  format?: DocumentFormat;
  color: boolean;
  emitType?: boolean;
};

const readOptions = (program: Command): ParsedOptions => {
  const opts = program.opts<ParsedOptions>();
  return { format: opts.format, color: opts.color, emitType: opts.emitType };
};

const parseValidateConfig = (argv: readonly string[]): ModlinkConfig => {
  const program = createBaseCommand({
    name: "modlink",
    description: "Validate module-linking definition documents",
  });

  program
    .argument("<files...>", "definition documents (.json or .msgpack)")
    .option("--emit-type", "print each validated module type as JSON")
    .addHelpText(
      "after",
      [
        "",
        "Commands:",
        "  subtype <sub> <super>  check that one module type is a subtype of another",
        "  core <file.wasm>       print the module type of a core module",
      ].join("\n")
    );

  program.parse(["node", "modlink", ...argv]);
  const opts = readOptions(program);

  return {
    command: "validate",
    files: [...program.args],
    emitType: opts.emitType === true,
    format: opts.format,
    color: opts.color,
  };
};

const parseSubtypeConfig = (argv: readonly string[]): ModlinkConfig => {
  const program = createBaseCommand({
    name: "modlink subtype",
    description: "Check that the first module type is a subtype of the second",
  });

  program
    .argument("<sub>", "document of the candidate subtype")
    .argument("<super>", "document of the expected supertype");

  program.parse(["node", "modlink subtype", ...argv]);
  const opts = readOptions(program);

  return {
    command: "subtype",
    files: [...program.args],
    emitType: false,
    format: opts.format,
    color: opts.color,
  };
};

const parseCoreConfig = (argv: readonly string[]): ModlinkConfig => {
  const program = createBaseCommand({
    name: "modlink core",
    description: "Print the module type of a core WebAssembly module",
  });

  program.argument("<file>", "core module binary");

  program.parse(["node", "modlink core", ...argv]);
  const opts = readOptions(program);

  return {
    command: "core",
    files: [...program.args],
    emitType: true,
    color: opts.color,
  };
};

const findSubcommandIndex = (args: readonly string[]): number => {
  let index = 0;
  while (index < args.length) {
    const arg = args[index];
    if (arg === "--") {
      return -1;
    }
    if (arg === "--format") {
      index += 2;
      continue;
    }
    if (SUBCOMMANDS.some((command) => command === arg)) {
      return index;
    }
    if (arg !== undefined && !arg.startsWith("-")) {
      // The first positional is a document, not a command.
      return -1;
    }
    index += 1;
  }
  return -1;
};

export const parseConfig = (args: readonly string[]): ModlinkConfig => {
  const commandIndex = findSubcommandIndex(args);
  if (commandIndex < 0) {
    return parseValidateConfig(args);
  }

  const command = args[commandIndex];
  const rest = args.filter((_, index) => index !== commandIndex);
  return command === "subtype" ? parseSubtypeConfig(rest) : parseCoreConfig(rest);
};

export const getConfigFromCli = (): ModlinkConfig =>
  parseConfig(process.argv.slice(2));
