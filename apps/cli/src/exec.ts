import {
  DiagnosticEmitter,
  DiagnosticError,
  captureDiagnostics,
  coreModuleType,
  createFsDocumentHost,
  encodeDefType,
  explainSubtypeFailure,
  formatSubtypeMismatch,
  loadDefinitionDocument,
  rootLocation,
  validateModules,
  type Diagnostic,
  type DocumentHost,
  type ModuleInput,
  type ModuleType,
} from "@modlink/validator";
import { getConfig } from "./config/index.js";
import type { ModlinkConfig } from "./config/types.js";
import { formatCliDiagnostic } from "./diagnostics.js";

export type CliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

type CliContext = {
  config: ModlinkConfig;
  host: DocumentHost;
  io: CliIo;
  color: boolean;
};

const consoleIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

const shouldColor = (config: ModlinkConfig): boolean =>
  config.color && process.stdout.isTTY === true && !process.env.NO_COLOR;

export const exec = () =>
  runCli({
    config: getConfig(),
    host: createFsDocumentHost(),
    io: consoleIo,
    color: shouldColor(getConfig()),
  })
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch(errorHandler);

/** Runs one command and resolves to the process exit code. */
export const runCli = async (ctx: CliContext): Promise<number> => {
  switch (ctx.config.command) {
    case "validate":
      return runValidate(ctx);
    case "subtype":
      return runSubtype(ctx);
    case "core":
      return runCore(ctx);
  }
};

const reportDiagnostics = (ctx: CliContext, diagnostics: readonly Diagnostic[]) =>
  diagnostics.forEach((diagnostic) =>
    ctx.io.stderr(formatCliDiagnostic(diagnostic, { color: ctx.color }))
  );

type LoadedModules = {
  types: Map<string, ModuleType>;
  diagnostics: Diagnostic[];
};

const loadAndValidate = async (ctx: CliContext): Promise<LoadedModules> => {
  const inputs: ModuleInput[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const file of ctx.config.files) {
    const decoded = await loadDefinitionDocument({
      path: file,
      host: ctx.host,
      format: ctx.config.format,
    });
    if (decoded.ok) {
      inputs.push({ file, definitions: decoded.value });
    } else {
      diagnostics.push(decoded.error);
    }
  }

  const report = validateModules(inputs);
  const types = new Map<string, ModuleType>();
  report.results.forEach(({ file, result }) => {
    if (result.ok) types.set(file, result.value);
  });

  return { types, diagnostics: [...diagnostics, ...report.diagnostics] };
};

const runValidate = async (ctx: CliContext): Promise<number> => {
  const { types, diagnostics } = await loadAndValidate(ctx);

  types.forEach((type, file) => {
    if (ctx.config.emitType) {
      ctx.io.stdout(JSON.stringify({ file, type: encodeDefType(type) }));
      return;
    }
    ctx.io.stdout(`ok ${file}`);
  });

  reportDiagnostics(ctx, diagnostics);
  return diagnostics.length > 0 ? 1 : 0;
};

const runSubtype = async (ctx: CliContext): Promise<number> => {
  const [subFile, superFile] = ctx.config.files;
  const { types, diagnostics } = await loadAndValidate(ctx);
  if (diagnostics.length > 0) {
    reportDiagnostics(ctx, diagnostics);
    return 1;
  }

  const sub = subFile === undefined ? undefined : types.get(subFile);
  const sup = superFile === undefined ? undefined : types.get(superFile);
  if (!sub || !sup) {
    ctx.io.stderr("subtype needs exactly two documents");
    return 1;
  }

  const mismatch = explainSubtypeFailure(sub, sup);
  if (mismatch) {
    ctx.io.stdout(`false: ${formatSubtypeMismatch(mismatch)}`);
    return 1;
  }
  ctx.io.stdout("true");
  return 0;
};

const runCore = async (ctx: CliContext): Promise<number> => {
  const [file] = ctx.config.files;
  if (file === undefined) {
    ctx.io.stderr("core needs a module file");
    return 1;
  }

  const bytes = await ctx.host.readFile(ctx.host.path.resolve(file));
  const typed = captureDiagnostics(() =>
    coreModuleType(bytes, {
      diagnostics: new DiagnosticEmitter(),
      location: rootLocation(file),
    })
  );
  if (!typed.ok) {
    reportDiagnostics(ctx, [typed.error]);
    return 1;
  }

  ctx.io.stdout(JSON.stringify(encodeDefType(typed.value), undefined, 2));
  return 0;
};

export const formatFatalError = (
  error: unknown,
  { color }: { color: boolean }
): string => {
  if (error instanceof DiagnosticError) {
    return formatCliDiagnostic(error.diagnostic, { color });
  }
  if (error instanceof Error) {
    return error.stack ?? error.message;
  }
  return String(error);
};

function errorHandler(error: unknown) {
  console.error(formatFatalError(error, { color: shouldColor(getConfig()) }));
  process.exit(1);
}
