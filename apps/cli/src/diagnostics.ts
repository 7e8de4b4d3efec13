import {
  formatLocation,
  type Diagnostic,
  type DiagnosticSeverity,
} from "@modlink/validator";

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

const colorForSeverity = (
  severity: DiagnosticSeverity
): ((text: string) => string) => {
  switch (severity) {
    case "warning":
      return (text) => `\u001B[33m${text}\u001B[0m`;
    case "note":
      return (text) => `\u001B[36m${text}\u001B[0m`;
    default:
      return (text) => `\u001B[31m${text}\u001B[0m`;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      accent: identity,
      muted: identity,
    };
  }

  const bold = (text: string) => `\u001B[1m${text}\u001B[0m`;
  const dim = (text: string) => `\u001B[2m${text}\u001B[0m`;
  return {
    severityLabel: (severity) =>
      bold(colorForSeverity(severity)(severity.toUpperCase())),
    accent: (text) => `\u001B[35m${text}\u001B[0m`,
    muted: dim,
  };
};

export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  { color = true }: { color?: boolean } = {}
): string => {
  const colors = createColorizer(color);
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const header = `${colors.severityLabel(diagnostic.severity)}${phase} ${colors.accent(
    diagnostic.code
  )}: ${diagnostic.message}`;
  const location = `  --> ${formatLocation(diagnostic.location)}`;
  const hints = (diagnostic.hints ?? []).map(
    (hint) => `  ${colors.muted(`= hint: ${hint.message}`)}`
  );

  return [header, location, ...hints].join("\n");
};
