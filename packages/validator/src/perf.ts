export type ValidatorPerfCounter =
  | "definitions"
  | "scopes"
  | "subtype-checks"
  | "aliases"
  | "instantiations";

type ValidatorPerfSummary = {
  file: string;
  success: boolean;
  elapsedMs: number;
  counters: Readonly<Record<string, number>>;
  diagnostics: number;
};

const VALIDATOR_PERF_ENV = "MODLINK_VALIDATOR_PERF";

const readPerfEnv = (): string | undefined => {
  const processValue = (globalThis as {
    process?: { env?: Record<string, string | undefined> };
  }).process;
  return processValue?.env?.[VALIDATOR_PERF_ENV];
};

const parsePerfFlag = (raw: string | undefined): boolean => {
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

let perfEnabled = parsePerfFlag(readPerfEnv());

const counters = new Map<ValidatorPerfCounter, number>();

const roundMs = (value: number): number =>
  Math.round(value * 1000) / 1000;

export const isValidatorPerfEnabled = (): boolean => perfEnabled;

/** Overrides the environment flag; counters are reset either way. */
export const setValidatorPerfEnabled = (enabled: boolean): void => {
  perfEnabled = enabled;
  counters.clear();
};

export const incrementValidatorPerfCounter = (
  name: ValidatorPerfCounter,
  amount = 1
): void => {
  if (!perfEnabled || amount === 0) {
    return;
  }
  counters.set(name, (counters.get(name) ?? 0) + amount);
};

export const snapshotValidatorPerfCounters = (): Record<string, number> =>
  Object.fromEntries(
    Array.from(counters.entries()).sort(([left], [right]) =>
      left.localeCompare(right)
    )
  );

export const resetValidatorPerfCounters = (): void => {
  counters.clear();
};

export const logValidatorPerfSummary = ({
  file,
  success,
  elapsedMs,
  counters: summaryCounters,
  diagnostics,
}: ValidatorPerfSummary): void => {
  if (!perfEnabled) {
    return;
  }

  const summary = {
    file,
    success,
    diagnostics,
    elapsedMs: roundMs(elapsedMs),
    counters: summaryCounters,
  };

  console.error(`[modlink:validator:perf] ${JSON.stringify(summary)}`);
};
