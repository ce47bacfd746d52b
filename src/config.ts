import type { AnalysisConfig, RiskBand, MessageTemplate } from "./types";

export const MIN_DISTANCE = 1.0;

export const MAX_TIME = 30.0;

/** Tolerance for floating-point comparison of probabilities. */
export const EPSILON = 0.000000001;

export const HOSPITALIZATION_THRESHOLD = 0.3;

export const QUARANTINE_THRESHOLD = 0.1;

export const RISK_AGE = 65.0;

export const OUTPUT_FILE = "SpreaderDetectorAnalysis.out";

export const DEFAULT_MESSAGES: Readonly<Record<RiskBand, MessageTemplate>> =
  Object.freeze({
    hospitalization: (name: string, id: number) =>
      `Hospitalization Required: ${name} ${id}.`,
    quarantine: (name: string, id: number) =>
      `14-days-Quarantine Required: ${name} ${id}.`,
    clean: (name: string, id: number) =>
      `No serious chance for infection: ${name} ${id}.`,
  });

export const DEFAULT_CONFIG: Readonly<AnalysisConfig> = Object.freeze({
  minDistance: MIN_DISTANCE,
  maxTime: MAX_TIME,
  epsilon: EPSILON,
  hospitalizationThreshold: HOSPITALIZATION_THRESHOLD,
  quarantineThreshold: QUARANTINE_THRESHOLD,
  riskAge: RISK_AGE,
  clampTransmission: false,
  messages: DEFAULT_MESSAGES,
});

/**
 * Builds a frozen config from the defaults.
 *
 * Message overrides are merged per band, so overriding one template keeps the
 * other two.
 */
export function createConfig(
  overrides: Partial<Omit<AnalysisConfig, "messages">> & {
    messages?: Partial<Record<RiskBand, MessageTemplate>>;
  } = {}
): Readonly<AnalysisConfig> {
  const { messages, ...rest } = overrides;
  return Object.freeze({
    ...DEFAULT_CONFIG,
    ...rest,
    messages: Object.freeze({ ...DEFAULT_MESSAGES, ...messages }),
  });
}
