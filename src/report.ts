import { DEFAULT_CONFIG } from "./config";
import { InvalidStateError } from "./errors";
import { isAtLeast } from "./sort";
import type {
  AnalysisConfig,
  PersonId,
  ReportLine,
  RiskBand,
  RiskBandLists,
  Store,
} from "./types";

/**
 * Maps a probability to its band. Both thresholds are inclusive within
 * `config.epsilon`; `NaN` ends up in `clean`.
 */
export function classifyProbability(
  probability: number,
  config: AnalysisConfig = DEFAULT_CONFIG
): RiskBand {
  if (isAtLeast(probability, config.hospitalizationThreshold, config.epsilon)) {
    return "hospitalization";
  }
  if (isAtLeast(probability, config.quarantineThreshold, config.epsilon)) {
    return "quarantine";
  }
  return "clean";
}

/**
 * Produces one report line per person, highest probability first.
 *
 * The store must be sorted by probability (ascending); it is read from the
 * end and never modified.
 */
export function classify(
  store: Store,
  config: AnalysisConfig = DEFAULT_CONFIG
): ReportLine[] {
  if (store.sortedBy !== "probability") {
    throw new InvalidStateError("classification requires a store sorted by probability", {
      sortedBy: store.sortedBy,
    });
  }

  const lines: ReportLine[] = [];
  for (let i = store.people.length - 1; i >= 0; i -= 1) {
    const p = store.people[i];
    const band = classifyProbability(p.probability, config);
    lines.push({
      band,
      name: p.name,
      id: p.id,
      age: p.age,
      probability: p.probability,
      riskAge: p.age >= config.riskAge,
      message: config.messages[band](p.name, p.id),
    });
  }
  return lines;
}

/**
 * Renders the report text: every message on its own line, newline-terminated.
 */
export function formatReport(lines: readonly ReportLine[]): string {
  return lines.map((l) => `${l.message}\n`).join("");
}

function uniqSorted(ids: PersonId[]): PersonId[] {
  return Array.from(new Set(ids)).sort((a, b) => a - b);
}

/**
 * Groups report ids by band, plus the risk-age population.
 */
export function buildRiskBandLists(lines: readonly ReportLine[]): RiskBandLists {
  const hospitalization: PersonId[] = [];
  const quarantine: PersonId[] = [];
  const clean: PersonId[] = [];
  const riskAge: PersonId[] = [];

  for (const l of lines) {
    if (l.band === "hospitalization") hospitalization.push(l.id);
    else if (l.band === "quarantine") quarantine.push(l.id);
    else clean.push(l.id);
    if (l.riskAge) riskAge.push(l.id);
  }

  return {
    hospitalization_required: uniqSorted(hospitalization),
    quarantine_required: uniqSorted(quarantine),
    no_serious_risk: uniqSorted(clean),
    risk_age: uniqSorted(riskAge),
  };
}
