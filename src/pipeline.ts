import { DEFAULT_CONFIG } from "./config";
import { parseMeetings, parseRoster } from "./parsing";
import { countDegenerate, propagate } from "./propagation";
import { buildRiskBandLists, classify, formatReport } from "./report";
import { buildStore, sortStore } from "./store";
import type { AnalysisConfig, AnalysisResult } from "./types";

/**
 * Runs a full analysis over the raw roster and meetings text.
 *
 * Pipeline:
 * 1) Parse both inputs (any malformed row aborts).
 * 2) Build the store and sort it by id.
 * 3) Propagate probabilities from the sick person over the meetings.
 * 4) Sort by probability and classify, highest risk first.
 *
 * Nothing is returned on failure: the first error is thrown as is.
 */
export function analyze(
  rosterText: string,
  meetingsText: string,
  config: AnalysisConfig = DEFAULT_CONFIG
): AnalysisResult {
  const roster = parseRoster(rosterText);
  const meetings = parseMeetings(meetingsText);

  const store = buildStore(roster);
  sortStore(store, "id", config.epsilon);
  propagate(store, meetings, config);
  const degenerate = countDegenerate(store);

  sortStore(store, "probability", config.epsilon);
  const lines = classify(store, config);

  return {
    people: store.people,
    lines,
    report: formatReport(lines),
    lists: buildRiskBandLists(lines),
    degenerate,
  };
}
