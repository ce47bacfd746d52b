/**
 * Non-negative integer identifier of a person in the roster.
 *
 * Ids are unique across the roster; duplicates are rejected when the store is
 * sorted by id.
 */
export type PersonId = number;

/**
 * One tracked individual.
 *
 * `probability` starts at 0 and is overwritten by the propagation engine.
 */
export type Person = {
  name: string;
  id: PersonId;
  age: number;
  probability: number;
};

/**
 * A parsed roster row. `line` is the 1-based line in the roster input.
 */
export type RosterRecord = {
  name: string;
  id: PersonId;
  age: number;
  line: number;
};

/**
 * A parsed meeting row: `infectorId` met `infectedId` at `distance` for `time`.
 */
export type MeetingRecord = {
  infectorId: PersonId;
  infectedId: PersonId;
  distance: number;
  time: number;
  line: number;
};

/**
 * The parsed meetings stream.
 *
 * `sickId` is `null` only when the stream is empty.
 */
export type MeetingsInput = {
  sickId: PersonId | null;
  sickLine: number | null;
  meetings: MeetingRecord[];
};

export type SortKey = "id" | "probability";

/**
 * The record store. Owned by the pipeline from creation to reporting.
 *
 * `sortedBy` records the last ordering applied, or `null` for roster order.
 */
export type Store = {
  people: Person[];
  sortedBy: SortKey | null;
};

export type RiskBand = "hospitalization" | "quarantine" | "clean";

export type MessageTemplate = (name: string, id: PersonId) => string;

export type AnalysisConfig = {
  /** Minimal distance two people can be at. */
  minDistance: number;
  /** Length of the recording, also the longest possible meeting. */
  maxTime: number;
  epsilon: number;
  hospitalizationThreshold: number;
  quarantineThreshold: number;
  /** Age from which a person belongs to the risk population. Reported only. */
  riskAge: number;
  clampTransmission: boolean;
  messages: Readonly<Record<RiskBand, MessageTemplate>>;
};

/**
 * One line of the final report.
 */
export type ReportLine = {
  band: RiskBand;
  name: string;
  id: PersonId;
  age: number;
  probability: number;
  riskAge: boolean;
  message: string;
};

/**
 * Ids grouped by band, the shape returned by `POST /analyze`.
 */
export type RiskBandLists = {
  hospitalization_required: PersonId[];
  quarantine_required: PersonId[];
  no_serious_risk: PersonId[];
  risk_age: PersonId[];
};

export type AnalysisResult = {
  /** Final store, sorted by probability ascending. */
  people: Person[];
  /** Report lines, highest risk first. */
  lines: ReportLine[];
  /** The report text as written to the output file. */
  report: string;
  lists: RiskBandLists;
  /** People whose probability ended up non-finite (zero-distance meetings). */
  degenerate: number;
};
