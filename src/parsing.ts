import { MalformedRecordError, type RecordSource } from "./errors";
import type {
  MeetingRecord,
  MeetingsInput,
  PersonId,
  RosterRecord,
} from "./types";

/**
 * Splits a line on runs of whitespace, dropping empty tokens.
 */
function tokenize(line: string): string[] {
  return line.trim().split(/\s+/).filter(Boolean);
}

/**
 * Parses a person id.
 *
 * Only plain decimal digits are accepted, so "-1", "1.5" and "0x10" are all
 * rejected. Values past `Number.MAX_SAFE_INTEGER` are rejected as well since
 * they would no longer compare exactly.
 */
export function parseId(value: string): { value: PersonId | null; valid: boolean } {
  if (!/^\d+$/.test(value)) return { value: null, valid: false };
  const n = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(n)) return { value: null, valid: false };
  return { value: n, valid: true };
}

/**
 * Parses a finite real number ("30", "1.5", "2e-1").
 */
export function parseReal(value: string): { value: number | null; valid: boolean } {
  const s = value.trim();
  if (!s) return { value: null, valid: false };
  const n = Number(s);
  if (!Number.isFinite(n)) return { value: null, valid: false };
  return { value: n, valid: true };
}

function expectFields(
  source: RecordSource,
  lineNumber: number,
  tokens: string[],
  names: string[]
): void {
  if (tokens.length < names.length) {
    const missing = names.slice(tokens.length).join(", ");
    throw new MalformedRecordError(source, lineNumber, `missing ${missing}`);
  }
  if (tokens.length > names.length) {
    throw new MalformedRecordError(
      source,
      lineNumber,
      `expected ${names.length} fields (${names.join(" ")}), got ${tokens.length}`
    );
  }
}

function requireId(
  source: RecordSource,
  lineNumber: number,
  field: string,
  raw: string
): PersonId {
  const parsed = parseId(raw);
  if (!parsed.valid || parsed.value === null) {
    throw new MalformedRecordError(
      source,
      lineNumber,
      `${field} must be a non-negative integer, got "${raw}"`
    );
  }
  return parsed.value;
}

function requireReal(
  source: RecordSource,
  lineNumber: number,
  field: string,
  raw: string
): number {
  const parsed = parseReal(raw);
  if (!parsed.valid || parsed.value === null) {
    throw new MalformedRecordError(
      source,
      lineNumber,
      `${field} must be a number, got "${raw}"`
    );
  }
  return parsed.value;
}

/**
 * Parses one roster line: `name id age`.
 */
export function parseRosterLine(line: string, lineNumber: number): RosterRecord {
  const tokens = tokenize(line);
  expectFields("roster", lineNumber, tokens, ["name", "id", "age"]);
  const [name, idRaw, ageRaw] = tokens;

  return {
    name,
    id: requireId("roster", lineNumber, "id", idRaw),
    age: requireReal("roster", lineNumber, "age", ageRaw),
    line: lineNumber,
  };
}

/**
 * Parses one meeting line: `infectorId infectedId distance time`.
 *
 * A distance of 0 is accepted here; what it does to the probability is up to
 * the propagation engine.
 */
export function parseMeetingLine(
  line: string,
  lineNumber: number
): MeetingRecord {
  const tokens = tokenize(line);
  expectFields("meetings", lineNumber, tokens, [
    "infectorId",
    "infectedId",
    "distance",
    "time",
  ]);
  const [infectorRaw, infectedRaw, distanceRaw, timeRaw] = tokens;

  return {
    infectorId: requireId("meetings", lineNumber, "infectorId", infectorRaw),
    infectedId: requireId("meetings", lineNumber, "infectedId", infectedRaw),
    distance: requireReal("meetings", lineNumber, "distance", distanceRaw),
    time: requireReal("meetings", lineNumber, "time", timeRaw),
    line: lineNumber,
  };
}

/**
 * Parses the first meetings line, which holds only the sick person's id.
 */
export function parseSickLine(line: string, lineNumber: number): PersonId {
  const tokens = tokenize(line);
  expectFields("meetings", lineNumber, tokens, ["sickId"]);
  return requireId("meetings", lineNumber, "sickId", tokens[0]);
}

/**
 * Yields `[lineNumber, line]` for every non-blank line. CRLF input is accepted.
 */
function* contentLines(text: string): Generator<[number, string]> {
  const lines = text.split("\n");
  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i].replace(/\r$/, "");
    if (!line.trim()) continue;
    yield [i + 1, line];
  }
}

export function parseRoster(text: string): RosterRecord[] {
  const out: RosterRecord[] = [];
  for (const [lineNumber, line] of contentLines(text)) {
    out.push(parseRosterLine(line, lineNumber));
  }
  return out;
}

/**
 * Parses the meetings input. The first non-blank line is the sick id; an input
 * with no content lines is an empty stream.
 */
export function parseMeetings(text: string): MeetingsInput {
  let sickId: PersonId | null = null;
  let sickLine: number | null = null;
  const meetings: MeetingRecord[] = [];

  for (const [lineNumber, line] of contentLines(text)) {
    if (sickLine === null) {
      sickId = parseSickLine(line, lineNumber);
      sickLine = lineNumber;
      continue;
    }
    meetings.push(parseMeetingLine(line, lineNumber));
  }

  return { sickId, sickLine, meetings };
}
