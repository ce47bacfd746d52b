import { DEFAULT_CONFIG } from "./config";
import {
  InvalidStateError,
  NotFoundError,
  UnknownParticipantError,
  type ParticipantRole,
} from "./errors";
import { findById } from "./lookup";
import type {
  AnalysisConfig,
  MeetingsInput,
  PersonId,
  Store,
} from "./types";

/**
 * Per-meeting infection likelihood from distance and duration.
 *
 * Grows with `time` and shrinks with `distance`. Nothing bounds it to 1 unless
 * `config.clampTransmission` is set, and a zero distance is not guarded:
 * it yields `Infinity` (or `NaN` when `time` is also 0).
 */
export function transmissionProbability(
  distance: number,
  time: number,
  config: Pick<AnalysisConfig, "minDistance" | "maxTime" | "clampTransmission"> = DEFAULT_CONFIG
): number {
  const numerator = time * config.minDistance;
  const denominator = distance * config.maxTime;
  const p = numerator / denominator;

  if (!config.clampTransmission) return p;
  return Math.min(Math.max(p, 0), 1);
}

function resolve(
  store: Store,
  id: PersonId,
  role: ParticipantRole,
  line: number
): number {
  try {
    return findById(store.people, id);
  } catch (err) {
    if (err instanceof NotFoundError) {
      throw new UnknownParticipantError(id, role, line, err);
    }
    throw err;
  }
}

/**
 * Runs the meetings stream over an id-sorted store, in place.
 *
 * The sick person is set to exactly 1, then every row overwrites the infected
 * person's probability with `infector.probability * transmission`. When a
 * person is infected in several rows only the last one counts.
 */
export function propagate(
  store: Store,
  input: MeetingsInput,
  config: AnalysisConfig = DEFAULT_CONFIG
): Store {
  if (store.sortedBy !== "id") {
    throw new InvalidStateError("propagation requires a store sorted by id", {
      sortedBy: store.sortedBy,
    });
  }

  if (input.sickId === null) return store;

  const sickIdx = resolve(store, input.sickId, "sick", input.sickLine ?? 1);
  store.people[sickIdx].probability = 1;

  for (const m of input.meetings) {
    const infectorIdx = resolve(store, m.infectorId, "infector", m.line);
    const infectedIdx = resolve(store, m.infectedId, "infected", m.line);
    const transmission = transmissionProbability(m.distance, m.time, config);

    store.people[infectedIdx].probability =
      store.people[infectorIdx].probability * transmission;
  }

  return store;
}

/**
 * Counts people whose probability is `Infinity` or `NaN`.
 */
export function countDegenerate(store: Store): number {
  let n = 0;
  for (const p of store.people) {
    if (!Number.isFinite(p.probability)) n += 1;
  }
  return n;
}
