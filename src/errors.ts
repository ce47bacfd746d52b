import type { PersonId } from "./types";

export enum AnalysisErrorCode {
  MALFORMED_RECORD = "MALFORMED_RECORD",
  NOT_FOUND = "NOT_FOUND",
  UNKNOWN_PARTICIPANT = "UNKNOWN_PARTICIPANT",
  RESOURCE_EXHAUSTED = "RESOURCE_EXHAUSTED",
  INVALID_STATE = "INVALID_STATE",
  USAGE = "USAGE",
  INPUT_FILE = "INPUT_FILE",
  OUTPUT_FILE = "OUTPUT_FILE",
}

export const USAGE_MSG =
  "USAGE: SpreaderDetectorBackend <Path to People.in> <Path to Meetings.in>";
export const INPUT_FILE_MSG = "Error in input files.";
export const OUTPUT_FILE_MSG = "Error in output file.";

/**
 * Base class for every failure of an analysis run.
 *
 * All of them are fatal: the run stops and nothing is written.
 */
export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: AnalysisErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "AnalysisError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, AnalysisError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export type RecordSource = "roster" | "meetings";

export class MalformedRecordError extends AnalysisError {
  readonly source: RecordSource;
  readonly line: number | null;

  constructor(source: RecordSource, line: number | null, reason: string) {
    const where = line === null ? "" : ` at line ${line}`;
    super(
      AnalysisErrorCode.MALFORMED_RECORD,
      `Malformed ${source} record${where}: ${reason}`,
      { source, line, reason }
    );
    this.name = "MalformedRecordError";
    this.source = source;
    this.line = line;
    Object.setPrototypeOf(this, MalformedRecordError.prototype);
  }
}

export class NotFoundError extends AnalysisError {
  readonly target: PersonId;

  constructor(target: PersonId, reason = "not present") {
    super(AnalysisErrorCode.NOT_FOUND, `Id ${target} ${reason}`, {
      target,
      reason,
    });
    this.name = "NotFoundError";
    this.target = target;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export type ParticipantRole = "sick" | "infector" | "infected";

export class UnknownParticipantError extends AnalysisError {
  readonly participantId: PersonId;
  readonly role: ParticipantRole;

  constructor(
    participantId: PersonId,
    role: ParticipantRole,
    line: number,
    cause: NotFoundError
  ) {
    super(
      AnalysisErrorCode.UNKNOWN_PARTICIPANT,
      `Meetings line ${line} names ${role} ${participantId}: ${cause.message}`,
      { participantId, role, line }
    );
    this.name = "UnknownParticipantError";
    this.participantId = participantId;
    this.role = role;
    this.cause = cause;
    Object.setPrototypeOf(this, UnknownParticipantError.prototype);
  }
}

export class ResourceExhaustedError extends AnalysisError {
  constructor(operation: string, cause: unknown) {
    super(
      AnalysisErrorCode.RESOURCE_EXHAUSTED,
      `Out of resources while trying to ${operation}`,
      { operation }
    );
    this.name = "ResourceExhaustedError";
    this.cause = cause;
    Object.setPrototypeOf(this, ResourceExhaustedError.prototype);
  }
}

export class InvalidStateError extends AnalysisError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(AnalysisErrorCode.INVALID_STATE, message, details);
    this.name = "InvalidStateError";
    Object.setPrototypeOf(this, InvalidStateError.prototype);
  }
}

export class UsageError extends AnalysisError {
  constructor(reason: string) {
    super(AnalysisErrorCode.USAGE, USAGE_MSG, { reason });
    this.name = "UsageError";
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

export class InputFileError extends AnalysisError {
  constructor(path: string, cause: unknown) {
    super(AnalysisErrorCode.INPUT_FILE, INPUT_FILE_MSG, { path });
    this.name = "InputFileError";
    this.cause = cause;
    Object.setPrototypeOf(this, InputFileError.prototype);
  }
}

export class OutputFileError extends AnalysisError {
  constructor(path: string, cause: unknown) {
    super(AnalysisErrorCode.OUTPUT_FILE, OUTPUT_FILE_MSG, { path });
    this.name = "OutputFileError";
    this.cause = cause;
    Object.setPrototypeOf(this, OutputFileError.prototype);
  }
}

/**
 * Maps a `RangeError` (e.g. "Invalid array length") to a resource failure and
 * rethrows anything else untouched.
 */
export function rethrowAsResourceError(operation: string, err: unknown): never {
  if (err instanceof RangeError) throw new ResourceExhaustedError(operation, err);
  throw err;
}
