// =============================================================================
// Error Types
// =============================================================================
// Upstream failures (timeouts, non-2xx, malformed documents) never surface as
// errors: they degrade to empty results. The classes below cover the cases a
// caller has to react to.

export type TimetableErrorCode =
  | "INVALID_STATION_ID"
  | "TIMETABLE_UNAVAILABLE"
  | "INVALID_CONFIG";

/**
 * Base error with a machine-readable code and the error that caused it
 */
export class TimetableError extends Error {
  public readonly code: TimetableErrorCode;
  public readonly originalError?: unknown;

  constructor(message: string, code: TimetableErrorCode, originalError?: unknown) {
    super(message);
    this.name = "TimetableError";
    this.code = code;
    this.originalError = originalError;
  }
}

/**
 * A station identifier that is not a positive integer reached the
 * timetable layer. Indicates a caller bug, not an upstream condition.
 */
export class InvalidStationIdError extends TimetableError {
  public readonly stationId: unknown;

  constructor(stationId: unknown) {
    super(`Invalid station id: ${String(stationId)}`, "INVALID_STATION_ID");
    this.name = "InvalidStationIdError";
    this.stationId = stationId;
  }
}

/**
 * Every feed needed for a departure board failed.
 */
export class TimetableUnavailableError extends TimetableError {
  public readonly stationId: number;

  constructor(stationId: number, originalError?: unknown) {
    super(
      `Timetable data for station ${stationId} is unavailable: plan and change feeds both failed`,
      "TIMETABLE_UNAVAILABLE",
      originalError
    );
    this.name = "TimetableUnavailableError";
    this.stationId = stationId;
  }
}

export class ConfigError extends TimetableError {
  public readonly keys: string[];

  constructor(keys: string[], originalError?: unknown) {
    super(`Invalid configuration: ${keys.join(", ")}`, "INVALID_CONFIG", originalError);
    this.name = "ConfigError";
    this.keys = keys;
  }
}

/**
 * Parse a station identifier coming from the caller. Accepts numbers and
 * numeric strings.
 */
export function parseStationId(input: number | string): number {
  const value = typeof input === "number" ? input : /^\s*\d+\s*$/.test(input) ? Number(input) : NaN;
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidStationIdError(input);
  }
  return value;
}
