import type { DateTime } from "luxon";

/**
 * A station as returned by the station catalog, reduced to what the
 * departure board needs.
 */
export type StationRecord = {
  /** Numeric station identifier (EVA number) used by the timetable feeds */
  id: number;
  name: string;
  /** Region code of the catalog record, e.g. "DE-BY" */
  regionCode: string;
  /** False when the catalog record carries no numeric identifier */
  hasIdentifier: boolean;
  municipality?: string;
};

/**
 * One departure occurrence at a station. Built from either feed; the same
 * `id` in both feeds describes the same physical stop.
 */
export type StopEvent = {
  id: string;
  lineLabel: string;
  plannedTime?: DateTime;
  liveTime?: DateTime;
  plannedPlatform?: string;
  livePlatform?: string;
  destination?: string;
  cancelled: boolean;
};

export type StationResolution = {
  /** Set when the canonical query names exactly one station */
  exact: StationRecord | null;
  candidates: StationRecord[];
};

export type DepartureWindow = {
  events: StopEvent[];
  /** False when the live-changes feed could not be read */
  liveDataOk: boolean;
};

export type WindowParams = {
  stationId: number | string;
  now: DateTime;
  maxItems?: number;
  lineFilter?: string;
};

export const effectiveTime = (event: StopEvent): DateTime | undefined =>
  event.liveTime ?? event.plannedTime;

/**
 * Whole minutes between planned and live departure. Undefined when either
 * side is missing or the train runs on time.
 */
export function delayMinutes(event: StopEvent): number | undefined {
  if (!event.plannedTime || !event.liveTime) return undefined;
  const minutes = Math.floor(
    (event.liveTime.toMillis() - event.plannedTime.toMillis()) / 60000
  );
  return minutes !== 0 ? minutes : undefined;
}
