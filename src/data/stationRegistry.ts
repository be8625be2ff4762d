// =============================================================================
// Station Registry
// =============================================================================
// Stations whose catalog identifier differs from the one the Timetables API
// serves departures under.

import type { StationRecord } from "../types/departure";

type StationIdOverride = {
  /** Catalog display name */
  name: string;
  /** Identifier reported by the station catalog */
  catalogId: number;
  /** Identifier to query the timetable feeds with */
  timetableId: number;
};

export const STATION_ID_OVERRIDES: readonly StationIdOverride[] = [
  // S-Bahn trunk line platforms below München Hbf are a separate timetable station
  { name: "München Hbf", catalogId: 8000261, timetableId: 8098263 },
];

/**
 * Swap in the timetable identifier for stations listed above
 */
export function applyStationIdOverride(station: StationRecord): StationRecord {
  const override = STATION_ID_OVERRIDES.find(
    (entry) => entry.name === station.name && entry.catalogId === station.id
  );
  return override ? { ...station, id: override.timetableId } : station;
}
