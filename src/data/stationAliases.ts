// =============================================================================
// Station Aliases
// =============================================================================
// Colloquial names mapped to the catalog's canonical station names.
// Keys are compared in normalized form, so "Hackerbruecke", "hackerbrücke"
// and "HACKERBRUCKE" all hit the same entry.

import { normalizeStationName } from "../services/normalize";
import aliases from "./stationAliases.json";

export const STATION_ALIASES: Readonly<Record<string, string>> = aliases;

const ALIAS_LOOKUP = new Map<string, string>(
  Object.entries(STATION_ALIASES).map(([alias, canonical]) => [normalizeStationName(alias), canonical])
);

/**
 * Canonical station name for a user query, or the query itself when no
 * alias matches.
 */
export function applyAliases(query: string): string {
  return ALIAS_LOOKUP.get(normalizeStationName(query)) ?? query;
}
