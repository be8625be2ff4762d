// =============================================================================
// Station Resolver
// =============================================================================
// Free text -> canonical station. The alias table turns colloquial names into
// catalog names; ranking runs against that canonical form, while the catalog
// is asked for both the canonical and the raw text since the wildcard
// variants anchored on the city name can miss what the user actually typed.

import { applyAliases } from "../data/stationAliases";
import { applyStationIdOverride } from "../data/stationRegistry";
import type { StationRecord, StationResolution } from "../types/departure";
import type { DepartureConfig } from "./config";
import { Deadline, type Clock } from "./http";
import { createLogger, type Logger } from "./logger";
import { normalizeStationName } from "./normalize";
import type { CatalogStation, StationCatalog } from "./stationCatalogApi";

export const EXACT_MATCH_SCORE = 100;

export type ScoredStation = {
  station: StationRecord;
  score: number;
};

/**
 * Ranking score of a station name against a normalized query
 */
export function scoreStation(
  station: Pick<StationRecord, "name" | "regionCode">,
  queryNorm: string,
  targetRegionCode: string
): number {
  const nameNorm = normalizeStationName(station.name);
  let score = 0;
  if (nameNorm === queryNorm) score += EXACT_MATCH_SCORE;
  if (nameNorm.startsWith(queryNorm) || queryNorm.startsWith(nameNorm)) score += 50;
  if (nameNorm.includes(queryNorm)) score += 25;
  if (station.regionCode === targetRegionCode) score += 5;
  return score;
}

/**
 * Eligible stations by descending score; equal scores keep catalog order.
 */
export function rankStations(
  stations: readonly StationRecord[],
  queryNorm: string,
  targetRegionCode: string
): ScoredStation[] {
  return stations
    .filter((station) => station.hasIdentifier)
    .map((station) => ({ station, score: scoreStation(station, queryNorm, targetRegionCode) }))
    .sort((a, b) => b.score - a.score);
}

const toStationRecord = (station: CatalogStation): StationRecord => ({
  id: station.eva ?? 0,
  name: station.name,
  regionCode: station.regionCode,
  hasIdentifier: station.eva !== undefined,
  municipality: station.municipality,
});

export type StationResolverOptions = {
  config: DepartureConfig;
  catalog: StationCatalog;
  clock?: Clock;
  logger?: Logger;
};

export class StationResolver {
  private readonly config: DepartureConfig;
  private readonly catalog: StationCatalog;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: StationResolverOptions) {
    this.config = options.config;
    this.catalog = options.catalog;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createLogger("StationResolver", { enabled: options.config.enableLogging });
  }

  /**
   * Resolve free text to a station.
   *
   * Returns the station as `exact` when the best match carries the canonical
   * name, otherwise up to `limit` candidates for the caller to choose from.
   * Both empty means no station matched.
   */
  async resolve(query: string, limit = 3): Promise<StationResolution> {
    const raw = query.trim();
    if (!raw) return { exact: null, candidates: [] };

    const canonical = applyAliases(raw);
    const queryNorm = normalizeStationName(canonical);
    const deadline = new Deadline(this.config.stationSearch.deadlineMs, this.clock);

    this.logger.info("Resolving station", { query: raw, canonical });

    const seen = new Set<string>();
    const combined: StationRecord[] = [];
    for (const text of [...new Set([canonical, raw])]) {
      if (deadline.expired()) break;
      for (const station of await this.catalog.search(text, deadline)) {
        if (seen.has(station.key)) continue;
        seen.add(station.key);
        combined.push(toStationRecord(station));
      }
    }

    const ranked = rankStations(combined, queryNorm, this.config.stationSearch.targetRegionCode);
    if (ranked.length === 0) {
      this.logger.info("No station found", { query: raw });
      return { exact: null, candidates: [] };
    }

    const [best] = ranked;
    if (best.score >= EXACT_MATCH_SCORE && normalizeStationName(best.station.name) === queryNorm) {
      return { exact: applyStationIdOverride(best.station), candidates: [] };
    }

    return {
      exact: null,
      candidates: ranked.slice(0, limit).map(({ station }) => applyStationIdOverride(station)),
    };
  }
}
