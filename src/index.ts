export * from "./types/departure";
export { applyAliases, STATION_ALIASES } from "./data/stationAliases";
export { applyStationIdOverride, STATION_ID_OVERRIDES } from "./data/stationRegistry";
export { getTranslations, type Language, type Translations } from "./i18n/translation";
export { MemoryTtlCache, type TtlCache } from "./services/cache";
export { loadConfig, type DepartureConfig } from "./services/config";
export { DepartureBoard, filterByLine, planBuckets, selectWindow, type ScheduleSource } from "./services/departureBoard";
export { createDepartureService, DepartureService, type DepartureServiceOptions } from "./services/departureService";
export {
  ConfigError,
  InvalidStationIdError,
  parseStationId,
  TimetableError,
  TimetableUnavailableError,
} from "./services/errors";
export { formatBoard, formatDeparture, type FormatOptions } from "./services/formatDeparture";
export type { HttpTransport } from "./services/http";
export { mergePlanWithChanges } from "./services/merge";
export { ScheduleFetcher, type FeedResult } from "./services/scheduleFetcher";
export { StationCatalogClient, type CatalogStation, type StationCatalog } from "./services/stationCatalogApi";
export { rankStations, StationResolver } from "./services/stationResolver";
export {
  extractDestinationFromPath,
  normalizeLineLabel,
  parseChangesDocument,
  parsePlanDocument,
  parseTimetableTime,
} from "./services/timetablesApi";
