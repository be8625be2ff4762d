// =============================================================================
// Departure Service
// =============================================================================
// Caller-facing entry point: station lookup, departure window and formatting
// wired together from one configuration.

import { DateTime } from "luxon";
import type { Language } from "../i18n/translation";
import type { DepartureWindow, StationResolution, StopEvent } from "../types/departure";
import type { TtlCache } from "./cache";
import { loadConfig, type DepartureConfig } from "./config";
import { DepartureBoard } from "./departureBoard";
import { formatBoard, formatDeparture } from "./formatDeparture";
import type { Clock, HttpTransport, Sleep } from "./http";
import { createLogger, type Logger } from "./logger";
import { ScheduleFetcher, type PlanCacheValue } from "./scheduleFetcher";
import { StationCatalogClient, type StationCatalog } from "./stationCatalogApi";
import { StationResolver } from "./stationResolver";

export type DepartureServiceOptions = {
  /** Defaults to loadConfig() over process.env */
  config?: DepartureConfig;
  transport?: HttpTransport;
  sleep?: Sleep;
  clock?: Clock;
  planCache?: TtlCache<PlanCacheValue>;
  catalog?: StationCatalog;
};

export class DepartureService {
  readonly config: DepartureConfig;
  readonly resolver: StationResolver;
  readonly fetcher: ScheduleFetcher;
  readonly board: DepartureBoard;
  private readonly logger: Logger;

  constructor(options: DepartureServiceOptions = {}) {
    const config = options.config ?? loadConfig();
    const logging = { enabled: config.enableLogging };

    this.config = config;
    this.logger = createLogger("DepartureService", logging);
    this.fetcher = new ScheduleFetcher({
      config,
      transport: options.transport,
      sleep: options.sleep,
      clock: options.clock,
      cache: options.planCache,
    });
    this.resolver = new StationResolver({
      config,
      clock: options.clock,
      catalog:
        options.catalog ??
        new StationCatalogClient({ config, transport: options.transport, sleep: options.sleep }),
    });
    this.board = new DepartureBoard({ config, source: this.fetcher });
  }

  /**
   * Resolve a free-text station query
   */
  async resolve(query: string, limit = 3): Promise<StationResolution> {
    this.logger.info(`Resolving station: "${query}"`);
    return this.resolver.resolve(query, limit);
  }

  /**
   * Departures at a station around `now` (network time)
   */
  async window(
    stationId: number | string,
    now: DateTime = DateTime.now(),
    maxItems: number = this.config.window.maxItems,
    lineFilter?: string
  ): Promise<DepartureWindow> {
    this.logger.info(`Building departure window: ${stationId}`, { lineFilter });
    return this.board.window({ stationId, now, maxItems, lineFilter });
  }

  format(event: StopEvent, language?: Language): string {
    return formatDeparture(event, {
      language,
      timezone: this.config.timezone,
      modeCategory: this.config.modeCategory,
    });
  }

  formatBoard(stationName: string, board: DepartureWindow, language?: Language, lineFilter?: string): string {
    return formatBoard(stationName, board, {
      language,
      lineFilter,
      timezone: this.config.timezone,
      modeCategory: this.config.modeCategory,
      lookaheadMinutes: this.config.window.lookaheadMinutes,
    });
  }
}

export const createDepartureService = (options: DepartureServiceOptions = {}): DepartureService =>
  new DepartureService(options);
