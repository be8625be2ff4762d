// =============================================================================
// Schedule Fetcher
// =============================================================================
// Reads /plan and /fchg for a station. Plan results are cached per
// (station, date, hour); failures are cached for a shorter time so a down
// upstream is not hammered. Upstream problems never throw: they come back as
// an empty result with `ok: false`.

import type { StopEvent } from "../types/departure";
import type { TtlCache } from "./cache";
import { MemoryTtlCache } from "./cache";
import type { DepartureConfig } from "./config";
import { parseStationId } from "./errors";
import {
  defaultTransport,
  exponentialBackoff,
  requestWithRetry,
  type Clock,
  type HttpTransport,
  type Sleep,
} from "./http";
import { createLogger, previewBody, type Logger } from "./logger";
import { parseChangesDocument, parsePlanDocument, type TimetableParseOptions } from "./timetablesApi";

/**
 * Result of a feed read with metadata
 */
export type FeedResult<T> = {
  data: T;
  /** False when the upstream could not be read or parsed */
  ok: boolean;
  cached: boolean;
  timestamp: string;
};

export type PlanCacheValue = {
  events: StopEvent[];
  ok: boolean;
};

export type ScheduleFetcherOptions = {
  config: DepartureConfig;
  transport?: HttpTransport;
  sleep?: Sleep;
  clock?: Clock;
  cache?: TtlCache<PlanCacheValue>;
  logger?: Logger;
};

export const planCacheKey = (stationId: number, date: string, hour: string) => `${stationId}:${date}:${hour}`;

export class ScheduleFetcher {
  private readonly config: DepartureConfig;
  private readonly transport: HttpTransport;
  private readonly sleep?: Sleep;
  private readonly clock: Clock;
  private readonly cache: TtlCache<PlanCacheValue>;
  private readonly logger: Logger;
  private readonly parseOptions: TimetableParseOptions;
  private readonly inFlight = new Map<string, Promise<FeedResult<StopEvent[]>>>();

  constructor(options: ScheduleFetcherOptions) {
    this.config = options.config;
    this.transport = options.transport ?? defaultTransport;
    this.sleep = options.sleep;
    this.clock = options.clock ?? Date.now;
    this.cache = options.cache ?? new MemoryTtlCache<PlanCacheValue>(this.clock);
    this.logger = options.logger ?? createLogger("Timetables", { enabled: options.config.enableLogging });
    this.parseOptions = {
      timezone: options.config.timezone,
      modeCategory: options.config.modeCategory,
      cancelledFlags: options.config.cancelledFlags,
    };
  }

  /**
   * Planned departures for one hour bucket
   * @param date - YYMMDD in network time
   * @param hour - HH in network time
   */
  async fetchBaseline(stationId: number, date: string, hour: string): Promise<StopEvent[]> {
    return (await this.loadBaseline(stationId, date, hour)).data;
  }

  /**
   * Change records for the station, keyed by stop id
   */
  async fetchChanges(stationId: number): Promise<Map<string, StopEvent>> {
    return (await this.loadChanges(stationId)).data;
  }

  async loadBaseline(stationId: number, date: string, hour: string): Promise<FeedResult<StopEvent[]>> {
    const eva = parseStationId(stationId);
    const key = planCacheKey(eva, date, hour);

    const cached = this.cache.get(key);
    if (cached) {
      return { data: cached.events, ok: cached.ok, cached: true, timestamp: this.timestamp() };
    }

    // Concurrent requests for the same bucket share one upstream call
    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const request = this.requestPlan(eva, date, hour, key).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, request);
    return request;
  }

  async loadChanges(stationId: number): Promise<FeedResult<Map<string, StopEvent>>> {
    const eva = parseStationId(stationId);
    const url = `${this.config.urls.timetables}/fchg/${eva}`;
    const xml = await this.getXml(url, { evaNo: String(eva) });

    if (xml === null) {
      this.logger.warn("Change feed unavailable", { eva });
      return this.result(new Map<string, StopEvent>(), false);
    }

    try {
      return this.result(parseChangesDocument(xml, this.parseOptions), true);
    } catch (error) {
      this.logger.error("Could not parse change feed", error);
      return this.result(new Map<string, StopEvent>(), false);
    }
  }

  private async requestPlan(eva: number, date: string, hour: string, key: string): Promise<FeedResult<StopEvent[]>> {
    const url = `${this.config.urls.timetables}/plan/${eva}/${date}/${hour}`;
    const xml = await this.getXml(url, { evaNo: String(eva), date, hour });

    let events: StopEvent[] = [];
    let ok = false;
    if (xml === null) {
      this.logger.warn("Plan feed unavailable", { eva, date, hour });
    } else {
      try {
        events = parsePlanDocument(xml, this.parseOptions);
        ok = true;
      } catch (error) {
        this.logger.error("Could not parse plan feed", error);
      }
    }

    const ttl = ok ? this.config.cache.ttlMs : this.config.cache.failureTtlMs;
    this.cache.set(key, { events, ok }, ttl);
    return this.result(events, ok);
  }

  private async getXml(url: string, params: Record<string, string>): Promise<string | null> {
    this.logger.info("Request", { method: "GET", url, params });

    return requestWithRetry(
      url,
      {
        Accept: "application/xml",
        "DB-Client-Id": this.config.credentials.clientId,
        "DB-Api-Key": this.config.credentials.apiKey,
      },
      {
        transport: this.transport,
        policy: {
          maxRetries: this.config.http.retries,
          backoff: exponentialBackoff(this.config.http.backoffBaseMs),
        },
        timeoutMs: this.config.http.timeoutMs,
        sleep: this.sleep,
        logger: this.logger,
      },
      async (response) => {
        const text = await response.text();
        this.logger.info("Response", { status: response.status, preview: previewBody(text) });
        return text;
      }
    );
  }

  private result<T>(data: T, ok: boolean): FeedResult<T> {
    return { data, ok, cached: false, timestamp: this.timestamp() };
  }

  private timestamp(): string {
    return new Date(this.clock()).toISOString();
  }
}
