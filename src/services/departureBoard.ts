// =============================================================================
// Departure Board (window assembly)
// =============================================================================
// Fetches the plan hours around "now" plus the station's change feed, merges
// them and cuts out [now - lookback, now + lookahead]. Live data is optional:
// without it the board is built from plan data and flagged.

import type { DateTime } from "luxon";
import { effectiveTime, type DepartureWindow, type StopEvent, type WindowParams } from "../types/departure";
import type { DepartureConfig } from "./config";
import { parseStationId, TimetableUnavailableError } from "./errors";
import { createLogger, type Logger } from "./logger";
import { mergePlanWithChanges } from "./merge";
import type { FeedResult } from "./scheduleFetcher";
import { formatTimetableDateHour } from "./timetablesApi";

export interface ScheduleSource {
  loadBaseline(stationId: number, date: string, hour: string): Promise<FeedResult<StopEvent[]>>;
  loadChanges(stationId: number): Promise<FeedResult<Map<string, StopEvent>>>;
}

export type PlanBucket = {
  dateStr: string;
  hourStr: string;
};

/**
 * Plan hours covering [now - lookback, now + lookahead], oldest first.
 * Normally the current and next hour; the previous one joins when the
 * look-back reaches into it.
 */
export function planBuckets(now: DateTime, lookbackMinutes: number, lookaheadMinutes: number, zone: string): PlanBucket[] {
  const local = now.setZone(zone);
  const end = local.plus({ minutes: lookaheadMinutes });
  const buckets = new Map<string, PlanBucket>();

  for (
    let cursor = local.minus({ minutes: lookbackMinutes }).startOf("hour");
    cursor.toMillis() <= end.toMillis();
    cursor = cursor.plus({ hours: 1 })
  ) {
    const bucket = formatTimetableDateHour(cursor, zone);
    buckets.set(`${bucket.dateStr}${bucket.hourStr}`, bucket);
  }

  return [...buckets.values()];
}

/**
 * Case-insensitive prefix match on the line label; a blank filter keeps all
 */
export function filterByLine(events: readonly StopEvent[], lineFilter?: string): StopEvent[] {
  const selected = (lineFilter ?? "").trim().toUpperCase();
  if (!selected) return [...events];
  return events.filter((event) => event.lineLabel.toUpperCase().startsWith(selected));
}

/**
 * Events whose effective time lies in [start, end] (both inclusive),
 * earliest first. Events without any time are dropped.
 */
export function selectWindow(events: readonly StopEvent[], start: DateTime, end: DateTime): StopEvent[] {
  const from = start.toMillis();
  const to = end.toMillis();

  return events
    .flatMap((event) => {
      const time = effectiveTime(event);
      if (!time) return [];
      const at = time.toMillis();
      return at >= from && at <= to ? [{ event, at }] : [];
    })
    .sort((a, b) => a.at - b.at)
    .map(({ event }) => event);
}

export type DepartureBoardOptions = {
  config: DepartureConfig;
  source: ScheduleSource;
  logger?: Logger;
};

export class DepartureBoard {
  private readonly config: DepartureConfig;
  private readonly source: ScheduleSource;
  private readonly logger: Logger;

  constructor(options: DepartureBoardOptions) {
    this.config = options.config;
    this.source = options.source;
    this.logger = options.logger ?? createLogger("DepartureBoard", { enabled: options.config.enableLogging });
  }

  /**
   * Upcoming departures at a station around `now`.
   *
   * Throws InvalidStationIdError for a malformed station id and
   * TimetableUnavailableError when the plan and change feeds all failed.
   */
  async window(params: WindowParams): Promise<DepartureWindow> {
    const eva = parseStationId(params.stationId);
    const { timezone, window } = this.config;
    const maxItems = params.maxItems ?? window.maxItems;
    const now = params.now.setZone(timezone);

    const buckets = planBuckets(now, window.lookbackMinutes, window.lookaheadMinutes, timezone);

    const [plans, changes] = await Promise.all([
      Promise.all(buckets.map((bucket) => this.loadPlan(eva, bucket))),
      this.loadChanges(eva),
    ]);

    const liveDataOk = changes.ok;
    if (!liveDataOk && plans.every((plan) => !plan.ok)) {
      throw new TimetableUnavailableError(eva);
    }

    // Later hours win on duplicate ids
    const planned = new Map<string, StopEvent>();
    for (const plan of plans) {
      for (const event of plan.data) planned.set(event.id, event);
    }

    const merged = mergePlanWithChanges([...planned.values()], changes.data);
    const selected = filterByLine(merged, params.lineFilter);
    const events = selectWindow(
      selected,
      now.minus({ minutes: window.lookbackMinutes }),
      now.plus({ minutes: window.lookaheadMinutes })
    ).slice(0, Math.max(0, maxItems));

    this.logger.info("Departure window assembled", {
      eva,
      buckets: buckets.map((b) => `${b.dateStr}/${b.hourStr}`),
      merged: merged.length,
      shown: events.length,
      liveDataOk,
    });

    return { events, liveDataOk };
  }

  private async loadPlan(eva: number, bucket: PlanBucket): Promise<FeedResult<StopEvent[]>> {
    try {
      return await this.source.loadBaseline(eva, bucket.dateStr, bucket.hourStr);
    } catch (error) {
      this.logger.error(`Plan fetch failed for ${bucket.dateStr}/${bucket.hourStr}`, error);
      return { data: [], ok: false, cached: false, timestamp: new Date().toISOString() };
    }
  }

  private async loadChanges(eva: number): Promise<FeedResult<Map<string, StopEvent>>> {
    try {
      return await this.source.loadChanges(eva);
    } catch (error) {
      this.logger.error("Change fetch failed, continuing with plan data only", error);
      return { data: new Map<string, StopEvent>(), ok: false, cached: false, timestamp: new Date().toISOString() };
    }
  }
}
