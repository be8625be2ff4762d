// =============================================================================
// Configuration
// =============================================================================
// DB API Marketplace endpoints, credentials and engine tuning, read from the
// environment. Only the credentials are required.

import { IANAZone } from "luxon";
import { z } from "zod";
import { ConfigError } from "./errors";

export const TIMETABLES_BASE_URL =
  "https://apis.deutschebahn.com/db-api-marketplace/apis/timetables/v1";
export const STATION_DATA_BASE_URL =
  "https://apis.deutschebahn.com/db-api-marketplace/apis/station-data/v2";

export const DEFAULT_CANCELLED_FLAGS = ["c", "x", "1", "true", "y"];

export type RetrySettings = {
  /** Per-call timeout */
  timeoutMs: number;
  /** Additional attempts after the first one */
  retries: number;
  /** Backoff before retry n is backoffBaseMs * 2^n */
  backoffBaseMs: number;
};

export type DepartureConfig = {
  credentials: {
    clientId: string;
    apiKey: string;
  };
  urls: {
    timetables: string;
    stationData: string;
  };
  /** Zone of the rail network's civil time */
  timezone: string;
  /** Trip category of the served rail mode, also used as line prefix */
  modeCategory: string;
  http: RetrySettings;
  stationSearch: RetrySettings & {
    /** Wall-clock budget for one whole resolution */
    deadlineMs: number;
    /** Catalog region filter ("federalstate" query parameter) */
    region: string;
    /** Region code that earns a ranking bonus */
    targetRegionCode: string;
    /** City prefix spellings for the wildcard query variants */
    cityPrefixes: string[];
  };
  cache: {
    ttlMs: number;
    failureTtlMs: number;
  };
  window: {
    lookbackMinutes: number;
    lookaheadMinutes: number;
    maxItems: number;
  };
  /** dp@cs values (lowercase) that mean "cancelled at this stop" */
  cancelledFlags: string[];
  enableLogging: boolean;
};

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const csv = (fallback: string[]) =>
  z
    .string()
    .default(fallback.join(","))
    .transform((value) =>
      value
        .split(",")
        .map((part) => part.trim())
        .filter(Boolean)
    );

const envSchema = z.object({
  DB_CLIENT_ID: z.string().min(1),
  DB_API_KEY: z.string().min(1),
  DB_TIMETABLES_URL: z.string().url().default(TIMETABLES_BASE_URL),
  DB_STATION_DATA_URL: z.string().url().default(STATION_DATA_BASE_URL),
  TIMEZONE: z
    .string()
    .default("Europe/Berlin")
    .refine((zone) => IANAZone.isValidZone(zone), "Unknown time zone"),
  MODE_CATEGORY: z.string().min(1).default("S"),
  HTTP_TIMEOUT_MS: positiveInt(5000),
  HTTP_RETRIES: nonNegativeInt(2),
  HTTP_BACKOFF_MS: nonNegativeInt(300),
  STATION_SEARCH_DEADLINE_MS: positiveInt(7000),
  STATION_HTTP_TIMEOUT_MS: positiveInt(3000),
  STATION_BACKOFF_MS: nonNegativeInt(250),
  STATION_REGION: z.string().min(1).default("bayern"),
  STATION_REGION_CODE: z.string().min(1).default("DE-BY"),
  STATION_CITY_PREFIXES: csv(["München", "Muenchen"]),
  PLAN_CACHE_TTL_MS: positiveInt(90_000),
  PLAN_CACHE_FAILURE_TTL_MS: positiveInt(60_000),
  LOOKBACK_MINUTES: nonNegativeInt(5),
  LOOKAHEAD_MINUTES: nonNegativeInt(60),
  MAX_ITEMS: positiveInt(15),
  CANCELLED_FLAGS: csv(DEFAULT_CANCELLED_FLAGS),
  ENABLE_LOGGING: z
    .enum(["true", "false", "1", "0"])
    .default("true")
    .transform((value) => value === "true" || value === "1"),
});

export type Env = Record<string, string | undefined>;

/**
 * Build the engine configuration from environment variables.
 * Throws ConfigError naming every invalid or missing key.
 */
export function loadConfig(env: Env = process.env): DepartureConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join(".")))];
    throw new ConfigError(keys, parsed.error);
  }

  const e = parsed.data;
  return {
    credentials: { clientId: e.DB_CLIENT_ID, apiKey: e.DB_API_KEY },
    urls: { timetables: e.DB_TIMETABLES_URL, stationData: e.DB_STATION_DATA_URL },
    timezone: e.TIMEZONE,
    modeCategory: e.MODE_CATEGORY.toUpperCase(),
    http: {
      timeoutMs: e.HTTP_TIMEOUT_MS,
      retries: e.HTTP_RETRIES,
      backoffBaseMs: e.HTTP_BACKOFF_MS,
    },
    stationSearch: {
      deadlineMs: e.STATION_SEARCH_DEADLINE_MS,
      timeoutMs: Math.min(e.STATION_HTTP_TIMEOUT_MS, e.HTTP_TIMEOUT_MS),
      retries: e.HTTP_RETRIES,
      backoffBaseMs: e.STATION_BACKOFF_MS,
      region: e.STATION_REGION,
      targetRegionCode: e.STATION_REGION_CODE,
      cityPrefixes: e.STATION_CITY_PREFIXES,
    },
    cache: {
      ttlMs: e.PLAN_CACHE_TTL_MS,
      failureTtlMs: e.PLAN_CACHE_FAILURE_TTL_MS,
    },
    window: {
      lookbackMinutes: e.LOOKBACK_MINUTES,
      lookaheadMinutes: e.LOOKAHEAD_MINUTES,
      maxItems: e.MAX_ITEMS,
    },
    cancelledFlags: e.CANCELLED_FLAGS.map((flag) => flag.toLowerCase()),
    enableLogging: e.ENABLE_LOGGING,
  };
}
