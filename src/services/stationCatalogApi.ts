import { z } from "zod";
import type { DepartureConfig } from "./config";
import {
  defaultTransport,
  exponentialBackoff,
  requestWithRetry,
  type Deadline,
  type HttpTransport,
  type Sleep,
} from "./http";
import { createLogger, previewBody, type Logger } from "./logger";

// =============================================================================
// DB Station Data (StaDa) API - station search
// =============================================================================
//
//   GET /stations?searchstring={pattern}&federalstate={region}
//   Docs: https://developers.deutschebahn.com/db-api-marketplace/apis/product/stada
//
// The search matches prefixes and substrings inconsistently, so every query is
// tried as given and then as "<City>*<query>*" in each configured spelling of
// the city name, stopping at the first variant that yields usable stations.
// =============================================================================

const identifierSchema = z.union([z.number(), z.string()]);

// The catalog sends null for unknown values
const catalogStationSchema = z
  .object({
    name: z.string().nullish(),
    evaNumbers: z.array(z.object({ number: identifierSchema.nullish() }).passthrough()).nullish(),
    federalStateCode: z.string().nullish(),
    stationNumber: identifierSchema.nullish(),
    id: identifierSchema.nullish(),
    municipality: z.string().nullish(),
  })
  .passthrough();

type DBCatalogStationRaw = z.infer<typeof catalogStationSchema>;

const LIST_KEYS = ["result", "results", "stations", "stopPlaces", "stopplaces"] as const;

/**
 * Catalog record with the fields the resolver ranks on
 */
export type CatalogStation = {
  /** First numeric EVA number, when the record has one */
  eva?: number;
  name: string;
  regionCode: string;
  municipality?: string;
  /** Identity used to deduplicate results across queries */
  key: string;
};

export interface StationCatalog {
  search(query: string, deadline: Deadline): Promise<CatalogStation[]>;
}

const toNumericId = (value: string | number | null | undefined): number | undefined => {
  if (value === undefined || value === null) return undefined;
  const n = typeof value === "number" ? value : /^\d+$/.test(value.trim()) ? Number(value) : NaN;
  return Number.isSafeInteger(n) && n > 0 ? n : undefined;
};

const mapCatalogStation = (raw: DBCatalogStationRaw): CatalogStation => {
  const eva = raw.evaNumbers?.map((entry) => toNumericId(entry.number)).find((n) => n !== undefined);
  const name = raw.name ?? "";
  const key = String(eva ?? raw.stationNumber ?? raw.id ?? name);
  return {
    eva,
    name,
    regionCode: raw.federalStateCode ?? "",
    municipality: raw.municipality ?? undefined,
    key,
  };
};

/**
 * Pull the station list out of a search response. The API has answered
 * with a bare array and with several envelope keys.
 */
export const extractStationList = (data: unknown): CatalogStation[] => {
  let list: unknown[] | undefined;
  if (Array.isArray(data)) {
    list = data;
  } else if (data !== null && typeof data === "object") {
    for (const key of LIST_KEYS) {
      const value: unknown = Reflect.get(data, key);
      if (Array.isArray(value)) {
        list = value;
        break;
      }
    }
  }
  if (!list) {
    throw new Error("Station search response contains no station list");
  }

  const stations: CatalogStation[] = [];
  for (const entry of list) {
    const parsed = catalogStationSchema.safeParse(entry);
    if (parsed.success) stations.push(mapCatalogStation(parsed.data));
  }
  return stations;
};

export type StationCatalogClientOptions = {
  config: DepartureConfig;
  transport?: HttpTransport;
  sleep?: Sleep;
  logger?: Logger;
};

export class StationCatalogClient implements StationCatalog {
  private readonly config: DepartureConfig;
  private readonly transport: HttpTransport;
  private readonly sleep?: Sleep;
  private readonly logger: Logger;

  constructor(options: StationCatalogClientOptions) {
    this.config = options.config;
    this.transport = options.transport ?? defaultTransport;
    this.sleep = options.sleep;
    this.logger = options.logger ?? createLogger("StationData", { enabled: options.config.enableLogging });
  }

  /**
   * Query variants for one search term, in the order they are tried
   */
  queryVariants(query: string): string[] {
    return [query, ...this.config.stationSearch.cityPrefixes.map((prefix) => `${prefix}*${query}*`)];
  }

  /**
   * Stations for the first variant that yields records with an EVA number.
   * Failures are logged and the next variant is tried; an empty array means
   * nothing usable was found before the deadline.
   */
  async search(query: string, deadline: Deadline): Promise<CatalogStation[]> {
    for (const variant of this.queryVariants(query)) {
      if (deadline.expired()) {
        this.logger.warn("Station search deadline reached", { query });
        break;
      }

      const stations = await this.searchVariant(variant, deadline);
      if (stations && stations.some((station) => station.eva !== undefined)) {
        return stations;
      }
    }
    return [];
  }

  private async searchVariant(searchstring: string, deadline: Deadline): Promise<CatalogStation[] | null> {
    const { stationSearch, urls, credentials } = this.config;
    const params = new URLSearchParams({ searchstring, federalstate: stationSearch.region });
    const url = `${urls.stationData}/stations?${params.toString()}`;

    this.logger.info("Request", { method: "GET", url });

    return requestWithRetry(
      url,
      {
        Accept: "application/json",
        "DB-Client-Id": credentials.clientId,
        "DB-Api-Key": credentials.apiKey,
      },
      {
        transport: this.transport,
        policy: {
          maxRetries: stationSearch.retries,
          backoff: exponentialBackoff(stationSearch.backoffBaseMs),
        },
        timeoutMs: stationSearch.timeoutMs,
        sleep: this.sleep,
        deadline,
        logger: this.logger,
      },
      async (response) => {
        const data: unknown = await response.json();
        this.logger.info("Response", { status: response.status, preview: previewBody(data) });
        return extractStationList(data);
      }
    );
  }
}
