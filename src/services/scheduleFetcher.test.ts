import { beforeEach, describe, expect, it, vi } from "vitest";
import { CHANGES_XML, GATEWAY_HTML, PLAN_XML, testConfig, xmlResponse } from "../test/helpers";
import { TIMETABLES_BASE_URL } from "./config";
import { InvalidStationIdError } from "./errors";
import type { HttpTransport } from "./http";
import { ScheduleFetcher } from "./scheduleFetcher";

const EVA = 8000262;

const mockTransport = (respond: (url: string) => Response) =>
  vi.fn(async (url: string, _init: RequestInit) => respond(url));

describe("ScheduleFetcher", () => {
  let now: number;
  const clock = () => now;
  const sleep = vi.fn(async (_ms: number) => {});

  beforeEach(() => {
    now = Date.UTC(2025, 0, 15, 12, 30);
    sleep.mockClear();
  });

  const createFetcher = (transport: HttpTransport) =>
    new ScheduleFetcher({ config: testConfig(), transport, sleep, clock });

  describe("fetchBaseline", () => {
    it("requests the plan hour with credentials", async () => {
      const transport = mockTransport(() => xmlResponse(PLAN_XML));
      const events = await createFetcher(transport).fetchBaseline(EVA, "250115", "13");

      expect(events.map((event) => event.id)).toEqual(["42"]);
      expect(transport).toHaveBeenCalledTimes(1);
      const [url, init] = transport.mock.calls[0];
      expect(url).toBe(`${TIMETABLES_BASE_URL}/plan/8000262/250115/13`);
      expect(init.headers).toEqual({
        Accept: "application/xml",
        "DB-Client-Id": "test-client",
        "DB-Api-Key": "test-secret",
      });
    });

    it("serves repeated lookups from the cache until the entry expires", async () => {
      const transport = mockTransport(() => xmlResponse(PLAN_XML));
      const fetcher = createFetcher(transport);

      await fetcher.fetchBaseline(EVA, "250115", "13");
      const second = await fetcher.loadBaseline(EVA, "250115", "13");
      expect(transport).toHaveBeenCalledTimes(1);
      expect(second.cached).toBe(true);
      expect(second.ok).toBe(true);
      expect(second.data).toHaveLength(1);

      now += 90_000;
      await fetcher.fetchBaseline(EVA, "250115", "13");
      expect(transport).toHaveBeenCalledTimes(2);
    });

    it("keys the cache by station, date and hour", async () => {
      const transport = mockTransport(() => xmlResponse(PLAN_XML));
      const fetcher = createFetcher(transport);

      await fetcher.fetchBaseline(EVA, "250115", "13");
      await fetcher.fetchBaseline(EVA, "250115", "14");
      await fetcher.fetchBaseline(8000261, "250115", "13");

      expect(transport).toHaveBeenCalledTimes(3);
    });

    it("retries failures and caches the empty result for a shorter time", async () => {
      const transport = mockTransport(() => xmlResponse("", 503));
      const fetcher = createFetcher(transport);

      const result = await fetcher.loadBaseline(EVA, "250115", "13");
      expect(result).toMatchObject({ data: [], ok: false, cached: false });
      expect(transport).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls).toEqual([[300], [600]]);

      now += 59_999;
      const cached = await fetcher.loadBaseline(EVA, "250115", "13");
      expect(cached).toMatchObject({ data: [], ok: false, cached: true });
      expect(transport).toHaveBeenCalledTimes(3);

      now += 1;
      await fetcher.fetchBaseline(EVA, "250115", "13");
      expect(transport).toHaveBeenCalledTimes(6);
    });

    it("treats a malformed document as a failed feed", async () => {
      const transport = mockTransport(() => xmlResponse("Service Unavailable"));
      const result = await createFetcher(transport).loadBaseline(EVA, "250115", "13");

      expect(result).toMatchObject({ data: [], ok: false });
      expect(transport).toHaveBeenCalledTimes(1);
    });

    it("treats a successful response without a timetable as a failed feed", async () => {
      const transport = mockTransport(() => xmlResponse(GATEWAY_HTML));
      const fetcher = createFetcher(transport);

      const result = await fetcher.loadBaseline(EVA, "250115", "13");
      expect(result).toMatchObject({ data: [], ok: false, cached: false });
      expect(transport).toHaveBeenCalledTimes(1);

      now += 60_000;
      await fetcher.loadBaseline(EVA, "250115", "13");
      expect(transport).toHaveBeenCalledTimes(2);
    });

    it("shares one request between concurrent lookups of the same hour", async () => {
      const transport = mockTransport(() => xmlResponse(PLAN_XML));
      const fetcher = createFetcher(transport);

      const [a, b] = await Promise.all([
        fetcher.fetchBaseline(EVA, "250115", "13"),
        fetcher.fetchBaseline(EVA, "250115", "13"),
      ]);

      expect(transport).toHaveBeenCalledTimes(1);
      expect(a).toBe(b);
    });

    it("rejects station ids that are not positive integers", async () => {
      const transport = mockTransport(() => xmlResponse(PLAN_XML));

      await expect(createFetcher(transport).fetchBaseline(-1, "250115", "13")).rejects.toBeInstanceOf(
        InvalidStationIdError
      );
      expect(transport).not.toHaveBeenCalled();
    });
  });

  describe("fetchChanges", () => {
    it("returns change records keyed by stop id", async () => {
      const transport = mockTransport(() => xmlResponse(CHANGES_XML));
      const changes = await createFetcher(transport).fetchChanges(EVA);

      expect([...changes.keys()]).toEqual(["42", "99", "77"]);
      expect(transport.mock.calls[0][0]).toBe(`${TIMETABLES_BASE_URL}/fchg/8000262`);
    });

    it("reports a successful response without a timetable as unavailable", async () => {
      const transport = mockTransport(() => xmlResponse(GATEWAY_HTML));
      const result = await createFetcher(transport).loadChanges(EVA);

      expect(result.ok).toBe(false);
      expect(result.data.size).toBe(0);
      expect(transport).toHaveBeenCalledTimes(1);
    });

    it("is not cached", async () => {
      const transport = mockTransport(() => xmlResponse(CHANGES_XML));
      const fetcher = createFetcher(transport);

      await fetcher.fetchChanges(EVA);
      await fetcher.fetchChanges(EVA);
      expect(transport).toHaveBeenCalledTimes(2);
    });

    it("degrades to an empty result after transport errors", async () => {
      const transport = mockTransport(() => {
        throw new TypeError("fetch failed");
      });
      const fetcher = createFetcher(transport);

      const result = await fetcher.loadChanges(EVA);
      expect(result.ok).toBe(false);
      expect(result.data.size).toBe(0);
      expect(transport).toHaveBeenCalledTimes(3);

      expect((await fetcher.fetchChanges(EVA)).size).toBe(0);
    });
  });
});
