import { DateTime } from "luxon";
import { loadConfig, type Env } from "../services/config";
import type { StopEvent } from "../types/departure";

export const ZONE = "Europe/Berlin";

export const testConfig = (overrides: Env = {}) =>
  loadConfig({
    DB_CLIENT_ID: "test-client",
    DB_API_KEY: "test-secret",
    ENABLE_LOGGING: "false",
    ...overrides,
  });

/** 2025-01-15 (default) at hour:minute, network time */
export const at = (hour: number, minute: number, day = 15): DateTime =>
  DateTime.fromObject({ year: 2025, month: 1, day, hour, minute }, { zone: ZONE });

export const stop = (id: string, fields: Partial<StopEvent> = {}): StopEvent => ({
  id,
  lineLabel: "S2",
  cancelled: false,
  ...fields,
});

export const xmlResponse = (body: string, status = 200): Response =>
  new Response(body, { status, headers: { "Content-Type": "application/xml" } });

export const jsonResponse = (data: unknown, status = 200): Response =>
  new Response(JSON.stringify(data), { status, headers: { "Content-Type": "application/json" } });

export const PLAN_XML = `<?xml version='1.0' encoding='UTF-8'?>
<timetable station="München Ost">
  <s id="42">
    <tl f="S" t="p" o="800725" c="S" n="6712"/>
    <dp pt="2501151336" pp="4" l="2" ppth="Leuchtenbergring|Riem|Erding"/>
  </s>
  <s id="43">
    <tl f="F" t="p" o="800734" c="RE" n="4012"/>
    <dp pt="2501151340" pp="1" ppth="Grafing Bahnhof|Rosenheim"/>
  </s>
  <s id="44">
    <tl f="S" t="p" o="800725" c="S" n="6800"/>
    <ar pt="2501151345" pp="2" l="8" ppth="Pasing|Hackerbrücke"/>
  </s>
  <s id="45">
    <dp pt="2501151350" pp="3" l="8"/>
  </s>
</timetable>`;

export const CHANGES_XML = `<?xml version='1.0' encoding='UTF-8'?>
<timetable station="München Ost" eva="8000262">
  <s id="42" eva="8000262">
    <dp ct="2501151341" cp="4"/>
  </s>
  <s id="99" eva="8000262">
    <tl f="S" t="a" o="800725" c="S" n="6999"/>
    <dp pt="2501151400" cs="c" l="2" cpth="" ppth="Riem|Erding"/>
  </s>
  <s id="77" eva="8000262">
    <dp ct="2501151352" cs="X" cpth="Markt Schwaben|Erding"/>
  </s>
  <s id="88" eva="8000262">
    <ar ct="2501151355"/>
  </s>
</timetable>`;

export const EMPTY_TIMETABLE_XML = `<?xml version='1.0' encoding='UTF-8'?>
<timetable station="München Ost"/>`;

export const GATEWAY_HTML = "<html><body>Gateway error</body></html>";
