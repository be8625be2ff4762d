import { DateTime } from "luxon";
import type { StopEvent } from "../types/departure";
import { attr, child, childList, parseXmlToObject, type XmlObject } from "./xml";

// =============================================================================
// DB Timetables API - documents and parsing
// =============================================================================
//
//   - plan:  /plan/{evaNo}/{YYMMDD}/{HH}   planned stops for one hour
//   - fchg:  /fchg/{evaNo}                 all known changes for the station
//   Docs: https://developers.deutschebahn.com/db-api-marketplace/apis/product/timetables
//
// Both documents are <timetable> elements holding <s> (stop) elements that
// share the same id scheme.
// =============================================================================

// Trip label (<tl>); f, t and o (filter, trip type, operator) are not read
type DBTripLabelRaw = {
  c?: string; // category (S, RE, ICE, ...)
  n?: string; // trip number
};

// Departure (<dp>)
type DBEventRaw = {
  pt?: string; // planned time (YYMMDDHHMM)
  ct?: string; // changed time
  pp?: string; // planned platform
  cp?: string; // changed platform
  cs?: string; // changed status (c = cancelled)
  l?: string; // line
  ppth?: string; // planned path, pipe-separated, destination last
  cpth?: string; // changed path
};

export type TimetableParseOptions = {
  /** Zone the compact timestamps are expressed in */
  timezone: string;
  /** Category of the served mode, e.g. "S" */
  modeCategory: string;
  /** Lowercase dp@cs values meaning "cancelled" */
  cancelledFlags?: string[];
};

const readTripLabel = (node?: XmlObject): DBTripLabelRaw | undefined =>
  node && {
    c: attr(node, "c"),
    n: attr(node, "n"),
  };

const readEvent = (node: XmlObject): DBEventRaw => ({
  pt: attr(node, "pt"),
  ct: attr(node, "ct"),
  pp: attr(node, "pp"),
  cp: attr(node, "cp"),
  cs: attr(node, "cs"),
  l: attr(node, "l"),
  ppth: attr(node, "ppth"),
  cpth: attr(node, "cpth"),
});

// =============================================================================
// Field helpers
// =============================================================================

const COMPACT_TIME = /^(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})/;

/**
 * Decode a Timetables timestamp (YYMMDDHHMM) as civil time in `zone`.
 * Missing, short or impossible codes give undefined.
 */
export const parseTimetableTime = (code: string | undefined, zone: string): DateTime | undefined => {
  if (!code || code.length < 10) return undefined;
  const match = COMPACT_TIME.exec(code);
  if (!match) return undefined;

  const [, yy, mm, dd, hh, min] = match;
  const time = DateTime.fromObject(
    {
      year: 2000 + Number(yy),
      month: Number(mm),
      day: Number(dd),
      hour: Number(hh),
      minute: Number(min),
    },
    { zone }
  );
  return time.isValid ? time : undefined;
};

/**
 * Date and hour path segments for /plan, in the network's civil time
 */
export const formatTimetableDateHour = (time: DateTime, zone: string): { dateStr: string; hourStr: string } => {
  const local = time.setZone(zone);
  return { dateStr: local.toFormat("yyMMdd"), hourStr: local.toFormat("HH") };
};

const BARE_LINE_NUMBER = /^\d+[A-Z]?$/;

/**
 * Line designator shared by plan and change parsing, so both sides of the
 * merge agree on it.
 *
 * dp@l wins ("2" -> "S2", "s8" -> "S8"); otherwise the trip label's category
 * and number are used. Empty when the row carries neither.
 */
export const normalizeLineLabel = (
  tl: DBTripLabelRaw | undefined,
  dp: DBEventRaw | undefined,
  modeCategory: string
): string => {
  const mode = modeCategory.toUpperCase();
  const line = (dp?.l ?? "").trim().toUpperCase();
  if (line) {
    return BARE_LINE_NUMBER.test(line) ? `${mode}${line}` : line;
  }

  if (!tl) return "";
  const category = (tl.c ?? "").trim().toUpperCase();
  const number = (tl.n ?? "").trim();

  if (category === mode) {
    const cleaned = number.toUpperCase().replace(/[^0-9A-Z]/g, "");
    if (!cleaned) return mode;
    return cleaned.startsWith(mode) ? cleaned : `${mode}${cleaned}`;
  }
  if (category && number) return `${category} ${number}`;
  return category;
};

/**
 * Final destination from a pipe-separated path ("A|B|C" -> "C")
 */
export const extractDestinationFromPath = (path?: string): string | undefined => {
  if (!path) return undefined;
  const stations = path
    .split("|")
    .map((name) => name.trim())
    .filter(Boolean);
  return stations.length > 0 ? stations[stations.length - 1] : undefined;
};

const isCancelled = (status: string | undefined, flags: string[]): boolean =>
  Boolean(status) && flags.includes((status ?? "").trim().toLowerCase());

const timetableStops = (xml: string): XmlObject[] => {
  const doc = parseXmlToObject(xml);
  if (doc.timetable === undefined) {
    const [root = ""] = Object.keys(doc);
    throw new Error(`Unexpected document root <${root}>, expected <timetable>`);
  }
  return childList(doc.timetable, "s");
};

// =============================================================================
// Document parsing
// =============================================================================

/**
 * Parse a /plan document. Keeps departures of the served mode only; other
 * categories and arrival-only rows are dropped. Throws on malformed XML
 * and on documents that are not a <timetable>.
 */
export const parsePlanDocument = (xml: string, options: TimetableParseOptions): StopEvent[] => {
  const mode = options.modeCategory.toUpperCase();
  const events: StopEvent[] = [];

  for (const stop of timetableStops(xml)) {
    const id = attr(stop, "id");
    if (!id) continue;

    const tl = readTripLabel(child(stop, "tl"));
    if (!tl || (tl.c ?? "").toUpperCase() !== mode) continue;

    const dpNode = child(stop, "dp");
    if (!dpNode) continue;
    const dp = readEvent(dpNode);

    events.push({
      id,
      lineLabel: normalizeLineLabel(tl, dp, mode),
      plannedTime: parseTimetableTime(dp.pt, options.timezone),
      plannedPlatform: dp.pp,
      destination: extractDestinationFromPath(dp.ppth),
      cancelled: false,
    });
  }

  return events;
};

/**
 * Parse a /fchg document into change records keyed by stop id.
 * Throws on malformed XML and on documents that are not a <timetable>.
 */
export const parseChangesDocument = (xml: string, options: TimetableParseOptions): Map<string, StopEvent> => {
  const flags = options.cancelledFlags ?? [];
  const changes = new Map<string, StopEvent>();

  for (const stop of timetableStops(xml)) {
    const id = attr(stop, "id");
    if (!id) continue;

    const dpNode = child(stop, "dp");
    if (!dpNode) continue;
    const dp = readEvent(dpNode);
    const tl = readTripLabel(child(stop, "tl"));

    changes.set(id, {
      id,
      lineLabel: normalizeLineLabel(tl, dp, options.modeCategory),
      plannedTime: parseTimetableTime(dp.pt, options.timezone),
      liveTime: parseTimetableTime(dp.ct, options.timezone),
      plannedPlatform: dp.pp,
      livePlatform: dp.cp,
      destination: extractDestinationFromPath(dp.cpth) ?? extractDestinationFromPath(dp.ppth),
      cancelled: isCancelled(dp.cs, flags),
    });
  }

  return changes;
};
