// =============================================================================
// Departure formatting
// =============================================================================
// Renders stop events as HTML snippets for chat clients that understand
// <s> and <b>:
//
//   S2 → Erding at <s>13:36</s> 13:41, Pl. 4 → 5
//   <s>S8 → Flughafen München at 13:50, Pl. 1</s>  Cancelled

import { getTranslations, type Language } from "../i18n/translation";
import { effectiveTime, type DepartureWindow, type StopEvent } from "../types/departure";

export type FormatOptions = {
  language?: Language;
  /** Zone the times are shown in */
  timezone?: string;
  /** Line label shown when an event has none */
  modeCategory?: string;
};

export type BoardOptions = FormatOptions & {
  lineFilter?: string;
  lookaheadMinutes?: number;
};

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export const escapeHtml = (text: string): string => text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);

const ARROW = " → ";

/**
 * One display line for a stop event
 */
export function formatDeparture(event: StopEvent, options: FormatOptions = {}): string {
  const t = getTranslations(options.language);
  const zone = options.timezone ?? "Europe/Berlin";
  const lineLabel = event.lineLabel || (options.modeCategory ?? "S");
  const destination = event.destination || "—";

  let timeHtml = "";
  const effective = effectiveTime(event);
  if (effective) {
    timeHtml = effective.setZone(zone).toFormat("HH:mm");
    const { plannedTime, liveTime } = event;
    if (plannedTime && liveTime && plannedTime.toMillis() !== liveTime.toMillis()) {
      timeHtml = `<s>${plannedTime.setZone(zone).toFormat("HH:mm")}</s> ${timeHtml}`;
    }
  }

  const planned = event.plannedPlatform ?? "";
  const live = event.livePlatform ?? "";
  let platformHtml = "";
  if (planned && live && planned !== live) {
    platformHtml = `${t.platform} ${escapeHtml(planned)}${ARROW}${escapeHtml(live)}`;
  } else if (live || planned) {
    platformHtml = `${t.platform} ${escapeHtml(live || planned)}`;
  }

  let result = `${escapeHtml(lineLabel)}${ARROW}${escapeHtml(destination)}`;
  if (timeHtml) result += `${t.at}${timeHtml}`;
  if (platformHtml) result += `, ${platformHtml}`;

  if (event.cancelled) {
    return `<s>${result}</s>  ${escapeHtml(t.cancelled)}`;
  }
  return result;
}

/**
 * A whole departure board: bold header, one line per event, and a note when
 * live data was missing.
 */
export function formatBoard(stationName: string, board: DepartureWindow, options: BoardOptions = {}): string {
  const t = getTranslations(options.language);
  const lineSuffix = options.lineFilter ? ` — ${options.lineFilter}` : "";
  const header = `<b>${escapeHtml(t.departuresFrom(stationName) + lineSuffix)}</b>`;

  if (board.events.length === 0) {
    return `${header}\n${escapeHtml(t.noDepartures(options.lookaheadMinutes ?? 60))}`;
  }

  const lines = board.events.map((event) => formatDeparture(event, options));
  const footer = board.liveDataOk ? "" : `\n\n${escapeHtml(t.liveUnavailable)}`;
  return `${header}\n${lines.join("\n")}${footer}`;
}
