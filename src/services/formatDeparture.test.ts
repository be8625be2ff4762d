import { describe, expect, it } from "vitest";
import { at, stop } from "../test/helpers";
import { escapeHtml, formatBoard, formatDeparture } from "./formatDeparture";

const onTime = stop("42", { plannedTime: at(13, 36), plannedPlatform: "4", destination: "Erding" });

describe("formatDeparture", () => {
  it("renders an on-time departure", () => {
    expect(formatDeparture(onTime)).toBe("S2 → Erding at 13:36, Pl. 4");
  });

  it("strikes through the planned time when the live time differs", () => {
    const delayed = { ...onTime, liveTime: at(13, 41), livePlatform: "4" };

    expect(formatDeparture(delayed)).toBe("S2 → Erding at <s>13:36</s> 13:41, Pl. 4");
  });

  it("shows a single time when live equals planned", () => {
    expect(formatDeparture({ ...onTime, liveTime: at(13, 36) })).toBe("S2 → Erding at 13:36, Pl. 4");
  });

  it("shows a platform change", () => {
    expect(formatDeparture({ ...onTime, livePlatform: "5" })).toBe("S2 → Erding at 13:36, Pl. 4 → 5");
  });

  it("uses the live platform when no planned one is known", () => {
    expect(formatDeparture(stop("1", { liveTime: at(9, 5), livePlatform: "1" }))).toBe("S2 → — at 09:05, Pl. 1");
  });

  it("falls back to the mode category and a dash", () => {
    expect(formatDeparture(stop("1", { lineLabel: "" }))).toBe("S → —");
  });

  it("marks cancelled departures", () => {
    const cancelled = stop("99", { plannedTime: at(14, 0), destination: "Erding", cancelled: true });

    expect(formatDeparture(cancelled)).toBe("<s>S2 → Erding at 14:00</s>  Cancelled");
  });

  it("escapes markup in feed values", () => {
    const event = stop("1", { destination: "Riem <Messe> & \"Ost\"", plannedPlatform: "1'a" });

    expect(formatDeparture(event)).toBe("S2 → Riem &lt;Messe&gt; &amp; &quot;Ost&quot;, Pl. 1&#x27;a");
  });

  it("renders times in the requested zone", () => {
    expect(formatDeparture(onTime, { timezone: "UTC" })).toBe("S2 → Erding at 12:36, Pl. 4");
  });

  it("localizes labels", () => {
    expect(formatDeparture({ ...onTime, livePlatform: "5" }, { language: "de" })).toBe(
      "S2 → Erding um 13:36, Gl. 4 → 5"
    );
    expect(formatDeparture({ ...onTime, cancelled: true }, { language: "uk" })).toBe(
      "<s>S2 → Erding о 13:36, Пл. 4</s>  Скасовано"
    );
  });
});

describe("formatBoard", () => {
  it("lists the departures under a bold header", () => {
    const board = { events: [onTime, stop("50", { lineLabel: "S8", plannedTime: at(13, 45) })], liveDataOk: true };

    expect(formatBoard("München Ost", board)).toBe(
      "<b>Departures from München Ost</b>\nS2 → Erding at 13:36, Pl. 4\nS8 → — at 13:45"
    );
  });

  it("names the line filter in the header", () => {
    expect(formatBoard("München Ost", { events: [onTime], liveDataOk: true }, { lineFilter: "S2" })).toBe(
      "<b>Departures from München Ost — S2</b>\nS2 → Erding at 13:36, Pl. 4"
    );
  });

  it("notes when live data is missing", () => {
    expect(formatBoard("Erding", { events: [onTime], liveDataOk: false })).toBe(
      "<b>Departures from Erding</b>\nS2 → Erding at 13:36, Pl. 4\n\n" +
        "Live updates are temporarily unavailable. Showing planned times only."
    );
  });

  it("says so when the window is empty", () => {
    expect(formatBoard("Erding", { events: [], liveDataOk: true }, { lookaheadMinutes: 30, language: "de" })).toBe(
      "<b>Abfahrten ab Erding</b>\nKeine Abfahrten in den nächsten 30 Minuten."
    );
  });
});

describe("escapeHtml", () => {
  it("leaves plain text alone", () => {
    expect(escapeHtml("Flughafen München")).toBe("Flughafen München");
  });
});
