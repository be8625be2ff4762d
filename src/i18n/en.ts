import type { Translations } from "./translation";

const translations: Translations = {
  at: " at ",
  platform: "Pl.",
  cancelled: "Cancelled",
  departuresFrom: (station) => `Departures from ${station}`,
  noDepartures: (minutes) => `No departures in the next ${minutes} minutes.`,
  liveUnavailable: "Live updates are temporarily unavailable. Showing planned times only.",
};

export default translations;
