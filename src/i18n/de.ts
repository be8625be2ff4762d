import type { Translations } from "./translation";

const translations: Translations = {
  at: " um ",
  platform: "Gl.",
  cancelled: "Fällt aus",
  departuresFrom: (station) => `Abfahrten ab ${station}`,
  noDepartures: (minutes) => `Keine Abfahrten in den nächsten ${minutes} Minuten.`,
  liveUnavailable: "Live-Daten vorübergehend nicht verfügbar. Es werden nur Planzeiten angezeigt.",
};

export default translations;
