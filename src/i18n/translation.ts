import de from "./de";
import en from "./en";
import uk from "./uk";

export type Translations = {
  /** Joins "S2 → Erding" and the departure time */
  at: string;
  platform: string;
  cancelled: string;
  departuresFrom: (station: string) => string;
  noDepartures: (lookaheadMinutes: number) => string;
  liveUnavailable: string;
};

export type Language = "en" | "de" | "uk";

export const translations: Record<Language, Translations> = { en, de, uk };

export const getTranslations = (language: Language = "en"): Translations => translations[language];
