/**
 * Comparable form of a station name: diacritics stripped, lowercased,
 * whitespace collapsed ("  München   Hbf" -> "munchen hbf").
 */
export const normalizeStationName = (name: string): string =>
  name
    .normalize("NFKD")
    .replace(/\p{M}/gu, "")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim();
