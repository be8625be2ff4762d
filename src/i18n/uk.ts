import type { Translations } from "./translation";

const translations: Translations = {
  at: " о ",
  platform: "Пл.",
  cancelled: "Скасовано",
  departuresFrom: (station) => `Відправлення зі станції ${station}`,
  noDepartures: (minutes) => `Відправлень у найближчі ${minutes} хвилин немає.`,
  liveUnavailable: "Дані в реальному часі тимчасово недоступні. Показано лише планові часи.",
};

export default translations;
