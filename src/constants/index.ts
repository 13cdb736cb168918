/**
 * Reply sent when a turn cannot be answered at all
 */
export const APOLOGY_RESPONSE: Readonly<Record<string, string>> = {
  en: "Sorry, something went wrong on my side. Could you say that again?",
  es: "Lo siento, algo ha fallado por mi parte. ¿Puedes repetirlo?",
  fr: "Désolé, quelque chose s'est mal passé de mon côté. Pouvez-vous répéter ?",
  de: "Entschuldigung, bei mir ist etwas schiefgelaufen. Kannst du das wiederholen?",
  ca: "Ho sento, alguna cosa ha fallat per part meva. Ho pots repetir?",
  ru: "Извините, у меня что-то пошло не так. Повторите, пожалуйста.",
};

/**
 * Persona used when no persona file can be read
 */
export const DEFAULT_PERSONA =
  "You are a friendly local guide. Answer briefly and helpfully. Language: {{lang}}.";

/**
 * Heading of the proverb line appended to free-form replies
 */
export const PROVERB_LABEL = "Refrany";

/**
 * Heading of the proverb's rendering, by reply language. Catalan readers get
 * the English one.
 */
export const TRANSLATION_LABELS: Readonly<Record<string, string>> = {
  en: "Translation",
  es: "Traducción",
  fr: "Traduction",
  de: "Übersetzung",
  it: "Traduzione",
  pt: "Tradução",
  ru: "Перевод",
  ca: "Traducció (EN)",
};
