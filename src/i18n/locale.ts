export type AppLocale = "ar" | "en";

export const DEFAULT_LOCALE: AppLocale = "ar";

export function normalizeLocale(input: unknown): AppLocale {
  const raw = String(input || "").trim().toLowerCase();
  if (!raw) return DEFAULT_LOCALE;
  if (raw === "en" || raw.startsWith("en-") || raw.startsWith("en,")) return "en";
  if (raw === "ar" || raw.startsWith("ar-") || raw.startsWith("ar,")) return "ar";
  return DEFAULT_LOCALE;
}

export type Localized = Record<AppLocale, string>;

export function pickLocalized(text: Localized, locale?: string | null): string {
  return text[normalizeLocale(locale)];
}
