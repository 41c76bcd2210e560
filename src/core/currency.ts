import { isCurrency, type Currency } from "./schemas.js";

/** Units of each currency per 1 USD. */
export type CurrencyRates = Readonly<Record<Currency, number>>;

export const BASE_CURRENCY: Currency = "USD";

export const CURRENCY_RATES: CurrencyRates = Object.freeze({
  USD: 1,
  LBP: 89500,
  AED: 3.6725,
  SAR: 3.75,
  EGP: 48.5,
});

/** Codes outside the table are priced as USD instead of being rejected. */
export const UNKNOWN_CURRENCY_POLICY = Object.freeze({ treatAs: BASE_CURRENCY, rate: 1 });

export function roundMoney(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export function rateFor(currency: string | null | undefined, rates: CurrencyRates = CURRENCY_RATES): number {
  const code = String(currency || "").trim().toUpperCase();
  if (!isCurrency(code)) return UNKNOWN_CURRENCY_POLICY.rate;
  const rate = rates[code];
  if (!Number.isFinite(rate) || rate <= 0) return UNKNOWN_CURRENCY_POLICY.rate;
  return rate;
}

export function convertFromUsd(amountUsd: number, currency: string, rates: CurrencyRates = CURRENCY_RATES): number {
  return roundMoney(amountUsd * rateFor(currency, rates));
}

// Unrounded: used as an intermediate before allocation and threshold checks.
export function convertToUsd(amount: number, currency: string, rates: CurrencyRates = CURRENCY_RATES): number {
  return amount / rateFor(currency, rates);
}

export function priceInAllCurrencies(amountUsd: number, rates: CurrencyRates = CURRENCY_RATES): Record<Currency, number> {
  return {
    USD: convertFromUsd(amountUsd, "USD", rates),
    LBP: convertFromUsd(amountUsd, "LBP", rates),
    AED: convertFromUsd(amountUsd, "AED", rates),
    SAR: convertFromUsd(amountUsd, "SAR", rates),
    EGP: convertFromUsd(amountUsd, "EGP", rates),
  };
}
