// Turning EUR-based ECB rates into rates against any base currency
import { EUR } from '@exchangerates/shared';
import { Dataset, Day, hasCurrency } from '../dataset/dataset';
import { CurrenciesNotFoundException } from './rates.errors';

export interface ConversionParams {
  from?: string;
  to?: string[];
}

export interface Conversion {
  from: string;
  to: string[]; // empty: every currency
}

export function resolveConversion(params: ConversionParams, ds: Dataset): Conversion {
  const from = params.from ?? EUR;
  if (!hasCurrency(ds, from)) throw new CurrenciesNotFoundException([from]);

  const to = params.to ?? [];
  const missing = to.filter(c => !hasCurrency(ds, c));
  if (missing.length) throw new CurrenciesNotFoundException(missing);

  return { from, to };
}

/** Rates of `day` against `from`, one entry per dataset currency. null when the day has no `from` rate. */
export function convertDay(day: Day, from: string, currencies: string[]): Record<string, number | null> | null {
  const base = day.rates[from];
  if (base === undefined) return null;

  const out: Record<string, number | null> = {};
  for (const c of currencies) {
    const r = day.rates[c];
    out[c] = r === undefined ? null : c === from ? 1 : r / base;
  }
  return out;
}

export function filterRates(rates: Record<string, number | null>, to: string[]): Record<string, number | null> {
  if (!to.length) return rates;
  const wanted = new Set(to);
  const out: Record<string, number | null> = {};
  for (const [c, r] of Object.entries(rates)) if (wanted.has(c)) out[c] = r;
  return out;
}
