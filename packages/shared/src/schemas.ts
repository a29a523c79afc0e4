import { z } from 'zod';
import { CURRENCY_CODE, isIsoDate } from './utils';

export const CurrencyCodeSchema = z.string().regex(CURRENCY_CODE, 'expected a three-letter upper-case currency code');

export const IsoDateSchema = z.string().refine(isIsoDate, 'expected a calendar date as YYYY-MM-DD');

export const IndexResponseSchema = z.object({
  currencies: z.array(CurrencyCodeSchema),
  timeframe: z.tuple([IsoDateSchema, IsoDateSchema]),
});

// rates per currency; null where the currency has no rate on that day
export const RatesSchema = z.object({
  date: IsoDateSchema,
  rates: z.record(CurrencyCodeSchema, z.number().positive().nullable()),
});

export const TimeframeResponseSchema = z.object({
  timeframe: z.tuple([IsoDateSchema, IsoDateSchema]),
  rates: z.array(RatesSchema),
});

export const CurrenciesNotFoundSchema = z.object({
  currencies_not_found: z.array(z.string()),
});

export type CurrencyCode = z.infer<typeof CurrencyCodeSchema>;
export type IndexResponse = z.infer<typeof IndexResponseSchema>;
export type Rates = z.infer<typeof RatesSchema>;
export type TimeframeResponse = z.infer<typeof TimeframeResponseSchema>;
export type CurrenciesNotFound = z.infer<typeof CurrenciesNotFoundSchema>;
