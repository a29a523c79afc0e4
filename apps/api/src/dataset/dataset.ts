// Dataset model: ECB days sorted ascending plus the lookups the rates endpoints need.
import { EUR } from '@exchangerates/shared';

export interface Day {
  date: string; // YYYY-MM-DD
  rates: Record<string, number>; // units per 1 EUR, EUR included
}

export interface Dataset {
  days: Day[];
  currencies: string[];
  fetchedAt: string;
}

export const EMPTY_DATASET: Dataset = { days: [], currencies: [], fetchedAt: new Date(0).toISOString() };

export function sortDays(days: Day[]): Day[] {
  const byDate = new Map<string, Day>();
  for (const d of days) byDate.set(d.date, d);
  return [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

export function buildDataset(days: Day[], fetchedAt: Date | string): Dataset {
  const sorted = sortDays(days);
  const symbols = new Set<string>();
  for (const d of sorted) for (const c of Object.keys(d.rates)) symbols.add(c);
  if (sorted.length) symbols.add(EUR);
  return {
    days: sorted,
    currencies: [...symbols].sort(),
    fetchedAt: typeof fetchedAt === 'string' ? fetchedAt : fetchedAt.toISOString(),
  };
}

export function timeframeOf(ds: Dataset): [string, string] | null {
  if (!ds.days.length) return null;
  return [ds.days[0].date, ds.days[ds.days.length - 1].date];
}

export function lastDate(ds: Dataset): string | null {
  return ds.days.length ? ds.days[ds.days.length - 1].date : null;
}

export function datasetVersion(ds: Dataset): string {
  return `${lastDate(ds) ?? 'empty'}@${ds.fetchedAt}`;
}

export function hasCurrency(ds: Dataset, code: string): boolean {
  let lo = 0;
  let hi = ds.currencies.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const c = ds.currencies[mid];
    if (c === code) return true;
    if (c < code) lo = mid + 1;
    else hi = mid - 1;
  }
  return false;
}

/** Binary search by date. `index` is the match, or where the date would be inserted. */
export function searchDay(days: Day[], date: string): { found: boolean; index: number } {
  let lo = 0;
  let hi = days.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (days[mid].date < date) lo = mid + 1;
    else hi = mid;
  }
  return { found: lo < days.length && days[lo].date === date, index: lo };
}

/**
 * Index of the day to serve for `date`: the day itself, else the last
 * publication before it. Dates before the dataset snap to the first day.
 * -1 only when there are no days at all.
 */
export function indexOnOrBefore(days: Day[], date: string): number {
  if (!days.length) return -1;
  const { found, index } = searchDay(days, date);
  if (found) return index;
  return Math.max(index - 1, 0);
}

export function mergeDays(current: Dataset, incoming: Day[], fetchedAt: Date): { dataset: Dataset; added: number } {
  const last = lastDate(current);
  const fresh = sortDays(incoming).filter(d => last === null || d.date > last);
  if (!fresh.length) return { dataset: current, added: 0 };
  return { dataset: buildDataset([...current.days, ...fresh], fetchedAt), added: fresh.length };
}

/** True when a weekday lies strictly between two dates, i.e. a publication the ECB may have made. */
export function missesWorkingDay(after: string, before: string): boolean {
  const end = Date.parse(`${before}T00:00:00Z`);
  for (let t = Date.parse(`${after}T00:00:00Z`) + 86_400_000; t < end; t += 86_400_000) {
    const weekday = new Date(t).getUTCDay();
    if (weekday !== 0 && weekday !== 6) return true;
  }
  return false;
}
