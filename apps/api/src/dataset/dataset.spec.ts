import {
  buildDataset,
  datasetVersion,
  Day,
  EMPTY_DATASET,
  hasCurrency,
  indexOnOrBefore,
  mergeDays,
  missesWorkingDay,
  searchDay,
  timeframeOf,
} from './dataset';

const day = (date: string, rates: Record<string, number>): Day => ({ date, rates: { EUR: 1, ...rates } });

// Thu, Fri, then Mon: no publication on the weekend
const days = [
  day('2024-03-14', { USD: 1.0925 }),
  day('2024-03-15', { USD: 1.089, JPY: 162.09 }),
  day('2024-03-18', { USD: 1.0882, GBP: 0.8552 }),
];

describe('buildDataset', () => {
  it('sorts days, drops duplicate dates and collects sorted currencies', () => {
    const ds = buildDataset([days[2], days[0], days[1], day('2024-03-14', { USD: 1.1 })], '2024-03-18T16:00:00.000Z');

    expect(ds.days.map(d => d.date)).toEqual(['2024-03-14', '2024-03-15', '2024-03-18']);
    expect(ds.days[0].rates.USD).toBe(1.1);
    expect(ds.currencies).toEqual(['EUR', 'GBP', 'JPY', 'USD']);
    expect(ds.fetchedAt).toBe('2024-03-18T16:00:00.000Z');
  });

  it('builds an empty dataset without currencies', () => {
    const ds = buildDataset([], new Date('2024-03-18T16:00:00Z'));
    expect(ds.currencies).toEqual([]);
    expect(timeframeOf(ds)).toBeNull();
  });
});

describe('lookups', () => {
  const ds = buildDataset(days, '2024-03-18T16:00:00.000Z');

  it('reports the timeframe and version', () => {
    expect(timeframeOf(ds)).toEqual(['2024-03-14', '2024-03-18']);
    expect(datasetVersion(ds)).toBe('2024-03-18@2024-03-18T16:00:00.000Z');
    expect(datasetVersion(EMPTY_DATASET)).toBe('empty@1970-01-01T00:00:00.000Z');
  });

  it('knows its currencies', () => {
    expect(hasCurrency(ds, 'JPY')).toBe(true);
    expect(hasCurrency(ds, 'EUR')).toBe(true);
    expect(hasCurrency(ds, 'CHF')).toBe(false);
  });

  it('binary searches dates', () => {
    expect(searchDay(ds.days, '2024-03-15')).toEqual({ found: true, index: 1 });
    expect(searchDay(ds.days, '2024-03-16')).toEqual({ found: false, index: 2 });
    expect(searchDay(ds.days, '2024-04-01')).toEqual({ found: false, index: 3 });
  });

  it('serves the previous publication for days without one', () => {
    expect(indexOnOrBefore(ds.days, '2024-03-15')).toBe(1);
    expect(indexOnOrBefore(ds.days, '2024-03-17')).toBe(1);
    expect(indexOnOrBefore(ds.days, '2030-01-01')).toBe(2);
  });

  it('snaps dates before the dataset to the first day', () => {
    expect(indexOnOrBefore(ds.days, '1999-01-01')).toBe(0);
    expect(indexOnOrBefore([], '2024-03-15')).toBe(-1);
  });
});

describe('mergeDays', () => {
  const ds = buildDataset(days.slice(0, 2), '2024-03-15T16:00:00.000Z');
  const now = new Date('2024-03-18T16:05:00.000Z');

  it('appends only days after the current last day', () => {
    const { dataset, added } = mergeDays(ds, [day('2024-03-15', { USD: 9 }), days[2]], now);

    expect(added).toBe(1);
    expect(dataset.days.map(d => d.date)).toEqual(['2024-03-14', '2024-03-15', '2024-03-18']);
    expect(dataset.days[1].rates.USD).toBe(1.089);
    expect(dataset.currencies).toEqual(['EUR', 'GBP', 'JPY', 'USD']);
    expect(dataset.fetchedAt).toBe('2024-03-18T16:05:00.000Z');
  });

  it('returns the same dataset when nothing is new', () => {
    const { dataset, added } = mergeDays(ds, [days[0]], now);
    expect(added).toBe(0);
    expect(dataset).toBe(ds);
  });
});

describe('missesWorkingDay', () => {
  it('ignores weekends between publications', () => {
    expect(missesWorkingDay('2024-03-15', '2024-03-18')).toBe(false);
    expect(missesWorkingDay('2024-03-15', '2024-03-16')).toBe(false);
    expect(missesWorkingDay('2024-03-15', '2024-03-15')).toBe(false);
  });

  it('reports a skipped weekday', () => {
    expect(missesWorkingDay('2024-03-14', '2024-03-18')).toBe(true);
    expect(missesWorkingDay('2023-01-02', '2024-03-15')).toBe(true);
  });
});
