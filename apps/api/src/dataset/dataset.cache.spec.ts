import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { configFor, day } from '../../test/helpers';
import { CACHE_FILE, DatasetCache } from './dataset.cache';
import { buildDataset } from './dataset';

describe('DatasetCache', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'exchangerates-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const dataset = buildDataset(
    [day('2024-03-14', { USD: 1.0925 }), day('2024-03-15', { USD: 1.089, JPY: 162.09 })],
    '2024-03-15T16:10:00.000Z',
  );

  it('reads back what it wrote, creating the directory', async () => {
    const cache = new DatasetCache(configFor({ DATA_DIR: join(dir, 'nested') }));

    await cache.write(dataset);

    expect(cache.file).toBe(join(dir, 'nested', CACHE_FILE));
    await expect(cache.read()).resolves.toEqual(dataset);
  });

  it('treats a missing file as no cache', async () => {
    const cache = new DatasetCache(configFor({ DATA_DIR: dir }));
    await expect(cache.read()).resolves.toBeNull();
  });

  it('ignores corrupt and invalid files', async () => {
    const cache = new DatasetCache(configFor({ DATA_DIR: dir }));

    await writeFile(join(dir, CACHE_FILE), '{"fetchedAt":');
    await expect(cache.read()).resolves.toBeNull();

    await writeFile(
      join(dir, CACHE_FILE),
      JSON.stringify({ fetchedAt: '2024-03-15T16:10:00.000Z', days: [{ date: '2024-03-15', rates: { usd: 1 } }] }),
    );
    await expect(cache.read()).resolves.toBeNull();
  });

  it('does nothing when disabled', async () => {
    const cache = new DatasetCache(configFor({ DATA_DIR: dir, DATASET_CACHE_ENABLED: 'false' }));

    await cache.write(dataset);

    await expect(readFile(join(dir, CACHE_FILE), 'utf8')).rejects.toThrow('ENOENT');
    await expect(cache.read()).resolves.toBeNull();
  });

  it('survives an unwritable directory', async () => {
    await writeFile(join(dir, 'blocked'), 'a file, not a directory');
    const cache = new DatasetCache(configFor({ DATA_DIR: join(dir, 'blocked') }));

    await expect(cache.write(dataset)).resolves.toBeUndefined();
  });

  it('leaves no temporary file behind when the final rename fails', async () => {
    await mkdir(join(dir, CACHE_FILE, 'occupied'), { recursive: true });
    const cache = new DatasetCache(configFor({ DATA_DIR: dir }));

    await expect(cache.write(dataset)).resolves.toBeUndefined();

    expect(await readdir(dir)).toEqual([CACHE_FILE]);
  });
});
