import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { BatchLoader } from '../batch-loader';

describe('BatchLoader', () => {
  let dir: string;
  let filePath: string;
  let loader: BatchLoader;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'kpi-loader-'));
    filePath = join(dir, 'daily-transactions.csv');
    writeFileSync(filePath, 'Date,Billed Charges\n2025-01-10,100\n');
    loader = new BatchLoader();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should return the cached batch while the file is unchanged', () => {
    const first = loader.load(filePath);
    const second = loader.load(filePath);

    expect(second).toBe(first);
    expect(loader.getStats()).toEqual({ hits: 1, misses: 1, cached: 1 });
  });

  it('should reload when the file changes', () => {
    const first = loader.load(filePath);
    writeFileSync(filePath, 'Date,Billed Charges\n2025-01-10,100\n2025-01-11,250\n');

    const second = loader.load(filePath);

    expect(first.rows).toHaveLength(1);
    expect(second.rows).toHaveLength(2);
    expect(loader.getStats()).toEqual({ hits: 0, misses: 2, cached: 1 });
  });

  it('should cache batches per requested name', () => {
    const named = loader.load(filePath, { name: 'transactions' });
    const unnamed = loader.load(filePath);

    expect(named.name).toBe('transactions');
    expect(unnamed.name).toBe('daily-transactions.csv');
    expect(loader.getStats().cached).toBe(2);
  });

  it('should start over after clear', () => {
    loader.load(filePath);
    loader.clear();

    expect(loader.getStats()).toEqual({ hits: 0, misses: 0, cached: 0 });
  });

  it('should fail when the file does not exist', () => {
    expect(() => loader.load(join(dir, 'missing.csv'))).toThrow();
  });
});
