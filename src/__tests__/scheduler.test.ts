import { describe, it, expect } from 'vitest';
import { ResourcePool, runBounded } from '../services/scheduler.ts';

const tick = () => new Promise<void>((r) => setTimeout(r, 1));

describe('ResourcePool', () => {
  it('rejects an empty pool', () => {
    expect(() => new ResourcePool<string>([])).toThrow('ResourcePool needs at least one resource');
  });

  it('suspends acquire until a resource is released', async () => {
    const pool = new ResourcePool(['tab-1']);
    const first = await pool.acquire();
    expect(pool.available).toBe(0);

    let second: string | undefined;
    const waiting = pool.acquire().then((r) => { second = r; });
    await tick();
    expect(second).toBeUndefined();

    pool.release(first);
    await waiting;
    expect(second).toBe('tab-1');
    expect(pool.available).toBe(0);

    pool.release('tab-1');
    expect(pool.available).toBe(1);
  });

  it('releases when the task throws', async () => {
    const pool = new ResourcePool(['tab-1', 'tab-2']);
    await expect(pool.use(async () => { throw new Error('page crashed'); })).rejects.toThrow('page crashed');
    expect(pool.available).toBe(2);
  });
});

describe('runBounded', () => {
  it('never runs more tasks than there are resources', async () => {
    const pool = new ResourcePool(['a', 'b', 'c']);
    const holders = new Set<string>();
    let inFlight = 0;
    let peak = 0;

    const report = await runBounded(Array.from({ length: 20 }, (_, i) => i), pool, async (item, tab) => {
      expect(holders.has(tab)).toBe(false);
      holders.add(tab);
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick();
      inFlight--;
      holders.delete(tab);
      return item * 2;
    });

    expect(peak).toBeLessThanOrEqual(3);
    expect(report.attempted).toBe(20);
    expect(report.results).toHaveLength(20);
    expect([...report.results].sort((a, b) => a - b)).toEqual(Array.from({ length: 20 }, (_, i) => i * 2));
    expect(pool.available).toBe(3);
  });

  it('counts filtered tasks and records failures without stopping', async () => {
    const pool = new ResourcePool(['a', 'b']);
    const report = await runBounded(['keep', 'drop', 'boom', 'keep-too'], pool, async (item) => {
      if (item === 'drop') return null;
      if (item === 'boom') throw new Error('detail page timed out');
      return item.toUpperCase();
    });

    expect(report.results.sort()).toEqual(['KEEP', 'KEEP-TOO']);
    expect(report.filtered).toBe(1);
    expect(report.failures).toEqual([{ item: 'boom', message: 'detail page timed out' }]);
    expect(pool.available).toBe(2);
  });

  it('caps the backlog at maxItems', async () => {
    const pool = new ResourcePool([0]);
    const seen: number[] = [];
    const report = await runBounded([5, 6, 7, 8], pool, async (item) => {
      seen.push(item);
      return item;
    }, { maxItems: 2 });

    expect(report.attempted).toBe(2);
    expect(seen).toEqual([5, 6]);
  });

  it('treats maxItems 0 as no cap', async () => {
    const pool = new ResourcePool([0]);
    const report = await runBounded([1, 2, 3], pool, async (item) => item, { maxItems: 0 });
    expect(report.results).toEqual([1, 2, 3]);
  });
});
