/**
 * services/scheduler.ts — Bounded detail-fetch pool
 *
 * Each task borrows one exclusively owned resource (a browser tab) from a
 * fixed pool and gives it back on every exit path. p-limit caps the number of
 * tasks in flight at the pool size; results are collected in completion order.
 */
import pLimit from 'p-limit';
import { childLogger } from '../shared/logger.ts';
import { errorMessage } from '../shared/outcome.ts';

export class ResourcePool<T> {
  private readonly idle: T[];
  private readonly waiters: Array<(resource: T) => void> = [];
  readonly size: number;

  constructor(resources: readonly T[]) {
    if (resources.length === 0) throw new Error('ResourcePool needs at least one resource');
    this.idle = [...resources];
    this.size = resources.length;
  }

  get available(): number {
    return this.idle.length;
  }

  /** Resolves once a resource is free; waiters are served first come, first served. */
  acquire(): Promise<T> {
    const resource = this.idle.pop();
    if (resource !== undefined) return Promise.resolve(resource);
    return new Promise<T>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(resource: T): void {
    const next = this.waiters.shift();
    if (next) next(resource);
    else this.idle.push(resource);
  }

  /** acquire → fn → release, even when fn throws */
  async use<R>(fn: (resource: T) => Promise<R>): Promise<R> {
    const resource = await this.acquire();
    try {
      return await fn(resource);
    } finally {
      this.release(resource);
    }
  }
}

export interface TaskFailure<I> {
  item: I;
  message: string;
}

export interface ScheduleReport<I, R> {
  results: R[];            // completion order
  filtered: number;        // tasks that returned null
  failures: TaskFailure<I>[];
  attempted: number;
}

export interface ScheduleOptions {
  /** Process at most this many backlog items; 0 or undefined = all */
  maxItems?: number;
}

/**
 * Run task over the backlog with at most pool.size tasks in flight.
 * A task returning null is filtered; a task that throws is recorded as a
 * failure and the run carries on.
 */
export async function runBounded<I, T, R>(
  backlog: readonly I[],
  pool: ResourcePool<T>,
  task: (item: I, resource: T) => Promise<R | null>,
  options: ScheduleOptions = {},
): Promise<ScheduleReport<I, R>> {
  const log = childLogger({ module: 'scheduler' });
  const items = options.maxItems ? backlog.slice(0, options.maxItems) : [...backlog];
  const limit = pLimit(pool.size);
  const report: ScheduleReport<I, R> = { results: [], filtered: 0, failures: [], attempted: items.length };
  let done = 0;

  await Promise.all(items.map((item) => limit(async () => {
    try {
      const result = await pool.use((resource) => task(item, resource));
      if (result === null) report.filtered++;
      else report.results.push(result);
    } catch (err) {
      report.failures.push({ item, message: errorMessage(err) });
      log.warn({ err }, 'Detail task failed');
    } finally {
      done++;
      if (done % 100 === 0) log.info(`Progress: ${done}/${items.length} processed`);
    }
  })));

  return report;
}
