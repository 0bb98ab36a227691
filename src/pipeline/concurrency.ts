/** Wall-clock figures for a batch of typesetting runs, in milliseconds. */
export interface TimingSummary {
  count: number;
  totalMs: number;
  averageMs: number;
  minMs: number;
  maxMs: number;
  /** Nearest-rank 95th percentile. */
  p95Ms: number;
}

/** The run's abort signal fired before the next section or job started. */
export class RunCancelledError extends Error {
  constructor(reason?: unknown) {
    super(reason instanceof Error ? reason.message : 'Run was cancelled.');
    this.name = 'RunCancelledError';
  }
}

export interface LimitOptions {
  signal?: AbortSignal;
}

/**
 * Map `items` through `task` with at most `limit` tasks in flight.
 * Lanes pull from one shared cursor; results land at their item's index.
 * Once the signal fires no further task starts and the call rejects with
 * `RunCancelledError` after the tasks already running settle.
 */
export async function mapWithLimit<TItem, TResult>(
  items: readonly TItem[],
  limit: number,
  task: (item: TItem, index: number) => Promise<TResult>,
  options: LimitOptions = {}
): Promise<TResult[]> {
  const results: TResult[] = [];
  const cursor = items.entries();

  const lane = async (): Promise<void> => {
    for (const [index, item] of cursor) {
      throwIfCancelled(options.signal);
      results[index] = await task(item, index);
    }
  };

  const lanes = Array.from({ length: laneCount(limit, items.length) }, lane);
  await Promise.all(lanes);
  return results;
}

/** Throw `RunCancelledError` when the signal has fired. */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RunCancelledError(signal.reason);
  }
}

export function summarizeTimings(durationsMs: readonly number[]): TimingSummary {
  const sorted = durationsMs.filter((value) => Number.isFinite(value) && value >= 0).sort((left, right) => left - right);
  const count = sorted.length;
  if (count === 0) {
    return { count: 0, totalMs: 0, averageMs: 0, minMs: 0, maxMs: 0, p95Ms: 0 };
  }

  const totalMs = sorted.reduce((sum, value) => sum + value, 0);
  const at = (rank: number): number => sorted[Math.min(count, Math.max(1, rank)) - 1] ?? 0;

  return {
    count,
    totalMs,
    averageMs: totalMs / count,
    minMs: at(1),
    maxMs: at(count),
    p95Ms: at(Math.ceil(count * 0.95))
  };
}

/** Non-finite or sub-1 limits run one lane; never more lanes than items. */
function laneCount(limit: number, itemCount: number): number {
  const lanes = Number.isFinite(limit) ? Math.floor(limit) : 1;
  return Math.min(Math.max(lanes, 1), itemCount);
}
