import { describe, expect, it } from 'vitest';

import { mapWithLimit, RunCancelledError, summarizeTimings } from '../../src/pipeline/concurrency.js';

describe('mapWithLimit', () => {
  it('renders at most two sections at once and returns them in outline order', async () => {
    let inFlight = 0;
    let mostInFlight = 0;
    const renderMs = [5, 1, 4, 2, 3];

    const sections = await mapWithLimit(renderMs, 2, async (delay, index) => {
      inFlight += 1;
      mostInFlight = Math.max(mostInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, delay));
      inFlight -= 1;
      return `section_${index}`;
    });

    expect(sections).toEqual(['section_0', 'section_1', 'section_2', 'section_3', 'section_4']);
    expect(mostInFlight).toBe(2);
  });

  it('falls back to one lane for a zero limit', async () => {
    const started: string[] = [];
    await mapWithLimit(['A', 'B', 'C'], 0, async (id) => {
      started.push(id);
      return id;
    });
    expect(started).toEqual(['A', 'B', 'C']);
  });

  it('returns nothing for an empty outline', async () => {
    expect(await mapWithLimit([], 4, async () => 'unused')).toEqual([]);
  });

  it('stops starting sections after the run is cancelled', async () => {
    const controller = new AbortController();
    const started: string[] = [];

    const run = mapWithLimit(
      ['A', 'B', 'C', 'D'],
      1,
      async (id) => {
        started.push(id);
        if (id === 'B') {
          controller.abort();
        }
        return id;
      },
      { signal: controller.signal }
    );

    await expect(run).rejects.toBeInstanceOf(RunCancelledError);
    expect(started).toEqual(['A', 'B']);
  });
});

describe('summarizeTimings', () => {
  it('reports compile timings with a nearest-rank p95', () => {
    expect(summarizeTimings([20, 4, 16, 8, 12, Number.NaN, -1])).toEqual({
      count: 5,
      totalMs: 60,
      averageMs: 12,
      minMs: 4,
      maxMs: 20,
      p95Ms: 20
    });
    expect(summarizeTimings([])).toEqual({ count: 0, totalMs: 0, averageMs: 0, minMs: 0, maxMs: 0, p95Ms: 0 });
  });
});
