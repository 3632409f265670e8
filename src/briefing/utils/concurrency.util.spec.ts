import { SerialQueue, chunkArray, mapWithConcurrency } from './concurrency.util';

describe('concurrency util', () => {
  it('never exceeds the limit and keeps input order', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 10, 20, 5, 15], 2, async (ms) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => {
        setTimeout(resolve, ms);
      });
      inFlight -= 1;
      return ms * 2;
    });

    expect(peak).toBe(2);
    expect(results).toEqual([
      { ok: true, value: 60 },
      { ok: true, value: 20 },
      { ok: true, value: 40 },
      { ok: true, value: 10 },
      { ok: true, value: 30 },
    ]);
  });

  it('reports failures in their slot', async () => {
    const results = await mapWithConcurrency(['a', 'b'], 4, async (item) => {
      if (item === 'b') {
        throw new Error('boom');
      }
      return item;
    });

    expect(results[0]).toEqual({ ok: true, value: 'a' });
    expect(results[1].ok).toBe(false);
  });

  it('splits arrays into chunks', () => {
    expect(chunkArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('runs queued tasks one at a time in order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const task = (name: string, ms: number) => async () => {
      events.push(`start ${name}`);
      await new Promise((resolve) => setTimeout(resolve, ms));
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([
      queue.run(task('a', 20)),
      queue.run(task('b', 0)),
    ]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('keeps going after a task fails', async () => {
    const queue = new SerialQueue();
    const failed = queue.run(async () => {
      throw new Error('write failed');
    });
    const next = queue.run(async () => 'next');

    await expect(failed).rejects.toThrow('write failed');
    await expect(next).resolves.toBe('next');
  });
});
