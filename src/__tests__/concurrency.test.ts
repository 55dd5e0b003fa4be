import { mapWithConcurrency } from '../utils/concurrency';

describe('mapWithConcurrency', () => {
  const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

  it('should keep the input order when calls finish out of order', async () => {
    const results = await mapWithConcurrency([3, 1, 2], 3, async (delay, index) => {
      for (let i = 0; i < delay; i++) {
        await tick();
      }
      return `${index}:${delay}`;
    });

    expect(results).toEqual(['0:3', '1:1', '2:2']);
  });

  it('should never run more than the limit at once', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5], 2, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick();
      inFlight--;
    });

    expect(peak).toBe(2);
  });

  it('should return an empty list for no items', async () => {
    const fn = jest.fn();

    expect(await mapWithConcurrency([], 4, fn)).toEqual([]);
    expect(fn).not.toHaveBeenCalled();
  });

  it('should reject a limit below one', async () => {
    await expect(mapWithConcurrency([1], 0, async (item) => item)).rejects.toThrow(
      'concurrency limit must be at least 1, got 0'
    );
  });

  it('should reject with the first failure', async () => {
    await expect(
      mapWithConcurrency([1, 2], 1, async (item) => {
        if (item === 2) {
          throw new Error('second failed');
        }
        return item;
      })
    ).rejects.toThrow('second failed');
  });
});
