import { mapWithConcurrency } from './pool';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('mapWithConcurrency', () => {
  it('should never run more tasks than the limit at once', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async (n) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(5);
      inFlight--;
      return n * 10;
    });

    expect(peak).toBe(2);
    expect([...results].sort((a, b) => a - b)).toEqual([10, 20, 30, 40, 50, 60]);
  });

  it('should collect results in completion order', async () => {
    const results = await mapWithConcurrency(['slow', 'fast'], 2, async (item) => {
      await sleep(item === 'slow' ? 30 : 0);
      return item;
    });

    expect(results).toEqual(['fast', 'slow']);
  });

  it('should pass the item index to the task', async () => {
    const results = await mapWithConcurrency(['a', 'b', 'c'], 1, async (item, index) => `${index}:${item}`);

    expect(results).toEqual(['0:a', '1:b', '2:c']);
  });

  it('should resolve to an empty list without items', async () => {
    const task = jest.fn(async () => 1);

    await expect(mapWithConcurrency([], 4, task)).resolves.toEqual([]);
    expect(task).not.toHaveBeenCalled();
  });

  it('should reject when a task rejects', async () => {
    await expect(
      mapWithConcurrency([1, 2], 2, async (n) => {
        if (n === 2) throw new Error('task failed');
        return n;
      }),
    ).rejects.toThrow('task failed');
  });
});
