import { describe, it, expect, vi } from 'vitest';
import { TtlCache } from '@/server/indent/cache';

describe('TtlCache', () => {
  it('reloads only once the value is older than the max age', async () => {
    let now = 1_000;
    let n = 0;
    const loader = vi.fn(async () => ++n);
    const cache = new TtlCache(loader, () => now);

    expect(cache.lastFetchedAt).toBeNull();
    await expect(cache.get(60_000)).resolves.toBe(1);
    now += 60_000;
    await expect(cache.get(60_000)).resolves.toBe(1);
    now += 1;
    await expect(cache.get(60_000)).resolves.toBe(2);
    expect(cache.lastFetchedAt).toBe(61_001);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it('shares one load between concurrent callers', async () => {
    const loader = vi.fn(async () => 'v');
    const cache = new TtlCache(loader);
    const [a, b] = await Promise.all([cache.get(1000), cache.get(1000)]);
    expect([a, b]).toEqual(['v', 'v']);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('reloads after invalidate and after a failed load', async () => {
    const loader = vi.fn<() => Promise<string>>().mockRejectedValueOnce(new Error('down')).mockResolvedValue('ok');
    const cache = new TtlCache(loader);
    await expect(cache.get(1000)).rejects.toThrow('down');
    await expect(cache.get(1000)).resolves.toBe('ok');
    cache.invalidate();
    await expect(cache.get(1000)).resolves.toBe('ok');
    expect(loader).toHaveBeenCalledTimes(3);
  });

  it('does not keep a load that was running when invalidate was called', async () => {
    const gate: { release: (value: string) => void } = { release: () => {} };
    const loader = vi
      .fn<() => Promise<string>>()
      .mockImplementationOnce(() => new Promise<string>((resolve) => { gate.release = resolve; }))
      .mockResolvedValue('fresh');
    const cache = new TtlCache(loader);

    const stale = cache.get(60_000);
    cache.invalidate();
    gate.release('stale');
    await expect(stale).resolves.toBe('stale');
    await expect(cache.get(60_000)).resolves.toBe('fresh');
    expect(loader).toHaveBeenCalledTimes(2);
  });
});
