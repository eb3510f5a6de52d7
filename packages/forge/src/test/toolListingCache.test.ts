import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ToolListingCache } from '../listing/toolListingCache';
import { createTempStore, type TempStore } from './helpers';

describe('ToolListingCache', () => {
  let temp: TempStore;
  let now: number;
  let cache: ToolListingCache;

  beforeEach(async () => {
    temp = await createTempStore();
    now = 0;
    cache = new ToolListingCache(temp.store, 1000, () => now);
    await temp.store.writeDocument('beta', 'documentation', 'Beta.');
    await temp.store.writeDocument('alpha', 'summary', '  Alpha tool.\n');
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('should list installed tools by name with trimmed summaries', async () => {
    expect(await cache.list()).toEqual([
      { name: 'alpha', summary: 'Alpha tool.' },
      { name: 'beta', summary: null },
    ]);
  });

  it('should serve the cached listing until the ttl passes', async () => {
    await cache.list();
    await temp.store.writeDocument('gamma', 'summary', 'Gamma.');

    now = 999;
    expect((await cache.list()).map((tool) => tool.name)).toEqual(['alpha', 'beta']);

    now = 1000;
    expect((await cache.list()).map((tool) => tool.name)).toEqual(['alpha', 'beta', 'gamma']);
  });

  it('should reload after invalidate or a forced refresh', async () => {
    await cache.list();
    await temp.store.writeDocument('gamma', 'summary', 'Gamma.');
    cache.invalidate();
    expect(await cache.list()).toHaveLength(3);

    await temp.store.writeDocument('delta', 'summary', 'Delta.');
    expect(await cache.list(true)).toHaveLength(4);
  });

  it('should share one load between concurrent callers', async () => {
    const listTools = vi.spyOn(temp.store, 'listTools');
    const [first, second] = await Promise.all([cache.list(), cache.list()]);

    expect(listTools).toHaveBeenCalledTimes(1);
    expect(second).toEqual(first);
  });

  it('should not cache a load that was started before invalidate', async () => {
    const listTools = vi.spyOn(temp.store, 'listTools');
    const stale = cache.list();
    cache.invalidate();
    expect((await stale).map((tool) => tool.name)).toEqual(['alpha', 'beta']);

    await temp.store.writeDocument('gamma', 'summary', 'Gamma.');
    expect((await cache.list()).map((tool) => tool.name)).toEqual(['alpha', 'beta', 'gamma']);
    expect(listTools).toHaveBeenCalledTimes(2);
  });

  it('should hand out copies the caller cannot use to change the cache', async () => {
    const first = await cache.list();
    first[0].summary = 'changed';
    first.pop();

    expect(await cache.list()).toEqual([
      { name: 'alpha', summary: 'Alpha tool.' },
      { name: 'beta', summary: null },
    ]);
  });

  it('should describe the listing for prompts', async () => {
    expect(await cache.describe()).toBe('1. alpha:\nAlpha tool.\n---\n2. beta:\nNo summary available.');
  });

  it('should describe an empty tools directory', async () => {
    await temp.cleanup();
    expect(await cache.describe()).toBe('No tools are installed.');
  });
});
