import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { autoTagTool, generateMetadata } from '../library/metadata';
import { CALCULATOR_CATALOG, createTempStore, libraryEntry, type TempStore } from './helpers';

describe('tool metadata', () => {
  let temp: TempStore;

  beforeEach(async () => {
    temp = await createTempStore();
    await temp.store.writeDocument('calc', 'summary', 'Calculate sums and convert units.\n');
    await temp.store.writeDocument('calc', 'functions', CALCULATOR_CATALOG);
    await temp.store.writeSource(
      'calc',
      "const fs = require('fs');\nconst dayjs = require('dayjs');\nmodule.exports = {};\n"
    );
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('should build metadata from the summary and the catalog', async () => {
    const metadata = await generateMetadata(temp.store, 'calc', { author: 'tester', now: () => '2026-02-01T00:00:00.000Z' });

    expect(metadata).toEqual({
      name: 'calc',
      description: 'Calculate sums and convert units.',
      version: '1.0.0',
      author: 'tester',
      tags: [],
      createdAt: '2026-02-01T00:00:00.000Z',
      updatedAt: '2026-02-01T00:00:00.000Z',
      functions: [
        { name: 'add', description: 'Adds two numbers.', parameters: ['a', 'b'] },
        { name: 'repeat', description: 'Repeats a word.', parameters: ['word', 'times'] },
      ],
    });
  });

  it('should keep creation time, version and tags of existing metadata', async () => {
    await temp.store.writeMetadata('calc', { ...libraryEntry('calc', 'old'), version: '2.1.0', tags: ['math'] });
    const metadata = await generateMetadata(temp.store, 'calc', { author: 'someone', now: () => '2026-03-01T00:00:00.000Z' });

    expect(metadata).toMatchObject({
      description: 'Calculate sums and convert units.',
      version: '2.1.0',
      author: 'tester',
      tags: ['math'],
      createdAt: '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-03-01T00:00:00.000Z',
    });
  });

  it('should tag by summary keywords and loaded packages', async () => {
    expect(await autoTagTool(temp.store, 'calc')).toEqual(['file', 'math', 'time', 'utility']);
  });
});
