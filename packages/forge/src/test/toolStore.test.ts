import fs from 'fs-extra';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InvalidToolNameError } from '../errors';
import { createTempStore, type TempStore } from './helpers';

describe('FileToolStore', () => {
  let temp: TempStore;

  beforeEach(async () => {
    temp = await createTempStore();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('should keep a name with parent segments inside the tools root', async () => {
    const { store } = temp;
    const dir = store.namespacePath('../escaped');

    expect(dir).toBe(path.join(store.root, '_escaped'));
    expect(dir.startsWith(store.root + path.sep)).toBe(true);

    await store.writeSource('../escaped', 'module.exports = {};\n');
    expect(await fs.pathExists(path.join(temp.root, 'escaped'))).toBe(false);
    expect(await store.listTools()).toEqual(['_escaped']);
  });

  it('should flatten nested paths into one namespace', () => {
    expect(temp.store.namespacePath('a/b\\c')).toBe(path.join(temp.store.root, 'a_b_c'));
  });

  it('should reject names that resolve to the root or above it', async () => {
    expect(() => temp.store.namespacePath('..')).toThrow(InvalidToolNameError);
    expect(() => temp.store.namespacePath(' . ')).toThrow("' . ' is not a valid tool name.");
    await expect(temp.store.exists('')).rejects.toBeInstanceOf(InvalidToolNameError);
  });
});
