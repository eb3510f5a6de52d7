import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { cleanDocument, generateSpecification, PLACEHOLDER_CONTENT } from '../synthesis/specGenerator';
import { createTempStore, ScriptedGateway, type TempStore } from './helpers';

describe('generateSpecification', () => {
  let temp: TempStore;

  beforeEach(async () => {
    temp = await createTempStore();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('should write the three documents in order', async () => {
    const gateway = new ScriptedGateway().on(
      'spec_generator',
      '# Calc\nAdds numbers.\n',
      '```markdown\n## add\nParameters: a, b\n```',
      'A calculator.'
    );

    const documents = await generateSpecification('calc', 'add numbers', { gateway, store: temp.store });

    expect(documents).toEqual({
      documentation: '# Calc\nAdds numbers.',
      functions: '## add\nParameters: a, b',
      summary: 'A calculator.',
    });
    expect(await temp.store.readDocument('calc', 'functions')).toBe('## add\nParameters: a, b');
    expect(gateway.calls).toHaveLength(3);
    expect(gateway.calls[0].messages[0].content).toContain('Details: add numbers');
    expect(gateway.calls[1].messages[0].content).toContain('Overview:\n# Calc\nAdds numbers.');
    expect(gateway.calls[2].messages[0].content).toContain('Function catalog:\n## add\nParameters: a, b');
  });

  it('should substitute the placeholder for a failed document and carry on', async () => {
    const gateway = new ScriptedGateway().on('spec_generator', 'Overview text', new Error('model offline'), 'Summary text');

    const documents = await generateSpecification('calc', '', { gateway, store: temp.store });

    expect(documents).toEqual({ documentation: 'Overview text', functions: PLACEHOLDER_CONTENT, summary: 'Summary text' });
    expect(await temp.store.readDocument('calc', 'functions')).toBe('No content generated');
    expect(gateway.calls[0].messages[0].content).toContain('No further details were given');
  });
});

describe('cleanDocument', () => {
  it('should use the placeholder for blank output', () => {
    expect(cleanDocument('  \n ')).toBe('No content generated');
  });

  it('should keep inner fences of a longer document', () => {
    const text = 'Intro\n```js\nadd(1, 2)\n```\nOutro';
    expect(cleanDocument(text)).toBe(text);
  });
});
