import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig } from '@toolsmith/common';
import { InvalidToolNameError, ToolNotFoundError } from '../errors';
import { ToolService } from '../toolService';
import {
  BROKEN_ADD_SOURCE,
  createTempStore,
  fenced,
  FIXED_ADD_SOURCE,
  InMemoryLibrary,
  libraryEntry,
  ScriptedGateway,
  writeTool,
  type TempStore,
} from './helpers';

const ADD_CATALOG = '## add\nPurpose: Adds two numbers.\nParameters: a, b';

describe('ToolService', () => {
  let temp: TempStore;
  let gateway: ScriptedGateway;

  beforeEach(async () => {
    temp = await createTempStore();
    gateway = new ScriptedGateway();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  const createService = (library: InMemoryLibrary | null = null) =>
    new ToolService({
      config: loadConfig({ TOOLS_DIR: temp.store.root, DEBUG_MAX_ATTEMPTS: '3', TOOL_CALL_TIMEOUT_MS: '1000' }),
      gateway,
      store: temp.store,
      library,
      searchDirs: [],
    });

  const scriptSpecification = () =>
    gateway.on('spec_generator', 'Calculator overview.', ADD_CATALOG, 'Adds numbers with math.');

  it('should create a tool that passes its tests and record its metadata', async () => {
    scriptSpecification().on('code_synthesizer', fenced(FIXED_ADD_SOURCE));
    const service = createService();

    const outcome = await service.createTool('Calc', 'add two numbers');

    expect(outcome).toBe("Tool 'calc' created and passed its tests after 0 fix(es).");
    expect(await temp.store.readSource('calc')).toBe(FIXED_ADD_SOURCE);
    const metadata = await temp.store.readMetadata('calc');
    expect(metadata).toMatchObject({
      name: 'calc',
      description: 'Adds numbers with math.',
      tags: ['math'],
      functions: [{ name: 'add', description: 'Adds two numbers.', parameters: ['a', 'b'] }],
    });
    expect(await service.listTools()).toEqual([{ name: 'calc', summary: 'Adds numbers with math.' }]);
  });

  it('should count the fixes a new tool needed', async () => {
    scriptSpecification()
      .on('code_synthesizer', fenced(BROKEN_ADD_SOURCE))
      .on('fix_synthesizer', fenced(FIXED_ADD_SOURCE));

    expect(await createService().createTool('calc', 'add two numbers')).toBe(
      "Tool 'calc' created and passed its tests after 1 fix(es)."
    );
  });

  it('should report a tool whose tests never pass', async () => {
    scriptSpecification()
      .on('code_synthesizer', fenced(BROKEN_ADD_SOURCE))
      .on('fix_synthesizer', fenced(BROKEN_ADD_SOURCE));

    expect(await createService().createTool('calc', 'add two numbers')).toBe(
      "Tool 'calc' was created, but its tests did not pass (EXHAUSTED: tests still failing after 3 fix(es))."
    );
    expect(gateway.callsFor('fix_synthesizer')).toHaveLength(3);
  });

  it('should resolve with the error when code generation fails', async () => {
    scriptSpecification();
    expect(await createService().createTool('calc', 'add two numbers')).toBe(
      "Error creating tool 'calc': LLM call for code_synthesizer failed: no scripted reply"
    );
  });

  it('should publish a passing tool to the library', async () => {
    scriptSpecification().on('code_synthesizer', fenced(FIXED_ADD_SOURCE));
    const library = new InMemoryLibrary([]);

    const outcome = await createService(library).createTool('calc', 'add two numbers');

    expect(outcome).toBe(
      "Tool 'calc' created and passed its tests after 0 fix(es).\n\nTool has been uploaded to the library for future use."
    );
    expect(library.published.map((metadata) => metadata.name)).toEqual(['calc']);
  });

  it('should install a library tool with the same name instead of creating one', async () => {
    const library = new InMemoryLibrary([libraryEntry('calc', 'Calculator')], { calc: FIXED_ADD_SOURCE });

    const outcome = await createService(library).createTool('calc', 'add two numbers');

    expect(outcome).toBe("Installed tool 'calc' from the library: Calculator");
    expect(gateway.calls).toEqual([]);
    expect(await temp.store.readSource('calc')).toBe(FIXED_ADD_SOURCE);
  });

  it('should route a chat message to an installed tool', async () => {
    await writeTool(temp.store, 'calc', FIXED_ADD_SOURCE, { functions: ADD_CATALOG, summary: 'Adds numbers.' });
    gateway
      .on('intent_router', '{"intent_type": "USE_INSTALLED_TOOL", "tool_name": "calc", "details": ""}')
      .on('function_selector', '{"function_name": "add", "reason": "sum"}');

    const outcome = await createService().handleMessage('use calc: add a=2, b=3');

    expect(outcome).toMatchObject({ intentType: 'USE_INSTALLED_TOOL', toolName: 'calc', content: 'Result of add: 5' });
    expect(gateway.callsFor('intent_router')[0].options.systemInstructions).toContain('1. calc:\nAdds numbers.');
  });

  it('should answer with an error outcome when intent detection fails', async () => {
    expect(await createService().handleMessage('hello')).toEqual({
      intentType: 'ERROR',
      toolName: null,
      content: 'Error processing your request: LLM call for intent_router failed: no scripted reply',
      executionTime: 0,
    });
  });

  it('should reject debugging and catalog lookups of unknown tools', async () => {
    const service = createService();
    await expect(service.debugToolDetailed('ghost')).rejects.toBeInstanceOf(ToolNotFoundError);
    await expect(service.getToolFunctions('ghost')).rejects.toThrow(
      "Tool 'ghost' not found. Please check the tool name or install it first."
    );
    expect(await service.debugTool('ghost')).toBe(false);
  });

  it('should keep created tools inside the tools directory', async () => {
    scriptSpecification().on('code_synthesizer', fenced(FIXED_ADD_SOURCE));
    const service = createService();

    expect(await service.createTool('../escaped', 'add two numbers')).toBe(
      "Tool '_escaped' created and passed its tests after 0 fix(es)."
    );
    expect(await temp.store.listTools()).toEqual(['_escaped']);
    await expect(service.debugToolDetailed('..')).rejects.toBeInstanceOf(InvalidToolNameError);
  });

  it('should debug an installed tool and refresh its metadata', async () => {
    await writeTool(temp.store, 'calc', BROKEN_ADD_SOURCE, { functions: ADD_CATALOG, summary: 'Adds numbers.' });
    gateway.on('fix_synthesizer', fenced(FIXED_ADD_SOURCE));
    const service = createService();

    expect(await service.debugTool('calc', 2)).toBe(true);
    expect((await temp.store.readMetadata('calc'))?.functions.map((fn) => fn.name)).toEqual(['add']);
    expect(await service.getToolFunctions('calc')).toEqual([
      { name: 'add', description: 'Adds two numbers.', parameters: ['a', 'b'] },
    ]);
  });

  it('should answer library operations without a library', async () => {
    const service = createService();
    expect(service.hasLibrary()).toBe(false);
    expect(await service.searchLibrary('calc')).toEqual([]);
    expect(await service.installToolByName('calc')).toEqual({ success: false, message: 'No tool library is configured.' });
  });
});
