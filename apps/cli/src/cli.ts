import yargs from 'yargs';
import type { DebugResult, ToolService } from '@toolsmith/forge';

export interface CliIO {
  write(text: string): void;
  /** Lines typed in chat mode. */
  readLines(): AsyncIterable<string>;
}

const EXIT_WORDS = new Set(['exit', 'quit']);

export const describeDebugResult = (toolName: string, result: DebugResult) =>
  result.success
    ? `Tool '${toolName}' passed after ${result.iterations} fix(es).`
    : `Tool '${toolName}' did not pass (${result.state}${result.reason ? `: ${result.reason}` : ''}).`;

async function chat(service: ToolService, io: CliIO) {
  io.write("Chat with the tool service. Type 'exit' to leave.");
  for await (const raw of io.readLines()) {
    const line = raw.trim();
    if (!line) continue;
    if (EXIT_WORDS.has(line.toLowerCase())) break;
    const outcome = await service.handleMessage(line);
    io.write(outcome.content || 'No tool action needed.');
  }
}

/**
 * Parses the arguments and runs one command against the service. Rejects when the command fails.
 */
export async function runCli(args: string[], service: ToolService, io: CliIO): Promise<void> {
  await yargs(args)
    .scriptName('toolsmith')
    .command(
      'create <name> [details]',
      'Generate, test and repair a new tool',
      (y) =>
        y
          .positional('name', { type: 'string', demandOption: true })
          .positional('details', { type: 'string', describe: 'What the tool should do' }),
      async (argv) => {
        io.write(await service.createTool(argv.name, argv.details ?? argv.name));
      }
    )
    .command(
      'run <name> <instruction..>',
      'Call a tool function described in plain language',
      (y) =>
        y
          .positional('name', { type: 'string', demandOption: true })
          .positional('instruction', { type: 'string', array: true, demandOption: true }),
      async (argv) => {
        io.write(await service.runToolText(argv.name, argv.instruction.join(' ')));
      }
    )
    .command(
      'debug <name>',
      'Test and repair an installed tool',
      (y) =>
        y
          .positional('name', { type: 'string', demandOption: true })
          .option('attempts', { type: 'number', describe: 'Fix budget for this session' }),
      async (argv) => {
        const result = await service.debugToolDetailed(argv.name, { maxAttempts: argv.attempts });
        io.write(describeDebugResult(argv.name, result));
      }
    )
    .command(
      'list',
      'List installed tools',
      (y) => y.option('refresh', { type: 'boolean', default: false }),
      async (argv) => {
        const tools = await service.listTools(argv.refresh);
        if (tools.length === 0) io.write('No tools are installed.');
        for (const tool of tools) io.write(`${tool.name}: ${tool.summary ?? 'No summary available.'}`);
      }
    )
    .command(
      'functions <name>',
      'Show the function catalog of a tool',
      (y) => y.positional('name', { type: 'string', demandOption: true }),
      async (argv) => {
        for (const fn of await service.getToolFunctions(argv.name)) {
          io.write(`${fn.name}(${fn.parameters.join(', ')}): ${fn.description}`);
        }
      }
    )
    .command(
      'search [query]',
      'Search the tool library',
      (y) =>
        y
          .positional('query', { type: 'string', default: '' })
          .option('tags', { type: 'string', array: true }),
      async (argv) => {
        if (!service.hasLibrary()) {
          io.write('No tool library is configured.');
          return;
        }
        const tools = await service.searchLibrary(argv.query, argv.tags);
        if (tools.length === 0) io.write('No matching tools found.');
        for (const tool of tools) io.write(`${tool.name} (v${tool.version}): ${tool.description}`);
      }
    )
    .command(
      'install <name>',
      'Install a tool from the library by name',
      (y) => y.positional('name', { type: 'string', demandOption: true }),
      async (argv) => {
        io.write((await service.installToolByName(argv.name)).message);
      }
    )
    .command(
      'find <description..>',
      'Find a library tool for a description and install it',
      (y) => y.positional('description', { type: 'string', array: true, demandOption: true }),
      async (argv) => {
        io.write((await service.findAndInstallTool(argv.description.join(' '))).message);
      }
    )
    .command('chat', 'Route chat messages to tools', {}, async () => {
      await chat(service, io);
    })
    .demandCommand(1)
    .strict()
    .fail(false)
    .help()
    .parseAsync();
}
