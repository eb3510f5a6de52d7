#!/usr/bin/env node
import readline from 'readline';
import { hideBin } from 'yargs/helpers';
import { loadConfig, logError } from '@toolsmith/common';
import { ToolService } from '@toolsmith/forge';
import { createLibrary } from '@toolsmith/library';
import { runCli } from './cli';

async function main() {
  const cfg = loadConfig();
  const service = new ToolService({ config: cfg, library: createLibrary(cfg) });
  await runCli(hideBin(process.argv), service, {
    write: (text) => console.log(text),
    readLines: () => readline.createInterface({ input: process.stdin, output: process.stdout, terminal: false }),
  });
}

main().catch((error: unknown) => {
  logError('[cli] command failed', error);
  process.exit(1);
});
