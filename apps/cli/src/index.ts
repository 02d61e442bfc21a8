#!/usr/bin/env tsx

import { Command } from 'commander';
import { TodoStore } from '@memtodo/core';
import { loadConfig } from './config.js';
import type { CliConfig } from './config.js';
import { VERSION, runScriptFile } from './session.js';
import { startShell } from './shell.js';
import * as out from './output.js';

/** Resolve config from env + global flags, reporting bad values */
function resolveConfig(cmd: Command): CliConfig | null {
  const g = cmd.optsWithGlobals<{ maxTitleLength?: string }>();
  try {
    return loadConfig(process.env, { maxTitleLength: g.maxTitleLength });
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
    return null;
  }
}

// Build the CLI program
const program = new Command()
  .name('memtodo')
  .description('In-memory todo manager')
  .version(VERSION)
  .option('--max-title-length <n>', 'Longest title accepted (env: MEMTODO_MAX_TITLE_LEN)');

program.command('shell', { isDefault: true })
  .description('Start an interactive session (default)')
  .action(async (_opts: unknown, cmd: Command) => {
    const config = resolveConfig(cmd);
    if (!config) return;
    const store = new TodoStore({ maxTitleLength: config.maxTitleLength });
    await startShell(store, config.prompt);
  });

program.command('run')
  .description('Run a script of session commands, one per line')
  .argument('<file>', 'Script path')
  .option('--echo', 'Print each command before running it')
  .action((file: string, opts: { echo?: boolean }, cmd: Command) => {
    const config = resolveConfig(cmd);
    if (!config) return;
    const store = new TodoStore({ maxTitleLength: config.maxTitleLength });
    if (!runScriptFile(store, file, { echo: opts.echo })) process.exitCode = 1;
  });

await program.parseAsync();
