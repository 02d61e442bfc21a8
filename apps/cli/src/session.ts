/**
 * One command line against one store. A fresh commander program is built per
 * line so option state never leaks between commands.
 */

import { readFileSync } from 'node:fs';
import { Command, CommanderError } from 'commander';
import type { TodoStore } from '@memtodo/core';
import * as out from './output.js';
import { splitCommandLine } from './tokenize.js';
import { createAddCommand } from './commands/add.js';
import { createUpdateCommand } from './commands/update.js';
import { createGetCommand } from './commands/get.js';
import { createDeleteCommand, createDeleteByCommand, createPurgeDoneCommand, createClearCommand } from './commands/delete.js';
import { createSearchCommand } from './commands/search.js';
import { createCountCommand } from './commands/count.js';
import { createMetaCommand } from './commands/meta.js';

export const VERSION = '1.0.0';

const outputConfig = {
  writeOut: (s: string) => out.info(s.trimEnd()),
  writeErr: (s: string) => out.error(s.trimEnd()),
};

/** Build the program that interprets a single session line */
export function createSessionProgram(store: TodoStore): Command {
  const program = new Command()
    .name('memtodo')
    .description('In-memory todo manager');

  program.addCommand(createAddCommand(store));
  program.addCommand(createUpdateCommand(store));
  program.addCommand(createGetCommand(store));
  program.addCommand(createDeleteCommand(store));
  program.addCommand(createDeleteByCommand(store));
  program.addCommand(createPurgeDoneCommand(store));
  program.addCommand(createClearCommand(store));
  program.addCommand(createSearchCommand(store));
  program.addCommand(createCountCommand(store));
  program.addCommand(createMetaCommand(VERSION));

  // addCommand doesn't pass these settings down, so apply them to every level
  for (const cmd of [program, ...program.commands]) {
    cmd.exitOverride().configureOutput(outputConfig);
  }
  return program;
}

/** Tokenize and run one line. Blank lines are ignored. */
export function runCommandLine(store: TodoStore, line: string): void {
  const args = splitCommandLine(line);
  if (args.length === 0) return;

  try {
    createSessionProgram(store).parse(args, { from: 'user' });
  } catch (err: unknown) {
    // Usage errors and help were already written through outputConfig
    if (err instanceof CommanderError) return;
    throw err;
  }
}

export interface ScriptOptions {
  /** Print each command before running it */
  echo?: boolean;
}

/** Run a script: one command per line, `#` starts a comment line */
export function runScript(store: TodoStore, source: string, opts: ScriptOptions = {}): void {
  for (const line of source.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;
    if (opts.echo) out.info(`> ${trimmed}`);
    runCommandLine(store, trimmed);
  }
}

/** Read and run a script file. Returns false, after reporting why, when it can't be read. */
export function runScriptFile(store: TodoStore, path: string, opts: ScriptOptions = {}): boolean {
  let source: string;
  try {
    source = readFileSync(path, 'utf8');
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    return false;
  }
  runScript(store, source, opts);
  return true;
}
