import { Command } from 'commander';
import { SCHEMA_VERSION } from '@memtodo/core';
import * as out from '../output.js';

export function createMetaCommand(version: string): Command {
  return new Command('meta')
    .description('Show component and schema versions')
    .action(() => {
      out.info(`Component version: ${version}`);
      out.info(`Schema version: ${SCHEMA_VERSION}`);
    });
}
