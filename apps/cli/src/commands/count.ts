import { Command } from 'commander';
import type { TodoStore } from '@memtodo/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';
import { buildFilter, withFilterOptions } from './search.js';
import type { FilterOptions } from './search.js';

interface CountOptions extends FilterOptions {
  all?: boolean;
}

export function createCountCommand(store: TodoStore): Command {
  return withFilterOptions(new Command('count'))
    .description('Count matching todos')
    .option('-a, --all', 'Count every todo, ignoring filters')
    .action((keyword: string | undefined, opts: CountOptions) => $try(() => {
      if (opts.all) {
        out.printCount(store.countAll(), n => `${n} todo(s)`);
        return;
      }

      const filter = buildFilter(keyword, opts);
      if (!filter) return;

      const result = store.countBy(filter);
      if (result.type === 'error') {
        out.printError(result.error);
        return;
      }
      out.printCount(result.data, n => `${n} todo(s)`);
    }));
}
