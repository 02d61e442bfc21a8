import { Command } from 'commander';
import type { TodoStore, TodoFilter, Query } from '@memtodo/core';
import * as out from '../output.js';
import { parsePriorityArg, parseStatus, parseSortArg, $try } from '../helpers.js';

export interface FilterOptions {
  priority?: string;
  status?: string;
  before?: string;
}

/** Build the core filter from the shared filter flags. Prints and returns null on unknown words. */
export function buildFilter(keyword: string | undefined, opts: FilterOptions): TodoFilter | null {
  const priority = opts.priority !== undefined ? parsePriorityArg(opts.priority) : undefined;
  if (priority === null) {
    out.error(`Unknown priority: '${opts.priority}'. Use: high, medium, low`);
    return null;
  }

  const status = opts.status !== undefined ? parseStatus(opts.status) : undefined;
  if (status === null) {
    out.error(`Unknown status: '${opts.status}'. Use: backlog, in-progress, done`);
    return null;
  }

  return { keyword, priority, status, deadline: opts.before };
}

/** Register the filter flags shared by search and count */
export function withFilterOptions(cmd: Command): Command {
  return cmd
    .argument('[keyword]', 'Only todos whose title contains this text (case-sensitive)')
    .option('-p, --priority <level>', 'Filter by priority (high, medium, low)')
    .option('-s, --status <status>', 'Filter by status (backlog, in-progress, done)')
    .option('-b, --before <when>', "Only todos due by 'YYYY-MM-DD HH'; undated todos always match");
}

interface SearchOptions extends FilterOptions {
  sort?: string;
  limit?: string;
}

export function createSearchCommand(store: TodoStore): Command {
  return withFilterOptions(new Command('search'))
    .description('Find todos, best first')
    .option('--sort <dimension>', 'Order by priority, status, deadline or title', 'title')
    .option('-n, --limit <count>', 'Maximum number of results (default 10, at most 100)')
    .action((keyword: string | undefined, opts: SearchOptions) => $try(() => {
      const filter = buildFilter(keyword, opts);
      if (!filter) return;

      const sort = parseSortArg(opts.sort ?? 'title');
      if (sort === null) {
        out.error(`Unknown sort: '${opts.sort}'. Use: priority, status, deadline, title`);
        return;
      }

      const query: Query = {
        ...filter,
        sort,
        limit: opts.limit !== undefined ? Number(opts.limit) : undefined,
      };
      const result = store.search(query);
      if (result.type === 'error') {
        out.printError(result.error);
        return;
      }
      out.printTodos(result.data);
    }));
}
