import { Command } from 'commander';
import type { AppResult, TodoStore, TodoId } from '@memtodo/core';
import { TodoStatus } from '@memtodo/core';
import * as out from '../output.js';
import { parseTodoId, parsePriorityArg, parseStatus, parseAll, $try } from '../helpers.js';

export function createDeleteCommand(store: TodoStore): Command {
  return new Command('delete')
    .description('Delete one or more todos')
    .argument('<ids...>', 'The id(s) of the todo(s) to delete')
    .action((rawIds: string[]) => $try(() => {
      const ids: TodoId[] = [];
      for (const raw of rawIds) {
        const id = parseTodoId(raw);
        if (id.type === 'error') {
          out.printError(id.error);
          return;
        }
        ids.push(id.data);
      }

      const [only] = ids;
      if (ids.length === 1 && only !== undefined) {
        const result = store.delete(only);
        if (result.type === 'error') {
          out.printError(result.error);
          return;
        }
        out.success(`Deleted todo: ${only}`);
        return;
      }

      const result = store.deleteByIds(ids);
      if (result.type === 'error') {
        out.printError(result.error);
        return;
      }
      out.printCount(result.data, n => `Deleted ${n} todo(s)`);
    }));
}

interface DeleteByOptions {
  priority?: string[];
  status?: string[];
}

export function createDeleteByCommand(store: TodoStore): Command {
  return new Command('delete-by')
    .description('Delete every todo with one of the given priorities or statuses')
    .option('-p, --priority <levels...>', 'Priorities to delete')
    .option('-s, --status <statuses...>', 'Statuses to delete')
    .action((opts: DeleteByOptions) => $try(() => {
      if (opts.priority && opts.status) {
        out.error('Cannot use both --priority and --status at the same time');
        return;
      }

      let result: AppResult<number>;
      if (opts.priority) {
        const priorities = parseAll(opts.priority, parsePriorityArg, 'priority');
        if (!priorities) return;
        result = store.deleteByPriorities(priorities);
      } else {
        const statuses = parseAll(opts.status ?? [], parseStatus, 'status');
        if (!statuses) return;
        result = store.deleteByStatuses(statuses);
      }

      if (result.type === 'error') {
        out.printError(result.error);
        return;
      }
      out.printCount(result.data, n => `Deleted ${n} todo(s)`);
    }));
}

export function createPurgeDoneCommand(store: TodoStore): Command {
  return new Command('purge-done')
    .description('Delete every done todo')
    .action(() => $try(() => {
      const count = store.deleteByStatus(TodoStatus.Done);
      out.printCount(count, n => `Deleted ${n} done todo(s)`);
    }));
}

export function createClearCommand(store: TodoStore): Command {
  return new Command('clear')
    .description('Delete all todos')
    .action(() => $try(() => {
      const count = store.deleteAll();
      out.printCount(count, n => `Deleted ${n} todo(s)`);
    }));
}
