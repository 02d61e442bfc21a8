import { Command } from 'commander';
import type { TodoStore, UpdateTodo } from '@memtodo/core';
import * as out from '../output.js';
import { parsePriorityArg, parseStatus, parseTodoId, $try } from '../helpers.js';

interface UpdateOptions {
  title?: string;
  priority?: string;
  status?: string;
  deadline?: string;
  clearDeadline?: boolean;
}

export function createUpdateCommand(store: TodoStore): Command {
  return new Command('update')
    .description('Change the title, priority, status or deadline of a todo')
    .argument('<id>', 'The id of the todo')
    .option('-t, --title <title>', 'New title')
    .option('-p, --priority <level>', 'New priority: high, medium, low')
    .option('-s, --status <status>', 'New status: backlog, in-progress, done')
    .option('-d, --deadline <when>', "New deadline as 'YYYY-MM-DD HH' (UTC)")
    .option('--clear-deadline', 'Remove the deadline')
    .action((rawId: string, opts: UpdateOptions) => $try(() => {
      if (opts.deadline !== undefined && opts.clearDeadline) {
        out.error('Cannot use both --deadline and --clear-deadline at the same time');
        return;
      }

      const id = parseTodoId(rawId);
      if (id.type === 'error') {
        out.printError(id.error);
        return;
      }

      const priority = opts.priority !== undefined ? parsePriorityArg(opts.priority) : undefined;
      if (priority === null) {
        out.error(`Unknown priority: '${opts.priority}'. Use: high, medium, low`);
        return;
      }

      const status = opts.status !== undefined ? parseStatus(opts.status) : undefined;
      if (status === null) {
        out.error(`Unknown status: '${opts.status}'. Use: backlog, in-progress, done`);
        return;
      }

      const change: UpdateTodo = {
        title: opts.title,
        priority,
        status,
        deadline: opts.clearDeadline ? null : opts.deadline,
      };

      const result = store.update(id.data, change);
      if (result.type === 'error') {
        out.printError(result.error);
        return;
      }
      out.success(`Updated ${out.formatTodo(result.data)}`);
    }));
}
