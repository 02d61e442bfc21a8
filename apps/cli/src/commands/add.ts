import { Command } from 'commander';
import type { TodoStore } from '@memtodo/core';
import * as out from '../output.js';
import { parsePriorityArg, $try } from '../helpers.js';

interface AddOptions {
  priority: string;
  deadline?: string;
}

export function createAddCommand(store: TodoStore): Command {
  return new Command('add')
    .description('Add a new todo')
    .argument('<title...>', 'Todo title')
    .option('-p, --priority <level>', 'Priority: high, medium, low', 'medium')
    .option('-d, --deadline <when>', "Deadline as 'YYYY-MM-DD HH' (UTC)")
    .action((words: string[], opts: AddOptions) => $try(() => {
      const priority = parsePriorityArg(opts.priority);
      if (priority == null) {
        out.error(`Unknown priority: '${opts.priority}'. Use: high, medium, low`);
        return;
      }

      const result = store.add({
        title: words.join(' '),
        priority,
        deadline: opts.deadline,
      });
      if (result.type === 'error') {
        out.printError(result.error);
        return;
      }
      out.success(`Added ${out.formatTodo(result.data)}`);
    }));
}
