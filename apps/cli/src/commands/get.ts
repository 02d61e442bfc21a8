import { Command } from 'commander';
import type { TodoStore } from '@memtodo/core';
import * as out from '../output.js';
import { parseTodoId, $try } from '../helpers.js';

export function createGetCommand(store: TodoStore): Command {
  return new Command('get')
    .description('Show a single todo')
    .argument('<id>', 'The id of the todo')
    .action((rawId: string) => $try(() => {
      const id = parseTodoId(rawId);
      if (id.type === 'error') {
        out.printError(id.error);
        return;
      }

      const result = store.get(id.data);
      if (result.type === 'error') {
        out.printError(result.error);
        return;
      }
      out.info(out.formatTodo(result.data));
    }));
}
