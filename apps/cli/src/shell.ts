import { createInterface } from 'node:readline';
import type { TodoStore } from '@memtodo/core';
import { runCommandLine } from './session.js';

const EXIT_WORDS = new Set(['exit', 'quit']);

/**
 * Interactive session on stdin/stdout. Lines are handled one at a time,
 * so the store only ever sees one command at once.
 * Resolves when the user types exit/quit or stdin closes.
 */
export function startShell(store: TodoStore, prompt: string): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt });

  return new Promise((resolve) => {
    rl.on('line', (line) => {
      if (EXIT_WORDS.has(line.trim())) {
        rl.close();
        return;
      }
      runCommandLine(store, line);
      rl.prompt();
    });
    rl.on('close', () => resolve());
    rl.prompt();
  });
}
