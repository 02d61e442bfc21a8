import { MAX_TITLE_LEN } from '@memtodo/core';

export interface CliConfig {
  maxTitleLength: number;
  prompt: string;
}

export const DEFAULT_PROMPT = 'memtodo> ';

function parsePositiveInt(raw: string, source: string): number {
  const n = Number(raw.trim());
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`Invalid max title length from ${source}: '${raw}'`);
  }
  return n;
}

/**
 * Resolve CLI settings. Flags win over the environment; both fall back to defaults.
 * Throws on a value that isn't a positive integer.
 */
export function loadConfig(
  env: Record<string, string | undefined>,
  flags: { maxTitleLength?: string } = {},
): CliConfig {
  let maxTitleLength = MAX_TITLE_LEN;
  const fromEnv = env['MEMTODO_MAX_TITLE_LEN'];
  if (flags.maxTitleLength !== undefined) {
    maxTitleLength = parsePositiveInt(flags.maxTitleLength, '--max-title-length');
  } else if (fromEnv) {
    maxTitleLength = parsePositiveInt(fromEnv, 'MEMTODO_MAX_TITLE_LEN');
  }

  return {
    maxTitleLength,
    prompt: env['MEMTODO_PROMPT'] ?? DEFAULT_PROMPT,
  };
}
