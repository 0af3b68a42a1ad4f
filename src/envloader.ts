import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

const LINE = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;

/**
 * Parse the contents of a .env file. Blank lines and `#` comments are
 * skipped; one pair of surrounding quotes is removed from values.
 */
export function parseEnv(content: string): Record<string, string> {
  const values: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const match = LINE.exec(trimmed);
    if (!match) {
      continue;
    }

    const [, key, raw] = match;
    const value = raw.trim();
    const quoted = value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0]);
    values[key] = quoted ? value.slice(1, -1) : value;
  }

  return values;
}

/**
 * Load variables from a .env file into `env` without overriding variables
 * that are already set. Returns the names that were applied.
 */
export function loadEnv(
  envPath: string = '.env',
  env: Record<string, string | undefined> = process.env
): string[] {
  const fullPath = resolve(process.cwd(), envPath);

  if (!existsSync(fullPath)) {
    return [];
  }

  const applied: string[] = [];
  for (const [key, value] of Object.entries(parseEnv(readFileSync(fullPath, 'utf-8')))) {
    if (env[key] === undefined) {
      env[key] = value;
      applied.push(key);
    }
  }

  console.log(`[envloader] Loaded ${applied.length} variable(s) from ${fullPath}`);
  return applied;
}
