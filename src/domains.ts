import type { DomainTarget } from './types.ts';

/**
 * Parse a comma-separated domain list. Each entry is either `host` or
 * `host:runbookUrl`; only the first colon separates the two, so the URL
 * keeps its own scheme, port and query string.
 */
export function parseDomains(spec: string): DomainTarget[] {
  const targets: DomainTarget[] = [];

  for (const entry of spec.split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) continue;

    const colon = trimmed.indexOf(':');
    if (colon === -1) {
      targets.push({ domain: trimmed, runbookUrl: null });
      continue;
    }

    const domain = trimmed.slice(0, colon).trim();
    const runbookUrl = trimmed.slice(colon + 1).trim();
    if (!domain) continue;

    targets.push({ domain, runbookUrl: runbookUrl || null });
  }

  return targets;
}
