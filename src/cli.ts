import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { z } from 'zod';
import type { CliOptions } from './config.ts';

const packageSchema = z.object({ name: z.string(), version: z.string() });

function readPackage(): z.infer<typeof packageSchema> {
  const content = readFileSync(new URL('../package.json', import.meta.url), 'utf-8');
  return packageSchema.parse(JSON.parse(content));
}

export function createProgram(): Command {
  const { name, version } = readPackage();

  return new Command()
    .name(name)
    .description('Monitor TLS certificate expiration dates')
    .version(version)
    .option('-d, --domains <list>', 'comma-separated domains to check, each optionally host:runbookUrl (overrides env vars and .env)')
    .option('-t, --threshold <days>', 'days before expiration to trigger an alert (default: 30)')
    .option('-c, --concurrency <n>', 'number of domains checked in parallel (default: 4)')
    .option('--timeout <ms>', 'connection and handshake timeout in milliseconds (default: 10000)')
    .option('--decoder <name>', 'X.509 decoder for unverified certificates: openssl or native (default: openssl)')
    .option('--env-file <path>', 'path of the .env file to load', '.env');
}

export function parseCli(argv: string[]): CliOptions {
  const program = createProgram();
  program.parse(argv);
  return program.opts<CliOptions>();
}
