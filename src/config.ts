import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { parseDomains } from './domains.ts';
import { ConfigurationError, errorMessage } from './errors.ts';
import type { DomainTarget } from './types.ts';
import type { DecoderName } from './x509.ts';

// A type alias so it satisfies commander's OptionValues index signature
export type CliOptions = {
  domains?: string;
  threshold?: string;
  concurrency?: string;
  timeout?: string;
  decoder?: string;
  envFile?: string;
};

export interface SmtpConfig {
  enabled: boolean;
  host: string;
  port: number;
  tls: boolean;
  user: string;
  password: string;
  fromName: string;
  fromAddress: string;
}

export interface MonitorConfig {
  targets: readonly DomainTarget[];
  thresholdDays: number;
  port: number;
  concurrency: number;
  connectTimeoutMs: number;
  decoderTimeoutMs: number;
  decoder: DecoderName;
  ca: Buffer | null;
  ciOutputPath: string | null;
  alertEmails: readonly string[];
  smtp: SmtpConfig;
}

export interface LoggingOptions {
  level: string;
  file: string | null;
}

const flag = z
  .string()
  .optional()
  .transform((value) => value?.toLowerCase() === 'true');

const list = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean)
  );

const configSchema = z.object({
  domains: z.string().default(''),
  threshold: z.coerce
    .number()
    .int('Threshold must be a whole number of days')
    .positive('Threshold must be a positive number of days')
    .default(30),
  concurrency: z.coerce.number().int().min(1).max(64).default(4),
  connectTimeoutMs: z.coerce.number().int().positive().default(10_000),
  decoderTimeoutMs: z.coerce.number().int().positive().default(5_000),
  decoder: z.enum(['openssl', 'native']).default('openssl'),
  caFile: z.string().optional(),
  ciOutputPath: z.string().optional(),
  alertEmails: list.pipe(z.array(z.string().email('Invalid alert email address'))),
  smtp: z.object({
    enabled: flag,
    host: z.string().default('localhost'),
    port: z.coerce.number().int().min(1).max(65535).default(587),
    tls: flag,
    user: z.string().default(''),
    password: z.string().default(''),
    fromName: z.string().default(''),
    fromAddress: z.string().default('tls-monitor@localhost'),
  }),
});

type Env = Record<string, string | undefined>;

function fromEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Build the run's configuration. Command-line options win over environment
 * variables, which already include anything loaded from `.env`.
 */
export function loadConfig(cli: CliOptions = {}, env: Env = process.env): MonitorConfig {
  const parsed = configSchema.safeParse({
    domains: cli.domains || fromEnv(env, 'MONITOR_DOMAINS'),
    threshold: cli.threshold ?? fromEnv(env, 'CERT_EXPIRATION_THRESHOLD_DAYS'),
    concurrency: cli.concurrency ?? fromEnv(env, 'CHECK_CONCURRENCY'),
    connectTimeoutMs: cli.timeout ?? fromEnv(env, 'CONNECT_TIMEOUT_MS'),
    decoderTimeoutMs: fromEnv(env, 'DECODER_TIMEOUT_MS'),
    decoder: cli.decoder ?? fromEnv(env, 'X509_DECODER'),
    caFile: fromEnv(env, 'CA_FILE'),
    ciOutputPath: fromEnv(env, 'GITHUB_OUTPUT'),
    alertEmails: fromEnv(env, 'ALERT_EMAILS'),
    smtp: {
      enabled: fromEnv(env, 'SMTP_ENABLED'),
      host: fromEnv(env, 'SMTP_HOST'),
      port: fromEnv(env, 'SMTP_PORT'),
      tls: fromEnv(env, 'SMTP_TLS'),
      user: fromEnv(env, 'SMTP_USER'),
      password: fromEnv(env, 'SMTP_PASSWORD'),
      fromName: fromEnv(env, 'SMTP_FROM_NAME'),
      fromAddress: fromEnv(env, 'SMTP_FROM_ADDRESS'),
    },
  });

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  const targets = parseDomains(values.domains);
  if (targets.length === 0) {
    throw new ConfigurationError('Missing MONITOR_DOMAINS');
  }

  return Object.freeze({
    targets: Object.freeze(targets.map((target) => Object.freeze(target))),
    thresholdDays: values.threshold,
    port: 443,
    concurrency: values.concurrency,
    connectTimeoutMs: values.connectTimeoutMs,
    decoderTimeoutMs: values.decoderTimeoutMs,
    decoder: values.decoder,
    ca: values.caFile ? readCaFile(values.caFile) : null,
    ciOutputPath: values.ciOutputPath ?? null,
    alertEmails: Object.freeze(values.alertEmails),
    smtp: Object.freeze(values.smtp),
  });
}

function readCaFile(path: string): Buffer {
  try {
    return readFileSync(path);
  } catch (err) {
    throw new ConfigurationError(`Cannot read CA_FILE ${path}: ${errorMessage(err)}`);
  }
}

/** Log settings are read before the rest of the configuration so config errors can be logged. */
export function loggingOptions(env: Env = process.env): LoggingOptions {
  const debug = fromEnv(env, 'DEBUG')?.toLowerCase() === 'true';
  return {
    level: fromEnv(env, 'NODE_LOG_LEVEL') ?? (debug ? 'debug' : 'info'),
    file: fromEnv(env, 'NODE_LOG_FILE') ?? null,
  };
}
