import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { formatAlertSummary, formatAlertsOutput, progressLine, writeCiOutput } from './report.ts';
import { errorResult, okResult, type AlertBatch } from './types.ts';

const expiresAt = new Date('2025-06-15T12:34:56.000Z');

const batch: AlertBatch = {
  alerts: [
    okResult({ domain: 'a.com', runbookUrl: 'https://runbook.io/a' }, 'CRITICAL', expiresAt, 3),
    errorResult({ domain: 'b.com', runbookUrl: null }, 'Connection to b.com:443 timed out after 10000ms'),
  ],
  thresholdDays: 30,
  checkedAt: new Date('2025-06-12T00:00:00.000Z'),
};

describe('progressLine', () => {
  it('describes each status', () => {
    const target = { domain: 'a.com', runbookUrl: null };
    expect(progressLine(okResult(target, 'OK', expiresAt, 45))).toBe('a.com: OK (45 days)');
    expect(progressLine(okResult(target, 'CRITICAL', expiresAt, 2))).toBe('a.com: CRITICAL (2 days)');
    expect(progressLine(okResult(target, 'EXPIRED', expiresAt, -4))).toBe('a.com: EXPIRED');
    expect(progressLine(errorResult(target, 'getaddrinfo ENOTFOUND a.com'))).toBe(
      'a.com: ERROR (getaddrinfo ENOTFOUND a.com)'
    );
  });
});

describe('formatAlertSummary', () => {
  it('lists every alert with its details', () => {
    const rule = '='.repeat(60);
    expect(formatAlertSummary(batch)).toEqual([
      rule,
      'CERTIFICATE ALERTS SUMMARY',
      rule,
      '',
      'a.com',
      '  Status: CRITICAL',
      '  Expires: 2025-06-15',
      '  Days remaining: 3',
      '  Runbook: https://runbook.io/a',
      '',
      'b.com',
      '  Status: ERROR',
      '  Error: Connection to b.com:443 timed out after 10000ms',
      '',
      '-'.repeat(60),
      'Threshold: 30 days',
      rule,
    ]);
  });
});

describe('formatAlertsOutput', () => {
  it('renders the alerts as a JSON array', () => {
    const line = formatAlertsOutput(batch);
    expect(line.startsWith('alerts=')).toBe(true);
    expect(JSON.parse(line.slice('alerts='.length))).toEqual([
      {
        domain: 'a.com',
        status: 'CRITICAL',
        days_remaining: 3,
        expires_at: '2025-06-15T12:34:56',
        error: null,
      },
      {
        domain: 'b.com',
        status: 'ERROR',
        days_remaining: null,
        expires_at: null,
        error: 'Connection to b.com:443 timed out after 10000ms',
      },
    ]);
  });
});

describe('writeCiOutput', () => {
  it('appends one line to the output file', () => {
    const path = join(mkdtempSync(join(tmpdir(), 'tls-monitor-out-')), 'output');
    writeFileSync(path, 'previous=1\n');

    writeCiOutput(path, batch);

    expect(readFileSync(path, 'utf-8')).toBe(`previous=1\n${formatAlertsOutput(batch)}\n`);
  });
});
