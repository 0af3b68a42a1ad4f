import { appendFileSync } from 'node:fs';
import { formatExpiryDate, formatExpiryTimestamp } from './expiry.ts';
import type { AlertBatch, CertificateCheckResult } from './types.ts';

const RULE = '='.repeat(60);

export function progressLine(result: CertificateCheckResult): string {
  switch (result.status) {
    case 'ERROR':
      return `${result.domain}: ERROR (${result.error})`;
    case 'EXPIRED':
      return `${result.domain}: EXPIRED`;
    case 'CRITICAL':
      return `${result.domain}: CRITICAL (${result.daysRemaining} days)`;
    case 'OK':
      return `${result.domain}: OK (${result.daysRemaining} days)`;
  }
}

export function formatAlertSummary(batch: AlertBatch): string[] {
  const lines = [RULE, 'CERTIFICATE ALERTS SUMMARY', RULE];

  for (const alert of batch.alerts) {
    lines.push('', alert.domain, `  Status: ${alert.status}`);

    if (alert.status === 'ERROR') {
      lines.push(`  Error: ${alert.error}`);
    } else {
      lines.push(`  Expires: ${formatExpiryDate(alert.expiresAt)}`);
      lines.push(`  Days remaining: ${alert.daysRemaining}`);
    }

    if (alert.runbookUrl) {
      lines.push(`  Runbook: ${alert.runbookUrl}`);
    }
  }

  lines.push('', '-'.repeat(60), `Threshold: ${batch.thresholdDays} days`, RULE);
  return lines;
}

interface AlertRecord {
  domain: string;
  status: CertificateCheckResult['status'];
  days_remaining: number | null;
  expires_at: string | null;
  error: string | null;
}

function toRecord(result: CertificateCheckResult): AlertRecord {
  return {
    domain: result.domain,
    status: result.status,
    days_remaining: result.daysRemaining,
    expires_at: result.expiresAt ? formatExpiryTimestamp(result.expiresAt) : null,
    error: result.error,
  };
}

/** The `alerts=<json>` line consumed by CI workflows. */
export function formatAlertsOutput(batch: AlertBatch): string {
  return `alerts=${JSON.stringify(batch.alerts.map(toRecord))}`;
}

export function writeCiOutput(path: string, batch: AlertBatch): void {
  appendFileSync(path, `${formatAlertsOutput(batch)}\n`);
}
