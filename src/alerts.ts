import type { AlertOutcome, CertificateCheckResult } from './types.ts';

export function shouldAlert(result: CertificateCheckResult, thresholdDays: number): boolean {
  if (result.status === 'ERROR') return true;
  if (result.daysRemaining === null) return true;
  return result.daysRemaining < thresholdDays;
}

/**
 * Runs once every check has finished. No matching result is its own
 * outcome rather than an empty batch.
 */
export function collectAlerts(
  results: readonly CertificateCheckResult[],
  thresholdDays: number,
  now: Date = new Date()
): AlertOutcome {
  const alerts = results.filter((result) => shouldAlert(result, thresholdDays));

  if (alerts.length === 0) {
    return { kind: 'healthy' };
  }

  return {
    kind: 'alerts',
    batch: Object.freeze({ alerts, thresholdDays, checkedAt: now }),
  };
}
