// Shared type definitions

export type CertificateStatus = 'OK' | 'CRITICAL' | 'EXPIRED' | 'ERROR';

export interface DomainTarget {
  domain: string;
  runbookUrl: string | null;
}

interface ResultBase {
  readonly domain: string;
  readonly runbookUrl: string | null;
}

export interface HealthyResult extends ResultBase {
  readonly status: Exclude<CertificateStatus, 'ERROR'>;
  readonly expiresAt: Date;
  readonly daysRemaining: number;
  readonly error: null;
}

export interface FailedResult extends ResultBase {
  readonly status: 'ERROR';
  readonly expiresAt: null;
  readonly daysRemaining: null;
  readonly error: string;
}

export type CertificateCheckResult = HealthyResult | FailedResult;

export interface AlertBatch {
  readonly alerts: readonly CertificateCheckResult[];
  readonly thresholdDays: number;
  readonly checkedAt: Date;
}

export type AlertOutcome =
  | { kind: 'healthy' }
  | { kind: 'alerts'; batch: AlertBatch };

export function okResult(
  target: DomainTarget,
  status: HealthyResult['status'],
  expiresAt: Date,
  daysRemaining: number
): HealthyResult {
  return Object.freeze({
    domain: target.domain,
    runbookUrl: target.runbookUrl,
    status,
    expiresAt,
    daysRemaining,
    error: null,
  });
}

export function errorResult(target: DomainTarget, error: string): FailedResult {
  return Object.freeze({
    domain: target.domain,
    runbookUrl: target.runbookUrl,
    status: 'ERROR',
    expiresAt: null,
    daysRemaining: null,
    error,
  });
}
