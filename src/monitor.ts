import { collectAlerts } from './alerts.ts';
import { checkAll, type CheckDeps } from './checker.ts';
import type { MonitorConfig } from './config.ts';
import { notifyAlerts } from './notify.ts';
import { formatAlertSummary, progressLine, writeCiOutput } from './report.ts';
import { createDecoder } from './x509.ts';
import type { AlertOutcome, CertificateCheckResult } from './types.ts';

export const EXIT_HEALTHY = 0;
export const EXIT_ALERTS = 1;
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_FAILURE = 3;

export interface RunReport {
  results: CertificateCheckResult[];
  outcome: AlertOutcome;
  exitCode: number;
}

function logResult(result: CertificateCheckResult): void {
  const line = `[monitor] ${progressLine(result)}`;
  if (result.status === 'OK') {
    console.log(line);
  } else {
    console.warn(line);
  }
}

export async function runMonitor(config: MonitorConfig, deps: Partial<CheckDeps> = {}): Promise<RunReport> {
  const checkDeps: CheckDeps = {
    ...deps,
    decoder: deps.decoder ?? createDecoder(config.decoder),
  };

  console.log(`[monitor] Checking ${config.targets.length} domain(s)`);
  console.log(`[monitor] Threshold: ${config.thresholdDays} days`);

  const results = await checkAll(
    config.targets,
    {
      port: config.port,
      timeoutMs: config.connectTimeoutMs,
      ca: config.ca,
      decoderTimeoutMs: config.decoderTimeoutMs,
      concurrency: config.concurrency,
    },
    checkDeps,
    logResult
  );

  const outcome = collectAlerts(results, config.thresholdDays, checkDeps.now?.());

  if (outcome.kind === 'healthy') {
    console.log('[monitor] All certificates are healthy');
    return { results, outcome, exitCode: EXIT_HEALTHY };
  }

  const { batch } = outcome;
  console.warn(`[monitor] ${batch.alerts.length} certificate(s) need attention`);
  for (const line of formatAlertSummary(batch)) {
    console.warn(line);
  }

  if (config.alertEmails.length > 0) {
    await notifyAlerts(config.smtp, batch, config.alertEmails);
  }

  if (config.ciOutputPath) {
    writeCiOutput(config.ciOutputPath, batch);
    console.log(`[monitor] Wrote alerts to ${config.ciOutputPath}`);
  }

  return { results, outcome, exitCode: EXIT_ALERTS };
}
