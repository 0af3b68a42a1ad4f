import nodemailer from 'nodemailer';
import type { SmtpConfig } from './config.ts';
import { errorMessage } from './errors.ts';
import { formatAlertSummary } from './report.ts';
import type { AlertBatch } from './types.ts';

let transporter: nodemailer.Transporter | null = null;

function getTransporter(config: SmtpConfig): nodemailer.Transporter {
  if (!transporter) {
    transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.port === 465,
      requireTLS: config.tls,
      auth: config.user && config.password ? {
        user: config.user,
        pass: config.password,
      } : undefined,
    });
  }
  return transporter;
}

export function resetTransporter(): void {
  transporter?.close();
  transporter = null;
}

/** Returns true when the message was handed to SMTP. */
export async function sendEmail(config: SmtpConfig, to: string, subject: string, body: string): Promise<boolean> {
  if (!config.enabled || !config.host) {
    console.log('[notify] SMTP not configured, logging email instead:');
    console.log(`  To: ${to}`);
    console.log(`  Subject: ${subject}`);
    console.log(`  Body: ${body}`);
    return false;
  }

  try {
    const fromAddress = config.fromName
      ? `"${config.fromName}" <${config.fromAddress}>`
      : config.fromAddress;

    await getTransporter(config).sendMail({
      from: fromAddress,
      to,
      subject,
      text: body,
    });
    console.log(`[notify] Email sent to ${to}`);
    return true;
  } catch (err) {
    console.error(`[notify] Failed to send email to ${to}: ${errorMessage(err)}`);
    return false;
  }
}

export function alertSubject(batch: AlertBatch): string {
  return `[TLS] ${batch.alerts.length} certificate(s) need attention`;
}

export async function notifyAlerts(config: SmtpConfig, batch: AlertBatch, emails: readonly string[]): Promise<number> {
  const subject = alertSubject(batch);
  const body = `${formatAlertSummary(batch).join('\n')}\nChecked at: ${batch.checkedAt.toISOString()}`;

  let sent = 0;
  for (const email of emails) {
    if (await sendEmail(config, email, subject, body)) {
      sent++;
    }
  }
  return sent;
}
