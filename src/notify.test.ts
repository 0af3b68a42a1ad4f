import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const mockSendMail = vi.fn().mockResolvedValue({ messageId: 'test' });
const mockClose = vi.fn();

vi.mock('nodemailer', () => ({
  default: {
    createTransport: vi.fn(() => ({ sendMail: mockSendMail, close: mockClose })),
  },
}));

import nodemailer from 'nodemailer';
import { alertSubject, notifyAlerts, resetTransporter, sendEmail } from './notify.ts';
import type { SmtpConfig } from './config.ts';
import { errorResult, type AlertBatch } from './types.ts';

const smtp: SmtpConfig = {
  enabled: true,
  host: 'smtp.test.com',
  port: 587,
  tls: true,
  user: 'user@test.com',
  password: 'test-password',
  fromName: 'TLS Monitor',
  fromAddress: 'monitor@test.com',
};

const batch: AlertBatch = {
  alerts: [errorResult({ domain: 'a.com', runbookUrl: null }, 'connect ECONNREFUSED')],
  thresholdDays: 30,
  checkedAt: new Date('2025-06-12T00:00:00.000Z'),
};

describe('notify', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    resetTransporter();
  });

  it('logs instead of sending when SMTP is disabled', async () => {
    const sent = await sendEmail({ ...smtp, enabled: false }, 'ops@test.com', 'subject', 'body');

    expect(sent).toBe(false);
    expect(nodemailer.createTransport).not.toHaveBeenCalled();
    expect(console.log).toHaveBeenCalledWith('  To: ops@test.com');
  });

  it('sends through a local relay when SMTP is enabled', async () => {
    const sent = await sendEmail({ ...smtp, host: 'localhost', port: 25 }, 'ops@test.com', 'subject', 'body');

    expect(sent).toBe(true);
    expect(nodemailer.createTransport).toHaveBeenCalledWith(
      expect.objectContaining({ host: 'localhost', port: 25 })
    );
    expect(mockSendMail).toHaveBeenCalledTimes(1);
  });

  it('sends through the configured transport', async () => {
    const sent = await sendEmail(smtp, 'ops@test.com', 'subject', 'body');

    expect(sent).toBe(true);
    expect(nodemailer.createTransport).toHaveBeenCalledWith({
      host: 'smtp.test.com',
      port: 587,
      secure: false,
      requireTLS: true,
      auth: { user: 'user@test.com', pass: 'test-password' },
    });
    expect(mockSendMail).toHaveBeenCalledWith({
      from: '"TLS Monitor" <monitor@test.com>',
      to: 'ops@test.com',
      subject: 'subject',
      text: 'body',
    });
  });

  it('reports a failed send without throwing', async () => {
    mockSendMail.mockRejectedValueOnce(new Error('421 service unavailable'));

    await expect(sendEmail(smtp, 'ops@test.com', 'subject', 'body')).resolves.toBe(false);
    expect(console.error).toHaveBeenCalledWith('[notify] Failed to send email to ops@test.com: 421 service unavailable');
  });

  it('emails the alert summary to every recipient', async () => {
    const sent = await notifyAlerts(smtp, batch, ['ops@test.com', 'sre@test.com']);

    expect(sent).toBe(2);
    expect(mockSendMail).toHaveBeenCalledTimes(2);
    const message = mockSendMail.mock.calls[1][0];
    expect(message.to).toBe('sre@test.com');
    expect(message.subject).toBe('[TLS] 1 certificate(s) need attention');
    expect(message.text).toContain('  Error: connect ECONNREFUSED');
    expect(message.text.endsWith('Checked at: 2025-06-12T00:00:00.000Z')).toBe(true);
  });

  it('closes the transport on reset', async () => {
    await sendEmail(smtp, 'ops@test.com', 'subject', 'body');
    resetTransporter();
    expect(mockClose).toHaveBeenCalledTimes(1);
  });

  it('counts alerts in the subject', () => {
    expect(alertSubject(batch)).toBe('[TLS] 1 certificate(s) need attention');
  });
});
