import { DecodeError } from './errors.ts';
import type { CertificateStatus } from './types.ts';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
export const CRITICAL_DAYS = 7;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// e.g. "Jun 15 12:34:56 2025 GMT" or OpenSSL's "Oct  9 23:59:59 2026 GMT"
const CERT_DATE = /^([A-Z][a-z]{2})\s+(\d{1,2})\s+(\d{2}):(\d{2}):(\d{2})\s+(\d{4})\s+(GMT|UTC)$/;

/**
 * Parse a certificate notAfter string. The returned Date carries the
 * printed fields as its UTC fields.
 */
export function parseCertificateDate(text: string): Date {
  const match = CERT_DATE.exec(text.trim());
  if (!match) {
    throw new DecodeError(`Unrecognised certificate date: "${text}"`);
  }

  const [, mon, dd, hh, mm, ss, yyyy] = match;
  const month = MONTHS.indexOf(mon);
  if (month === -1) {
    throw new DecodeError(`Unrecognised month in certificate date: "${text}"`);
  }

  const year = Number(yyyy);
  const day = Number(dd);
  const hours = Number(hh);
  const minutes = Number(mm);
  const seconds = Number(ss);
  const date = new Date(Date.UTC(year, month, day, hours, minutes, seconds));

  // Date.UTC rolls out-of-range fields over (Feb 30 -> Mar 2); reject them instead.
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hours ||
    date.getUTCMinutes() !== minutes ||
    date.getUTCSeconds() !== seconds
  ) {
    throw new DecodeError(`Invalid certificate date: "${text}"`);
  }

  return date;
}

/** Local wall-clock reading of `date`, expressed on the same axis as parsed certificate dates. */
export function wallClock(date: Date): Date {
  return new Date(
    Date.UTC(
      date.getFullYear(),
      date.getMonth(),
      date.getDate(),
      date.getHours(),
      date.getMinutes(),
      date.getSeconds(),
      date.getMilliseconds()
    )
  );
}

/**
 * Whole days (floored) from the local clock reading `now` to `expiresAt`.
 * The certificate's GMT time is compared against local wall-clock time
 * without zone normalisation, so results can be off by the local UTC offset.
 */
export function daysBetween(expiresAt: Date, now: Date): number {
  return Math.floor((expiresAt.getTime() - wallClock(now).getTime()) / MS_PER_DAY);
}

export function classifyExpiry(daysRemaining: number): Exclude<CertificateStatus, 'ERROR'> {
  if (daysRemaining < 0) return 'EXPIRED';
  if (daysRemaining < CRITICAL_DAYS) return 'CRITICAL';
  return 'OK';
}

const pad = (n: number) => String(n).padStart(2, '0');

export function formatExpiryDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/** ISO-8601 without a zone designator, e.g. `2026-10-09T23:59:59`. */
export function formatExpiryTimestamp(date: Date): string {
  return (
    `${formatExpiryDate(date)}` +
    `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}
