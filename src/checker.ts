import { openSession, handshake, type HandshakeFn, type HandshakeOptions } from './connector.ts';
import { extractExpiry } from './extractor.ts';
import { classifyExpiry, daysBetween } from './expiry.ts';
import { errorMessage } from './errors.ts';
import type { X509Decoder } from './x509.ts';
import { errorResult, okResult, type CertificateCheckResult, type DomainTarget } from './types.ts';

export interface CheckSettings extends HandshakeOptions {
  decoderTimeoutMs: number;
  concurrency: number;
}

export interface CheckDeps {
  decoder: X509Decoder;
  handshake?: HandshakeFn;
  now?: () => Date;
}

/** Connector, extractor and classifier for one domain. Never rejects. */
export async function checkCertificate(
  target: DomainTarget,
  settings: CheckSettings,
  deps: CheckDeps
): Promise<CertificateCheckResult> {
  const now = deps.now ?? (() => new Date());

  try {
    const session = await openSession(target.domain, settings, deps.handshake ?? handshake);
    if (session.kind === 'failed') {
      return errorResult(target, session.error.message);
    }

    const extraction = await extractExpiry(session, {
      decoder: deps.decoder,
      decoderTimeoutMs: settings.decoderTimeoutMs,
    });
    if (!extraction.ok) {
      return errorResult(target, extraction.error);
    }

    const daysRemaining = daysBetween(extraction.expiresAt, now());
    return okResult(target, classifyExpiry(daysRemaining), extraction.expiresAt, daysRemaining);
  } catch (err) {
    return errorResult(target, errorMessage(err));
  }
}

/**
 * Checks every target with at most `settings.concurrency` in flight and
 * resolves once all of them have finished. Results keep input order.
 */
export async function checkAll(
  targets: readonly DomainTarget[],
  settings: CheckSettings,
  deps: CheckDeps,
  onResult?: (result: CertificateCheckResult) => void
): Promise<CertificateCheckResult[]> {
  const results = new Array<CertificateCheckResult>(targets.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < targets.length) {
      const index = next++;
      const result = await checkCertificate(targets[index], settings, deps);
      results[index] = result;
      onResult?.(result);
    }
  };

  const workers = Math.max(1, Math.min(settings.concurrency, targets.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));

  return results;
}
