import type { RelaxedSession, VerifiedSession } from './connector.ts';
import { errorMessage } from './errors.ts';
import { parseCertificateDate } from './expiry.ts';
import { derToPem, type X509Decoder } from './x509.ts';

export type Extraction = { ok: true; expiresAt: Date } | { ok: false; error: string };

export interface ExtractOptions {
  decoder: X509Decoder;
  decoderTimeoutMs: number;
}

export async function extractExpiry(
  session: VerifiedSession | RelaxedSession,
  options: ExtractOptions
): Promise<Extraction> {
  if (session.kind === 'verified') {
    return fromVerified(session);
  }
  return fromRelaxed(session, options);
}

function fromVerified(session: VerifiedSession): Extraction {
  if (!session.notAfter) {
    return { ok: false, error: 'Certificate missing notAfter field' };
  }

  try {
    return { ok: true, expiresAt: parseCertificateDate(session.notAfter) };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

// Unverified sessions only give us the DER bytes; the decoder reads notAfter from them.
async function fromRelaxed(session: RelaxedSession, options: ExtractOptions): Promise<Extraction> {
  if (!session.raw || session.raw.length === 0) {
    return { ok: false, error: 'Could not retrieve certificate' };
  }

  try {
    const pem = derToPem(session.raw);
    const outcome = await options.decoder.readEndDate(pem, options.decoderTimeoutMs);

    if (!outcome.ok) {
      return { ok: false, error: `${options.decoder.name} decoding failed: ${outcome.diagnostic}` };
    }

    return { ok: true, expiresAt: parseCertificateDate(outcome.endDate) };
  } catch (err) {
    return { ok: false, error: `Certificate parsing error: ${errorMessage(err)}` };
  }
}
