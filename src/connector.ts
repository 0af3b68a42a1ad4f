import tls from 'node:tls';
import { isIP } from 'node:net';
import { ConnectivityError, VerificationError } from './errors.ts';

export type HandshakeMode = 'strict' | 'relaxed';

export interface HandshakeOptions {
  port: number;
  timeoutMs: number;
  /** Extra trusted roots, added to Node's bundled store for strict handshakes. */
  ca: Buffer | null;
}

export interface VerifiedSession {
  kind: 'verified';
  /** `valid_to` from the verified peer certificate, when present. */
  notAfter: string | null;
}

export interface RelaxedSession {
  kind: 'relaxed';
  /** DER bytes of the unverified peer certificate. */
  raw: Buffer | null;
}

export interface FailedHandshake {
  kind: 'failed';
  error: ConnectivityError | VerificationError;
}

export type HandshakeOutcome = VerifiedSession | RelaxedSession | FailedHandshake;

export type HandshakeFn = (
  host: string,
  mode: HandshakeMode,
  options: HandshakeOptions
) => Promise<HandshakeOutcome>;

function authorizationDetail(socket: tls.TLSSocket): string {
  // Node stores the OpenSSL verify code here (or the message when there is none).
  const reason: unknown = socket.authorizationError;
  if (reason instanceof Error) return reason.message;
  return reason ? String(reason) : 'peer certificate not trusted';
}

/**
 * One TCP connect plus TLS handshake. Always resolves; the socket never outlives the call.
 *
 * Both tiers complete the handshake without rejecting the peer. The strict tier then
 * fails with a VerificationError when Node did not authorize the chain or the
 * hostname, so every verification result falls back, whatever its OpenSSL code.
 * Errors raised before the handshake completes are connectivity failures.
 */
export const handshake: HandshakeFn = (host, mode, options) => {
  return new Promise((resolve) => {
    let settled = false;

    const finish = (outcome: HandshakeOutcome) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(outcome);
    };

    const strict = mode === 'strict';
    const connectOptions: tls.ConnectionOptions = {
      host,
      port: options.port,
      timeout: options.timeoutMs,
      rejectUnauthorized: false,
    };

    // SNI is not sent for IP literals.
    if (isIP(host) === 0) {
      connectOptions.servername = host;
    }
    if (strict && options.ca) {
      connectOptions.ca = [...tls.rootCertificates, options.ca];
    }
    if (!strict) {
      connectOptions.checkServerIdentity = () => undefined;
    }

    const socket = tls.connect(connectOptions, () => {
      const peer = socket.getPeerCertificate();

      if (strict) {
        if (!socket.authorized) {
          finish({
            kind: 'failed',
            error: new VerificationError(`Certificate verification failed: ${authorizationDetail(socket)}`),
          });
          return;
        }
        finish({ kind: 'verified', notAfter: peer.valid_to || null });
        return;
      }

      finish({ kind: 'relaxed', raw: peer.raw && peer.raw.length > 0 ? peer.raw : null });
    });

    socket.on('error', (err) => {
      finish({ kind: 'failed', error: new ConnectivityError(err.message) });
    });

    socket.on('timeout', () => {
      finish({
        kind: 'failed',
        error: new ConnectivityError(
          `Connection to ${host}:${options.port} timed out after ${options.timeoutMs}ms`
        ),
      });
    });
  });
};

/**
 * Strict handshake first; only a verification failure falls back to a
 * relaxed handshake. Connectivity failures, and any failure of the relaxed
 * tier, are returned as they are.
 */
export async function openSession(
  host: string,
  options: HandshakeOptions,
  connect: HandshakeFn = handshake
): Promise<HandshakeOutcome> {
  const strict = await connect(host, 'strict', options);
  if (strict.kind !== 'failed' || strict.error.kind !== 'verification') {
    return strict;
  }

  console.debug(`[connector] ${host}: verification failed (${strict.error.message}), retrying unverified`);
  return connect(host, 'relaxed', options);
}
