import { spawn } from 'node:child_process';
import { X509Certificate } from 'node:crypto';
import { errorMessage } from './errors.ts';

export type DecodeOutcome =
  | { ok: true; endDate: string }
  | { ok: false; diagnostic: string };

/** Reads the notAfter field of a PEM certificate without verifying it. */
export interface X509Decoder {
  readonly name: string;
  readEndDate(pem: string, timeoutMs: number): Promise<DecodeOutcome>;
}

export type DecoderName = 'openssl' | 'native';

export function derToPem(der: Buffer): string {
  const base64 = der.toString('base64');
  const lines = base64.match(/.{1,64}/g) ?? [];
  return `-----BEGIN CERTIFICATE-----\n${lines.join('\n')}\n-----END CERTIFICATE-----\n`;
}

/** Shells out to `openssl x509 -noout -enddate`. */
export class OpensslDecoder implements X509Decoder {
  readonly name = 'openssl';
  private readonly binary: string;

  constructor(binary = 'openssl') {
    this.binary = binary;
  }

  readEndDate(pem: string, timeoutMs: number): Promise<DecodeOutcome> {
    return new Promise((resolve) => {
      let settled = false;
      let stdout = '';
      let stderr = '';
      let timer: ReturnType<typeof setTimeout> | undefined;

      const done = (outcome: DecodeOutcome) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(outcome);
      };

      const proc = spawn(this.binary, ['x509', '-noout', '-enddate']);

      timer = setTimeout(() => {
        proc.kill('SIGKILL');
        done({ ok: false, diagnostic: `openssl timed out after ${timeoutMs}ms` });
      }, timeoutMs);

      proc.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });

      proc.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      proc.on('error', (err) => {
        done({ ok: false, diagnostic: errorMessage(err) });
      });

      proc.on('close', (code) => {
        if (code !== 0) {
          done({ ok: false, diagnostic: stderr.trim() || `openssl exited with code ${code}` });
          return;
        }

        // "notAfter=Oct  9 23:59:59 2026 GMT"
        const line = stdout.trim();
        const eq = line.indexOf('=');
        if (eq === -1) {
          done({ ok: false, diagnostic: `Unexpected openssl output: "${line}"` });
          return;
        }
        done({ ok: true, endDate: line.slice(eq + 1) });
      });

      // The child may exit before reading stdin; its exit code is reported through 'close'.
      proc.stdin.on('error', (err) => {
        console.debug(`[x509] openssl stdin closed: ${errorMessage(err)}`);
      });
      proc.stdin.end(pem);
    });
  }
}

/** In-process decoder backed by node:crypto. Parsing is synchronous, so there is nothing for a timeout to bound. */
export class NativeDecoder implements X509Decoder {
  readonly name = 'native';

  async readEndDate(pem: string, _timeoutMs?: number): Promise<DecodeOutcome> {
    try {
      return { ok: true, endDate: new X509Certificate(pem).validTo };
    } catch (err) {
      return { ok: false, diagnostic: errorMessage(err) };
    }
  }
}

export function createDecoder(name: DecoderName): X509Decoder {
  return name === 'native' ? new NativeDecoder() : new OpensslDecoder();
}
