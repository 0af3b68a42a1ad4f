export type MonitorErrorKind = 'configuration' | 'connectivity' | 'verification' | 'decode';

export class MonitorError extends Error {
  readonly kind: MonitorErrorKind;

  constructor(kind: MonitorErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Fatal: aborts the run before any domain is checked. */
export class ConfigurationError extends MonitorError {
  constructor(message: string) {
    super('configuration', message);
  }
}

export class ConnectivityError extends MonitorError {
  constructor(message: string) {
    super('connectivity', message);
  }
}

export class VerificationError extends MonitorError {
  constructor(message: string) {
    super('verification', message);
  }
}

export class DecodeError extends MonitorError {
  constructor(message: string) {
    super('decode', message);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
