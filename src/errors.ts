/** An error that ends the run with a message for the operator; no stack trace needed */
export class FatalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing credentials, stylesheet, executable or an invalid setting */
export class ConfigError extends FatalError {}

/** Anki or AnkiConnect never became reachable */
export class AvailabilityError extends FatalError {}

/** Malformed vocabulary or progress store contents */
export class DataError extends FatalError {}

export type AnkiErrorCode = 'duplicate' | 'action' | 'unreachable' | 'protocol';

export class AnkiConnectError extends Error {
  constructor(
    readonly code: AnkiErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'AnkiConnectError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
