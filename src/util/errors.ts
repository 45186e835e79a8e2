/**
 * A broken engine invariant. Never recovered from: the round is abandoned and
 * the CLI exits non-zero.
 */
export class ProtocolViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DeckExhaustedError extends ProtocolViolation {
  constructor() {
    super('Cannot deal from an empty deck');
  }
}

export class IllegalTransitionError extends ProtocolViolation {
  constructor(readonly from: string, readonly to: string) {
    super(`Illegal round transition ${from} -> ${to}`);
  }
}

/** The prompt's input ended while a question was pending. */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
