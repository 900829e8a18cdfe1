/**
 * Error taxonomy shared by the clients and the polling loops.
 *
 * - TransientFetchError: market data unavailable; the current symbol/cycle is skipped.
 * - OrderSubmissionError: a single order failed; reported in the batch summary.
 * - ConfigurationError: fatal at startup.
 * - NotifierDeliveryError: logged and discarded.
 */

export class TransientFetchError extends Error {
  readonly symbol?: string;
  readonly status?: number;

  constructor(message: string, options: { symbol?: string; status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransientFetchError';
    this.symbol = options.symbol;
    this.status = options.status;
  }
}

export class OrderSubmissionError extends Error {
  readonly symbol: string;
  readonly status?: number;

  constructor(symbol: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'OrderSubmissionError';
    this.symbol = symbol;
    this.status = options.status;
  }
}

export class ConfigurationError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.key = key;
  }
}

export class NotifierDeliveryError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'NotifierDeliveryError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorName(err: unknown): string {
  return err instanceof Error ? err.name : typeof err;
}
