/**
 * Error taxonomy shared by the x402 core and the API clients.
 * Callers branch on `kind`; messages never carry key material or nonces.
 */

export type ErrorKind = 'validation' | 'payment' | 'api' | 'network' | 'crypto' | 'signing';

export abstract class X402ClientError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed local input, raised before any request is sent. */
export class ValidationError extends X402ClientError {
  readonly kind = 'validation';
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Validation error for ${field}: ${message}`);
    this.field = field;
  }
}

/** Challenge unusable, signing failed, or the server rejected the signed payment. */
export class PaymentError extends X402ClientError {
  readonly kind = 'payment';
}

/** HTTP status outside {200, 402}, or a 402 that carries no challenge. */
export class APIError extends X402ClientError {
  readonly kind = 'api';
  readonly statusCode: number;
  readonly body: string;

  constructor(statusCode: number, message: string, body = '') {
    super(`API error (status ${statusCode}): ${message}`);
    this.statusCode = statusCode;
    this.body = body;
  }
}

/** Transport failure or timeout; the attempt is not repeated. */
export class NetworkError extends X402ClientError {
  readonly kind = 'network';
}

export class CryptoError extends X402ClientError {
  readonly kind = 'crypto';
}

export class SigningError extends X402ClientError {
  readonly kind = 'signing';
}

export function isX402ClientError(err: unknown): err is X402ClientError {
  return err instanceof X402ClientError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
