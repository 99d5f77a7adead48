import type { Hex } from 'viem';
import type { z } from 'zod';
import { APIError, NetworkError, PaymentError, errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../util/logger.js';
import { extractChallengeFromBody, parsePaymentRequired, selectPaymentOption } from './challenge.js';
import type { SpendingLedger } from './ledger.js';
import { createPaymentPayload, type PaymentDefaults } from './payload.js';
import {
  PAYMENT_REQUIRED_HEADER,
  PAYMENT_SIGNATURE_HEADER,
  type PaymentPayload,
  type PaymentRequirement,
} from './types.js';

export type PaymentState =
  | 'sent'
  | 'challenge_received'
  | 'signed'
  | 'retried'
  | 'settled'
  | 'rejected'
  | 'failed';

export type PaymentHandlerOptions = {
  privateKey: Hex;
  defaults: PaymentDefaults;
  ledger: SpendingLedger;
  fetch?: typeof fetch;
  timeoutMs?: number;
  /** Largest amount, in micro-units, the handler will sign for a single call. */
  maxPaymentPerCall?: bigint;
  logger?: Logger;
  nowSeconds?: () => number;
  nonce?: () => Hex;
};

export type PaymentReceipt = {
  amount: string;
  network: string;
  payTo: string;
  payload: PaymentPayload;
};

export type PaidResult<T> = {
  data: T;
  /** Null when the first request succeeded without a challenge. */
  payment: PaymentReceipt | null;
};

export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Drives one logical call through the x402 handshake: POST, and on 402 parse
 * the challenge, sign, and POST again exactly once with `PAYMENT-SIGNATURE`.
 * At most two round trips are made; both carry the same serialized body.
 */
export class PaymentHandler {
  private readonly privateKey: Hex;
  private readonly defaults: PaymentDefaults;
  private readonly ledger: SpendingLedger;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly maxPaymentPerCall?: bigint;
  private readonly log: Logger;
  private readonly nowSeconds?: () => number;
  private readonly nonce?: () => Hex;

  constructor(opts: PaymentHandlerOptions) {
    this.privateKey = opts.privateKey;
    this.defaults = opts.defaults;
    this.ledger = opts.ledger;
    this.fetchImpl = opts.fetch ?? fetch;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxPaymentPerCall = opts.maxPaymentPerCall;
    this.log = opts.logger ?? createLogger('x402');
    this.nowSeconds = opts.nowSeconds;
    this.nonce = opts.nonce;
  }

  async postJson<T>(url: string, body: unknown, schema: ResponseSchema<T>): Promise<PaidResult<T>> {
    const serialized = JSON.stringify(body);

    const first = await this.send(url, { 'Content-Type': 'application/json' }, serialized);
    this.transition('sent', url, first.status);

    if (first.status === 200) {
      this.transition('settled', url);
      return { data: await this.decode(first, schema), payment: null };
    }

    const firstBody = await this.readText(first);
    if (first.status !== 402) {
      this.transition('failed', url, first.status);
      throw new APIError(first.status, firstBody || 'request failed', firstBody);
    }

    this.transition('challenge_received', url);
    let created: { header: string; receipt: PaymentReceipt };
    try {
      const requirement = this.readChallenge(first.headers, firstBody);
      if (!requirement) {
        throw new APIError(402, 'payment required but no payment requirements found', firstBody);
      }
      created = await this.sign(url, requirement);
    } catch (err) {
      this.transition('failed', url);
      throw err;
    }
    this.transition('signed', url);

    const retried = await this.send(
      url,
      { 'Content-Type': 'application/json', [PAYMENT_SIGNATURE_HEADER]: created.header },
      serialized,
    );
    this.transition('retried', url, retried.status);

    if (retried.status === 402) {
      await this.readText(retried);
      this.transition('rejected', url);
      throw new PaymentError('payment rejected, check balance');
    }
    if (retried.status !== 200) {
      const raw = await this.readText(retried);
      this.transition('failed', url, retried.status);
      throw new APIError(retried.status, `request failed after payment: ${raw}`, raw);
    }

    // The transfer is settled once the server answers 200, whatever the body holds.
    this.ledger.record(created.receipt.amount);
    this.transition('settled', url);
    return { data: await this.decode(retried, schema), payment: created.receipt };
  }

  /** Plain GET for free endpoints; a 402 here is an ordinary API error. */
  async getJson<T>(url: string, schema: ResponseSchema<T>): Promise<T> {
    const res = await this.send(url, { Accept: 'application/json' });
    if (res.status !== 200) {
      const raw = await this.readText(res);
      throw new APIError(res.status, raw || 'request failed', raw);
    }
    return this.decode(res, schema);
  }

  private readChallenge(headers: Headers, bodyText: string): PaymentRequirement | null {
    const header = headers.get(PAYMENT_REQUIRED_HEADER);
    if (header) {
      return parsePaymentRequired(header);
    }
    return extractChallengeFromBody(bodyText);
  }

  private async sign(url: string, requirement: PaymentRequirement): Promise<{ header: string; receipt: PaymentReceipt }> {
    const { option, amount, source } = selectPaymentOption(requirement);
    if (this.maxPaymentPerCall != null && BigInt(amount) > this.maxPaymentPerCall) {
      throw new PaymentError(`amount ${amount} exceeds the per-call limit of ${this.maxPaymentPerCall}`);
    }
    this.log.debug('signing payment', { network: option.network, payTo: option.payTo, amount, source });

    const { header, payload } = await createPaymentPayload({
      privateKey: this.privateKey,
      option,
      amount,
      resourceUrl: requirement.resource?.url || url,
      resourceDescription: requirement.resource?.description,
      resourceMimeType: requirement.resource?.mimeType,
      extensions: requirement.extensions,
      defaults: this.defaults,
      nowSeconds: this.nowSeconds?.(),
      nonce: this.nonce,
    });
    return { header, receipt: { amount, network: option.network, payTo: option.payTo, payload } };
  }

  private async send(url: string, headers: Record<string, string>, body?: string): Promise<Response> {
    try {
      return await this.fetchImpl(url, {
        method: body === undefined ? 'GET' : 'POST',
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw this.networkError(url, err);
    }
  }

  private async readText(res: Response): Promise<string> {
    try {
      return await res.text();
    } catch (err) {
      throw this.networkError(res.url, err);
    }
  }

  private async decode<T>(res: Response, schema: ResponseSchema<T>): Promise<T> {
    const text = await this.readText(res);
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new APIError(res.status, 'response is not valid JSON', text);
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new APIError(res.status, `unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`, text);
    }
    return parsed.data;
  }

  private networkError(url: string, err: unknown): NetworkError {
    const timedOut = err instanceof Error && err.name === 'TimeoutError';
    this.log.warn(timedOut ? 'request timed out' : 'request failed', { url, error: errorMessage(err) });
    return new NetworkError(
      timedOut ? `request timed out after ${this.timeoutMs}ms` : `request failed: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  private transition(state: PaymentState, url: string, status?: number) {
    this.log.debug(`-> ${state}`, status === undefined ? { url } : { url, status });
  }
}
