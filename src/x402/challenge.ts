import { PaymentError } from '../errors.js';
import {
  PaymentRequirementSchema,
  type AmountSource,
  type PaymentOption,
  type PaymentRequirement,
  type SelectedOption,
} from './types.js';

const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

function decodeBase64Json(value: string): unknown {
  const trimmed = value.trim();
  if (!trimmed || trimmed.length % 4 !== 0 || !BASE64_RE.test(trimmed)) {
    throw new PaymentError('challenge is unparsable: not valid base64');
  }
  const text = Buffer.from(trimmed, 'base64').toString('utf-8');
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new PaymentError('challenge is unparsable: not valid JSON', { cause: err });
  }
}

function toRequirement(value: unknown): PaymentRequirement {
  const parsed = PaymentRequirementSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new PaymentError(`challenge is unparsable: ${issue?.message ?? 'invalid shape'}${where}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Decode a base64 `payment-required` header value. */
export function parsePaymentRequired(headerValue: string): PaymentRequirement {
  return toRequirement(decodeBase64Json(headerValue));
}

export function encodePaymentRequired(requirement: PaymentRequirement): string {
  return Buffer.from(JSON.stringify(requirement)).toString('base64');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Challenge carried in a 402 response body, for servers that omit the header.
 *
 * Recognized shapes: `{ "x402": "<base64>" }`, `{ "x402": { ...requirement } }`, or a
 * body that is itself a requirement (`x402Version` + `accepts`). The body text is
 * decoded as received. Returns null when the body has no challenge marker at all.
 */
export function extractChallengeFromBody(bodyText: string): PaymentRequirement | null {
  let body: unknown;
  try {
    body = JSON.parse(bodyText);
  } catch {
    return null;
  }
  if (!isRecord(body)) return null;

  if ('x402' in body) {
    const marker = body.x402;
    if (typeof marker === 'string') return parsePaymentRequired(marker);
    if (isRecord(marker)) return toRequirement(marker);
    // A bare flag such as `"x402": true` means the body is the requirement.
    return toRequirement(body);
  }
  if ('x402Version' in body && 'accepts' in body) {
    return toRequirement(body);
  }
  return null;
}

export function resolveAmount(option: PaymentOption): AmountSource {
  if (option.amount) {
    return { kind: 'amount', value: option.amount };
  }
  if (option.maxAmountRequired) {
    return { kind: 'legacy', field: 'maxAmountRequired', value: option.maxAmountRequired };
  }
  const legacy = option.extra?.maxAmountRequired;
  if (typeof legacy === 'string' && legacy !== '') {
    if (!/^\d+$/.test(legacy)) {
      throw new PaymentError('challenge is unparsable: extra.maxAmountRequired is not a base-10 integer');
    }
    return { kind: 'legacy', field: 'extra.maxAmountRequired', value: legacy };
  }
  return { kind: 'missing' };
}

/** First offered option wins; there is no comparison between options. */
export function selectPaymentOption(requirement: PaymentRequirement): SelectedOption {
  const option = requirement.accepts[0];
  if (!option) {
    throw new PaymentError('no payment options offered');
  }
  const amount = resolveAmount(option);
  switch (amount.kind) {
    case 'missing':
      throw new PaymentError('no amount found in payment requirements');
    case 'amount':
    case 'legacy':
      return { option, amount: amount.value, source: amount.kind };
  }
}
