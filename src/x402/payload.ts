import type { Address, Hex } from 'viem';
import { PaymentError, errorMessage } from '../errors.js';
import { DEFAULT_TOKEN_NAME, DEFAULT_TOKEN_VERSION, randomNonce32, type TokenDomain } from './eip3009.js';
import { networkToChainId } from './networks.js';
import { authorizationWindow, signTransferAuthorization, toAddress } from './signer.js';
import {
  PaymentPayloadSchema,
  X402_VERSION,
  type PaymentOption,
  type PaymentPayload,
  type TransferAuthorization,
} from './types.js';

export type PaymentDefaults = {
  network: string;
  asset: Address;
  tokenName?: string;
  tokenVersion?: string;
};

function extraString(extra: PaymentOption['extra'], key: string): string | undefined {
  const value = extra?.[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/** Resolve the EIP-712 domain the authorization is signed under. */
export function resolveTokenDomain(option: PaymentOption, defaults: PaymentDefaults): TokenDomain {
  const chainId = networkToChainId(option.network) ?? networkToChainId(defaults.network);
  if (chainId == null) {
    throw new PaymentError(`unsupported network ${option.network}`);
  }
  return {
    name: extraString(option.extra, 'name') ?? defaults.tokenName ?? DEFAULT_TOKEN_NAME,
    version: extraString(option.extra, 'version') ?? defaults.tokenVersion ?? DEFAULT_TOKEN_VERSION,
    chainId,
    verifyingContract: option.asset ? toAddress(option.asset, 'asset') : defaults.asset,
  };
}

export type BuildPayloadInput = {
  option: PaymentOption;
  amount: string;
  domain: TokenDomain;
  resource: { url: string; description: string; mimeType: string };
  signature: Hex;
  authorization: TransferAuthorization;
  extensions?: Record<string, unknown>;
};

export function buildPaymentPayload(input: BuildPayloadInput): PaymentPayload {
  const payload: PaymentPayload = {
    x402Version: X402_VERSION,
    resource: input.resource,
    accepted: {
      scheme: input.option.scheme,
      network: input.option.network,
      amount: input.amount,
      asset: input.option.asset ?? input.domain.verifyingContract,
      payTo: input.option.payTo,
      maxTimeoutSeconds: input.option.maxTimeoutSeconds,
      extra: { name: input.domain.name, version: input.domain.version },
    },
    payload: {
      signature: input.signature,
      authorization: input.authorization,
    },
  };
  if (input.extensions) {
    payload.extensions = input.extensions;
  }
  return payload;
}

export function encodePaymentPayload(payload: PaymentPayload): string {
  return Buffer.from(JSON.stringify(payload)).toString('base64');
}

export function decodePaymentPayload(header: string): PaymentPayload {
  const json: unknown = JSON.parse(Buffer.from(header, 'base64').toString('utf-8'));
  return PaymentPayloadSchema.parse(json);
}

export type CreatePaymentInput = {
  privateKey: Hex;
  option: PaymentOption;
  amount: string;
  resourceUrl: string;
  resourceDescription?: string;
  resourceMimeType?: string;
  extensions?: Record<string, unknown>;
  defaults: PaymentDefaults;
  nowSeconds?: number;
  nonce?: () => Hex;
};

export type CreatedPayment = {
  header: string;
  payload: PaymentPayload;
};

/**
 * Sign a fresh authorization for the selected option and wrap it in the
 * base64 payload for the `PAYMENT-SIGNATURE` header. A new nonce and time
 * window are drawn on every call.
 */
export async function createPaymentPayload(input: CreatePaymentInput): Promise<CreatedPayment> {
  try {
    const domain = resolveTokenDomain(input.option, input.defaults);
    const now = input.nowSeconds ?? Math.floor(Date.now() / 1000);
    const { validAfter, validBefore } = authorizationWindow(now, input.option.maxTimeoutSeconds);
    const nonce = (input.nonce ?? randomNonce32)();

    const signed = await signTransferAuthorization({
      privateKey: input.privateKey,
      to: input.option.payTo,
      value: input.amount,
      validAfter,
      validBefore,
      nonce,
      domain,
    });

    const payload = buildPaymentPayload({
      option: input.option,
      amount: input.amount,
      domain,
      resource: {
        url: input.resourceUrl,
        description: input.resourceDescription ?? '',
        mimeType: input.resourceMimeType || 'application/json',
      },
      signature: signed.signature,
      authorization: {
        from: signed.authorization.from,
        to: input.option.payTo,
        value: input.amount,
        validAfter: validAfter.toString(),
        validBefore: validBefore.toString(),
        nonce,
      },
      extensions: input.extensions,
    });

    return { header: encodePaymentPayload(payload), payload };
  } catch (err) {
    if (err instanceof PaymentError) throw err;
    throw new PaymentError(`failed to create payment: ${errorMessage(err)}`, { cause: err });
  }
}
