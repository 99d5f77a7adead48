import { describe, it, expect } from 'vitest';
import { isHex, recoverTypedDataAddress, type Hex } from 'viem';
import { PaymentError } from '../errors.js';
import { TEST_ADDRESS, TEST_PAY_TO, TEST_PRIVATE_KEY } from '../testing/fakeFetch.js';
import { EIP3009_TYPES } from './eip3009.js';
import { createPaymentPayload, decodePaymentPayload, resolveTokenDomain, type PaymentDefaults } from './payload.js';
import { USDC_BASE } from './networks.js';
import type { PaymentOption } from './types.js';

const NOW = 1_700_000_000;
const NONCE: Hex = `0x${'11'.repeat(32)}`;

const DEFAULTS: PaymentDefaults = { network: 'eip155:8453', asset: USDC_BASE };

const OPTION: PaymentOption = {
  scheme: 'exact',
  network: 'eip155:8453',
  amount: '500000',
  asset: USDC_BASE,
  payTo: TEST_PAY_TO,
  maxTimeoutSeconds: 300,
  extra: { name: 'USD Coin', version: '2' },
};

function create(overrides: Partial<Parameters<typeof createPaymentPayload>[0]> = {}) {
  return createPaymentPayload({
    privateKey: TEST_PRIVATE_KEY,
    option: OPTION,
    amount: '500000',
    resourceUrl: 'https://api.test/v1/chat/completions',
    resourceDescription: 'chat completion',
    defaults: DEFAULTS,
    nowSeconds: NOW,
    nonce: () => NONCE,
    ...overrides,
  });
}

describe('resolveTokenDomain', () => {
  it('uses extra name and version and the option asset', () => {
    expect(resolveTokenDomain({ ...OPTION, extra: { name: 'Token', version: '7' } }, DEFAULTS)).toEqual({
      name: 'Token',
      version: '7',
      chainId: 8453,
      verifyingContract: USDC_BASE.toLowerCase(),
    });
  });

  it('falls back to configured token metadata, then USD Coin v2', () => {
    const bare: PaymentOption = { ...OPTION, extra: undefined, asset: undefined };
    expect(resolveTokenDomain(bare, { ...DEFAULTS, tokenName: 'Custom' })).toEqual({
      name: 'Custom',
      version: '2',
      chainId: 8453,
      verifyingContract: USDC_BASE,
    });
    expect(resolveTokenDomain(bare, DEFAULTS).name).toBe('USD Coin');
  });

  it('maps v1 network names and unknown eip155 chains', () => {
    expect(resolveTokenDomain({ ...OPTION, network: 'base-sepolia' }, DEFAULTS).chainId).toBe(84532);
    expect(resolveTokenDomain({ ...OPTION, network: 'eip155:10' }, DEFAULTS).chainId).toBe(10);
  });

  it('falls back to the configured network for unrecognized names', () => {
    expect(resolveTokenDomain({ ...OPTION, network: 'mystery' }, DEFAULTS).chainId).toBe(8453);
  });

  it('fails when neither network resolves', () => {
    expect(() => resolveTokenDomain({ ...OPTION, network: 'mystery' }, { ...DEFAULTS, network: 'other' })).toThrow(
      'unsupported network mystery',
    );
  });
});

describe('createPaymentPayload', () => {
  it('builds a v2 payload with the authorization window around now', async () => {
    const { payload } = await create();
    expect(payload.x402Version).toBe(2);
    expect(payload.resource).toEqual({
      url: 'https://api.test/v1/chat/completions',
      description: 'chat completion',
      mimeType: 'application/json',
    });
    expect(payload.accepted).toEqual({
      scheme: 'exact',
      network: 'eip155:8453',
      amount: '500000',
      asset: USDC_BASE,
      payTo: TEST_PAY_TO,
      maxTimeoutSeconds: 300,
      extra: { name: 'USD Coin', version: '2' },
    });
    expect(payload.payload.authorization).toEqual({
      from: TEST_ADDRESS,
      to: TEST_PAY_TO,
      value: '500000',
      validAfter: String(NOW - 600),
      validBefore: String(NOW + 300),
      nonce: NONCE,
    });
    expect(payload.extensions).toBeUndefined();
  });

  it('spans timeout plus skew between validAfter and validBefore', async () => {
    const { payload } = await create();
    const { validAfter, validBefore } = payload.payload.authorization;
    expect(Number(validBefore) - Number(validAfter)).toBe(900);
  });

  it('encodes the payload as base64 JSON', async () => {
    const { header, payload } = await create();
    expect(decodePaymentPayload(header)).toEqual(payload);
  });

  it('signs something the payer address recovers from', async () => {
    const { payload } = await create();
    const { signature, authorization: auth } = payload.payload;
    if (!isHex(signature)) throw new Error('signature is not hex');
    const recovered = await recoverTypedDataAddress({
      domain: { name: 'USD Coin', version: '2', chainId: 8453, verifyingContract: USDC_BASE },
      types: EIP3009_TYPES,
      primaryType: 'TransferWithAuthorization',
      message: {
        from: TEST_ADDRESS,
        to: TEST_PAY_TO,
        value: BigInt(auth.value),
        validAfter: BigInt(auth.validAfter),
        validBefore: BigInt(auth.validBefore),
        nonce: NONCE,
      },
      signature,
    });
    expect(recovered).toBe(TEST_ADDRESS);
  });

  it('passes extensions through untouched', async () => {
    const { payload } = await create({ extensions: { bazaar: { discoverable: true } } });
    expect(payload.extensions).toEqual({ bazaar: { discoverable: true } });
  });

  it('draws a fresh nonce when none is injected', async () => {
    const a = await create({ nonce: undefined });
    const b = await create({ nonce: undefined });
    expect(a.payload.payload.authorization.nonce).not.toBe(b.payload.payload.authorization.nonce);
  });

  it('wraps signing failures in PaymentError', async () => {
    await expect(create({ option: { ...OPTION, payTo: 'not-an-address' } })).rejects.toThrow(PaymentError);
    await expect(create({ option: { ...OPTION, payTo: 'not-an-address' } })).rejects.toThrow(
      'failed to create payment: invalid recipient address',
    );
  });
});
