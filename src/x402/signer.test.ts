import { describe, it, expect } from 'vitest';
import { hashTypedData, recoverTypedDataAddress, type Hex } from 'viem';
import { SigningError } from '../errors.js';
import { TEST_ADDRESS, TEST_PAY_TO, TEST_PRIVATE_KEY } from '../testing/fakeFetch.js';
import { EIP3009_TYPES, randomNonce32, type TokenDomain } from './eip3009.js';
import {
  authorizationWindow,
  hashDomain,
  hashTransferAuthorization,
  parseAmount,
  signTransferAuthorization,
  signerAddress,
  toAddress,
  typedDataDigest,
} from './signer.js';

const DOMAIN: TokenDomain = {
  name: 'USD Coin',
  version: '2',
  chainId: 8453,
  verifyingContract: '0x833589fCD6eDb6E08f4c7C32D4f71b54bdA02913',
};

const NONCE: Hex = `0x${'ab'.repeat(32)}`;

async function signSample() {
  return signTransferAuthorization({
    privateKey: TEST_PRIVATE_KEY,
    to: TEST_PAY_TO,
    value: '1000000',
    validAfter: 1_700_000_000n,
    validBefore: 1_700_000_900n,
    nonce: NONCE,
    domain: DOMAIN,
  });
}

describe('authorizationWindow', () => {
  it('back-dates validAfter by 600s and extends validBefore by the timeout', () => {
    expect(authorizationWindow(1_000, 300)).toEqual({ validAfter: 400n, validBefore: 1_300n });
  });

  it('floors fractional seconds', () => {
    expect(authorizationWindow(1_000.9, 60)).toEqual({ validAfter: 400n, validBefore: 1_060n });
  });
});

describe('signerAddress', () => {
  it('derives the checksummed address of the key', () => {
    expect(signerAddress(TEST_PRIVATE_KEY)).toBe(TEST_ADDRESS);
  });
});

describe('toAddress / parseAmount', () => {
  it('accepts mixed-case addresses without checking the checksum', () => {
    expect(toAddress('0x833589FCD6EDB6E08F4C7C32D4F71B54BDA02913', 'asset')).toBe(
      '0x833589fcd6edb6e08f4c7c32d4f71b54bda02913',
    );
  });

  it('rejects malformed addresses', () => {
    expect(() => toAddress('0x1234', 'recipient')).toThrow(SigningError);
    expect(() => toAddress('0x1234', 'recipient')).toThrow('invalid recipient address');
  });

  it('parses integer amounts and rejects decimals', () => {
    expect(parseAmount('500000')).toBe(500000n);
    expect(() => parseAmount('1.5')).toThrow(SigningError);
    expect(() => parseAmount('')).toThrow(SigningError);
  });
});

describe('signTransferAuthorization', () => {
  it('computes the same digest as viem hashTypedData', async () => {
    const { digest, authorization } = await signSample();
    const expected = hashTypedData({
      domain: DOMAIN,
      types: EIP3009_TYPES,
      primaryType: 'TransferWithAuthorization',
      message: authorization,
    });
    expect(digest).toBe(expected);
    expect(typedDataDigest(hashDomain(DOMAIN), hashTransferAuthorization(authorization))).toBe(expected);
  });

  it('produces a 65-byte signature that recovers to the signer', async () => {
    const { signature, authorization } = await signSample();
    expect(signature).toMatch(/^0x[0-9a-f]{130}$/);

    const recovered = await recoverTypedDataAddress({
      domain: DOMAIN,
      types: EIP3009_TYPES,
      primaryType: 'TransferWithAuthorization',
      message: authorization,
      signature,
    });
    expect(recovered).toBe(TEST_ADDRESS);
  });

  it('normalizes the recovery byte to 27 or 28 across fresh nonces', async () => {
    const seen = new Set<number>();
    for (let i = 0; i < 64; i++) {
      const { signature } = await signTransferAuthorization({
        privateKey: TEST_PRIVATE_KEY,
        to: TEST_PAY_TO,
        value: '1000000',
        validAfter: 1_700_000_000n,
        validBefore: 1_700_000_900n,
        nonce: randomNonce32(),
        domain: DOMAIN,
      });
      const v = parseInt(signature.slice(-2), 16);
      expect([27, 28]).toContain(v);
      seen.add(v);
    }
    expect([...seen].sort()).toEqual([27, 28]);
  });

  it('is deterministic for identical inputs', async () => {
    const a = await signSample();
    const b = await signSample();
    expect(a.signature).toBe(b.signature);
  });

  it('fills the authorization from the key and inputs', async () => {
    const { authorization } = await signSample();
    expect(authorization).toEqual({
      from: TEST_ADDRESS,
      to: TEST_PAY_TO,
      value: 1_000_000n,
      validAfter: 1_700_000_000n,
      validBefore: 1_700_000_900n,
      nonce: NONCE,
    });
  });

  it('changes the digest when the chain changes', async () => {
    const base = await signSample();
    const other = await signTransferAuthorization({
      privateKey: TEST_PRIVATE_KEY,
      to: TEST_PAY_TO,
      value: '1000000',
      validAfter: 1_700_000_000n,
      validBefore: 1_700_000_900n,
      nonce: NONCE,
      domain: { ...DOMAIN, chainId: 84532 },
    });
    expect(other.digest).not.toBe(base.digest);
  });
});
