import { bytesToHex, type Address, type Hex } from 'viem';
import { CryptoError } from '../errors.js';

export const EIP3009_DOMAIN_TYPES = {
  EIP712Domain: [
    { name: 'name', type: 'string' },
    { name: 'version', type: 'string' },
    { name: 'chainId', type: 'uint256' },
    { name: 'verifyingContract', type: 'address' },
  ],
} as const;

export const EIP3009_TYPES = {
  TransferWithAuthorization: [
    { name: 'from', type: 'address' },
    { name: 'to', type: 'address' },
    { name: 'value', type: 'uint256' },
    { name: 'validAfter', type: 'uint256' },
    { name: 'validBefore', type: 'uint256' },
    { name: 'nonce', type: 'bytes32' },
  ],
} as const;

export const DEFAULT_TOKEN_NAME = 'USD Coin';
export const DEFAULT_TOKEN_VERSION = '2';

/** Back-dating of validAfter, absorbing clock skew between client and facilitator. */
export const CLOCK_SKEW_SECONDS = 600;

export type TokenDomain = {
  name: string;
  version: string;
  chainId: number;
  verifyingContract: Address;
};

export type TransferWithAuthorization = {
  from: Address;
  to: Address;
  value: bigint;
  validAfter: bigint;
  validBefore: bigint;
  nonce: Hex; // 32 bytes
};

export function randomNonce32(): Hex {
  let bytes: Uint8Array;
  try {
    bytes = crypto.getRandomValues(new Uint8Array(32));
  } catch (err) {
    throw new CryptoError('secure random source unavailable', { cause: err });
  }
  return bytesToHex(bytes);
}
