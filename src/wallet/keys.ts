import type { Address, Hex } from 'viem';
import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts';
import { ValidationError } from '../errors.js';
import { validatePrivateKey } from '../validation.js';

/** Accepts 64 hex characters with or without `0x`; returns the `0x`-prefixed key. */
export function normalizePrivateKey(key: string | undefined): Hex {
  const trimmed = (key ?? '').trim();
  validatePrivateKey(trimmed);
  const body = trimmed.startsWith('0x') ? trimmed.slice(2) : trimmed;
  return `0x${body.toLowerCase()}`;
}

export function addressFromKey(privateKey: string): Address {
  const key = normalizePrivateKey(privateKey);
  try {
    return privateKeyToAccount(key).address;
  } catch {
    // 64 hex chars outside the curve order (e.g. all zeros)
    throw new ValidationError('privateKey', 'Private key is not a valid secp256k1 scalar');
  }
}

export function createWallet(): { address: Address; privateKey: Hex } {
  const privateKey = generatePrivateKey();
  return { address: privateKeyToAccount(privateKey).address, privateKey };
}
