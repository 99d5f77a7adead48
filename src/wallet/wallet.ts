import type { Address, Hex } from 'viem';
import { walletKeyFromEnv } from '../config.js';
import type { DataStore } from '../store/store.js';
import { createLogger } from '../util/logger.js';
import { addressFromKey, createWallet, normalizePrivateKey } from './keys.js';

const log = createLogger('wallet');

export type WalletSource = 'env' | 'file' | 'created';

export interface WalletInfo {
  privateKey: Hex;
  address: Address;
  isNew: boolean;
  source: WalletSource;
}

/**
 * Resolve the signing wallet. Order: X402_WALLET_KEY, BASE_CHAIN_WALLET_KEY,
 * `.session`, legacy `wallet.key`, then a freshly generated key saved to `.session`.
 */
export function getOrCreateWallet(store: DataStore, env: NodeJS.ProcessEnv = process.env): WalletInfo {
  const envKey = walletKeyFromEnv(env);
  if (envKey) {
    const privateKey = normalizePrivateKey(envKey);
    return { privateKey, address: addressFromKey(privateKey), isNew: false, source: 'env' };
  }

  const stored = store.loadWallet();
  if (stored) {
    const privateKey = normalizePrivateKey(stored.key);
    return { privateKey, address: addressFromKey(privateKey), isNew: false, source: 'file' };
  }

  const created = createWallet();
  const file = store.saveWallet(created.privateKey);
  log.info('created new wallet', { address: created.address, file });
  store.recordAudit({ event: 'wallet_created', address: created.address });
  return { ...created, isNew: true, source: 'created' };
}

/** Address of the configured wallet, or null when none exists yet. Never creates one. */
export function findWalletAddress(store: DataStore, env: NodeJS.ProcessEnv = process.env): Address | null {
  const key = walletKeyFromEnv(env) ?? store.loadWallet()?.key;
  return key ? addressFromKey(key) : null;
}
