import type { Address } from 'viem';
import { ImageClient } from './client/image.js';
import { LLMClient } from './client/llm.js';
import type { PaidApiClientOptions } from './client/base.js';
import { DataStore, defaultDataDir } from './store/store.js';
import { findWalletAddress, getOrCreateWallet, type WalletInfo } from './wallet/wallet.js';
import type { Spending } from './x402/ledger.js';

export type SessionOptions = {
  store?: DataStore;
  env?: NodeJS.ProcessEnv;
  fetch?: typeof fetch;
};

/**
 * Process-wide state for the CLI and the MCP server: one data directory, one
 * wallet and lazily built clients whose ledgers live as long as the process.
 */
export class Session {
  readonly store: DataStore;
  private readonly env: NodeJS.ProcessEnv;
  private readonly fetchImpl?: typeof fetch;
  private walletInfo?: WalletInfo;
  private llmClient?: LLMClient;
  private imageClient?: ImageClient;

  constructor(opts: SessionOptions = {}) {
    this.env = opts.env ?? process.env;
    this.store = opts.store ?? new DataStore(defaultDataDir(this.env));
    this.fetchImpl = opts.fetch;
  }

  wallet(): WalletInfo {
    if (!this.walletInfo) {
      this.walletInfo = getOrCreateWallet(this.store, this.env);
    }
    return this.walletInfo;
  }

  /** Address of an existing wallet; does not create one. */
  walletAddress(): Address | null {
    return this.walletInfo?.address ?? findWalletAddress(this.store, this.env);
  }

  llm(): LLMClient {
    if (!this.llmClient) {
      this.llmClient = new LLMClient(this.clientOptions());
    }
    return this.llmClient;
  }

  image(): ImageClient {
    if (!this.imageClient) {
      this.imageClient = new ImageClient(this.clientOptions());
    }
    return this.imageClient;
  }

  /** Combined spend of every client created so far. */
  spending(): Spending {
    const parts = [this.llmClient, this.imageClient].map((c) => c?.getSpending() ?? { totalUsd: 0, calls: 0 });
    return parts.reduce((acc, s) => ({ totalUsd: acc.totalUsd + s.totalUsd, calls: acc.calls + s.calls }));
  }

  private clientOptions(): PaidApiClientOptions {
    return {
      privateKey: this.wallet().privateKey,
      fileConfig: this.store.readConfigFile(),
      env: this.env,
      fetch: this.fetchImpl,
      onPayment: (receipt, url) => {
        this.store.recordAudit({
          event: 'x402_payment',
          url,
          amount: receipt.amount,
          network: receipt.network,
          payTo: receipt.payTo,
        });
      },
    };
  }
}
