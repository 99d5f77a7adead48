import type { Address } from 'viem';
import { resolveClientConfig, type ClientConfig, type ClientOptions } from '../config.js';
import { errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../util/logger.js';
import { addressFromKey } from '../wallet/keys.js';
import { PaymentHandler, type PaidResult, type PaymentReceipt, type ResponseSchema } from '../x402/handler.js';
import { SpendingLedger, type Spending } from '../x402/ledger.js';
import { ImageModelListSchema, type ImageModel } from './types.js';

export type PaidApiClientOptions = ClientOptions & {
  /** Called after every settled payment, e.g. to append an audit line. */
  onPayment?: (receipt: PaymentReceipt, url: string) => void;
};

/**
 * Shared plumbing for the paid API clients: configuration, the signing
 * wallet, one payment handler and the session spending ledger.
 *
 * The private key is used only to sign locally; it is never sent.
 */
export abstract class PaidApiClient {
  protected readonly config: ClientConfig;
  protected readonly log: Logger;
  private readonly address: Address;
  private readonly ledger = new SpendingLedger();
  private readonly handler: PaymentHandler;
  private readonly onPayment?: (receipt: PaymentReceipt, url: string) => void;

  protected constructor(tag: string, options: PaidApiClientOptions, defaults: { timeoutMs: number }) {
    this.config = resolveClientConfig(options, defaults);
    this.log = createLogger(tag, this.config.logLevel);
    this.address = addressFromKey(this.config.privateKey);
    this.onPayment = options.onPayment;
    this.handler = new PaymentHandler({
      privateKey: this.config.privateKey,
      defaults: {
        network: this.config.network,
        asset: this.config.asset,
        tokenName: this.config.tokenName,
        tokenVersion: this.config.tokenVersion,
      },
      ledger: this.ledger,
      fetch: options.fetch,
      timeoutMs: this.config.timeoutMs,
      maxPaymentPerCall: this.config.maxPaymentPerCall,
      logger: createLogger('x402', this.config.logLevel),
    });
  }

  getWalletAddress(): Address {
    return this.address;
  }

  getSpending(): Spending {
    return this.ledger.snapshot();
  }

  get apiUrl(): string {
    return this.config.apiUrl;
  }

  async listImageModels(): Promise<ImageModel[]> {
    const { data } = await this.get('/v1/images/models', ImageModelListSchema);
    return data;
  }

  protected async post<T>(path: string, body: unknown, schema: ResponseSchema<T>): Promise<PaidResult<T>> {
    const url = this.config.apiUrl + path;
    const result = await this.handler.postJson(url, body, schema);
    if (result.payment) {
      this.log.info('paid request settled', { path, amount: result.payment.amount, network: result.payment.network });
      // already settled: the response is returned even if the hook throws
      try {
        this.onPayment?.(result.payment, url);
      } catch (err) {
        this.log.warn('payment audit failed', { path, error: errorMessage(err) });
      }
    }
    return result;
  }

  protected get<T>(path: string, schema: ResponseSchema<T>): Promise<T> {
    return this.handler.getJson(this.config.apiUrl + path, schema);
  }
}
