export { LLMClient, DEFAULT_MAX_TOKENS } from './client/llm.js';
export { ImageClient, DEFAULT_IMAGE_MODEL, DEFAULT_IMAGE_SIZE, DEFAULT_IMAGE_TIMEOUT_MS } from './client/image.js';
export { PaidApiClient, type PaidApiClientOptions } from './client/base.js';
export type {
  AllModel,
  ChatCompletionOptions,
  ChatMessage,
  ChatResponse,
  ImageGenerateOptions,
  ImageModel,
  ImageResponse,
  Model,
  SearchParameters,
} from './client/types.js';

export {
  resolveClientConfig,
  DEFAULT_API_URL,
  DEFAULT_TIMEOUT_MS,
  type ClientConfig,
  type ClientOptions,
  type ConfigFileValues,
} from './config.js';
export {
  X402ClientError,
  ValidationError,
  PaymentError,
  APIError,
  NetworkError,
  CryptoError,
  SigningError,
  isX402ClientError,
  type ErrorKind,
} from './errors.js';
export { setLogLevel, getLogLevel, createLogger, type LogLevel, type Logger } from './util/logger.js';
export * from './validation.js';

export { DataStore, defaultDataDir } from './store/store.js';
export { normalizePrivateKey, addressFromKey, createWallet } from './wallet/keys.js';
export { getOrCreateWallet, findWalletAddress, type WalletInfo } from './wallet/wallet.js';
export {
  eip681Uri,
  paymentLinks,
  walletCreatedMessage,
  needsFundingMessage,
  fundingMessageCompact,
  type PaymentLinks,
} from './wallet/funding.js';

export { PaymentHandler, type PaidResult, type PaymentReceipt, type PaymentState } from './x402/handler.js';
export { SpendingLedger, type Spending } from './x402/ledger.js';
export {
  parsePaymentRequired,
  encodePaymentRequired,
  extractChallengeFromBody,
  selectPaymentOption,
  resolveAmount,
} from './x402/challenge.js';
export { createPaymentPayload, buildPaymentPayload, encodePaymentPayload, decodePaymentPayload } from './x402/payload.js';
export { signTransferAuthorization, typedDataDigest } from './x402/signer.js';
export { randomNonce32 } from './x402/eip3009.js';
export { NETWORKS, DEFAULT_NETWORK, USDC_BASE, networkToChainId } from './x402/networks.js';
export * from './x402/types.js';
