import { isAddress, type Address, type Hex } from 'viem';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { LogLevel } from './util/logger.js';
import { validateApiUrl } from './validation.js';
import { normalizePrivateKey } from './wallet/keys.js';
import { DEFAULT_NETWORK, USDC_BASE } from './x402/networks.js';

export const DEFAULT_API_URL = 'https://blockrun.ai/api';
export const DEFAULT_TIMEOUT_MS = 60_000;

export const WALLET_KEY_ENV = ['X402_WALLET_KEY', 'BASE_CHAIN_WALLET_KEY'] as const;

const ENV_MAPPINGS = {
  X402_API_URL: 'apiUrl',
  X402_TIMEOUT_MS: 'timeoutMs',
  X402_NETWORK: 'network',
  X402_ASSET: 'asset',
  X402_TOKEN_NAME: 'tokenName',
  X402_TOKEN_VERSION: 'tokenVersion',
  X402_MAX_PAYMENT: 'maxPaymentPerCall',
  X402_LOG_LEVEL: 'logLevel',
} as const;

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Settings that may also come from `config.json` in the data directory. */
export const ConfigFileSchema = z.object({
  apiUrl: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
  network: z.string().optional(),
  asset: z.string().optional(),
  tokenName: z.string().optional(),
  tokenVersion: z.string().optional(),
  maxPaymentPerCall: z.string().optional(),
  logLevel: LogLevelSchema.optional(),
});

export type ConfigFileValues = z.infer<typeof ConfigFileSchema>;

const ResolvedSchema = z.object({
  apiUrl: z.string().transform((v) => v.replace(/\/+$/, '')),
  timeoutMs: z.coerce.number().int().positive(),
  network: z.string().min(1),
  asset: z.string().refine((v): v is Address => isAddress(v, { strict: false }), 'asset must be a 0x address'),
  tokenName: z.string().min(1).optional(),
  tokenVersion: z.string().min(1).optional(),
  maxPaymentPerCall: z
    .string()
    .regex(/^\d+$/, 'maxPaymentPerCall must be an integer amount in micro-units')
    .transform((v) => BigInt(v))
    .optional(),
  logLevel: LogLevelSchema.optional(),
});

export type ClientOptions = Omit<ConfigFileValues, 'maxPaymentPerCall'> & {
  /** Hex secp256k1 key; falls back to X402_WALLET_KEY, then BASE_CHAIN_WALLET_KEY. */
  privateKey?: string;
  maxPaymentPerCall?: string | bigint;
  fetch?: typeof fetch;
  /** Values read from a config file by the caller; options and env win over them. */
  fileConfig?: ConfigFileValues;
  env?: NodeJS.ProcessEnv;
};

export type ClientConfig = {
  privateKey: Hex;
  apiUrl: string;
  timeoutMs: number;
  network: string;
  asset: Address;
  tokenName?: string;
  tokenVersion?: string;
  maxPaymentPerCall?: bigint;
  logLevel?: LogLevel;
};

export function walletKeyFromEnv(env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (const name of WALLET_KEY_ENV) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

function loadEnvConfig(env: NodeJS.ProcessEnv): Record<string, string> {
  const config: Record<string, string> = {};
  for (const [envKey, configKey] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      config[configKey] = value;
    }
  }
  return config;
}

function definedEntries(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}

/**
 * Merge defaults, file values, environment and explicit options (in rising
 * precedence) and validate the result. Never reads the filesystem itself.
 */
export function resolveClientConfig(
  options: ClientOptions = {},
  defaults: { timeoutMs: number } = { timeoutMs: DEFAULT_TIMEOUT_MS },
): ClientConfig {
  const env = options.env ?? process.env;

  const key = options.privateKey || walletKeyFromEnv(env);
  if (!key) {
    throw new ValidationError(
      'privateKey',
      `Private key required. Pass privateKey or set ${WALLET_KEY_ENV.join(' or ')}. The key is only used for local signing.`,
    );
  }
  const privateKey = normalizePrivateKey(key);

  const { privateKey: _key, fetch: _fetch, fileConfig, env: _env, ...explicit } = options;
  const merged: Record<string, unknown> = {
    apiUrl: DEFAULT_API_URL,
    timeoutMs: defaults.timeoutMs,
    network: DEFAULT_NETWORK,
    asset: USDC_BASE,
    ...definedEntries(fileConfig ?? {}),
    ...loadEnvConfig(env),
    ...definedEntries({
      ...explicit,
      maxPaymentPerCall: explicit.maxPaymentPerCall?.toString(),
    }),
  };

  const parsed = ResolvedSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue?.path.join('.') || 'config', issue?.message ?? 'invalid configuration');
  }
  validateApiUrl(parsed.data.apiUrl);
  return { privateKey, ...parsed.data };
}
