import { errorMessage, isX402ClientError, type ErrorKind } from './errors.js';
import type { Session } from './session.js';
import { eip681Uri, fundingMessageCompact, paymentLinks, walletCreatedMessage } from './wallet/funding.js';

export interface CommandResult {
  success: boolean;
  data?: unknown;
  error?: string;
  code?: ErrorKind;
}

export type CommandOptions = Record<string, string>;

export const USAGE = `
x402-llm - pay-per-call LLM and image generation over x402

USAGE:
  x402-llm <command> [options]

COMMANDS:
  address                   Print the wallet address (creates a wallet if none exists)
  wallet                    Show wallet source, data directory and funding links
  chat                      Send a chat prompt
  image                     Generate an image
  models                    List available models
  fund                      Print an EIP-681 USDC transfer link for the wallet
  help                      Show this message

OPTIONS FOR 'chat':
  --model <id>              Model id, e.g. openai/gpt-4o (required)
  --prompt <text>           User prompt (required)
  --system <text>           System prompt
  --max-tokens <n>          Maximum completion tokens (default: 1024)
  --temperature <t>         Sampling temperature, 0-2
  --search                  Enable live search

OPTIONS FOR 'image':
  --prompt <text>           Image description (required)
  --model <id>              Model id (default: google/nano-banana)
  --size <WxH>              Image size (default: 1024x1024)
  --n <count>               Number of images (default: 1)
  --quality <q>             Quality hint, e.g. hd

OPTIONS FOR 'models':
  --type <llm|image|all>    Which models to list (default: all)

OPTIONS FOR 'fund':
  --amount <usdc>           Amount in USDC (default: 5)

ENVIRONMENT VARIABLES:
  X402_WALLET_KEY           Wallet private key (hex)
  BASE_CHAIN_WALLET_KEY     Wallet private key, used when X402_WALLET_KEY is unset
  X402_API_URL              API base URL (default: https://blockrun.ai/api)
  X402_NETWORK              Default payment network (default: eip155:8453)
  X402_MAX_PAYMENT          Refuse to sign payments above this many micro-USDC
  X402_LOG_LEVEL            debug | info | warn | error | silent
  X402_DATA_DIR             Data directory (default: ~/.x402-llm)
`;

export function parseArgs(args: string[]): { command: string; options: CommandOptions } {
  const command = args[0] || 'help';
  const options: CommandOptions = {};

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const value = args[i + 1];
      if (value && !value.startsWith('--')) {
        options[key] = value;
        i++;
      } else {
        options[key] = 'true';
      }
    }
  }

  return { command, options };
}

function failure(err: unknown): CommandResult {
  return {
    success: false,
    error: errorMessage(err),
    code: isX402ClientError(err) ? err.kind : undefined,
  };
}

function optionalNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function cmdAddress(session: Session): CommandResult {
  const wallet = session.wallet();
  return {
    success: true,
    data: {
      address: wallet.address,
      is_new: wallet.isNew,
      message: wallet.isNew ? walletCreatedMessage(wallet.address, session.store.dir) : undefined,
    },
  };
}

function cmdWallet(session: Session): CommandResult {
  const address = session.walletAddress();
  if (!address) {
    return {
      success: true,
      data: { configured: false, data_dir: session.store.dir, hint: 'Run "address" to create a wallet' },
    };
  }
  return {
    success: true,
    data: {
      configured: true,
      address,
      data_dir: session.store.dir,
      links: paymentLinks(address),
      message: fundingMessageCompact(address),
    },
  };
}

async function cmdChat(session: Session, options: CommandOptions): Promise<CommandResult> {
  if (!options.model || !options.prompt) {
    return { success: false, error: 'Missing required parameters: --model, --prompt', code: 'validation' };
  }
  const messages = options.system
    ? [
        { role: 'system' as const, content: options.system },
        { role: 'user' as const, content: options.prompt },
      ]
    : [{ role: 'user' as const, content: options.prompt }];

  const llm = session.llm();
  const res = await llm.chatCompletion(options.model, messages, {
    maxTokens: optionalNumber(options['max-tokens']),
    temperature: optionalNumber(options.temperature),
    search: options.search === 'true',
  });
  return {
    success: true,
    data: {
      model: res.model || options.model,
      content: res.choices[0]?.message.content ?? '',
      usage: res.usage,
      spending: llm.getSpending(),
    },
  };
}

async function cmdImage(session: Session, options: CommandOptions): Promise<CommandResult> {
  if (!options.prompt) {
    return { success: false, error: 'Missing required parameter: --prompt', code: 'validation' };
  }
  const image = session.image();
  const res = await image.generate(options.prompt, {
    model: options.model,
    size: options.size,
    n: optionalNumber(options.n),
    quality: options.quality,
  });
  return { success: true, data: { images: res.data, spending: image.getSpending() } };
}

async function cmdModels(session: Session, options: CommandOptions): Promise<CommandResult> {
  const type = options.type || 'all';
  const llm = session.llm();
  switch (type) {
    case 'llm':
      return { success: true, data: await llm.listModels() };
    case 'image':
      return { success: true, data: await llm.listImageModels() };
    case 'all':
      return { success: true, data: await llm.listAllModels() };
    default:
      return { success: false, error: `Unknown model type: ${type} (expected llm, image or all)`, code: 'validation' };
  }
}

function cmdFund(session: Session, options: CommandOptions): CommandResult {
  const amount = options.amount === undefined ? 5 : Number(options.amount);
  if (!Number.isFinite(amount) || amount <= 0) {
    return { success: false, error: '--amount must be a positive number of USDC', code: 'validation' };
  }
  const { address } = session.wallet();
  return {
    success: true,
    data: { address, amount_usdc: amount, uri: eip681Uri(address, amount), links: paymentLinks(address) },
  };
}

/** Runs one command; never throws. `help` and unknown commands return null. */
export async function runCommand(
  session: Session,
  command: string,
  options: CommandOptions,
): Promise<CommandResult | null> {
  try {
    switch (command) {
      case 'address':
        return cmdAddress(session);
      case 'wallet':
        return cmdWallet(session);
      case 'chat':
        return await cmdChat(session, options);
      case 'image':
        return await cmdImage(session, options);
      case 'models':
        return await cmdModels(session, options);
      case 'fund':
        return cmdFund(session, options);
      default:
        return null;
    }
  } catch (err) {
    return failure(err);
  }
}
