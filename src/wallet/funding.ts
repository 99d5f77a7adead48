import { NETWORKS, USDC_BASE } from '../x402/networks.js';

const BASE = NETWORKS['eip155:8453'];

export const FUND_PAGE_URL = 'https://blockrun.ai/fund';

export interface PaymentLinks {
  explorer: string;
  walletLink: string;
  ethereum: string;
  fundPage: string;
}

/** EIP-681 URI for a USDC transfer to `address` on Base. USDC has 6 decimals. */
export function eip681Uri(address: string, amountUsdc: number): string {
  const units = Math.round(amountUsdc * 1_000_000);
  return `ethereum:${USDC_BASE}@${BASE.chainId}/transfer?address=${address}&uint256=${units}`;
}

export function paymentLinks(address: string): PaymentLinks {
  return {
    explorer: `${BASE.explorer}/address/${address}`,
    walletLink: `ethereum:${USDC_BASE}@${BASE.chainId}/transfer?address=${address}`,
    ethereum: `ethereum:${address}@${BASE.chainId}`,
    fundPage: `${FUND_PAGE_URL}?address=${address}`,
  };
}

export function walletCreatedMessage(address: string, dataDir: string): string {
  const links = paymentLinks(address);
  return [
    'A new wallet was created for paid API calls.',
    '',
    'Send $1-5 USDC on Base to start:',
    '',
    address,
    '',
    `Check the balance: ${links.explorer}`,
    `Fund page: ${links.fundPage}`,
    '',
    `Key stored in ${dataDir}. It never leaves this machine; only signatures are sent.`,
  ].join('\n');
}

export function needsFundingMessage(address: string): string {
  const links = paymentLinks(address);
  return [
    'The wallet is out of funds. Send more USDC on Base to continue.',
    '',
    'Send to:',
    address,
    '',
    `Check the balance: ${links.explorer}`,
  ].join('\n');
}

export function fundingMessageCompact(address: string): string {
  return `Top-up needed. Send USDC on Base to: ${address}\nCheck the balance: ${paymentLinks(address).explorer}`;
}
