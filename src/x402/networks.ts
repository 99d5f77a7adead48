import type { Address } from 'viem';

export type NetworkConfig = {
  id: string; // CAIP-2 identifier, e.g. 'eip155:8453'
  aliases: string[]; // legacy v1 names such as 'base'
  chainId: number;
  label: string;
  usdc: Address;
  explorer: string;
};

export const NETWORKS: Record<string, NetworkConfig> = {
  'eip155:8453': {
    id: 'eip155:8453',
    aliases: ['base'],
    chainId: 8453,
    label: 'Base',
    usdc: '0x833589fCD6eDb6E08f4c7C32D4f71b54bdA02913',
    explorer: 'https://basescan.org',
  },
  'eip155:84532': {
    id: 'eip155:84532',
    aliases: ['base-sepolia'],
    chainId: 84532,
    label: 'Base Sepolia',
    usdc: '0x036CbD53842c5426634e7929541eC2318f3dCF7e',
    explorer: 'https://sepolia.basescan.org',
  },
};

export const DEFAULT_NETWORK = 'eip155:8453';
export const USDC_BASE: Address = NETWORKS[DEFAULT_NETWORK].usdc;

export function findNetwork(network: string): NetworkConfig | null {
  const direct = NETWORKS[network];
  if (direct) return direct;
  for (const cfg of Object.values(NETWORKS)) {
    if (cfg.aliases.includes(network)) return cfg;
  }
  return null;
}

/**
 * Chain id for a network identifier. Any `eip155:<n>` resolves even when the
 * chain is not in the table; known v1 aliases resolve through the table.
 */
export function networkToChainId(network: string): number | null {
  const known = findNetwork(network);
  if (known) return known.chainId;
  const match = /^eip155:(\d+)$/.exec(network);
  if (!match) return null;
  const id = Number(match[1]);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}
