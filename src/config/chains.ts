import type { EnvConfig } from './env.js';

/** Canonical Permit2 deployment, identical on every chain. */
export const PERMIT2_ADDRESS = '0x000000000022D473030F116dDEE9F6B43aC78BA3';

const V3_FACTORY = '0x1F98431c8aD98523631AE4a59f267346ea31F984';
const V3_FACTORY_SEPOLIA = '0x0227628f3F023bb0B980b67D528571c95c6DaC1c';

export const V3_FEE_TIERS = [500, 3000, 10000] as const;

export interface ChainConfig {
  chainId: number;
  name: string;
  testnet: boolean;
  /** Chain whose pools price positions held here. Mainnets price themselves. */
  pricingChainId: number;
  universalRouter: string;
  v3Factory: string;
  weth: string;
  usdc: string;
  wethDecimals: number;
  usdcDecimals: number;
  rpcEnvKey: keyof EnvConfig;
}

export const CHAINS: Readonly<Record<number, ChainConfig>> = {
  1: {
    chainId: 1,
    name: 'Ethereum',
    testnet: false,
    pricingChainId: 1,
    universalRouter: '0x66a9893cc07d91d95644aedd05d03f95e1dba8af',
    v3Factory: V3_FACTORY,
    weth: '0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2',
    usdc: '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48',
    wethDecimals: 18,
    usdcDecimals: 6,
    rpcEnvKey: 'MAINNET_RPC_URL',
  },
  8453: {
    chainId: 8453,
    name: 'Base',
    testnet: false,
    pricingChainId: 8453,
    universalRouter: '0x6ff5693b99212da76ad316178a184ab56d299b43',
    v3Factory: V3_FACTORY,
    weth: '0x4200000000000000000000000000000000000006',
    usdc: '0x833589fCD6eDb6E08f4c7C32D4f71b54bdA02913',
    wethDecimals: 18,
    usdcDecimals: 6,
    rpcEnvKey: 'BASE_RPC_URL',
  },
  42161: {
    chainId: 42161,
    name: 'Arbitrum',
    testnet: false,
    pricingChainId: 42161,
    universalRouter: '0xa51afafe0263b40edaef0df8781ea9aa03e381a3',
    v3Factory: V3_FACTORY,
    weth: '0x82aF49447D8a07e3bd95BD0d56f35241523fBab1',
    usdc: '0xaf88d065e77c8cC2239327C5EDb3A432268e5831',
    wethDecimals: 18,
    usdcDecimals: 6,
    rpcEnvKey: 'ARBITRUM_RPC_URL',
  },
  10: {
    chainId: 10,
    name: 'Optimism',
    testnet: false,
    pricingChainId: 10,
    universalRouter: '0x851116d9223fabed8e56c0e6b8ad0c31d98b3507',
    v3Factory: V3_FACTORY,
    weth: '0x4200000000000000000000000000000000000006',
    usdc: '0x0b2C639c533813f4Aa9D7837CAf62653d097Ff85',
    wethDecimals: 18,
    usdcDecimals: 6,
    rpcEnvKey: 'OPTIMISM_RPC_URL',
  },
  137: {
    chainId: 137,
    name: 'Polygon',
    testnet: false,
    pricingChainId: 137,
    universalRouter: '0x1095692a6237d83c6a72f3f5efedb9a670c49223',
    v3Factory: V3_FACTORY,
    weth: '0x7ceB23fD6bC0adD59E62ac25578270cFf1b9f619',
    usdc: '0x3c499c542cEF5E3811e1192ce70d8cC03d5c3359',
    wethDecimals: 18,
    usdcDecimals: 6,
    rpcEnvKey: 'POLYGON_RPC_URL',
  },
  84532: {
    chainId: 84532,
    name: 'Base Sepolia',
    testnet: true,
    pricingChainId: 8453,
    universalRouter: '0x492e6456d9528771018deb9e87ef7750ef184104',
    v3Factory: V3_FACTORY_SEPOLIA,
    weth: '0x4200000000000000000000000000000000000006',
    usdc: '0x036CbD53842c5426634e7929541eC2318f3dCF7e',
    wethDecimals: 18,
    usdcDecimals: 6,
    rpcEnvKey: 'BASE_SEPOLIA_RPC_URL',
  },
  421614: {
    chainId: 421614,
    name: 'Arbitrum Sepolia',
    testnet: true,
    pricingChainId: 42161,
    universalRouter: '0xefd1d4bd4cf1e86da286bb4cb1b8bced9c10ba47',
    v3Factory: V3_FACTORY_SEPOLIA,
    weth: '0x980B62Da83eFf3D4576C647993b0c1D7faf17c73',
    usdc: '0x75faf114eafb1BDbe2F0316DF893fd58CE46AA4d',
    wethDecimals: 18,
    usdcDecimals: 6,
    rpcEnvKey: 'ARBITRUM_SEPOLIA_RPC_URL',
  },
  11155111: {
    chainId: 11155111,
    name: 'Ethereum Sepolia',
    testnet: true,
    pricingChainId: 1,
    universalRouter: '0x3a9d48ab9751398bbfa63ad67599bb04e4bdf98b',
    v3Factory: V3_FACTORY_SEPOLIA,
    weth: '0xfFf9976782d46CC05630D1f6eBAb18b2324d6B14',
    usdc: '0x1c7D4B196Cb0C7B01d743Fbc6116a902379C7238',
    wethDecimals: 18,
    usdcDecimals: 6,
    rpcEnvKey: 'SEPOLIA_RPC_URL',
  },
};

export function getChainConfig(chainId: number): ChainConfig | undefined {
  return CHAINS[chainId];
}

export function pricingChainFor(chainId: number): number {
  return CHAINS[chainId]?.pricingChainId ?? chainId;
}

/** Quote tokens a pool may be paired against, in discovery order. */
export function quoteTokensFor(chain: ChainConfig): Array<{ symbol: 'WETH' | 'USDC'; address: string; decimals: number }> {
  return [
    { symbol: 'WETH', address: chain.weth, decimals: chain.wethDecimals },
    { symbol: 'USDC', address: chain.usdc, decimals: chain.usdcDecimals },
  ];
}
