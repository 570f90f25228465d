import { FetchRequest, JsonRpcProvider, Wallet } from 'ethers';
import { CHAINS, type ChainConfig } from '../config/chains.js';
import type { EnvConfig } from '../config/env.js';
import { chainLogger, type Logger } from './logger.js';

export interface ChainContext {
  chainId: number;
  chain: ChainConfig;
  provider: JsonRpcProvider;
  signer: Wallet;
}

export interface EvmContext {
  address: string;
  chains: Map<number, ChainContext>;
}

export function createEvmContext(config: EnvConfig, logger: Logger): EvmContext {
  const key = config.WALLET_PRIVATE_KEY.startsWith('0x')
    ? config.WALLET_PRIVATE_KEY
    : `0x${config.WALLET_PRIVATE_KEY}`;
  const wallet = new Wallet(key);
  const chains = new Map<number, ChainContext>();

  for (const chain of Object.values(CHAINS)) {
    const url = config[chain.rpcEnvKey];
    if (typeof url !== 'string' || url.length === 0) continue;

    const request = new FetchRequest(url);
    request.timeout = config.RPC_TIMEOUT_MS;
    const provider = new JsonRpcProvider(request, chain.chainId, { staticNetwork: true });

    chains.set(chain.chainId, {
      chainId: chain.chainId,
      chain,
      provider,
      signer: wallet.connect(provider),
    });
  }

  logger.info(
    { address: wallet.address, chains: Array.from(chains.values()).map((c) => c.chain.name) },
    'EVM context initialized',
  );

  return { address: wallet.address, chains };
}

/**
 * Verifies every configured RPC answers and reports the chain id it was
 * configured for. A mismatch is fatal; an unreachable chain is dropped.
 */
export async function checkRpcHealth(evm: EvmContext, logger: Logger): Promise<void> {
  for (const [chainId, ctx] of evm.chains) {
    const log = chainLogger(logger, chainId);
    let reported: bigint;
    try {
      const raw: unknown = await ctx.provider.send('eth_chainId', []);
      if (typeof raw !== 'string') {
        throw new TypeError(`eth_chainId returned ${typeof raw}`);
      }
      reported = BigInt(raw);
      const block = await ctx.provider.getBlockNumber();
      log.info({ block }, 'RPC health check passed');
    } catch (err) {
      log.error({ err }, 'RPC unreachable, chain disabled');
      ctx.provider.destroy();
      evm.chains.delete(chainId);
      continue;
    }

    if (reported !== BigInt(chainId)) {
      const err = new Error(`RPC for ${ctx.chain.name} reports chain ${reported}, expected ${chainId}`);
      log.fatal({ err, reported: reported.toString() }, 'RPC chain id mismatch');
      throw err;
    }
  }

  if (evm.chains.size === 0) {
    throw new Error('No reachable RPC endpoints');
  }
}
