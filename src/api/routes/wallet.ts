import type { FastifyInstance } from 'fastify';
import { formatEther, formatUnits } from 'ethers';
import type { Container } from '../../infra/container.js';
import { getChainConfig, quoteTokensFor } from '../../config/chains.js';
import { ChainNotConfiguredError } from '../../errors.js';

interface QuoteBalance {
  symbol: 'WETH' | 'USDC';
  address: string;
  balance: string;
  formatted: string;
}

type ChainWallet =
  | {
      status: 'ok';
      name: string;
      nativeBalanceWei: string;
      nativeBalance: string;
      /** Native balance minus the gas reserve; negative when the reserve is breached. */
      reserveHeadroomWei: string;
      quotes: QuoteBalance[];
    }
  | { status: 'error'; error: string };

export async function walletRoutes(app: FastifyInstance, container: Container): Promise<void> {
  app.get('/wallet', async (_request, reply) => {
    const { gateway, riskParams } = container;

    const readChain = async (chainId: number): Promise<ChainWallet> => {
      const chain = getChainConfig(chainId);
      if (!chain) throw new ChainNotConfiguredError(chainId);

      const native = await gateway.getNativeBalance(chainId);
      const quotes = await Promise.all(
        quoteTokensFor(chain).map(async (quote) => {
          const balance = await gateway.balanceOf(chainId, quote.address);
          return {
            symbol: quote.symbol,
            address: quote.address.toLowerCase(),
            balance: balance.toString(),
            formatted: formatUnits(balance, quote.decimals),
          };
        }),
      );

      return {
        status: 'ok',
        name: chain.name,
        nativeBalanceWei: native.toString(),
        nativeBalance: formatEther(native),
        reserveHeadroomWei: (native - riskParams.gasReserveWei).toString(),
        quotes,
      };
    };

    const chains: Record<string, ChainWallet> = {};
    await Promise.all(
      gateway.connectedChainIds().map(async (chainId) => {
        try {
          chains[chainId] = await readChain(chainId);
        } catch (err) {
          container.logger.warn({ err, chainId }, 'Wallet balance read failed');
          chains[chainId] = { status: 'error', error: err instanceof Error ? err.message : String(err) };
        }
      }),
    );

    return reply.send({
      address: gateway.walletAddress,
      gasReserveWei: riskParams.gasReserveWei.toString(),
      chains,
    });
  });
}
