import { randomUUID } from 'node:crypto';
import type { Container } from '../../infra/container.js';
import type { EventBus } from '../../services/event-bus.js';
import type { ChainLock } from '../../utils/chain-lock.js';
import type { WhitelistService } from '../whitelist/whitelist.service.js';
import type { Registry } from '../registry/registry.service.js';
import type { PoolDiscovery } from '../pool-discovery/pool-discovery.service.js';
import type { PriceReader } from '../price-reader/price-reader.service.js';
import type { StateEngine } from '../state-engine/state-engine.service.js';
import type { InboundTransfer } from '../../types/whitelist.js';
import type { PositionState } from '../../types/position.js';
import { getChainConfig, pricingChainFor } from '../../config/chains.js';
import { ChainNotConfiguredError } from '../../errors.js';

export type ScanTrigger = 'STARTUP' | 'POST_TRADE';

export interface ScanResult {
  chainId: number;
  trigger: ScanTrigger;
  newTransfers: number;
  positionsOpened: PositionState[];
  error: string | null;
}

/**
 * Looks for inbound ERC-20 transfers from whitelisted senders and opens a
 * position for every token that arrived with a nonzero balance.
 */
export class WalletScanner {
  private readonly container: Container;
  private readonly whitelist: WhitelistService;
  private readonly registry: Registry;
  private readonly poolDiscovery: PoolDiscovery;
  private readonly priceReader: PriceReader;
  private readonly stateEngine: StateEngine;
  private readonly eventBus: EventBus;
  private readonly lock: ChainLock;

  constructor(
    container: Container,
    whitelist: WhitelistService,
    registry: Registry,
    poolDiscovery: PoolDiscovery,
    priceReader: PriceReader,
    stateEngine: StateEngine,
    eventBus: EventBus,
    lock: ChainLock,
  ) {
    this.container = container;
    this.whitelist = whitelist;
    this.registry = registry;
    this.poolDiscovery = poolDiscovery;
    this.priceReader = priceReader;
    this.stateEngine = stateEngine;
    this.eventBus = eventBus;
    this.lock = lock;
  }

  /** Scans every connected chain. A chain that fails is reported and skipped. */
  async scanAll(trigger: ScanTrigger = 'STARTUP'): Promise<ScanResult[]> {
    const chainIds = this.container.gateway.connectedChainIds();
    this.container.logger.info({ chainIds, trigger }, 'Scanning wallet');
    return Promise.all(chainIds.map((chainId) => this.scanChain(chainId, trigger)));
  }

  scanChain(chainId: number, trigger: ScanTrigger): Promise<ScanResult> {
    return this.lock.run(chainId, async () => {
      try {
        return await this.scan(chainId, trigger);
      } catch (err) {
        this.container.logger.error({ err, chainId, trigger }, 'Chain scan failed, skipping chain');
        return {
          chainId,
          trigger,
          newTransfers: 0,
          positionsOpened: [],
          error: err instanceof Error ? err.message : String(err),
        };
      }
    });
  }

  private async scan(chainId: number, trigger: ScanTrigger): Promise<ScanResult> {
    const { gateway, logger } = this.container;
    const chain = getChainConfig(chainId);
    if (!chain) throw new ChainNotConfiguredError(chainId);

    const quoteAddresses = new Set([chain.weth.toLowerCase(), chain.usdc.toLowerCase()]);
    const transfers = await gateway.getInboundTransfers(chainId);

    const byToken = new Map<string, InboundTransfer[]>();
    for (const transfer of transfers) {
      if (quoteAddresses.has(transfer.tokenAddress)) continue;
      if (!this.whitelist.isSenderWhitelisted(transfer.sender)) continue;
      if (this.whitelist.hasTransfer(chainId, transfer.transferId)) continue;

      const group = byToken.get(transfer.tokenAddress) ?? [];
      group.push(transfer);
      byToken.set(transfer.tokenAddress, group);
    }

    let newTransfers = 0;
    const positionsOpened: PositionState[] = [];

    for (const [tokenAddress, group] of byToken) {
      try {
        const position = await this.processToken(chainId, tokenAddress, group);
        if (position) positionsOpened.push(position);
      } catch (err) {
        logger.warn({ err, chainId, token: tokenAddress }, 'Token processing failed, will retry on next scan');
        continue;
      }

      for (const transfer of group) {
        if (this.whitelist.logTransfer(transfer)) newTransfers += 1;
      }
    }

    logger.info(
      { chainId, trigger, seen: transfers.length, newTransfers, positionsOpened: positionsOpened.length },
      'Chain scan complete',
    );

    this.eventBus.emit({
      id: randomUUID(),
      type: 'WALLET_SCANNED',
      timestamp: Date.now(),
      chainId,
      trigger,
      newTransfers,
      positionsOpened: positionsOpened.length,
    });

    return { chainId, trigger, newTransfers, positionsOpened, error: null };
  }

  /** Returns the opened position, or null when the token does not qualify. */
  private async processToken(
    chainId: number,
    tokenAddress: string,
    transfers: InboundTransfer[],
  ): Promise<PositionState | null> {
    const { gateway, logger, tradingParams } = this.container;
    const first = transfers[0];
    const hintedSymbol = first?.symbol ?? null;

    const listed = this.whitelist.whitelistToken({
      address: tokenAddress,
      chainId,
      symbol: hintedSymbol,
      sender: first?.sender ?? null,
    });
    if (listed.status === 'blocked') return null;

    if (this.stateEngine.findOpenPosition(tokenAddress, chainId)) {
      logger.debug({ chainId, token: tokenAddress }, 'Position already open');
      return null;
    }

    const decimals = await gateway.decimals(chainId, tokenAddress);
    const symbol = await this.readOptional(() => gateway.symbol(chainId, tokenAddress), hintedSymbol);
    const name = await this.readOptional(() => gateway.name(chainId, tokenAddress), null);
    this.registry.upsertToken({ address: tokenAddress, chainId, symbol, name, decimals });

    const balance = await gateway.balanceOf(chainId, tokenAddress);
    if (balance === 0n) {
      logger.info({ chainId, token: tokenAddress }, 'Zero balance, no position opened');
      return null;
    }

    const executionPool = await this.poolDiscovery.discover(tokenAddress, chainId);
    if (!executionPool) {
      logger.warn({ chainId, token: tokenAddress }, 'No execution pool, token not tradable');
      return null;
    }

    const pricingPool = await this.poolDiscovery.pricingPool(tokenAddress, chainId);
    if (!pricingPool) {
      logger.warn({ chainId, token: tokenAddress }, 'No pricing pool, token not monitored');
      return null;
    }

    const entryPrice = await this.priceReader.readPrice(pricingPool, tokenAddress, decimals);

    return this.stateEngine.openPosition({
      tokenAddress,
      chainId,
      pricingChainId: pricingChainFor(chainId),
      symbol: symbol ?? 'UNKNOWN',
      decimals,
      quantity: balance,
      entryPrice,
      takeProfitPct: tradingParams.takeProfitPct,
      stopLossPct: tradingParams.stopLossPct,
      quoteSymbol: executionPool.quoteSymbol,
      feeTier: executionPool.feeTier,
    });
  }

  private async readOptional(read: () => Promise<string>, fallback: string | null): Promise<string | null> {
    try {
      return await read();
    } catch (err) {
      this.container.logger.debug({ err }, 'Token metadata read failed');
      return fallback;
    }
  }
}
