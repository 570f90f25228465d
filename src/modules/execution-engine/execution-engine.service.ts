import { randomUUID } from 'node:crypto';
import { formatUnits, MaxUint256, parseUnits } from 'ethers';
import type { Container } from '../../infra/container.js';
import type { EventBus } from '../../services/event-bus.js';
import type { StateEngine } from '../state-engine/state-engine.service.js';
import type { RiskEngine } from '../risk-engine/risk-engine.service.js';
import type { PoolDiscovery } from '../pool-discovery/pool-discovery.service.js';
import type { PriceReader } from '../price-reader/price-reader.service.js';
import type { ExitReason, PositionState } from '../../types/position.js';
import type {
  ExecutionRecord,
  ExecutionResult,
  ExecutionSide,
  ExecutionStatus,
  GasPricing,
  SwapRequest,
} from '../../types/execution.js';
import { APPROVAL_GAS_LIMIT } from '../../services/chain-gateway.js';
import { getChainConfig, PERMIT2_ADDRESS, quoteTokensFor, type ChainConfig } from '../../config/chains.js';
import { ChainNotConfiguredError, EmptyBalanceError, GasReserveError, PoolNotFoundError } from '../../errors.js';
import { encodeV4Swap } from './v4-swap.js';

const ALLOWANCE_FLOOR = 2n ** 128n;
const PERMIT2_MAX_AMOUNT = 2n ** 160n - 1n;
const PERMIT2_MIN_VALIDITY_SECONDS = 3600;
const PERMIT2_APPROVAL_SECONDS = 30 * 86_400;
const DUST_SCALE = 1_000_000n;

interface ExecutionRow {
  id: string;
  position_id: string | null;
  side: string;
  reason: string;
  chain_id: number;
  token_in: string;
  token_out: string;
  amount_in: string;
  min_amount_out: string;
  status: string;
  tx_hash: string | null;
  gas_used: string | null;
  gas_cost_wei: string | null;
  error_message: string | null;
  created_at: string;
  completed_at: string | null;
}

export interface BuyRequest {
  tokenAddress: string;
  chainId: number;
  /** Raw units of the pool's quote token. */
  quoteAmount: bigint;
  maxSlippageBps?: number;
}

export interface ExecutionQuery {
  positionId?: string;
  status?: ExecutionStatus;
  limit?: number;
}

const STATUSES: readonly ExecutionStatus[] = ['PENDING', 'SUBMITTED', 'CONFIRMED', 'FAILED', 'REFUSED'];

function toStatus(value: string): ExecutionStatus {
  const status = STATUSES.find((s) => s === value);
  if (!status) throw new Error(`Unknown execution status: ${value}`);
  return status;
}

function toSide(value: string): ExecutionSide {
  if (value === 'BUY' || value === 'SELL') return value;
  throw new Error(`Unknown execution side: ${value}`);
}

function toRecord(row: ExecutionRow): ExecutionRecord {
  return {
    id: row.id,
    positionId: row.position_id,
    side: toSide(row.side),
    reason: row.reason,
    chainId: row.chain_id,
    tokenIn: row.token_in,
    tokenOut: row.token_out,
    amountIn: row.amount_in,
    minAmountOut: row.min_amount_out,
    status: toStatus(row.status),
    txHash: row.tx_hash,
    gasUsed: row.gas_used,
    gasCostWei: row.gas_cost_wei,
    errorMessage: row.error_message,
    createdAt: new Date(row.created_at),
    completedAt: row.completed_at ? new Date(row.completed_at) : null,
  };
}

/** Applies a slippage tolerance to an expected output, rounding down. */
export function applySlippage(expectedOut: bigint, slippageBps: number): bigint {
  return (expectedOut * BigInt(10_000 - slippageBps)) / 10_000n;
}

/** Converts a floating quote amount into raw units, truncated to the token's precision. */
export function toRawAmount(amount: number, decimals: number): bigint {
  if (!Number.isFinite(amount) || amount <= 0) return 0n;
  return parseUnits(amount.toFixed(decimals), decimals);
}

/** True when a raw amount is below one millionth of a whole token. */
export function isDust(raw: bigint, decimals: number): boolean {
  return raw * DUST_SCALE < 10n ** BigInt(decimals);
}

export class ExecutionEngine {
  private readonly container: Container;
  private readonly stateEngine: StateEngine;
  private readonly riskEngine: RiskEngine;
  private readonly poolDiscovery: PoolDiscovery;
  private readonly priceReader: PriceReader;
  private readonly eventBus: EventBus;

  constructor(
    container: Container,
    stateEngine: StateEngine,
    riskEngine: RiskEngine,
    poolDiscovery: PoolDiscovery,
    priceReader: PriceReader,
    eventBus: EventBus,
  ) {
    this.container = container;
    this.stateEngine = stateEngine;
    this.riskEngine = riskEngine;
    this.poolDiscovery = poolDiscovery;
    this.priceReader = priceReader;
    this.eventBus = eventBus;
  }

  /**
   * Swaps the whole position into the quote token of its execution pool.
   * On a confirmed fill the position is closed at `exitPrice`; otherwise it
   * stays EXIT_PENDING. Throws EmptyBalanceError, before anything is
   * recorded, when the wallet holds only dust of the token.
   */
  async sellPosition(position: PositionState, reason: ExitReason, exitPrice: number | null): Promise<ExecutionResult> {
    const { gateway, riskParams, logger } = this.container;
    const chain = this.requireChain(position.chainId);
    const quote = quoteTokensFor(chain).find((q) => q.symbol === position.quoteSymbol);
    if (!quote) {
      throw new Error(`Position ${position.id} has unknown quote ${position.quoteSymbol}`);
    }

    const balance = await gateway.balanceOf(position.chainId, position.tokenAddress);
    const amountIn = balance < position.quantity ? balance : position.quantity;
    if (isDust(amountIn, position.decimals)) {
      throw new EmptyBalanceError(position.id, amountIn);
    }

    let minAmountOut = 0n;
    if (chain.pricingChainId === chain.chainId && exitPrice !== null) {
      const expected = Number(formatUnits(amountIn, position.decimals)) * exitPrice;
      minAmountOut = applySlippage(toRawAmount(expected, quote.decimals), riskParams.maxSlippageBps);
    }

    const request: SwapRequest = {
      positionId: position.id,
      side: 'SELL',
      reason,
      chainId: position.chainId,
      tokenIn: position.tokenAddress,
      tokenOut: quote.address,
      amountIn,
      minAmountOut,
      feeTier: position.feeTier,
      maxSlippageBps: riskParams.maxSlippageBps,
    };

    logger.info(
      {
        positionId: position.id,
        reason,
        amountIn: amountIn.toString(),
        minAmountOut: minAmountOut.toString(),
        exitPrice,
      },
      'Exit swap requested',
    );

    const result = await this.execute(request, chain);

    if (result.status === 'CONFIRMED' && result.txHash) {
      this.stateEngine.closePosition(position.id, exitPrice, result.txHash);
    }
    return result;
  }

  /** Buys a token with the quote token of its execution pool on that chain. */
  async buyToken(input: BuyRequest): Promise<ExecutionResult> {
    const { riskParams, logger } = this.container;
    const chain = this.requireChain(input.chainId);

    const pool = await this.poolDiscovery.discover(input.tokenAddress, input.chainId);
    if (!pool) {
      throw new PoolNotFoundError(input.tokenAddress, input.chainId);
    }

    const slippageBps = input.maxSlippageBps ?? riskParams.maxSlippageBps;
    let minAmountOut = 0n;
    if (chain.pricingChainId === chain.chainId) {
      const decimals = await this.container.gateway.decimals(input.chainId, input.tokenAddress);
      const price = await this.priceReader.readPrice(pool, input.tokenAddress, decimals);
      const expected = Number(formatUnits(input.quoteAmount, pool.quoteDecimals)) / price;
      minAmountOut = applySlippage(toRawAmount(expected, decimals), slippageBps);
    }

    logger.info(
      {
        token: input.tokenAddress,
        chainId: input.chainId,
        quote: pool.quoteSymbol,
        quoteAmount: input.quoteAmount.toString(),
        minAmountOut: minAmountOut.toString(),
      },
      'Buy swap requested',
    );

    return this.execute(
      {
        positionId: null,
        side: 'BUY',
        reason: 'MANUAL_BUY',
        chainId: input.chainId,
        tokenIn: pool.quoteAddress,
        tokenOut: input.tokenAddress.toLowerCase(),
        amountIn: input.quoteAmount,
        minAmountOut,
        feeTier: pool.feeTier,
        maxSlippageBps: slippageBps,
      },
      chain,
    );
  }

  private async execute(request: SwapRequest, chain: ChainConfig): Promise<ExecutionResult> {
    const { gateway, logger, riskParams, tradingParams } = this.container;
    const executionId = randomUUID();
    this.insertExecution(executionId, request);

    try {
      const gas = await gateway.getGasPricing(request.chainId);

      const riskCheck = await this.riskEngine.evaluate(request, gas);
      if (!riskCheck.approved) {
        return this.finish(executionId, request, {
          status: 'REFUSED',
          errorMessage: `Risk violations: ${riskCheck.violations.map((v) => v.message).join('; ')}`,
        });
      }

      const approvals = await this.ensureApprovals(request.chainId, request.tokenIn, chain, gas);
      if (approvals > 0) {
        // approval fees were paid after the risk check
        await this.riskEngine.ensureGasReserve(request.chainId, riskParams.swapGasLimit, gas);
      }

      const encoded = encodeV4Swap({
        tokenIn: request.tokenIn,
        tokenOut: request.tokenOut,
        feeTier: request.feeTier,
        amountIn: request.amountIn,
        minAmountOut: request.minAmountOut,
      });
      const deadline = BigInt(Math.floor(Date.now() / 1000) + tradingParams.swapDeadlineSeconds);

      const outcome = await gateway.executeRouter(request.chainId, chain.universalRouter, {
        commands: encoded.commands,
        inputs: encoded.inputs,
        deadline,
        gasLimit: riskParams.swapGasLimit,
        gas,
        onSubmitted: (txHash) => this.markSubmitted(executionId, txHash),
      });

      if (!outcome.success) {
        return this.finish(executionId, request, {
          status: 'FAILED',
          txHash: outcome.hash,
          gasUsed: outcome.gasUsed,
          gasCostWei: outcome.gasCostWei,
          errorMessage: 'Swap reverted on-chain',
        });
      }

      const result = this.finish(executionId, request, {
        status: 'CONFIRMED',
        txHash: outcome.hash,
        gasUsed: outcome.gasUsed,
        gasCostWei: outcome.gasCostWei,
        errorMessage: null,
      });

      logger.info(
        { executionId, txHash: outcome.hash, gasUsed: outcome.gasUsed.toString(), side: request.side },
        'Execution confirmed',
      );

      this.eventBus.emit({
        id: randomUUID(),
        type: 'TRADE_EXECUTED',
        timestamp: Date.now(),
        chainId: request.chainId,
        executionId,
        side: request.side,
        txHash: outcome.hash,
      });

      return result;
    } catch (err) {
      if (err instanceof GasReserveError) {
        logger.warn({ executionId, chainId: request.chainId }, err.message);
        return this.finish(executionId, request, { status: 'REFUSED', errorMessage: err.message });
      }
      logger.error({ err, executionId }, 'Execution failed');
      return this.finish(executionId, request, {
        status: 'FAILED',
        errorMessage: err instanceof Error ? err.message : String(err),
      });
    }
  }

  /** ERC-20 -> Permit2, then Permit2 -> Universal Router. Returns how many approvals were sent. */
  private async ensureApprovals(chainId: number, token: string, chain: ChainConfig, gas: GasPricing): Promise<number> {
    const { gateway, logger } = this.container;
    let sent = 0;

    const erc20Allowance = await gateway.allowance(chainId, token, PERMIT2_ADDRESS);
    if (erc20Allowance < ALLOWANCE_FLOOR) {
      await this.riskEngine.ensureGasReserve(chainId, APPROVAL_GAS_LIMIT, gas);
      const outcome = await gateway.approve(chainId, token, PERMIT2_ADDRESS, MaxUint256, gas);
      if (!outcome.success) {
        throw new Error(`ERC20 approval of Permit2 reverted for ${token}`);
      }
      logger.info({ chainId, token, txHash: outcome.hash }, 'Permit2 approved for token');
      sent += 1;
    }

    const permit = await gateway.permit2Allowance(chainId, PERMIT2_ADDRESS, token, chain.universalRouter);
    const now = Math.floor(Date.now() / 1000);
    if (permit.amount < ALLOWANCE_FLOOR || permit.expiration < now + PERMIT2_MIN_VALIDITY_SECONDS) {
      await this.riskEngine.ensureGasReserve(chainId, APPROVAL_GAS_LIMIT, gas);
      const outcome = await gateway.permit2Approve(
        chainId,
        PERMIT2_ADDRESS,
        token,
        chain.universalRouter,
        PERMIT2_MAX_AMOUNT,
        now + PERMIT2_APPROVAL_SECONDS,
        gas,
      );
      if (!outcome.success) {
        throw new Error(`Permit2 approval of router reverted for ${token}`);
      }
      logger.info({ chainId, token, txHash: outcome.hash }, 'Router approved on Permit2');
      sent += 1;
    }
    return sent;
  }

  listExecutions(query: ExecutionQuery = {}): ExecutionRecord[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (query.positionId) {
      clauses.push('position_id = ?');
      params.push(query.positionId);
    }
    if (query.status) {
      clauses.push('status = ?');
      params.push(query.status);
    }
    params.push(query.limit ?? 50);

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    return this.container.db
      .prepare<Array<string | number>, ExecutionRow>(
        `SELECT * FROM executions ${where} ORDER BY created_at DESC, rowid DESC LIMIT ?`,
      )
      .all(...params)
      .map(toRecord);
  }

  getExecution(id: string): ExecutionRecord | undefined {
    const row = this.container.db
      .prepare<[string], ExecutionRow>('SELECT * FROM executions WHERE id = ?')
      .get(id);
    return row ? toRecord(row) : undefined;
  }

  private insertExecution(id: string, request: SwapRequest): void {
    this.container.db
      .prepare<[string, string | null, string, string, number, string, string, string, string, string]>(
        `INSERT INTO executions
           (id, position_id, side, reason, chain_id, token_in, token_out, amount_in, min_amount_out, status, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 'PENDING', ?)`,
      )
      .run(
        id,
        request.positionId,
        request.side,
        request.reason,
        request.chainId,
        request.tokenIn.toLowerCase(),
        request.tokenOut.toLowerCase(),
        request.amountIn.toString(),
        request.minAmountOut.toString(),
        new Date().toISOString(),
      );
  }

  private markSubmitted(id: string, txHash: string): void {
    const { db, logger } = this.container;

    try {
      db.prepare<[string, string]>("UPDATE executions SET status = 'SUBMITTED', tx_hash = ? WHERE id = ?").run(
        txHash,
        id,
      );
    } catch (err) {
      logger.error({ err, executionId: id }, 'Failed to mark execution submitted');
    }
  }

  private finish(
    id: string,
    request: SwapRequest,
    outcome: {
      status: ExecutionStatus;
      errorMessage: string | null;
      txHash?: string;
      gasUsed?: bigint;
      gasCostWei?: bigint;
    },
  ): ExecutionResult {
    const result: ExecutionResult = {
      id,
      status: outcome.status,
      txHash: outcome.txHash ?? null,
      amountIn: request.amountIn.toString(),
      minAmountOut: request.minAmountOut.toString(),
      gasUsed: outcome.gasUsed?.toString() ?? null,
      gasCostWei: outcome.gasCostWei?.toString() ?? null,
      errorMessage: outcome.errorMessage,
      completedAt: new Date(),
    };

    const { db, logger } = this.container;
    try {
      db.prepare<[string, string | null, string | null, string | null, string | null, string, string]>(
        `UPDATE executions
           SET status = ?, tx_hash = COALESCE(?, tx_hash), gas_used = ?, gas_cost_wei = ?, error_message = ?, completed_at = ?
         WHERE id = ?`,
      ).run(
        result.status,
        result.txHash,
        result.gasUsed,
        result.gasCostWei,
        result.errorMessage,
        new Date().toISOString(),
        id,
      );
    } catch (err) {
      logger.error({ err, executionId: id }, 'Failed to persist execution');
    }

    return result;
  }

  private requireChain(chainId: number): ChainConfig {
    const chain = getChainConfig(chainId);
    if (!chain) throw new ChainNotConfiguredError(chainId);
    return chain;
  }

  async stop(): Promise<void> {
    this.container.logger.info('Execution engine stopped');
  }
}
