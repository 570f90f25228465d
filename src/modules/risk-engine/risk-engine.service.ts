import { formatEther } from 'ethers';
import type { Container } from '../../infra/container.js';
import type { GasPricing, SwapRequest } from '../../types/execution.js';
import type { RiskCheckResult, RiskViolation } from '../../types/risk.js';
import { GasReserveError } from '../../errors.js';

export interface GasProjection {
  balanceWei: bigint;
  maxGasCostWei: bigint;
  projectedWei: bigint;
  sufficient: boolean;
}

export class RiskEngine {
  private readonly container: Container;
  private lastExecutionTime: Map<string, number> = new Map();

  constructor(container: Container) {
    this.container = container;
  }

  /** Native balance left after paying `gasLimit` at the worst-case fee, against the reserve. */
  async projectGas(chainId: number, gasLimit: bigint, gas: GasPricing): Promise<GasProjection> {
    const balanceWei = await this.container.gateway.getNativeBalance(chainId);
    const maxGasCostWei = gasLimit * gas.maxFeePerGas;
    const projectedWei = balanceWei - maxGasCostWei;

    return {
      balanceWei,
      maxGasCostWei,
      projectedWei,
      sufficient: projectedWei >= this.container.riskParams.gasReserveWei,
    };
  }

  /** Throws GasReserveError when a transaction would eat into the reserve. */
  async ensureGasReserve(chainId: number, gasLimit: bigint, gas: GasPricing): Promise<void> {
    const projection = await this.projectGas(chainId, gasLimit, gas);
    if (!projection.sufficient) {
      throw new GasReserveError(chainId, projection.projectedWei, this.container.riskParams.gasReserveWei);
    }
  }

  async evaluate(request: SwapRequest, gas: GasPricing): Promise<RiskCheckResult> {
    const violations: RiskViolation[] = [];
    const { riskParams, logger } = this.container;

    if (request.amountIn <= 0n) {
      violations.push({
        rule: 'INVALID_AMOUNT',
        message: `Swap amount ${request.amountIn} must be positive`,
        currentValue: request.amountIn.toString(),
        limit: '0',
      });
    }

    if (request.maxSlippageBps > riskParams.maxSlippageBps) {
      violations.push({
        rule: 'MAX_SLIPPAGE',
        message: `Slippage ${request.maxSlippageBps}bps exceeds limit ${riskParams.maxSlippageBps}bps`,
        currentValue: String(request.maxSlippageBps),
        limit: String(riskParams.maxSlippageBps),
      });
    }

    if (request.positionId) {
      const lastExec = this.lastExecutionTime.get(request.positionId);
      if (lastExec !== undefined) {
        const elapsed = Date.now() - lastExec;
        if (elapsed < riskParams.executionCooldownMs) {
          violations.push({
            rule: 'EXECUTION_COOLDOWN',
            message: `Cooldown not elapsed: ${elapsed}ms of ${riskParams.executionCooldownMs}ms`,
            currentValue: String(elapsed),
            limit: String(riskParams.executionCooldownMs),
          });
        }
      }
    }

    const projection = await this.projectGas(request.chainId, riskParams.swapGasLimit, gas);
    if (!projection.sufficient) {
      violations.push({
        rule: 'GAS_RESERVE',
        message:
          `Projected native balance ${formatEther(projection.projectedWei)} ` +
          `is below reserve ${formatEther(riskParams.gasReserveWei)}`,
        currentValue: projection.projectedWei.toString(),
        limit: riskParams.gasReserveWei.toString(),
      });
    }

    if (violations.length === 0 && request.positionId) {
      this.lastExecutionTime.set(request.positionId, Date.now());
    }

    if (violations.length > 0) {
      logger.warn({ chainId: request.chainId, positionId: request.positionId, violations }, 'Swap refused by risk checks');
    }

    return {
      approved: violations.length === 0,
      violations,
    };
  }

  async stop(): Promise<void> {
    this.lastExecutionTime.clear();
    this.container.logger.info('Risk engine stopped');
  }
}
