import type { ExitReason } from './position.js';

export type ExecutionStatus = 'PENDING' | 'SUBMITTED' | 'CONFIRMED' | 'FAILED' | 'REFUSED';

export type ExecutionSide = 'BUY' | 'SELL';

export interface SwapRequest {
  positionId: string | null;
  side: ExecutionSide;
  reason: ExitReason | 'MANUAL_BUY';
  chainId: number;
  tokenIn: string;
  tokenOut: string;
  amountIn: bigint;
  minAmountOut: bigint;
  feeTier: number;
  maxSlippageBps: number;
}

export interface ExecutionResult {
  id: string;
  status: ExecutionStatus;
  txHash: string | null;
  amountIn: string;
  minAmountOut: string;
  gasUsed: string | null;
  gasCostWei: string | null;
  errorMessage: string | null;
  completedAt: Date | null;
}

export interface ExecutionRecord extends ExecutionResult {
  positionId: string | null;
  side: ExecutionSide;
  reason: string;
  chainId: number;
  tokenIn: string;
  tokenOut: string;
  createdAt: Date;
}

export interface GasPricing {
  maxFeePerGas: bigint;
  maxPriorityFeePerGas: bigint;
}
