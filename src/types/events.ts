import type { ExecutionSide } from './execution.js';
import type { ExitReason } from './position.js';

export type EventType =
  | 'POSITION_OPENED'
  | 'EXIT_TRIGGERED'
  | 'POSITION_CLOSED'
  | 'TRADE_EXECUTED'
  | 'WALLET_SCANNED';

export interface BaseEvent {
  id: string;
  type: EventType;
  timestamp: number;
  chainId: number;
}

export interface PositionOpenedEvent extends BaseEvent {
  type: 'POSITION_OPENED';
  positionId: string;
  tokenAddress: string;
  entryPrice: number;
  quantity: string;
}

export interface ExitTriggeredEvent extends BaseEvent {
  type: 'EXIT_TRIGGERED';
  positionId: string;
  reason: ExitReason;
  price: number | null;
}

export interface PositionClosedEvent extends BaseEvent {
  type: 'POSITION_CLOSED';
  positionId: string;
  tokenAddress: string;
  reason: ExitReason;
  exitPrice: number | null;
  realizedPnl: number | null;
  txHash: string;
}

export interface TradeExecutedEvent extends BaseEvent {
  type: 'TRADE_EXECUTED';
  executionId: string;
  side: ExecutionSide;
  txHash: string;
}

export interface WalletScannedEvent extends BaseEvent {
  type: 'WALLET_SCANNED';
  trigger: 'STARTUP' | 'POST_TRADE';
  newTransfers: number;
  positionsOpened: number;
}

export type InternalEvent =
  | PositionOpenedEvent
  | ExitTriggeredEvent
  | PositionClosedEvent
  | TradeExecutedEvent
  | WalletScannedEvent;
