export type { EventType, BaseEvent, InternalEvent, PositionOpenedEvent, ExitTriggeredEvent, PositionClosedEvent, TradeExecutedEvent, WalletScannedEvent } from './events.js';
export type { PositionStatus, ExitReason, PositionState, NewPosition, PriceObservation } from './position.js';
export type { QuoteSymbol, PoolReference, TokenRecord } from './pool.js';
export type { WhitelistedSender, WhitelistAuditAction, WhitelistAuditEntry, TokenWhitelistStatus, WhitelistedToken, InboundTransfer } from './whitelist.js';
export type { ExecutionStatus, ExecutionSide, SwapRequest, ExecutionResult, ExecutionRecord, GasPricing } from './execution.js';
export type { RiskParameters, TradingParameters, RiskRule, RiskCheckResult, RiskViolation } from './risk.js';
