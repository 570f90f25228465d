export type TraderErrorCode =
  | 'PRICE_UNAVAILABLE'
  | 'POOL_NOT_FOUND'
  | 'GAS_RESERVE'
  | 'INVALID_TRANSITION'
  | 'IMMUTABLE_FIELD'
  | 'DUPLICATE_POSITION'
  | 'CHAIN_NOT_CONFIGURED'
  | 'EMPTY_BALANCE';

export class TraderError extends Error {
  readonly code: TraderErrorCode;

  constructor(code: TraderErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class PriceUnavailableError extends TraderError {
  constructor(poolAddress: string, attempts: number, cause?: unknown) {
    super('PRICE_UNAVAILABLE', `Pool ${poolAddress} price unavailable after ${attempts} attempt(s)`, { cause });
  }
}

export class PoolNotFoundError extends TraderError {
  constructor(tokenAddress: string, chainId: number) {
    super('POOL_NOT_FOUND', `No pool for ${tokenAddress} on chain ${chainId}`);
  }
}

export class GasReserveError extends TraderError {
  constructor(chainId: number, projectedWei: bigint, reserveWei: bigint) {
    super(
      'GAS_RESERVE',
      `Chain ${chainId} projected native balance ${projectedWei} wei is below reserve ${reserveWei} wei`,
    );
  }
}

export class InvalidTransitionError extends TraderError {
  constructor(positionId: string, from: string, to: string) {
    super('INVALID_TRANSITION', `Position ${positionId} cannot move from ${from} to ${to}`);
  }
}

export class ImmutableFieldError extends TraderError {
  constructor(positionId: string, field: string) {
    super('IMMUTABLE_FIELD', `Position ${positionId} field ${field} is immutable`);
  }
}

export class DuplicatePositionError extends TraderError {
  constructor(tokenAddress: string, chainId: number) {
    super('DUPLICATE_POSITION', `An open position already exists for ${tokenAddress} on chain ${chainId}`);
  }
}

export class ChainNotConfiguredError extends TraderError {
  constructor(chainId: number) {
    super('CHAIN_NOT_CONFIGURED', `Chain ${chainId} has no RPC connection`);
  }
}

export class EmptyBalanceError extends TraderError {
  readonly positionId: string;
  readonly balance: bigint;

  constructor(positionId: string, balance: bigint) {
    super('EMPTY_BALANCE', `Position ${positionId} has no sellable balance (${balance} raw units)`);
    this.positionId = positionId;
    this.balance = balance;
  }
}
