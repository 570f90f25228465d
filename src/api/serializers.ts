import type { ExitBlock, PositionState, PriceObservation } from '../types/position.js';

/** JSON view of a position; bigint quantities travel as decimal strings. */
export function serializePosition(
  position: PositionState,
  latest?: PriceObservation,
  unrealizedPnl: number | null = null,
  exitBlocked: ExitBlock | null = null,
) {
  return {
    ...position,
    quantity: position.quantity.toString(),
    latestPrice: latest?.price ?? null,
    latestPriceAt: latest?.observedAt ?? null,
    unrealizedPnl,
    exitBlocked,
  };
}
