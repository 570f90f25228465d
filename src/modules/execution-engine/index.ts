export { ExecutionEngine, applySlippage, toRawAmount } from './execution-engine.service.js';
export type { BuyRequest, ExecutionQuery } from './execution-engine.service.js';
export { encodeV4Swap, buildPoolKey, tickSpacingFor } from './v4-swap.js';
