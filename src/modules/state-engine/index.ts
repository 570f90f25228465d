export { StateEngine, computeRealizedPnl } from './state-engine.service.js';
export type { TradingStats } from './state-engine.service.js';
