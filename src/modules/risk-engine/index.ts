export { RiskEngine } from './risk-engine.service.js';
export type { GasProjection } from './risk-engine.service.js';
