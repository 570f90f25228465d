export { Orchestrator } from './orchestrator.service.js';
export type { OrchestratorStatus } from './orchestrator.service.js';
export { ScanScheduler } from './scan-scheduler.js';
