export { PositionMonitor, evaluateExit } from './position-monitor.service.js';
export type { MonitorAction, MonitorOutcome } from './position-monitor.service.js';
