export { ControlSignals } from './control-signals.service.js';
export type { ControlSignal, ControlStatus, SignalRecord } from './control-signals.service.js';
