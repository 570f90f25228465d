export { WalletScanner } from './wallet-scanner.service.js';
export type { ScanResult, ScanTrigger } from './wallet-scanner.service.js';
