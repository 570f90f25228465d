export { WhitelistService } from './whitelist.service.js';
export type { TokenWhitelistInput } from './whitelist.service.js';
