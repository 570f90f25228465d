export interface WhitelistedSender {
  address: string;
  label: string | null;
  addedAt: Date;
}

export type WhitelistAuditAction = 'ADD' | 'REMOVE' | 'TOKEN_STATUS';

export interface WhitelistAuditEntry {
  id: number;
  action: WhitelistAuditAction;
  address: string;
  label: string | null;
  actor: string;
  createdAt: Date;
}

export type TokenWhitelistStatus = 'pending' | 'active' | 'completed' | 'blocked';

export interface WhitelistedToken {
  address: string;
  chainId: number;
  symbol: string | null;
  sender: string | null;
  status: TokenWhitelistStatus;
  addedAt: Date;
}

export interface InboundTransfer {
  transferId: string;
  tokenAddress: string;
  chainId: number;
  sender: string;
  amount: string | null;
  blockNumber: number | null;
  txHash: string | null;
  symbol: string | null;
}
