import type { Container } from '../../infra/container.js';
import type { EventBus, Unsubscribe } from '../../services/event-bus.js';
import type {
  InboundTransfer,
  TokenWhitelistStatus,
  WhitelistAuditAction,
  WhitelistAuditEntry,
  WhitelistedSender,
  WhitelistedToken,
} from '../../types/whitelist.js';

interface SenderRow {
  address: string;
  label: string | null;
  added_at: string;
}

interface AuditRow {
  id: number;
  action: string;
  address: string;
  label: string | null;
  actor: string;
  created_at: string;
}

interface TokenRow {
  address: string;
  chain_id: number;
  symbol: string | null;
  sender: string | null;
  status: string;
  added_at: string;
}

const TOKEN_STATUSES: readonly TokenWhitelistStatus[] = ['pending', 'active', 'completed', 'blocked'];

function toTokenStatus(value: string): TokenWhitelistStatus {
  const status = TOKEN_STATUSES.find((s) => s === value);
  if (!status) throw new Error(`Unknown token whitelist status: ${value}`);
  return status;
}

function toAuditAction(value: string): WhitelistAuditAction {
  if (value === 'ADD' || value === 'REMOVE' || value === 'TOKEN_STATUS') return value;
  throw new Error(`Unknown whitelist audit action: ${value}`);
}

function toSender(row: SenderRow): WhitelistedSender {
  return { address: row.address, label: row.label, addedAt: new Date(row.added_at) };
}

function toToken(row: TokenRow): WhitelistedToken {
  return {
    address: row.address,
    chainId: row.chain_id,
    symbol: row.symbol,
    sender: row.sender,
    status: toTokenStatus(row.status),
    addedAt: new Date(row.added_at),
  };
}

export interface TokenWhitelistInput {
  address: string;
  chainId: number;
  symbol: string | null;
  sender: string | null;
}

export class WhitelistService {
  private readonly container: Container;

  constructor(container: Container) {
    this.container = container;
  }

  // --- Senders ---

  listSenders(): WhitelistedSender[] {
    return this.container.db
      .prepare<[], SenderRow>('SELECT * FROM whitelisted_senders ORDER BY added_at')
      .all()
      .map(toSender);
  }

  isSenderWhitelisted(address: string): boolean {
    const row = this.container.db
      .prepare<[string], { address: string }>('SELECT address FROM whitelisted_senders WHERE address = ?')
      .get(address.toLowerCase());
    return row !== undefined;
  }

  addSender(address: string, label: string | null, actor: string): WhitelistedSender {
    const { db, logger } = this.container;
    const normalized = address.toLowerCase();
    const now = new Date().toISOString();

    db.transaction(() => {
      db.prepare<[string, string | null, string]>(
        `INSERT INTO whitelisted_senders (address, label, added_at) VALUES (?, ?, ?)
         ON CONFLICT (address) DO UPDATE SET label = excluded.label`,
      ).run(normalized, label, now);
      this.audit('ADD', normalized, label, actor, now);
    })();

    logger.info({ address: normalized, label, actor }, 'Sender whitelisted');

    const row = db
      .prepare<[string], SenderRow>('SELECT * FROM whitelisted_senders WHERE address = ?')
      .get(normalized);
    if (!row) throw new Error(`Sender ${normalized} was not stored`);
    return toSender(row);
  }

  /** Returns false when the sender was not on the whitelist. */
  removeSender(address: string, actor: string): boolean {
    const { db, logger } = this.container;
    const normalized = address.toLowerCase();

    const existing = db
      .prepare<[string], SenderRow>('SELECT * FROM whitelisted_senders WHERE address = ?')
      .get(normalized);
    if (!existing) return false;

    db.transaction(() => {
      db.prepare<[string]>('DELETE FROM whitelisted_senders WHERE address = ?').run(normalized);
      this.audit('REMOVE', normalized, existing.label, actor, new Date().toISOString());
    })();

    logger.info({ address: normalized, actor }, 'Sender removed from whitelist');
    return true;
  }

  listAudit(limit = 100): WhitelistAuditEntry[] {
    return this.container.db
      .prepare<[number], AuditRow>('SELECT * FROM whitelist_audit ORDER BY id DESC LIMIT ?')
      .all(limit)
      .map((row) => ({
        id: row.id,
        action: toAuditAction(row.action),
        address: row.address,
        label: row.label,
        actor: row.actor,
        createdAt: new Date(row.created_at),
      }));
  }

  private audit(action: WhitelistAuditAction, address: string, label: string | null, actor: string, at: string): void {
    this.container.db
      .prepare<[string, string, string | null, string, string]>(
        'INSERT INTO whitelist_audit (action, address, label, actor, created_at) VALUES (?, ?, ?, ?, ?)',
      )
      .run(action, address, label, actor, at);
  }

  // --- Tokens ---

  /**
   * Marks a token received from a whitelisted sender as active. Blocked
   * tokens keep their status.
   */
  whitelistToken(input: TokenWhitelistInput): WhitelistedToken {
    const { db, logger } = this.container;
    const address = input.address.toLowerCase();

    db.prepare<[string, number, string | null, string | null, string]>(
      `INSERT INTO whitelisted_tokens (address, chain_id, symbol, sender, status, added_at)
       VALUES (?, ?, ?, ?, 'active', ?)
       ON CONFLICT (address, chain_id) DO UPDATE SET
         status = CASE WHEN whitelisted_tokens.status = 'blocked' THEN 'blocked' ELSE 'active' END,
         symbol = COALESCE(excluded.symbol, whitelisted_tokens.symbol),
         sender = COALESCE(excluded.sender, whitelisted_tokens.sender)`,
    ).run(address, input.chainId, input.symbol, input.sender?.toLowerCase() ?? null, new Date().toISOString());

    const token = this.getToken(address, input.chainId);
    if (!token) throw new Error(`Token ${address} on chain ${input.chainId} was not stored`);

    if (token.status === 'blocked') {
      logger.warn({ token: address, chainId: input.chainId }, 'Token is blocked, whitelist request ignored');
    }
    return token;
  }

  /** Audited status change. Undefined when the token was never whitelisted. */
  setTokenStatus(
    address: string,
    chainId: number,
    status: TokenWhitelistStatus,
    actor: string,
  ): WhitelistedToken | undefined {
    const { db, logger } = this.container;
    const normalized = address.toLowerCase();

    const existing = this.getToken(normalized, chainId);
    if (!existing) return undefined;

    db.transaction(() => {
      db.prepare<[string, string, number]>(
        'UPDATE whitelisted_tokens SET status = ? WHERE address = ? AND chain_id = ?',
      ).run(status, normalized, chainId);
      this.audit(
        'TOKEN_STATUS',
        normalized,
        `chain ${chainId}: ${existing.status} -> ${status}`,
        actor,
        new Date().toISOString(),
      );
    })();

    logger.info({ token: normalized, chainId, from: existing.status, to: status, actor }, 'Token status changed');
    return { ...existing, status };
  }

  /** Marks a token completed once its position closes. Blocked tokens stay blocked. */
  trackClosures(eventBus: EventBus): Unsubscribe {
    return eventBus.onType('POSITION_CLOSED', (event) => {
      const token = this.getToken(event.tokenAddress, event.chainId);
      if (!token || token.status === 'blocked' || token.status === 'completed') return;
      this.setTokenStatus(event.tokenAddress, event.chainId, 'completed', 'system');
    });
  }

  getToken(address: string, chainId: number): WhitelistedToken | undefined {
    const row = this.container.db
      .prepare<[string, number], TokenRow>('SELECT * FROM whitelisted_tokens WHERE address = ? AND chain_id = ?')
      .get(address.toLowerCase(), chainId);
    return row ? toToken(row) : undefined;
  }

  listTokens(status?: TokenWhitelistStatus): WhitelistedToken[] {
    const { db } = this.container;
    const rows =
      status === undefined
        ? db.prepare<[], TokenRow>('SELECT * FROM whitelisted_tokens ORDER BY added_at').all()
        : db
            .prepare<[string], TokenRow>('SELECT * FROM whitelisted_tokens WHERE status = ? ORDER BY added_at')
            .all(status);
    return rows.map(toToken);
  }

  // --- Transfer log ---

  hasTransfer(chainId: number, transferId: string): boolean {
    const row = this.container.db
      .prepare<[number, string], { transfer_id: string }>(
        'SELECT transfer_id FROM token_events WHERE chain_id = ? AND transfer_id = ?',
      )
      .get(chainId, transferId);
    return row !== undefined;
  }

  /** Returns false when the transfer was already logged. */
  logTransfer(transfer: InboundTransfer): boolean {
    const result = this.container.db
      .prepare<[string, number, string, string, string | null, number | null, string | null, string]>(
        `INSERT OR IGNORE INTO token_events
           (transfer_id, chain_id, token_address, sender, amount, block_number, tx_hash, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        transfer.transferId,
        transfer.chainId,
        transfer.tokenAddress.toLowerCase(),
        transfer.sender.toLowerCase(),
        transfer.amount,
        transfer.blockNumber,
        transfer.txHash,
        new Date().toISOString(),
      );
    return result.changes > 0;
  }
}
