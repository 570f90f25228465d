import type { Container } from '../../infra/container.js';
import type { PoolReference, QuoteSymbol, TokenRecord } from '../../types/pool.js';

interface TokenRow {
  address: string;
  chain_id: number;
  symbol: string | null;
  name: string | null;
  decimals: number | null;
  first_seen: string;
}

interface PoolRow {
  chain_id: number;
  token_address: string;
  pool_address: string;
  fee_tier: number;
  quote_symbol: string;
  quote_address: string;
  quote_decimals: number;
  discovered_at: string;
}

export type NewPoolReference = Omit<PoolReference, 'dex' | 'discoveredAt'>;

function toQuoteSymbol(value: string): QuoteSymbol {
  if (value === 'WETH' || value === 'USDC') return value;
  throw new Error(`Unknown quote symbol in pools table: ${value}`);
}

function toToken(row: TokenRow): TokenRecord {
  return {
    address: row.address,
    chainId: row.chain_id,
    symbol: row.symbol,
    name: row.name,
    decimals: row.decimals,
    firstSeen: new Date(row.first_seen),
  };
}

function toPool(row: PoolRow): PoolReference {
  return {
    chainId: row.chain_id,
    tokenAddress: row.token_address,
    poolAddress: row.pool_address,
    dex: 'uniswap_v3',
    feeTier: row.fee_tier,
    quoteSymbol: toQuoteSymbol(row.quote_symbol),
    quoteAddress: row.quote_address,
    quoteDecimals: row.quote_decimals,
    discoveredAt: new Date(row.discovered_at),
  };
}

/**
 * Token and pool registry. Pools are append-only: a reference is written
 * once and never updated or removed.
 */
export class Registry {
  private readonly container: Container;

  constructor(container: Container) {
    this.container = container;
  }

  /** Inserts the token or fills in metadata that was previously unknown. */
  upsertToken(token: Omit<TokenRecord, 'firstSeen'>): TokenRecord {
    const { db } = this.container;
    const address = token.address.toLowerCase();

    db.prepare<[string, number, string | null, string | null, number | null, string]>(
      `INSERT INTO tokens (address, chain_id, symbol, name, decimals, first_seen)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT (address, chain_id) DO UPDATE SET
         symbol = COALESCE(tokens.symbol, excluded.symbol),
         name = COALESCE(tokens.name, excluded.name),
         decimals = COALESCE(tokens.decimals, excluded.decimals)`,
    ).run(address, token.chainId, token.symbol, token.name, token.decimals, new Date().toISOString());

    const stored = this.getToken(address, token.chainId);
    if (!stored) {
      throw new Error(`Token ${address} on chain ${token.chainId} was not stored`);
    }
    return stored;
  }

  getToken(address: string, chainId: number): TokenRecord | undefined {
    const row = this.container.db
      .prepare<[string, number], TokenRow>('SELECT * FROM tokens WHERE address = ? AND chain_id = ?')
      .get(address.toLowerCase(), chainId);
    return row ? toToken(row) : undefined;
  }

  listTokens(chainId?: number): TokenRecord[] {
    const { db } = this.container;
    const rows =
      chainId === undefined
        ? db.prepare<[], TokenRow>('SELECT * FROM tokens ORDER BY first_seen').all()
        : db.prepare<[number], TokenRow>('SELECT * FROM tokens WHERE chain_id = ? ORDER BY first_seen').all(chainId);
    return rows.map(toToken);
  }

  /** Returns true when the reference was new. Existing references are left untouched. */
  appendPool(pool: NewPoolReference): boolean {
    const result = this.container.db
      .prepare<[number, string, string, string, number, string, string, number, string]>(
        `INSERT OR IGNORE INTO pools
           (chain_id, token_address, pool_address, dex, fee_tier, quote_symbol, quote_address, quote_decimals, discovered_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        pool.chainId,
        pool.tokenAddress.toLowerCase(),
        pool.poolAddress.toLowerCase(),
        'uniswap_v3',
        pool.feeTier,
        pool.quoteSymbol,
        pool.quoteAddress.toLowerCase(),
        pool.quoteDecimals,
        new Date().toISOString(),
      );

    if (result.changes > 0) {
      this.container.logger.info(
        { chainId: pool.chainId, token: pool.tokenAddress, pool: pool.poolAddress, fee: pool.feeTier },
        'Pool registered',
      );
    }
    return result.changes > 0;
  }

  /** Pools for a token in discovery order. */
  getPools(tokenAddress: string, chainId: number): PoolReference[] {
    return this.container.db
      .prepare<[string, number], PoolRow>(
        'SELECT * FROM pools WHERE token_address = ? AND chain_id = ? ORDER BY rowid',
      )
      .all(tokenAddress.toLowerCase(), chainId)
      .map(toPool);
  }

  getPool(tokenAddress: string, chainId: number): PoolReference | undefined {
    return this.getPools(tokenAddress, chainId)[0];
  }

  listPools(chainId?: number): PoolReference[] {
    const { db } = this.container;
    const rows =
      chainId === undefined
        ? db.prepare<[], PoolRow>('SELECT * FROM pools ORDER BY rowid').all()
        : db.prepare<[number], PoolRow>('SELECT * FROM pools WHERE chain_id = ? ORDER BY rowid').all(chainId);
    return rows.map(toPool);
  }
}
