import { describe, it, expect, vi } from 'vitest';
import { getAddress, parseUnits, ZeroAddress, type JsonRpcProvider, type Wallet } from 'ethers';
import { ChainGateway } from './chain-gateway.js';
import { CHAINS } from '../config/chains.js';
import { ChainNotConfiguredError } from '../errors.js';
import { V3_FACTORY_ABI, V3_POOL_ABI } from '../infra/abis.js';
import type { EvmContext } from '../infra/evm.js';
import type { Logger } from '../infra/logger.js';

const WALLET = '0x1111111111111111111111111111111111111111';
const POOL = '0x2222222222222222222222222222222222222222';

function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  } as unknown as Logger;
}

function createGateway(provider: Partial<Record<keyof JsonRpcProvider, unknown>>): ChainGateway {
  const chain = CHAINS[8453]!;
  const evm: EvmContext = {
    address: WALLET,
    chains: new Map([
      [
        8453,
        {
          chainId: 8453,
          chain,
          provider: provider as unknown as JsonRpcProvider,
          signer: {} as unknown as Wallet,
        },
      ],
    ]),
  };
  return new ChainGateway(evm, createMockLogger());
}

describe('ChainGateway', () => {
  it('throws for chains without an RPC connection', () => {
    const gateway = createGateway({});
    expect(() => gateway.context(1)).toThrow(ChainNotConfiguredError);
    expect(gateway.connectedChainIds()).toEqual([8453]);
  });

  it('maps the zero address from getPool to null', async () => {
    const call = vi.fn().mockResolvedValue(V3_FACTORY_ABI.encodeFunctionResult('getPool', [ZeroAddress]));
    const gateway = createGateway({ call });

    const pool = await gateway.getV3Pool(8453, CHAINS[8453]!.v3Factory, POOL, WALLET, 3000);
    expect(pool).toBeNull();
  });

  it('returns a checksummed pool address', async () => {
    const raw = '0x8ba1f109551bd432803012645ac136ddd64dba72';
    const call = vi.fn().mockResolvedValue(V3_FACTORY_ABI.encodeFunctionResult('getPool', [raw]));
    const gateway = createGateway({ call });

    const pool = await gateway.getV3Pool(8453, CHAINS[8453]!.v3Factory, POOL, WALLET, 500);
    expect(pool).toBe(getAddress(raw));
    expect(pool).not.toBe(raw);
  });

  it('decodes sqrtPriceX96 from slot0', async () => {
    const sqrtPrice = 79228162514264337593543950336n;
    const call = vi
      .fn()
      .mockResolvedValue(V3_POOL_ABI.encodeFunctionResult('slot0', [sqrtPrice, 0, 0, 1, 1, 0, true]));
    const gateway = createGateway({ call });

    await expect(gateway.readSqrtPriceX96(8453, POOL)).resolves.toBe(sqrtPrice);
  });

  it('prices gas at twice the base fee plus a 1 gwei tip', async () => {
    const getBlock = vi.fn().mockResolvedValue({ baseFeePerGas: parseUnits('10', 'gwei') });
    const gateway = createGateway({ getBlock });

    const pricing = await gateway.getGasPricing(8453);
    expect(pricing.maxFeePerGas).toBe(parseUnits('21', 'gwei'));
    expect(pricing.maxPriorityFeePerGas).toBe(parseUnits('1', 'gwei'));
  });

  it('parses inbound transfers and skips entries without a contract', async () => {
    const send = vi.fn().mockResolvedValue({
      transfers: [
        {
          uniqueId: '0xaaa:log:1',
          hash: '0xaaa',
          from: '0xABCDEFABCDEFABCDEFABCDEFABCDEFABCDEFABCD',
          blockNum: '0x10',
          asset: 'TKN',
          rawContract: { address: '0x3333333333333333333333333333333333333333', value: '0x64' },
        },
        {
          uniqueId: '0xbbb:log:2',
          hash: '0xbbb',
          from: '0x4444444444444444444444444444444444444444',
          blockNum: '0x11',
          rawContract: { address: null },
        },
      ],
    });
    const gateway = createGateway({ send });

    const transfers = await gateway.getInboundTransfers(8453);

    expect(send).toHaveBeenCalledWith('alchemy_getAssetTransfers', [
      expect.objectContaining({ toAddress: WALLET, category: ['erc20'], order: 'desc', maxCount: '0x64' }),
    ]);
    expect(transfers).toEqual([
      {
        transferId: '0xaaa:log:1',
        tokenAddress: '0x3333333333333333333333333333333333333333',
        chainId: 8453,
        sender: '0xabcdefabcdefabcdefabcdefabcdefabcdefabcd',
        amount: '100',
        blockNumber: 16,
        txHash: '0xaaa',
        symbol: 'TKN',
      },
    ]);
  });
});
