import { getAddress, isError, parseUnits, ZeroAddress, type TransactionReceipt } from 'ethers';
import { z } from 'zod';
import { ChainNotConfiguredError } from '../errors.js';
import { ERC20_ABI, PERMIT2_ABI, UNIVERSAL_ROUTER_ABI, V3_FACTORY_ABI, V3_POOL_ABI } from '../infra/abis.js';
import type { ChainContext, EvmContext } from '../infra/evm.js';
import { chainLogger, type Logger } from '../infra/logger.js';
import type { GasPricing } from '../types/execution.js';
import type { InboundTransfer } from '../types/whitelist.js';

const PRIORITY_FEE = parseUnits('1', 'gwei');
export const APPROVAL_GAS_LIMIT = 100_000n;
const RECEIPT_TIMEOUT_MS = 180_000;

const assetTransfersSchema = z.object({
  transfers: z.array(
    z.object({
      uniqueId: z.string(),
      hash: z.string(),
      from: z.string(),
      blockNum: z.string(),
      asset: z.string().nullable().optional(),
      rawContract: z.object({
        address: z.string().nullable(),
        value: z.string().nullable().optional(),
      }),
    }),
  ),
});

export interface Permit2Allowance {
  amount: bigint;
  expiration: number;
}

export interface TxOutcome {
  hash: string;
  success: boolean;
  gasUsed: bigint;
  gasCostWei: bigint;
  blockNumber: number | null;
}

export interface RouterCall {
  commands: string;
  inputs: string[];
  deadline: bigint;
  gasLimit: bigint;
  gas: GasPricing;
  onSubmitted?: (txHash: string) => void;
}

function expectBigInt(value: unknown, label: string): bigint {
  if (typeof value !== 'bigint') {
    throw new TypeError(`${label}: expected integer result`);
  }
  return value;
}

function expectAddress(value: unknown, label: string): string {
  if (typeof value !== 'string') {
    throw new TypeError(`${label}: expected address result`);
  }
  return getAddress(value);
}

function expectString(value: unknown, label: string): string {
  if (typeof value !== 'string') {
    throw new TypeError(`${label}: expected string result`);
  }
  return value;
}

function summarizeReceipt(receipt: TransactionReceipt): TxOutcome {
  return {
    hash: receipt.hash,
    success: receipt.status === 1,
    gasUsed: receipt.gasUsed,
    gasCostWei: receipt.gasUsed * receipt.gasPrice,
    blockNumber: receipt.blockNumber,
  };
}

/**
 * Typed facade over the contracts the trader talks to. Every read goes
 * through `eth_call` on the chain's provider and is decoded against the
 * ABIs in infra/abis.ts.
 */
export class ChainGateway {
  private readonly evm: EvmContext;
  private readonly logger: Logger;

  constructor(evm: EvmContext, logger: Logger) {
    this.evm = evm;
    this.logger = logger;
  }

  get walletAddress(): string {
    return this.evm.address;
  }

  connectedChainIds(): number[] {
    return Array.from(this.evm.chains.keys());
  }

  context(chainId: number): ChainContext {
    const ctx = this.evm.chains.get(chainId);
    if (!ctx) throw new ChainNotConfiguredError(chainId);
    return ctx;
  }

  async getBlockNumber(chainId: number): Promise<number> {
    return this.context(chainId).provider.getBlockNumber();
  }

  // --- Uniswap V3 ---

  /** Returns null when the factory has no pool for the pair and fee. */
  async getV3Pool(
    chainId: number,
    factory: string,
    tokenA: string,
    tokenB: string,
    fee: number,
  ): Promise<string | null> {
    const data = V3_FACTORY_ABI.encodeFunctionData('getPool', [tokenA, tokenB, fee]);
    const raw = await this.context(chainId).provider.call({ to: factory, data });
    const [pool] = V3_FACTORY_ABI.decodeFunctionResult('getPool', raw);
    const address = expectAddress(pool, 'getPool');
    return address === ZeroAddress ? null : address;
  }

  async readSqrtPriceX96(chainId: number, pool: string): Promise<bigint> {
    const data = V3_POOL_ABI.encodeFunctionData('slot0');
    const raw = await this.context(chainId).provider.call({ to: pool, data });
    const decoded = V3_POOL_ABI.decodeFunctionResult('slot0', raw);
    return expectBigInt(decoded[0], 'slot0.sqrtPriceX96');
  }

  async readToken0(chainId: number, pool: string): Promise<string> {
    const data = V3_POOL_ABI.encodeFunctionData('token0');
    const raw = await this.context(chainId).provider.call({ to: pool, data });
    const [token0] = V3_POOL_ABI.decodeFunctionResult('token0', raw);
    return expectAddress(token0, 'token0');
  }

  // --- ERC-20 ---

  async balanceOf(chainId: number, token: string, owner: string = this.evm.address): Promise<bigint> {
    const data = ERC20_ABI.encodeFunctionData('balanceOf', [owner]);
    const raw = await this.context(chainId).provider.call({ to: token, data });
    const [balance] = ERC20_ABI.decodeFunctionResult('balanceOf', raw);
    return expectBigInt(balance, 'balanceOf');
  }

  async decimals(chainId: number, token: string): Promise<number> {
    const data = ERC20_ABI.encodeFunctionData('decimals');
    const raw = await this.context(chainId).provider.call({ to: token, data });
    const [decimals] = ERC20_ABI.decodeFunctionResult('decimals', raw);
    return Number(expectBigInt(decimals, 'decimals'));
  }

  async symbol(chainId: number, token: string): Promise<string> {
    const data = ERC20_ABI.encodeFunctionData('symbol');
    const raw = await this.context(chainId).provider.call({ to: token, data });
    const [symbol] = ERC20_ABI.decodeFunctionResult('symbol', raw);
    return expectString(symbol, 'symbol');
  }

  async name(chainId: number, token: string): Promise<string> {
    const data = ERC20_ABI.encodeFunctionData('name');
    const raw = await this.context(chainId).provider.call({ to: token, data });
    const [name] = ERC20_ABI.decodeFunctionResult('name', raw);
    return expectString(name, 'name');
  }

  async allowance(chainId: number, token: string, spender: string): Promise<bigint> {
    const data = ERC20_ABI.encodeFunctionData('allowance', [this.evm.address, spender]);
    const raw = await this.context(chainId).provider.call({ to: token, data });
    const [amount] = ERC20_ABI.decodeFunctionResult('allowance', raw);
    return expectBigInt(amount, 'allowance');
  }

  async approve(chainId: number, token: string, spender: string, amount: bigint, gas: GasPricing): Promise<TxOutcome> {
    const data = ERC20_ABI.encodeFunctionData('approve', [spender, amount]);
    return this.send(chainId, token, data, APPROVAL_GAS_LIMIT, gas);
  }

  // --- Permit2 ---

  async permit2Allowance(chainId: number, permit2: string, token: string, spender: string): Promise<Permit2Allowance> {
    const data = PERMIT2_ABI.encodeFunctionData('allowance', [this.evm.address, token, spender]);
    const raw = await this.context(chainId).provider.call({ to: permit2, data });
    const decoded = PERMIT2_ABI.decodeFunctionResult('allowance', raw);
    return {
      amount: expectBigInt(decoded[0], 'permit2.amount'),
      expiration: Number(expectBigInt(decoded[1], 'permit2.expiration')),
    };
  }

  async permit2Approve(
    chainId: number,
    permit2: string,
    token: string,
    spender: string,
    amount: bigint,
    expiration: number,
    gas: GasPricing,
  ): Promise<TxOutcome> {
    const data = PERMIT2_ABI.encodeFunctionData('approve', [token, spender, amount, expiration]);
    return this.send(chainId, permit2, data, APPROVAL_GAS_LIMIT, gas);
  }

  // --- Native balance and fees ---

  async getNativeBalance(chainId: number): Promise<bigint> {
    return this.context(chainId).provider.getBalance(this.evm.address);
  }

  /** EIP-1559 pricing: maxFee = 2 * baseFee + 1 gwei tip. */
  async getGasPricing(chainId: number): Promise<GasPricing> {
    const { provider } = this.context(chainId);
    const block = await provider.getBlock('latest');
    const baseFee = block?.baseFeePerGas;

    if (baseFee !== null && baseFee !== undefined) {
      return {
        maxFeePerGas: baseFee * 2n + PRIORITY_FEE,
        maxPriorityFeePerGas: PRIORITY_FEE,
      };
    }

    const feeData = await provider.getFeeData();
    const gasPrice = feeData.gasPrice ?? PRIORITY_FEE;
    return { maxFeePerGas: gasPrice * 2n, maxPriorityFeePerGas: PRIORITY_FEE };
  }

  // --- Universal Router ---

  async executeRouter(chainId: number, router: string, call: RouterCall): Promise<TxOutcome> {
    const data = UNIVERSAL_ROUTER_ABI.encodeFunctionData('execute', [call.commands, call.inputs, call.deadline]);
    return this.send(chainId, router, data, call.gasLimit, call.gas, call.onSubmitted);
  }

  // --- Transfer history ---

  /** Latest inbound ERC-20 transfers to the wallet, newest first. */
  async getInboundTransfers(chainId: number, maxCount = 100): Promise<InboundTransfer[]> {
    const result: unknown = await this.context(chainId).provider.send('alchemy_getAssetTransfers', [
      {
        fromBlock: '0x0',
        toBlock: 'latest',
        toAddress: this.evm.address,
        category: ['erc20'],
        order: 'desc',
        withMetadata: false,
        excludeZeroValue: true,
        maxCount: `0x${maxCount.toString(16)}`,
      },
    ]);

    const parsed = assetTransfersSchema.parse(result);
    const transfers: InboundTransfer[] = [];

    for (const t of parsed.transfers) {
      if (!t.rawContract.address) continue;
      const rawValue = t.rawContract.value;
      transfers.push({
        transferId: t.uniqueId,
        tokenAddress: t.rawContract.address.toLowerCase(),
        chainId,
        sender: t.from.toLowerCase(),
        amount: rawValue ? BigInt(rawValue).toString() : null,
        blockNumber: Number.parseInt(t.blockNum, 16),
        txHash: t.hash,
        symbol: t.asset ?? null,
      });
    }

    return transfers;
  }

  private async send(
    chainId: number,
    to: string,
    data: string,
    gasLimit: bigint,
    gas: GasPricing,
    onSubmitted?: (txHash: string) => void,
  ): Promise<TxOutcome> {
    const { signer } = this.context(chainId);
    const log = chainLogger(this.logger, chainId);

    const tx = await signer.sendTransaction({
      to,
      data,
      gasLimit,
      maxFeePerGas: gas.maxFeePerGas,
      maxPriorityFeePerGas: gas.maxPriorityFeePerGas,
      type: 2,
    });
    log.info({ to, txHash: tx.hash }, 'Transaction submitted');
    onSubmitted?.(tx.hash);

    try {
      const receipt = await tx.wait(1, RECEIPT_TIMEOUT_MS);
      if (!receipt) {
        throw new Error(`Transaction ${tx.hash} has no receipt`);
      }
      return summarizeReceipt(receipt);
    } catch (err) {
      if (isError(err, 'CALL_EXCEPTION') && err.receipt) {
        log.warn({ txHash: tx.hash }, 'Transaction reverted');
        return summarizeReceipt(err.receipt);
      }
      throw err;
    }
  }
}
