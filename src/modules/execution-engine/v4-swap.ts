import { AbiCoder, ZeroAddress, getAddress, hexlify } from 'ethers';

export const V4_SWAP_COMMAND = 0x10;

export const V4_ACTIONS = {
  SWAP_EXACT_IN_SINGLE: 0x06,
  SETTLE_ALL: 0x0c,
  TAKE_ALL: 0x0f,
} as const;

const TICK_SPACING: Readonly<Record<number, number>> = {
  100: 1,
  500: 10,
  3000: 60,
  10000: 200,
};

const MAX_UINT128 = 2n ** 128n - 1n;

const POOL_KEY_TYPE = 'tuple(address currency0, address currency1, uint24 fee, int24 tickSpacing, address hooks)';
const EXACT_IN_SINGLE_TYPE =
  `tuple(${POOL_KEY_TYPE} poolKey, bool zeroForOne, uint128 amountIn, uint128 amountOutMinimum, bytes hookData)`;

export interface PoolKey {
  currency0: string;
  currency1: string;
  fee: number;
  tickSpacing: number;
  hooks: string;
}

export interface V4SwapParams {
  tokenIn: string;
  tokenOut: string;
  feeTier: number;
  amountIn: bigint;
  minAmountOut: bigint;
}

export interface EncodedSwap {
  commands: string;
  inputs: string[];
  zeroForOne: boolean;
  poolKey: PoolKey;
}

export function tickSpacingFor(feeTier: number): number {
  return TICK_SPACING[feeTier] ?? 60;
}

/** Currencies are ordered by numeric address value; no hooks. */
export function buildPoolKey(tokenA: string, tokenB: string, feeTier: number): PoolKey {
  const a = getAddress(tokenA);
  const b = getAddress(tokenB);
  const [currency0, currency1] = BigInt(a) < BigInt(b) ? [a, b] : [b, a];
  return {
    currency0,
    currency1,
    fee: feeTier,
    tickSpacing: tickSpacingFor(feeTier),
    hooks: ZeroAddress,
  };
}

/**
 * Encodes an exact-input single-pool swap as the Universal Router's V4_SWAP
 * command: SWAP_EXACT_IN_SINGLE, SETTLE_ALL on the input currency, TAKE_ALL on
 * the output currency.
 */
export function encodeV4Swap(params: V4SwapParams): EncodedSwap {
  if (params.amountIn <= 0n || params.amountIn > MAX_UINT128) {
    throw new RangeError(`amountIn ${params.amountIn} is outside uint128`);
  }
  if (params.minAmountOut < 0n || params.minAmountOut > MAX_UINT128) {
    throw new RangeError(`minAmountOut ${params.minAmountOut} is outside uint128`);
  }

  const coder = AbiCoder.defaultAbiCoder();
  const tokenIn = getAddress(params.tokenIn);
  const tokenOut = getAddress(params.tokenOut);
  const poolKey = buildPoolKey(tokenIn, tokenOut, params.feeTier);
  const zeroForOne = poolKey.currency0 === tokenIn;

  const actions = hexlify(
    new Uint8Array([V4_ACTIONS.SWAP_EXACT_IN_SINGLE, V4_ACTIONS.SETTLE_ALL, V4_ACTIONS.TAKE_ALL]),
  );

  const swapParams = coder.encode(
    [EXACT_IN_SINGLE_TYPE],
    [
      [
        [poolKey.currency0, poolKey.currency1, poolKey.fee, poolKey.tickSpacing, poolKey.hooks],
        zeroForOne,
        params.amountIn,
        params.minAmountOut,
        '0x',
      ],
    ],
  );
  const settleParams = coder.encode(['address', 'uint256'], [tokenIn, params.amountIn]);
  const takeParams = coder.encode(['address', 'uint256'], [tokenOut, params.minAmountOut]);

  const input = coder.encode(['bytes', 'bytes[]'], [actions, [swapParams, settleParams, takeParams]]);

  return {
    commands: hexlify(new Uint8Array([V4_SWAP_COMMAND])),
    inputs: [input],
    zeroForOne,
    poolKey,
  };
}
