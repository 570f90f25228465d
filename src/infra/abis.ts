import { Interface } from 'ethers';

export const V3_FACTORY_ABI = new Interface([
  'function getPool(address tokenA, address tokenB, uint24 fee) view returns (address pool)',
]);

export const V3_POOL_ABI = new Interface([
  'function slot0() view returns (uint160 sqrtPriceX96, int24 tick, uint16 observationIndex, uint16 observationCardinality, uint16 observationCardinalityNext, uint8 feeProtocol, bool unlocked)',
  'function token0() view returns (address)',
]);

export const ERC20_ABI = new Interface([
  'function balanceOf(address account) view returns (uint256)',
  'function decimals() view returns (uint8)',
  'function symbol() view returns (string)',
  'function name() view returns (string)',
  'function allowance(address owner, address spender) view returns (uint256)',
  'function approve(address spender, uint256 amount) returns (bool)',
]);

export const PERMIT2_ABI = new Interface([
  'function allowance(address owner, address token, address spender) view returns (uint160 amount, uint48 expiration, uint48 nonce)',
  'function approve(address token, address spender, uint160 amount, uint48 expiration)',
]);

export const UNIVERSAL_ROUTER_ABI = new Interface([
  'function execute(bytes commands, bytes[] inputs, uint256 deadline) payable',
]);
