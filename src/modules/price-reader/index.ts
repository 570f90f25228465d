export { PriceReader } from './price-reader.service.js';
export { sqrtPriceX96ToPrice, tokenPriceFromSqrtPrice } from './sqrt-price.js';
