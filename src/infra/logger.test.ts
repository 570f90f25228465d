import { describe, it, expect, vi } from 'vitest';
import { chainLogger, type Logger } from './logger.js';

describe('chainLogger', () => {
  it('binds the chain id and name', () => {
    const child = vi.fn();
    const logger = { child } as unknown as Logger;

    chainLogger(logger, 8453);
    chainLogger(logger, 999);

    expect(child.mock.calls).toEqual([
      [{ chainId: 8453, chain: 'Base' }],
      [{ chainId: 999, chain: 'unknown' }],
    ]);
  });
});
