import { expect } from 'vitest';
import { getAddress, parseEther } from 'viem';
import type { SaleConfig } from '../src/types';
import { isChainError, type ChainError, type ChainErrorCode } from '../src/services/errors';

// Test accounts
export const owner = getAddress('0xf39fd6e51aad88f6f4ce6ab8827279cfffb92266');
export const bob = getAddress('0x70997970c51812dc3a010c7d01b50e0d17dc79c8');
export const carol = getAddress('0x3c44cdddb6a900fa2b585dd299e03d12fa4293bc');
export const dave = getAddress('0x15d34aaf54267db7d7c367839aaf71a00a2c6a65');
export const treasury = getAddress('0x90f79bf6eb2c4f870365e785982e1f101e93b906');

export const E18 = 10n ** 18n;

export function tokens(amount: number): bigint {
  return BigInt(amount) * E18;
}

export const T0 = 1_700_000_000;
export const START = T0 + 100;
export const END = START + 30 * 86400;

/**
 * 0.001 ETH per token, 10-100 tokens per address, 1000 tokens for sale
 */
export const baseConfig: SaleConfig = {
  tokenPrice: parseEther('0.001'),
  minPurchase: tokens(10),
  maxPurchase: tokens(100),
  maxSupply: tokens(1000),
  startTime: START,
  endTime: END,
  whitelistRequired: true,
};

/**
 * Assert that `fn` reverts with the given code and return the error
 */
export function expectRevert(fn: () => unknown, code: ChainErrorCode): ChainError {
  try {
    fn();
  } catch (error) {
    expect(isChainError(error)).toBe(true);
    if (isChainError(error)) {
      expect(error.code).toBe(code);
      return error;
    }
  }
  throw new Error(`Expected revert with ${code}`);
}
