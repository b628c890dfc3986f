/**
 * Error codes raised by the sale engine
 */
export type SaleErrorCode =
  | 'SaleNotActive'
  | 'BelowMinimum'
  | 'AboveMaximum'
  | 'SupplyExceeded'
  | 'NotWhitelisted'
  | 'IndividualLimitExceeded'
  | 'InsufficientPayment'
  | 'ClaimingDisabled'
  | 'ClaimingNotStarted'
  | 'NothingToClaim'
  | 'AlreadyClaimed'
  | 'InvalidPricing'
  | 'InvalidWindow'
  | 'SupplyBelowSold'
  | 'EmptyBatch'
  | 'BatchTooLarge'
  | 'WithdrawExceedsAvailable'
  | 'NothingToWithdraw'
  | 'UnknownToken';

/**
 * Error codes raised by token and native ledgers
 */
export type LedgerErrorCode =
  | 'InsufficientBalance'
  | 'NativeTransferFailed'
  | 'EnforcedPause'
  | 'ExpectedPause'
  | 'ExceedsMaxSupply'
  | 'CannotRecoverOwnToken'
  | 'InvalidAmount';

/**
 * Errors shared by every contract
 */
export type CommonErrorCode = 'Unauthorized' | 'ZeroAddress' | 'ReentrantCall';

export type ChainErrorCode = SaleErrorCode | LedgerErrorCode | CommonErrorCode;

/**
 * Base class for every revert raised inside the devnet
 */
export class ChainError<C extends ChainErrorCode = ChainErrorCode> extends Error {
  constructor(
    readonly code: C,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ?? code, options);
    this.name = 'ChainError';
  }
}

export class SaleError extends ChainError<SaleErrorCode | CommonErrorCode> {
  constructor(code: SaleErrorCode | CommonErrorCode, message?: string) {
    super(code, message);
    this.name = 'SaleError';
  }
}

export class LedgerError extends ChainError<LedgerErrorCode | CommonErrorCode> {
  constructor(code: LedgerErrorCode | CommonErrorCode, message?: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = 'LedgerError';
  }
}

export function isChainError(error: unknown): error is ChainError {
  return error instanceof ChainError;
}
