import { zeroAddress, type Address } from 'viem';
import type { TokenEvent, TokenMetadata, TokenState } from '../types';
import { ChainError, LedgerError } from './errors';
import type { Revertible } from './guard';

export const DEFAULT_DECIMALS = 18;

// 1,000,000,000 whole tokens
export const DEFAULT_MAX_SUPPLY = 1_000_000_000n * 10n ** 18n;

/**
 * Fungible-token surface the sale depends on
 */
export interface Ledger {
  readonly address: Address;
  readonly decimals: number;
  balanceOf(account: Address): bigint;
  transfer(from: Address, to: Address, amount: bigint): void;
}

/**
 * Capped, pausable fungible token with owner minting and holder burning
 */
export class FungibleToken implements Ledger, Revertible {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly maxSupply: bigint;
  private state: TokenState;

  constructor(
    readonly address: Address,
    metadata: Partial<TokenMetadata> & Pick<TokenMetadata, 'name' | 'symbol'>,
    owner: Address,
    state?: Omit<TokenState, 'owner' | 'events'>
  ) {
    if (owner === zeroAddress) {
      throw new ChainError('ZeroAddress', 'Owner cannot be the zero address');
    }

    this.name = metadata.name;
    this.symbol = metadata.symbol;
    this.decimals = metadata.decimals ?? DEFAULT_DECIMALS;
    this.maxSupply = metadata.maxSupply ?? DEFAULT_MAX_SUPPLY;
    this.state = {
      owner,
      paused: state?.paused ?? false,
      totalSupply: state?.totalSupply ?? 0n,
      balances: new Map<Address, bigint>(state?.balances ?? []),
      events: [],
    };
  }

  get owner(): Address {
    return this.state.owner;
  }

  get paused(): boolean {
    return this.state.paused;
  }

  get totalSupply(): bigint {
    return this.state.totalSupply;
  }

  balanceOf(account: Address): bigint {
    return this.state.balances.get(account) ?? 0n;
  }

  /**
   * Iterate non-zero balances
   */
  balances(): Array<[Address, bigint]> {
    return [...this.state.balances.entries()].filter(([, balance]) => balance > 0n);
  }

  remainingMintableSupply(): bigint {
    return this.maxSupply - this.state.totalSupply;
  }

  getEvents(): readonly TokenEvent[] {
    return this.state.events;
  }

  checkpoint(): () => void {
    const saved: TokenState = {
      ...this.state,
      balances: new Map(this.state.balances),
      events: [...this.state.events],
    };
    return () => {
      this.state = saved;
    };
  }

  mint(caller: Address, to: Address, amount: bigint): void {
    this.onlyOwner(caller);
    this.whenNotPaused();

    if (to === zeroAddress) {
      throw new LedgerError('ZeroAddress', 'Cannot mint to zero address');
    }
    if (amount <= 0n) {
      throw new LedgerError('InvalidAmount', 'Mint amount must be positive');
    }
    if (this.state.totalSupply + amount > this.maxSupply) {
      throw new LedgerError('ExceedsMaxSupply', 'Exceeds maximum supply');
    }

    this.state.totalSupply += amount;
    this.credit(to, amount);
    this.state.events.push({ type: 'Transfer', from: zeroAddress, to, amount });
    this.state.events.push({ type: 'Mint', to, amount });
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    this.whenNotPaused();

    if (to === zeroAddress) {
      throw new LedgerError('ZeroAddress', 'Cannot transfer to zero address');
    }
    if (amount < 0n) {
      throw new LedgerError('InvalidAmount', 'Transfer amount cannot be negative');
    }

    this.debit(from, amount);
    this.credit(to, amount);
    this.state.events.push({ type: 'Transfer', from, to, amount });
  }

  burn(holder: Address, amount: bigint): void {
    this.whenNotPaused();
    this.debit(holder, amount);
    this.state.totalSupply -= amount;
    this.state.events.push({ type: 'Transfer', from: holder, to: zeroAddress, amount });
  }

  pause(caller: Address): void {
    this.onlyOwner(caller);
    if (this.state.paused) {
      throw new LedgerError('EnforcedPause', 'Token is already paused');
    }
    this.state.paused = true;
    this.state.events.push({ type: 'Paused', account: caller });
  }

  unpause(caller: Address): void {
    this.onlyOwner(caller);
    if (!this.state.paused) {
      throw new LedgerError('ExpectedPause', 'Token is not paused');
    }
    this.state.paused = false;
    this.state.events.push({ type: 'Unpaused', account: caller });
  }

  /**
   * Move a foreign token accidentally sent to this contract
   */
  recoverERC20(caller: Address, token: Ledger, to: Address, amount: bigint): void {
    this.onlyOwner(caller);
    if (token.address === this.address) {
      throw new LedgerError('CannotRecoverOwnToken', 'Cannot recover own tokens');
    }
    token.transfer(this.address, to, amount);
  }

  private credit(account: Address, amount: bigint): void {
    this.state.balances.set(account, this.balanceOf(account) + amount);
  }

  private debit(account: Address, amount: bigint): void {
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new LedgerError(
        'InsufficientBalance',
        `${this.symbol}: balance ${balance} of ${account} is below ${amount}`
      );
    }
    this.state.balances.set(account, balance - amount);
  }

  private onlyOwner(caller: Address): void {
    if (caller !== this.state.owner) {
      throw new LedgerError('Unauthorized', `${caller} is not the owner`);
    }
  }

  private whenNotPaused(): void {
    if (this.state.paused) {
      throw new LedgerError('EnforcedPause', `${this.symbol} is paused`);
    }
  }
}

/**
 * Hook run when an account receives native currency. Throwing rejects the transfer.
 */
export type ReceiveHook = (from: Address, amount: bigint) => void;

/**
 * Native currency balances
 */
export class NativeLedger implements Revertible {
  private balances: Map<Address, bigint>;
  private receivers = new Map<Address, ReceiveHook>();

  constructor(initial: Iterable<[Address, bigint]> = []) {
    this.balances = new Map(initial);
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  entries(): Array<[Address, bigint]> {
    return [...this.balances.entries()].filter(([, balance]) => balance > 0n);
  }

  setBalance(account: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError('InvalidAmount', 'Balance cannot be negative');
    }
    this.balances.set(account, amount);
  }

  /**
   * Register (or clear with `null`) the receive hook of an account
   */
  onReceive(account: Address, hook: ReceiveHook | null): void {
    if (hook) {
      this.receivers.set(account, hook);
    } else {
      this.receivers.delete(account);
    }
  }

  checkpoint(): () => void {
    const saved = new Map(this.balances);
    return () => {
      this.balances = saved;
    };
  }

  /**
   * Move native currency, then hand control to the recipient's hook
   */
  transfer(from: Address, to: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError('InvalidAmount', 'Transfer amount cannot be negative');
    }

    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new LedgerError('InsufficientBalance', `Native balance ${balance} of ${from} is below ${amount}`);
    }

    this.balances.set(from, balance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);

    const hook = this.receivers.get(to);
    if (!hook) return;

    try {
      hook(from, amount);
    } catch (error) {
      throw new LedgerError('NativeTransferFailed', `Transfer to ${to} was rejected`, { cause: error });
    }
  }
}
