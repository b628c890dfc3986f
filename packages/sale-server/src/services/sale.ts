import { zeroAddress, zeroHash, type Address, type Hex } from 'viem';
import type {
  ClaimSettings,
  Purchase,
  PurchaseReceipt,
  SaleConfig,
  SaleEvent,
  SaleInfo,
  SaleState,
} from '../types';
import { SaleError } from './errors';
import { atomically, ReentrancyGuard, type Revertible } from './guard';
import type { FungibleToken, NativeLedger } from './ledger';
import { getLeaf, isEmptyRoot, verifyProof } from './merkle';

export const MAX_BATCH_SIZE = 100;

/**
 * What a sale needs from the chain it runs on
 */
export interface ChainContext {
  readonly native: NativeLedger;
  now(): number;
  getToken(address: Address): FungibleToken | undefined;
}

export interface SaleParams {
  address: Address;
  token: FungibleToken;
  treasury: Address;
  owner: Address;
  config: SaleConfig;
}

/**
 * Restorable part of a sale beyond its constructor params
 */
export type SaleRestoreState = Omit<SaleState, 'owner' | 'treasury' | 'config' | 'events'>;

const EMPTY_PURCHASE: Purchase = { amount: 0n, paidAmount: 0n, timestamp: 0, claimed: false };

/**
 * Validate a sale config before it is installed.
 * @throws SaleError InvalidPricing | InvalidWindow
 */
export function validateSaleConfig(config: SaleConfig): void {
  if (config.minPurchase <= 0n || config.maxPurchase < config.minPurchase) {
    throw new SaleError('InvalidPricing', 'Require maxPurchase >= minPurchase > 0');
  }
  if (config.endTime <= config.startTime) {
    throw new SaleError('InvalidWindow', 'endTime must be after startTime');
  }
}

/**
 * Fixed-window token sale with buy/claim separation.
 *
 * Buyers pay in native currency during [startTime, endTime]; payments are forwarded to the
 * treasury immediately and tokens are delivered later through `claim`, once the owner
 * enables claiming. Every mutating call is all-or-nothing.
 */
export class SaleEngine implements Revertible {
  readonly address: Address;
  readonly token: FungibleToken;
  private state: SaleState;
  private readonly guard = new ReentrancyGuard();

  constructor(
    private readonly chain: ChainContext,
    params: SaleParams,
    restore?: SaleRestoreState
  ) {
    if (params.token.address === zeroAddress || params.treasury === zeroAddress || params.owner === zeroAddress) {
      throw new SaleError('ZeroAddress', 'Token, treasury and owner must be set');
    }
    validateSaleConfig(params.config);

    this.address = params.address;
    this.token = params.token;
    this.state = {
      owner: params.owner,
      treasury: params.treasury,
      config: { ...params.config },
      purchases: new Map<Address, Purchase>(restore?.purchases ?? []),
      totalSold: restore?.totalSold ?? 0n,
      totalRaised: restore?.totalRaised ?? 0n,
      totalClaimed: restore?.totalClaimed ?? 0n,
      whitelist: new Set<Address>(restore?.whitelist ?? []),
      merkleRoot: restore?.merkleRoot ?? zeroHash,
      claim: { ...(restore?.claim ?? { claimEnabled: false, claimStartTime: 0 }) },
      events: [],
    };
  }

  checkpoint(): () => void {
    const saved = cloneState(this.state);
    return () => {
      this.state = saved;
    };
  }

  // ── Purchases ──

  /**
   * Buy `amount` tokens for delivery at claim time. `payment` is taken from the caller's
   * native balance; any excess over the price is refunded.
   */
  buy(caller: Address, amount: bigint, payment: bigint, proof: Hex[] = []): PurchaseReceipt {
    return this.guard.run(() =>
      atomically([this, this.chain.native], () => {
        this.chain.native.transfer(caller, this.address, payment);

        const { config } = this.state;
        if (!this.isSaleActive()) {
          throw new SaleError('SaleNotActive', 'Sale is not active');
        }
        if (amount < config.minPurchase) {
          throw new SaleError('BelowMinimum', `Amount ${amount} is below minimum ${config.minPurchase}`);
        }
        if (amount > config.maxPurchase) {
          throw new SaleError('AboveMaximum', `Amount ${amount} is above maximum ${config.maxPurchase}`);
        }
        if (this.state.totalSold + amount > config.maxSupply) {
          throw new SaleError('SupplyExceeded', 'Purchase would exceed max supply');
        }
        if (config.whitelistRequired && !this.isWhitelisted(caller, proof)) {
          throw new SaleError('NotWhitelisted', `${caller} is not whitelisted`);
        }

        const purchase = this.getPurchase(caller);
        if (purchase.amount + amount > config.maxPurchase) {
          throw new SaleError('IndividualLimitExceeded', `${caller} would exceed the purchase limit`);
        }

        const cost = this.calculatePayment(amount);
        if (payment < cost) {
          throw new SaleError('InsufficientPayment', `Payment ${payment} is below required ${cost}`);
        }

        const timestamp = this.chain.now();
        this.state.purchases.set(caller, {
          amount: purchase.amount + amount,
          paidAmount: purchase.paidAmount + cost,
          timestamp,
          claimed: purchase.claimed,
        });
        this.state.totalSold += amount;
        this.state.totalRaised += cost;
        this.emit({ type: 'TokensPurchased', buyer: caller, amount, cost, timestamp });

        // External calls only after state is final
        if (cost > 0n) {
          this.chain.native.transfer(this.address, this.state.treasury, cost);
        }
        const refund = payment - cost;
        if (refund > 0n) {
          this.chain.native.transfer(this.address, caller, refund);
        }

        return { buyer: caller, amount, cost, refund, timestamp };
      })
    );
  }

  /**
   * Deliver the caller's purchased tokens. One-shot per address.
   */
  claim(caller: Address): bigint {
    return this.guard.run(() =>
      atomically([this, this.token], () => {
        const { claim } = this.state;
        if (!claim.claimEnabled) {
          throw new SaleError('ClaimingDisabled', 'Claiming is not enabled');
        }
        if (this.chain.now() < claim.claimStartTime) {
          throw new SaleError('ClaimingNotStarted', 'Claiming has not started');
        }

        const purchase = this.state.purchases.get(caller);
        if (!purchase || purchase.amount === 0n) {
          throw new SaleError('NothingToClaim', `${caller} has nothing to claim`);
        }
        if (purchase.claimed) {
          throw new SaleError('AlreadyClaimed', `${caller} has already claimed`);
        }

        this.state.purchases.set(caller, { ...purchase, claimed: true });
        this.state.totalClaimed += purchase.amount;
        this.emit({ type: 'TokensClaimed', buyer: caller, amount: purchase.amount });

        this.token.transfer(this.address, caller, purchase.amount);
        return purchase.amount;
      })
    );
  }

  // ── Administration ──

  updateSaleConfig(caller: Address, config: SaleConfig): void {
    this.onlyOwner(caller);
    validateSaleConfig(config);
    if (config.maxSupply < this.state.totalSold) {
      throw new SaleError('SupplyBelowSold', `maxSupply ${config.maxSupply} is below sold ${this.state.totalSold}`);
    }

    this.state.config = { ...config };
    this.emit({ type: 'SaleConfigUpdated', config: { ...config } });
  }

  /**
   * Toggle claiming. The start time only moves when enabling with a positive timestamp.
   */
  setClaimEnabled(caller: Address, enabled: boolean, claimStartTime: number): void {
    this.onlyOwner(caller);

    this.state.claim.claimEnabled = enabled;
    if (enabled && claimStartTime > 0) {
      this.state.claim.claimStartTime = claimStartTime;
    }
    this.emit({ type: 'ClaimSettingsUpdated', enabled, claimStartTime: this.state.claim.claimStartTime });
  }

  updateWhitelist(caller: Address, account: Address, status: boolean): void {
    this.onlyOwner(caller);
    this.setWhitelisted(account, status);
  }

  updateWhitelistBatch(caller: Address, accounts: Address[], status: boolean): void {
    this.onlyOwner(caller);
    if (accounts.length === 0) {
      throw new SaleError('EmptyBatch', 'Accounts array is empty');
    }
    if (accounts.length > MAX_BATCH_SIZE) {
      throw new SaleError('BatchTooLarge', `Batch size ${accounts.length} exceeds ${MAX_BATCH_SIZE}`);
    }

    atomically([this], () => {
      for (const account of accounts) {
        this.setWhitelisted(account, status);
      }
    });
  }

  setMerkleRoot(caller: Address, root: Hex): void {
    this.onlyOwner(caller);
    this.state.merkleRoot = root;
    this.emit({ type: 'MerkleRootUpdated', root });
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.onlyOwner(caller);
    if (newOwner === zeroAddress) {
      throw new SaleError('ZeroAddress', 'New owner is the zero address');
    }

    const previousOwner = this.state.owner;
    this.state.owner = newOwner;
    this.emit({ type: 'OwnershipTransferred', previousOwner, newOwner });
  }

  /**
   * Sweep a token held by the sale to the owner.
   * For the sale token, tokens owed to buyers who have not claimed yet are never taken.
   */
  emergencyWithdraw(caller: Address, tokenAddress: Address, amount: bigint): void {
    this.onlyOwner(caller);

    const token = tokenAddress === this.token.address ? this.token : this.chain.getToken(tokenAddress);
    if (!token) {
      throw new SaleError('UnknownToken', `No token deployed at ${tokenAddress}`);
    }
    if (token === this.token) {
      const available = this.withdrawableSaleTokens();
      if (amount > available) {
        throw new SaleError('WithdrawExceedsAvailable', `Only ${available} unsold tokens can be withdrawn`);
      }
    }

    this.guard.run(() =>
      atomically([this, token], () => {
        this.emit({ type: 'EmergencyWithdraw', token: token.address, amount });
        token.transfer(this.address, this.state.owner, amount);
      })
    );
  }

  /**
   * Sweep the sale's whole native balance to the owner
   */
  emergencyWithdrawETH(caller: Address): bigint {
    this.onlyOwner(caller);

    const balance = this.chain.native.balanceOf(this.address);
    if (balance === 0n) {
      throw new SaleError('NothingToWithdraw', 'No native balance to withdraw');
    }

    return this.guard.run(() =>
      atomically([this, this.chain.native], () => {
        this.emit({ type: 'EmergencyWithdrawETH', amount: balance });
        this.chain.native.transfer(this.address, this.state.owner, balance);
        return balance;
      })
    );
  }

  // ── Views ──

  isSaleActive(): boolean {
    const { config, totalSold } = this.state;
    const now = this.chain.now();
    return now >= config.startTime && now <= config.endTime && totalSold < config.maxSupply;
  }

  /**
   * Explicit allow-list first; the proof is only checked against a set root when one is given
   */
  isWhitelisted(account: Address, proof: Hex[] = []): boolean {
    if (this.state.whitelist.has(account)) {
      return true;
    }
    if (isEmptyRoot(this.state.merkleRoot) || proof.length === 0) {
      return false;
    }
    return verifyProof(proof, this.state.merkleRoot, getLeaf(account));
  }

  /**
   * floor(amount * tokenPrice / 10^decimals)
   */
  calculatePayment(amount: bigint): bigint {
    return (amount * this.state.config.tokenPrice) / 10n ** BigInt(this.token.decimals);
  }

  getPurchase(account: Address): Purchase {
    return { ...(this.state.purchases.get(account) ?? EMPTY_PURCHASE) };
  }

  /**
   * Sale tokens the owner may sweep: the unsold remainder, limited to what the sale
   * holds beyond the unclaimed purchases
   */
  withdrawableSaleTokens(): bigint {
    const { config, totalSold, totalClaimed } = this.state;
    const unsold = config.maxSupply - totalSold;
    const surplus = this.token.balanceOf(this.address) - (totalSold - totalClaimed);
    const available = unsold < surplus ? unsold : surplus;
    return available > 0n ? available : 0n;
  }

  remainingSupply(): bigint {
    return this.state.config.maxSupply - this.state.totalSold;
  }

  get owner(): Address {
    return this.state.owner;
  }

  get treasury(): Address {
    return this.state.treasury;
  }

  get config(): SaleConfig {
    return { ...this.state.config };
  }

  get claimSettings(): ClaimSettings {
    return { ...this.state.claim };
  }

  get merkleRoot(): Hex {
    return this.state.merkleRoot;
  }

  get totalSold(): bigint {
    return this.state.totalSold;
  }

  get totalRaised(): bigint {
    return this.state.totalRaised;
  }

  get totalClaimed(): bigint {
    return this.state.totalClaimed;
  }

  whitelistedAccounts(): Address[] {
    return [...this.state.whitelist];
  }

  purchases(): Array<[Address, Purchase]> {
    return [...this.state.purchases.entries()].map(([account, purchase]) => [account, { ...purchase }]);
  }

  getSaleInfo(): SaleInfo {
    return {
      address: this.address,
      token: this.token.address,
      treasury: this.state.treasury,
      owner: this.state.owner,
      config: this.config,
      totalSold: this.state.totalSold,
      totalRaised: this.state.totalRaised,
      totalClaimed: this.state.totalClaimed,
      participants: this.state.purchases.size,
      remainingSupply: this.remainingSupply(),
      merkleRoot: this.state.merkleRoot,
      claim: this.claimSettings,
      isActive: this.isSaleActive(),
    };
  }

  getEvents(): readonly SaleEvent[] {
    return this.state.events;
  }

  private setWhitelisted(account: Address, status: boolean): void {
    if (account === zeroAddress) {
      throw new SaleError('ZeroAddress', 'Cannot whitelist zero address');
    }
    if (status) {
      this.state.whitelist.add(account);
    } else {
      this.state.whitelist.delete(account);
    }
    this.emit({ type: 'WhitelistUpdated', account, status });
  }

  private onlyOwner(caller: Address): void {
    if (caller !== this.state.owner) {
      throw new SaleError('Unauthorized', `${caller} is not the owner`);
    }
  }

  private emit(event: SaleEvent): void {
    this.state.events.push(event);
  }
}

function cloneState(state: SaleState): SaleState {
  return {
    ...state,
    config: { ...state.config },
    purchases: new Map(state.purchases),
    whitelist: new Set(state.whitelist),
    claim: { ...state.claim },
    events: [...state.events],
  };
}
