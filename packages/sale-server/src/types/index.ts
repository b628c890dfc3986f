import type { Address, Hex } from 'viem';

/**
 * Sale parameters (replaced wholesale by the owner)
 */
export interface SaleConfig {
  tokenPrice: bigint; // payment wei per whole token (scaled by token decimals)
  minPurchase: bigint;
  maxPurchase: bigint; // per call and cumulative per address
  maxSupply: bigint;
  startTime: number; // Unix timestamp, inclusive
  endTime: number; // Unix timestamp, inclusive
  whitelistRequired: boolean;
}

/**
 * Per-participant purchase record
 */
export interface Purchase {
  amount: bigint;
  paidAmount: bigint;
  timestamp: number;
  claimed: boolean;
}

export interface ClaimSettings {
  claimEnabled: boolean;
  claimStartTime: number;
}

/**
 * Complete mutable state of a sale
 */
export interface SaleState {
  owner: Address;
  treasury: Address;
  config: SaleConfig;
  purchases: Map<Address, Purchase>;
  totalSold: bigint;
  totalRaised: bigint;
  totalClaimed: bigint;
  whitelist: Set<Address>;
  merkleRoot: Hex;
  claim: ClaimSettings;
  events: SaleEvent[];
}

/**
 * Result of a successful buy
 */
export interface PurchaseReceipt {
  buyer: Address;
  amount: bigint;
  cost: bigint;
  refund: bigint;
  timestamp: number;
}

/**
 * Read-only view of a sale (check-sale style)
 */
export interface SaleInfo {
  address: Address;
  token: Address;
  treasury: Address;
  owner: Address;
  config: SaleConfig;
  totalSold: bigint;
  totalRaised: bigint;
  totalClaimed: bigint;
  participants: number;
  remainingSupply: bigint;
  merkleRoot: Hex;
  claim: ClaimSettings;
  isActive: boolean;
}

export type SaleEvent =
  | { type: 'TokensPurchased'; buyer: Address; amount: bigint; cost: bigint; timestamp: number }
  | { type: 'TokensClaimed'; buyer: Address; amount: bigint }
  | { type: 'SaleConfigUpdated'; config: SaleConfig }
  | { type: 'ClaimSettingsUpdated'; enabled: boolean; claimStartTime: number }
  | { type: 'WhitelistUpdated'; account: Address; status: boolean }
  | { type: 'MerkleRootUpdated'; root: Hex }
  | { type: 'EmergencyWithdraw'; token: Address; amount: bigint }
  | { type: 'EmergencyWithdrawETH'; amount: bigint }
  | { type: 'OwnershipTransferred'; previousOwner: Address; newOwner: Address };

export type TokenEvent =
  | { type: 'Transfer'; from: Address; to: Address; amount: bigint }
  | { type: 'Mint'; to: Address; amount: bigint }
  | { type: 'Paused'; account: Address }
  | { type: 'Unpaused'; account: Address };

/**
 * Token state
 */
export interface TokenState {
  owner: Address;
  paused: boolean;
  totalSupply: bigint;
  balances: Map<Address, bigint>;
  events: TokenEvent[];
}

export interface TokenMetadata {
  name: string;
  symbol: string;
  decimals: number;
  maxSupply: bigint;
}

/**
 * Allow-list entry with pre-computed leaf and proof
 */
export interface AllowlistEntry {
  account: Address;
  leaf: Hex;
  proof: Hex[];
}

export interface AllowlistTree {
  root: Hex;
  entries: AllowlistEntry[];
}

/**
 * JSON-safe snapshot of a devnet (amounts as decimal strings)
 */
export interface DevnetSnapshot {
  version: '1.0';
  timeOffset: number;
  nonces: Record<string, number>;
  nativeBalances: Record<string, string>;
  tokens: TokenSnapshot[];
  sales: SaleSnapshot[];
}

export interface TokenSnapshot {
  address: Address;
  name: string;
  symbol: string;
  decimals: number;
  maxSupply: string;
  owner: Address;
  paused: boolean;
  totalSupply: string;
  balances: Record<string, string>;
}

export interface SaleConfigSnapshot {
  tokenPrice: string;
  minPurchase: string;
  maxPurchase: string;
  maxSupply: string;
  startTime: number;
  endTime: number;
  whitelistRequired: boolean;
}

export interface SaleSnapshot {
  address: Address;
  token: Address;
  owner: Address;
  treasury: Address;
  config: SaleConfigSnapshot;
  purchases: Array<{
    account: Address;
    amount: string;
    paidAmount: string;
    timestamp: number;
    claimed: boolean;
  }>;
  totalSold: string;
  totalRaised: string;
  totalClaimed: string;
  whitelist: Address[];
  merkleRoot: Hex;
  claim: ClaimSettings;
}

/**
 * Stored deployment: one devnet holding a token and its sale
 */
export interface Deployment {
  id: string;
  createdAt: string;
  deployer: Address;
  sale: Address;
  token: Address;
  network: DevnetSnapshot;
  events: LoggedEvent[];
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Event as persisted with a deployment (bigints as decimal strings)
 */
export interface LoggedEvent {
  contract: Address;
  type: string;
  args: { [key: string]: JsonValue };
}

/**
 * Summary of a deployment (for listing)
 */
export interface DeploymentSummary {
  id: string;
  createdAt: string;
  sale: Address;
  token: Address;
  totalSold: string;
  maxSupply: string;
}

/**
 * Storage backend interface for deployments
 */
export interface StorageBackend {
  readonly name: string;
  save(deployment: Deployment): Promise<void>;
  get(id: string): Promise<Deployment | null>;
  delete(id: string): Promise<boolean>;
  list(): Promise<DeploymentSummary[]>;
  health(): Promise<{ healthy: boolean; error?: string }>;
}
