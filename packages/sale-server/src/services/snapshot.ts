import { z } from 'zod';
import { getAddress, type Address, type Hex } from 'viem';
import type {
  DevnetSnapshot,
  JsonValue,
  LoggedEvent,
  Purchase,
  SaleConfig,
  SaleConfigSnapshot,
  SaleEvent,
  TokenEvent,
} from '../types';
import { Devnet, systemClock, type Clock } from './chain';
import { FungibleToken, NativeLedger } from './ledger';
import { SaleEngine } from './sale';

// Validation schemas for snapshot deserialization
const bytes32Schema = z.string().refine((value): value is Hex => /^0x[a-fA-F0-9]{64}$/.test(value), 'Invalid bytes32');
const addressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, 'Invalid address')
  .transform((value): Address => getAddress(value));
const uintStringSchema = z.string().regex(/^\d+$/, 'Invalid uint256 string');
const balancesSchema = z.record(z.string().regex(/^0x[a-fA-F0-9]{40}$/, 'Invalid address'), uintStringSchema);

const saleConfigSchema = z.object({
  tokenPrice: uintStringSchema,
  minPurchase: uintStringSchema,
  maxPurchase: uintStringSchema,
  maxSupply: uintStringSchema,
  startTime: z.number().int().nonnegative(),
  endTime: z.number().int().nonnegative(),
  whitelistRequired: z.boolean(),
});

const devnetSnapshotSchema = z.object({
  version: z.literal('1.0'),
  timeOffset: z.number().int().nonnegative(),
  nonces: z.record(z.string().regex(/^0x[a-fA-F0-9]{40}$/, 'Invalid address'), z.number().int().nonnegative()),
  nativeBalances: balancesSchema,
  tokens: z.array(z.object({
    address: addressSchema,
    name: z.string(),
    symbol: z.string(),
    decimals: z.number().int().min(0).max(77),
    maxSupply: uintStringSchema,
    owner: addressSchema,
    paused: z.boolean(),
    totalSupply: uintStringSchema,
    balances: balancesSchema,
  })),
  sales: z.array(z.object({
    address: addressSchema,
    token: addressSchema,
    owner: addressSchema,
    treasury: addressSchema,
    config: saleConfigSchema,
    purchases: z.array(z.object({
      account: addressSchema,
      amount: uintStringSchema,
      paidAmount: uintStringSchema,
      timestamp: z.number().int().nonnegative(),
      claimed: z.boolean(),
    })),
    totalSold: uintStringSchema,
    totalRaised: uintStringSchema,
    totalClaimed: uintStringSchema,
    whitelist: z.array(addressSchema),
    merkleRoot: bytes32Schema,
    claim: z.object({
      claimEnabled: z.boolean(),
      claimStartTime: z.number().int().nonnegative(),
    }),
  })),
});

export function serializeSaleConfig(config: SaleConfig): SaleConfigSnapshot {
  return {
    tokenPrice: config.tokenPrice.toString(),
    minPurchase: config.minPurchase.toString(),
    maxPurchase: config.maxPurchase.toString(),
    maxSupply: config.maxSupply.toString(),
    startTime: config.startTime,
    endTime: config.endTime,
    whitelistRequired: config.whitelistRequired,
  };
}

export function deserializeSaleConfig(config: SaleConfigSnapshot): SaleConfig {
  return {
    tokenPrice: BigInt(config.tokenPrice),
    minPurchase: BigInt(config.minPurchase),
    maxPurchase: BigInt(config.maxPurchase),
    maxSupply: BigInt(config.maxSupply),
    startTime: config.startTime,
    endTime: config.endTime,
    whitelistRequired: config.whitelistRequired,
  };
}

/**
 * Capture a devnet as plain JSON data
 */
export function exportDevnet(devnet: Devnet): DevnetSnapshot {
  return {
    version: '1.0',
    timeOffset: devnet.offset,
    nonces: Object.fromEntries(devnet.nonceEntries()),
    nativeBalances: stringifyBalances(devnet.native.entries()),
    tokens: devnet.listTokens().map((token) => ({
      address: token.address,
      name: token.name,
      symbol: token.symbol,
      decimals: token.decimals,
      maxSupply: token.maxSupply.toString(),
      owner: token.owner,
      paused: token.paused,
      totalSupply: token.totalSupply.toString(),
      balances: stringifyBalances(token.balances()),
    })),
    sales: devnet.listSales().map((sale) => ({
      address: sale.address,
      token: sale.token.address,
      owner: sale.owner,
      treasury: sale.treasury,
      config: serializeSaleConfig(sale.config),
      purchases: sale.purchases().map(([account, purchase]) => ({
        account,
        amount: purchase.amount.toString(),
        paidAmount: purchase.paidAmount.toString(),
        timestamp: purchase.timestamp,
        claimed: purchase.claimed,
      })),
      totalSold: sale.totalSold.toString(),
      totalRaised: sale.totalRaised.toString(),
      totalClaimed: sale.totalClaimed.toString(),
      whitelist: sale.whitelistedAccounts(),
      merkleRoot: sale.merkleRoot,
      claim: sale.claimSettings,
    })),
  };
}

/**
 * Rebuild a devnet from snapshot data
 * @throws Error if the data does not match the snapshot schema
 */
export function importDevnet(data: unknown, clock: Clock = systemClock): Devnet {
  const result = devnetSnapshotSchema.safeParse(data);
  if (!result.success) {
    throw new Error(`Invalid devnet snapshot: ${result.error.message}`);
  }
  const snapshot = result.data;

  const devnet = new Devnet(clock, {
    timeOffset: snapshot.timeOffset,
    native: new NativeLedger(parseBalances(snapshot.nativeBalances)),
    nonces: Object.entries(snapshot.nonces).map(([account, nonce]): [Address, number] => [getAddress(account), nonce]),
  });

  for (const token of snapshot.tokens) {
    devnet.attach(new FungibleToken(
      token.address,
      {
        name: token.name,
        symbol: token.symbol,
        decimals: token.decimals,
        maxSupply: BigInt(token.maxSupply),
      },
      token.owner,
      {
        paused: token.paused,
        totalSupply: BigInt(token.totalSupply),
        balances: new Map(parseBalances(token.balances)),
      }
    ));
  }

  for (const sale of snapshot.sales) {
    const token = devnet.getToken(sale.token);
    if (!token) {
      throw new Error(`Invalid devnet snapshot: sale ${sale.address} references unknown token ${sale.token}`);
    }

    devnet.attach(new SaleEngine(
      devnet,
      {
        address: sale.address,
        token,
        owner: sale.owner,
        treasury: sale.treasury,
        config: deserializeSaleConfig(sale.config),
      },
      {
        purchases: new Map(sale.purchases.map((purchase): [Address, Purchase] => [
          purchase.account,
          {
            amount: BigInt(purchase.amount),
            paidAmount: BigInt(purchase.paidAmount),
            timestamp: purchase.timestamp,
            claimed: purchase.claimed,
          },
        ])),
        totalSold: BigInt(sale.totalSold),
        totalRaised: BigInt(sale.totalRaised),
        totalClaimed: BigInt(sale.totalClaimed),
        whitelist: new Set(sale.whitelist),
        merkleRoot: sale.merkleRoot,
        claim: sale.claim,
      }
    ));
  }

  return devnet;
}

/**
 * Convert a contract event to its stored JSON form
 */
export function toLoggedEvent(contract: Address, event: SaleEvent | TokenEvent): LoggedEvent {
  const { type, ...args } = event;
  return { contract, type, args: toJsonObject(args) };
}

/**
 * Recursively replace bigints with decimal strings
 */
export function toJsonValue(value: unknown): JsonValue {
  if (typeof value === 'bigint') return value.toString();
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === 'object') return toJsonObject(value);
  return String(value);
}

function toJsonObject(value: object): { [key: string]: JsonValue } {
  return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, toJsonValue(entry)]));
}

function stringifyBalances(entries: Array<[Address, bigint]>): Record<string, string> {
  return Object.fromEntries(entries.map(([account, balance]) => [account, balance.toString()]));
}

function parseBalances(balances: Record<string, string>): Array<[Address, bigint]> {
  return Object.entries(balances).map(([account, balance]) => [getAddress(account), BigInt(balance)]);
}
