import { getContractAddress, type Address } from 'viem';
import type { SaleConfig, TokenMetadata } from '../types';
import { SaleError } from './errors';
import { FungibleToken, NativeLedger } from './ledger';
import { SaleEngine, type ChainContext } from './sale';

export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Arguments of a full token + sale deployment
 */
export interface WhitelistSaleDeployment {
  deployer: Address;
  treasury?: Address;
  token: Pick<TokenMetadata, 'name' | 'symbol'> & Partial<TokenMetadata>;
  config: SaleConfig;
  /** Mint `config.maxSupply` to the sale (default true) */
  fundSale?: boolean;
  /** Enable claiming from `config.startTime` right away */
  enableClaim?: boolean;
}

/**
 * In-memory chain: clock with time travel, native balances and deployed contracts
 */
export class Devnet implements ChainContext {
  readonly native: NativeLedger;
  private readonly tokens = new Map<Address, FungibleToken>();
  private readonly sales = new Map<Address, SaleEngine>();
  private readonly nonces = new Map<Address, number>();
  private timeOffset: number;

  constructor(
    private readonly clock: Clock = systemClock,
    options: { timeOffset?: number; native?: NativeLedger; nonces?: Iterable<[Address, number]> } = {}
  ) {
    this.timeOffset = options.timeOffset ?? 0;
    this.native = options.native ?? new NativeLedger();
    for (const [account, nonce] of options.nonces ?? []) {
      this.nonces.set(account, nonce);
    }
  }

  now(): number {
    return this.clock() + this.timeOffset;
  }

  get offset(): number {
    return this.timeOffset;
  }

  increaseTime(seconds: number): number {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new Error('Time can only move forward by a whole number of seconds');
    }
    this.timeOffset += seconds;
    return this.now();
  }

  nonceOf(account: Address): number {
    return this.nonces.get(account) ?? 0;
  }

  nonceEntries(): Array<[Address, number]> {
    return [...this.nonces.entries()];
  }

  getToken(address: Address): FungibleToken | undefined {
    return this.tokens.get(address);
  }

  getSale(address: Address): SaleEngine | undefined {
    return this.sales.get(address);
  }

  listTokens(): FungibleToken[] {
    return [...this.tokens.values()];
  }

  listSales(): SaleEngine[] {
    return [...this.sales.values()];
  }

  /**
   * Address the next contract created by `deployer` will get
   */
  nextAddress(deployer: Address): Address {
    return getContractAddress({ from: deployer, nonce: BigInt(this.nonceOf(deployer)) });
  }

  deployToken(deployer: Address, metadata: WhitelistSaleDeployment['token']): FungibleToken {
    const token = new FungibleToken(this.nextAddress(deployer), metadata, deployer);
    this.bumpNonce(deployer);
    this.tokens.set(token.address, token);
    return token;
  }

  deploySale(
    deployer: Address,
    params: { token: Address; treasury: Address; owner?: Address; config: SaleConfig }
  ): SaleEngine {
    const token = this.tokens.get(params.token);
    if (!token) {
      throw new SaleError('UnknownToken', `No token deployed at ${params.token}`);
    }

    const sale = new SaleEngine(this, {
      address: this.nextAddress(deployer),
      token,
      treasury: params.treasury,
      owner: params.owner ?? deployer,
      config: params.config,
    });
    this.bumpNonce(deployer);
    this.sales.set(sale.address, sale);
    return sale;
  }

  /**
   * Deploy token and sale, mint the sale supply and optionally open claiming
   */
  deployWhitelistSale(args: WhitelistSaleDeployment): { token: FungibleToken; sale: SaleEngine } {
    const token = this.deployToken(args.deployer, args.token);
    const sale = this.deploySale(args.deployer, {
      token: token.address,
      treasury: args.treasury ?? args.deployer,
      config: args.config,
    });

    if (args.fundSale ?? true) {
      token.mint(args.deployer, sale.address, args.config.maxSupply);
    }
    if (args.enableClaim) {
      sale.setClaimEnabled(args.deployer, true, args.config.startTime);
    }

    return { token, sale };
  }

  /**
   * Register contracts rebuilt from a snapshot
   */
  attach(contract: FungibleToken | SaleEngine): void {
    if (contract instanceof FungibleToken) {
      this.tokens.set(contract.address, contract);
    } else {
      this.sales.set(contract.address, contract);
    }
  }

  private bumpNonce(account: Address): void {
    this.nonces.set(account, this.nonceOf(account) + 1);
  }
}
