import { v4 as uuidv4 } from 'uuid';
import type { Address } from 'viem';
import type { Deployment, DeploymentSummary, LoggedEvent, StorageBackend } from '../types';
import { Devnet, systemClock, type Clock, type WhitelistSaleDeployment } from './chain';
import type { FungibleToken } from './ledger';
import type { SaleEngine } from './sale';
import { exportDevnet, importDevnet, toLoggedEvent } from './snapshot';

/**
 * Live view of a stored deployment while a call runs against it
 */
export interface DeploymentContext {
  devnet: Devnet;
  sale: SaleEngine;
  token: FungibleToken;
}

export interface CreateDeploymentInput extends WhitelistSaleDeployment {
  fundedAccounts?: Array<{ address: Address; balance: bigint }>;
}

/**
 * Loads deployments from storage, runs calls against them and persists the result.
 * Calls against the same deployment run one at a time.
 */
export class DeploymentService {
  private locks = new Map<string, Promise<void>>();

  constructor(
    readonly storage: StorageBackend,
    private readonly clock: Clock = systemClock
  ) {}

  async create(input: CreateDeploymentInput): Promise<Deployment> {
    const devnet = new Devnet(this.clock);
    for (const account of input.fundedAccounts ?? []) {
      devnet.native.setBalance(account.address, account.balance);
    }

    const { sale, token } = devnet.deployWhitelistSale(input);

    const deployment: Deployment = {
      id: uuidv4(),
      createdAt: new Date().toISOString(),
      deployer: input.deployer,
      sale: sale.address,
      token: token.address,
      network: exportDevnet(devnet),
      events: collectEvents(devnet),
    };

    await this.storage.save(deployment);
    return deployment;
  }

  async get(id: string): Promise<Deployment | null> {
    return this.storage.get(id);
  }

  async list(): Promise<DeploymentSummary[]> {
    return this.storage.list();
  }

  async delete(id: string): Promise<boolean> {
    return this.withLock(id, () => this.storage.delete(id));
  }

  /**
   * Run a read-only function against a deployment. Nothing is saved.
   * @returns null when the deployment does not exist
   */
  async view<T>(id: string, fn: (context: DeploymentContext) => T): Promise<{ result: T } | null> {
    const deployment = await this.storage.get(id);
    if (!deployment) {
      return null;
    }

    return { result: fn(this.load(deployment)) };
  }

  /**
   * Run a state-changing function against a deployment and persist the new state
   * together with the events it emitted. A throwing function saves nothing.
   * @returns null when the deployment does not exist
   */
  async execute<T>(
    id: string,
    fn: (context: DeploymentContext) => T
  ): Promise<{ result: T; events: LoggedEvent[] } | null> {
    return this.withLock(id, async () => {
      const deployment = await this.storage.get(id);
      if (!deployment) {
        return null;
      }

      const context = this.load(deployment);
      const result = fn(context);
      const events = collectEvents(context.devnet);

      await this.storage.save({
        ...deployment,
        network: exportDevnet(context.devnet),
        events: [...deployment.events, ...events],
      });

      return { result, events };
    });
  }

  private load(deployment: Deployment): DeploymentContext {
    const devnet = importDevnet(deployment.network, this.clock);
    const sale = devnet.getSale(deployment.sale);
    const token = devnet.getToken(deployment.token);
    if (!sale || !token) {
      throw new Error(`Deployment ${deployment.id} is missing its sale or token`);
    }
    return { devnet, sale, token };
  }

  private async withLock<T>(id: string, fn: () => Promise<T>): Promise<T> {
    // Wait for any existing lock to be released
    while (this.locks.has(id)) {
      await this.locks.get(id);
    }

    let release: () => void = () => {};
    const lock = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.locks.set(id, lock);

    try {
      return await fn();
    } finally {
      this.locks.delete(id);
      release();
    }
  }
}

/**
 * Events emitted by every contract since the devnet was loaded
 */
function collectEvents(devnet: Devnet): LoggedEvent[] {
  return [
    ...devnet.listTokens().flatMap((token) => token.getEvents().map((event) => toLoggedEvent(token.address, event))),
    ...devnet.listSales().flatMap((sale) => sale.getEvents().map((event) => toLoggedEvent(sale.address, event))),
  ];
}
