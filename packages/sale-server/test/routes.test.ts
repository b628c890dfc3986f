import { beforeEach, describe, expect, it, vi } from 'vitest';
import { getAddress, parseEther, zeroAddress } from 'viem';
import type { Hono } from 'hono';
import type { StorageBackend } from '../src/types';
import { createApp } from '../src/app';
import { buildAllowlist, getLeaf } from '../src/services/merkle';
import { bob, carol, dave, owner, T0, treasury } from './helpers';

const TEN_TOKENS = '10000000000000000000';
const SUPPLY = '1000000000000000000000';
const MISSING_ID = '00000000-0000-4000-8000-000000000000';

const deployBody = {
  deployer: owner,
  treasury,
  token: { name: 'Sale Token', symbol: 'SALE' },
  config: {
    tokenPrice: '1000000000000000',
    minPurchase: TEN_TOKENS,
    maxPurchase: '100000000000000000000',
    maxSupply: SUPPLY,
    startTime: T0,
    endTime: T0 + 86400,
  },
  fundedAccounts: [{ address: bob, balance: parseEther('10').toString() }],
};

function send(app: Hono, method: string, path: string, body?: unknown): Promise<Response> {
  return Promise.resolve(app.request(path, {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  }));
}

describe('API Routes', () => {
  let app: Hono;

  beforeEach(() => {
    app = createApp({ logging: false, clock: () => T0 });
  });

  async function deploy(): Promise<{ id: string; sale: string; token: string }> {
    const res = await send(app, 'POST', '/sales', deployBody);
    expect(res.status).toBe(201);
    return res.json();
  }

  describe('GET /health', () => {
    it('returns health status', async () => {
      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'ok', storage: { name: 'memory', healthy: true } });
    });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await app.request('/nope');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });

  describe('POST /allowlists', () => {
    it('builds a tree with a proof per account', async () => {
      const res = await send(app, 'POST', '/allowlists', { addresses: [carol, dave.toLowerCase()] });

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({ ...buildAllowlist([carol, dave]), count: 2 });
    });

    it('rejects duplicates', async () => {
      const res = await send(app, 'POST', '/allowlists', { addresses: [bob, bob.toLowerCase()] });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: `Duplicate address found: ${bob}` });
    });

    it('rejects an empty list', async () => {
      const res = await send(app, 'POST', '/allowlists', { addresses: [] });

      expect(res.status).toBe(400);
      expect((await res.json()).error).toBe('Validation failed');
    });
  });

  describe('POST /allowlists/verify', () => {
    const tree = buildAllowlist([carol, dave]);
    const [entry] = tree.entries;

    it('accepts a valid proof', async () => {
      const res = await send(app, 'POST', '/allowlists/verify', {
        root: tree.root,
        account: entry.account,
        proof: entry.proof,
      });

      expect(await res.json()).toEqual({ valid: true, leaf: entry.leaf });
    });

    it('rejects the proof for another account', async () => {
      const res = await send(app, 'POST', '/allowlists/verify', { root: tree.root, account: bob, proof: entry.proof });

      expect(await res.json()).toEqual({ valid: false, leaf: getLeaf(bob) });
    });
  });

  describe('POST /sales', () => {
    it('deploys token and sale and returns the deployment events', async () => {
      const res = await send(app, 'POST', '/sales', deployBody);
      const body = await res.json();

      expect(res.status).toBe(201);
      expect(body.deployer).toBe(owner);
      expect(body.events).toEqual([
        { contract: body.token, type: 'Transfer', args: { from: zeroAddress, to: body.sale, amount: SUPPLY } },
        { contract: body.token, type: 'Mint', args: { to: body.sale, amount: SUPPLY } },
      ]);
    });

    it('rejects invalid input', async () => {
      const res = await send(app, 'POST', '/sales', { ...deployBody, deployer: 'not-an-address' });

      expect(res.status).toBe(400);
      expect((await res.json()).error).toBe('Validation failed');
    });

    it('maps invalid sale parameters to 422', async () => {
      const res = await send(app, 'POST', '/sales', {
        ...deployBody,
        config: { ...deployBody.config, endTime: T0 },
      });

      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({ error: 'InvalidWindow', message: 'endTime must be after startTime' });
    });

    it('lists deployments', async () => {
      const { id } = await deploy();

      const res = await app.request('/sales');
      const list = await res.json();

      expect(list).toHaveLength(1);
      expect(list[0]).toMatchObject({ id, totalSold: '0', maxSupply: SUPPLY });
    });
  });

  describe('sale lifecycle', () => {
    let id: string;

    beforeEach(async () => {
      ({ id } = await deploy());
    });

    it('rejects buyers that are not whitelisted', async () => {
      const res = await send(app, 'POST', `/sales/${id}/buy`, { from: bob, amount: TEN_TOKENS, value: '10000000000000000' });

      expect(res.status).toBe(422);
      expect((await res.json()).error).toBe('NotWhitelisted');
    });

    it('restricts admin calls to the owner', async () => {
      const res = await send(app, 'POST', `/sales/${id}/whitelist`, { from: bob, account: bob, status: true });

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({ error: 'Unauthorized', message: `${bob} is not the owner` });
    });

    it('runs a purchase and claim end to end', async () => {
      const whitelisted = await send(app, 'POST', `/sales/${id}/whitelist`, { from: owner, account: bob, status: true });
      const whitelistBody = await whitelisted.json();
      expect(whitelistBody.result).toEqual({ account: bob, whitelisted: true });
      expect(whitelistBody.events).toHaveLength(1);
      expect(whitelistBody.events[0]).toMatchObject({ type: 'WhitelistUpdated', args: { account: bob, status: true } });

      const bought = await send(app, 'POST', `/sales/${id}/buy`, {
        from: bob,
        amount: TEN_TOKENS,
        value: '10000000000000000',
      });
      expect(bought.status).toBe(200);
      expect((await bought.json()).result).toEqual({
        buyer: bob,
        amount: TEN_TOKENS,
        cost: '10000000000000000',
        refund: '0',
        timestamp: T0,
      });

      const account = await app.request(`/sales/${id}/accounts/${bob}`);
      expect(await account.json()).toEqual({
        address: bob,
        nativeBalance: '9990000000000000000',
        tokenBalance: '0',
        purchase: { amount: TEN_TOKENS, paidAmount: '10000000000000000', timestamp: T0, claimed: false },
        whitelisted: true,
      });

      const settings = await send(app, 'POST', `/sales/${id}/claim-settings`, {
        from: owner,
        enabled: true,
        claimStartTime: T0 + 100,
      });
      expect((await settings.json()).result).toEqual({ claimEnabled: true, claimStartTime: T0 + 100 });

      const early = await send(app, 'POST', `/sales/${id}/claim`, { from: bob });
      expect(early.status).toBe(422);
      expect((await early.json()).error).toBe('ClaimingNotStarted');

      const time = await send(app, 'POST', `/sales/${id}/time`, { seconds: 100 });
      expect((await time.json()).result).toEqual({ now: T0 + 100 });

      const claimed = await send(app, 'POST', `/sales/${id}/claim`, { from: bob });
      const claimBody = await claimed.json();
      expect(claimBody.result).toEqual({ amount: TEN_TOKENS });
      expect(claimBody.events.map((event: { type: string }) => event.type)).toEqual(['Transfer', 'TokensClaimed']);

      const info = await app.request(`/sales/${id}`);
      const infoBody = await info.json();
      expect(infoBody.now).toBe(T0 + 100);
      expect(infoBody.sale).toMatchObject({
        totalSold: TEN_TOKENS,
        totalRaised: '10000000000000000',
        totalClaimed: TEN_TOKENS,
        participants: 1,
        isActive: true,
      });
      expect(infoBody.token.saleBalance).toBe('990000000000000000000');
      expect(infoBody.display).toEqual({ tokenPrice: '0.001', totalSold: '10', totalRaised: '0.01' });
    });

    it('accepts merkle proofs from a published allow-list', async () => {
      const tree = await (await send(app, 'POST', '/allowlists', { addresses: [carol, dave] })).json();
      await send(app, 'PUT', `/sales/${id}/merkle-root`, { from: owner, root: tree.root });
      await send(app, 'POST', `/sales/${id}/fund`, { address: dave, balance: parseEther('1').toString() });

      const entry = tree.entries.find((candidate: { account: string }) => candidate.account === dave);
      const res = await send(app, 'POST', `/sales/${id}/buy`, {
        from: dave,
        amount: TEN_TOKENS,
        value: '10000000000000000',
        proof: entry.proof,
      });

      expect(res.status).toBe(200);
    });

    it('serializes concurrent calls against one deployment', async () => {
      await send(app, 'POST', `/sales/${id}/whitelist/batch`, { from: owner, accounts: [bob, carol], status: true });
      await send(app, 'POST', `/sales/${id}/fund`, { address: carol, balance: parseEther('1').toString() });

      const results = await Promise.all([bob, carol].map((from) =>
        send(app, 'POST', `/sales/${id}/buy`, { from, amount: TEN_TOKENS, value: '10000000000000000' })
      ));

      expect(results.map((res) => res.status)).toEqual([200, 200]);
      const info = await (await app.request(`/sales/${id}`)).json();
      expect(info.sale.totalSold).toBe('20000000000000000000');
      expect(info.sale.participants).toBe(2);
    });

    it('keeps state unchanged after a revert', async () => {
      await send(app, 'POST', `/sales/${id}/whitelist`, { from: owner, account: bob, status: true });
      await send(app, 'POST', `/sales/${id}/buy`, { from: bob, amount: TEN_TOKENS, value: '1' });

      const account = await (await app.request(`/sales/${id}/accounts/${bob}`)).json();
      expect(account.nativeBalance).toBe('10000000000000000000');
      expect(account.purchase.amount).toBe('0');
    });

    it('accepts amounts with leading zeros', async () => {
      await send(app, 'POST', `/sales/${id}/whitelist`, { from: owner, account: bob, status: true });

      const res = await send(app, 'POST', `/sales/${id}/buy`, {
        from: bob,
        amount: `00${TEN_TOKENS}`,
        value: '0010000000000000000',
      });

      expect(res.status).toBe(200);
      expect((await res.json()).result).toMatchObject({ amount: TEN_TOKENS, cost: '10000000000000000' });
    });

    it('updates the sale config', async () => {
      const res = await send(app, 'PUT', `/sales/${id}/config`, {
        from: owner,
        config: { ...deployBody.config, maxPurchase: '50000000000000000000', whitelistRequired: false },
      });

      expect(res.status).toBe(200);
      expect((await res.json()).result).toMatchObject({ maxPurchase: '50000000000000000000', whitelistRequired: false });
    });

    it('sweeps unsold tokens to the owner', async () => {
      const res = await send(app, 'POST', `/sales/${id}/emergency-withdraw`, { from: owner, amount: SUPPLY });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.result).toEqual({ token: expect.any(String), amount: SUPPLY });

      const account = await (await app.request(`/sales/${id}/accounts/${owner}`)).json();
      expect(account.tokenBalance).toBe(SUPPLY);
    });

    it('reports an empty native sweep', async () => {
      const res = await send(app, 'POST', `/sales/${id}/emergency-withdraw-eth`, { from: owner });

      expect(res.status).toBe(422);
      expect((await res.json()).error).toBe('NothingToWithdraw');
    });

    it('transfers ownership', async () => {
      const res = await send(app, 'POST', `/sales/${id}/transfer-ownership`, { from: owner, newOwner: carol });
      expect((await res.json()).result).toEqual({ owner: carol });

      const denied = await send(app, 'POST', `/sales/${id}/whitelist`, { from: owner, account: bob, status: true });
      expect(denied.status).toBe(403);
    });

    it('keeps the event log', async () => {
      await send(app, 'POST', `/sales/${id}/whitelist`, { from: owner, account: bob, status: true });

      const events = await (await app.request(`/sales/${id}/events`)).json();
      expect(events.map((event: { type: string }) => event.type)).toEqual(['Transfer', 'Mint', 'WhitelistUpdated']);
    });

    it('validates request bodies', async () => {
      const res = await send(app, 'POST', `/sales/${id}/buy`, { from: bob, amount: 'abc', value: '0' });
      expect(res.status).toBe(400);

      const malformed = await app.request(`/sales/${id}/buy`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{not json',
      });
      expect(malformed.status).toBe(400);
      expect((await malformed.json()).error).toBe('Validation failed');
    });

    it('deletes a deployment', async () => {
      const res = await send(app, 'DELETE', `/sales/${id}`);
      expect(await res.json()).toEqual({ success: true });

      expect((await app.request(`/sales/${id}`)).status).toBe(404);
      expect((await send(app, 'DELETE', `/sales/${id}`)).status).toBe(404);
    });
  });

  describe('unknown deployments', () => {
    it('returns 404', async () => {
      const res = await app.request(`/sales/${MISSING_ID}`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Deployment not found' });

      const buy = await send(app, 'POST', `/sales/${MISSING_ID}/buy`, { from: bob, amount: '1', value: '0' });
      expect(buy.status).toBe(404);
    });
  });

  describe('storage failures', () => {
    it('returns 500', async () => {
      const failing: StorageBackend = {
        name: 'failing',
        save: async () => {},
        get: async () => {
          throw new Error('disk on fire');
        },
        delete: async () => false,
        list: async () => [],
        health: async () => ({ healthy: false, error: 'disk on fire' }),
      };
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const failingApp = createApp({ logging: false, storage: failing });

      const res = await failingApp.request(`/sales/${MISSING_ID}`);

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: 'Internal server error' });
      expect((await (await failingApp.request('/health')).json()).status).toBe('degraded');
      errorSpy.mockRestore();
    });
  });

  it('checksums addresses in path parameters', async () => {
    const { id } = await deploy();

    const res = await app.request(`/sales/${id}/accounts/${bob.toLowerCase()}`);
    expect((await res.json()).address).toBe(getAddress(bob));
  });
});
