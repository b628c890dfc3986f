import { Hono, type Context } from 'hono';
import { z } from 'zod';
import { formatUnits, getAddress, type Address, type Hex } from 'viem';
import { parseAmount } from '../services/canonicalize';
import type { DeploymentService } from '../services/deployments';
import { deserializeSaleConfig, toJsonValue } from '../services/snapshot';

const MAX_UINT256_DIGITS = 78; // 2^256-1 has 78 digits
const MAX_FUNDED_ACCOUNTS = 100;

// Validation schemas
const addressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, 'Invalid address')
  .transform((value): Address => getAddress(value));
const bytes32Schema = z.string().refine((value): value is Hex => /^0x[a-fA-F0-9]{64}$/.test(value), 'Invalid bytes32');
const uint256Schema = z.string()
  .regex(/^\d+$/, 'Invalid uint256 string')
  .max(MAX_UINT256_DIGITS, `Amount exceeds max ${MAX_UINT256_DIGITS} digits`)
  .transform(parseAmount);
const timestampSchema = z.number().int().nonnegative();

const saleConfigSchema = z.object({
  tokenPrice: z.string().regex(/^\d+$/, 'Invalid uint256 string').max(MAX_UINT256_DIGITS),
  minPurchase: z.string().regex(/^\d+$/, 'Invalid uint256 string').max(MAX_UINT256_DIGITS),
  maxPurchase: z.string().regex(/^\d+$/, 'Invalid uint256 string').max(MAX_UINT256_DIGITS),
  maxSupply: z.string().regex(/^\d+$/, 'Invalid uint256 string').max(MAX_UINT256_DIGITS),
  startTime: timestampSchema,
  endTime: timestampSchema,
  whitelistRequired: z.boolean().default(true),
}).transform(deserializeSaleConfig);

const createSaleRequestSchema = z.object({
  deployer: addressSchema,
  treasury: addressSchema.optional(),
  token: z.object({
    name: z.string().min(1),
    symbol: z.string().min(1).max(11),
  }),
  config: saleConfigSchema,
  fundSale: z.boolean().optional(),
  enableClaim: z.boolean().optional(),
  fundedAccounts: z.array(z.object({
    address: addressSchema,
    balance: uint256Schema,
  })).max(MAX_FUNDED_ACCOUNTS).optional(),
});

const callerSchema = z.object({ from: addressSchema });

const buyRequestSchema = callerSchema.extend({
  amount: uint256Schema,
  value: uint256Schema,
  proof: z.array(bytes32Schema).optional(),
});

const updateConfigRequestSchema = callerSchema.extend({ config: saleConfigSchema });

const claimSettingsRequestSchema = callerSchema.extend({
  enabled: z.boolean(),
  claimStartTime: timestampSchema.default(0),
});

const whitelistRequestSchema = callerSchema.extend({
  account: addressSchema,
  status: z.boolean(),
});

// Batch size is enforced by the sale itself
const whitelistBatchRequestSchema = callerSchema.extend({
  accounts: z.array(addressSchema),
  status: z.boolean(),
});

const merkleRootRequestSchema = callerSchema.extend({ root: bytes32Schema });

const transferOwnershipRequestSchema = callerSchema.extend({ newOwner: addressSchema });

const emergencyWithdrawRequestSchema = callerSchema.extend({
  token: addressSchema.optional(),
  amount: uint256Schema,
});

const fundRequestSchema = z.object({
  address: addressSchema,
  balance: uint256Schema,
});

const timeRequestSchema = z.object({
  seconds: z.number().int().nonnegative(),
});

async function readBody(c: Context): Promise<unknown> {
  // Malformed JSON is reported as a validation failure
  return c.req.json().catch(() => null);
}

function validationFailed(c: Context, error: z.ZodError) {
  return c.json({ error: 'Validation failed', details: error.issues }, 400);
}

function deploymentNotFound(c: Context) {
  return c.json({ error: 'Deployment not found' }, 404);
}

export function createSalesRoutes(deployments: DeploymentService): Hono {
  const sales = new Hono();

  /**
   * GET /sales - List all deployments
   */
  sales.get('/', async (c) => {
    return c.json(await deployments.list());
  });

  /**
   * POST /sales - Deploy a token and its sale
   */
  sales.post('/', async (c) => {
    const result = createSaleRequestSchema.safeParse(await readBody(c));
    if (!result.success) {
      return validationFailed(c, result.error);
    }

    const deployment = await deployments.create(result.data);
    return c.json({
      id: deployment.id,
      createdAt: deployment.createdAt,
      deployer: deployment.deployer,
      sale: deployment.sale,
      token: deployment.token,
      events: deployment.events,
    }, 201);
  });

  /**
   * GET /sales/:id - Sale and token information
   */
  sales.get('/:id', async (c) => {
    const outcome = await deployments.view(c.req.param('id'), ({ sale, token, devnet }) => ({
      id: c.req.param('id'),
      now: devnet.now(),
      sale: sale.getSaleInfo(),
      token: {
        address: token.address,
        name: token.name,
        symbol: token.symbol,
        decimals: token.decimals,
        totalSupply: token.totalSupply,
        maxSupply: token.maxSupply,
        paused: token.paused,
        saleBalance: token.balanceOf(sale.address),
      },
      display: {
        tokenPrice: formatUnits(sale.config.tokenPrice, 18),
        totalSold: formatUnits(sale.totalSold, token.decimals),
        totalRaised: formatUnits(sale.totalRaised, 18),
      },
    }));

    if (!outcome) {
      return deploymentNotFound(c);
    }
    return c.json(toJsonValue(outcome.result));
  });

  /**
   * GET /sales/:id/accounts/:address - Balances, purchase and allow-list status of an account
   */
  sales.get('/:id/accounts/:address', async (c) => {
    const parsed = addressSchema.safeParse(c.req.param('address'));
    if (!parsed.success) {
      return validationFailed(c, parsed.error);
    }
    const account = parsed.data;

    const outcome = await deployments.view(c.req.param('id'), ({ sale, token, devnet }) => ({
      address: account,
      nativeBalance: devnet.native.balanceOf(account),
      tokenBalance: token.balanceOf(account),
      purchase: sale.getPurchase(account),
      whitelisted: sale.isWhitelisted(account),
    }));

    if (!outcome) {
      return deploymentNotFound(c);
    }
    return c.json(toJsonValue(outcome.result));
  });

  /**
   * GET /sales/:id/events - Event log
   */
  sales.get('/:id/events', async (c) => {
    const deployment = await deployments.get(c.req.param('id'));
    if (!deployment) {
      return deploymentNotFound(c);
    }
    return c.json(deployment.events);
  });

  /**
   * DELETE /sales/:id - Delete a deployment
   */
  sales.delete('/:id', async (c) => {
    const deleted = await deployments.delete(c.req.param('id'));
    if (!deleted) {
      return deploymentNotFound(c);
    }
    return c.json({ success: true });
  });

  /**
   * POST /sales/:id/buy - Buy tokens, paying `value` wei
   */
  sales.post('/:id/buy', async (c) => {
    const result = buyRequestSchema.safeParse(await readBody(c));
    if (!result.success) {
      return validationFailed(c, result.error);
    }
    const { from, amount, value, proof } = result.data;

    const outcome = await deployments.execute(c.req.param('id'), ({ sale }) => sale.buy(from, amount, value, proof));
    if (!outcome) {
      return deploymentNotFound(c);
    }
    return c.json(toJsonValue(outcome));
  });

  /**
   * POST /sales/:id/claim - Claim purchased tokens
   */
  sales.post('/:id/claim', async (c) => {
    const result = callerSchema.safeParse(await readBody(c));
    if (!result.success) {
      return validationFailed(c, result.error);
    }
    const { from } = result.data;

    const outcome = await deployments.execute(c.req.param('id'), ({ sale }) => ({ amount: sale.claim(from) }));
    if (!outcome) {
      return deploymentNotFound(c);
    }
    return c.json(toJsonValue(outcome));
  });

  /**
   * PUT /sales/:id/config - Replace the sale configuration (owner)
   */
  sales.put('/:id/config', async (c) => {
    const result = updateConfigRequestSchema.safeParse(await readBody(c));
    if (!result.success) {
      return validationFailed(c, result.error);
    }
    const { from, config } = result.data;

    const outcome = await deployments.execute(c.req.param('id'), ({ sale }) => {
      sale.updateSaleConfig(from, config);
      return sale.config;
    });
    if (!outcome) {
      return deploymentNotFound(c);
    }
    return c.json(toJsonValue(outcome));
  });

  /**
   * POST /sales/:id/claim-settings - Enable or disable claiming (owner)
   */
  sales.post('/:id/claim-settings', async (c) => {
    const result = claimSettingsRequestSchema.safeParse(await readBody(c));
    if (!result.success) {
      return validationFailed(c, result.error);
    }
    const { from, enabled, claimStartTime } = result.data;

    const outcome = await deployments.execute(c.req.param('id'), ({ sale }) => {
      sale.setClaimEnabled(from, enabled, claimStartTime);
      return sale.claimSettings;
    });
    if (!outcome) {
      return deploymentNotFound(c);
    }
    return c.json(toJsonValue(outcome));
  });

  /**
   * POST /sales/:id/whitelist - Add or remove one account (owner)
   */
  sales.post('/:id/whitelist', async (c) => {
    const result = whitelistRequestSchema.safeParse(await readBody(c));
    if (!result.success) {
      return validationFailed(c, result.error);
    }
    const { from, account, status } = result.data;

    const outcome = await deployments.execute(c.req.param('id'), ({ sale }) => {
      sale.updateWhitelist(from, account, status);
      return { account, whitelisted: sale.isWhitelisted(account) };
    });
    if (!outcome) {
      return deploymentNotFound(c);
    }
    return c.json(toJsonValue(outcome));
  });

  /**
   * POST /sales/:id/whitelist/batch - Add or remove up to 100 accounts (owner)
   */
  sales.post('/:id/whitelist/batch', async (c) => {
    const result = whitelistBatchRequestSchema.safeParse(await readBody(c));
    if (!result.success) {
      return validationFailed(c, result.error);
    }
    const { from, accounts, status } = result.data;

    const outcome = await deployments.execute(c.req.param('id'), ({ sale }) => {
      sale.updateWhitelistBatch(from, accounts, status);
      return { updated: accounts.length, status };
    });
    if (!outcome) {
      return deploymentNotFound(c);
    }
    return c.json(toJsonValue(outcome));
  });

  /**
   * PUT /sales/:id/merkle-root - Replace the allow-list root (owner)
   */
  sales.put('/:id/merkle-root', async (c) => {
    const result = merkleRootRequestSchema.safeParse(await readBody(c));
    if (!result.success) {
      return validationFailed(c, result.error);
    }
    const { from, root } = result.data;

    const outcome = await deployments.execute(c.req.param('id'), ({ sale }) => {
      sale.setMerkleRoot(from, root);
      return { merkleRoot: sale.merkleRoot };
    });
    if (!outcome) {
      return deploymentNotFound(c);
    }
    return c.json(toJsonValue(outcome));
  });

  /**
   * POST /sales/:id/transfer-ownership - Hand the sale to a new owner (owner)
   */
  sales.post('/:id/transfer-ownership', async (c) => {
    const result = transferOwnershipRequestSchema.safeParse(await readBody(c));
    if (!result.success) {
      return validationFailed(c, result.error);
    }
    const { from, newOwner } = result.data;

    const outcome = await deployments.execute(c.req.param('id'), ({ sale }) => {
      sale.transferOwnership(from, newOwner);
      return { owner: sale.owner };
    });
    if (!outcome) {
      return deploymentNotFound(c);
    }
    return c.json(toJsonValue(outcome));
  });

  /**
   * POST /sales/:id/emergency-withdraw - Sweep tokens held by the sale (owner)
   * Defaults to the sale token when `token` is omitted.
   */
  sales.post('/:id/emergency-withdraw', async (c) => {
    const result = emergencyWithdrawRequestSchema.safeParse(await readBody(c));
    if (!result.success) {
      return validationFailed(c, result.error);
    }
    const { from, token, amount } = result.data;

    const outcome = await deployments.execute(c.req.param('id'), ({ sale }) => {
      const tokenAddress = token ?? sale.token.address;
      sale.emergencyWithdraw(from, tokenAddress, amount);
      return { token: tokenAddress, amount };
    });
    if (!outcome) {
      return deploymentNotFound(c);
    }
    return c.json(toJsonValue(outcome));
  });

  /**
   * POST /sales/:id/emergency-withdraw-eth - Sweep the native balance (owner)
   */
  sales.post('/:id/emergency-withdraw-eth', async (c) => {
    const result = callerSchema.safeParse(await readBody(c));
    if (!result.success) {
      return validationFailed(c, result.error);
    }
    const { from } = result.data;

    const outcome = await deployments.execute(c.req.param('id'), ({ sale }) => ({
      amount: sale.emergencyWithdrawETH(from),
    }));
    if (!outcome) {
      return deploymentNotFound(c);
    }
    return c.json(toJsonValue(outcome));
  });

  /**
   * POST /sales/:id/fund - Set the native balance of an account (devnet faucet)
   */
  sales.post('/:id/fund', async (c) => {
    const result = fundRequestSchema.safeParse(await readBody(c));
    if (!result.success) {
      return validationFailed(c, result.error);
    }
    const { address, balance } = result.data;

    const outcome = await deployments.execute(c.req.param('id'), ({ devnet }) => {
      devnet.native.setBalance(address, balance);
      return { address, balance: devnet.native.balanceOf(address) };
    });
    if (!outcome) {
      return deploymentNotFound(c);
    }
    return c.json(toJsonValue(outcome));
  });

  /**
   * POST /sales/:id/time - Move the devnet clock forward
   */
  sales.post('/:id/time', async (c) => {
    const result = timeRequestSchema.safeParse(await readBody(c));
    if (!result.success) {
      return validationFailed(c, result.error);
    }
    const { seconds } = result.data;

    const outcome = await deployments.execute(c.req.param('id'), ({ devnet }) => ({
      now: devnet.increaseTime(seconds),
    }));
    if (!outcome) {
      return deploymentNotFound(c);
    }
    return c.json(toJsonValue(outcome));
  });

  return sales;
}
