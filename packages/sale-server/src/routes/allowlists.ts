import { Hono } from 'hono';
import { z } from 'zod';
import { getAddress, type Address, type Hex } from 'viem';
import { buildAllowlist, getLeaf, verifyProof } from '../services/merkle';

const allowlists = new Hono();

// DoS protection limit
const MAX_ADDRESSES = 10000;

const bytes32Schema = z.string().refine((value): value is Hex => /^0x[a-fA-F0-9]{64}$/.test(value), 'Invalid bytes32');
const addressSchema = z.string().regex(/^0x[a-fA-F0-9]{40}$/, 'Invalid address');

const createAllowlistRequestSchema = z.object({
  addresses: z.array(addressSchema)
    .min(1, 'At least one address required')
    .max(MAX_ADDRESSES, `Maximum ${MAX_ADDRESSES} addresses allowed`),
});

const verifyRequestSchema = z.object({
  root: bytes32Schema,
  account: addressSchema.transform((value): Address => getAddress(value)),
  proof: z.array(bytes32Schema),
});

/**
 * POST /allowlists - Build a merkle allow-list and return every proof
 */
allowlists.post('/', async (c) => {
  const body = await c.req.json().catch(() => null);
  const result = createAllowlistRequestSchema.safeParse(body);

  if (!result.success) {
    return c.json({ error: 'Validation failed', details: result.error.issues }, 400);
  }

  try {
    const tree = buildAllowlist(result.data.addresses);
    return c.json({ ...tree, count: tree.entries.length }, 201);
  } catch (error) {
    // Canonicalization errors (duplicates, zero address)
    return c.json({ error: error instanceof Error ? error.message : 'Failed to build allow-list' }, 400);
  }
});

/**
 * POST /allowlists/verify - Check an account's proof against a root
 */
allowlists.post('/verify', async (c) => {
  const body = await c.req.json().catch(() => null);
  const result = verifyRequestSchema.safeParse(body);

  if (!result.success) {
    return c.json({ error: 'Validation failed', details: result.error.issues }, 400);
  }

  const { root, account, proof } = result.data;
  const leaf = getLeaf(account);

  return c.json({ valid: verifyProof(proof, root, leaf), leaf });
});

export { allowlists };
