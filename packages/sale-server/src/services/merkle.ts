import { keccak256, encodePacked, concat, zeroHash, type Address, type Hex } from 'viem';
import type { AllowlistTree } from '../types';
import { canonicalizeAllowlist } from './canonicalize';

/**
 * Generate an allow-list leaf matching Solidity: keccak256(abi.encodePacked(account))
 */
export function getLeaf(account: Address): Hex {
  return keccak256(encodePacked(['address'], [account]));
}

/**
 * Hash a pair of nodes with sorted order for OpenZeppelin MerkleProof compatibility
 */
export function hashPair(a: Hex, b: Hex): Hex {
  if (a.toLowerCase() < b.toLowerCase()) {
    return keccak256(concat([a, b]));
  }
  return keccak256(concat([b, a]));
}

/**
 * Compute the merkle root from an array of leaves
 * Pads to next power of 2 by duplicating the last leaf
 */
export function getRoot(leaves: Hex[]): Hex {
  if (leaves.length === 0) {
    throw new Error('Cannot compute root of empty leaves array');
  }

  let layer = padToPowerOfTwo([...leaves]);
  while (layer.length > 1) {
    layer = nextLayer(layer);
  }

  return layer[0];
}

/**
 * Get the proof for a leaf at a given index
 */
export function getProof(leaves: Hex[], index: number): Hex[] {
  if (index < 0 || index >= leaves.length) {
    throw new Error(`Index ${index} out of bounds for leaves array of length ${leaves.length}`);
  }

  const proof: Hex[] = [];
  let currentIndex = index;
  let layer = padToPowerOfTwo([...leaves]);

  while (layer.length > 1) {
    const siblingIndex = currentIndex % 2 === 0 ? currentIndex + 1 : currentIndex - 1;
    proof.push(layer[siblingIndex]);

    layer = nextLayer(layer);
    currentIndex = Math.floor(currentIndex / 2);
  }

  return proof;
}

/**
 * Verify a merkle proof
 */
export function verifyProof(proof: Hex[], root: Hex, leaf: Hex): boolean {
  let computedHash = leaf;

  for (const proofElement of proof) {
    computedHash = hashPair(computedHash, proofElement);
  }

  return computedHash.toLowerCase() === root.toLowerCase();
}

/**
 * True when the root is unset (all zero bytes)
 */
export function isEmptyRoot(root: Hex): boolean {
  return root.toLowerCase() === zeroHash;
}

/**
 * Build an allow-list tree from raw addresses.
 * Addresses are canonicalized first, so the same set always yields the same root.
 */
export function buildAllowlist(addresses: string[]): AllowlistTree {
  const accounts = canonicalizeAllowlist(addresses);
  const leaves = accounts.map(getLeaf);
  const root = getRoot(leaves);

  return {
    root,
    entries: accounts.map((account, index) => ({
      account,
      leaf: leaves[index],
      proof: getProof(leaves, index),
    })),
  };
}

function nextLayer(layer: Hex[]): Hex[] {
  const next: Hex[] = [];
  for (let i = 0; i < layer.length; i += 2) {
    next.push(hashPair(layer[i], layer[i + 1]));
  }
  return next;
}

/**
 * Pad an array of leaves to the next power of 2 by duplicating the last leaf
 */
function padToPowerOfTwo(leaves: Hex[]): Hex[] {
  const targetLength = nextPowerOfTwo(leaves.length);
  const lastLeaf = leaves[leaves.length - 1];

  while (leaves.length < targetLength) {
    leaves.push(lastLeaf);
  }

  return leaves;
}

function nextPowerOfTwo(n: number): number {
  if (n <= 1) return 1;
  let power = 1;
  while (power < n) {
    power *= 2;
  }
  return power;
}
