import { getAddress, isAddress, zeroAddress, type Address } from 'viem';

/**
 * Normalize an address to its EIP-55 checksummed form
 * @param address - The address to normalize
 * @returns Checksummed address
 * @throws Error if address is invalid
 */
export function normalizeAddress(address: string): Address {
  if (!address || typeof address !== 'string') {
    throw new Error('Address must be a non-empty string');
  }

  if (!isAddress(address, { strict: false })) {
    throw new Error(`Invalid address format: ${address}`);
  }

  return getAddress(address);
}

/**
 * Normalize an amount by removing leading zeros
 * @throws Error if amount is not a non-negative integer string
 */
export function normalizeAmount(amount: string): string {
  if (!amount || typeof amount !== 'string') {
    throw new Error('Amount must be a non-empty string');
  }

  if (!/^\d+$/.test(amount)) {
    throw new Error(`Invalid amount format: ${amount} (must be non-negative integer string)`);
  }

  return amount.replace(/^0+/, '') || '0';
}

/**
 * Parse a decimal amount string into a bigint
 */
export function parseAmount(amount: string): bigint {
  return BigInt(normalizeAmount(amount));
}

export function isZeroAddress(address: string): boolean {
  return address.toLowerCase() === zeroAddress;
}

/**
 * Canonicalize allow-list addresses: checksum, sort ascending, reject duplicates and the zero address
 * @throws Error if the list is empty or contains invalid entries
 */
export function canonicalizeAllowlist(addresses: string[]): Address[] {
  if (!addresses || addresses.length === 0) {
    throw new Error('Address list must not be empty');
  }

  const normalized = addresses.map((address) => {
    const checksummed = normalizeAddress(address);
    if (isZeroAddress(checksummed)) {
      throw new Error('Zero address cannot be allow-listed');
    }
    return checksummed;
  });

  // Sort on the lowercase form so ordering does not depend on checksum casing
  const sorted = [...normalized].sort((a, b) => a.toLowerCase().localeCompare(b.toLowerCase()));

  for (let i = 0; i < sorted.length - 1; i++) {
    if (sorted[i] === sorted[i + 1]) {
      throw new Error(`Duplicate address found: ${sorted[i]}`);
    }
  }

  return sorted;
}
