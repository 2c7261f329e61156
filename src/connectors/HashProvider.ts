/**
 * Commitment hashing
 */

import { createHash } from 'crypto';
import type { OrderTerms } from '../models/Order';

export interface IHashProvider {
  /**
   * Deterministic fixed-width digest, hex encoded
   */
  digest(bytes: Uint8Array): string;
}

export class Sha256HashProvider implements IHashProvider {
  digest(bytes: Uint8Array): string {
    return createHash('sha256').update(bytes).digest('hex');
  }
}

const U64_MAX = (1n << 64n) - 1n;

/**
 * Canonical reveal encoding: price u64 LE, quantity u64 LE, ttl i64 LE,
 * multisig flag u8, threshold u8, then the nonce bytes.
 */
export function encodeRevealPayload(terms: OrderTerms, nonce: Uint8Array | string): Buffer {
  if (terms.price < 0n || terms.price > U64_MAX || terms.quantity < 0n || terms.quantity > U64_MAX) {
    throw new RangeError('Price and quantity must fit in an unsigned 64-bit integer');
  }
  if (!Number.isSafeInteger(terms.ttl)) {
    throw new RangeError(`TTL must be an integer timestamp, got ${terms.ttl}`);
  }
  if (!Number.isInteger(terms.threshold) || terms.threshold < 0 || terms.threshold > 255) {
    throw new RangeError(`Threshold must fit in one byte, got ${terms.threshold}`);
  }

  const header = Buffer.alloc(26);
  header.writeBigUInt64LE(terms.price, 0);
  header.writeBigUInt64LE(terms.quantity, 8);
  header.writeBigInt64LE(BigInt(terms.ttl), 16);
  header.writeUInt8(terms.isMultisig ? 1 : 0, 24);
  header.writeUInt8(terms.threshold, 25);

  const nonceBytes = typeof nonce === 'string' ? Buffer.from(nonce, 'utf8') : Buffer.from(nonce);
  return Buffer.concat([header, nonceBytes]);
}

export function computeCommitmentHash(
  terms: OrderTerms,
  nonce: Uint8Array | string,
  hashProvider: IHashProvider = new Sha256HashProvider()
): string {
  return hashProvider.digest(encodeRevealPayload(terms, nonce));
}
