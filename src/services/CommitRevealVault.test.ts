/**
 * Tests for the commit-reveal protocol
 */

import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import type { OrderTerms } from '../models/Order';
import { computeCommitmentHash } from '../connectors/HashProvider';
import { EngineErrorCode } from '../utils/ErrorHandler';
import { HOUR, createHarness, fund, rejectionCode } from '../testing/EngineHarness';
import type { EngineHarness } from '../testing/EngineHarness';

const TRADER = 'maker:alice';
const OTHER = 'maker:mallory';

describe('CommitRevealVault', () => {
  let harness: EngineHarness;
  let terms: OrderTerms;
  let hash: string;

  beforeEach(() => {
    harness = createHarness();
    fund(harness, TRADER, 1_000n);
    fund(harness, OTHER, 1_000n);
    terms = { price: 10n, quantity: 5n, ttl: harness.clock.now() + HOUR, isMultisig: false, threshold: 0 };
    hash = computeCommitmentHash(terms, 'nonce-1');
  });

  it('stores a commitment and exposes the committed phase', async () => {
    const view = await harness.engine.vault.commitOrder('sealed-1', hash, TRADER);

    expect(view).toEqual({
      orderId: 'sealed-1',
      status: 'committed',
      committer: TRADER,
      committedAt: new Date(harness.clock.now())
    });
    expect(harness.engine.vault.getCommitment('sealed-1')).toEqual(view);
  });

  it.each(['not-a-hash', hash.toUpperCase(), hash.slice(1)])('rejects malformed hash %s', async malformed => {
    expect(await rejectionCode(harness.engine.vault.commitOrder('sealed-1', malformed, TRADER))).toBe(
      EngineErrorCode.INVALID_PARAMETERS
    );
    expect(harness.engine.vault.liveCommitments).toBe(0);
  });

  it('allows one live commitment per order id', async () => {
    await harness.engine.vault.commitOrder('sealed-1', hash, TRADER);

    expect(await rejectionCode(harness.engine.vault.commitOrder('sealed-1', hash, OTHER))).toBe(
      EngineErrorCode.ALREADY_COMMITTED
    );
    expect(harness.engine.vault.getCommitment('sealed-1')?.committer).toBe(TRADER);
  });

  it('refuses to commit to an id that already has an order', async () => {
    await harness.engine.orderStore.createOrder(TRADER, { ...terms, orderId: 'taken' });

    expect(await rejectionCode(harness.engine.vault.commitOrder('taken', hash, TRADER))).toBe(
      EngineErrorCode.ALREADY_COMMITTED
    );
  });

  it('keeps committed ids out of direct creation', async () => {
    await harness.engine.vault.commitOrder('sealed-1', hash, TRADER);

    expect(await rejectionCode(harness.engine.orderStore.createOrder(OTHER, { ...terms, orderId: 'sealed-1' }))).toBe(
      EngineErrorCode.INVALID_PARAMETERS
    );
  });

  it('leaves the commitment intact when the reveal does not match', async () => {
    await harness.engine.vault.commitOrder('sealed-1', hash, TRADER);

    expect(await rejectionCode(harness.engine.vault.revealOrder('sealed-1', TRADER, terms, 'nonce-2'))).toBe(
      EngineErrorCode.HASH_MISMATCH
    );
    expect(harness.engine.vault.getCommitment('sealed-1')).not.toBeNull();

    const order = await harness.engine.vault.revealOrder('sealed-1', TRADER, terms, 'nonce-1');
    expect(order).toMatchObject({ orderId: 'sealed-1', owner: TRADER, status: 'open', origin: 'reveal', escrowedCollateral: 50n });
    expect(harness.engine.vault.getCommitment('sealed-1')).toBeNull();
    expect(harness.ledger.balanceOf(TRADER, harness.config.assets.collateralAsset).held).toBe(50n);
  });

  it('consumes a commitment exactly once', async () => {
    await harness.engine.vault.commitOrder('sealed-1', hash, TRADER);
    await harness.engine.vault.revealOrder('sealed-1', TRADER, terms, 'nonce-1');

    expect(await rejectionCode(harness.engine.vault.revealOrder('sealed-1', TRADER, terms, 'nonce-1'))).toBe(
      EngineErrorCode.INVALID_STATE
    );
  });

  it('rejects reveals without a commitment or from another identity', async () => {
    expect(await rejectionCode(harness.engine.vault.revealOrder('sealed-1', TRADER, terms, 'nonce-1'))).toBe(
      EngineErrorCode.INVALID_STATE
    );

    await harness.engine.vault.commitOrder('sealed-1', hash, TRADER);
    expect(await rejectionCode(harness.engine.vault.revealOrder('sealed-1', OTHER, terms, 'nonce-1'))).toBe(
      EngineErrorCode.UNAUTHORIZED
    );
    expect(harness.engine.vault.getCommitment('sealed-1')).not.toBeNull();
  });

  it('does not restore the commitment when order creation fails after a match', async () => {
    await harness.engine.vault.commitOrder('sealed-1', hash, TRADER);
    harness.clock.advance(2 * HOUR);

    expect(await rejectionCode(harness.engine.vault.revealOrder('sealed-1', TRADER, terms, 'nonce-1'))).toBe(
      EngineErrorCode.INVALID_PARAMETERS
    );
    expect(harness.engine.vault.getCommitment('sealed-1')).toBeNull();
    expect(harness.engine.orderStore.getOrder('sealed-1')).toBeNull();
  });

  it('consumes the commitment when the revealed order cannot be collateralized', async () => {
    const large: OrderTerms = { ...terms, price: 1_000n };
    await harness.engine.vault.commitOrder('sealed-1', computeCommitmentHash(large, 'n'), TRADER);

    expect(await rejectionCode(harness.engine.vault.revealOrder('sealed-1', TRADER, large, 'n'))).toBe(
      EngineErrorCode.INSUFFICIENT_COLLATERAL
    );
    expect(harness.engine.vault.getCommitment('sealed-1')).toBeNull();
  });

  it('reveals multisig orders into pending approval', async () => {
    const multisig: OrderTerms = { ...terms, isMultisig: true, threshold: 2 };
    const nonce = Uint8Array.from([1, 2, 3, 4]);
    await harness.engine.vault.commitOrder('sealed-ms', computeCommitmentHash(multisig, nonce), TRADER);

    const order = await harness.engine.vault.revealOrder('sealed-ms', TRADER, multisig, nonce);
    expect(order.status).toBe('pending_approval');
    expect(order.multisigThreshold).toBe(2);
  });

  it('runs a commit and a reveal for the same id in arrival order', async () => {
    const [view, order] = await Promise.all([
      harness.engine.vault.commitOrder('sealed-1', hash, TRADER),
      harness.engine.vault.revealOrder('sealed-1', TRADER, terms, 'nonce-1')
    ]);

    expect(view.status).toBe('committed');
    expect(order.status).toBe('open');
  });

  describe('commitment maintenance', () => {
    it('lets only the committer revoke', async () => {
      await harness.engine.vault.commitOrder('sealed-1', hash, TRADER);

      expect(await rejectionCode(harness.engine.vault.revokeCommitment('sealed-1', OTHER))).toBe(
        EngineErrorCode.UNAUTHORIZED
      );
      const revoked = await harness.engine.vault.revokeCommitment('sealed-1', TRADER);
      expect(revoked.commitHash).toBe(hash);
      expect(harness.engine.vault.getCommitment('sealed-1')).toBeNull();
      expect(harness.audit.exportAuditLog({ eventType: 'COMMITMENT_REVOKED' })).toHaveLength(1);
    });

    it('purges commitments only after their TTL', async () => {
      await harness.engine.vault.commitOrder('sealed-1', hash, TRADER);

      harness.clock.advance(harness.config.orders.commitmentTtlMs - 1);
      expect(await rejectionCode(harness.engine.vault.expireCommitment('sealed-1', OTHER))).toBe(
        EngineErrorCode.INVALID_STATE
      );

      harness.clock.advance(1);
      await harness.engine.vault.expireCommitment('sealed-1', OTHER);
      expect(harness.engine.vault.getCommitment('sealed-1')).toBeNull();
      expect(await rejectionCode(harness.engine.vault.expireCommitment('sealed-1', OTHER))).toBe(
        EngineErrorCode.INVALID_STATE
      );
    });
  });

  /**
   * **Feature: otc-limit-engine, Property 5: Reveal soundness**
   */
  it('should create an order only when the revealed terms and nonce reproduce the hash', () => {
    return fc.assert(fc.asyncProperty(
      fc.record({
        price: fc.bigInt({ min: 1n, max: 100n }),
        quantity: fc.bigInt({ min: 1n, max: 10n }),
        ttlOffset: fc.integer({ min: 1, max: 10 * HOUR }),
        nonce: fc.string({ minLength: 1, maxLength: 32 }),
        tamper: fc.constantFrom('none', 'price', 'quantity', 'ttl', 'nonce')
      }),
      async ({ price, quantity, ttlOffset, nonce, tamper }) => {
        const local = createHarness();
        fund(local, TRADER, 10_000n);
        const committed: OrderTerms = {
          price,
          quantity,
          ttl: local.clock.now() + ttlOffset,
          isMultisig: false,
          threshold: 0
        };
        await local.engine.vault.commitOrder('sealed-p', computeCommitmentHash(committed, nonce), TRADER);

        const revealed: OrderTerms = {
          ...committed,
          price: tamper === 'price' ? price + 1n : price,
          quantity: tamper === 'quantity' ? quantity + 1n : quantity,
          ttl: tamper === 'ttl' ? committed.ttl + 1 : committed.ttl
        };
        const revealedNonce = tamper === 'nonce' ? `${nonce}!` : nonce;
        const outcome = await local.engine.revealOrder('sealed-p', TRADER, revealed, revealedNonce);

        if (tamper === 'none') {
          expect(outcome.success).toBe(true);
          expect(local.engine.orderStore.getOrder('sealed-p')?.origin).toBe('reveal');
        } else {
          expect(outcome.success ? null : outcome.error.code).toBe(EngineErrorCode.HASH_MISMATCH);
          expect(local.engine.vault.getCommitment('sealed-p')).not.toBeNull();
          expect(local.engine.orderStore.getOrder('sealed-p')).toBeNull();
        }
      }
    ), { numRuns: 100 });
  });
});
