/**
 * Tests for the in-process token ledger
 */

import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { InMemoryTokenLedger } from './InMemoryTokenLedger';
import type { TransferLeg } from './CollateralLedger';

describe('InMemoryTokenLedger', () => {
  let ledger: InMemoryTokenLedger;

  beforeEach(() => {
    ledger = new InMemoryTokenLedger();
    ledger.mint('alice', 'USDC', 100n);
  });

  it('moves funds between available and held', async () => {
    expect(await ledger.escrow('alice', 40n, 'USDC')).toEqual({ success: true });
    expect(ledger.balanceOf('alice', 'USDC')).toEqual({ available: 60n, held: 40n });

    expect(await ledger.release('alice', 15n, 'USDC')).toEqual({ success: true });
    expect(ledger.balanceOf('alice', 'USDC')).toEqual({ available: 75n, held: 25n });
  });

  it('refuses to overdraw available or held balances', async () => {
    expect((await ledger.escrow('alice', 101n, 'USDC')).success).toBe(false);
    expect((await ledger.release('alice', 1n, 'USDC')).success).toBe(false);
    expect((await ledger.transfer('bob', 'alice', 1n, 'USDC')).success).toBe(false);
    expect(ledger.balanceOf('alice', 'USDC')).toEqual({ available: 100n, held: 0n });
  });

  it('keeps assets apart', async () => {
    expect((await ledger.transfer('alice', 'bob', 1n, 'OTCL')).success).toBe(false);
    expect(ledger.totalSupply('OTCL')).toBe(0n);
  });

  it('applies a batch all or nothing', async () => {
    const legs: TransferLeg[] = [
      { kind: 'transfer', from: 'alice', to: 'bob', amount: 60n, asset: 'USDC' },
      { kind: 'transfer', from: 'alice', to: 'carol', amount: 60n, asset: 'USDC' }
    ];

    const result = await ledger.transferBatch(legs);
    expect(result).toEqual({ success: false, reason: 'alice has 40 USDC available, needs 60' });
    expect(ledger.balanceOf('alice', 'USDC').available).toBe(100n);
    expect(ledger.balanceOf('bob', 'USDC').available).toBe(0n);
  });

  it('sees earlier legs of the same batch', async () => {
    const result = await ledger.transferBatch([
      { kind: 'transfer', from: 'alice', to: 'bob', amount: 70n, asset: 'USDC' },
      { kind: 'escrow', account: 'bob', amount: 70n, asset: 'USDC' }
    ]);

    expect(result.success).toBe(true);
    expect(ledger.balanceOf('bob', 'USDC')).toEqual({ available: 0n, held: 70n });
  });

  it('rejects non-positive amounts', async () => {
    expect(await ledger.transfer('alice', 'bob', 0n, 'USDC')).toEqual({
      success: false,
      reason: 'amount must be positive, got 0'
    });
    expect(() => ledger.mint('alice', 'USDC', 0n)).toThrow('Mint amount must be positive, got 0');
  });

  /**
   * **Feature: otc-limit-engine, Property 10: Ledger batches conserve supply**
   */
  it('should conserve total supply across any batch', () => {
    return fc.assert(fc.asyncProperty(
      fc.array(
        fc.record({
          from: fc.constantFrom('alice', 'bob', 'carol'),
          to: fc.constantFrom('alice', 'bob', 'carol'),
          amount: fc.bigInt({ min: 1n, max: 80n })
        }),
        { maxLength: 6 }
      ),
      async transfers => {
        await ledger.transferBatch(transfers.map(transfer => ({ kind: 'transfer' as const, asset: 'USDC', ...transfer })));

        expect(ledger.totalSupply('USDC')).toBe(100n);
        for (const account of ['alice', 'bob', 'carol']) {
          expect(ledger.balanceOf(account, 'USDC').available).toBeGreaterThanOrEqual(0n);
        }
      }
    ), { numRuns: 100 });
  });
});
