/**
 * Property-based tests for fee arithmetic
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { bpsOf, computeFees } from './feeMath';

describe('feeMath', () => {
  it('charges the base fee and splits off the maker rebate', () => {
    expect(computeFees(10_000n, 100, 0, 2_000)).toEqual({
      settlementAmount: 10_000n,
      takerFee: 100n,
      makerRebate: 20n,
      treasuryFee: 80n
    });
  });

  it('applies the tier discount before rounding down', () => {
    expect(computeFees(10_000n, 100, 5_000, 2_000)).toEqual({
      settlementAmount: 10_000n,
      takerFee: 50n,
      makerRebate: 10n,
      treasuryFee: 40n
    });
    expect(computeFees(12_345n, 30, 500, 2_000)).toEqual({
      settlementAmount: 12_345n,
      takerFee: 35n,
      makerRebate: 7n,
      treasuryFee: 28n
    });
  });

  it('rounds dust fees to zero', () => {
    expect(computeFees(99n, 100, 0, 2_000).takerFee).toBe(0n);
    expect(bpsOf(99n, 100)).toBe(0n);
  });

  it('takes no fee at a zero rate or a full discount', () => {
    expect(computeFees(1_000_000n, 0, 0, 2_000).takerFee).toBe(0n);
    expect(computeFees(1_000_000n, 1_000, 10_000, 2_000).takerFee).toBe(0n);
  });

  /**
   * **Feature: otc-limit-engine, Property 1: Fee split conserves the taker fee**
   */
  it('should split every fee exactly into rebate and treasury share, bounded by the undiscounted fee', () => {
    fc.assert(fc.property(
      fc.bigInt({ min: 0n, max: 10n ** 24n }),
      fc.integer({ min: 0, max: 10_000 }),
      fc.integer({ min: 0, max: 10_000 }),
      fc.integer({ min: 0, max: 10_000 }),
      (settlement, feeBps, discountBps, rebateBps) => {
        const fees = computeFees(settlement, feeBps, discountBps, rebateBps);

        expect(fees.makerRebate + fees.treasuryFee).toBe(fees.takerFee);
        expect(fees.makerRebate).toBeGreaterThanOrEqual(0n);
        expect(fees.treasuryFee).toBeGreaterThanOrEqual(0n);
        expect(fees.takerFee).toBeLessThanOrEqual(bpsOf(settlement, feeBps));
      }
    ), { numRuns: 100 });
  });

  /**
   * **Feature: otc-limit-engine, Property 2: A larger discount never raises the fee**
   */
  it('should never charge more for a larger tier discount', () => {
    fc.assert(fc.property(
      fc.bigInt({ min: 0n, max: 10n ** 18n }),
      fc.integer({ min: 0, max: 10_000 }),
      fc.integer({ min: 0, max: 10_000 }),
      fc.integer({ min: 0, max: 10_000 }),
      (settlement, feeBps, a, b) => {
        const [low, high] = a <= b ? [a, b] : [b, a];
        const cheaper = computeFees(settlement, feeBps, high, 0).takerFee;
        const dearer = computeFees(settlement, feeBps, low, 0).takerFee;

        expect(cheaper).toBeLessThanOrEqual(dearer);
      }
    ), { numRuns: 100 });
  });
});
