/**
 * Fee arithmetic in integer base units and basis points
 */

import { BPS_DENOMINATOR } from '../config/ConfigurationManager';
import type { FeeBreakdown } from '../models/Treasury';

const BPS = BigInt(BPS_DENOMINATOR);

export function bpsOf(amount: bigint, bps: number): bigint {
  return (amount * BigInt(bps)) / BPS;
}

/**
 * Splits the taker fee on a settlement between maker rebate and treasury.
 * The tier discount applies before rounding down, so the discounted fee is
 * never above the undiscounted one.
 */
export function computeFees(
  settlementAmount: bigint,
  feeBps: number,
  discountBps: number,
  makerRebateBps: number
): FeeBreakdown {
  const takerFee = (settlementAmount * BigInt(feeBps) * BigInt(BPS_DENOMINATOR - discountBps)) / (BPS * BPS);
  const makerRebate = bpsOf(takerFee, makerRebateBps);

  return {
    settlementAmount,
    takerFee,
    makerRebate,
    treasuryFee: takerFee - makerRebate
  };
}
