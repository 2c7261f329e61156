/**
 * Treasury and fee policy models
 */

export interface TreasuryAccount {
  balance: bigint;
  feeBps: number;
  totalCollected: bigint;
  totalWithdrawn: bigint;
  updatedAt: Date;
}

export interface FeeBreakdown {
  settlementAmount: bigint;
  takerFee: bigint;
  makerRebate: bigint;
  treasuryFee: bigint;
}
