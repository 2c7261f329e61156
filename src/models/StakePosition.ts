/**
 * Staking models
 */

export type StakeTier = 'none' | 'bronze' | 'silver' | 'gold' | 'platinum';

export const STAKE_TIER_ORDER: readonly StakeTier[] = ['none', 'bronze', 'silver', 'gold', 'platinum'];

export interface TierDefinition {
  tier: StakeTier;
  minStake: bigint;
  priorityWeight: number;
  feeDiscountBps: number;
}

export interface StakePosition {
  trader: string;
  stakedAmount: bigint;
  tier: StakeTier;
  priorityWeight: number;
  feeDiscountBps: number;
  lastUpdated: Date | null;
}
