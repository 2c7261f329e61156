/**
 * Collateral ledger capability and the adapter the engine settles through
 * Every movement either applies completely or not at all
 */

import { EngineError, EngineErrorCode } from '../utils/ErrorHandler';
import type { AssetConfig } from '../config/ConfigurationManager';

export type TransferResult =
  | { success: true }
  | { success: false; reason: string; transient?: boolean };

export type TransferLeg =
  | { kind: 'escrow'; account: string; amount: bigint; asset: string }
  | { kind: 'release'; account: string; amount: bigint; asset: string }
  | { kind: 'transfer'; from: string; to: string; amount: bigint; asset: string };

/**
 * Token transfer primitive supplied by the host. Escrow locks funds held on
 * the account's behalf; release unlocks them.
 */
export interface ICollateralTransfer {
  escrow(account: string, amount: bigint, asset: string): Promise<TransferResult>;
  release(account: string, amount: bigint, asset: string): Promise<TransferResult>;
  transfer(from: string, to: string, amount: bigint, asset: string): Promise<TransferResult>;

  /**
   * Applies all legs atomically. Ledgers without it get leg-by-leg
   * application with compensation.
   */
  transferBatch?(legs: TransferLeg[]): Promise<TransferResult>;
}

export function describeLeg(leg: TransferLeg): string {
  switch (leg.kind) {
    case 'escrow':
      return `escrow ${leg.amount} ${leg.asset} from ${leg.account}`;
    case 'release':
      return `release ${leg.amount} ${leg.asset} to ${leg.account}`;
    case 'transfer':
      return `transfer ${leg.amount} ${leg.asset} ${leg.from} -> ${leg.to}`;
  }
}

function inverseOf(leg: TransferLeg): TransferLeg {
  switch (leg.kind) {
    case 'escrow':
      return { kind: 'release', account: leg.account, amount: leg.amount, asset: leg.asset };
    case 'release':
      return { kind: 'escrow', account: leg.account, amount: leg.amount, asset: leg.asset };
    case 'transfer':
      return { kind: 'transfer', from: leg.to, to: leg.from, amount: leg.amount, asset: leg.asset };
  }
}

/**
 * Wraps the transfer capability with the engine's assets and error codes
 */
export class CollateralLedgerAdapter {
  constructor(
    private readonly ledger: ICollateralTransfer,
    private readonly assets: AssetConfig
  ) {}

  get collateralAsset(): string {
    return this.assets.collateralAsset;
  }

  get settlementAsset(): string {
    return this.assets.settlementAsset;
  }

  get stakeAsset(): string {
    return this.assets.stakeAsset;
  }

  async escrowCollateral(account: string, amount: bigint, orderId: string): Promise<void> {
    const result = await this.ledger.escrow(account, amount, this.assets.collateralAsset);
    if (!result.success) {
      throw new EngineError(
        EngineErrorCode.INSUFFICIENT_COLLATERAL,
        `Could not escrow ${amount} ${this.assets.collateralAsset} for ${account}: ${result.reason}`,
        { operation: 'escrowCollateral', component: 'CollateralLedgerAdapter', actor: account, orderId }
      );
    }
  }

  async releaseCollateral(account: string, amount: bigint, orderId: string): Promise<void> {
    if (amount === 0n) return;

    const result = await this.ledger.release(account, amount, this.assets.collateralAsset);
    if (!result.success) {
      throw new EngineError(
        EngineErrorCode.SETTLEMENT_FAILED,
        `Could not release ${amount} ${this.assets.collateralAsset} to ${account}: ${result.reason}`,
        { operation: 'releaseCollateral', component: 'CollateralLedgerAdapter', actor: account, orderId }
      );
    }
  }

  async escrowStake(account: string, amount: bigint): Promise<void> {
    const result = await this.ledger.escrow(account, amount, this.assets.stakeAsset);
    if (!result.success) {
      throw new EngineError(
        EngineErrorCode.INSUFFICIENT_COLLATERAL,
        `Could not lock ${amount} ${this.assets.stakeAsset} for ${account}: ${result.reason}`,
        { operation: 'escrowStake', component: 'CollateralLedgerAdapter', actor: account }
      );
    }
  }

  async releaseStake(account: string, amount: bigint): Promise<void> {
    const result = await this.ledger.release(account, amount, this.assets.stakeAsset);
    if (!result.success) {
      throw new EngineError(
        EngineErrorCode.SETTLEMENT_FAILED,
        `Could not unlock ${amount} ${this.assets.stakeAsset} for ${account}: ${result.reason}`,
        { operation: 'releaseStake', component: 'CollateralLedgerAdapter', actor: account }
      );
    }
  }

  async payout(from: string, to: string, amount: bigint): Promise<void> {
    const result = await this.ledger.transfer(from, to, amount, this.assets.settlementAsset);
    if (!result.success) {
      throw new EngineError(
        EngineErrorCode.SETTLEMENT_FAILED,
        `Could not transfer ${amount} ${this.assets.settlementAsset} from ${from} to ${to}: ${result.reason}`,
        { operation: 'payout', component: 'CollateralLedgerAdapter', actor: to }
      );
    }
  }

  /**
   * Applies settlement legs as one unit
   */
  async settle(legs: TransferLeg[], orderId: string): Promise<void> {
    const effective = legs.filter(leg => leg.amount > 0n);
    if (effective.length === 0) return;

    const failure = this.ledger.transferBatch
      ? await this.applyBatch(this.ledger.transferBatch.bind(this.ledger), effective)
      : await this.applyWithCompensation(effective);

    if (failure) {
      throw new EngineError(EngineErrorCode.SETTLEMENT_FAILED, `Settlement aborted: ${failure}`, {
        operation: 'settle',
        component: 'CollateralLedgerAdapter',
        orderId,
        metadata: { legs: effective.map(describeLeg) }
      });
    }
  }

  private async applyBatch(
    transferBatch: (legs: TransferLeg[]) => Promise<TransferResult>,
    legs: TransferLeg[]
  ): Promise<string | null> {
    const result = await transferBatch(legs);
    return result.success ? null : result.reason;
  }

  private async applyWithCompensation(legs: TransferLeg[]): Promise<string | null> {
    const applied: TransferLeg[] = [];

    for (const leg of legs) {
      const result = await this.applyLeg(leg);
      if (result.success) {
        applied.push(leg);
        continue;
      }

      for (const done of applied.reverse()) {
        const undo = await this.applyLeg(inverseOf(done));
        if (!undo.success) {
          throw new EngineError(
            EngineErrorCode.INTERNAL_ERROR,
            `Compensation failed for ${describeLeg(done)}: ${undo.reason}`,
            { operation: 'settle', component: 'CollateralLedgerAdapter' }
          );
        }
      }
      return `${describeLeg(leg)} failed: ${result.reason}`;
    }

    return null;
  }

  private applyLeg(leg: TransferLeg): Promise<TransferResult> {
    switch (leg.kind) {
      case 'escrow':
        return this.ledger.escrow(leg.account, leg.amount, leg.asset);
      case 'release':
        return this.ledger.release(leg.account, leg.amount, leg.asset);
      case 'transfer':
        return this.ledger.transfer(leg.from, leg.to, leg.amount, leg.asset);
    }
  }
}
