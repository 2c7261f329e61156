/**
 * Matching & Settlement Engine
 * Admits taker fills against a maker order by stake tier, then settles each
 * one as a single all-or-nothing batch of ledger legs.
 */

import { FILLABLE_STATUSES, toOrderSnapshot } from '../models/Order';
import type { Fill, OrderSnapshot } from '../models/Order';
import type { CollateralLedgerAdapter, TransferLeg } from '../connectors/CollateralLedger';
import type { ITimeSource } from '../connectors/TimeSource';
import type { AuditService } from './AuditService';
import type { OrderStore } from './OrderStore';
import type { StakingRegistry } from './StakingRegistry';
import type { TreasuryService } from './TreasuryService';
import { InputValidator } from '../security/InputValidator';
import { EngineError, EngineErrorCode } from '../utils/ErrorHandler';
import { bpsOf, computeFees } from '../utils/feeMath';

export interface FillReceipt {
  order: OrderSnapshot;
  fill: Fill;
}

export interface MatchingOptions {
  admissionWindowMs: number;
  fillRewardBps: number;
  rewardsAccount: string;
}

interface PendingFill {
  orderId: string;
  taker: string;
  quantity: bigint;
  priorityWeight: number;
  sequence: number;
  resolve: (receipt: FillReceipt) => void;
  reject: (error: unknown) => void;
}

/**
 * Higher tier weight first, then earlier arrival
 */
export function compareAdmission(a: Pick<PendingFill, 'priorityWeight' | 'sequence'>, b: Pick<PendingFill, 'priorityWeight' | 'sequence'>): number {
  return b.priorityWeight - a.priorityWeight || a.sequence - b.sequence;
}

export class MatchingEngine {
  private queues: Map<string, PendingFill[]> = new Map();
  private sequence = 0;
  private readonly validator = new InputValidator();

  constructor(
    private readonly orderStore: OrderStore,
    private readonly stakingRegistry: StakingRegistry,
    private readonly treasury: TreasuryService,
    private readonly ledger: CollateralLedgerAdapter,
    private readonly clock: ITimeSource,
    private readonly auditService: AuditService,
    private readonly options: MatchingOptions
  ) {}

  /**
   * Queues a fill for the order's next admission round
   */
  async fillOrder(orderId: string, taker: string, quantity: bigint): Promise<FillReceipt> {
    this.validator.assertValid(
      this.validator.validate({ orderId, taker, quantity }, [
        this.validator.orderIdRule(),
        this.validator.identityRule('taker'),
        this.validator.positiveAmountRule('quantity')
      ]),
      { operation: 'fillOrder', component: 'MatchingEngine', actor: taker, orderId }
    );

    const priorityWeight = this.stakingRegistry.getStakeTier(taker).priorityWeight;

    return new Promise<FillReceipt>((resolve, reject) => {
      const queue = this.queues.get(orderId);
      const request: PendingFill = {
        orderId,
        taker,
        quantity,
        priorityWeight,
        sequence: this.sequence++,
        resolve,
        reject
      };

      if (queue) {
        queue.push(request);
        return;
      }

      this.queues.set(orderId, [request]);
      setTimeout(() => {
        void this.drain(orderId);
      }, this.options.admissionWindowMs);
    });
  }

  private async drain(orderId: string): Promise<void> {
    const batch = (this.queues.get(orderId) ?? []).sort(compareAdmission);
    this.queues.delete(orderId);

    // One lock for the whole round: a later round queues behind all of it
    await this.orderStore.withOrderLock(orderId, async () => {
      for (const request of batch) {
        try {
          request.resolve(await this.settleLocked(request));
        } catch (error) {
          request.reject(error);
        }
      }
    });
  }

  private async settleLocked(request: PendingFill): Promise<FillReceipt> {
    const { orderId, taker, quantity } = request;
    const context = { operation: 'fillOrder', component: 'MatchingEngine', actor: taker, orderId };
    const order = this.orderStore.requireOrder(orderId, context);
    const version = order.version;

    if (taker === order.owner) {
      throw new EngineError(EngineErrorCode.INVALID_PARAMETERS, 'Order owner cannot fill its own order', context);
    }
    // A filled order has nothing left, which reports as an over-fill below
    if (!FILLABLE_STATUSES.includes(order.status) && order.status !== 'filled') {
      throw new EngineError(EngineErrorCode.INVALID_STATE, `Cannot fill order in status: ${order.status}`, context);
    }
    const now = this.clock.now();
    if (now >= order.ttl) {
      throw new EngineError(EngineErrorCode.INVALID_STATE, `Order ${orderId} passed its deadline`, context);
    }
    if (quantity > order.remainingQuantity) {
      throw new EngineError(
        EngineErrorCode.OVER_FILL,
        `Fill of ${quantity} exceeds remaining quantity ${order.remainingQuantity}`,
        context
      );
    }

    const takerPosition = this.stakingRegistry.getStakeTier(taker);
    const policy = this.treasury.getFeePolicy();
    const fees = computeFees(order.price * quantity, policy.feeBps, takerPosition.feeDiscountBps, policy.makerRebateBps);
    const reward = bpsOf(quantity, this.options.fillRewardBps);

    const legs: TransferLeg[] = [
      { kind: 'release', account: order.owner, amount: fees.settlementAmount, asset: this.ledger.collateralAsset },
      { kind: 'transfer', from: order.owner, to: taker, amount: fees.settlementAmount, asset: this.ledger.collateralAsset },
      {
        kind: 'transfer',
        from: taker,
        to: order.owner,
        amount: fees.settlementAmount + fees.makerRebate,
        asset: this.ledger.settlementAsset
      },
      { kind: 'transfer', from: taker, to: this.treasury.accountId, amount: fees.treasuryFee, asset: this.ledger.settlementAsset },
      { kind: 'transfer', from: this.options.rewardsAccount, to: taker, amount: reward, asset: this.ledger.stakeAsset }
    ];

    this.orderStore.expectVersion(orderId, version, context);
    await this.ledger.settle(legs, orderId);

    const fill: Fill = {
      fillId: `${orderId}-fill-${order.fills.length + 1}`,
      taker,
      quantity,
      price: order.price,
      settlementAmount: fees.settlementAmount,
      takerFee: fees.takerFee,
      makerRebate: fees.makerRebate,
      treasuryFee: fees.treasuryFee,
      reward,
      takerTier: takerPosition.tier,
      remainingAfter: order.remainingQuantity - quantity,
      timestamp: new Date(now)
    };
    const updated = this.orderStore.applyFillLocked(orderId, version, fill);
    await this.treasury.credit(fees.treasuryFee);

    this.auditService.logEvent(
      'ORDER_FILLED',
      {
        fillId: fill.fillId,
        quantity: quantity.toString(),
        settlementAmount: fees.settlementAmount.toString(),
        takerFee: fees.takerFee.toString(),
        makerRebate: fees.makerRebate.toString(),
        treasuryFee: fees.treasuryFee.toString(),
        reward: reward.toString(),
        takerTier: takerPosition.tier,
        remainingQuantity: updated.remainingQuantity.toString(),
        status: updated.status
      },
      taker,
      orderId
    );

    return { order: toOrderSnapshot(updated), fill };
  }
}
