/**
 * Order Store & State Machine
 * Owns every order's lifecycle, its escrowed collateral and TTL expiry.
 * All transitions for one order run inside that order's critical section and
 * commit through a version compare-and-swap.
 */

import { randomBytes } from 'crypto';
import {
  CANCELLABLE_STATUSES,
  canTransition,
  escrowedCollateral,
  isTerminal,
  toOrderSnapshot
} from '../models/Order';
import type { Fill, Order, OrderOrigin, OrderSnapshot, OrderStatus, OrderTerms } from '../models/Order';
import type { CollateralLedgerAdapter } from '../connectors/CollateralLedger';
import type { IAccessControlProvider } from '../connectors/AccessControl';
import type { ITimeSource } from '../connectors/TimeSource';
import type { AuditService } from './AuditService';
import type { StakingRegistry } from './StakingRegistry';
import { InputValidator } from '../security/InputValidator';
import { EngineError, EngineErrorCode } from '../utils/ErrorHandler';
import { KeyedMutex } from '../utils/KeyedMutex';

export interface CreateOrderParams extends OrderTerms {
  orderId?: string;
}

export interface OrderFilter {
  owner?: string;
  status?: OrderStatus | OrderStatus[];
}

export interface OrderStoreOptions {
  maxMultisigThreshold: number;
}

type ReservationCheck = (orderId: string) => boolean;

export class OrderStore {
  private orders: Map<string, Order> = new Map();
  private reservationChecks: ReservationCheck[] = [];
  private readonly locks = new KeyedMutex();
  private readonly validator = new InputValidator();

  constructor(
    private readonly ledger: CollateralLedgerAdapter,
    private readonly clock: ITimeSource,
    private readonly acl: IAccessControlProvider,
    private readonly auditService: AuditService,
    private readonly options: OrderStoreOptions,
    private readonly stakingRegistry?: StakingRegistry
  ) {}

  /**
   * Runs a task inside the order's critical section
   */
  withOrderLock<T>(orderId: string, task: () => Promise<T> | T): Promise<T> {
    return this.locks.runExclusive(orderId, task);
  }

  /**
   * Order ids claimed elsewhere (live commitments) cannot be used for direct creation
   */
  addReservationCheck(check: ReservationCheck): void {
    this.reservationChecks.push(check);
  }

  async createOrder(owner: string, params: CreateOrderParams): Promise<OrderSnapshot> {
    const orderId = params.orderId ?? this.generateOrderId();
    return this.withOrderLock(orderId, () => this.createLocked(owner, { ...params, orderId }, 'direct'));
  }

  /**
   * Creation for callers already holding the order's critical section
   */
  async createLocked(owner: string, params: CreateOrderParams & { orderId: string }, origin: OrderOrigin): Promise<OrderSnapshot> {
    const context = { operation: 'createOrder', component: 'OrderStore', actor: owner, orderId: params.orderId };
    const now = this.clock.now();

    this.validator.assertValid(
      this.validator.validateOrderTerms(
        {
          owner,
          orderId: params.orderId,
          price: params.price,
          quantity: params.quantity,
          ttl: params.ttl,
          isMultisig: params.isMultisig,
          threshold: params.threshold
        },
        now,
        this.options.maxMultisigThreshold
      ),
      context
    );

    if (this.orders.has(params.orderId)) {
      throw new EngineError(EngineErrorCode.INVALID_PARAMETERS, `Order id ${params.orderId} is already in use`, context);
    }
    if (origin === 'direct' && this.reservationChecks.some(check => check(params.orderId))) {
      throw new EngineError(EngineErrorCode.INVALID_PARAMETERS, `Order id ${params.orderId} has a live commitment`, context);
    }

    const collateral = params.price * params.quantity;
    await this.ledger.escrowCollateral(owner, collateral, params.orderId);

    const createdAt = new Date(now);
    const order: Order = {
      orderId: params.orderId,
      owner,
      price: params.price,
      quantity: params.quantity,
      remainingQuantity: params.quantity,
      ttl: params.ttl,
      status: params.isMultisig ? 'pending_approval' : 'open',
      requiresMultisig: params.isMultisig,
      multisigThreshold: params.isMultisig ? params.threshold : 0,
      priority: this.stakingRegistry?.getStakeTier(owner).priorityWeight ?? 0,
      origin,
      version: 1,
      createdAt,
      updatedAt: createdAt,
      fills: []
    };
    this.orders.set(order.orderId, order);

    this.auditService.logEvent(
      'ORDER_CREATED',
      {
        price: order.price.toString(),
        quantity: order.quantity.toString(),
        ttl: order.ttl,
        status: order.status,
        multisigThreshold: order.multisigThreshold,
        escrowed: collateral.toString(),
        origin
      },
      owner,
      order.orderId
    );

    return toOrderSnapshot(order);
  }

  async cancelOrder(orderId: string, caller: string): Promise<OrderSnapshot> {
    return this.withOrderLock(orderId, async () => {
      const context = { operation: 'cancelOrder', component: 'OrderStore', actor: caller, orderId };
      const order = this.requireOrder(orderId, context);
      const version = order.version;

      if (!(await this.acl.isOrderOwner(caller, order))) {
        throw new EngineError(EngineErrorCode.UNAUTHORIZED, `${caller} does not own order ${orderId}`, context);
      }
      if (!CANCELLABLE_STATUSES.includes(order.status)) {
        throw new EngineError(EngineErrorCode.INVALID_STATE, `Cannot cancel order in status: ${order.status}`, context);
      }

      this.expectVersion(orderId, version, context);
      const released = escrowedCollateral(order);
      await this.ledger.releaseCollateral(order.owner, released, orderId);

      const cancelled = this.commit(orderId, version, 'cancelled', {}, context);
      this.auditService.logEvent(
        'ORDER_CANCELLED',
        { released: released.toString(), remainingQuantity: cancelled.remainingQuantity.toString() },
        caller,
        orderId
      );
      return toOrderSnapshot(cancelled);
    });
  }

  /**
   * Permissionless once the deadline has passed
   */
  async expireOrder(orderId: string, caller: string): Promise<OrderSnapshot> {
    return this.withOrderLock(orderId, async () => {
      const context = { operation: 'expireOrder', component: 'OrderStore', actor: caller, orderId };
      const order = this.requireOrder(orderId, context);
      const version = order.version;

      if (isTerminal(order.status)) {
        throw new EngineError(EngineErrorCode.INVALID_STATE, `Order ${orderId} is already ${order.status}`, context);
      }
      const now = this.clock.now();
      if (now < order.ttl) {
        throw new EngineError(
          EngineErrorCode.INVALID_STATE,
          `Order ${orderId} does not expire until ${new Date(order.ttl).toISOString()}`,
          context
        );
      }

      const released = escrowedCollateral(order);
      await this.ledger.releaseCollateral(order.owner, released, orderId);

      const expired = this.commit(orderId, version, 'expired', {}, context);
      this.auditService.logEvent(
        'ORDER_EXPIRED',
        { released: released.toString(), ttl: order.ttl, expiredAt: now },
        caller,
        orderId
      );
      return toOrderSnapshot(expired);
    });
  }

  /**
   * Moves a pending multisig order to open. Caller holds the order lock.
   */
  activateLocked(orderId: string, expectedVersion: number): Order {
    return this.commit(orderId, expectedVersion, 'open', {}, {
      operation: 'approveOrder',
      component: 'OrderStore',
      orderId
    });
  }

  /**
   * Records a settled fill. Caller holds the order lock.
   */
  applyFillLocked(orderId: string, expectedVersion: number, fill: Fill): Order {
    const context = { operation: 'fillOrder', component: 'OrderStore', actor: fill.taker, orderId };
    const order = this.requireOrder(orderId, context);
    const remainingQuantity = order.remainingQuantity - fill.quantity;
    if (remainingQuantity < 0n) {
      throw new EngineError(EngineErrorCode.OVER_FILL, `Fill of ${fill.quantity} exceeds remaining ${order.remainingQuantity}`, context);
    }

    return this.commit(orderId, expectedVersion, remainingQuantity === 0n ? 'filled' : 'partially_filled', {
      remainingQuantity,
      fills: [...order.fills, fill]
    }, context);
  }

  /**
   * Live order record for callers holding the order lock
   */
  peekLocked(orderId: string): Order | undefined {
    return this.orders.get(orderId);
  }

  getOrder(orderId: string): OrderSnapshot | null {
    const order = this.orders.get(orderId);
    return order ? toOrderSnapshot(order) : null;
  }

  hasOrder(orderId: string): boolean {
    return this.orders.has(orderId);
  }

  listOrders(filter: OrderFilter = {}): OrderSnapshot[] {
    const statuses: OrderStatus[] | undefined =
      filter.status === undefined ? undefined : Array.isArray(filter.status) ? filter.status : [filter.status];

    return Array.from(this.orders.values())
      .filter(order => !filter.owner || order.owner === filter.owner)
      .filter(order => !statuses || statuses.includes(order.status))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(toOrderSnapshot);
  }

  /**
   * Collateral still escrowed across all live orders
   */
  totalEscrowed(): bigint {
    let total = 0n;
    for (const order of this.orders.values()) {
      total += escrowedCollateral(order);
    }
    return total;
  }

  expectVersion(orderId: string, expectedVersion: number, context: { operation: string; component: string; orderId?: string }): void {
    const current = this.orders.get(orderId);
    if (!current || current.version !== expectedVersion) {
      throw new EngineError(
        EngineErrorCode.VERSION_CONFLICT,
        `Order ${orderId} changed (expected version ${expectedVersion}, found ${current?.version ?? 'none'})`,
        context
      );
    }
  }

  requireOrder(orderId: string, context: { operation: string; component: string; actor?: string; orderId?: string }): Order {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new EngineError(EngineErrorCode.INVALID_STATE, `Order not found: ${orderId}`, context);
    }
    return order;
  }

  private commit(
    orderId: string,
    expectedVersion: number,
    to: OrderStatus,
    changes: Partial<Pick<Order, 'remainingQuantity' | 'fills'>>,
    context: { operation: string; component: string; actor?: string; orderId?: string }
  ): Order {
    this.expectVersion(orderId, expectedVersion, context);
    const current = this.requireOrder(orderId, context);

    if (!canTransition(current.status, to)) {
      throw new EngineError(EngineErrorCode.INVALID_STATE, `Invalid transition ${current.status} -> ${to}`, context);
    }

    const next: Order = {
      ...current,
      ...changes,
      status: to,
      version: current.version + 1,
      updatedAt: new Date(this.clock.now())
    };
    this.orders.set(orderId, next);
    return next;
  }

  private generateOrderId(): string {
    return `order_${Date.now()}_${randomBytes(6).toString('hex')}`;
  }
}
