/**
 * Order lifecycle models
 */

export type OrderStatus =
  | 'committed'
  | 'open'
  | 'pending_approval'
  | 'partially_filled'
  | 'filled'
  | 'cancelled'
  | 'expired';

export type OrderOrigin = 'direct' | 'reveal';

export interface Fill {
  fillId: string;
  taker: string;
  quantity: bigint;
  price: bigint;
  settlementAmount: bigint;
  takerFee: bigint;
  makerRebate: bigint;
  treasuryFee: bigint;
  /** Stake-asset reward paid to the taker */
  reward: bigint;
  takerTier: string;
  remainingAfter: bigint;
  timestamp: Date;
}

export interface Order {
  orderId: string;
  owner: string;
  price: bigint;
  quantity: bigint;
  remainingQuantity: bigint;
  ttl: number;
  status: OrderStatus;
  requiresMultisig: boolean;
  multisigThreshold: number;
  priority: number;
  origin: OrderOrigin;
  version: number;
  createdAt: Date;
  updatedAt: Date;
  fills: Fill[];
}

export interface OrderSnapshot extends Readonly<Omit<Order, 'fills'>> {
  escrowedCollateral: bigint;
  fills: readonly Fill[];
}

/**
 * Terms that commit-reveal hides and that create_order takes
 */
export interface OrderTerms {
  price: bigint;
  quantity: bigint;
  ttl: number;
  isMultisig: boolean;
  threshold: number;
}

export const TERMINAL_STATUSES: readonly OrderStatus[] = ['filled', 'cancelled', 'expired'];

export const FILLABLE_STATUSES: readonly OrderStatus[] = ['open', 'partially_filled'];

export const CANCELLABLE_STATUSES: readonly OrderStatus[] = ['open', 'partially_filled', 'pending_approval'];

export const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  committed: ['open', 'pending_approval'],
  pending_approval: ['open', 'cancelled', 'expired'],
  open: ['partially_filled', 'filled', 'cancelled', 'expired'],
  partially_filled: ['partially_filled', 'filled', 'cancelled', 'expired'],
  filled: [],
  cancelled: [],
  expired: []
};

export function isTerminal(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

/**
 * Collateral still held for an order: price x remaining while live, zero once terminal
 */
export function escrowedCollateral(order: Pick<Order, 'price' | 'remainingQuantity' | 'status'>): bigint {
  return isTerminal(order.status) ? 0n : order.price * order.remainingQuantity;
}

export function toOrderSnapshot(order: Order): OrderSnapshot {
  return {
    ...order,
    escrowedCollateral: escrowedCollateral(order),
    fills: order.fills.map(fill => ({ ...fill }))
  };
}
