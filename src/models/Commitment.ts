/**
 * Commit-reveal models
 */

export interface Commitment {
  orderId: string;
  commitHash: string;
  committer: string;
  createdAt: Date;
}

/**
 * Lifecycle view for an order id that only has a commitment so far
 */
export interface CommittedOrderView {
  orderId: string;
  status: 'committed';
  committer: string;
  committedAt: Date;
}
