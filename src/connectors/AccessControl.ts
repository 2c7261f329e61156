/**
 * Identity and ACL capability
 */

import type { Order } from '../models/Order';

export interface IAccessControlProvider {
  isOrderOwner(identity: string, order: Pick<Order, 'orderId' | 'owner'>): Promise<boolean>;
  isEligibleApprover(orderId: string, approver: string): Promise<boolean>;
  isGovernanceAuthorized(account: string): Promise<boolean>;
}

/**
 * Role tables held in memory: governance accounts, approvers for every
 * order, and approvers scoped to one order.
 */
export class StaticAccessControlProvider implements IAccessControlProvider {
  private governance: Set<string>;
  private globalApprovers: Set<string>;
  private orderApprovers: Map<string, Set<string>> = new Map();

  constructor(options: { governance?: string[]; approvers?: string[] } = {}) {
    this.governance = new Set(options.governance ?? []);
    this.globalApprovers = new Set(options.approvers ?? []);
  }

  async isOrderOwner(identity: string, order: Pick<Order, 'orderId' | 'owner'>): Promise<boolean> {
    return order.owner === identity;
  }

  async isEligibleApprover(orderId: string, approver: string): Promise<boolean> {
    return this.globalApprovers.has(approver) || (this.orderApprovers.get(orderId)?.has(approver) ?? false);
  }

  async isGovernanceAuthorized(account: string): Promise<boolean> {
    return this.governance.has(account);
  }

  grantGovernance(account: string): void {
    this.governance.add(account);
  }

  revokeGovernance(account: string): void {
    this.governance.delete(account);
  }

  grantApprover(orderId: string, ...approvers: string[]): void {
    const set = this.orderApprovers.get(orderId) ?? new Set<string>();
    approvers.forEach(approver => set.add(approver));
    this.orderApprovers.set(orderId, set);
  }

  grantGlobalApprover(approver: string): void {
    this.globalApprovers.add(approver);
  }
}
