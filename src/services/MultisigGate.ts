/**
 * Multisig Gate
 * Collects distinct approvals for orders created with a multisig threshold and
 * opens the order once the threshold is met
 */

import type { MultisigApproval } from '../models/MultisigApproval';
import type { OrderSnapshot } from '../models/Order';
import { toOrderSnapshot } from '../models/Order';
import type { IAccessControlProvider } from '../connectors/AccessControl';
import type { ITimeSource } from '../connectors/TimeSource';
import type { AuditService } from './AuditService';
import type { OrderStore } from './OrderStore';
import { InputValidator } from '../security/InputValidator';
import { EngineError, EngineErrorCode } from '../utils/ErrorHandler';

export interface ApprovalOutcome {
  order: OrderSnapshot;
  approval: MultisigApproval;
  duplicate: boolean;
}

export class MultisigGate {
  private approvals: Map<string, MultisigApproval> = new Map();
  private readonly validator = new InputValidator();

  constructor(
    private readonly orderStore: OrderStore,
    private readonly acl: IAccessControlProvider,
    private readonly clock: ITimeSource,
    private readonly auditService: AuditService
  ) {}

  async approveOrder(orderId: string, approver: string): Promise<ApprovalOutcome> {
    const context = { operation: 'approveOrder', component: 'MultisigGate', actor: approver, orderId };
    this.validator.assertValid(
      this.validator.validate({ orderId, approver }, [this.validator.orderIdRule(), this.validator.identityRule('approver')]),
      context
    );

    return this.orderStore.withOrderLock(orderId, async () => {
      const order = this.orderStore.requireOrder(orderId, context);
      const version = order.version;

      if (order.status !== 'pending_approval') {
        throw new EngineError(EngineErrorCode.INVALID_STATE, `Order ${orderId} is ${order.status}, not awaiting approval`, context);
      }
      if (!(await this.acl.isEligibleApprover(orderId, approver))) {
        throw new EngineError(EngineErrorCode.UNAUTHORIZED, `${approver} is not an approver for ${orderId}`, context);
      }

      // Approval sets are created on first use, from the order's own threshold
      const approval = this.approvals.get(orderId) ?? {
        orderId,
        threshold: order.multisigThreshold,
        approvers: [],
        satisfiedAt: null
      };

      if (approval.approvers.includes(approver)) {
        return { order: toOrderSnapshot(order), approval: this.copy(approval), duplicate: true };
      }

      const next: MultisigApproval = { ...approval, approvers: [...approval.approvers, approver] };
      const satisfied = next.approvers.length >= next.threshold;
      const current = satisfied ? this.orderStore.activateLocked(orderId, version) : order;
      if (satisfied) {
        next.satisfiedAt = new Date(this.clock.now());
      }
      this.approvals.set(orderId, next);

      this.auditService.logEvent(
        'ORDER_APPROVED',
        { approvals: next.approvers.length, threshold: next.threshold, opened: satisfied },
        approver,
        orderId
      );

      return { order: toOrderSnapshot(current), approval: this.copy(next), duplicate: false };
    });
  }

  getApproval(orderId: string): MultisigApproval | null {
    const approval = this.approvals.get(orderId);
    return approval ? this.copy(approval) : null;
  }

  private copy(approval: MultisigApproval): MultisigApproval {
    return { ...approval, approvers: [...approval.approvers] };
  }
}
