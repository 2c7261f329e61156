/**
 * Audit event and logging models
 */

export type AuditEventType =
  | 'ORDER_CREATED'
  | 'ORDER_FILLED'
  | 'ORDER_CANCELLED'
  | 'ORDER_EXPIRED'
  | 'ORDER_APPROVED'
  | 'ORDER_COMMITTED'
  | 'ORDER_REVEALED'
  | 'COMMITMENT_REVOKED'
  | 'COMMITMENT_EXPIRED'
  | 'STAKE_CHANGED'
  | 'TREASURY_WITHDRAWN'
  | 'FEE_UPDATED'
  | 'OPERATION_REJECTED';

export type AuditValue = string | number | boolean | null | undefined | AuditValue[] | { [key: string]: AuditValue };

export interface AuditEvent {
  eventId: string;
  timestamp: Date;
  eventType: AuditEventType;
  actor?: string;
  orderId?: string;
  details: Record<string, AuditValue>;
  signature: string;
}
