import { createHmac, randomBytes } from 'crypto';
import type { AuditEvent, AuditEventType, AuditValue } from '../models/AuditEvent';
import { SystemTimeSource } from '../connectors/TimeSource';
import type { ITimeSource } from '../connectors/TimeSource';
import type { LogLevel } from '../config/ConfigurationManager';

export interface AuditFilter {
  eventType?: AuditEventType;
  orderId?: string;
  actor?: string;
  startDate?: Date;
  endDate?: Date;
}

const SENSITIVE_KEYS = ['nonce', 'secret', 'password', 'privatekey', 'credential', 'token'];

const LOG_LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const EVENT_LOG_LEVELS: Record<AuditEventType, LogLevel> = {
  ORDER_CREATED: 'info',
  ORDER_FILLED: 'info',
  ORDER_CANCELLED: 'info',
  ORDER_EXPIRED: 'info',
  ORDER_APPROVED: 'debug',
  ORDER_COMMITTED: 'debug',
  ORDER_REVEALED: 'info',
  COMMITMENT_REVOKED: 'debug',
  COMMITMENT_EXPIRED: 'debug',
  STAKE_CHANGED: 'debug',
  TREASURY_WITHDRAWN: 'info',
  FEE_UPDATED: 'info',
  OPERATION_REJECTED: 'warn'
};

export type LogSink = Pick<Console, LogLevel>;

export interface AuditServiceOptions {
  clock?: ITimeSource;
  /**
   * Events at or above this level are also written to the sink. Unset, nothing is written.
   */
  logLevel?: LogLevel;
  sink?: LogSink;
}

/**
 * Audit Service provides tamper-evident logging of every engine transition
 * and rejection, with HMAC signatures and structured event recording
 */
export class AuditService {
  private auditLog: AuditEvent[] = [];
  private readonly signingKey: Buffer;
  private readonly clock: ITimeSource;
  private readonly logLevel?: LogLevel;
  private readonly sink: LogSink;

  constructor(signingKey?: Buffer, options: AuditServiceOptions = {}) {
    // Use provided key or generate a new one for this session
    this.signingKey = signingKey || randomBytes(32);
    this.clock = options.clock ?? new SystemTimeSource();
    this.logLevel = options.logLevel;
    this.sink = options.sink ?? console;
  }

  /**
   * Records an engine event with a tamper-evident signature
   */
  logEvent(
    eventType: AuditEventType,
    details: Record<string, AuditValue>,
    actor?: string,
    orderId?: string
  ): string {
    const eventId = this.generateEventId();
    const timestamp = new Date(this.clock.now());
    const redactedDetails = this.redactSensitiveData(details);

    const signature = this.generateSignature({
      eventId,
      timestamp,
      eventType,
      actor,
      orderId,
      details: redactedDetails
    });

    // Append-only logging
    this.auditLog.push({
      eventId,
      timestamp,
      eventType,
      actor,
      orderId,
      details: redactedDetails,
      signature
    });
    this.emit(eventType, redactedDetails, actor, orderId);

    return eventId;
  }

  /**
   * Records a rejected operation with its error code
   */
  logRejection(operation: string, code: string, message: string, actor?: string, orderId?: string): string {
    return this.logEvent('OPERATION_REJECTED', { operation, code, message }, actor, orderId);
  }

  /**
   * Exports audit events, optionally filtered
   */
  exportAuditLog(filter: AuditFilter = {}): AuditEvent[] {
    return this.auditLog
      .filter(event => {
        if (filter.eventType && event.eventType !== filter.eventType) return false;
        if (filter.orderId && event.orderId !== filter.orderId) return false;
        if (filter.actor && event.actor !== filter.actor) return false;
        if (filter.startDate && event.timestamp < filter.startDate) return false;
        if (filter.endDate && event.timestamp > filter.endDate) return false;
        return true;
      })
      .map(event => ({ ...event, details: { ...event.details } }));
  }

  /**
   * Verifies the integrity of audit log entries
   */
  verifyLogIntegrity(): boolean {
    return this.auditLog.every(event => {
      const { signature, ...unsigned } = event;
      return signature === this.generateSignature(unsigned);
    });
  }

  /**
   * Gets all audit events (for testing purposes)
   */
  getAllEvents(): AuditEvent[] {
    return [...this.auditLog];
  }

  /**
   * Clears audit log (for testing purposes only)
   */
  clearLog(): void {
    this.auditLog = [];
  }

  private emit(eventType: AuditEventType, details: Record<string, AuditValue>, actor?: string, orderId?: string): void {
    if (!this.logLevel) return;

    const level = EVENT_LOG_LEVELS[eventType];
    if (LOG_LEVEL_RANK[level] < LOG_LEVEL_RANK[this.logLevel]) return;

    this.sink[level](`[${level.toUpperCase()}] ${eventType} actor=${actor ?? '-'} order=${orderId ?? '-'} ${canonicalize(details)}`);
  }

  private generateEventId(): string {
    return randomBytes(16).toString('hex');
  }

  private generateSignature(eventData: Omit<AuditEvent, 'signature'>): string {
    const signingData = {
      eventId: eventData.eventId,
      timestamp: eventData.timestamp.toISOString(),
      eventType: eventData.eventType,
      actor: eventData.actor ?? null,
      orderId: eventData.orderId ?? null,
      details: canonicalize(eventData.details)
    };

    return createHmac('sha256', this.signingKey)
      .update(canonicalize(signingData))
      .digest('hex');
  }

  private redactSensitiveData(data: Record<string, AuditValue>): Record<string, AuditValue> {
    const redacted: Record<string, AuditValue> = {};

    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();

      if (SENSITIVE_KEYS.some(sensitiveKey => lowerKey.includes(sensitiveKey))) {
        redacted[key] = '[REDACTED]';
      } else {
        redacted[key] = this.redactValue(value);
      }
    }

    return redacted;
  }

  private redactValue(value: AuditValue): AuditValue {
    if (Array.isArray(value)) {
      return value.map(item => this.redactValue(item));
    }
    if (typeof value === 'object' && value !== null) {
      return this.redactSensitiveData(value);
    }
    return value;
  }
}

/**
 * Deterministic JSON with sorted keys at every depth
 */
function canonicalize(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(item => canonicalize(item)).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${canonicalize(item)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value ?? null);
}
