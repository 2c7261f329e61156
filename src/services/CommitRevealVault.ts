/**
 * Commit-Reveal Vault
 * Holds commitment hashes so order terms stay hidden until reveal. A matching
 * reveal consumes the commitment and creates the order in the same critical
 * section as the commit.
 */

import type { Commitment, CommittedOrderView } from '../models/Commitment';
import type { OrderSnapshot, OrderTerms } from '../models/Order';
import type { ITimeSource } from '../connectors/TimeSource';
import { computeCommitmentHash } from '../connectors/HashProvider';
import type { IHashProvider } from '../connectors/HashProvider';
import type { AuditService } from './AuditService';
import type { OrderStore } from './OrderStore';
import { InputValidator } from '../security/InputValidator';
import { EngineError, EngineErrorCode } from '../utils/ErrorHandler';

export interface CommitRevealOptions {
  commitmentTtlMs: number;
}

export class CommitRevealVault {
  private commitments: Map<string, Commitment> = new Map();
  private readonly validator = new InputValidator();

  constructor(
    private readonly orderStore: OrderStore,
    private readonly hashProvider: IHashProvider,
    private readonly clock: ITimeSource,
    private readonly auditService: AuditService,
    private readonly options: CommitRevealOptions
  ) {
    this.orderStore.addReservationCheck(orderId => this.commitments.has(orderId));
  }

  async commitOrder(orderId: string, commitHash: string, committer: string): Promise<CommittedOrderView> {
    const context = { operation: 'commitOrder', component: 'CommitRevealVault', actor: committer, orderId };
    this.validator.assertValid(
      this.validator.validate({ orderId, commitHash, committer }, [
        this.validator.orderIdRule(),
        {
          field: 'commitHash',
          required: true,
          type: 'string',
          pattern: InputValidator.COMMON_PATTERNS.COMMIT_HASH,
          message: 'Commitment hash must be 64 lowercase hex characters'
        },
        this.validator.identityRule('committer')
      ]),
      context
    );

    return this.orderStore.withOrderLock(orderId, () => {
      if (this.commitments.has(orderId) || this.orderStore.hasOrder(orderId)) {
        throw new EngineError(EngineErrorCode.ALREADY_COMMITTED, `Order id ${orderId} is already committed or in use`, context);
      }

      const commitment: Commitment = {
        orderId,
        commitHash,
        committer,
        createdAt: new Date(this.clock.now())
      };
      this.commitments.set(orderId, commitment);

      this.auditService.logEvent('ORDER_COMMITTED', { commitHash }, committer, orderId);
      return this.toView(commitment);
    });
  }

  /**
   * Opens a commitment. Only a matching reveal consumes it; if the order then
   * fails to be created the commitment stays consumed.
   */
  async revealOrder(orderId: string, revealer: string, terms: OrderTerms, nonce: Uint8Array | string): Promise<OrderSnapshot> {
    return this.orderStore.withOrderLock(orderId, async () => {
      const context = { operation: 'revealOrder', component: 'CommitRevealVault', actor: revealer, orderId };
      const commitment = this.requireCommitment(orderId, context);

      if (commitment.committer !== revealer) {
        throw new EngineError(EngineErrorCode.UNAUTHORIZED, `${revealer} did not commit order ${orderId}`, context);
      }

      let digest: string;
      try {
        digest = computeCommitmentHash(terms, nonce, this.hashProvider);
      } catch (error) {
        throw new EngineError(
          EngineErrorCode.INVALID_PARAMETERS,
          error instanceof Error ? error.message : String(error),
          context,
          error instanceof Error ? error : undefined
        );
      }

      if (digest !== commitment.commitHash) {
        throw new EngineError(EngineErrorCode.HASH_MISMATCH, `Revealed terms do not match the commitment for ${orderId}`, context);
      }

      this.commitments.delete(orderId);
      this.auditService.logEvent('ORDER_REVEALED', { commitHash: commitment.commitHash }, revealer, orderId);

      return this.orderStore.createLocked(revealer, { ...terms, orderId }, 'reveal');
    });
  }

  async revokeCommitment(orderId: string, committer: string): Promise<Commitment> {
    return this.orderStore.withOrderLock(orderId, () => {
      const context = { operation: 'revokeCommitment', component: 'CommitRevealVault', actor: committer, orderId };
      const commitment = this.requireCommitment(orderId, context);

      if (commitment.committer !== committer) {
        throw new EngineError(EngineErrorCode.UNAUTHORIZED, `${committer} did not commit order ${orderId}`, context);
      }

      this.commitments.delete(orderId);
      this.auditService.logEvent('COMMITMENT_REVOKED', { commitHash: commitment.commitHash }, committer, orderId);
      return { ...commitment };
    });
  }

  /**
   * Purges a stale commitment; anyone may call once it has outlived its TTL
   */
  async expireCommitment(orderId: string, caller: string): Promise<Commitment> {
    return this.orderStore.withOrderLock(orderId, () => {
      const context = { operation: 'expireCommitment', component: 'CommitRevealVault', actor: caller, orderId };
      const commitment = this.requireCommitment(orderId, context);

      const expiresAt = commitment.createdAt.getTime() + this.options.commitmentTtlMs;
      if (this.clock.now() < expiresAt) {
        throw new EngineError(
          EngineErrorCode.INVALID_STATE,
          `Commitment for ${orderId} is live until ${new Date(expiresAt).toISOString()}`,
          context
        );
      }

      this.commitments.delete(orderId);
      this.auditService.logEvent('COMMITMENT_EXPIRED', { commitHash: commitment.commitHash, expiresAt }, caller, orderId);
      return { ...commitment };
    });
  }

  getCommitment(orderId: string): CommittedOrderView | null {
    const commitment = this.commitments.get(orderId);
    return commitment ? this.toView(commitment) : null;
  }

  get liveCommitments(): number {
    return this.commitments.size;
  }

  private requireCommitment(orderId: string, context: { operation: string; component: string; actor?: string; orderId?: string }): Commitment {
    const commitment = this.commitments.get(orderId);
    if (!commitment) {
      throw new EngineError(EngineErrorCode.INVALID_STATE, `No live commitment for ${orderId}`, context);
    }
    return commitment;
  }

  private toView(commitment: Commitment): CommittedOrderView {
    return {
      orderId: commitment.orderId,
      status: 'committed',
      committer: commitment.committer,
      committedAt: commitment.createdAt
    };
  }
}
