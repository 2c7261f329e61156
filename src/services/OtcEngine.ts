/**
 * OTC Engine
 * Wires the order store, commit-reveal vault, multisig gate, staking registry,
 * matching engine and treasury over the host's capabilities, and exposes
 * every operation as an OperationResult.
 */

import type { CommittedOrderView, Commitment } from '../models/Commitment';
import type { OrderSnapshot, OrderTerms } from '../models/Order';
import type { StakePosition } from '../models/StakePosition';
import type { TreasuryAccount } from '../models/Treasury';
import { CollateralLedgerAdapter } from '../connectors/CollateralLedger';
import type { ICollateralTransfer } from '../connectors/CollateralLedger';
import type { IAccessControlProvider } from '../connectors/AccessControl';
import { Sha256HashProvider } from '../connectors/HashProvider';
import type { IHashProvider } from '../connectors/HashProvider';
import { SystemTimeSource } from '../connectors/TimeSource';
import type { ITimeSource } from '../connectors/TimeSource';
import type { ConfigurationManager, EngineConfig } from '../config/ConfigurationManager';
import { EngineError, EngineErrorCode, ErrorHandler } from '../utils/ErrorHandler';
import type { OperationResult } from '../utils/ErrorHandler';
import { AuditService } from './AuditService';
import { CommitRevealVault } from './CommitRevealVault';
import { MatchingEngine } from './MatchingEngine';
import type { FillReceipt } from './MatchingEngine';
import { MultisigGate } from './MultisigGate';
import type { ApprovalOutcome } from './MultisigGate';
import { OrderStore } from './OrderStore';
import type { CreateOrderParams, OrderFilter } from './OrderStore';
import { StakingRegistry } from './StakingRegistry';
import { TreasuryService } from './TreasuryService';

export interface OtcEngineDependencies {
  ledger: ICollateralTransfer;
  accessControl: IAccessControlProvider;
  clock?: ITimeSource;
  hashProvider?: IHashProvider;
  auditService?: AuditService;
  errorHandler?: ErrorHandler;
}

export type OrderView = OrderSnapshot | CommittedOrderView;

export class OtcEngine {
  readonly auditService: AuditService;
  readonly orderStore: OrderStore;
  readonly vault: CommitRevealVault;
  readonly multisigGate: MultisigGate;
  readonly stakingRegistry: StakingRegistry;
  readonly matchingEngine: MatchingEngine;
  readonly treasury: TreasuryService;
  private readonly errorHandler: ErrorHandler;
  private readonly config: EngineConfig;

  constructor(config: EngineConfig, dependencies: OtcEngineDependencies) {
    this.config = config;
    const clock = dependencies.clock ?? new SystemTimeSource();
    const ledger = new CollateralLedgerAdapter(dependencies.ledger, config.assets);
    const acl = dependencies.accessControl;

    this.auditService = dependencies.auditService ?? new AuditService(undefined, { clock, logLevel: config.logLevel });
    this.errorHandler = dependencies.errorHandler ?? new ErrorHandler(config.matching.maxVersionRetries);

    this.stakingRegistry = new StakingRegistry(ledger, clock, this.auditService, config.staking.tiers);
    this.orderStore = new OrderStore(
      ledger,
      clock,
      acl,
      this.auditService,
      { maxMultisigThreshold: config.orders.maxMultisigThreshold },
      this.stakingRegistry
    );
    this.vault = new CommitRevealVault(
      this.orderStore,
      dependencies.hashProvider ?? new Sha256HashProvider(),
      clock,
      this.auditService,
      { commitmentTtlMs: config.orders.commitmentTtlMs }
    );
    this.multisigGate = new MultisigGate(this.orderStore, acl, clock, this.auditService);
    this.treasury = new TreasuryService(ledger, config.accounts.treasury, acl, clock, this.auditService, config.fees);
    this.matchingEngine = new MatchingEngine(
      this.orderStore,
      this.stakingRegistry,
      this.treasury,
      ledger,
      clock,
      this.auditService,
      {
        admissionWindowMs: config.matching.admissionWindowMs,
        fillRewardBps: config.rewards.fillRewardBps,
        rewardsAccount: config.accounts.rewards
      }
    );
  }

  /**
   * Builds an engine from a loaded and validated configuration
   */
  static async fromConfiguration(configManager: ConfigurationManager, dependencies: OtcEngineDependencies): Promise<OtcEngine> {
    const config = await configManager.loadConfiguration();
    return new OtcEngine(config, dependencies);
  }

  getConfiguration(): EngineConfig {
    return this.config;
  }

  createOrder(owner: string, params: CreateOrderParams): Promise<OperationResult<OrderSnapshot>> {
    return this.run('createOrder', owner, params.orderId, () => this.orderStore.createOrder(owner, params));
  }

  fillOrder(orderId: string, taker: string, quantity: bigint): Promise<OperationResult<FillReceipt>> {
    return this.run('fillOrder', taker, orderId, () => this.matchingEngine.fillOrder(orderId, taker, quantity));
  }

  cancelOrder(orderId: string, caller: string): Promise<OperationResult<OrderSnapshot>> {
    return this.run('cancelOrder', caller, orderId, () => this.orderStore.cancelOrder(orderId, caller));
  }

  expireOrder(orderId: string, caller: string): Promise<OperationResult<OrderSnapshot>> {
    return this.run('expireOrder', caller, orderId, () => this.orderStore.expireOrder(orderId, caller));
  }

  approveOrder(orderId: string, approver: string): Promise<OperationResult<ApprovalOutcome>> {
    return this.run('approveOrder', approver, orderId, () => this.multisigGate.approveOrder(orderId, approver));
  }

  stakeTokens(trader: string, amount: bigint): Promise<OperationResult<StakePosition>> {
    return this.run('stakeTokens', trader, undefined, () => this.stakingRegistry.stakeTokens(trader, amount));
  }

  withdrawStake(trader: string, amount: bigint): Promise<OperationResult<StakePosition>> {
    return this.run('withdrawStake', trader, undefined, () => this.stakingRegistry.withdrawStake(trader, amount));
  }

  getStakeTier(trader: string): Promise<OperationResult<StakePosition>> {
    return this.run('getStakeTier', trader, undefined, async () => this.stakingRegistry.getStakeTier(trader));
  }

  commitOrder(orderId: string, commitHash: string, committer: string): Promise<OperationResult<CommittedOrderView>> {
    return this.run('commitOrder', committer, orderId, () => this.vault.commitOrder(orderId, commitHash, committer));
  }

  revealOrder(
    orderId: string,
    revealer: string,
    terms: OrderTerms,
    nonce: Uint8Array | string
  ): Promise<OperationResult<OrderSnapshot>> {
    return this.run('revealOrder', revealer, orderId, () => this.vault.revealOrder(orderId, revealer, terms, nonce));
  }

  revokeCommitment(orderId: string, committer: string): Promise<OperationResult<Commitment>> {
    return this.run('revokeCommitment', committer, orderId, () => this.vault.revokeCommitment(orderId, committer));
  }

  expireCommitment(orderId: string, caller: string): Promise<OperationResult<Commitment>> {
    return this.run('expireCommitment', caller, orderId, () => this.vault.expireCommitment(orderId, caller));
  }

  withdrawTreasury(amount: bigint, governanceAccount: string): Promise<OperationResult<TreasuryAccount>> {
    return this.run('withdrawTreasury', governanceAccount, undefined, () =>
      this.treasury.withdrawTreasury(amount, governanceAccount)
    );
  }

  updateFeePercentage(newFeeBps: number, governanceAccount: string): Promise<OperationResult<TreasuryAccount>> {
    return this.run('updateFeePercentage', governanceAccount, undefined, () =>
      this.treasury.updateFeePercentage(newFeeBps, governanceAccount)
    );
  }

  /**
   * Order snapshot, or the committed view while only a commitment exists
   */
  getOrder(orderId: string): Promise<OperationResult<OrderView>> {
    return this.run('getOrder', undefined, orderId, async () => {
      const view = this.orderStore.getOrder(orderId) ?? this.vault.getCommitment(orderId);
      if (!view) {
        throw new EngineError(EngineErrorCode.INVALID_STATE, `Order not found: ${orderId}`, {
          operation: 'getOrder',
          component: 'OtcEngine',
          orderId
        });
      }
      return view;
    });
  }

  listOrders(filter: OrderFilter = {}): Promise<OperationResult<OrderSnapshot[]>> {
    return this.run('listOrders', filter.owner, undefined, async () => this.orderStore.listOrders(filter));
  }

  getTreasury(): Promise<OperationResult<TreasuryAccount>> {
    return this.run('getTreasury', undefined, undefined, async () => this.treasury.getTreasury());
  }

  private async run<T>(
    operation: string,
    actor: string | undefined,
    orderId: string | undefined,
    task: () => Promise<T>
  ): Promise<OperationResult<T>> {
    const outcome = await this.errorHandler.handleError(task, {
      operation,
      component: 'OtcEngine',
      actor,
      orderId,
      timestamp: new Date()
    });

    if (!outcome.success) {
      this.auditService.logRejection(operation, outcome.error.code, outcome.error.message, actor, orderId);
    }
    return outcome;
  }
}
