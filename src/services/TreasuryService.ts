/**
 * Treasury & Fee Policy
 * Accumulates net taker fees and governs the fee rate. Every writer runs
 * through one critical section.
 */

import type { TreasuryAccount } from '../models/Treasury';
import type { CollateralLedgerAdapter } from '../connectors/CollateralLedger';
import type { IAccessControlProvider } from '../connectors/AccessControl';
import type { ITimeSource } from '../connectors/TimeSource';
import type { FeeConfig } from '../config/ConfigurationManager';
import type { AuditService } from './AuditService';
import { InputValidator } from '../security/InputValidator';
import { EngineError, EngineErrorCode } from '../utils/ErrorHandler';
import { KeyedMutex } from '../utils/KeyedMutex';

const TREASURY_KEY = 'treasury';

export interface FeePolicy {
  feeBps: number;
  makerRebateBps: number;
}

export class TreasuryService {
  private account: TreasuryAccount;
  private readonly maxFeeBps: number;
  private readonly makerRebateBps: number;
  private readonly locks = new KeyedMutex();
  private readonly validator = new InputValidator();

  constructor(
    private readonly ledger: CollateralLedgerAdapter,
    private readonly treasuryAccount: string,
    private readonly acl: IAccessControlProvider,
    private readonly clock: ITimeSource,
    private readonly auditService: AuditService,
    fees: FeeConfig
  ) {
    this.maxFeeBps = fees.maxFeeBps;
    this.makerRebateBps = fees.makerRebateBps;
    this.account = {
      balance: 0n,
      feeBps: fees.feeBps,
      totalCollected: 0n,
      totalWithdrawn: 0n,
      updatedAt: new Date(clock.now())
    };
  }

  get accountId(): string {
    return this.treasuryAccount;
  }

  /**
   * Fee rate in force for the next settlement
   */
  getFeePolicy(): FeePolicy {
    return { feeBps: this.account.feeBps, makerRebateBps: this.makerRebateBps };
  }

  getTreasury(): TreasuryAccount {
    return { ...this.account };
  }

  /**
   * Books a net fee the settlement already moved into the treasury account
   */
  async credit(amount: bigint): Promise<TreasuryAccount> {
    if (amount === 0n) return this.getTreasury();

    return this.locks.runExclusive(TREASURY_KEY, () => {
      this.account = {
        ...this.account,
        balance: this.account.balance + amount,
        totalCollected: this.account.totalCollected + amount,
        updatedAt: new Date(this.clock.now())
      };
      return this.getTreasury();
    });
  }

  async withdrawTreasury(amount: bigint, governanceAccount: string): Promise<TreasuryAccount> {
    const context = { operation: 'withdrawTreasury', component: 'TreasuryService', actor: governanceAccount };

    return this.locks.runExclusive(TREASURY_KEY, async () => {
      await this.requireGovernance(governanceAccount, context);
      this.validator.assertValid(
        this.validator.validate({ amount }, [this.validator.positiveAmountRule('amount')]),
        context
      );

      if (amount > this.account.balance) {
        throw new EngineError(
          EngineErrorCode.INSUFFICIENT_TREASURY,
          `Treasury holds ${this.account.balance}, cannot withdraw ${amount}`,
          context
        );
      }

      await this.ledger.payout(this.treasuryAccount, governanceAccount, amount);

      this.account = {
        ...this.account,
        balance: this.account.balance - amount,
        totalWithdrawn: this.account.totalWithdrawn + amount,
        updatedAt: new Date(this.clock.now())
      };
      this.auditService.logEvent(
        'TREASURY_WITHDRAWN',
        { amount: amount.toString(), balance: this.account.balance.toString() },
        governanceAccount
      );
      return this.getTreasury();
    });
  }

  async updateFeePercentage(newFeeBps: number, governanceAccount: string): Promise<TreasuryAccount> {
    const context = { operation: 'updateFeePercentage', component: 'TreasuryService', actor: governanceAccount };

    return this.locks.runExclusive(TREASURY_KEY, async () => {
      await this.requireGovernance(governanceAccount, context);
      this.validator.assertValid(
        this.validator.validate({ newFeeBps }, [
          {
            field: 'newFeeBps',
            required: true,
            type: 'number',
            integer: true,
            min: 0,
            max: this.maxFeeBps,
            message: `Fee must be an integer between 0 and ${this.maxFeeBps} bps`
          }
        ]),
        context
      );

      const previousFeeBps = this.account.feeBps;
      this.account = { ...this.account, feeBps: newFeeBps, updatedAt: new Date(this.clock.now()) };
      this.auditService.logEvent('FEE_UPDATED', { previousFeeBps, feeBps: newFeeBps }, governanceAccount);
      return this.getTreasury();
    });
  }

  private async requireGovernance(account: string, context: { operation: string; component: string; actor?: string }): Promise<void> {
    if (!(await this.acl.isGovernanceAuthorized(account))) {
      throw new EngineError(EngineErrorCode.UNAUTHORIZED, `${account} is not a governance account`, context);
    }
  }
}
