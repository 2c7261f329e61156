/**
 * In-process token ledger implementing the collateral transfer capability
 * Keeps an available and a held balance per (account, asset)
 */

import type { ICollateralTransfer, TransferLeg, TransferResult } from './CollateralLedger';

export interface AccountBalance {
  available: bigint;
  held: bigint;
}

type BalanceBook = Map<string, AccountBalance>;

export class InMemoryTokenLedger implements ICollateralTransfer {
  private balances: BalanceBook = new Map();

  /**
   * Credits new funds to an account
   */
  mint(account: string, asset: string, amount: bigint): void {
    if (amount <= 0n) {
      throw new Error(`Mint amount must be positive, got ${amount}`);
    }
    const entry = this.entry(this.balances, account, asset);
    entry.available += amount;
  }

  balanceOf(account: string, asset: string): AccountBalance {
    const entry = this.balances.get(this.key(account, asset));
    return entry ? { ...entry } : { available: 0n, held: 0n };
  }

  /**
   * Sum of available and held balances across all accounts
   */
  totalSupply(asset: string): bigint {
    let total = 0n;
    for (const [key, entry] of this.balances) {
      if (key.endsWith(`|${asset}`)) {
        total += entry.available + entry.held;
      }
    }
    return total;
  }

  async escrow(account: string, amount: bigint, asset: string): Promise<TransferResult> {
    return this.transferBatch([{ kind: 'escrow', account, amount, asset }]);
  }

  async release(account: string, amount: bigint, asset: string): Promise<TransferResult> {
    return this.transferBatch([{ kind: 'release', account, amount, asset }]);
  }

  async transfer(from: string, to: string, amount: bigint, asset: string): Promise<TransferResult> {
    return this.transferBatch([{ kind: 'transfer', from, to, amount, asset }]);
  }

  async transferBatch(legs: TransferLeg[]): Promise<TransferResult> {
    // Apply to a scratch copy of the touched entries, then swap in
    const scratch: BalanceBook = new Map();

    for (const leg of legs) {
      const reason = this.applyLeg(scratch, leg);
      if (reason) {
        return { success: false, reason };
      }
    }

    for (const [key, entry] of scratch) {
      this.balances.set(key, entry);
    }
    return { success: true };
  }

  private applyLeg(scratch: BalanceBook, leg: TransferLeg): string | null {
    if (leg.amount <= 0n) {
      return `amount must be positive, got ${leg.amount}`;
    }

    switch (leg.kind) {
      case 'escrow': {
        const entry = this.scratchEntry(scratch, leg.account, leg.asset);
        if (entry.available < leg.amount) {
          return `${leg.account} has ${entry.available} ${leg.asset} available, needs ${leg.amount}`;
        }
        entry.available -= leg.amount;
        entry.held += leg.amount;
        return null;
      }
      case 'release': {
        const entry = this.scratchEntry(scratch, leg.account, leg.asset);
        if (entry.held < leg.amount) {
          return `${leg.account} has ${entry.held} ${leg.asset} held, cannot release ${leg.amount}`;
        }
        entry.held -= leg.amount;
        entry.available += leg.amount;
        return null;
      }
      case 'transfer': {
        const from = this.scratchEntry(scratch, leg.from, leg.asset);
        if (from.available < leg.amount) {
          return `${leg.from} has ${from.available} ${leg.asset} available, needs ${leg.amount}`;
        }
        from.available -= leg.amount;
        this.scratchEntry(scratch, leg.to, leg.asset).available += leg.amount;
        return null;
      }
    }
  }

  private scratchEntry(scratch: BalanceBook, account: string, asset: string): AccountBalance {
    const key = this.key(account, asset);
    let entry = scratch.get(key);
    if (!entry) {
      entry = this.balanceOf(account, asset);
      scratch.set(key, entry);
    }
    return entry;
  }

  private entry(book: BalanceBook, account: string, asset: string): AccountBalance {
    const key = this.key(account, asset);
    let entry = book.get(key);
    if (!entry) {
      entry = { available: 0n, held: 0n };
      book.set(key, entry);
    }
    return entry;
  }

  private key(account: string, asset: string): string {
    return `${account}|${asset}`;
  }
}
