/**
 * Clock capability. Times are epoch milliseconds.
 */

export interface ITimeSource {
  now(): number;
}

export class SystemTimeSource implements ITimeSource {
  now(): number {
    return Date.now();
  }
}

/**
 * Clock that only moves when told to, for deterministic expiry
 */
export class ManualTimeSource implements ITimeSource {
  private current: number;

  constructor(start: number = Date.UTC(2025, 0, 1)) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }

  advance(ms: number): number {
    if (ms < 0) {
      throw new Error('Clock cannot move backwards');
    }
    this.current += ms;
    return this.current;
  }
}
