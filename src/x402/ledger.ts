export type Spending = {
  totalUsd: number;
  calls: number;
};

const MICRO_UNITS_PER_USD = 1_000_000n;

/**
 * Session spend for one client instance. Settled amounts are kept in integer
 * micro-units (USDC has 6 decimals) and converted to USD only on read.
 *
 * Not synchronized: a client shared between concurrent callers must serialize
 * its paid calls externally.
 */
export class SpendingLedger {
  private totalMicroUnits = 0n;
  private calls = 0;

  record(amountMicroUnits: string | bigint): void {
    const amount = typeof amountMicroUnits === 'bigint' ? amountMicroUnits : BigInt(amountMicroUnits);
    if (amount < 0n) {
      throw new RangeError('settled amount cannot be negative');
    }
    this.totalMicroUnits += amount;
    this.calls += 1;
  }

  snapshot(): Spending {
    const whole = this.totalMicroUnits / MICRO_UNITS_PER_USD;
    const fraction = this.totalMicroUnits % MICRO_UNITS_PER_USD;
    return {
      totalUsd: Number(whole) + Number(fraction) / 1_000_000,
      calls: this.calls,
    };
  }
}
