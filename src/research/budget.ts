/** Spend gate consulted before every paid call. */
export interface CostBudget {
  readonly remainingMicros: number;
  tryCharge(micros: number): boolean;
}

/** Charges a running cost counter, refusing anything past the ceiling. */
export class CeilingBudget implements CostBudget {
  constructor(
    private readonly ceilingMicros: number,
    private readonly ledger: { cost_micros: number },
    private readonly onCharge?: (micros: number) => void,
  ) {}

  get remainingMicros(): number {
    return Math.max(0, this.ceilingMicros - this.ledger.cost_micros);
  }

  tryCharge(micros: number): boolean {
    if (this.ledger.cost_micros + micros > this.ceilingMicros) {
      return false;
    }
    this.ledger.cost_micros += micros;
    this.onCharge?.(micros);
    return true;
  }
}

/** A view of a parent budget that never spends the last `reserveMicros`. */
export class ReservedBudget implements CostBudget {
  constructor(
    private readonly parent: CostBudget,
    private readonly reserveMicros: number,
  ) {}

  get remainingMicros(): number {
    return Math.max(0, this.parent.remainingMicros - this.reserveMicros);
  }

  tryCharge(micros: number): boolean {
    if (micros > this.remainingMicros) {
      return false;
    }
    return this.parent.tryCharge(micros);
  }
}
