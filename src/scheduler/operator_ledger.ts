import { SchedulingError } from '../utils/errors';

export class OperatorLedger {
  private readonly committedByDay = new Map<number, number>();

  constructor(readonly poolSize: number) {}

  ensureDay(day: number): void {
    if (!this.committedByDay.has(day)) {
      this.committedByDay.set(day, 0);
    }
  }

  committed(day: number): number {
    return this.committedByDay.get(day) ?? 0;
  }

  available(day: number): number {
    return this.poolSize - this.committed(day);
  }

  canAdmit(day: number, requiredOperators: number): boolean {
    return this.available(day) >= requiredOperators;
  }

  commit(day: number, requiredOperators: number): void {
    if (!this.canAdmit(day, requiredOperators)) {
      throw new SchedulingError(
        `Committing ${requiredOperators} operators would exceed the pool of ${this.poolSize}`,
        'OPERATOR_POOL_EXCEEDED',
        { day, requiredOperators, committed: this.committed(day) }
      );
    }
    this.committedByDay.set(day, this.committed(day) + requiredOperators);
  }

  days(): number[] {
    return Array.from(this.committedByDay.keys()).sort((a, b) => a - b);
  }
}
