import { ProductionLogEntry } from '../domain/types';

export interface ProductionLogSummary {
  scheduledCount: number;
  totalEnergyKwh: number;
}

export class ProductionLog {
  private readonly entries: Readonly<ProductionLogEntry>[] = [];

  append(entry: ProductionLogEntry): Readonly<ProductionLogEntry> {
    const frozen = Object.freeze({ ...entry });
    this.entries.push(frozen);
    return frozen;
  }

  all(): Readonly<ProductionLogEntry>[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  summary(): ProductionLogSummary {
    return {
      scheduledCount: this.entries.length,
      totalEnergyKwh: this.entries.reduce((sum, e) => sum + e.energyKwh, 0),
    };
  }
}
