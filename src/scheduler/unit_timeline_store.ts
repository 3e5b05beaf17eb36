import { Identifier, Interval, MachineType, MachineUnit, Slot } from '../domain/types';
import { SchedulingError } from '../utils/errors';

export interface UnitSelection extends Slot {
  unit: MachineUnit;
}

export function unitId(unit: MachineUnit): string {
  return `${unit.machineTypeId}_${unit.index}`;
}

type DayTimelines = Map<number, Interval[]>;

/**
 * Occupied intervals per machine unit per day. Units are created once from
 * the schedulable machine types and looked up by machine type id and index,
 * so any value-equal unit reaches the same timeline.
 */
export class UnitTimelineStore {
  private readonly unitsByType = new Map<Identifier, MachineUnit[]>();
  private readonly timelines = new Map<Identifier, Map<number, DayTimelines>>();

  constructor(machines: readonly Readonly<MachineType>[], private readonly dailyWorkMinutes: number) {
    for (const machine of machines) {
      if (machine.units <= 0) continue;
      const units: MachineUnit[] = [];
      const byIndex = new Map<number, DayTimelines>();
      for (let index = 1; index <= machine.units; index++) {
        units.push(Object.freeze({ machineTypeId: machine.id, index }));
        byIndex.set(index, new Map());
      }
      this.unitsByType.set(machine.id, units);
      this.timelines.set(machine.id, byIndex);
    }
  }

  units(machineTypeId?: Identifier): MachineUnit[] {
    if (machineTypeId !== undefined) {
      return [...(this.unitsByType.get(machineTypeId) ?? [])];
    }
    return Array.from(this.unitsByType.values()).flat();
  }

  unit(machineTypeId: Identifier, index: number): MachineUnit | undefined {
    return this.unitsByType.get(machineTypeId)?.find((u) => u.index === index);
  }

  intervals(unit: MachineUnit, day: number): Interval[] {
    return [...(this.daysOf(unit).get(day) ?? [])];
  }

  occupiedMinutes(unit: MachineUnit, day: number): number {
    return this.intervals(unit, day).reduce((sum, i) => sum + (i.end - i.start), 0);
  }

  /** First-fit: the earliest gap that holds `requiredMinutes`, not the tightest. */
  findSlot(unit: MachineUnit, day: number, requiredMinutes: number): Slot | undefined {
    const timeline = this.daysOf(unit).get(day) ?? [];
    if (!Number.isFinite(requiredMinutes) || requiredMinutes <= 0) {
      return undefined;
    }

    let cursor = 0;
    for (const interval of timeline) {
      if (interval.start - cursor >= requiredMinutes) {
        return { start: cursor, end: cursor + requiredMinutes };
      }
      cursor = Math.max(cursor, interval.end);
    }

    if (this.dailyWorkMinutes - cursor >= requiredMinutes) {
      return { start: cursor, end: cursor + requiredMinutes };
    }
    return undefined;
  }

  /** Earliest start across all units of a type; ties keep the lower unit index. */
  selectBestUnit(machineTypeId: Identifier, day: number, requiredMinutes: number): UnitSelection | undefined {
    let best: UnitSelection | undefined;
    for (const unit of this.unitsByType.get(machineTypeId) ?? []) {
      const slot = this.findSlot(unit, day, requiredMinutes);
      if (slot && (!best || slot.start < best.start)) {
        best = { unit, ...slot };
      }
    }
    return best;
  }

  commit(unit: MachineUnit, day: number, start: number, end: number, orderId: Identifier): void {
    const days = this.daysOf(unit);
    if (!(start >= 0) || !(end > start) || end > this.dailyWorkMinutes) {
      throw new SchedulingError(
        `Interval [${start}, ${end}) is outside the working day`,
        'OUTSIDE_WORKING_DAY',
        { unit: unitId(unit), day, start, end, orderId }
      );
    }

    const timeline = days.get(day) ?? [];
    const clash = timeline.find((i) => start < i.end && i.start < end);
    if (clash) {
      throw new SchedulingError(
        `Interval [${start}, ${end}) overlaps order ${clash.orderId} on ${unitId(unit)}`,
        'TIMELINE_OVERLAP',
        { unit: unitId(unit), day, start, end, orderId, conflictsWith: clash.orderId }
      );
    }

    timeline.push({ start, end, orderId });
    timeline.sort((a, b) => a.start - b.start);
    days.set(day, timeline);
  }

  private daysOf(unit: MachineUnit): DayTimelines {
    const days = this.timelines.get(unit.machineTypeId)?.get(unit.index);
    if (!days) {
      throw new SchedulingError(`Unknown machine unit ${unitId(unit)}`, 'UNKNOWN_UNIT', { unit: unitId(unit) });
    }
    return days;
  }
}
