import { ResourceCatalog } from '../config/catalog';
import { FailureReason, Order, OrderInput, Priority, ProductionLogEntry } from '../domain/types';
import { SchedulingError } from '../utils/errors';
import { Logger, logger as rootLogger } from '../utils/logger';
import { WorkingCalendar } from './calendar';
import { OperatorLedger } from './operator_ledger';
import { ProductionLog } from './production_log';
import { estimateEnergy } from './time_estimation';
import { UnitTimelineStore, unitId } from './unit_timeline_store';
import { ProductionRequirement, resolveWorkflow } from './workflow';

export interface DispatcherOptions {
  maxAttemptsPerOrder?: number; // deferrals before an order is given up
  maxDays?: number; // working days simulated before the run halts with orders still pending
}

export type RunState = 'SCHEDULING' | 'COMPLETE' | 'HALTED';
export type DayState = 'OPEN' | 'EXHAUSTED';

export interface DayReport {
  day: number;
  label: string;
  state: DayState;
  placed: number;
  deferred: number;
  operatorsCommitted: number;
}

export interface DispatchResult {
  state: RunState;
  orders: Order[];
  log: Readonly<ProductionLogEntry>[];
  days: DayReport[];
  lastDay: number;
}

type DispatchOutcome =
  | { kind: 'PLACED' }
  | { kind: 'DEFERRED'; reason: string }
  | { kind: 'FAILED' }
  | { kind: 'CONFIGURATION'; message: string };

const PRIORITY_RANK: Record<Priority, number> = { URGENT: 1, NORMAL: 2 };

export function compareOrders(a: OrderInput, b: OrderInput): number {
  const byPriority = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
  if (byPriority !== 0) return byPriority;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/**
 * Day-by-day dispatch of orders onto machine units and the operator pool.
 * One instance per run: it owns the timelines, the ledger and the log.
 */
export class Dispatcher {
  readonly timelines: UnitTimelineStore;
  readonly ledger: OperatorLedger;
  readonly log = new ProductionLog();
  private readonly calendar: WorkingCalendar;
  private runState: RunState = 'SCHEDULING';
  private started = false;
  private readonly scheduledIds = new Set<string>();

  constructor(
    private readonly catalog: ResourceCatalog,
    private readonly options: DispatcherOptions = {},
    private readonly logger: Logger = rootLogger
  ) {
    const { settings } = catalog;
    this.timelines = new UnitTimelineStore(catalog.schedulableMachines(), settings.dailyWorkMinutes);
    this.ledger = new OperatorLedger(settings.operatorPool);
    this.calendar = new WorkingCalendar(settings.workDaysPerWeek);
  }

  get state(): RunState {
    return this.runState;
  }

  run(inputs: OrderInput[]): DispatchResult {
    if (this.started) {
      throw new SchedulingError('A dispatcher schedules a single run', 'DISPATCHER_REUSED');
    }
    this.started = true;

    const orders: Order[] = inputs.map((input) => ({ ...input, status: 'PENDING', attempts: 0 }));
    const days: DayReport[] = [];
    let day = 1;
    let lastDay = 0;

    for (;;) {
      const pending = orders.filter((o) => o.status === 'PENDING');
      if (pending.length === 0) {
        this.runState = 'COMPLETE';
        break;
      }
      if (this.options.maxDays !== undefined && days.length >= this.options.maxDays) {
        this.logger.warn('Day bound reached with orders still pending', { maxDays: this.options.maxDays, pending: pending.length });
        this.runState = 'HALTED';
        break;
      }

      const report = this.runDay(day, pending);
      days.push(report);
      lastDay = day;

      if (report.state === 'EXHAUSTED') {
        this.abandonStalled(orders, report);
      }
      day = this.calendar.nextWorkingDay(day);
    }

    const summary = this.log.summary();
    this.logger.info('Scheduling run finished', {
      state: this.runState,
      scheduled: summary.scheduledCount,
      submitted: orders.length,
      totalEnergyKwh: summary.totalEnergyKwh,
      daysSimulated: days.length,
    });

    return { state: this.runState, orders, log: this.log.all(), days, lastDay };
  }

  private runDay(day: number, pending: Order[]): DayReport {
    const label = this.calendar.label(day);
    this.ledger.ensureDay(day);
    this.logger.debug(`Dispatching ${label}`, { pending: pending.length });

    const queue = [...pending].sort(compareOrders);
    let placed = 0;
    let deferred = 0;

    for (const order of queue) {
      if (order.status !== 'PENDING') continue;
      if (this.scheduledIds.has(order.id)) {
        this.fail(order, 'DUPLICATE_ID', `Order ID ${order.id} was already scheduled`);
        continue;
      }

      const outcome = this.dispatchOrder(order, day);
      switch (outcome.kind) {
        case 'PLACED':
          placed++;
          break;
        case 'DEFERRED':
          deferred++;
          this.logger.debug(`Order ${order.id} deferred`, { day: label, reason: outcome.reason, priority: order.priority });
          this.recordAttempt(order);
          break;
        case 'CONFIGURATION':
          deferred++;
          this.logger.warn(`Order ${order.id} skipped: ${outcome.message}`, { day: label, productType: order.productType });
          order.failure = { reason: 'CONFIGURATION', message: outcome.message };
          this.recordAttempt(order);
          break;
        case 'FAILED':
          break;
      }
    }

    return {
      day,
      label,
      state: placed > 0 ? 'OPEN' : 'EXHAUSTED',
      placed,
      deferred,
      operatorsCommitted: this.ledger.committed(day),
    };
  }

  private dispatchOrder(order: Order, day: number): DispatchOutcome {
    const resolution = resolveWorkflow(this.catalog, order);
    switch (resolution.kind) {
      case 'UNKNOWN_PRODUCT':
        this.fail(order, 'UNKNOWN_PRODUCT', resolution.message);
        return { kind: 'FAILED' };
      case 'INVALID_QUANTITY':
        this.fail(order, 'INVALID_QUANTITY', resolution.message);
        return { kind: 'FAILED' };
      case 'CONFIGURATION':
        return { kind: 'CONFIGURATION', message: resolution.message };
      case 'RESOLVED':
        break;
    }

    const requirement = resolution.requirement;
    const { dailyWorkMinutes, operatorPool } = this.catalog.settings;
    if (requirement.etcMinutes <= 0) {
      this.fail(order, 'INVALID_QUANTITY', `Quantity ${requirement.quantity} needs no machine time on ${requirement.machine.id}`);
      return { kind: 'FAILED' };
    }
    if (!Number.isFinite(requirement.etcMinutes) || requirement.etcMinutes > dailyWorkMinutes) {
      this.fail(
        order,
        'EXCEEDS_DAILY_WINDOW',
        `Needs ${requirement.etcMinutes} minutes on ${requirement.machine.id}; a working day has ${dailyWorkMinutes}`
      );
      return { kind: 'FAILED' };
    }
    if (requirement.operators > operatorPool) {
      this.fail(order, 'EXCEEDS_OPERATOR_POOL', `Needs ${requirement.operators} operators; the pool has ${operatorPool}`);
      return { kind: 'FAILED' };
    }

    const selection = this.timelines.selectBestUnit(requirement.machine.id, day, requirement.etcMinutes);
    if (!selection) {
      return { kind: 'DEFERRED', reason: `no ${requirement.machine.id} unit free` };
    }
    if (!this.ledger.canAdmit(day, requirement.operators)) {
      return { kind: 'DEFERRED', reason: `needs ${requirement.operators} operators, ${this.ledger.available(day)} left` };
    }

    this.timelines.commit(selection.unit, day, selection.start, selection.end, order.id);
    this.ledger.commit(day, requirement.operators);
    this.place(order, day, selection.unit.machineTypeId, selection.unit.index, selection.start, selection.end, requirement);
    return { kind: 'PLACED' };
  }

  private place(
    order: Order,
    day: number,
    machineTypeId: string,
    unitIndex: number,
    start: number,
    end: number,
    requirement: ProductionRequirement
  ): void {
    const id = unitId({ machineTypeId, index: unitIndex });
    const dayLabel = this.calendar.label(day);
    const energyKwh = estimateEnergy(requirement.machine.powerKw, requirement.etcMinutes);

    order.status = 'SCHEDULED';
    order.failure = undefined;
    this.scheduledIds.add(order.id);
    order.assignment = {
      unitId: id,
      machineTypeId,
      unitIndex,
      day,
      dayLabel,
      startMinute: start,
      endMinute: end,
      durationMinutes: requirement.etcMinutes,
      operators: requirement.operators,
      energyKwh,
    };
    this.log.append({
      orderId: order.id,
      productType: order.productType,
      unitId: id,
      day,
      dayLabel,
      startMinute: start,
      endMinute: end,
      durationMinutes: requirement.etcMinutes,
      operators: requirement.operators,
      energyKwh,
    });

    this.logger.info(`Order ${order.id} (${order.productType}) scheduled on ${id}`, {
      day: dayLabel,
      start,
      end,
      operators: requirement.operators,
      energyKwh,
    });
  }

  private recordAttempt(order: Order): void {
    order.attempts++;
    const ceiling = this.options.maxAttemptsPerOrder;
    if (ceiling !== undefined && order.attempts >= ceiling && order.status === 'PENDING') {
      this.fail(order, 'ATTEMPT_LIMIT', `Not placed after ${order.attempts} working days`);
    }
  }

  private fail(order: Order, reason: FailureReason, message: string): void {
    order.status = 'UNSCHEDULABLE';
    order.failure = { reason, message };
    this.logger.warn(`Order ${order.id} cannot be scheduled`, { reason, message });
  }

  // Every pass starts on an untouched day, so a pass that placed nothing
  // would place nothing on any later day either.
  private abandonStalled(orders: Order[], report: DayReport): void {
    for (const order of orders) {
      if (order.status !== 'PENDING') continue;
      if (order.failure?.reason === 'CONFIGURATION') {
        this.fail(order, 'CONFIGURATION', order.failure.message);
      } else {
        this.fail(order, 'NO_PROGRESS', `No progress possible after ${report.label}`);
      }
    }
  }
}
