import { loadCatalog, ResourceCatalog } from '../config/catalog';
import { AppConfig } from '../config/environment';
import { OrderStatus, ScheduleRun } from '../domain/types';
import { InMemoryRunRepository, RunRepository } from '../repository/run_repository';
import { logger } from '../utils/logger';
import { Dispatcher, DispatcherOptions } from './dispatcher';
import { intakeOrders } from './order_intake';

export interface PlanProductionInput {
  records: unknown[];
  catalog: ResourceCatalog;
  options?: DispatcherOptions;
  runId: string;
  now?: Date;
}

export function planProduction({ records, catalog, options = {}, runId, now = new Date() }: PlanProductionInput): ScheduleRun {
  const runLogger = logger.child({ runId });
  runLogger.info('Starting scheduling run', { submitted: records.length, ...options });

  const { accepted, rejected } = intakeOrders(records, catalog);
  const dispatcher = new Dispatcher(catalog, options, runLogger);
  const result = dispatcher.run(accepted);
  const { totalEnergyKwh } = dispatcher.log.summary();

  const count = (status: OrderStatus) => result.orders.filter((o) => o.status === status).length;

  return {
    runId,
    createdAt: now,
    settings: { ...catalog.settings },
    orders: result.orders,
    rejected,
    log: result.log.map((entry) => ({ ...entry })),
    summary: {
      submitted: records.length,
      rejected: rejected.length,
      scheduled: count('SCHEDULED'),
      unschedulable: count('UNSCHEDULABLE'),
      pending: count('PENDING'),
      totalEnergyKwh,
      daysSimulated: result.days.length,
      lastDay: result.lastDay,
    },
  };
}

export class PlanningService {
  constructor(
    private readonly catalog: ResourceCatalog,
    private readonly runs: RunRepository,
    private readonly defaults: DispatcherOptions = {}
  ) {}

  get resourceCatalog(): ResourceCatalog {
    return this.catalog;
  }

  schedule(records: unknown[], options: DispatcherOptions = {}): ScheduleRun {
    const run = planProduction({
      records,
      catalog: this.catalog,
      options: {
        maxAttemptsPerOrder: options.maxAttemptsPerOrder ?? this.defaults.maxAttemptsPerOrder,
        maxDays: options.maxDays ?? this.defaults.maxDays,
      },
      runId: this.runs.nextId(),
    });
    this.runs.save(run);
    return run;
  }

  findRun(runId: string): ScheduleRun | undefined {
    return this.runs.find(runId);
  }

  getRun(runId: string): ScheduleRun {
    return this.runs.get(runId);
  }

  listRuns(): ScheduleRun[] {
    return this.runs.list();
  }
}

export function createPlanningService(config: AppConfig): PlanningService {
  const catalog = loadCatalog(config);
  logger.debug('Resource catalog loaded', {
    machines: catalog.machines().map((m) => m.id),
    settings: catalog.settings,
  });
  return new PlanningService(catalog, new InMemoryRunRepository(), {
    maxAttemptsPerOrder: config.scheduling.maxAttemptsPerOrder,
    maxDays: config.scheduling.maxSimulatedDays,
  });
}
