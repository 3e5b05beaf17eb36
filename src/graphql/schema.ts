import { makeExecutableSchema } from '@graphql-tools/schema';
import { GraphQLScalarType, Kind } from 'graphql';
import { loadConfig } from '../config/environment';
import { ProductRoute } from '../domain/types';
import { runOptionsSchema, validateInput } from '../middleware/validation';
import { createPlanningService, PlanningService } from '../scheduler/planning_service';
import { errorMessage, isRetryableError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { generateASCIIGantt, renderRunReport } from '../visualization/gantt';

const typeDefs = /* GraphQL */ `
  scalar DateTime

  enum Priority { URGENT NORMAL }
  enum Workflow { FORMING SHEARING_BENDING }
  enum OrderStatus { PENDING SCHEDULED UNSCHEDULABLE }
  enum SpeedKind { LENGTH_RATE CYCLE_RATE }

  type MachineSpeed {
    kind: SpeedKind!
    metersPerMinute: Float
    secondsPerOperation: Float
  }

  type MachineType {
    id: ID!
    speed: MachineSpeed
    powerKw: Float!
    units: Int!
    operatorsNeeded: Int!
  }

  type ProductRoute {
    productType: String!
    workflow: Workflow!
    machineTypeId: ID!
    supportRoleIds: [ID!]!
    aliased: Boolean!
  }

  type PlantSettings {
    operatorPool: Int!
    dailyWorkMinutes: Int!
    workDaysPerWeek: Int!
  }

  type Catalog {
    machines: [MachineType!]!
    routes: [ProductRoute!]!
    settings: PlantSettings!
  }

  type Assignment {
    unitId: ID!
    machineTypeId: ID!
    unitIndex: Int!
    day: Int!
    dayLabel: String!
    startMinute: Float!
    endMinute: Float!
    durationMinutes: Float!
    operators: Int!
    energyKwh: Float!
  }

  type OrderFailure {
    reason: String!
    message: String!
  }

  type Order {
    id: ID!
    productType: String!
    priority: Priority!
    status: OrderStatus!
    attempts: Int!
    totalLengthM: Float
    bendsPerItem: Int
    itemCount: Int
    thicknessBmt: String
    assignment: Assignment
    failure: OrderFailure
  }

  type ProductionLogEntry {
    orderId: ID!
    productType: String!
    unitId: ID!
    day: Int!
    dayLabel: String!
    startMinute: Float!
    endMinute: Float!
    durationMinutes: Float!
    operators: Int!
    energyKwh: Float!
  }

  type RejectedOrder {
    index: Int!
    orderId: ID
    field: String!
    reason: String!
  }

  type RunSummary {
    submitted: Int!
    rejected: Int!
    scheduled: Int!
    unschedulable: Int!
    pending: Int!
    totalEnergyKwh: Float!
    daysSimulated: Int!
    lastDay: Int!
  }

  type ScheduleRun {
    runId: ID!
    createdAt: DateTime!
    settings: PlantSettings!
    orders: [Order!]!
    rejected: [RejectedOrder!]!
    log: [ProductionLogEntry!]!
    summary: RunSummary!
  }

  type Query {
    catalog: Catalog!
    run(runId: ID!): ScheduleRun
    runs: [ScheduleRun!]!
    ganttChart(runId: ID!, day: Int!, width: Int): String!
    report(runId: ID!): String!
  }

  input OrderInput {
    id: ID!
    productType: String!
    priority: Priority!
    totalLengthM: Float
    bendsPerItem: Int
    itemCount: Int
    thicknessBmt: String
  }

  input RunOptionsInput {
    maxAttemptsPerOrder: Int
    maxDays: Int
  }

  type Mutation {
    runScheduling(orders: [OrderInput!]!, options: RunOptionsInput): ScheduleRun!
  }
`;

const DateTime = new GraphQLScalarType<Date, string>({
  name: 'DateTime',
  serialize: (value) => {
    if (value instanceof Date) return value.toISOString();
    if (typeof value === 'string' || typeof value === 'number') return new Date(value).toISOString();
    throw new TypeError('DateTime cannot represent a non-date value');
  },
  parseValue: (value) => {
    if (typeof value !== 'string') throw new TypeError('DateTime must be an ISO string');
    return new Date(value);
  },
  parseLiteral: (ast) => {
    if (ast.kind !== Kind.STRING) throw new TypeError('DateTime must be an ISO string');
    return new Date(ast.value);
  },
});

// GraphQL hands over explicit nulls for omitted optionals; intake treats absent and null alike.
function withoutNulls(value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== null));
}

export function buildSchema(service: PlanningService = createPlanningService(loadConfig())) {
  const resolvers = {
    DateTime,
    ProductRoute: {
      aliased: (route: ProductRoute) => route.aliased ?? false,
    },
    Query: {
      catalog: () => {
        const catalog = service.resourceCatalog;
        return { machines: catalog.machines(), routes: catalog.routes(), settings: catalog.settings };
      },
      run: (_: unknown, args: { runId: string }) => {
        logger.debug('Fetching scheduling run', { runId: args.runId });
        return service.findRun(args.runId) ?? null;
      },
      runs: () => service.listRuns(),
      ganttChart: (_: unknown, args: { runId: string; day: number; width?: number | null }) => {
        logger.debug('Generating Gantt chart', { runId: args.runId, day: args.day });
        const run = service.getRun(args.runId);
        const { dailyWorkMinutes } = run.settings;
        // At most one column per working minute.
        if (args.width != null && (args.width < 1 || args.width > dailyWorkMinutes)) {
          throw new ValidationError(`Chart width must be between 1 and ${dailyWorkMinutes}`, 'width', args.width);
        }
        return generateASCIIGantt(run.log, args.day, dailyWorkMinutes, args.width ?? undefined);
      },
      report: (_: unknown, args: { runId: string }) => renderRunReport(service.getRun(args.runId)),
    },
    Mutation: {
      runScheduling: (_: unknown, args: { orders: unknown[]; options?: unknown }) => {
        logger.info('Running scheduling', { orderCount: args.orders.length });
        try {
          const options = validateInput(runOptionsSchema, withoutNulls(args.options ?? {}));
          const run = service.schedule(args.orders.map(withoutNulls), options);
          logger.info('Scheduling completed', { runId: run.runId, ...run.summary });
          return run;
        } catch (error) {
          logger.error('Scheduling run failed', {
            error: errorMessage(error),
            retryable: error instanceof Error && isRetryableError(error),
          });
          throw error;
        }
      },
    },
  };

  return makeExecutableSchema({ typeDefs, resolvers });
}
