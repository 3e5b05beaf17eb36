import { graphql } from 'graphql';
import { z } from 'zod';
import { defaultCatalog } from '../../src/config/catalog';
import { buildSchema } from '../../src/graphql/schema';
import { InMemoryRunRepository } from '../../src/repository/run_repository';
import { PlanningService } from '../../src/scheduler/planning_service';

const service = new PlanningService(defaultCatalog(), new InMemoryRunRepository(() => 'run-1'));
const schema = buildSchema(service);

const RUN = `
  mutation R($orders: [OrderInput!]!, $options: RunOptionsInput) {
    runScheduling(orders: $orders, options: $options) {
      runId
      summary { submitted rejected scheduled unschedulable pending totalEnergyKwh daysSimulated lastDay }
      log { orderId unitId dayLabel startMinute endMinute operators energyKwh }
      orders { id status failure { reason } }
      rejected { index orderId field reason }
    }
  }
`;

const runResponse = z.object({
  runScheduling: z.object({
    runId: z.string(),
    summary: z.object({
      submitted: z.number(),
      rejected: z.number(),
      scheduled: z.number(),
      unschedulable: z.number(),
      pending: z.number(),
      totalEnergyKwh: z.number(),
      daysSimulated: z.number(),
      lastDay: z.number(),
    }),
    log: z.array(
      z.object({
        orderId: z.string(),
        unitId: z.string(),
        dayLabel: z.string(),
        startMinute: z.number(),
        endMinute: z.number(),
        operators: z.number(),
        energyKwh: z.number(),
      })
    ),
    orders: z.array(z.object({ id: z.string(), status: z.string(), failure: z.object({ reason: z.string() }).nullable() })),
    rejected: z.array(z.object({ index: z.number(), orderId: z.string().nullable(), field: z.string(), reason: z.string() })),
  }),
});

const orders = [
  { id: 'P002', productType: 'Accessory', priority: 'NORMAL', bendsPerItem: 10, itemCount: 30 },
  { id: 'P001', productType: 'Yane600', priority: 'URGENT', totalLengthM: 4800, thicknessBmt: '0.45mm' },
  { id: 'P003', productType: 'Widget', priority: 'NORMAL', totalLengthM: 100 },
  { id: 'P004', productType: 'Yane672', priority: 'NORMAL', totalLengthM: -5 },
];

test('run scheduling, then query the stored run, report and chart', async () => {
  const runRes = await graphql({ schema, source: RUN, variableValues: { orders } });
  expect(runRes.errors).toBeUndefined();
  const { runScheduling: run } = runResponse.parse(runRes.data);

  expect(run.runId).toBe('run-1');
  expect(run.summary).toMatchObject({
    submitted: 4,
    rejected: 1,
    scheduled: 2,
    unschedulable: 1,
    pending: 0,
    daysSimulated: 1,
    lastDay: 1,
  });
  expect(run.summary.totalEnergyKwh).toBeCloseTo(55 + 9.7 / 3, 6);
  expect(run.log.map((e) => [e.orderId, e.unitId, e.dayLabel, e.startMinute, e.endMinute, e.operators])).toEqual([
    ['P001', 'Yane600_1', 'Day 1', 0, 300, 1],
    ['P002', 'Bending_1', 'Day 1', 0, 20, 5],
  ]);
  expect(run.orders).toEqual([
    { id: 'P002', status: 'SCHEDULED', failure: null },
    { id: 'P001', status: 'SCHEDULED', failure: null },
    { id: 'P003', status: 'UNSCHEDULABLE', failure: { reason: 'UNKNOWN_PRODUCT' } },
  ]);
  expect(run.rejected).toEqual([
    { index: 3, orderId: 'P004', field: 'totalLengthM', reason: 'Total length must be positive' },
  ]);

  const fetched = await graphql({ schema, source: `{ run(runId: "run-1") { runId summary { scheduled } } }` });
  expect(fetched.errors).toBeUndefined();
  expect(fetched.data).toEqual({ run: { runId: 'run-1', summary: { scheduled: 2 } } });

  const chart = await graphql({ schema, source: `{ ganttChart(runId: "run-1", day: 1) }` });
  expect(chart.errors).toBeUndefined();
  expect(chart.data).toEqual({
    ganttChart: [
      'Day 1 (480 min, 10.00 min/col)',
      `Bending_1 |##${'.'.repeat(46)}|`,
      `Yane600_1 |${'#'.repeat(30)}${'.'.repeat(18)}|`,
      '  Yane600_1 P001 0.00-300.00',
      '  Bending_1 P002 0.00-20.00',
    ].join('\n'),
  });

  const report = await graphql({ schema, source: `{ report(runId: "run-1") }` });
  const reportText = z.object({ report: z.string() }).parse(report.data).report;
  expect(reportText.split('\n')).toContain('Unschedulable P003: UNKNOWN_PRODUCT (Unknown product type: Widget)');
  expect(reportText.split('\n')).toContain('Scheduled 2/4 | Unschedulable 1 | Rejected 1 | Pending 0');
});

test('expose the resource catalog', async () => {
  const res = await graphql({
    schema,
    source: `{ catalog { machines { id units speed { kind } } routes { productType machineTypeId aliased } settings { operatorPool dailyWorkMinutes workDaysPerWeek } } }`,
  });
  expect(res.errors).toBeUndefined();
  expect(res.data).toMatchObject({
    catalog: {
      settings: { operatorPool: 10, dailyWorkMinutes: 480, workDaysPerWeek: 5 },
    },
  });
  const catalog = z
    .object({
      catalog: z.object({
        machines: z.array(z.object({ id: z.string(), units: z.number(), speed: z.object({ kind: z.string() }).nullable() })),
        routes: z.array(z.object({ productType: z.string(), machineTypeId: z.string(), aliased: z.boolean() })),
      }),
    })
    .parse(res.data).catalog;
  expect(catalog.machines.find((m) => m.id === 'Forklift')).toEqual({ id: 'Forklift', units: 0, speed: null });
  expect(catalog.routes.find((r) => r.productType === 'SD680')).toEqual({ productType: 'SD680', machineTypeId: 'Yane750', aliased: true });
  expect(catalog.routes.find((r) => r.productType === 'Yane600')?.aliased).toBe(false);
});

test('reject invalid run options', async () => {
  const res = await graphql({ schema, source: RUN, variableValues: { orders: [], options: { maxDays: 0 } } });
  expect(res.errors?.[0]?.message).toBe('Validation failed: maxDays: Day bound must be positive');
});

test('keep chart widths within one column per working minute', async () => {
  const tooWide = await graphql({ schema, source: `{ ganttChart(runId: "run-1", day: 1, width: 481) }` });
  expect(tooWide.errors?.[0]?.message).toBe('Chart width must be between 1 and 480');

  const empty = await graphql({ schema, source: `{ ganttChart(runId: "run-1", day: 1, width: 0) }` });
  expect(empty.errors?.[0]?.message).toBe('Chart width must be between 1 and 480');

  const perMinute = await graphql({ schema, source: `{ ganttChart(runId: "run-1", day: 2, width: 480) }` });
  expect(perMinute.data).toEqual({ ganttChart: 'Day 2: no work scheduled' });
});

test('report missing runs', async () => {
  const missing = await graphql({ schema, source: `{ run(runId: "nope") { runId } }` });
  expect(missing.errors).toBeUndefined();
  expect(missing.data).toEqual({ run: null });

  const chart = await graphql({ schema, source: `{ ganttChart(runId: "nope", day: 1) }` });
  expect(chart.errors?.[0]?.message).toBe('Scheduling run nope not found');
});
