import { ResourceCatalog } from '../config/catalog';
import { MachineType, OrderInput, ProductRoute, Workflow } from '../domain/types';
import { estimateBending, estimateForming } from './time_estimation';

export interface ProductionRequirement {
  workflow: Workflow;
  machine: Readonly<MachineType>;
  etcMinutes: number;
  operators: number;
  quantity: number; // metres for forming, bend operations for shearing and bending
}

export type WorkflowResolution =
  | { kind: 'RESOLVED'; requirement: ProductionRequirement }
  | { kind: 'UNKNOWN_PRODUCT'; message: string }
  | { kind: 'INVALID_QUANTITY'; field: string; message: string }
  | { kind: 'CONFIGURATION'; message: string };

function isPositive(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

/** Returns the first missing or non-positive quantity the route needs, if any. */
export function quantityIssue(
  route: Pick<ProductRoute, 'workflow'>,
  order: Pick<OrderInput, 'totalLengthM' | 'bendsPerItem' | 'itemCount'>
): { field: string; message: string } | undefined {
  if (route.workflow === 'FORMING') {
    if (!isPositive(order.totalLengthM)) {
      return { field: 'totalLengthM', message: 'Forming orders need a positive total length in metres' };
    }
    return undefined;
  }
  if (!isPositive(order.bendsPerItem) || !Number.isInteger(order.bendsPerItem)) {
    return { field: 'bendsPerItem', message: 'Accessory orders need a positive whole number of bends per item' };
  }
  if (!isPositive(order.itemCount) || !Number.isInteger(order.itemCount)) {
    return { field: 'itemCount', message: 'Accessory orders need a positive whole number of items' };
  }
  return undefined;
}

export function resolveWorkflow(catalog: ResourceCatalog, order: OrderInput): WorkflowResolution {
  const route = catalog.route(order.productType);
  if (!route) {
    return { kind: 'UNKNOWN_PRODUCT', message: `Unknown product type: ${order.productType}` };
  }

  const issue = quantityIssue(route, order);
  if (issue) {
    return { kind: 'INVALID_QUANTITY', ...issue };
  }

  const machine = catalog.machine(route.machineTypeId);
  if (!machine || machine.units <= 0) {
    return {
      kind: 'CONFIGURATION',
      message: `No schedulable machine ${route.machineTypeId} for product ${order.productType}`,
    };
  }

  let operators = machine.operatorsNeeded;
  for (const roleId of route.supportRoleIds) {
    const role = catalog.machine(roleId);
    if (!role) {
      return { kind: 'CONFIGURATION', message: `Process role ${roleId} for product ${order.productType} is not in the catalog` };
    }
    operators += role.operatorsNeeded;
  }

  const { speed } = machine;
  if (route.workflow === 'FORMING') {
    if (speed?.kind !== 'LENGTH_RATE') {
      return { kind: 'CONFIGURATION', message: `Machine ${machine.id} has no length rate for forming` };
    }
    const quantity = order.totalLengthM ?? 0;
    return {
      kind: 'RESOLVED',
      requirement: {
        workflow: route.workflow,
        machine,
        etcMinutes: estimateForming(quantity, speed.metersPerMinute),
        operators,
        quantity,
      },
    };
  }

  if (speed?.kind !== 'CYCLE_RATE') {
    return { kind: 'CONFIGURATION', message: `Machine ${machine.id} has no cycle rate for bending` };
  }
  const quantity = (order.bendsPerItem ?? 0) * (order.itemCount ?? 0);
  return {
    kind: 'RESOLVED',
    requirement: {
      workflow: route.workflow,
      machine,
      etcMinutes: estimateBending(quantity, speed.secondsPerOperation),
      operators,
      quantity,
    },
  };
}
