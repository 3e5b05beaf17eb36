import { ResourceCatalog } from '../config/catalog';
import { OrderInput, RejectedOrder } from '../domain/types';
import { describeIssues, orderInputSchema } from '../middleware/validation';
import { logger } from '../utils/logger';
import { quantityIssue } from './workflow';

export interface IntakeResult {
  accepted: OrderInput[];
  rejected: RejectedOrder[];
}

function idOf(record: unknown): string | undefined {
  if (record === null || typeof record !== 'object') return undefined;
  const id: unknown = Reflect.get(record, 'id');
  return typeof id === 'string' ? id : undefined;
}

/**
 * Validates raw order records one by one. A bad record is rejected on its own;
 * product types without a route pass through so the dispatcher can classify them.
 */
export function intakeOrders(records: unknown[], catalog: ResourceCatalog): IntakeResult {
  const accepted: OrderInput[] = [];
  const rejected: RejectedOrder[] = [];
  const seen = new Set<string>();

  const reject = (entry: RejectedOrder) => {
    rejected.push(entry);
    logger.warn('Order rejected at intake', { ...entry });
  };

  records.forEach((record, index) => {
    const parsed = orderInputSchema.safeParse(record);
    if (!parsed.success) {
      const [first] = describeIssues(parsed.error, record);
      reject({ index, orderId: idOf(record), field: first?.field || 'unknown', reason: first?.message || 'Invalid order' });
      return;
    }

    const order = parsed.data;
    if (seen.has(order.id)) {
      reject({ index, orderId: order.id, field: 'id', reason: `Duplicate order ID ${order.id}` });
      return;
    }

    const route = catalog.route(order.productType);
    const issue = route && quantityIssue(route, order);
    if (issue) {
      reject({ index, orderId: order.id, field: issue.field, reason: issue.message });
      return;
    }

    seen.add(order.id);
    accepted.push(order);
  });

  return { accepted, rejected };
}
