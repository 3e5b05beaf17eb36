import { z } from 'zod';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface FieldIssue {
  field: string;
  message: string;
  value: unknown;
}

function valueAt(input: unknown, path: (string | number)[]): unknown {
  let current: unknown = input;
  for (const key of path) {
    if (current === null || typeof current !== 'object') return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

export function describeIssues(error: z.ZodError, input: unknown): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    value: valueAt(input, issue.path),
  }));
}

export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const fieldErrors = describeIssues(result.error, input);
  logger.warn('Input validation failed', {
    errors: fieldErrors,
    input: typeof input === 'object' ? JSON.stringify(input) : input,
  });

  throw new ValidationError(
    `Validation failed: ${fieldErrors.map((e) => `${e.field}: ${e.message}`).join(', ')}`,
    fieldErrors[0]?.field || 'unknown',
    fieldErrors[0]?.value
  );
}

export const prioritySchema = z.enum(['URGENT', 'NORMAL']);

export const orderInputSchema = z.object({
  id: z.string().trim().min(1, 'Order ID is required'),
  productType: z.string().trim().min(1, 'Product type is required'),
  priority: prioritySchema,
  totalLengthM: z.number().finite('Total length must be a finite number').positive('Total length must be positive').optional(),
  bendsPerItem: z.number().int('Bends per item must be a whole number').positive('Bends per item must be positive').optional(),
  itemCount: z.number().int('Item count must be a whole number').positive('Item count must be positive').optional(),
  thicknessBmt: z.string().trim().min(1).optional(),
});

export const runOptionsSchema = z.object({
  maxAttemptsPerOrder: z.number().int().positive('Attempt ceiling must be positive').optional(),
  maxDays: z.number().int().positive('Day bound must be positive').optional(),
});

const machineSpeedSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('LENGTH_RATE'), metersPerMinute: z.number().positive() }),
  z.object({ kind: z.literal('CYCLE_RATE'), secondsPerOperation: z.number().positive() }),
]);

export const machineTypeSchema = z
  .object({
    id: z.string().min(1, 'Machine type id is required'),
    speed: machineSpeedSchema.optional(),
    powerKw: z.number().min(0).default(0),
    units: z.number().int().min(0, 'Unit count cannot be negative'),
    operatorsNeeded: z.number().int().min(0),
  })
  .refine((machine) => machine.units === 0 || machine.speed !== undefined, {
    message: 'Schedulable machines need a speed figure',
    path: ['speed'],
  });

export const productRouteSchema = z.object({
  productType: z.string().min(1),
  workflow: z.enum(['FORMING', 'SHEARING_BENDING']),
  machineTypeId: z.string().min(1),
  supportRoleIds: z.array(z.string().min(1)).default([]),
  aliased: z.boolean().optional(),
});

export const catalogFileSchema = z.object({
  machines: z.array(machineTypeSchema).min(1, 'At least one machine type is required'),
  routes: z.array(productRouteSchema).min(1, 'At least one product route is required'),
  plant: z
    .object({
      operatorPool: z.number().int().positive(),
      dailyWorkMinutes: z.number().int().positive(),
      workDaysPerWeek: z.number().int().min(1).max(7),
    })
    .partial()
    .optional(),
});

export type OrderInputRecord = z.infer<typeof orderInputSchema>;
export type RunOptionsInput = z.infer<typeof runOptionsSchema>;
export type CatalogFile = z.infer<typeof catalogFileSchema>;
