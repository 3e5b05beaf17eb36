export type Identifier = string;

export type Priority = 'URGENT' | 'NORMAL';

export type Workflow = 'FORMING' | 'SHEARING_BENDING';

export type MachineSpeed =
  | { kind: 'LENGTH_RATE'; metersPerMinute: number }
  | { kind: 'CYCLE_RATE'; secondsPerOperation: number };

export interface MachineType {
  id: Identifier;
  speed?: MachineSpeed; // absent for operator-only process roles
  powerKw: number;
  units: number; // 0 means a process role, never scheduled on its own
  operatorsNeeded: number; // per active unit
}

export interface ProductRoute {
  productType: string;
  workflow: Workflow;
  machineTypeId: Identifier;
  supportRoleIds: Identifier[];
  aliased?: boolean; // derived product running on another product's machine
}

export interface PlantSettings {
  operatorPool: number;
  dailyWorkMinutes: number;
  workDaysPerWeek: number;
}

export interface MachineUnit {
  machineTypeId: Identifier;
  index: number; // 1-based
}

export interface Interval {
  start: number;
  end: number;
  orderId: Identifier;
}

export interface Slot {
  start: number;
  end: number;
}

export type OrderStatus = 'PENDING' | 'SCHEDULED' | 'UNSCHEDULABLE';

export type FailureReason =
  | 'UNKNOWN_PRODUCT'
  | 'INVALID_QUANTITY'
  | 'CONFIGURATION'
  | 'EXCEEDS_DAILY_WINDOW'
  | 'EXCEEDS_OPERATOR_POOL'
  | 'ATTEMPT_LIMIT'
  | 'NO_PROGRESS'
  | 'DUPLICATE_ID';

export interface OrderInput {
  id: Identifier;
  productType: string;
  priority: Priority;
  totalLengthM?: number;
  bendsPerItem?: number;
  itemCount?: number;
  thicknessBmt?: string;
}

export interface Assignment {
  unitId: string;
  machineTypeId: Identifier;
  unitIndex: number;
  day: number;
  dayLabel: string;
  startMinute: number;
  endMinute: number;
  durationMinutes: number;
  operators: number;
  energyKwh: number;
}

export interface Order extends OrderInput {
  status: OrderStatus;
  attempts: number;
  assignment?: Assignment;
  failure?: { reason: FailureReason; message: string };
}

export interface ProductionLogEntry {
  orderId: Identifier;
  productType: string;
  unitId: string;
  day: number;
  dayLabel: string;
  startMinute: number;
  endMinute: number;
  durationMinutes: number;
  operators: number;
  energyKwh: number;
}

export interface RejectedOrder {
  index: number;
  orderId?: Identifier;
  field: string;
  reason: string;
}

export interface RunSummary {
  submitted: number;
  rejected: number;
  scheduled: number;
  unschedulable: number;
  pending: number;
  totalEnergyKwh: number;
  daysSimulated: number;
  lastDay: number;
}

export interface ScheduleRun {
  runId: Identifier;
  createdAt: Date;
  settings: PlantSettings;
  orders: Order[];
  rejected: RejectedOrder[];
  log: ProductionLogEntry[];
  summary: RunSummary;
}
