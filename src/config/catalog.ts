import { readFileSync } from 'fs';
import { MachineType, PlantSettings, ProductRoute } from '../domain/types';
import { catalogFileSchema, describeIssues } from '../middleware/validation';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { AppConfig } from './environment';

export const DEFAULT_MACHINES: MachineType[] = [
  { id: 'Yane600', speed: { kind: 'LENGTH_RATE', metersPerMinute: 16 }, powerKw: 11, units: 2, operatorsNeeded: 1 },
  { id: 'Yane672', speed: { kind: 'LENGTH_RATE', metersPerMinute: 20 }, powerKw: 16.5, units: 1, operatorsNeeded: 1 },
  { id: 'Yane750', speed: { kind: 'LENGTH_RATE', metersPerMinute: 20 }, powerKw: 9.5, units: 1, operatorsNeeded: 1 },
  { id: 'Bending', speed: { kind: 'CYCLE_RATE', secondsPerOperation: 4 }, powerKw: 9.7, units: 2, operatorsNeeded: 2 },
  { id: 'Shearing', powerKw: 0, units: 0, operatorsNeeded: 2 },
  { id: 'Forklift', powerKw: 0, units: 0, operatorsNeeded: 1 },
];

/**
 * Product type to machine resolution. SD680 and Kabe325 have no machine of
 * their own and borrow Yane750 capacity; accessories run on a bending unit
 * with a shearing and a forklift crew alongside.
 */
export const DEFAULT_ROUTES: ProductRoute[] = [
  { productType: 'Yane600', workflow: 'FORMING', machineTypeId: 'Yane600', supportRoleIds: [] },
  { productType: 'Yane672', workflow: 'FORMING', machineTypeId: 'Yane672', supportRoleIds: [] },
  { productType: 'Yane750', workflow: 'FORMING', machineTypeId: 'Yane750', supportRoleIds: [] },
  { productType: 'SD680', workflow: 'FORMING', machineTypeId: 'Yane750', supportRoleIds: [], aliased: true },
  { productType: 'Kabe325', workflow: 'FORMING', machineTypeId: 'Yane750', supportRoleIds: [], aliased: true },
  {
    productType: 'Accessory',
    workflow: 'SHEARING_BENDING',
    machineTypeId: 'Bending',
    supportRoleIds: ['Shearing', 'Forklift'],
  },
];

export const DEFAULT_PLANT_SETTINGS: PlantSettings = {
  operatorPool: 10,
  dailyWorkMinutes: 8 * 60,
  workDaysPerWeek: 5,
};

export interface CatalogDefinition {
  machines: MachineType[];
  routes: ProductRoute[];
  settings: PlantSettings;
}

export class ResourceCatalog {
  readonly settings: Readonly<PlantSettings>;
  private readonly machinesById: ReadonlyMap<string, Readonly<MachineType>>;
  private readonly routesByProduct: ReadonlyMap<string, Readonly<ProductRoute>>;

  constructor(definition: CatalogDefinition) {
    const { settings } = definition;
    if (!(settings.operatorPool > 0) || !(settings.dailyWorkMinutes > 0)) {
      throw new ConfigurationError('Operator pool and daily working minutes must be positive', 'settings');
    }
    if (!Number.isInteger(settings.workDaysPerWeek) || settings.workDaysPerWeek < 1 || settings.workDaysPerWeek > 7) {
      throw new ConfigurationError('Working days per week must be between 1 and 7', 'settings.workDaysPerWeek');
    }
    this.settings = Object.freeze({ ...settings });

    const machines = new Map<string, Readonly<MachineType>>();
    for (const machine of definition.machines) {
      if (machines.has(machine.id)) {
        throw new ConfigurationError(`Duplicate machine type ${machine.id}`, `machines.${machine.id}`);
      }
      if (!Number.isInteger(machine.units) || machine.units < 0) {
        throw new ConfigurationError(`Machine ${machine.id} has an invalid unit count`, `machines.${machine.id}.units`);
      }
      if (machine.units > 0 && !machine.speed) {
        throw new ConfigurationError(`Machine ${machine.id} is schedulable but has no speed`, `machines.${machine.id}.speed`);
      }
      machines.set(machine.id, Object.freeze({ ...machine, speed: machine.speed && Object.freeze({ ...machine.speed }) }));
    }
    this.machinesById = machines;

    const routes = new Map<string, Readonly<ProductRoute>>();
    for (const route of definition.routes) {
      if (routes.has(route.productType)) {
        throw new ConfigurationError(`Duplicate route for ${route.productType}`, `routes.${route.productType}`);
      }
      routes.set(route.productType, Object.freeze({ ...route, supportRoleIds: [...route.supportRoleIds] }));
    }
    // Routes may point at machines missing from the catalog; the dispatcher reports those per order.
    this.routesByProduct = routes;
  }

  machine(id: string): Readonly<MachineType> | undefined {
    return this.machinesById.get(id);
  }

  machines(): Readonly<MachineType>[] {
    return Array.from(this.machinesById.values());
  }

  schedulableMachines(): Readonly<MachineType>[] {
    return this.machines().filter((m) => m.units > 0);
  }

  route(productType: string): Readonly<ProductRoute> | undefined {
    return this.routesByProduct.get(productType);
  }

  routes(): Readonly<ProductRoute>[] {
    return Array.from(this.routesByProduct.values());
  }
}

export function defaultCatalog(settings: Partial<PlantSettings> = {}): ResourceCatalog {
  return new ResourceCatalog({
    machines: DEFAULT_MACHINES,
    routes: DEFAULT_ROUTES,
    settings: { ...DEFAULT_PLANT_SETTINGS, ...settings },
  });
}

export function parseCatalogFile(contents: string, overrides: Partial<PlantSettings> = {}): ResourceCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new ConfigurationError(`Catalog file is not valid JSON: ${errorMessage(error)}`, 'catalog', error instanceof Error ? error : undefined);
  }

  const parsed = catalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = describeIssues(parsed.error, raw);
    throw new ConfigurationError(
      `Invalid catalog: ${issues.map((i) => `${i.field}: ${i.message}`).join(', ')}`,
      issues[0]?.field || 'catalog'
    );
  }

  return new ResourceCatalog({
    machines: parsed.data.machines,
    routes: parsed.data.routes,
    settings: { ...DEFAULT_PLANT_SETTINGS, ...parsed.data.plant, ...overrides },
  });
}

function definedSettings(plant: AppConfig['plant']): Partial<PlantSettings> {
  const settings: Partial<PlantSettings> = {};
  if (plant.operatorPool !== undefined) settings.operatorPool = plant.operatorPool;
  if (plant.dailyWorkMinutes !== undefined) settings.dailyWorkMinutes = plant.dailyWorkMinutes;
  if (plant.workDaysPerWeek !== undefined) settings.workDaysPerWeek = plant.workDaysPerWeek;
  return settings;
}

export function loadCatalog(config: AppConfig): ResourceCatalog {
  const { catalogPath } = config.plant;
  const settings = definedSettings(config.plant);
  if (!catalogPath) {
    return defaultCatalog(settings);
  }

  let contents: string;
  try {
    contents = readFileSync(catalogPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read catalog file ${catalogPath}`, 'PLANT_CATALOG_PATH', error instanceof Error ? error : undefined);
  }
  return parseCatalogFile(contents, settings);
}
