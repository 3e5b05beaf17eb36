import { ConfigurationError } from '../utils/errors';

export interface AppConfig {
  server: {
    port: number;
    nodeEnv: string;
  };
  // Unset plant figures fall back to the catalog file, then to the built-in plant.
  plant: {
    operatorPool?: number;
    dailyWorkMinutes?: number;
    workDaysPerWeek?: number;
    catalogPath?: string;
  };
  scheduling: {
    maxAttemptsPerOrder?: number;
    maxSimulatedDays?: number;
  };
}

function readInt(env: NodeJS.ProcessEnv, key: string, min: number): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${key} must be an integer >= ${min}, got "${raw}"`, key);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const workDaysPerWeek = readInt(env, 'WORK_DAYS_PER_WEEK', 1);
  if (workDaysPerWeek !== undefined && workDaysPerWeek > 7) {
    throw new ConfigurationError('WORK_DAYS_PER_WEEK cannot exceed 7', 'WORK_DAYS_PER_WEEK');
  }

  return {
    server: {
      port: readInt(env, 'PORT', 1) ?? 4000,
      nodeEnv: env.NODE_ENV || 'development',
    },
    plant: {
      operatorPool: readInt(env, 'OPERATOR_POOL', 1),
      dailyWorkMinutes: readInt(env, 'DAILY_WORK_MINUTES', 1),
      workDaysPerWeek,
      catalogPath: env.PLANT_CATALOG_PATH || undefined,
    },
    scheduling: {
      maxAttemptsPerOrder: readInt(env, 'MAX_ATTEMPTS_PER_ORDER', 1),
      maxSimulatedDays: readInt(env, 'MAX_SIMULATED_DAYS', 1),
    },
  };
}
