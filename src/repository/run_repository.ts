import { randomUUID } from 'crypto';
import { Identifier, ScheduleRun } from '../domain/types';
import { SchedulingError } from '../utils/errors';

export interface RunRepository {
  nextId(): Identifier;
  save(run: ScheduleRun): void;
  find(runId: Identifier): ScheduleRun | undefined;
  get(runId: Identifier): ScheduleRun;
  list(): ScheduleRun[];
}

/** Runs live for the lifetime of the process; nothing is written to disk. */
export class InMemoryRunRepository implements RunRepository {
  private readonly runs = new Map<Identifier, ScheduleRun>();

  constructor(private readonly generateId: () => Identifier = randomUUID) {}

  nextId(): Identifier {
    return this.generateId();
  }

  save(run: ScheduleRun): void {
    this.runs.set(run.runId, run);
  }

  find(runId: Identifier): ScheduleRun | undefined {
    return this.runs.get(runId);
  }

  get(runId: Identifier): ScheduleRun {
    const run = this.runs.get(runId);
    if (!run) {
      throw new SchedulingError(`Scheduling run ${runId} not found`, 'RUN_NOT_FOUND', { runId });
    }
    return run;
  }

  list(): ScheduleRun[] {
    return Array.from(this.runs.values()).sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }
}
