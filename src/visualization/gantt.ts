import { ProductionLogEntry, ScheduleRun } from '../domain/types';

const FILLED = '#';
const FREE = '.';

function fixed(value: number): string {
  return value.toFixed(2);
}

/**
 * ASCII timeline of one day: one row per unit that has work, each column
 * covering `dailyWorkMinutes / width` minutes. A column is filled when its
 * midpoint falls inside a placed interval.
 */
export function generateASCIIGantt(
  entries: readonly ProductionLogEntry[],
  day: number,
  dailyWorkMinutes: number,
  width = 48
): string {
  const todays = entries.filter((e) => e.day === day);
  if (todays.length === 0) {
    return `Day ${day}: no work scheduled`;
  }

  const unitIds = Array.from(new Set(todays.map((e) => e.unitId))).sort();
  const labelWidth = Math.max(...unitIds.map((id) => id.length));
  const step = dailyWorkMinutes / width;

  const lines = [`${todays[0].dayLabel} (${dailyWorkMinutes} min, ${fixed(step)} min/col)`];
  for (const id of unitIds) {
    const intervals = todays.filter((e) => e.unitId === id);
    let bar = '';
    for (let col = 0; col < width; col++) {
      const mid = col * step + step / 2;
      bar += intervals.some((e) => e.startMinute <= mid && mid < e.endMinute) ? FILLED : FREE;
    }
    lines.push(`${id.padEnd(labelWidth)} |${bar}|`);
  }

  for (const entry of todays) {
    lines.push(`  ${entry.unitId.padEnd(labelWidth)} ${entry.orderId} ${fixed(entry.startMinute)}-${fixed(entry.endMinute)}`);
  }
  return lines.join('\n');
}

export function renderRunReport(run: ScheduleRun): string {
  const lines: string[] = [];
  for (const entry of run.log) {
    lines.push(`Order ${entry.orderId} | Product ${entry.productType} | Unit ${entry.unitId} | ${entry.dayLabel}`);
    lines.push(
      `  Start ${fixed(entry.startMinute)} | End ${fixed(entry.endMinute)} | Duration ${fixed(entry.durationMinutes)} min (${fixed(entry.durationMinutes / 60)} h)`
    );
    lines.push(`  Operators ${entry.operators} | Energy ${fixed(entry.energyKwh)} kWh`);
  }
  if (run.log.length === 0) {
    lines.push('No orders were scheduled.');
  }

  for (const order of run.orders) {
    if (order.status === 'UNSCHEDULABLE' && order.failure) {
      lines.push(`Unschedulable ${order.id}: ${order.failure.reason} (${order.failure.message})`);
    }
  }
  for (const rejected of run.rejected) {
    lines.push(`Rejected #${rejected.index}${rejected.orderId ? ` ${rejected.orderId}` : ''}: ${rejected.field} ${rejected.reason}`);
  }

  const { summary } = run;
  lines.push(
    `Scheduled ${summary.scheduled}/${summary.submitted} | Unschedulable ${summary.unschedulable} | Rejected ${summary.rejected} | Pending ${summary.pending}`
  );
  lines.push(`Total energy ${fixed(summary.totalEnergyKwh)} kWh over ${summary.daysSimulated} working day(s)`);
  return lines.join('\n');
}
