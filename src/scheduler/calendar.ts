export const DAYS_PER_WEEK = 7;

/**
 * Day numbers count calendar days from 1, the first working day of a week.
 * The first `workDaysPerWeek` days of every seven are working days.
 */
export class WorkingCalendar {
  constructor(private readonly workDaysPerWeek: number) {}

  isWorkingDay(day: number): boolean {
    return (day - 1) % DAYS_PER_WEEK < this.workDaysPerWeek;
  }

  nextWorkingDay(day: number): number {
    let next = day + 1;
    while (!this.isWorkingDay(next)) {
      next += 1;
    }
    return next;
  }

  label(day: number): string {
    return `Day ${day}`;
  }
}
