import { WorkingCalendar } from '../../src/scheduler/calendar';

describe('WorkingCalendar', () => {
  test('skips the weekend after the fifth working day', () => {
    const calendar = new WorkingCalendar(5);
    expect(calendar.nextWorkingDay(4)).toBe(5);
    expect(calendar.nextWorkingDay(5)).toBe(8);
    expect(calendar.nextWorkingDay(12)).toBe(15);
  });

  test('marks days six and seven of each week as non-working', () => {
    const calendar = new WorkingCalendar(5);
    expect([1, 5, 6, 7, 8, 13, 14, 15].map((d) => calendar.isWorkingDay(d))).toEqual([
      true, true, false, false, true, false, false, true,
    ]);
  });

  test('follows the configured work-week length', () => {
    expect(new WorkingCalendar(6).nextWorkingDay(6)).toBe(8);
    expect(new WorkingCalendar(7).nextWorkingDay(7)).toBe(8);
  });

  test('labels days by number', () => {
    expect(new WorkingCalendar(5).label(8)).toBe('Day 8');
  });
});
