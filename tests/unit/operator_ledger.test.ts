import { OperatorLedger } from '../../src/scheduler/operator_ledger';
import { SchedulingError } from '../../src/utils/errors';

describe('OperatorLedger', () => {
  test('starts each day at zero committed', () => {
    const ledger = new OperatorLedger(10);
    ledger.ensureDay(1);
    expect(ledger.committed(1)).toBe(0);
    expect(ledger.available(1)).toBe(10);
    expect(ledger.days()).toEqual([1]);
  });

  test('admits while the remaining pool covers the request', () => {
    const ledger = new OperatorLedger(10);
    expect(ledger.canAdmit(1, 10)).toBe(true);
    ledger.commit(1, 6);
    expect(ledger.canAdmit(1, 4)).toBe(true);
    expect(ledger.canAdmit(1, 5)).toBe(false);
    expect(ledger.available(1)).toBe(4);
  });

  test('refuses to commit beyond the pool', () => {
    const ledger = new OperatorLedger(10);
    ledger.commit(1, 6);
    expect(() => ledger.commit(1, 5)).toThrow(SchedulingError);
    expect(ledger.committed(1)).toBe(6);
  });

  test('tracks days separately', () => {
    const ledger = new OperatorLedger(10);
    ledger.commit(1, 10);
    ledger.commit(2, 3);
    expect(ledger.canAdmit(1, 1)).toBe(false);
    expect(ledger.committed(2)).toBe(3);
    expect(ledger.days()).toEqual([1, 2]);
  });
});
