import { estimateBending, estimateEnergy, estimateForming } from '../../src/scheduler/time_estimation';

describe('estimateForming', () => {
  test('divides length by the length rate', () => {
    expect(estimateForming(4800, 16)).toBe(300);
    expect(estimateForming(1000, 16)).toBe(62.5);
  });

  test('returns Infinity for a zero or negative rate', () => {
    expect(estimateForming(100, 0)).toBe(Infinity);
    expect(estimateForming(100, -3)).toBe(Infinity);
  });
});

describe('estimateBending', () => {
  test('converts bend count and seconds per bend to minutes', () => {
    expect(estimateBending(300, 4)).toBe(20);
    expect(estimateBending(45, 4)).toBe(3);
  });

  test('returns Infinity for a zero or negative rate', () => {
    expect(estimateBending(10, 0)).toBe(Infinity);
    expect(estimateBending(10, -1)).toBe(Infinity);
  });
});

describe('estimateEnergy', () => {
  test('one hour of runtime consumes the rated power', () => {
    expect(estimateEnergy(11, 60)).toBe(11);
    expect(estimateEnergy(9.7, 60)).toBe(9.7);
  });

  test('is linear in minutes', () => {
    expect(estimateEnergy(11, 300)).toBe(55);
    expect(estimateEnergy(12, 30)).toBe(6);
  });

  test('zero and negative durations consume nothing', () => {
    expect(estimateEnergy(11, 0)).toBe(0);
    expect(estimateEnergy(11, -45)).toBe(0);
  });
});
