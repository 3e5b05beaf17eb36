// Rates at or below zero yield Infinity so the order can never fit a working day.

export function estimateForming(totalLengthM: number, metersPerMinute: number): number {
  if (metersPerMinute <= 0) {
    return Infinity;
  }
  return totalLengthM / metersPerMinute;
}

export function estimateBending(totalBends: number, secondsPerBend: number): number {
  if (secondsPerBend <= 0) {
    return Infinity;
  }
  return (totalBends * secondsPerBend) / 60;
}

export function estimateEnergy(powerKw: number, minutes: number): number {
  if (minutes < 0) {
    return 0;
  }
  return powerKw * (minutes / 60);
}
