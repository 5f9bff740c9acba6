import type { SeriesValue } from '@backtest-lab/trading-utils';

/**
 * null 제외한 유한값만 추출
 */
export function definedValues(values: readonly SeriesValue[]): number[] {
  const out: number[] = [];
  for (const value of values) {
    if (value !== null && Number.isFinite(value)) out.push(value);
  }
  return out;
}

export function calculateMean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * 표본 표준편차 (n - 1). 값이 2개 미만이면 null
 */
export function calculateSampleStdDev(values: readonly number[]): number | null {
  if (values.length < 2) return null;

  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance =
    values.reduce((sum, v) => sum + Math.pow(v - mean, 2), 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * 선형 보간 분위수 (q: 0~1)
 */
export function calculateQuantile(sorted: readonly number[], q: number): number | null {
  if (sorted.length === 0) return null;

  const pos = (sorted.length - 1) * q;
  const lower = Math.floor(pos);
  const upper = Math.ceil(pos);
  const lowerValue = sorted[lower];
  if (lowerValue === undefined || !Number.isFinite(pos)) return null;
  const upperValue = sorted[upper] ?? lowerValue;
  return lowerValue + (upperValue - lowerValue) * (pos - lower);
}
