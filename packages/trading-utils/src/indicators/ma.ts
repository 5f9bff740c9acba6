import type { SeriesValue } from '../types.js';

export function assertPeriod(name: string, period: number): void {
  if (!Number.isInteger(period) || period <= 0) {
    throw new Error(`${name}은(는) 양의 정수여야 합니다. 현재: ${period}`);
  }
}

/**
 * 단순 이동평균 (SMA) 시계열
 *
 * 앞쪽 `period - 1`개는 null, 이후는 최근 `period`개 값의 산술평균.
 * 윈도우마다 합을 새로 구하므로 누적 오차가 없고,
 * 같은 값이 `period`개 이상 이어지면 그 값을 그대로 반환한다.
 *
 * @example
 * ```typescript
 * const sma = calculateSMASeries([1, 2, 3, 4, 5], 3);
 * // [null, null, 2, 3, 4]
 * ```
 */
export function calculateSMASeries(values: readonly number[], period: number): SeriesValue[] {
  assertPeriod('SMA 기간', period);

  const result: SeriesValue[] = [];
  let sameRun = 0;

  for (let i = 0; i < values.length; i++) {
    const value = values[i] ?? 0;
    sameRun = i > 0 && value === values[i - 1] ? sameRun + 1 : 1;

    if (i < period - 1) {
      result.push(null);
      continue;
    }
    if (sameRun >= period) {
      result.push(value);
      continue;
    }

    let sum = 0;
    for (let j = i - period + 1; j <= i; j++) {
      sum += values[j] ?? 0;
    }
    result.push(sum / period);
  }

  return result;
}

/**
 * 지수 이동평균 (EMA) 시계열
 *
 * 평활 계수 2 / (period + 1), 첫 값으로 시작 (bias 보정 없음).
 * 첫 봉부터 값이 정의된다.
 */
export function calculateEMASeries(values: readonly number[], period: number): number[] {
  assertPeriod('EMA 기간', period);

  const multiplier = 2 / (period + 1);
  const result: number[] = [];

  for (let i = 0; i < values.length; i++) {
    const value = values[i]!;
    if (i === 0) {
      result.push(value);
      continue;
    }
    // EMA = (현재값 - 이전EMA) * 평활계수 + 이전EMA
    const prev = result[i - 1]!;
    result.push((value - prev) * multiplier + prev);
  }

  return result;
}

/**
 * a > b 비교. 어느 한쪽이라도 null이면 false
 */
export function isAbove(a: SeriesValue, b: SeriesValue): boolean {
  if (a === null || b === null) return false;
  return a > b;
}
