import type { RSIZone, SeriesValue } from '../types.js';
import { assertPeriod } from './ma.js';

export const RSI_OVERBOUGHT = 70;
export const RSI_OVERSOLD = 30;

/**
 * RSI (Relative Strength Index) 시계열
 *
 * - 일간 변화량을 상승분(gain)과 하락분(loss)으로 분리 (첫 봉은 0)
 * - 각각 `period`봉 단순 평균 → RS = avgGain / avgLoss
 * - RSI = 100 - 100 / (1 + RS)
 *
 * avgLoss가 0이면 나눗셈 대신 고정값:
 * - 상승만 있음 → 100
 * - 변화 없음 (횡보) → 50
 *
 * 앞쪽 `period - 1`개는 null.
 *
 * @param closes - 종가 배열
 * @param period - RSI 기간 (기본값: 14)
 *
 * @example
 * ```typescript
 * const rsi = calculateRSISeries(closes, 14);
 * const latest = rsi[rsi.length - 1];
 * if (latest !== null && classifyRSI(latest) === 'overbought') {
 *   console.log('과매수 구간');
 * }
 * ```
 */
export function calculateRSISeries(closes: readonly number[], period = 14): SeriesValue[] {
  assertPeriod('RSI 기간', period);

  const gains: number[] = [];
  const losses: number[] = [];
  for (let i = 0; i < closes.length; i++) {
    const change = i === 0 ? 0 : closes[i]! - closes[i - 1]!;
    gains.push(change > 0 ? change : 0);
    losses.push(change < 0 ? -change : 0);
  }

  const result: SeriesValue[] = [];
  let gainSum = 0;
  let lossSum = 0;
  // 누적합 잔차로 0이 0이 아니게 되는 것을 막기 위해 윈도우 내 0이 아닌 개수를 함께 추적
  let gainCount = 0;
  let lossCount = 0;

  for (let i = 0; i < closes.length; i++) {
    gainSum += gains[i]!;
    lossSum += losses[i]!;
    if (gains[i]! > 0) gainCount++;
    if (losses[i]! > 0) lossCount++;

    if (i >= period) {
      const outGain = gains[i - period]!;
      const outLoss = losses[i - period]!;
      gainSum -= outGain;
      lossSum -= outLoss;
      if (outGain > 0) gainCount--;
      if (outLoss > 0) lossCount--;
    }

    if (i < period - 1) {
      result.push(null);
      continue;
    }

    const avgGain = gainCount === 0 ? 0 : Math.max(0, gainSum) / period;
    const avgLoss = lossCount === 0 ? 0 : Math.max(0, lossSum) / period;
    result.push(computeRSI(avgGain, avgLoss));
  }

  return result;
}

function computeRSI(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) {
    return avgGain === 0 ? 50 : 100;
  }

  const rs = avgGain / avgLoss;
  const rsi = 100 - 100 / (1 + rs);
  return Math.min(100, Math.max(0, rsi));
}

/**
 * RSI 값 구간 분류 (> 70 과매수, < 30 과매도)
 */
export function classifyRSI(value: number): RSIZone {
  if (value > RSI_OVERBOUGHT) return 'overbought';
  if (value < RSI_OVERSOLD) return 'oversold';
  return 'neutral';
}
