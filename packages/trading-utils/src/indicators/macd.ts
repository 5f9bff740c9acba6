import type { MACDSeries } from '../types.js';
import { assertPeriod, calculateEMASeries } from './ma.js';

/**
 * MACD (Moving Average Convergence Divergence) 시계열
 *
 * MACD = 12일 EMA - 26일 EMA
 * Signal = MACD의 9일 EMA
 * Histogram = MACD - Signal
 *
 * 모든 EMA는 첫 값으로 시작하므로 세 시계열 모두 bar 0부터 정의된다.
 *
 * @param closes - 종가 배열
 * @param fastPeriod - 빠른 EMA 기간 (기본값: 12)
 * @param slowPeriod - 느린 EMA 기간 (기본값: 26)
 * @param signalPeriod - 시그널선 기간 (기본값: 9)
 */
export function calculateMACDSeries(
  closes: readonly number[],
  fastPeriod = 12,
  slowPeriod = 26,
  signalPeriod = 9
): MACDSeries {
  assertPeriod('MACD 빠른 기간', fastPeriod);
  assertPeriod('MACD 느린 기간', slowPeriod);
  assertPeriod('MACD 시그널 기간', signalPeriod);

  const fastEMAs = calculateEMASeries(closes, fastPeriod);
  const slowEMAs = calculateEMASeries(closes, slowPeriod);

  const macd = fastEMAs.map((fast, i) => fast - slowEMAs[i]!);
  const signal = calculateEMASeries(macd, signalPeriod);
  const histogram = macd.map((value, i) => value - signal[i]!);

  return { macd, signal, histogram };
}
