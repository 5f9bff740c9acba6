import { calculateSMASeries, isAbove, type SeriesValue } from '@backtest-lab/trading-utils';
import type { CrossoverEvent, CrossoverSignals, PositionChange, SignalState } from '../types.js';

/**
 * Simple Moving Average Crossover 전략
 *
 * 단기 이평선 > 장기 이평선 → 보유 (1), 그 외 → 관망 (0)
 * 포지션 = 시그널의 직전 봉 대비 변화 (+1 진입, -1 청산)
 *
 * 처음 `shortPeriod`개 봉은 이평선 값과 무관하게 시그널 0으로 고정한다.
 */
export class SimpleMAStrategy {
  readonly name = 'Simple MA Crossover';
  readonly params: {
    shortPeriod: number;
    longPeriod: number;
  };

  constructor(params?: { shortPeriod?: number; longPeriod?: number }) {
    this.params = {
      shortPeriod: params?.shortPeriod ?? 20,
      longPeriod: params?.longPeriod ?? 50,
    };
  }

  /**
   * 종가로 단기/장기 SMA 계산
   */
  computeAverages(closes: readonly number[]): { smaShort: SeriesValue[]; smaLong: SeriesValue[] } {
    return {
      smaShort: calculateSMASeries(closes, this.params.shortPeriod),
      smaLong: calculateSMASeries(closes, this.params.longPeriod),
    };
  }

  generateSignals(smaShort: readonly SeriesValue[], smaLong: readonly SeriesValue[]): CrossoverSignals {
    return generateCrossoverSignals(smaShort, smaLong, this.params.shortPeriod);
  }
}

/**
 * 이평선 교차 시그널/포지션 계산
 *
 * @param smaShort - 단기 이평선 (워밍업 구간 null)
 * @param smaLong - 장기 이평선 (워밍업 구간 null)
 * @param warmup - 시그널을 0으로 고정할 앞쪽 봉 수 (단기 이평선 기간)
 */
export function generateCrossoverSignals(
  smaShort: readonly SeriesValue[],
  smaLong: readonly SeriesValue[],
  warmup: number
): CrossoverSignals {
  if (smaShort.length !== smaLong.length) {
    throw new Error(`이평선 길이가 다릅니다. 단기: ${smaShort.length}, 장기: ${smaLong.length}`);
  }

  const signal: SignalState[] = [];
  const position: (PositionChange | null)[] = [];

  for (let i = 0; i < smaShort.length; i++) {
    // null은 "크지 않음"으로 취급 → 0
    const current: SignalState =
      i >= warmup && isAbove(smaShort[i] ?? null, smaLong[i] ?? null) ? 1 : 0;
    signal.push(current);

    const prev = signal[i - 1];
    position.push(prev === undefined ? null : toPositionChange(prev, current));
  }

  return { signal, position };
}

function toPositionChange(prev: SignalState, current: SignalState): PositionChange {
  if (current > prev) return 1;
  if (current < prev) return -1;
  return 0;
}

/**
 * 포지션 변화 지점 (진입/청산) 목록
 */
export function extractCrossovers(
  dates: readonly string[],
  positions: readonly (PositionChange | null)[]
): CrossoverEvent[] {
  const events: CrossoverEvent[] = [];

  positions.forEach((position, index) => {
    const date = dates[index];
    if (date === undefined) return;
    if (position === 1) events.push({ index, date, type: 'entry' });
    else if (position === -1) events.push({ index, date, type: 'exit' });
  });

  return events;
}
