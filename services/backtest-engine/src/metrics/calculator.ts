import { createLogger, type Nullable } from '@backtest-lab/shared-utils';
import type { SeriesValue } from '@backtest-lab/trading-utils';
import type { BacktestFrame, DrawdownSeries, PerformanceReport } from '../types.js';
import { DegenerateStatisticError } from '../errors.js';
import { calculateMean, calculateSampleStdDev, definedValues } from './stats.js';

const logger = createLogger('metrics');

export const TRADING_DAYS_PER_YEAR = 252;

/**
 * 성과/위험 지표 계산
 *
 * 분산이 0이거나 수익률이 부족해 정의되지 않는 지표는 null로 두고
 * notices에 사유를 남긴다 (Infinity/NaN을 표시하지 않음).
 *
 * @param backtest - 백테스트 프레임
 * @returns 성과 리포트
 */
export function calculatePerformance(backtest: BacktestFrame): PerformanceReport {
  const equity = backtest.rows.map((row) => row.cumulativeStrategy);
  const strategyReturns = backtest.rows.map((row) => row.strategyReturn);

  const drawdown = calculateDrawdownSeries(equity);
  const notices: string[] = [];

  const annualizedVolatility = tryStatistic(
    () => calculateAnnualizedVolatility(strategyReturns),
    notices
  );
  const sharpeRatio = tryStatistic(() => calculateSharpeRatio(strategyReturns), notices);

  return {
    marketTotalReturn: backtest.marketTotalReturn,
    strategyTotalReturn: backtest.strategyTotalReturn,
    outperformance: calculateOutperformance(backtest.strategyTotalReturn, backtest.marketTotalReturn),
    maxDrawdown: minOrZero(drawdown.drawdown),
    annualizedVolatility,
    sharpeRatio,
    drawdown,
    notices,
  };
}

function tryStatistic(compute: () => number, notices: string[]): Nullable<number> {
  try {
    return compute();
  } catch (error) {
    if (error instanceof DegenerateStatisticError) {
      logger.warn('통계 계산 불가', { statistic: error.statistic, message: error.message });
      notices.push(error.message);
      return null;
    }
    throw error;
  }
}

/**
 * Drawdown 시계열 계산
 *
 * runningMax[i] = max(equity[0..i])
 * drawdown[i] = (equity[i] - runningMax[i]) / runningMax[i]  (<= 0)
 *
 * @param equity - 누적 수익 곡선
 */
export function calculateDrawdownSeries(equity: readonly number[]): DrawdownSeries {
  const runningMax: number[] = [];
  const drawdown: number[] = [];
  let peak = -Infinity;

  for (const value of equity) {
    if (value > peak) {
      peak = value;
    }
    runningMax.push(peak);
    drawdown.push(peak > 0 && value < peak ? (value - peak) / peak : 0);
  }

  return { runningMax, drawdown };
}

/**
 * 최대 낙폭 (Max Drawdown) = drawdown 최솟값 (<= 0)
 *
 * @param equity - 누적 수익 곡선
 */
export function calculateMaxDrawdown(equity: readonly number[]): number {
  return minOrZero(calculateDrawdownSeries(equity).drawdown);
}

function minOrZero(values: readonly number[]): number {
  return values.reduce((min, v) => (v < min ? v : min), 0);
}

/**
 * 연율화 변동성 = 표본 표준편차 × sqrt(252) (null 제외)
 *
 * @throws DegenerateStatisticError 수익률이 2개 미만
 */
export function calculateAnnualizedVolatility(returns: readonly SeriesValue[]): number {
  const values = definedValues(returns);
  const stdDev = calculateSampleStdDev(values);

  if (stdDev === null) {
    throw new DegenerateStatisticError('연율화 변동성', `유효 수익률 ${values.length}개 (최소 2개 필요)`);
  }

  return stdDev * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

/**
 * Sharpe Ratio 계산
 *
 * 가정: 무위험 수익률 = 0
 * Sharpe = (평균 수익률) / (수익률 표본 표준편차) × sqrt(252)
 *
 * @throws DegenerateStatisticError 수익률 2개 미만 또는 표준편차 0
 */
export function calculateSharpeRatio(returns: readonly SeriesValue[]): number {
  const values = definedValues(returns);
  const avgReturn = calculateMean(values);
  const stdDev = calculateSampleStdDev(values);

  if (avgReturn === null || stdDev === null) {
    throw new DegenerateStatisticError('Sharpe Ratio', `유효 수익률 ${values.length}개 (최소 2개 필요)`);
  }

  if (stdDev === 0) {
    throw new DegenerateStatisticError('Sharpe Ratio', '수익률 표준편차가 0입니다');
  }

  return (avgReturn / stdDev) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

/**
 * 초과 수익률 = 전략 총수익률 - 보유 총수익률
 */
export function calculateOutperformance(strategyTotalReturn: number, marketTotalReturn: number): number {
  return strategyTotalReturn - marketTotalReturn;
}
