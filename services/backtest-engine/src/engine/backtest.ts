import { createLogger } from '@backtest-lab/shared-utils';
import {
  assertValidPriceSeries,
  isIndicatorFrame,
  toPriceSeries,
  type IndicatorFrame,
  type PriceSeries,
  type SeriesValue,
} from '@backtest-lab/trading-utils';
import type { BacktestFrame, BacktestRow, PositionChange, StrategyParams } from '../types.js';
import { StrategyParamsSchema, parseWith } from '../config.js';
import { SimpleMAStrategy, extractCrossovers } from '../strategies/simple-ma-crossover.js';

const logger = createLogger('backtest-engine');

/**
 * 이평선 교차 백테스트 실행
 *
 * 지표 프레임의 SMA 기간이 요청 기간과 같으면 해당 컬럼을 재사용하고,
 * 다르면 종가로 다시 계산한다. 입력은 변경하지 않는다.
 *
 * @param source - 가격 시계열 또는 지표 프레임
 * @param params - 단기/장기 SMA 기간
 * @returns 일간/누적 수익률이 포함된 백테스트 프레임
 */
export function runBacktest(source: PriceSeries | IndicatorFrame, params: StrategyParams): BacktestFrame {
  const { shortWindow, longWindow } = parseWith(StrategyParamsSchema, params);
  const series = toPriceSeries(source);
  assertValidPriceSeries(series);

  logger.info('백테스트 시작', { ticker: series.ticker, shortWindow, longWindow, bars: series.bars.length });

  const strategy = new SimpleMAStrategy({ shortPeriod: shortWindow, longPeriod: longWindow });
  const closes = series.bars.map((bar) => bar.close);

  const { smaShort, smaLong } =
    isIndicatorFrame(source) &&
    source.params.shortWindow === shortWindow &&
    source.params.longWindow === longWindow
      ? {
          smaShort: source.rows.map((row) => row.smaShort),
          smaLong: source.rows.map((row) => row.smaLong),
        }
      : strategy.computeAverages(closes);

  const { signal, position } = strategy.generateSignals(smaShort, smaLong);
  const dailyReturns = calculateDailyReturns(closes);
  const strategyReturns = calculateStrategyReturns(position, dailyReturns);
  const cumulativeMarket = calculateCumulativeReturns(dailyReturns);
  const cumulativeStrategy = calculateCumulativeReturns(strategyReturns);

  const rows: BacktestRow[] = series.bars.map((bar, i) => ({
    date: bar.date,
    open: bar.open,
    close: bar.close,
    smaShort: smaShort[i] ?? null,
    smaLong: smaLong[i] ?? null,
    signal: signal[i] ?? 0,
    position: position[i] ?? null,
    dailyReturn: dailyReturns[i] ?? null,
    strategyReturn: strategyReturns[i] ?? null,
    cumulativeMarket: cumulativeMarket[i] ?? 1,
    cumulativeStrategy: cumulativeStrategy[i] ?? 1,
  }));

  const crossovers = extractCrossovers(
    rows.map((row) => row.date),
    position
  );

  const marketTotalReturn = calculateTotalReturn(cumulativeMarket);
  const strategyTotalReturn = calculateTotalReturn(cumulativeStrategy);

  logger.info('백테스트 완료', {
    marketTotalReturn: `${(marketTotalReturn * 100).toFixed(2)}%`,
    strategyTotalReturn: `${(strategyTotalReturn * 100).toFixed(2)}%`,
    crossovers: crossovers.length,
  });

  return {
    strategy: strategy.name,
    ticker: series.ticker,
    params: { shortWindow, longWindow },
    rows,
    crossovers,
    marketTotalReturn,
    strategyTotalReturn,
  };
}

/**
 * 일간 수익률: close[i] / close[i-1] - 1 (첫 봉 null)
 */
export function calculateDailyReturns(closes: readonly number[]): SeriesValue[] {
  return closes.map((close, i) => {
    const prev = closes[i - 1];
    if (prev === undefined || prev === 0) return null;
    return close / prev - 1;
  });
}

/**
 * 전략 수익률: 직전 봉 포지션 × 당일 수익률 (1봉 지연)
 */
export function calculateStrategyReturns(
  positions: readonly (PositionChange | null)[],
  dailyReturns: readonly SeriesValue[]
): SeriesValue[] {
  return dailyReturns.map((dailyReturn, i) => {
    const exposure = positions[i - 1] ?? null;
    if (exposure === null || dailyReturn === null) return null;
    return exposure === 0 ? 0 : exposure * dailyReturn;
  });
}

/**
 * 누적 수익 곡선: Π(1 + r), null은 0으로 취급 → 첫 값 1
 */
export function calculateCumulativeReturns(returns: readonly SeriesValue[]): number[] {
  const cumulative: number[] = [];
  let product = 1;

  for (const r of returns) {
    product *= 1 + (r ?? 0);
    cumulative.push(product);
  }

  return cumulative;
}

/**
 * 총 수익률 = 마지막 누적값 - 1
 */
export function calculateTotalReturn(cumulative: readonly number[]): number {
  const last = cumulative[cumulative.length - 1];
  return last === undefined ? 0 : last - 1;
}
