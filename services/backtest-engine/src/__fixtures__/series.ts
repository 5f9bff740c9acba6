import type { PriceBar, PriceSeries } from '@backtest-lab/trading-utils';

/**
 * 2024-01-01부터 하루 간격 일봉 (시가 = 고가 = 저가 = 종가)
 */
export function createBar(close: number, index: number): PriceBar {
  return {
    date: new Date(Date.UTC(2024, 0, 1 + index)).toISOString().slice(0, 10),
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000,
  };
}

export function createSeries(closes: number[], ticker = 'TEST'): PriceSeries {
  return { ticker, bars: closes.map((close, i) => createBar(close, i)) };
}

/** 60봉 모두 100 */
export function flatSeries(): PriceSeries {
  return createSeries(new Array<number>(60).fill(100));
}

/** 100봉, 종가 100 → 199 */
export function risingSeries(): PriceSeries {
  return createSeries(Array.from({ length: 100 }, (_, i) => 100 + i));
}
