import type { PriceBar, PriceSeries } from '../types.js';

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
