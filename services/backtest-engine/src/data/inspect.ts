import type { PriceBar, PriceSeries } from '@backtest-lab/trading-utils';
import { calculateMean, calculateQuantile, calculateSampleStdDev } from '../metrics/stats.js';

export const PRICE_COLUMNS = ['open', 'high', 'low', 'close', 'volume'] as const;
export type PriceColumn = (typeof PRICE_COLUMNS)[number];

export interface ColumnStats {
  count: number;
  mean: number | null;
  std: number | null;
  min: number | null;
  p25: number | null;
  p50: number | null;
  p75: number | null;
  max: number | null;
}

export type SeriesStats = Record<PriceColumn, ColumnStats>;

/**
 * 최근 n개 봉 (기본 5개)
 */
export function previewBars(series: PriceSeries, n = 5): PriceBar[] {
  if (n <= 0) return [];
  return series.bars.slice(-n);
}

function describeColumn(values: number[]): ColumnStats {
  const sorted = [...values].sort((a, b) => a - b);

  return {
    count: values.length,
    mean: calculateMean(values),
    std: calculateSampleStdDev(values),
    min: sorted[0] ?? null,
    p25: calculateQuantile(sorted, 0.25),
    p50: calculateQuantile(sorted, 0.5),
    p75: calculateQuantile(sorted, 0.75),
    max: sorted[sorted.length - 1] ?? null,
  };
}

/**
 * OHLCV 컬럼별 기술 통계 (count, mean, std, min, 25%, 50%, 75%, max)
 */
export function describeSeries(series: PriceSeries): SeriesStats {
  const columns: Record<PriceColumn, number[]> = {
    open: [],
    high: [],
    low: [],
    close: [],
    volume: [],
  };

  for (const bar of series.bars) {
    for (const column of PRICE_COLUMNS) {
      columns[column].push(bar[column]);
    }
  }

  return {
    open: describeColumn(columns.open),
    high: describeColumn(columns.high),
    low: describeColumn(columns.low),
    close: describeColumn(columns.close),
    volume: describeColumn(columns.volume),
  };
}
