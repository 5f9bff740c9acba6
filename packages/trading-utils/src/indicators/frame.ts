import type {
  IndicatorFrame,
  IndicatorParams,
  IndicatorRow,
  PriceSeries,
  ResolvedIndicatorParams,
} from '../types.js';
import { calculateSMASeries } from './ma.js';
import { calculateRSISeries } from './rsi.js';
import { calculateMACDSeries } from './macd.js';

export const DEFAULT_INDICATOR_PARAMS: ResolvedIndicatorParams = {
  shortWindow: 20,
  longWindow: 50,
  rsiPeriod: 14,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
};

/**
 * 가격 시계열 유효성 검사
 * - 비어있지 않을 것
 * - 날짜 오름차순 + 중복 없음
 * - 종가가 유한한 숫자
 */
export function assertValidPriceSeries(series: PriceSeries): void {
  if (series.bars.length === 0) {
    throw new Error(`가격 시계열이 비어 있습니다: ${series.ticker}`);
  }

  for (let i = 0; i < series.bars.length; i++) {
    const bar = series.bars[i]!;
    if (!Number.isFinite(bar.close)) {
      throw new Error(`종가가 유효하지 않습니다: ${series.ticker} ${bar.date}`);
    }
    const prev = series.bars[i - 1];
    if (prev && prev.date >= bar.date) {
      throw new Error(`날짜가 오름차순이 아닙니다: ${prev.date} → ${bar.date}`);
    }
  }
}

export function isIndicatorFrame(source: PriceSeries | IndicatorFrame): source is IndicatorFrame {
  return 'rows' in source;
}

/**
 * 지표 프레임에서 원본 OHLCV 시계열만 추출
 */
export function toPriceSeries(source: PriceSeries | IndicatorFrame): PriceSeries {
  if (!isIndicatorFrame(source)) return source;

  return {
    ticker: source.ticker,
    bars: source.rows.map((row) => ({
      date: row.date,
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
      volume: row.volume,
    })),
  };
}

export function resolveIndicatorParams(params: IndicatorParams): ResolvedIndicatorParams {
  return {
    shortWindow: params.shortWindow,
    longWindow: params.longWindow,
    rsiPeriod: params.rsiPeriod ?? DEFAULT_INDICATOR_PARAMS.rsiPeriod,
    macdFast: params.macdFast ?? DEFAULT_INDICATOR_PARAMS.macdFast,
    macdSlow: params.macdSlow ?? DEFAULT_INDICATOR_PARAMS.macdSlow,
    macdSignal: params.macdSignal ?? DEFAULT_INDICATOR_PARAMS.macdSignal,
  };
}

/**
 * 지표 프레임 계산 (SMA 단기/장기, RSI, MACD)
 *
 * 입력 시계열은 변경하지 않고 새 프레임을 반환한다.
 * 같은 입력이면 항상 같은 결과.
 *
 * @example
 * ```typescript
 * const frame = calculateIndicators(series, { shortWindow: 20, longWindow: 50 });
 * const last = frame.rows[frame.rows.length - 1];
 * console.log(`SMA20: ${last.smaShort}, RSI: ${last.rsi}`);
 * ```
 */
export function calculateIndicators(
  source: PriceSeries | IndicatorFrame,
  params: IndicatorParams
): IndicatorFrame {
  const series = toPriceSeries(source);
  assertValidPriceSeries(series);
  const resolved = resolveIndicatorParams(params);

  const closes = series.bars.map((bar) => bar.close);
  const smaShort = calculateSMASeries(closes, resolved.shortWindow);
  const smaLong = calculateSMASeries(closes, resolved.longWindow);
  const rsi = calculateRSISeries(closes, resolved.rsiPeriod);
  const macd = calculateMACDSeries(closes, resolved.macdFast, resolved.macdSlow, resolved.macdSignal);

  const rows: IndicatorRow[] = series.bars.map((bar, i) => ({
    ...bar,
    smaShort: smaShort[i] ?? null,
    smaLong: smaLong[i] ?? null,
    rsi: rsi[i] ?? null,
    macd: macd.macd[i]!,
    macdSignal: macd.signal[i]!,
    macdHistogram: macd.histogram[i]!,
  }));

  return {
    ticker: series.ticker,
    params: resolved,
    rows,
  };
}
