// =============================================================================
// Price Data
// =============================================================================

/**
 * 일봉 1개 (거래일 기준, YYYY-MM-DD)
 */
export interface PriceBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * 단일 종목의 일봉 시계열 (날짜 오름차순, 중복 없음)
 */
export interface PriceSeries {
  ticker: string;
  bars: readonly PriceBar[];
}

/**
 * 롤링 윈도우가 채워지기 전 구간은 null
 */
export type SeriesValue = number | null;

// =============================================================================
// Indicators
// =============================================================================

/**
 * MACD series (bar 0부터 정의됨)
 */
export interface MACDSeries {
  macd: number[];
  signal: number[];
  histogram: number[];
}

/**
 * RSI 구간
 */
export type RSIZone = 'overbought' | 'oversold' | 'neutral';

export interface IndicatorParams {
  shortWindow: number;
  longWindow: number;
  rsiPeriod?: number;
  macdFast?: number;
  macdSlow?: number;
  macdSignal?: number;
}

export type ResolvedIndicatorParams = Required<IndicatorParams>;

export interface IndicatorRow extends PriceBar {
  smaShort: SeriesValue;
  smaLong: SeriesValue;
  rsi: SeriesValue;
  macd: number;
  macdSignal: number;
  macdHistogram: number;
}

/**
 * 가격 시계열 + 파생 지표 컬럼 (생성 후 변경하지 않음)
 */
export interface IndicatorFrame {
  ticker: string;
  params: ResolvedIndicatorParams;
  rows: readonly IndicatorRow[];
}
