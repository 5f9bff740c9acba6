import { RSI_OVERBOUGHT, RSI_OVERSOLD, isIndicatorFrame, type IndicatorFrame, type PriceSeries, type SeriesValue } from '@backtest-lab/trading-utils';
import type { BacktestFrame, PerformanceReport, SimulationResult } from '../types.js';

/**
 * 차트용 컬럼 추출 (렌더링은 호출자 몫)
 */

export interface PriceChartSeries {
  dates: string[];
  open: number[];
  high: number[];
  low: number[];
  close: number[];
  smaShort: SeriesValue[] | null; // 지표 계산 전이면 null
  smaLong: SeriesValue[] | null;
}

export interface RSIChartSeries {
  dates: string[];
  rsi: SeriesValue[];
  overbought: number;
  oversold: number;
}

export interface MACDChartSeries {
  dates: string[];
  macd: number[];
  signal: number[];
  histogram: number[];
}

export interface EquityChartSeries {
  dates: string[];
  buyAndHold: number[];
  strategy: number[];
}

export interface DrawdownChartSeries {
  dates: string[];
  drawdown: number[];
}

export interface AccountChartSeries {
  dates: string[];
  totalValue: number[];
}

export function toPriceChartSeries(source: PriceSeries | IndicatorFrame): PriceChartSeries {
  if (isIndicatorFrame(source)) {
    return {
      dates: source.rows.map((row) => row.date),
      open: source.rows.map((row) => row.open),
      high: source.rows.map((row) => row.high),
      low: source.rows.map((row) => row.low),
      close: source.rows.map((row) => row.close),
      smaShort: source.rows.map((row) => row.smaShort),
      smaLong: source.rows.map((row) => row.smaLong),
    };
  }

  return {
    dates: source.bars.map((bar) => bar.date),
    open: source.bars.map((bar) => bar.open),
    high: source.bars.map((bar) => bar.high),
    low: source.bars.map((bar) => bar.low),
    close: source.bars.map((bar) => bar.close),
    smaShort: null,
    smaLong: null,
  };
}

/**
 * RSI + 과매수(70)/과매도(30) 기준선
 */
export function toRSIChartSeries(frame: IndicatorFrame): RSIChartSeries {
  return {
    dates: frame.rows.map((row) => row.date),
    rsi: frame.rows.map((row) => row.rsi),
    overbought: RSI_OVERBOUGHT,
    oversold: RSI_OVERSOLD,
  };
}

export function toMACDChartSeries(frame: IndicatorFrame): MACDChartSeries {
  return {
    dates: frame.rows.map((row) => row.date),
    macd: frame.rows.map((row) => row.macd),
    signal: frame.rows.map((row) => row.macdSignal),
    histogram: frame.rows.map((row) => row.macdHistogram),
  };
}

export function toEquityChartSeries(backtest: BacktestFrame): EquityChartSeries {
  return {
    dates: backtest.rows.map((row) => row.date),
    buyAndHold: backtest.rows.map((row) => row.cumulativeMarket),
    strategy: backtest.rows.map((row) => row.cumulativeStrategy),
  };
}

export function toDrawdownChartSeries(backtest: BacktestFrame, performance: PerformanceReport): DrawdownChartSeries {
  return {
    dates: backtest.rows.map((row) => row.date),
    drawdown: [...performance.drawdown.drawdown],
  };
}

export function toAccountChartSeries(result: SimulationResult): AccountChartSeries {
  return {
    dates: result.ledger.map((entry) => entry.date),
    totalValue: result.ledger.map((entry) => entry.totalValue.toNumber()),
  };
}
