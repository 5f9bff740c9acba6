import type { Big } from 'big.js';
import { classifyRSI, isIndicatorFrame, type IndicatorFrame, type PriceSeries } from '@backtest-lab/trading-utils';
import type { BacktestFrame, PerformanceReport, SimulationResult } from '../types.js';
import { PRICE_COLUMNS, describeSeries, previewBars, type ColumnStats } from '../data/inspect.js';

const RULE = '='.repeat(60);

/**
 * 시세 리포트: 최근 봉 미리보기 + 컬럼별 기술 통계
 */
export function generateDataReport(series: PriceSeries, previewSize = 5): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(RULE);
  lines.push(`시세 데이터: ${series.ticker}`);
  lines.push(RULE);
  lines.push('');

  const first = series.bars[0];
  const last = series.bars[series.bars.length - 1];
  lines.push('## 기본 정보');
  lines.push(`봉 개수: ${series.bars.length}`);
  if (first && last) {
    lines.push(`기간: ${first.date} ~ ${last.date}`);
  }
  lines.push('');

  lines.push(`## 최근 ${previewSize}개 봉`);
  lines.push('날짜 | 시가 | 고가 | 저가 | 종가 | 거래량');
  for (const bar of previewBars(series, previewSize)) {
    lines.push(
      `${bar.date} | ${bar.open.toFixed(2)} | ${bar.high.toFixed(2)} | ${bar.low.toFixed(2)} | ${bar.close.toFixed(2)} | ${bar.volume}`
    );
  }
  lines.push('');

  const stats = describeSeries(series);
  lines.push('## 기술 통계');
  lines.push('컬럼 | count | mean | std | min | 25% | 50% | 75% | max');
  for (const column of PRICE_COLUMNS) {
    lines.push(`${column} | ${formatStats(stats[column])}`);
  }
  lines.push('');

  lines.push(RULE);
  lines.push('');

  return lines.join('\n');
}

/**
 * 지표 리포트: 마지막 봉 기준 지표값
 */
export function generateIndicatorReport(frame: IndicatorFrame): string {
  const lines: string[] = [];
  const last = frame.rows[frame.rows.length - 1];

  lines.push('');
  lines.push(RULE);
  lines.push(`기술적 지표: ${frame.ticker}`);
  lines.push(RULE);
  lines.push('');

  lines.push('## 파라미터');
  lines.push(`SMA: ${frame.params.shortWindow} / ${frame.params.longWindow}`);
  lines.push(`RSI 기간: ${frame.params.rsiPeriod}`);
  lines.push(`MACD: ${frame.params.macdFast} / ${frame.params.macdSlow} / ${frame.params.macdSignal}`);
  lines.push('');

  if (last) {
    lines.push(`## 최근 값 (${last.date})`);
    lines.push(`종가: ${last.close.toFixed(2)}`);
    lines.push(`SMA ${frame.params.shortWindow}: ${formatOptional(last.smaShort)}`);
    lines.push(`SMA ${frame.params.longWindow}: ${formatOptional(last.smaLong)}`);
    lines.push(`RSI: ${formatOptional(last.rsi)}${last.rsi === null ? '' : ` (${classifyRSI(last.rsi)})`}`);
    lines.push(`MACD: ${last.macd.toFixed(4)} | Signal: ${last.macdSignal.toFixed(4)} | Histogram: ${last.macdHistogram.toFixed(4)}`);
    lines.push('');
  }

  lines.push(RULE);
  lines.push('');

  return lines.join('\n');
}

/**
 * 백테스트 결과 리포트 (수익률 + 위험 지표)
 */
export function generateBacktestReport(backtest: BacktestFrame, performance: PerformanceReport): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(RULE);
  lines.push('백테스트 결과 리포트');
  lines.push(RULE);
  lines.push('');

  const first = backtest.rows[0];
  const last = backtest.rows[backtest.rows.length - 1];
  lines.push('## 기본 정보');
  lines.push(`전략명: ${backtest.strategy}`);
  lines.push(`심볼: ${backtest.ticker}`);
  if (first && last) {
    lines.push(`기간: ${first.date} ~ ${last.date}`);
  }
  lines.push(`단기/장기 SMA: ${backtest.params.shortWindow} / ${backtest.params.longWindow}`);
  lines.push('');

  lines.push('## 수익률');
  lines.push(`Buy & Hold 수익률: ${formatPercent(performance.marketTotalReturn)}`);
  lines.push(`전략 수익률: ${formatPercent(performance.strategyTotalReturn)}`);
  lines.push(`초과 수익률: ${formatPercent(performance.outperformance)}`);
  lines.push('');

  lines.push('## 위험 지표');
  lines.push(`Max Drawdown: ${formatPercent(performance.maxDrawdown)}`);
  lines.push(
    `연율화 변동성: ${performance.annualizedVolatility === null ? 'N/A' : formatPercent(performance.annualizedVolatility)}`
  );
  lines.push(`Sharpe Ratio: ${performance.sharpeRatio === null ? 'N/A' : performance.sharpeRatio.toFixed(2)}`);
  for (const notice of performance.notices) {
    lines.push(`  * ${notice}`);
  }
  lines.push('');

  lines.push('## 교차 신호');
  lines.push(`총 신호 수: ${backtest.crossovers.length}`);
  for (const event of backtest.crossovers.slice(-10)) {
    lines.push(`${event.date} | ${event.type === 'entry' ? '진입' : '청산'}`);
  }
  lines.push('');

  lines.push(RULE);
  lines.push('');

  return lines.join('\n');
}

/**
 * 모의 거래 리포트
 */
export function generateSimulationReport(result: SimulationResult): string {
  const lines: string[] = [];

  lines.push('');
  lines.push(RULE);
  lines.push(`모의 거래 결과: ${result.ticker}`);
  lines.push(RULE);
  lines.push('');

  lines.push('## 계좌');
  lines.push(`초기 자본: ${formatMoney(result.config.initialCapital)}`);
  lines.push(`거래당 수수료: ${formatMoney(result.config.commission)}`);
  lines.push(`최종 계좌 가치: ${formatMoney(result.finalValue)}`);
  lines.push(`손익: ${formatMoney(result.profitLoss)} (${formatPercent(result.roi)})`);
  lines.push('');

  lines.push('## 거래 내역');
  lines.push(`총 거래 횟수: ${result.trades.length}`);
  for (const trade of result.trades.slice(-10)) {
    lines.push(`${trade.date} | ${trade.side} | ${trade.qty} @ ${trade.price.toFixed(2)}`);
  }
  lines.push('');

  lines.push(RULE);
  lines.push('');

  return lines.join('\n');
}

/**
 * 현재 세션 데이터에 맞는 리포트 (지표 계산 여부에 따라 분기)
 */
export function generateSeriesReport(source: PriceSeries | IndicatorFrame): string {
  return isIndicatorFrame(source) ? generateIndicatorReport(source) : generateDataReport(source);
}

/**
 * 0.1234 → "12.34%"
 */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

/**
 * 12345.678 → "$12,345.68"
 */
export function formatMoney(value: Big): string {
  const [integer = '0', fraction = '00'] = value.abs().toFixed(2).split('.');
  const grouped = integer.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return `${value.lt(0) ? '-' : ''}$${grouped}.${fraction}`;
}

function formatOptional(value: number | null): string {
  return value === null ? 'N/A' : value.toFixed(2);
}

function formatStats(stats: ColumnStats): string {
  return [
    String(stats.count),
    formatOptional(stats.mean),
    formatOptional(stats.std),
    formatOptional(stats.min),
    formatOptional(stats.p25),
    formatOptional(stats.p50),
    formatOptional(stats.p75),
    formatOptional(stats.max),
  ].join(' | ');
}
