import { describe, it, expect } from 'vitest';
import { Big } from 'big.js';
import { calculateIndicators } from '@backtest-lab/trading-utils';
import {
  formatMoney,
  formatPercent,
  generateBacktestReport,
  generateDataReport,
  generateIndicatorReport,
  generateSeriesReport,
  generateSimulationReport,
} from './reporter.js';
import { runBacktest } from '../engine/backtest.js';
import { simulatePaperTrading } from '../engine/paper-trading.js';
import { calculatePerformance } from '../metrics/calculator.js';
import { createSeries, flatSeries, risingSeries } from '../__fixtures__/series.js';

describe('포맷팅', () => {
  it('금액: 천 단위 구분 + 소수 2자리', () => {
    expect(formatMoney(new Big(12345.678))).toBe('$12,345.68');
    expect(formatMoney(new Big(1000000))).toBe('$1,000,000.00');
    expect(formatMoney(new Big(-1234.5))).toBe('-$1,234.50');
    expect(formatMoney(new Big(0))).toBe('$0.00');
  });

  it('비율 → 퍼센트', () => {
    expect(formatPercent(0.1234)).toBe('12.34%');
    expect(formatPercent(-0.05)).toBe('-5.00%');
  });
});

describe('리포트', () => {
  it('시세 리포트: 미리보기 + 기술 통계', () => {
    const series = createSeries([1, 2, 3, 4, 5, 6, 7]);

    const lines = generateDataReport(series).split('\n');

    expect(lines).toContain('시세 데이터: TEST');
    expect(lines).toContain('봉 개수: 7');
    expect(lines).toContain('기간: 2024-01-01 ~ 2024-01-07');
    expect(lines).toContain('2024-01-07 | 7.00 | 7.00 | 7.00 | 7.00 | 1000');
    expect(lines).not.toContain('2024-01-02 | 2.00 | 2.00 | 2.00 | 2.00 | 1000');
    expect(lines).toContain('volume | 7 | 1000.00 | 0.00 | 1000.00 | 1000.00 | 1000.00 | 1000.00 | 1000.00');
    expect(generateSeriesReport(series)).toBe(generateDataReport(series));
  });

  it('지표 리포트: 마지막 봉 값 + RSI 구간', () => {
    const frame = calculateIndicators(risingSeries(), { shortWindow: 5, longWindow: 20 });

    const lines = generateIndicatorReport(frame).split('\n');

    expect(lines).toContain('## 최근 값 (2024-04-09)');
    expect(lines).toContain('종가: 199.00');
    // (195 + 196 + 197 + 198 + 199) / 5
    expect(lines).toContain('SMA 5: 197.00');
    expect(lines).toContain('RSI: 100.00 (overbought)');
    expect(generateSeriesReport(frame)).toBe(generateIndicatorReport(frame));
  });

  it('백테스트 리포트: 계산 불가 지표는 N/A + 안내 문구', () => {
    const backtest = runBacktest(flatSeries(), { shortWindow: 20, longWindow: 50 });

    const lines = generateBacktestReport(backtest, calculatePerformance(backtest)).split('\n');

    expect(lines).toContain('전략명: Simple MA Crossover');
    expect(lines).toContain('Buy & Hold 수익률: 0.00%');
    expect(lines).toContain('Max Drawdown: 0.00%');
    expect(lines).toContain('연율화 변동성: 0.00%');
    expect(lines).toContain('Sharpe Ratio: N/A');
    expect(lines).toContain('  * Sharpe Ratio 계산 불가: 수익률 표준편차가 0입니다');
    expect(lines).toContain('총 신호 수: 0');
  });

  it('모의 거래 리포트: 최종 가치, 손익, 체결 내역', () => {
    const backtest = runBacktest(risingSeries(), { shortWindow: 5, longWindow: 20 });
    const result = simulatePaperTrading(backtest, { initialCapital: new Big(10000), commission: new Big(0) });

    const lines = generateSimulationReport(result).split('\n');

    expect(lines).toContain('초기 자본: $10,000.00');
    expect(lines).toContain('최종 계좌 가치: $16,720.00');
    expect(lines).toContain('손익: $6,720.00 (67.20%)');
    expect(lines).toContain('2024-01-20 | BUY | 84 @ 119.00');
  });
});
