/**
 * Backtest Engine
 *
 * 이평선 교차 백테스트 + 모의 거래
 * - Yahoo Chart 일봉 조회
 * - 단기/장기 SMA 교차 시그널
 * - 위험 지표 (Max Drawdown, 연율화 변동성, Sharpe Ratio)
 * - 정수 주식 단위 모의 계좌
 */

// 타입
export type * from './types.js';

// 에러
export {
  BacktestLabError,
  DataUnavailableError,
  DataSourceFailureError,
  PreconditionNotMetError,
  InvalidConfigurationError,
  DegenerateStatisticError,
  isBacktestLabError,
  type BacktestLabErrorCode,
} from './errors.js';

// 설정
export {
  loadSettings,
  settingsDefaults,
  parseWith,
  FetchParamsSchema,
  StrategyParamsSchema,
  SimulationParamsSchema,
  SMA_SHORT_RANGE,
  SMA_LONG_RANGE,
  type BacktestSettings,
  type BacktestSettingsInput,
  type FetchParams,
  type SimulationParams,
} from './config.js';

// 데이터
export { YahooChartProvider, type PriceDataProvider } from './data/loader.js';
export { previewBars, describeSeries, type ColumnStats, type SeriesStats } from './data/inspect.js';

// 전략
export { SimpleMAStrategy, generateCrossoverSignals, extractCrossovers } from './strategies/simple-ma-crossover.js';

// 백테스트 / 모의 거래
export {
  runBacktest,
  calculateDailyReturns,
  calculateStrategyReturns,
  calculateCumulativeReturns,
  calculateTotalReturn,
} from './engine/backtest.js';
export { simulatePaperTrading } from './engine/paper-trading.js';

// 성과 지표
export {
  calculatePerformance,
  calculateDrawdownSeries,
  calculateMaxDrawdown,
  calculateAnnualizedVolatility,
  calculateSharpeRatio,
  calculateOutperformance,
  TRADING_DAYS_PER_YEAR,
} from './metrics/calculator.js';

// 세션
export { MemorySessionStore, type SessionStore, type SessionKey, type SessionValues } from './session/store.js';
export { TradingSession, type ActionResult, type BacktestOutcome } from './session/trading-session.js';

// 리포트
export {
  generateDataReport,
  generateIndicatorReport,
  generateBacktestReport,
  generateSimulationReport,
  generateSeriesReport,
  formatMoney,
  formatPercent,
} from './reports/reporter.js';
export * from './reports/series.js';
