import type { Big } from 'big.js';
import type { SeriesValue } from '@backtest-lab/trading-utils';

// ============================================================
// 시그널
// ============================================================

/** 0 = 관망(flat), 1 = 보유(long) */
export type SignalState = 0 | 1;

/** 직전 봉 대비 시그널 변화: +1 진입, -1 청산, 0 변화 없음 */
export type PositionChange = -1 | 0 | 1;

export interface CrossoverSignals {
  signal: SignalState[];
  position: (PositionChange | null)[]; // index 0은 직전 봉이 없으므로 null
}

export interface CrossoverEvent {
  index: number;
  date: string;
  type: 'entry' | 'exit';
}

// ============================================================
// 백테스트
// ============================================================

export interface StrategyParams {
  shortWindow: number;
  longWindow: number;
}

export interface BacktestRow {
  date: string;
  open: number;
  close: number;
  smaShort: SeriesValue;
  smaLong: SeriesValue;
  signal: SignalState;
  position: PositionChange | null;
  dailyReturn: SeriesValue;
  strategyReturn: SeriesValue;
  cumulativeMarket: number;
  cumulativeStrategy: number;
}

export interface BacktestFrame {
  strategy: string;
  ticker: string;
  params: StrategyParams;
  rows: readonly BacktestRow[];
  crossovers: CrossoverEvent[];
  marketTotalReturn: number; // 비율 (0.1 = 10%)
  strategyTotalReturn: number;
}

// ============================================================
// 성과 지표
// ============================================================

export interface DrawdownSeries {
  runningMax: number[];
  drawdown: number[]; // 항상 <= 0
}

export interface PerformanceReport {
  marketTotalReturn: number;
  strategyTotalReturn: number;
  outperformance: number;
  maxDrawdown: number; // <= 0
  annualizedVolatility: number | null; // 계산 불가 시 null
  sharpeRatio: number | null;
  drawdown: DrawdownSeries;
  notices: string[];
}

// ============================================================
// 모의 거래
// ============================================================

export type OrderSide = 'BUY' | 'SELL';

export interface Trade {
  side: OrderSide;
  date: string;
  qty: number; // 정수 주식 수
  price: Big; // 체결가 (해당 봉 시가)
  commission: Big;
}

export interface SimulationConfig {
  initialCapital: Big;
  commission: Big; // 거래당 고정 수수료
}

export interface LedgerEntry {
  date: string;
  cash: Big;
  shares: number;
  totalValue: Big;
}

export interface SimulationResult {
  ticker: string;
  config: SimulationConfig;
  ledger: LedgerEntry[];
  trades: Trade[];
  finalValue: Big;
  profitLoss: Big;
  roi: number; // 비율
}
