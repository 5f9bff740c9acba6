import { Big } from 'big.js';
import { createLogger } from '@backtest-lab/shared-utils';
import { calculateIndicators, type IndicatorFrame, type PriceSeries } from '@backtest-lab/trading-utils';
import type { BacktestFrame, PerformanceReport, SimulationResult, StrategyParams } from '../types.js';
import type { PriceDataProvider } from '../data/loader.js';
import type { SessionStore } from './store.js';
import {
  FetchParamsSchema,
  SimulationParamsSchema,
  StrategyParamsSchema,
  parseWith,
  type FetchParams,
  type SimulationParams,
} from '../config.js';
import { PreconditionNotMetError, isBacktestLabError, type BacktestLabErrorCode } from '../errors.js';
import { runBacktest } from '../engine/backtest.js';
import { calculatePerformance } from '../metrics/calculator.js';
import { simulatePaperTrading } from '../engine/paper-trading.js';

const logger = createLogger('trading-session');

export type ActionResult<T> =
  | { ok: true; value: T; notices: string[] }
  | { ok: false; error: { code: BacktestLabErrorCode; message: string } };

export interface BacktestOutcome {
  frame: BacktestFrame;
  performance: PerformanceReport;
}

/**
 * 사용자 액션 단위 오케스트레이션
 *
 * 각 액션은 분류된 에러를 잡아 실패 결과로 돌려주고, 그 외 에러는 그대로 던진다.
 * 단계 결과는 세션 저장소에 쓰기 시 교체 방식으로 보관한다.
 */
export class TradingSession {
  constructor(
    private readonly provider: PriceDataProvider,
    private readonly store: SessionStore
  ) {}

  /**
   * 시세 조회 → data 교체, 이전 백테스트/계좌 결과 폐기
   */
  async fetchData(params: FetchParams): Promise<ActionResult<PriceSeries>> {
    return this.guard('fetchData', async () => {
      const { ticker, startDate, endDate } = parseWith(FetchParamsSchema, params);
      const series = await this.provider.fetchSeries(ticker, startDate, endDate);

      this.store.set('data', series);
      this.store.delete('backtest_data');
      this.store.delete('account');

      logger.info('시세 저장', { ticker, bars: series.bars.length });
      return { value: series, notices: [] };
    });
  }

  /**
   * data에 지표 컬럼 추가 (data를 지표 프레임으로 교체)
   */
  async calculateIndicators(params: StrategyParams): Promise<ActionResult<IndicatorFrame>> {
    return this.guard('calculateIndicators', () => {
      const { shortWindow, longWindow } = parseWith(StrategyParamsSchema, params);
      const data = this.requireData();

      const frame = calculateIndicators(data, { shortWindow, longWindow });
      this.store.set('data', frame);

      return { value: frame, notices: [] };
    });
  }

  async runBacktest(params: StrategyParams): Promise<ActionResult<BacktestOutcome>> {
    return this.guard('runBacktest', () => {
      const data = this.requireData();

      const frame = runBacktest(data, params);
      const performance = calculatePerformance(frame);
      this.store.set('backtest_data', frame);

      return { value: { frame, performance }, notices: performance.notices };
    });
  }

  async runSimulation(params: SimulationParams): Promise<ActionResult<SimulationResult>> {
    return this.guard('runSimulation', () => {
      const { initialCapital, commission } = parseWith(SimulationParamsSchema, params);

      const result = simulatePaperTrading(this.store.get('backtest_data'), {
        initialCapital: new Big(initialCapital),
        commission: new Big(commission),
      });
      this.store.set('account', result);

      return { value: result, notices: [] };
    });
  }

  private requireData(): PriceSeries | IndicatorFrame {
    const data = this.store.get('data');
    if (!data) {
      throw new PreconditionNotMetError('시세 데이터를 먼저 조회하세요');
    }
    return data;
  }

  private async guard<T>(
    action: string,
    run: () => Promise<{ value: T; notices: string[] }> | { value: T; notices: string[] }
  ): Promise<ActionResult<T>> {
    try {
      const { value, notices } = await run();
      return { ok: true, value, notices };
    } catch (error) {
      if (isBacktestLabError(error)) {
        logger.warn('액션 실패', { action, code: error.code, message: error.message });
        return { ok: false, error: { code: error.code, message: error.message } };
      }
      logger.error('예상하지 못한 에러', { action, error });
      throw error;
    }
  }
}
