import type { IndicatorFrame, PriceSeries } from '@backtest-lab/trading-utils';
import type { BacktestFrame, SimulationResult } from '../types.js';

/**
 * 세션 저장소 키
 * - data: 시세 (지표 계산 후에는 지표 프레임으로 교체)
 * - backtest_data: 마지막 백테스트 결과
 * - account: 마지막 모의 거래 결과
 */
export interface SessionValues {
  data: PriceSeries | IndicatorFrame;
  backtest_data: BacktestFrame;
  account: SimulationResult;
}

export type SessionKey = keyof SessionValues;

export interface SessionStore {
  get<K extends SessionKey>(key: K): SessionValues[K] | undefined;
  set<K extends SessionKey>(key: K, value: SessionValues[K]): void;
  has(key: SessionKey): boolean;
  delete(key: SessionKey): void;
}

/** 프로세스 메모리 저장소 (쓰기 시 교체) */
export class MemorySessionStore implements SessionStore {
  private values: Partial<SessionValues> = {};

  get<K extends SessionKey>(key: K): SessionValues[K] | undefined {
    return this.values[key];
  }

  set<K extends SessionKey>(key: K, value: SessionValues[K]): void {
    this.values = { ...this.values, [key]: value };
  }

  has(key: SessionKey): boolean {
    return this.values[key] !== undefined;
  }

  delete(key: SessionKey): void {
    const next = { ...this.values };
    delete next[key];
    this.values = next;
  }
}
