/**
 * Trading Utils
 *
 * 기술적 지표 시계열 계산 (SMA, EMA, RSI, MACD)
 */

export type * from './types.js';

export {
  calculateSMASeries,
  calculateEMASeries,
  isAbove,
  assertPeriod,
} from './indicators/ma.js';
export { calculateRSISeries, classifyRSI, RSI_OVERBOUGHT, RSI_OVERSOLD } from './indicators/rsi.js';
export { calculateMACDSeries } from './indicators/macd.js';
export {
  calculateIndicators,
  assertValidPriceSeries,
  resolveIndicatorParams,
  isIndicatorFrame,
  toPriceSeries,
  DEFAULT_INDICATOR_PARAMS,
} from './indicators/frame.js';
