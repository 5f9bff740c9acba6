/**
 * Yahoo Chart API 일봉 조회
 * - 비공식 API → 최소 검증만 수행
 * - 시가/종가가 비어 있는 봉은 제외
 */

import { z } from 'zod';
import { IANAZone } from 'luxon';
import {
  createLogger,
  epochSecondsToIsoDate,
  isoDateToEpochSeconds,
} from '@backtest-lab/shared-utils';
import type { PriceBar, PriceSeries } from '@backtest-lab/trading-utils';
import { DataSourceFailureError, DataUnavailableError } from '../errors.js';
import { DEFAULT_YAHOO_CHART_BASE_URL } from '../config.js';

const logger = createLogger('data-loader');

/**
 * 시세 제공자 경계
 *
 * 성공 시 비어 있지 않은 날짜 오름차순 시계열, 실패 시
 * DataUnavailableError 또는 DataSourceFailureError로 reject.
 */
export interface PriceDataProvider {
  fetchSeries(ticker: string, startDate: string, endDate: string): Promise<PriceSeries>;
}

const NullableNumbers = z.array(z.number().nullable()).optional();

const QuoteSchema = z.object({
  open: NullableNumbers,
  high: NullableNumbers,
  low: NullableNumbers,
  close: NullableNumbers,
  volume: NullableNumbers,
});

const ResultSchema = z.object({
  meta: z
    .object({
      exchangeTimezoneName: z.string().optional(),
    })
    .optional(),
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({
    quote: z.array(QuoteSchema),
  }),
});

const ChartSchema = z.object({
  chart: z.object({
    result: z.array(ResultSchema).nullable(),
    error: z
      .object({
        code: z.string(),
        description: z.string(),
      })
      .nullable()
      .optional(),
  }),
});

export type ChartResult = z.infer<typeof ResultSchema>;

export class YahooChartProvider implements PriceDataProvider {
  private readonly baseUrl: string;

  constructor(options?: { baseUrl?: string }) {
    this.baseUrl = (options?.baseUrl ?? DEFAULT_YAHOO_CHART_BASE_URL).replace(/\/+$/, '');
  }

  /**
   * @param ticker - 종목 심볼 (예: AAPL)
   * @param startDate - 시작 날짜 (YYYY-MM-DD, 포함)
   * @param endDate - 종료 날짜 (YYYY-MM-DD, 제외)
   */
  async fetchSeries(ticker: string, startDate: string, endDate: string): Promise<PriceSeries> {
    const url = new URL(`${this.baseUrl}/v8/finance/chart/${encodeURIComponent(ticker)}`);
    url.searchParams.set('period1', String(isoDateToEpochSeconds(startDate)));
    url.searchParams.set('period2', String(isoDateToEpochSeconds(endDate)));
    url.searchParams.set('interval', '1d');
    url.searchParams.set('includePrePost', 'false');

    logger.info('일봉 조회 시작', { ticker, startDate, endDate });

    let res: Response;
    try {
      res = await fetch(url);
    } catch (error) {
      logger.error('Yahoo API 요청 실패', { ticker, error });
      throw new DataSourceFailureError(error instanceof Error ? error.message : String(error), error);
    }

    // 존재하지 않는 심볼은 404로 응답
    if (res.status === 404) {
      throw new DataUnavailableError(ticker);
    }
    if (!res.ok) {
      throw new DataSourceFailureError(`Yahoo API failed: ${res.status}`);
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (error) {
      throw new DataSourceFailureError('응답 JSON 파싱 실패', error);
    }

    const parsed = ChartSchema.safeParse(json);
    if (!parsed.success) {
      logger.error('Yahoo 응답 스키마 불일치', { ticker, issues: parsed.error.issues.length });
      throw new DataSourceFailureError('Yahoo 응답 스키마 불일치');
    }

    const { result, error } = parsed.data.chart;
    if (error) {
      if (error.code === 'Not Found') {
        throw new DataUnavailableError(ticker, error.description);
      }
      throw new DataSourceFailureError(`${error.code}: ${error.description}`);
    }

    const first = result?.[0];
    const bars = first ? toBars(first) : [];
    if (bars.length === 0) {
      logger.warn('일봉 데이터 없음', { ticker, startDate, endDate });
      throw new DataUnavailableError(ticker);
    }

    logger.info('일봉 조회 완료', { ticker, count: bars.length });

    return { ticker, bars };
  }
}

/**
 * 응답 배열을 날짜 오름차순 일봉으로 변환 (같은 날짜는 마지막 값 사용)
 */
export function toBars(result: ChartResult): PriceBar[] {
  const timestamps = result.timestamp ?? [];
  const quote = result.indicators.quote[0];
  if (!quote || timestamps.length === 0) return [];

  const zoneName = result.meta?.exchangeTimezoneName;
  const zone = zoneName && IANAZone.isValidZone(zoneName) ? zoneName : 'utc';

  const byDate = new Map<string, PriceBar>();

  timestamps.forEach((ts, i) => {
    const open = quote.open?.[i] ?? null;
    const close = quote.close?.[i] ?? null;
    if (open === null || close === null) return;

    const high = quote.high?.[i] ?? Math.max(open, close);
    const low = quote.low?.[i] ?? Math.min(open, close);
    const volume = quote.volume?.[i] ?? 0;
    const date = epochSecondsToIsoDate(ts, zone);

    byDate.set(date, { date, open, high, low, close, volume });
  });

  return [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}
