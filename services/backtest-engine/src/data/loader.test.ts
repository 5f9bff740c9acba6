import { describe, it, expect, vi, beforeEach } from 'vitest';
import { YahooChartProvider, toBars } from './loader.js';
import { DataSourceFailureError, DataUnavailableError } from '../errors.js';

// fetch 모킹
global.fetch = vi.fn();

// 2024-01-02, 2024-01-03, 2024-01-04 14:30 UTC (뉴욕 09:30)
const JAN_2 = 1704205800;
const JAN_3 = 1704292200;
const JAN_4 = 1704378600;

function chartResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function chartBody(result: unknown) {
  return { chart: { result: [result], error: null } };
}

describe('YahooChartProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('일봉 조회 + 시가/종가 없는 봉 제외', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(
      chartResponse(
        chartBody({
          meta: { exchangeTimezoneName: 'America/New_York' },
          timestamp: [JAN_2, JAN_3, JAN_4],
          indicators: {
            quote: [
              {
                open: [10, 11, 12],
                high: [null, 12, 13],
                low: [9, 10, 11],
                close: [10.5, null, 12.5],
                volume: [100, 200, null],
              },
            ],
          },
        })
      )
    );

    const provider = new YahooChartProvider();
    const series = await provider.fetchSeries('AAPL', '2024-01-01', '2024-02-01');

    expect(series).toEqual({
      ticker: 'AAPL',
      bars: [
        { date: '2024-01-02', open: 10, high: 10.5, low: 9, close: 10.5, volume: 100 },
        { date: '2024-01-04', open: 12, high: 13, low: 11, close: 12.5, volume: 0 },
      ],
    });

    const url = String(vi.mocked(fetch).mock.calls[0]![0]);
    expect(url).toBe(
      'https://query1.finance.yahoo.com/v8/finance/chart/AAPL?period1=1704067200&period2=1706745600&interval=1d&includePrePost=false'
    );
  });

  it('baseUrl 끝의 슬래시 제거', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(
      chartResponse(chartBody({ timestamp: [JAN_2], indicators: { quote: [{ open: [1], close: [1] }] } }))
    );

    await new YahooChartProvider({ baseUrl: 'http://localhost:9999/' }).fetchSeries('MSFT', '2024-01-01', '2024-01-05');

    expect(String(vi.mocked(fetch).mock.calls[0]![0])).toMatch(/^http:\/\/localhost:9999\/v8\/finance\/chart\/MSFT\?/);
  });

  it('404는 DataUnavailableError', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(chartResponse({}, 404));

    await expect(new YahooChartProvider().fetchSeries('NOPE', '2024-01-01', '2024-02-01')).rejects.toThrow(
      DataUnavailableError
    );
  });

  it('그 외 HTTP 오류는 DataSourceFailureError', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(chartResponse({}, 500));

    await expect(new YahooChartProvider().fetchSeries('AAPL', '2024-01-01', '2024-02-01')).rejects.toThrow(
      '시세 조회 실패: Yahoo API failed: 500'
    );
  });

  it('네트워크 오류는 DataSourceFailureError (cause 보존)', async () => {
    const cause = new TypeError('fetch failed');
    vi.mocked(fetch).mockRejectedValueOnce(cause);

    const error = await new YahooChartProvider().fetchSeries('AAPL', '2024-01-01', '2024-02-01').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DataSourceFailureError);
    expect(error).toHaveProperty('message', '시세 조회 실패: fetch failed');
    expect(error).toHaveProperty('cause', cause);
  });

  it('chart.error Not Found는 DataUnavailableError', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(
      chartResponse({ chart: { result: null, error: { code: 'Not Found', description: 'No data found' } } })
    );

    await expect(new YahooChartProvider().fetchSeries('NOPE', '2024-01-01', '2024-02-01')).rejects.toThrow(
      '해당 종목/기간의 시세 데이터가 없습니다: NOPE (No data found)'
    );
  });

  it('스키마 불일치는 DataSourceFailureError', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(chartResponse({ unexpected: true }));

    await expect(new YahooChartProvider().fetchSeries('AAPL', '2024-01-01', '2024-02-01')).rejects.toThrow(
      '시세 조회 실패: Yahoo 응답 스키마 불일치'
    );
  });

  it('봉이 없으면 DataUnavailableError', async () => {
    vi.mocked(fetch).mockResolvedValueOnce(chartResponse(chartBody({ indicators: { quote: [{}] } })));

    await expect(new YahooChartProvider().fetchSeries('AAPL', '2024-01-01', '2024-02-01')).rejects.toThrow(
      DataUnavailableError
    );
  });
});

describe('toBars', () => {
  // 2024-01-03 02:00 UTC = 뉴욕 2024-01-02 21:00
  const LATE = 1704247200;

  it('거래소 타임존 기준 날짜', () => {
    const quote = { open: [1], close: [2] };

    expect(toBars({ meta: { exchangeTimezoneName: 'America/New_York' }, timestamp: [LATE], indicators: { quote: [quote] } })[0]!.date).toBe(
      '2024-01-02'
    );
    expect(toBars({ timestamp: [LATE], indicators: { quote: [quote] } })[0]!.date).toBe('2024-01-03');
    expect(toBars({ meta: { exchangeTimezoneName: 'Not/AZone' }, timestamp: [LATE], indicators: { quote: [quote] } })[0]!.date).toBe(
      '2024-01-03'
    );
  });

  it('날짜 오름차순 정렬 + 같은 날짜는 마지막 값', () => {
    const bars = toBars({
      timestamp: [JAN_3, JAN_2, JAN_3 + 60],
      indicators: { quote: [{ open: [3, 2, 4], close: [3, 2, 4] }] },
    });

    expect(bars.map((bar) => [bar.date, bar.close])).toEqual([
      ['2024-01-02', 2],
      ['2024-01-03', 4],
    ]);
  });
});
