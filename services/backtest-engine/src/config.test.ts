import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DEFAULT_YAHOO_CHART_BASE_URL,
  StrategyParamsSchema,
  loadSettings,
  parseWith,
  settingsDefaults,
  yahooChartBaseUrl,
} from './config.js';
import { InvalidConfigurationError } from './errors.js';

const ENV_KEYS = [
  'BACKTEST_TICKER',
  'BACKTEST_START',
  'BACKTEST_END',
  'BACKTEST_SHORT_SMA',
  'BACKTEST_LONG_SMA',
  'BACKTEST_INITIAL_CAPITAL',
  'BACKTEST_COMMISSION',
  'YAHOO_CHART_BASE_URL',
];

function clearEnv(): void {
  for (const key of ENV_KEYS) vi.stubEnv(key, '');
}

function captureIssues(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof InvalidConfigurationError) return error.issues;
    throw error;
  }
  throw new Error('InvalidConfigurationError가 발생하지 않았습니다');
}

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('환경변수가 없으면 기본값', () => {
    clearEnv();

    const defaults = settingsDefaults();

    expect(defaults).toMatchObject({
      ticker: 'AAPL',
      startDate: '2020-01-01',
      shortWindow: 20,
      longWindow: 50,
      initialCapital: 10000,
      commission: 0,
    });
    expect(yahooChartBaseUrl()).toBe(DEFAULT_YAHOO_CHART_BASE_URL);
  });

  it('환경변수가 기본값을 덮어씀', () => {
    clearEnv();
    vi.stubEnv('BACKTEST_SHORT_SMA', '10');
    vi.stubEnv('BACKTEST_TICKER', 'MSFT');

    const settings = loadSettings({ endDate: '2024-01-01' });

    expect(settings.shortWindow).toBe(10);
    expect(settings.ticker).toBe('MSFT');
  });

  it('사용자 입력 병합 + 심볼 정규화, undefined는 무시', () => {
    clearEnv();

    const settings = loadSettings({
      ticker: ' msft ',
      startDate: '2023-01-01',
      endDate: '2023-06-30',
      longWindow: undefined,
      commission: 1.5,
    });

    expect(settings).toEqual({
      ticker: 'MSFT',
      startDate: '2023-01-01',
      endDate: '2023-06-30',
      shortWindow: 20,
      longWindow: 50,
      initialCapital: 10000,
      commission: 1.5,
    });
  });

  it('모든 위반 사항을 모아서 보고', () => {
    clearEnv();

    const issues = captureIssues(() => loadSettings({ endDate: '2024-01-01', shortWindow: 4, initialCapital: 0 }));

    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^shortWindow: /);
    expect(issues[1]).toBe('initialCapital: 초기 자본은 0보다 커야 합니다');
  });

  it('시작 날짜는 종료 날짜보다 앞서야 함', () => {
    clearEnv();

    const issues = captureIssues(() => loadSettings({ startDate: '2024-05-01', endDate: '2024-05-01' }));

    expect(issues).toEqual(['endDate: 시작 날짜는 종료 날짜보다 앞서야 합니다']);
  });

  it('실존하지 않는 날짜 거부', () => {
    clearEnv();

    const issues = captureIssues(() => loadSettings({ startDate: '2024-02-30', endDate: '2024-03-01' }));

    expect(issues).toEqual(['startDate: YYYY-MM-DD 형식의 실존 날짜여야 합니다']);
  });

  it('parseWith: 범위 밖 SMA 기간', () => {
    expect(() => parseWith(StrategyParamsSchema, { shortWindow: 20, longWindow: 19 })).toThrow(InvalidConfigurationError);
    expect(parseWith(StrategyParamsSchema, { shortWindow: 50, longWindow: 200 })).toEqual({ shortWindow: 50, longWindow: 200 });
  });
});
