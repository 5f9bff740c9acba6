import { z } from 'zod';
import { envNumber, envString, isIsoDate, todayIsoDate } from '@backtest-lab/shared-utils';
import { InvalidConfigurationError } from './errors.js';

export const SMA_SHORT_RANGE = { min: 5, max: 50 } as const;
export const SMA_LONG_RANGE = { min: 20, max: 200 } as const;

export const DEFAULT_YAHOO_CHART_BASE_URL = 'https://query1.finance.yahoo.com';

const IsoDateSchema = z
  .string()
  .trim()
  .refine(isIsoDate, { message: 'YYYY-MM-DD 형식의 실존 날짜여야 합니다' });

export const FetchParamsSchema = z
  .object({
    ticker: z
      .string()
      .trim()
      .min(1, '종목 심볼이 비어 있습니다')
      .transform((value) => value.toUpperCase()),
    startDate: IsoDateSchema,
    endDate: IsoDateSchema,
  })
  .refine((value) => value.startDate < value.endDate, {
    message: '시작 날짜는 종료 날짜보다 앞서야 합니다',
    path: ['endDate'],
  });

export const StrategyParamsSchema = z.object({
  shortWindow: z.number().int().min(SMA_SHORT_RANGE.min).max(SMA_SHORT_RANGE.max),
  longWindow: z.number().int().min(SMA_LONG_RANGE.min).max(SMA_LONG_RANGE.max),
});

export const SimulationParamsSchema = z.object({
  initialCapital: z.number().finite().positive('초기 자본은 0보다 커야 합니다'),
  commission: z.number().finite().nonnegative('수수료는 0 이상이어야 합니다'),
});

export type FetchParams = z.infer<typeof FetchParamsSchema>;
export type SimulationParams = z.infer<typeof SimulationParamsSchema>;

export type BacktestSettings = FetchParams & z.infer<typeof StrategyParamsSchema> & SimulationParams;

export type BacktestSettingsInput = {
  [K in keyof BacktestSettings]?: BacktestSettings[K];
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * zod 스키마 검증 → 실패 시 InvalidConfigurationError
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigurationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * 환경변수 기반 기본값
 *
 * BACKTEST_TICKER, BACKTEST_START, BACKTEST_END, BACKTEST_SHORT_SMA, BACKTEST_LONG_SMA,
 * BACKTEST_INITIAL_CAPITAL, BACKTEST_COMMISSION
 */
export function settingsDefaults(): BacktestSettings {
  return {
    ticker: envString('BACKTEST_TICKER', 'AAPL'),
    startDate: envString('BACKTEST_START', '2020-01-01'),
    endDate: envString('BACKTEST_END', todayIsoDate()),
    shortWindow: envNumber('BACKTEST_SHORT_SMA', 20) ?? 20,
    longWindow: envNumber('BACKTEST_LONG_SMA', 50) ?? 50,
    initialCapital: envNumber('BACKTEST_INITIAL_CAPITAL', 10_000) ?? 10_000,
    commission: envNumber('BACKTEST_COMMISSION', 0) ?? 0,
  };
}

/**
 * 기본값 + 사용자 입력 병합 후 전체 검증
 */
export function loadSettings(overrides: BacktestSettingsInput = {}): BacktestSettings {
  const merged = { ...settingsDefaults(), ...stripUndefined(overrides) };

  const issues: string[] = [];
  const collect = <T extends z.ZodTypeAny>(schema: T): z.output<T> | null => {
    const parsed = schema.safeParse(merged);
    if (parsed.success) return parsed.data;
    issues.push(...formatIssues(parsed.error));
    return null;
  };

  const fetchParams = collect(FetchParamsSchema);
  const strategyParams = collect(StrategyParamsSchema);
  const simulationParams = collect(SimulationParamsSchema);

  if (!fetchParams || !strategyParams || !simulationParams) {
    throw new InvalidConfigurationError(issues);
  }

  return { ...fetchParams, ...strategyParams, ...simulationParams };
}

function stripUndefined(input: BacktestSettingsInput): BacktestSettingsInput {
  const out: BacktestSettingsInput = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      Object.assign(out, { [key]: value });
    }
  }
  return out;
}

export function yahooChartBaseUrl(): string {
  return envString('YAHOO_CHART_BASE_URL', DEFAULT_YAHOO_CHART_BASE_URL);
}
