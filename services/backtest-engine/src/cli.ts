#!/usr/bin/env node
import { Command } from 'commander';
import { createLogger, loadWorkspaceEnv, parseLogLevel } from '@backtest-lab/shared-utils';
import { loadSettings, yahooChartBaseUrl, type BacktestSettingsInput } from './config.js';
import { YahooChartProvider } from './data/loader.js';
import { MemorySessionStore } from './session/store.js';
import { TradingSession, type ActionResult } from './session/trading-session.js';
import {
  generateBacktestReport,
  generateSeriesReport,
  generateSimulationReport,
} from './reports/reporter.js';
import {
  toAccountChartSeries,
  toDrawdownChartSeries,
  toEquityChartSeries,
  toMACDChartSeries,
  toPriceChartSeries,
  toRSIChartSeries,
} from './reports/series.js';

loadWorkspaceEnv();
// 로거는 기록 시점에 LOG_LEVEL을 읽으므로 잘못된 값은 시작할 때 걸러낸다
parseLogLevel(process.env.LOG_LEVEL);

const logger = createLogger('backtest-cli');
const program = new Command();

type Stage = 'fetch' | 'indicators' | 'backtest' | 'simulate';

const STAGE_ORDER: Record<Stage, number> = {
  fetch: 0,
  indicators: 1,
  backtest: 2,
  simulate: 3,
};

interface CliOptions {
  ticker?: string;
  start?: string;
  end?: string;
  short?: string;
  long?: string;
  capital?: string;
  commission?: string;
  json?: boolean;
}

program
  .name('backtest')
  .description('이평선 교차 백테스트 / 모의 거래 CLI')
  .version('1.0.0');

withSettingsOptions(
  program.command('run').description('전체 파이프라인 실행 (조회 → 지표 → 백테스트 → 모의 거래)')
).action((options: CliOptions) => execute('simulate', options));

withSettingsOptions(
  program.command('fetch').description('시세 조회 + 미리보기/기술 통계')
).action((options: CliOptions) => execute('fetch', options));

withSettingsOptions(
  program.command('indicators').description('시세 조회 후 SMA/RSI/MACD 계산')
).action((options: CliOptions) => execute('indicators', options));

withSettingsOptions(
  program.command('backtest').description('이평선 교차 백테스트 + 위험 지표')
).action((options: CliOptions) => execute('backtest', options));

withSettingsOptions(
  program.command('simulate').description('백테스트 포지션으로 모의 거래')
).action((options: CliOptions) => execute('simulate', options));

function withSettingsOptions(command: Command): Command {
  return command
    .option('-t, --ticker <symbol>', '종목 심볼 (기본: BACKTEST_TICKER 또는 AAPL)')
    .option('--start <date>', '시작 날짜 (YYYY-MM-DD)')
    .option('--end <date>', '종료 날짜 (YYYY-MM-DD, 미포함)')
    .option('--short <period>', '단기 SMA 기간 (5~50)')
    .option('--long <period>', '장기 SMA 기간 (20~200)')
    .option('--capital <amount>', '초기 자본')
    .option('--commission <amount>', '거래당 수수료')
    .option('--json', '차트용 컬럼을 JSON으로 출력', false);
}

async function execute(stage: Stage, options: CliOptions): Promise<void> {
  try {
    const settings = loadSettings(toSettingsInput(options));
    logger.info('실행 설정', { stage, ...settings });

    const session = new TradingSession(
      new YahooChartProvider({ baseUrl: yahooChartBaseUrl() }),
      new MemorySessionStore()
    );
    const output: Record<string, unknown> = {};

    const series = unwrap(await session.fetchData(settings));
    if (!options.json) console.log(generateSeriesReport(series));
    output.price = toPriceChartSeries(series);
    if (STAGE_ORDER[stage] < STAGE_ORDER.indicators) return finish(options, output);

    const frame = unwrap(await session.calculateIndicators(settings));
    if (!options.json) console.log(generateSeriesReport(frame));
    output.price = toPriceChartSeries(frame);
    output.rsi = toRSIChartSeries(frame);
    output.macd = toMACDChartSeries(frame);
    if (STAGE_ORDER[stage] < STAGE_ORDER.backtest) return finish(options, output);

    const { frame: backtest, performance } = unwrap(await session.runBacktest(settings));
    if (!options.json) console.log(generateBacktestReport(backtest, performance));
    output.equity = toEquityChartSeries(backtest);
    output.drawdown = toDrawdownChartSeries(backtest, performance);
    if (STAGE_ORDER[stage] < STAGE_ORDER.simulate) return finish(options, output);

    const account = unwrap(await session.runSimulation(settings));
    if (!options.json) console.log(generateSimulationReport(account));
    output.account = toAccountChartSeries(account);
    finish(options, output);
  } catch (error) {
    logger.error('실행 실패', { stage, error });
    console.error(`❌ 실행 실패: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

function unwrap<T>(result: ActionResult<T>): T {
  if (!result.ok) {
    console.error(`❌ ${result.error.message} [${result.error.code}]`);
    process.exit(1);
  }
  for (const notice of result.notices) {
    console.warn(`⚠️  ${notice}`);
  }
  return result.value;
}

function finish(options: CliOptions, output: Record<string, unknown>): void {
  if (options.json) {
    console.log(JSON.stringify(output, null, 2));
  }
}

function toSettingsInput(options: CliOptions): BacktestSettingsInput {
  return {
    ticker: options.ticker,
    startDate: options.start,
    endDate: options.end,
    shortWindow: toNumber(options.short),
    longWindow: toNumber(options.long),
    initialCapital: toNumber(options.capital),
    commission: toNumber(options.commission),
  };
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

// CLI 실행
await program.parseAsync();
