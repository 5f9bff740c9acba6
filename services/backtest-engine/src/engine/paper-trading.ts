import { Big } from 'big.js';
import { createLogger } from '@backtest-lab/shared-utils';
import type { BacktestFrame, LedgerEntry, SimulationConfig, SimulationResult, Trade } from '../types.js';
import { InvalidConfigurationError, PreconditionNotMetError } from '../errors.js';

const logger = createLogger('paper-trading');

/**
 * 모의 거래 실행
 *
 * 백테스트 포지션 변화를 봉 단위로 재생한다.
 * - +1 (진입): 현금으로 살 수 있는 정수 주식 수만큼 해당 봉 시가에 매수
 * - -1 (청산): 보유 주식 전량을 해당 봉 시가에 매도
 * - 거래마다 고정 수수료 차감
 * - 마지막 봉에서 강제 청산하지 않음
 *
 * @param backtest - 백테스트 프레임 (없으면 PreconditionNotMetError)
 * @param config - 초기 자본, 거래당 수수료
 * @returns 일별 계좌 원장 + 체결 내역
 */
export function simulatePaperTrading(
  backtest: BacktestFrame | null | undefined,
  config: SimulationConfig
): SimulationResult {
  if (!backtest) {
    throw new PreconditionNotMetError('백테스트를 먼저 실행하세요');
  }

  const issues: string[] = [];
  if (config.initialCapital.lte(0)) {
    issues.push(`초기 자본은 0보다 커야 합니다 (현재: ${config.initialCapital.toString()})`);
  }
  if (config.commission.lt(0)) {
    issues.push(`수수료는 0 이상이어야 합니다 (현재: ${config.commission.toString()})`);
  }
  if (issues.length > 0) {
    throw new InvalidConfigurationError(issues);
  }

  const [firstRow, ...restRows] = backtest.rows;
  if (!firstRow) {
    throw new PreconditionNotMetError('백테스트 결과에 봉이 없습니다');
  }

  logger.info('모의 거래 시작', {
    ticker: backtest.ticker,
    initialCapital: config.initialCapital.toString(),
    commission: config.commission.toString(),
  });

  let cash = config.initialCapital;
  let shares = 0;
  const trades: Trade[] = [];
  const ledger: LedgerEntry[] = [
    { date: firstRow.date, cash, shares, totalValue: config.initialCapital },
  ];

  for (const row of restRows) {
    const open = new Big(row.open);

    if (row.position === 1) {
      // 진입: 정수 주식만 매수, 1주도 못 사면 거래 없음
      const sharesToBuy = open.gt(0) ? cash.div(open).round(0, Big.roundDown).toNumber() : 0;

      if (sharesToBuy > 0) {
        cash = cash.minus(open.times(sharesToBuy)).minus(config.commission);
        shares += sharesToBuy;
        trades.push({ side: 'BUY', date: row.date, qty: sharesToBuy, price: open, commission: config.commission });

        logger.debug('매수 실행', { date: row.date, qty: sharesToBuy, price: open.toString(), cash: cash.toString() });
      }
    } else if (row.position === -1) {
      if (shares > 0) {
        cash = cash.plus(open.times(shares)).minus(config.commission);
        trades.push({ side: 'SELL', date: row.date, qty: shares, price: open, commission: config.commission });

        logger.debug('매도 실행', { date: row.date, qty: shares, price: open.toString(), cash: cash.toString() });
        shares = 0;
      }
    }

    ledger.push({
      date: row.date,
      cash,
      shares,
      totalValue: cash.plus(new Big(row.close).times(shares)),
    });
  }

  const finalValue = ledger[ledger.length - 1]?.totalValue ?? config.initialCapital;
  const profitLoss = finalValue.minus(config.initialCapital);
  const roi = profitLoss.div(config.initialCapital).toNumber();

  logger.info('모의 거래 완료', {
    finalValue: finalValue.toFixed(2),
    profitLoss: profitLoss.toFixed(2),
    trades: trades.length,
  });

  return {
    ticker: backtest.ticker,
    config,
    ledger,
    trades,
    finalValue,
    profitLoss,
    roi,
  };
}
