/**
 * 백테스트 랩 에러 분류
 *
 * 모든 에러는 요청한 액션 경계(TradingSession, CLI)에서 잡혀
 * 사용자 메시지로 표시된다. 자동 재시도 없음.
 */

export type BacktestLabErrorCode =
  | 'DATA_UNAVAILABLE'
  | 'DATA_SOURCE_FAILURE'
  | 'PRECONDITION_NOT_MET'
  | 'INVALID_CONFIGURATION'
  | 'DEGENERATE_STATISTIC';

export class BacktestLabError extends Error {
  readonly code: BacktestLabErrorCode;

  constructor(code: BacktestLabErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BacktestLabError';
    this.code = code;
  }
}

/** 조회 결과가 비어 있음 */
export class DataUnavailableError extends BacktestLabError {
  readonly ticker: string;

  constructor(ticker: string, detail?: string) {
    super('DATA_UNAVAILABLE', `해당 종목/기간의 시세 데이터가 없습니다: ${ticker}${detail ? ` (${detail})` : ''}`);
    this.name = 'DataUnavailableError';
    this.ticker = ticker;
  }
}

/** 시세 제공자 통신/파싱 실패 */
export class DataSourceFailureError extends BacktestLabError {
  constructor(message: string, cause?: unknown) {
    super('DATA_SOURCE_FAILURE', `시세 조회 실패: ${message}`, { cause });
    this.name = 'DataSourceFailureError';
  }
}

/** 선행 단계 결과가 없음 (예: 백테스트 전에 모의 거래 요청) */
export class PreconditionNotMetError extends BacktestLabError {
  constructor(message: string) {
    super('PRECONDITION_NOT_MET', message);
    this.name = 'PreconditionNotMetError';
  }
}

/** 설정값 범위 위반 */
export class InvalidConfigurationError extends BacktestLabError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIGURATION', `잘못된 설정: ${issues.join('; ')}`);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

/** 분산 0 등으로 통계값이 정의되지 않음 */
export class DegenerateStatisticError extends BacktestLabError {
  readonly statistic: string;

  constructor(statistic: string, reason: string) {
    super('DEGENERATE_STATISTIC', `${statistic} 계산 불가: ${reason}`);
    this.name = 'DegenerateStatisticError';
    this.statistic = statistic;
  }
}

export function isBacktestLabError(error: unknown): error is BacktestLabError {
  return error instanceof BacktestLabError;
}
