export { createLogger, Logger, parseLogLevel, type LogLevel } from './logger.js';
export { envString, envNumber } from './env.js';
export { loadWorkspaceEnv } from './env-loader.js';
export {
  nowIso,
  todayIsoDate,
  isIsoDate,
  isoDateToEpochSeconds,
  epochSecondsToIsoDate,
} from './date.js';

export type Nullable<T> = T | null;
