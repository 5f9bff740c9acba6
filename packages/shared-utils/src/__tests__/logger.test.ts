import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, parseLogLevel } from '../logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('JSON 한 줄로 출력', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    createLogger('test-service', 'INFO').info('시작', { ticker: 'TEST' });

    expect(log).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(log.mock.calls[0]![0]));
    expect(entry).toMatchObject({
      level: 'INFO',
      service: 'test-service',
      message: '시작',
      data: { ticker: 'TEST' },
    });
    expect(entry).toHaveProperty('timestamp');
  });

  it('최소 레벨 미만은 출력하지 않음', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = createLogger('test-service', 'WARN');
    logger.debug('debug');
    logger.info('info');
    logger.warn('warn');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('레벨을 지정하지 않으면 생성 이후 설정된 LOG_LEVEL을 따름', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = createLogger('test-service');
    vi.stubEnv('LOG_LEVEL', 'WARN');
    logger.info('info');
    logger.warn('warn');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);

    vi.stubEnv('LOG_LEVEL', 'DEBUG');
    logger.debug('debug');

    expect(log).toHaveBeenCalledTimes(1);
  });

  it('잘못된 LOG_LEVEL이어도 생성은 실패하지 않음', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');

    const logger = createLogger('test-service');

    expect(() => logger.info('info')).toThrow('LOG_LEVEL must be one of DEBUG|INFO|WARN|ERROR, got: verbose');
  });

  it('Error는 name/message/stack으로 기록', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    createLogger('test-service', 'DEBUG').error('실패', { error: new RangeError('bad') });

    const entry: unknown = JSON.parse(String(error.mock.calls[0]![0]));
    expect(entry).toMatchObject({ level: 'ERROR', data: { error: { name: 'RangeError', message: 'bad' } } });
  });
});

describe('parseLogLevel', () => {
  it('대소문자 무시, 비어 있으면 INFO', () => {
    expect(parseLogLevel('debug')).toBe('DEBUG');
    expect(parseLogLevel('warning')).toBe('WARN');
    expect(parseLogLevel(undefined)).toBe('INFO');
    expect(parseLogLevel('  ')).toBe('INFO');
  });

  it('알 수 없는 값은 에러', () => {
    expect(() => parseLogLevel('verbose')).toThrow('LOG_LEVEL must be one of DEBUG|INFO|WARN|ERROR, got: verbose');
  });
});
