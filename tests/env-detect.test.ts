import { describe, it, expect } from 'vitest';
import { DEFAULT_LOG_FILE, detectEnvironment, loggingConfigFor } from '../src/core/env-detect.js';
import { readApiKey, resolveEnvPlaceholders } from '../src/utils/env.js';

describe('detectEnvironment', () => {
  it('should use defaults for an empty environment', () => {
    expect(detectEnvironment({})).toEqual({
      logLevel: 'info',
      logFile: DEFAULT_LOG_FILE,
      logTimezone: 'UTC',
      configPath: 'config/config.yaml',
    });
  });

  it('讀取環境變數，無效的 LOG_LEVEL 退回 info', () => {
    expect(
      detectEnvironment({
        LOG_LEVEL: ' DEBUG ',
        LOG_FILE: '/var/log/push.log',
        LOG_TIMEZONE: 'Asia/Taipei',
        PUSH_ASSISTANT_CONFIG: '/etc/push/config.yaml',
      })
    ).toEqual({
      logLevel: 'debug',
      logFile: '/var/log/push.log',
      logTimezone: 'Asia/Taipei',
      configPath: '/etc/push/config.yaml',
    });
    expect(detectEnvironment({ LOG_LEVEL: 'loud' }).logLevel).toBe('info');
  });
});

describe('loggingConfigFor', () => {
  it('LOG_FILE 為空字串時只輸出到 stderr', () => {
    expect(loggingConfigFor(detectEnvironment({ LOG_FILE: '' })).destinations).toEqual(['stderr']);
  });

  it('should append a file destination', () => {
    expect(loggingConfigFor(detectEnvironment({ LOG_LEVEL: 'warn' }))).toEqual({
      destinations: ['stderr', { file: DEFAULT_LOG_FILE }],
      level: 'warn',
      timezone: 'UTC',
    });
  });
});

describe('resolveEnvPlaceholders', () => {
  it('should replace ${VAR} tokens and keep unknown ones', () => {
    const env = { TOKEN: 'test-secret' };
    expect(resolveEnvPlaceholders('${TOKEN}', env)).toBe('test-secret');
    expect(resolveEnvPlaceholders('pre-${TOKEN}-${MISSING}', env)).toBe('pre-test-secret-${MISSING}');
    expect(resolveEnvPlaceholders('plain', env)).toBe('plain');
  });
});

describe('readApiKey', () => {
  it('should trim the value and default to empty', () => {
    expect(readApiKey('KEY', { KEY: '  test-secret \n' })).toBe('test-secret');
    expect(readApiKey('KEY', {})).toBe('');
  });
});
