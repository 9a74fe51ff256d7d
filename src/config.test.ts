import { describe, it, expect } from 'vitest';
import { configFromEnv, parseConfig } from './config';

describe('config', () => {
  it('fills defaults', () => {
    expect(parseConfig({})).toEqual({ settingsDirectory: './settings', userDataPath: '.', logLevel: 'info' });
    expect(parseConfig(undefined).logLevel).toBe('info');
  });

  it('reads the environment', () => {
    const config = configFromEnv({
      SCAN_TASKS_SETTINGS_DIR: '/etc/scan-tasks',
      SCAN_TASKS_LOG_LEVEL: 'debug',
      SCAN_TASKS_DATA_DIR: '',
    });
    expect(config).toEqual({ settingsDirectory: '/etc/scan-tasks', userDataPath: '.', logLevel: 'debug' });
  });

  it('rejects unknown log levels', () => {
    expect(() => configFromEnv({ SCAN_TASKS_LOG_LEVEL: 'loud' })).toThrow();
  });
});
