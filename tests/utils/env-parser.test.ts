import { describe, it, expect } from 'vitest';
import { parseBrowserConfig, parseLogConfig } from '../../src/utils/env-parser.js';
import { ConfigValidationError } from '../../src/utils/config-schemas.js';

describe('parseLogConfig', () => {
  it('should default to info without pretty printing', () => {
    expect(parseLogConfig({})).toEqual({ level: 'info', prettyPrint: false });
  });

  it('should read LOG_LEVEL and LOG_PRETTY', () => {
    expect(parseLogConfig({ LOG_LEVEL: 'debug', LOG_PRETTY: 'true' })).toEqual({ level: 'debug', prettyPrint: true });
  });

  it('should reject an unknown level', () => {
    expect(() => parseLogConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigValidationError);
  });
});

describe('parseBrowserConfig', () => {
  it('should apply defaults', () => {
    expect(parseBrowserConfig({})).toEqual({ headed: false, navigationTimeout: 25000, logsDir: 'logs' });
  });

  it('should read the scout variables', () => {
    expect(
      parseBrowserConfig({ SCOUT_HEADED: 'yes', SCOUT_NAVIGATION_TIMEOUT: '40000', SCOUT_LOGS_DIR: '/tmp/scout' })
    ).toEqual({ headed: true, navigationTimeout: 40000, logsDir: '/tmp/scout' });
  });

  it('should reject a timeout out of range', () => {
    expect(() => parseBrowserConfig({ SCOUT_NAVIGATION_TIMEOUT: '10' })).toThrow(ConfigValidationError);
  });
});
