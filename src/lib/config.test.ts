import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from './config';

describe('loadConfig', () => {
  it('기본값', () => {
    expect(loadConfig({})).toEqual({
      titleColumn: undefined,
      urlColumn: undefined,
      dateColumn: undefined,
      sheetName: undefined,
      outputSheetName: 'listings',
      trustName: '',
      logLevel: 'info',
      lexiconPath: undefined,
    });
  });

  it('환경 변수 반영, 빈 값은 미설정', () => {
    const config = loadConfig({
      TITLE_COLUMN: '물건명',
      SHEET_NAME: ' ',
      LOG_LEVEL: 'warn',
      TRUST_NAME: '테스트신탁',
    });
    expect(config.titleColumn).toBe('물건명');
    expect(config.sheetName).toBeUndefined();
    expect(config.logLevel).toBe('warn');
    expect(config.trustName).toBe('테스트신탁');
  });

  it('잘못된 로그 레벨은 ConfigError', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'debug' })).toThrow(ConfigError);
  });
});
