// 레벨 기반 콘솔 로거
// silent: 출력 없음 / warn: 경고·에러만 / info: 전체

export type LogLevel = 'silent' | 'warn' | 'info';

const LEVEL_ORDER: Record<LogLevel, number> = { silent: 0, warn: 1, info: 2 };

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[currentLevel] >= LEVEL_ORDER[level];
}

export const logger = {
  /** 정보 로그 (info 레벨에서만 출력) */
  info: (...args: unknown[]) => {
    if (enabled('info')) console.info(...args);
  },

  /** 경고 로그 */
  warn: (...args: unknown[]) => {
    if (enabled('warn')) console.warn(...args);
  },

  /** 에러 로그 (silent 제외 항상 출력) */
  error: (...args: unknown[]) => {
    if (enabled('warn')) console.error(...args);
  },
};
