import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const EnvSchema = z.object({
  TITLE_COLUMN: z.string().min(1).optional(),
  URL_COLUMN: z.string().min(1).optional(),
  DATE_COLUMN: z.string().min(1).optional(),
  SHEET_NAME: z.string().min(1).optional(),
  OUTPUT_SHEET_NAME: z.string().min(1).default('listings'),
  TRUST_NAME: z.string().default(''),
  LOG_LEVEL: z.enum(['silent', 'warn', 'info']).default('info'),
  LEXICON_PATH: z.string().min(1).optional(),
});

export interface AppConfig {
  titleColumn?: string;
  urlColumn?: string;
  dateColumn?: string;
  sheetName?: string;
  outputSheetName: string;
  trustName: string;
  logLevel: 'silent' | 'warn' | 'info';
  lexiconPath?: string;
}

/**
 * 환경 변수 → 설정값 (빈 문자열은 미설정으로 취급)
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== '')
  );
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new ConfigError(`설정 오류: ${issues}`);
  }

  const e = parsed.data;
  return {
    titleColumn: e.TITLE_COLUMN,
    urlColumn: e.URL_COLUMN,
    dateColumn: e.DATE_COLUMN,
    sheetName: e.SHEET_NAME,
    outputSheetName: e.OUTPUT_SHEET_NAME,
    trustName: e.TRUST_NAME,
    logLevel: e.LOG_LEVEL,
    lexiconPath: e.LEXICON_PATH,
  };
}
