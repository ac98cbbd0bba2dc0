import 'dotenv/config';
import { Command } from 'commander';
import { resolveLexicon, runConvert, runFields, runReview } from './cli/commands';
import { loadConfig, type AppConfig } from './lib/config';
import { logger, setLogLevel } from './lib/logger';

interface SheetOptions {
  sheet?: string;
  titleColumn?: string;
}

function withOverrides(config: AppConfig, opts: SheetOptions): AppConfig {
  return {
    ...config,
    sheetName: opts.sheet ?? config.sheetName,
    titleColumn: opts.titleColumn ?? config.titleColumn,
  };
}

export function createProgram(config: AppConfig): Command {
  const program = new Command();

  program
    .name('title-extract')
    .description('매각 공고 제목에서 주소·시군구·건물명·매각내용 추출')
    .version('0.1.0');

  program
    .command('fields')
    .description('제목별 추출 결과를 JSON으로 출력')
    .argument('<titles...>', '공고 제목')
    .option('--no-fallback', '시군구 매칭 실패 시 주소 재시도 안 함')
    .action((titles: string[], opts: { fallback: boolean }) => {
      const result = runFields(titles, opts, resolveLexicon(config));
      console.log(JSON.stringify(result, null, 2));
    });

  program
    .command('convert')
    .description('목록 워크북에 추출 필드와 중복 표기를 채워 저장')
    .argument('<input>', '입력 .xlsx/.csv')
    .requiredOption('-o, --output <path>', '출력 .xlsx (있으면 이어 쓰기)')
    .option('-s, --sheet <name>', '입력 시트명')
    .option('--title-column <name>', '제목 컬럼명')
    .action((input: string, opts: SheetOptions & { output: string }) => {
      const effective = withOverrides(config, opts);
      const rows = runConvert(input, opts.output, effective, resolveLexicon(effective));
      logger.info(`[변환] ${opts.output} 저장 완료 (${rows.length}행)`);
    });

  program
    .command('review')
    .description('주소 분기가 여러 개 성립하는 제목 목록')
    .argument('<input>', '입력 .xlsx/.csv')
    .option('-s, --sheet <name>', '입력 시트명')
    .option('--title-column <name>', '제목 컬럼명')
    .action((input: string, opts: SheetOptions) => {
      const effective = withOverrides(config, opts);
      for (const item of runReview(input, effective, resolveLexicon(effective))) {
        console.log(`${item.branches.join(' > ')}\t${item.address}\t${item.title}`);
      }
    });

  return program;
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  await createProgram(config).parseAsync(process.argv);
}

main().catch((err: unknown) => {
  logger.error('[title-extract]', err instanceof Error ? `${err.name}: ${err.message}` : err);
  process.exitCode = 1;
});
