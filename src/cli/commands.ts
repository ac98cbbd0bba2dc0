import { existsSync } from 'fs';
import type { AddressBranch, ColumnMapping, ListingRow, TitleFields } from '../types';
import { findPlausibleBranches } from '../lib/addressParser';
import type { AppConfig } from '../lib/config';
import { buildDuplicateState, markDuplicates, numberDuplicates } from '../lib/duplicateDetector';
import { readExistingRows, readListingWorkbook } from '../lib/excelParser';
import { writeListingWorkbook } from '../lib/excelExporter';
import { DEFAULT_LEXICON, loadLexiconFile, type Lexicon } from '../lib/lexicon';
import { enrichListing } from '../lib/listingEnricher';
import { logger } from '../lib/logger';
import { createTitleExtractor } from '../lib/titleExtractor';

export function resolveLexicon(config: Pick<AppConfig, 'lexiconPath'>): Lexicon {
  return config.lexiconPath ? loadLexiconFile(config.lexiconPath) : DEFAULT_LEXICON;
}

export function mappingFromConfig(config: AppConfig): Partial<ColumnMapping> {
  const mapping: Partial<ColumnMapping> = {};
  if (config.titleColumn) mapping.title = config.titleColumn;
  if (config.urlColumn) mapping.url = config.urlColumn;
  if (config.dateColumn) mapping.postDate = config.dateColumn;
  return mapping;
}

/**
 * fields: 제목별 추출 결과
 */
export function runFields(
  titles: string[],
  options: { fallback: boolean },
  lexicon: Lexicon = DEFAULT_LEXICON
): Array<{ title: string } & TitleFields> {
  const extractor = createTitleExtractor(lexicon);
  return titles.map(title => ({
    title,
    ...extractor.extractFields(title, { useAddressFallback: options.fallback }),
  }));
}

/**
 * convert: 목록 워크북 → 추출 필드 + 중복 표기 워크북
 * output이 이미 있으면 기존 행 뒤에 신규 URL만 이어 붙인다.
 *
 * markDuplicates는 URL 건너뛰기와 중복 건수 로그에만 쓰고,
 * duplicate 컬럼은 기존+신규 전체에 대해 numberDuplicates가 '중복1..N'으로 다시 쓴다.
 */
export function runConvert(
  input: string,
  output: string,
  config: AppConfig,
  lexicon: Lexicon = DEFAULT_LEXICON
): ListingRow[] {
  const records = readListingWorkbook(input, {
    sheetName: config.sheetName,
    mapping: mappingFromConfig(config),
    trustName: config.trustName,
  });

  const existing = existsSync(output) ? readExistingRows(output, config.outputSheetName) : [];
  const enriched = records.map(r => enrichListing(r, { useAddressFallback: true }, lexicon));
  const { appended } = markDuplicates(enriched, buildDuplicateState(existing));

  const rows = numberDuplicates([...existing, ...appended]);
  writeListingWorkbook(rows, output, config.outputSheetName);
  logger.info('[변환] 입력:', records.length, '| 기존:', existing.length, '| 신규:', appended.length);
  return rows;
}

export interface ReviewItem {
  title: string;
  address: string;
  branches: AddressBranch[];
}

/**
 * review: 주소 분기가 2개 이상 성립하는 제목 (수동 검토 대상)
 */
export function runReview(input: string, config: AppConfig, lexicon: Lexicon = DEFAULT_LEXICON): ReviewItem[] {
  const records = readListingWorkbook(input, {
    sheetName: config.sheetName,
    mapping: mappingFromConfig(config),
  });
  const extractor = createTitleExtractor(lexicon);

  return records
    .map(r => ({
      title: r.title,
      address: extractor.extractAddress(r.title),
      branches: findPlausibleBranches(r.title, lexicon),
    }))
    .filter(item => item.branches.length > 1);
}
