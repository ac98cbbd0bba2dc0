import { readFileSync } from 'fs';
import * as XLSX from 'xlsx';
import type { ColumnMapping, ListingRecord, ListingRow } from '../types';
import { logger } from './logger';

export class SheetNotFoundError extends Error {
  constructor(sheetName: string) {
    super(`시트를 찾을 수 없습니다: ${sheetName}`);
    this.name = 'SheetNotFoundError';
  }
}

export class ColumnMappingError extends Error {
  constructor(field: string, candidates: string[]) {
    super(`'${field}' 컬럼을 찾을 수 없습니다 (후보: ${candidates.join(', ')})`);
    this.name = 'ColumnMappingError';
  }
}

/** 매핑 미지정 시 자동 감지할 컬럼명 후보 */
export const COLUMN_CANDIDATES: Record<keyof ColumnMapping, string[]> = {
  title: ['title', '제목', '물건명', '공고명'],
  url: ['url', 'URL', '링크', '상세URL'],
  postDate: ['post_date', '게시일', '등록일', '작성일', '공고일'],
  no: ['no', '번호', 'No'],
  trustName: ['trust_name', '신탁사', '신탁사명'],
};

/**
 * 헤더에서 컬럼 찾기
 * 1) 정확 매칭 우선
 * 2) 공백 제거 + 대소문자 무시 매칭
 */
export function findColumn(headers: string[], candidates: string[]): string | undefined {
  for (const c of candidates) {
    if (headers.includes(c)) return c;
  }
  const norm = (s: string) => s.replace(/\s/g, '').toLowerCase();
  for (const c of candidates) {
    const nc = norm(c);
    const hit = headers.find(h => norm(h) === nc);
    if (hit) return hit;
  }
  return undefined;
}

/**
 * 워크북 버퍼에서 특정 시트의 행 파싱 (빈 행 제외)
 */
export function parseSheetRows(
  data: Uint8Array | string,
  sheetName?: string
): { headers: string[]; rows: Record<string, unknown>[] } {
  // CSV 텍스트는 값 추론 없이 문자열 그대로
  const isText = typeof data === 'string';
  const workbook = XLSX.read(data, { type: isText ? 'string' : 'array', raw: isText });
  const name = sheetName ?? workbook.SheetNames[0];
  const sheet = name ? workbook.Sheets[name] : undefined;
  if (!sheet) {
    throw new SheetNotFoundError(sheetName ?? '(첫 시트)');
  }

  const jsonData = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, {
    defval: '',
    raw: false,
  });

  const filtered = jsonData.filter(row =>
    Object.values(row).some(v => v !== '' && v != null)
  );
  const headers = filtered.length > 0 ? Object.keys(filtered[0]) : [];
  return { headers, rows: filtered };
}

/**
 * 컬럼 매핑 결정: 명시 매핑 → 후보 자동 감지
 * 제목 컬럼은 필수, 나머지는 없으면 빈 값
 */
export function resolveColumnMapping(headers: string[], explicit: Partial<ColumnMapping> = {}): ColumnMapping {
  const pick = (field: keyof ColumnMapping): string | undefined => {
    const name = explicit[field];
    if (name) {
      if (!headers.includes(name)) throw new ColumnMappingError(field, [name]);
      return name;
    }
    return findColumn(headers, COLUMN_CANDIDATES[field]);
  };

  const title = pick('title');
  if (!title) throw new ColumnMappingError('title', COLUMN_CANDIDATES.title);

  return {
    title,
    url: pick('url'),
    postDate: pick('postDate'),
    no: pick('no'),
    trustName: pick('trustName'),
  };
}

/**
 * CSV는 UTF-8 문자열로, 그 외는 바이트로 읽기
 */
function loadWorkbookData(path: string): Uint8Array | string {
  return /\.csv$/i.test(path) ? readFileSync(path, 'utf-8') : readFileSync(path);
}

function cell(row: Record<string, unknown>, column: string | undefined): string {
  if (!column) return '';
  const v = row[column];
  return v == null ? '' : String(v).trim();
}

/**
 * 매핑을 적용하여 raw 행을 ListingRecord 배열로 변환 (제목 없는 행 제외)
 */
export function applyColumnMapping(
  rows: Record<string, unknown>[],
  mapping: ColumnMapping,
  defaultTrustName = ''
): ListingRecord[] {
  const records = rows
    .map(row => ({
      no: cell(row, mapping.no),
      trustName: cell(row, mapping.trustName) || defaultTrustName,
      title: cell(row, mapping.title),
      postDate: cell(row, mapping.postDate),
      url: cell(row, mapping.url),
    }))
    .filter(r => r.title);

  if (records.length < rows.length) {
    logger.warn(`[엑셀파서] 제목이 비어 있는 행 ${rows.length - records.length}건 제외`);
  }
  return records;
}

/**
 * 게시판 목록 워크북(.xlsx/.csv) 읽기
 */
export function readListingWorkbook(
  path: string,
  options: { sheetName?: string; mapping?: Partial<ColumnMapping>; trustName?: string } = {}
): ListingRecord[] {
  const { headers, rows } = parseSheetRows(loadWorkbookData(path), options.sheetName);
  const mapping = resolveColumnMapping(headers, options.mapping);
  logger.info('[엑셀파서]', path, '| 행:', rows.length, '| 제목 컬럼:', mapping.title);
  return applyColumnMapping(rows, mapping, options.trustName);
}

/**
 * 이전에 내보낸 목록 시트에서 기존 행 복원 (중복 누계용)
 */
export function readExistingRows(path: string, sheetName?: string): ListingRow[] {
  const { rows } = parseSheetRows(loadWorkbookData(path), sheetName);
  return rows.map(row => ({
    no: cell(row, 'no'),
    trustName: cell(row, 'trust_name'),
    title: cell(row, 'title'),
    postDate: cell(row, 'post_date'),
    address: cell(row, 'address'),
    city: cell(row, 'city'),
    building: cell(row, 'building'),
    saleContent: cell(row, 'sale_content'),
    purpose: cell(row, 'purpose'),
    duplicate: cell(row, 'duplicate'),
    url: cell(row, 'url'),
  }));
}
