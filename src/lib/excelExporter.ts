import { writeFileSync } from 'fs';
import * as XLSX from 'xlsx';
import type { ListingRow } from '../types';
import { logger } from './logger';

/** 목록 시트 헤더 (컬럼 순서 고정) */
export const LISTING_HEADER = [
  'no',
  'trust_name',
  'title',
  'post_date',
  'address',
  'city',
  'building',
  'sale_content',
  'purpose',
  'duplicate',
  'url',
] as const;

export function toSheetRow(row: ListingRow): string[] {
  return [
    row.no,
    row.trustName,
    row.title,
    row.postDate,
    row.address,
    row.city,
    row.building,
    row.saleContent,
    row.purpose,
    row.duplicate,
    row.url,
  ];
}

export function createListingSheet(rows: ListingRow[]): XLSX.WorkSheet {
  const ws = XLSX.utils.aoa_to_sheet([[...LISTING_HEADER], ...rows.map(toSheetRow)]);

  ws['!cols'] = [
    { wch: 6 },     // A: no
    { wch: 12 },    // B: trust_name
    { wch: 60 },    // C: title
    { wch: 11 },    // D: post_date
    { wch: 36 },    // E: address
    { wch: 20 },    // F: city
    { wch: 20 },    // G: building
    { wch: 30 },    // H: sale_content
    { wch: 9 },     // I: purpose
    { wch: 8 },     // J: duplicate
    { wch: 50 },    // K: url
  ];

  return ws;
}

/**
 * 목록 행을 워크북 버퍼로 직렬화
 */
export function buildListingWorkbook(rows: ListingRow[], sheetName = 'listings'): Buffer {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, createListingSheet(rows), sheetName);
  const out: Buffer = XLSX.write(wb, { bookType: 'xlsx', type: 'buffer' });
  return out;
}

/**
 * 목록 행을 .xlsx 파일로 저장
 */
export function writeListingWorkbook(rows: ListingRow[], path: string, sheetName = 'listings'): void {
  if (rows.length === 0) {
    logger.warn('[엑셀내보내기] 저장할 행이 없습니다. 헤더만 기록합니다.');
  }
  writeFileSync(path, buildListingWorkbook(rows, sheetName));
  logger.info('[엑셀내보내기]', path, '| 시트:', sheetName, '| 행:', rows.length);
}
