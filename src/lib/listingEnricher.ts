import type { ListingRecord, ListingRow, RegionOptions } from '../types';
import { DEFAULT_LEXICON, type Lexicon } from './lexicon';
import { extractTitleFields } from './titleExtractor';

const DATE_PATTERN = /(\d{4})[.\-/](\d{1,2})[.\-/](\d{1,2})/;

/**
 * 게시일 정규화: '2025.09.11', '2025/9/1' → 'YYYY-MM-DD' (날짜 없으면 '')
 */
export function normalizePostDate(value: string | null | undefined): string {
  const m = DATE_PATTERN.exec(value ?? '');
  if (!m) return '';
  const [, y, mo, d] = m;
  return `${y}-${mo.padStart(2, '0')}-${d.padStart(2, '0')}`;
}

/**
 * 용도: 제목에 '오피스텔'이 있으면 '오피스텔', 아니면 ''
 */
export function detectPurpose(title: string | null | undefined): string {
  return (title ?? '').includes('오피스텔') ? '오피스텔' : '';
}

/**
 * 게시판 레코드 1건에 추출 필드 채우기 (duplicate는 중복감지 단계에서)
 */
export function enrichListing(
  record: ListingRecord,
  options: RegionOptions = {},
  lexicon: Lexicon = DEFAULT_LEXICON
): ListingRow {
  const title = record.title.trim();
  const fields = extractTitleFields(title, { useAddressFallback: true, ...options }, lexicon);

  return {
    no: record.no?.trim() ?? '',
    trustName: record.trustName?.trim() ?? '',
    title,
    postDate: normalizePostDate(record.postDate),
    address: fields.address,
    city: fields.provinceDistrict,
    building: fields.building,
    saleContent: fields.saleContent,
    purpose: detectPurpose(title),
    duplicate: '',
    url: record.url.trim(),
  };
}
