import type { Span } from '../types';
import { matchAddress, stripTitlePrefix } from './addressParser';
import { findBuildingCandidate } from './buildingExtractor';
import { DEFAULT_LEXICON, type Lexicon } from './lexicon';
import { extractProvinceDistrict } from './regionSummarizer';

const SEPARATORS = '[,·ㆍ/]';

function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * removed 구간과 겹치지 않는 needle의 첫 위치
 */
function findFreeOccurrence(text: string, needle: string, from: number, removed: Span[]): Span | null {
  let at = text.indexOf(needle, from);
  while (at >= 0) {
    const span = { start: at, end: at + needle.length };
    if (!removed.some(r => overlaps(r, span))) return span;
    at = text.indexOf(needle, at + 1);
  }
  return null;
}

/**
 * 건물명 바로 뒤에 붙은 동/층/호 토큰까지 확장 ('한빛아파트 101동 1203호')
 */
function extendOverUnits(text: string, end: number, lexicon: Lexicon): number {
  const units = new RegExp(`^(?:\\s*${lexicon.grammar.unitToken})+`);
  const m = units.exec(text.slice(end));
  return m ? end + m[0].length : end;
}

/**
 * [from, 끝) 구간에서 spans를 잘라낸 나머지 (잘린 자리는 공백 1칸)
 */
function removeSpans(text: string, from: number, spans: Span[]): string {
  const sorted = [...spans].sort((a, b) => a.start - b.start);
  const pieces: string[] = [];
  let cursor = from;
  for (const span of sorted) {
    if (span.end <= cursor) continue;
    if (span.start > cursor) pieces.push(text.slice(cursor, span.start));
    cursor = Math.max(cursor, span.end);
  }
  pieces.push(text.slice(cursor));
  return pieces.join(' ');
}

/**
 * 공백/구두점 정리 + 선두 '외 N' → 'N'
 */
export function normalizeSaleText(s: string): string {
  return s
    .replace(/\s+/g, ' ')
    .replace(new RegExp(`\\s*(${SEPARATORS})\\s*`, 'g'), '$1')
    .replace(new RegExp(`(${SEPARATORS})${SEPARATORS}+`, 'g'), '$1')
    .replace(new RegExp(`^${SEPARATORS}+|${SEPARATORS}+$`, 'g'), '')
    .trim()
    .replace(/^외\s*(\d+)/, '$1')
    .trim();
}

/**
 * 매각내용: 주소 → 시군구 요약 → 건물명 순으로 한 번씩 제거 후 정리
 *
 * 주소/건물명은 매칭 위치(span)로 잘라내고, 시군구 요약은 원 제목 기준으로 계산해
 * 이미 잘린 구간과 겹치지 않는 첫 위치를 제거한다.
 * 예: '경기 파주 야당동 한빛마을아파트 101동 일괄매각' → '일괄매각'
 */
export function extractSaleContent(title: string | null | undefined, lexicon: Lexicon = DEFAULT_LEXICON): string {
  const text = title ?? '';
  const from = stripTitlePrefix(text).prefix.length;
  const removed: Span[] = [];

  const address = matchAddress(text, lexicon);
  if (address) removed.push({ start: address.start, end: address.end });

  const region = extractProvinceDistrict(text, { useAddressFallback: true }, lexicon);
  if (region) {
    const span = findFreeOccurrence(text, region, from, removed);
    if (span) removed.push(span);
  }

  const building = findBuildingCandidate(text, lexicon);
  if (building) {
    removed.push({ start: building.start, end: extendOverUnits(text, building.end, lexicon) });
  }

  return normalizeSaleText(removeSpans(text, from, removed));
}
