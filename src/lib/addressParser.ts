import type { AddressBranch, AddressMatch } from '../types';
import { ADDRESS_BRANCHES } from '../types';
import { DEFAULT_LEXICON, type Lexicon } from './lexicon';

/**
 * 제목 앞의 번호/상태 태그
 * 예: '1. ', '[공매] ', '3. [재공매] '
 */
const TITLE_PREFIX = /^\s*(?:(?:\d+\.|\[[^\]]*\])\s*)*/;

export function stripTitlePrefix(title: string | null | undefined): { prefix: string; rest: string } {
  const s = title ?? '';
  const prefix = s.match(TITLE_PREFIX)?.[0] ?? '';
  return { prefix, rest: s.slice(prefix.length) };
}

type BranchPatterns = Record<AddressBranch, RegExp>;

const compiled = new WeakMap<Lexicon, BranchPatterns>();

/**
 * 어휘 사전별 분기 정규식 (최초 1회 컴파일)
 *
 * 공통 꼬리: 읍/면/동/가/리 최대 3개 → 지구/구역 → 도로명 → 지번 목록
 */
function getBranchPatterns(lexicon: Lexicon): BranchPatterns {
  const cached = compiled.get(lexicon);
  if (cached) return cached;

  const g = lexicon.grammar;
  const towns = `${g.town}(?:\\s+${g.town}){0,2}`;
  const optionalTowns = `(?:\\s+(?<towns>${towns}))?`;
  const requiredTowns = `\\s+(?<towns>${towns})`;
  const rest =
    `(?:\\s+(?<plan>${g.planningDistrict}))?` +
    `(?:\\s+(?<road>${g.road}))?` +
    `(?:\\s*(?<lots>${g.lotList}))?`;
  const districts = `(?<districts>${g.cityGunGu}(?:\\s+${g.cityGunGu})*)`;

  const patterns: BranchPatterns = {
    // 세종: 시/군/구 단계 없음
    sejong: new RegExp(`^(?<province>${g.sejong})${optionalTowns}${rest}`),
    general: new RegExp(`^(?<province>${g.province})\\s+${districts}${optionalTowns}${rest}`),
    districtOnly: new RegExp(`^${districts}${optionalTowns}${rest}`),
    // '경기 파주 야당동', '충남 홍성 오관리'
    provinceRawCityTown: new RegExp(`^(?<province>${g.province})\\s+(?<rawCity>${g.rawCity})${requiredTowns}${rest}`),
    // '인천 만수동', '제주 한림읍'
    provinceTown: new RegExp(`^(?<province>${g.province})${requiredTowns}${rest}`),
  };
  compiled.set(lexicon, patterns);
  return patterns;
}

function splitTokens(s: string | undefined): string[] {
  return s ? s.split(/\s+/).filter(Boolean) : [];
}

/**
 * 제목 앞머리의 행정구역~지번 구간 매칭
 * 분기는 우선순위 순으로 시도하며 처음 성공한 분기만 반환한다.
 */
export function matchAddress(
  title: string | null | undefined,
  lexicon: Lexicon = DEFAULT_LEXICON
): AddressMatch | null {
  const { prefix, rest } = stripTitlePrefix(title);
  const patterns = getBranchPatterns(lexicon);

  for (const kind of ADDRESS_BRANCHES) {
    const m = patterns[kind].exec(rest);
    if (!m || !m[0]) continue;

    const groups = m.groups ?? {};
    return {
      kind,
      text: m[0],
      start: prefix.length,
      end: prefix.length + m[0].length,
      province: groups.province ?? '',
      districts: splitTokens(groups.districts),
      rawCity: groups.rawCity ?? '',
      towns: splitTokens(groups.towns),
      planningDistrict: groups.plan ?? '',
      road: groups.road ?? '',
      lots: groups.lots ?? '',
    };
  }
  return null;
}

/**
 * 제목에서 '주소만' 추출 (없으면 '')
 * 예: '전주시 완산구 고사동 408-3 토지 매각' → '전주시 완산구 고사동 408-3'
 */
export function extractAddress(title: string | null | undefined, lexicon: Lexicon = DEFAULT_LEXICON): string {
  return matchAddress(title, lexicon)?.text ?? '';
}

/**
 * 단독으로 매칭되는 모든 분기 (검토용)
 * 2개 이상이면 우선순위가 결과를 결정한 제목이다.
 */
export function findPlausibleBranches(
  title: string | null | undefined,
  lexicon: Lexicon = DEFAULT_LEXICON
): AddressBranch[] {
  const { rest } = stripTitlePrefix(title);
  const patterns = getBranchPatterns(lexicon);
  return ADDRESS_BRANCHES.filter(kind => {
    const m = patterns[kind].exec(rest);
    return m !== null && m[0] !== '';
  });
}

/**
 * 주소 정규화 (비교용)
 * - 공백 제거
 * - 하이픈 글리프 통일 ('408–3' → '408-3')
 * - 한글/영숫자/하이픈/쉼표만 유지
 */
export function normalizeAddress(address: string): string {
  return address
    .replace(/\s+/g, '')
    .replace(new RegExp(DEFAULT_LEXICON.grammar.hyphen, 'g'), '-')
    .replace(/[^\w가-힣,-]/g, '');
}
