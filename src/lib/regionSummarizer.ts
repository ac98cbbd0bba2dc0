import type { RegionOptions, RegionSummary } from '../types';
import { extractAddress, stripTitlePrefix } from './addressParser';
import { DEFAULT_LEXICON, canonicalize, type Lexicon } from './lexicon';

interface RegionPatterns {
  provinceDistrict: RegExp;
  sejong: RegExp;
  districtOnly: RegExp;
  provinceRawCity: RegExp;
  provinceTown: RegExp;
}

const compiled = new WeakMap<Lexicon, RegionPatterns>();

function getRegionPatterns(lexicon: Lexicon): RegionPatterns {
  const cached = compiled.get(lexicon);
  if (cached) return cached;

  const g = lexicon.grammar;
  const patterns: RegionPatterns = {
    provinceDistrict: new RegExp(`^(?<province>${g.province})\\s+(?<d1>${g.cityGunGu})(?:\\s+(?<d2>${g.cityGunGu}))?`),
    sejong: new RegExp(`^(?<province>${g.sejong})`),
    districtOnly: new RegExp(`^(?<d1>${g.cityGunGu})(?:\\s+(?<d2>${g.cityGunGu}))?`),
    provinceRawCity: new RegExp(`^(?<province>${g.province})\\s+(?<rawCity>${g.rawCity})\\s+${g.town}`),
    provinceTown: new RegExp(`^(?<province>${g.province})\\s+${g.town}`),
  };
  compiled.set(lexicon, patterns);
  return patterns;
}

function districtsOf(groups: Record<string, string | undefined>): string[] {
  return [groups.d1, groups.d2].filter((d): d is string => !!d);
}

/**
 * 5단계 우선순위로 지역 요약 매칭
 * 1) 광역/도 + 시군구 1~2개
 * 2) 세종
 * 3) 시군구 단독 시작
 * 4) 광역/도 + 원시 도시명 + 동/읍/면
 * 5) 광역/도 + 동/읍/면
 */
function matchRegion(text: string, lexicon: Lexicon): RegionSummary | null {
  const p = getRegionPatterns(lexicon);

  let groups = p.provinceDistrict.exec(text)?.groups;
  if (groups) {
    return {
      kind: 'provinceDistrict',
      province: canonicalize(groups.province, lexicon),
      districts: districtsOf(groups),
    };
  }

  groups = p.sejong.exec(text)?.groups;
  if (groups) {
    return { kind: 'sejong', province: canonicalize(groups.province, lexicon) };
  }

  groups = p.districtOnly.exec(text)?.groups;
  if (groups) {
    return { kind: 'districtOnly', districts: districtsOf(groups) };
  }

  groups = p.provinceRawCity.exec(text)?.groups;
  if (groups) {
    return {
      kind: 'provinceRawCity',
      province: canonicalize(groups.province, lexicon),
      rawCity: groups.rawCity,
    };
  }

  groups = p.provinceTown.exec(text)?.groups;
  if (groups) {
    return { kind: 'provinceOnly', province: canonicalize(groups.province, lexicon) };
  }

  return null;
}

/**
 * 제목의 지역 요약
 * 제목 직접 매칭이 전부 실패하면 (옵션) 추출 주소로 한 번 더 시도한다.
 */
export function summarizeRegion(
  title: string | null | undefined,
  options: RegionOptions = {},
  lexicon: Lexicon = DEFAULT_LEXICON
): RegionSummary | null {
  const { useAddressFallback = true } = options;
  const { rest } = stripTitlePrefix(title);

  const direct = matchRegion(rest.trim(), lexicon);
  if (direct || !useAddressFallback) return direct;

  const address = extractAddress(title, lexicon);
  return address ? matchRegion(address, lexicon) : null;
}

export function formatProvinceDistrict(summary: RegionSummary | null): string {
  if (!summary) return '';
  switch (summary.kind) {
    case 'provinceDistrict':
      return [summary.province, ...summary.districts].join(' ');
    case 'sejong':
    case 'provinceOnly':
      return summary.province;
    case 'districtOnly':
      return summary.districts.join(' ');
    case 'provinceRawCity':
      return `${summary.province} ${summary.rawCity}`;
  }
}

export function formatDistrictOnly(summary: RegionSummary | null): string {
  if (!summary) return '';
  switch (summary.kind) {
    case 'provinceDistrict':
    case 'districtOnly':
      return summary.districts.join(' ');
    case 'provinceRawCity':
      return summary.rawCity;
    case 'sejong':
    case 'provinceOnly':
      return '';
  }
}

/**
 * 출력: '광역/도(정식명) + 시군구'
 * - 세종 → '세종특별자치시'
 * - 시/군/구 단독 시작 → 시군구 시퀀스
 * - 광역/도 + 원시도시 + 동/읍/면 → '광역/도 원시도시'
 * - 광역/도 + 동/읍/면 → 광역/도만
 */
export function extractProvinceDistrict(
  title: string | null | undefined,
  options: RegionOptions = {},
  lexicon: Lexicon = DEFAULT_LEXICON
): string {
  return formatProvinceDistrict(summarizeRegion(title, options, lexicon));
}

/**
 * 출력: 시군구만 (세종, 광역/도 + 동/읍/면 → '')
 */
export function extractDistrictOnly(
  title: string | null | undefined,
  options: RegionOptions = {},
  lexicon: Lexicon = DEFAULT_LEXICON
): string {
  return formatDistrictOnly(summarizeRegion(title, options, lexicon));
}
