import type { BuildingCandidate, CandidateScore } from '../types';
import { matchAddress, stripTitlePrefix } from './addressParser';
import { DEFAULT_LEXICON, escapeRegExp, hasBuildingSuffix, isProvince, type Lexicon } from './lexicon';

/** 최소 후보 길이 (이보다 짧은 조각은 버림) */
export const MIN_CANDIDATE_LENGTH = 3;

interface BuildingPatterns {
  bracket: RegExp;
  unitToken: RegExp;
  stop: RegExp;
  separator: RegExp;
  token: RegExp;
  edge: RegExp;
  quantity: RegExp;
  administrative: RegExp;
}

const compiled = new WeakMap<Lexicon, BuildingPatterns>();

function getBuildingPatterns(lexicon: Lexicon): BuildingPatterns {
  const cached = compiled.get(lexicon);
  if (cached) return cached;

  const g = lexicon.grammar;
  // '매각 공고' → 매각\s*공고
  const stopWords = [...lexicon.stopKeywords]
    .sort((a, b) => b.length - a.length)
    .map(k => k.split(/\s+/).map(escapeRegExp).join('\\s*'));
  const units = [...lexicon.quantityUnits]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
  const lotNumber = `산?\\d+(?:${g.hyphen}\\d+)?`;

  const patterns: BuildingPatterns = {
    bracket: /[[(（][^\])）]*[\])）]/g,
    unitToken: new RegExp(g.unitToken, 'g'),
    stop: new RegExp(stopWords.join('|')),
    // 쉼표·가운뎃점·슬래시, 단독 '외'
    separator: /[,·ㆍ/]|(?<=^|\s)외(?=\s|$)/g,
    token: new RegExp(`[가-힣A-Za-z0-9·ㆍ]+(?:${g.hyphen}+[가-힣A-Za-z0-9·ㆍ]+)*`, 'g'),
    edge: new RegExp(`^(?:[·ㆍ]|${g.hyphen})+|(?:[·ㆍ]|${g.hyphen})+$`, 'g'),
    // 순수 지번/수량: '123-4번지', '32개', '3필지', '외 2개', '호실', '408-3외'
    quantity: new RegExp(
      `^(?:외\\s*)?(?:${lotNumber}(?:\\s*(?:번지|일원))?|\\d+\\s*(?:${units})(?:\\s*(?:${units}))?|(?:${units}))(?:\\s*외)?$`
    ),
    administrative: /^[가-힣]+(?:특별자치시|특별자치도|특별시|광역시|시|군|구|도)$/,
  };
  compiled.set(lexicon, patterns);
  return patterns;
}

function maskWithSpaces(text: string, pattern: RegExp): string {
  return text.replace(pattern, m => ' '.repeat(m.length));
}

export function scoreCandidate(name: string, lexicon: Lexicon = DEFAULT_LEXICON): CandidateScore {
  return [hasBuildingSuffix(name, lexicon) ? 1 : 0, name.length];
}

function isBetter(a: CandidateScore, b: CandidateScore): boolean {
  return a[0] !== b[0] ? a[0] > b[0] : a[1] > b[1];
}

/**
 * 건물명 후보 제외 규칙
 * - 너무 짧은 조각
 * - 한글/영문 없는 숫자 조각
 * - 순수 지번/수량 단위
 * - 행정구역 명칭 (광역/도 표기, 시/군/구/도 접미사)
 */
export function isExcludedCandidate(token: string, lexicon: Lexicon = DEFAULT_LEXICON): boolean {
  const p = getBuildingPatterns(lexicon);
  if (token.length < MIN_CANDIDATE_LENGTH) return true;
  if (!/[가-힣A-Za-z]/.test(token)) return true;
  if (p.quantity.test(token)) return true;
  return isProvince(token, lexicon) || p.administrative.test(token);
}

/**
 * 주소 뒤 텍스트에서 건물명 후보를 골라 원문 위치와 함께 반환
 *
 * 괄호/동·층·호 토큰은 같은 길이의 공백으로 가려서 원문 오프셋을 유지한다.
 */
export function findBuildingCandidate(
  title: string | null | undefined,
  lexicon: Lexicon = DEFAULT_LEXICON
): BuildingCandidate | null {
  const text = title ?? '';
  const p = getBuildingPatterns(lexicon);

  const address = matchAddress(text, lexicon);
  const regionStart = address ? address.end : stripTitlePrefix(text).prefix.length;

  let region = text.slice(regionStart);
  region = maskWithSpaces(region, p.bracket);
  region = maskWithSpaces(region, p.unitToken);

  const stop = p.stop.exec(region);
  if (stop) region = region.slice(0, stop.index);

  // 구분자 단위 세그먼트 (오프셋은 region 기준)
  const segments: Array<{ offset: number; text: string }> = [];
  let cursor = 0;
  for (const sep of region.matchAll(p.separator)) {
    const at = sep.index ?? 0;
    segments.push({ offset: cursor, text: region.slice(cursor, at) });
    cursor = at + sep[0].length;
  }
  segments.push({ offset: cursor, text: region.slice(cursor) });

  let best: BuildingCandidate | null = null;

  for (const segment of segments) {
    for (const tm of segment.text.matchAll(p.token)) {
      const raw = tm[0];
      const name = raw.replace(p.edge, '');
      if (!name || isExcludedCandidate(name, lexicon)) continue;

      const score = scoreCandidate(name, lexicon);
      if (best && !isBetter(score, best.score)) continue;

      const start = regionStart + segment.offset + (tm.index ?? 0) + raw.indexOf(name);
      best = { name, start, end: start + name.length, score };
    }
  }

  return best;
}

/**
 * 제목에서 건물명 추출 (없으면 '')
 * 예: '경기 파주 야당동 한빛마을아파트 101동 일괄매각' → '한빛마을아파트'
 */
export function extractBuildingName(title: string | null | undefined, lexicon: Lexicon = DEFAULT_LEXICON): string {
  return findBuildingCandidate(title, lexicon)?.name ?? '';
}
