/**
 * 행정구역 어휘 사전
 *
 * 광역/도 표기(정식명 + 약칭), 시/군/구·읍/면/동·도로명·지번·지구 문법 조각,
 * 약칭 → 정식명 표준화 테이블을 하나의 읽기 전용 값으로 묶는다.
 * 모든 추출기는 이 값을 인자로 받는다 (기본값: DEFAULT_LEXICON).
 */
import { readFileSync } from 'fs';
import { z } from 'zod';

export class LexiconError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LexiconError';
  }
}

const LexiconDataSchema = z.object({
  provinces: z
    .array(
      z.object({
        canonical: z.string().min(1),
        surfaces: z.array(z.string().min(1)).min(1),
        sejong: z.boolean().optional(),
      })
    )
    .min(1),
  buildingSuffixes: z.array(z.string().min(1)),
  stopKeywords: z.array(z.string().min(1)),
  quantityUnits: z.array(z.string().min(1)),
});

export type LexiconData = z.infer<typeof LexiconDataSchema>;

/** 정규식 source 조각 (앵커/플래그 없음) */
export interface GrammarFragments {
  sejong: string;
  province: string;        // 세종 제외 광역/도
  anyProvince: string;     // 세종 포함
  cityGunGu: string;
  rawCity: string;
  town: string;
  road: string;
  planningDistrict: string;
  hyphen: string;
  lot: string;
  lotList: string;
  unitToken: string;
}

export interface Lexicon {
  readonly sejongForms: readonly string[];
  readonly provinceForms: readonly string[];
  readonly buildingSuffixes: readonly string[];
  readonly stopKeywords: readonly string[];
  readonly quantityUnits: readonly string[];
  readonly canonicalNames: ReadonlyMap<string, string>;
  readonly grammar: Readonly<GrammarFragments>;
}

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** 긴 표기 우선 alternation */
function alternation(words: readonly string[]): string {
  const sorted = [...new Set(words)].sort((a, b) => b.length - a.length);
  return `(?:${sorted.map(escapeRegExp).join('|')})`;
}

// ASCII 하이픈 + 유니코드 대시류
const HYPHEN = '[-‐‑‒–—―−－]';
const NOT_HANGUL = '(?![가-힣])';
// '야당동외 2필지', '408-3외' 처럼 붙여 쓴 '외'는 경계로 인정
const BEFORE_ETC = '(?=외)';
const LOT = `(?:산\\s*)?\\d+(?:${HYPHEN}\\d+)?(?:\\s*(?:일원|번지))?(?:${BEFORE_ETC}|(?![0-9A-Za-z가-힣]|${HYPHEN}))`;

function buildGrammar(sejongForms: readonly string[], provinceForms: readonly string[]): GrammarFragments {
  return {
    sejong: `${alternation(sejongForms)}${NOT_HANGUL}`,
    province: `${alternation(provinceForms)}${NOT_HANGUL}`,
    anyProvince: `${alternation([...sejongForms, ...provinceForms])}${NOT_HANGUL}`,
    // 뒤에 공백/끝 경계 → '강구면'의 '강구'를 구로 자르지 않음
    cityGunGu: '[가-힣]+(?:시|군|구)(?=\\s|$)',
    rawCity: '[가-힣]{2,}',
    // 한글로 시작해야 함 → '101동' 같은 순수 숫자 토큰 배제
    town: `[가-힣][가-힣0-9]*(?:읍|면|동|가|리)(?:${BEFORE_ETC}|${NOT_HANGUL})`,
    road: `[가-힣][가-힣0-9]*(?:번길|대로|로|길)${NOT_HANGUL}`,
    planningDistrict: `[가-힣][가-힣0-9]*(?:지구|구역)${NOT_HANGUL}`,
    hyphen: HYPHEN,
    lot: LOT,
    lotList: `${LOT}(?:\\s*,\\s*${LOT})*`,
    unitToken: `제?[0-9A-Za-z][0-9A-Za-z-]*(?:동|층|호)${NOT_HANGUL}`,
  };
}

function parseLexiconData(raw: unknown): LexiconData {
  const parsed = LexiconDataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LexiconError(`어휘 사전 형식 오류: ${parsed.error.message}`);
  }
  return parsed.data;
}

function buildLexicon(data: LexiconData): Lexicon {
  const canonicalNames = new Map<string, string>();
  const sejongForms: string[] = [];
  const provinceForms: string[] = [];

  for (const entry of data.provinces) {
    for (const surface of [entry.canonical, ...entry.surfaces]) {
      const prev = canonicalNames.get(surface);
      if (prev && prev !== entry.canonical) {
        throw new LexiconError(`표기 '${surface}'가 '${prev}'와 '${entry.canonical}'에 중복 등록됨`);
      }
      canonicalNames.set(surface, entry.canonical);
      (entry.sejong ? sejongForms : provinceForms).push(surface);
    }
  }

  const uniqueSejong = [...new Set(sejongForms)];
  const uniqueProvince = [...new Set(provinceForms)];

  return Object.freeze({
    sejongForms: Object.freeze(uniqueSejong),
    provinceForms: Object.freeze(uniqueProvince),
    buildingSuffixes: Object.freeze([...data.buildingSuffixes]),
    stopKeywords: Object.freeze([...data.stopKeywords]),
    quantityUnits: Object.freeze([...data.quantityUnits]),
    canonicalNames,
    grammar: Object.freeze(buildGrammar(uniqueSejong, uniqueProvince)),
  });
}

/**
 * 어휘 데이터 검증 후 사전 생성
 * 한 표기가 두 정식명에 걸리면 LexiconError
 */
export function createLexicon(input: LexiconData): Lexicon {
  return buildLexicon(parseLexiconData(input));
}

/**
 * JSON 어휘 파일 로드
 */
export function loadLexiconFile(path: string | URL): Lexicon {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LexiconError(`어휘 파일을 읽을 수 없습니다: ${String(path)} (${reason})`);
  }
  return buildLexicon(parseLexiconData(raw));
}

export const DEFAULT_LEXICON: Lexicon = loadLexiconFile(new URL('../data/lexicon.json', import.meta.url));

/**
 * 약칭 → 정식명 (미등록 표기는 그대로)
 * 예: '경기' → '경기도', '전라북도' → '전북특별자치도'
 */
export function canonicalize(name: string, lexicon: Lexicon = DEFAULT_LEXICON): string {
  return lexicon.canonicalNames.get(name) ?? name;
}

export function isProvince(name: string, lexicon: Lexicon = DEFAULT_LEXICON): boolean {
  return lexicon.canonicalNames.has(name);
}

export function isSejong(name: string, lexicon: Lexicon = DEFAULT_LEXICON): boolean {
  return lexicon.sejongForms.includes(name);
}

export function hasBuildingSuffix(token: string, lexicon: Lexicon = DEFAULT_LEXICON): boolean {
  return lexicon.buildingSuffixes.some(suffix => token.endsWith(suffix));
}
