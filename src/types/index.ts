export interface Span {
  start: number;
  end: number;
}

/** 주소 분기 (우선순위 순) */
export type AddressBranch =
  | 'sejong'
  | 'general'
  | 'districtOnly'
  | 'provinceRawCityTown'
  | 'provinceTown';

export const ADDRESS_BRANCHES: readonly AddressBranch[] = [
  'sejong',
  'general',
  'districtOnly',
  'provinceRawCityTown',
  'provinceTown',
];

export interface AddressMatch extends Span {
  kind: AddressBranch;
  text: string;                // 제목 내 주소 원문 (접두 번호/태그 제외)
  province: string;            // 광역/도 표기 그대로 ('' = 없음)
  districts: string[];         // 시/군/구
  rawCity: string;             // 접미사 없는 도시명 (예: '파주')
  towns: string[];             // 읍/면/동/가/리
  planningDistrict: string;    // 지구/구역
  road: string;
  lots: string;                // 지번 목록 원문
}

export type RegionSummary =
  | { kind: 'provinceDistrict'; province: string; districts: string[] }
  | { kind: 'sejong'; province: string }
  | { kind: 'districtOnly'; districts: string[] }
  | { kind: 'provinceRawCity'; province: string; rawCity: string }
  | { kind: 'provinceOnly'; province: string };

export interface RegionOptions {
  /** 제목 직접 매칭 실패 시 추출 주소로 재시도 (기본: true) */
  useAddressFallback?: boolean;
}

/** [건물명 접미사 여부, 길이] */
export type CandidateScore = readonly [0 | 1, number];

export interface BuildingCandidate extends Span {
  name: string;
  score: CandidateScore;
}

export interface TitleFields {
  address: string;
  provinceDistrict: string;
  districtOnly: string;
  building: string;
  saleContent: string;
}

// ─── 목록(게시판) 레코드 ───

export interface ListingRecord {
  no?: string;
  trustName?: string;
  title: string;
  postDate?: string;
  url: string;
}

export interface ListingRow {
  no: string;
  trustName: string;
  title: string;
  postDate: string;
  address: string;
  city: string;
  building: string;
  saleContent: string;
  purpose: string;
  duplicate: string;
  url: string;
}

export interface ColumnMapping {
  title: string;
  url?: string;
  postDate?: string;
  no?: string;
  trustName?: string;
}

export interface DuplicateState {
  seenUrls: Set<string>;
  addressCounts: Map<string, number>;
}

export interface DuplicateResult {
  appended: ListingRow[];
  skippedUrls: number;
  duplicateCount: number;
}
