import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  extractAddress,
  findPlausibleBranches,
  matchAddress,
  normalizeAddress,
  stripTitlePrefix,
} from './addressParser';

describe('stripTitlePrefix', () => {
  it('번호와 상태 태그를 떼어낸다', () => {
    expect(stripTitlePrefix('3. [재공매] 경북 영덕군')).toEqual({
      prefix: '3. [재공매] ',
      rest: '경북 영덕군',
    });
  });

  it('null/undefined는 빈 문자열', () => {
    expect(stripTitlePrefix(null)).toEqual({ prefix: '', rest: '' });
    expect(stripTitlePrefix(undefined)).toEqual({ prefix: '', rest: '' });
  });
});

describe('matchAddress', () => {
  it('시/군/구로 시작하는 제목', () => {
    const m = matchAddress('전주시 완산구 고사동 408-3 토지 매각');
    expect(m).toMatchObject({
      kind: 'districtOnly',
      text: '전주시 완산구 고사동 408-3',
      start: 0,
      end: 17,
      province: '',
      districts: ['전주시', '완산구'],
      towns: ['고사동'],
      lots: '408-3',
    });
  });

  it('세종은 시/군/구 없이 읍/면/동으로 이어진다', () => {
    const m = matchAddress('세종특별자치시 반곡동 123');
    expect(m?.kind).toBe('sejong');
    expect(m?.text).toBe('세종특별자치시 반곡동 123');
    expect(m?.province).toBe('세종특별자치시');
  });

  it('광역/도 + 시/군/구 + 읍/면 + 리 + 지번', () => {
    const m = matchAddress('경북 영덕군 강구면 오포리 123 토지');
    expect(m?.kind).toBe('general');
    expect(m?.text).toBe('경북 영덕군 강구면 오포리 123');
    expect(m?.districts).toEqual(['영덕군']);
    expect(m?.towns).toEqual(['강구면', '오포리']);
  });

  it('광역/도 + 접미사 없는 도시명 + 동', () => {
    const m = matchAddress('경기 파주 야당동 한빛마을아파트 101동 일괄매각');
    expect(m?.kind).toBe('provinceRawCityTown');
    expect(m?.text).toBe('경기 파주 야당동');
    expect(m?.rawCity).toBe('파주');
  });

  it('광역/도 + 동', () => {
    const m = matchAddress('인천 만수동 3필지 외 2개 개별매각');
    expect(m?.kind).toBe('provinceTown');
    expect(m?.text).toBe('인천 만수동');
  });

  it('접두 번호/태그 뒤부터 매칭하고 위치는 원 제목 기준', () => {
    const title = '3. [재공매] 경북 영덕군 강구면 오포리 123 토지';
    const m = matchAddress(title);
    expect(m?.start).toBe(9);
    expect(m && title.slice(m.start, m.end)).toBe('경북 영덕군 강구면 오포리 123');
  });

  it('지번 목록과 일원/번지 꼬리', () => {
    expect(extractAddress('서울 강남구 역삼동 123-4, 125 일원 토지')).toBe('서울 강남구 역삼동 123-4, 125 일원');
    expect(extractAddress('충남 홍성군 홍성읍 산 12-3 임야')).toBe('충남 홍성군 홍성읍 산 12-3');
  });

  it('유니코드 대시 지번', () => {
    expect(matchAddress('대전 유성구 봉명동 408–3 상가')?.lots).toBe('408–3');
  });

  it('동/층/호 번호는 지번으로 읽지 않는다', () => {
    expect(extractAddress('경기 파주시 야당동 101동 1203호')).toBe('경기 파주시 야당동');
  });

  it('붙여 쓴 외 앞의 지번/동은 주소에 포함한다', () => {
    expect(extractAddress('전주시 완산구 고사동 408-3외 2필지 매각')).toBe('전주시 완산구 고사동 408-3');
    expect(extractAddress('서울 강남구 역삼동 123번지외 3필지 일괄매각')).toBe('서울 강남구 역삼동 123번지');
    expect(extractAddress('경기 파주시 야당동외 2필지 토지')).toBe('경기 파주시 야당동');
  });

  it('수량 단위가 붙은 숫자는 여전히 지번이 아니다', () => {
    expect(extractAddress('인천 만수동 3필지 외 2개 개별매각')).toBe('인천 만수동');
  });

  it('세종로는 세종으로 읽지 않는다', () => {
    expect(matchAddress('세종로 빌딩 매각')).toBeNull();
  });

  it('지명이 없는 제목은 null', () => {
    expect(matchAddress('토지 매각 공고')).toBeNull();
    expect(extractAddress('')).toBe('');
    expect(extractAddress(null)).toBe('');
  });
});

describe('findPlausibleBranches', () => {
  it('우선순위로 갈린 제목은 여러 분기를 돌려준다', () => {
    expect(findPlausibleBranches('경기 파주시 야당동 12 토지')).toEqual(['general', 'provinceRawCityTown']);
  });

  it('분기 하나만 성립', () => {
    expect(findPlausibleBranches('인천 만수동 3필지')).toEqual(['provinceTown']);
    expect(findPlausibleBranches('토지 매각')).toEqual([]);
  });
});

describe('normalizeAddress', () => {
  it('공백과 대시 글리프를 무시한다', () => {
    expect(normalizeAddress('경기 파주시  야당동 408–3')).toBe('경기파주시야당동408-3');
    expect(normalizeAddress('인천 만수동')).toBe(normalizeAddress('인천만수동'));
  });
});

const TOKENS = [
  '서울', '경기', '세종', '인천', '강남구', '파주', '파주시', '완산구', '야당동', '오포리',
  '123-4', '산 5', '12,', '일원', '아파트', '한빛빌딩', '101동', '일괄매각', '외', '2개', '[공매]', '1.',
];
const titleArb = fc.array(fc.constantFrom(...TOKENS), { maxLength: 10 }).map(ts => ts.join(' '));

describe('주소 추출 성질', () => {
  it('추출 결과를 다시 추출해도 같다', () => {
    fc.assert(
      fc.property(titleArb, title => {
        const once = extractAddress(title);
        expect(extractAddress(once)).toBe(once);
      })
    );
  });

  it('반환 분기는 성립 분기 중 첫 번째', () => {
    fc.assert(
      fc.property(titleArb, title => {
        expect(matchAddress(title)?.kind).toBe(findPlausibleBranches(title)[0]);
      })
    );
  });

  it('추출 주소는 원 제목의 해당 구간과 같다', () => {
    fc.assert(
      fc.property(titleArb, title => {
        const m = matchAddress(title);
        if (m) expect(title.slice(m.start, m.end)).toBe(m.text);
      })
    );
  });
});
