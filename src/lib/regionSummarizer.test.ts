import { describe, it, expect } from 'vitest';
import {
  extractDistrictOnly,
  extractProvinceDistrict,
  formatDistrictOnly,
  formatProvinceDistrict,
  summarizeRegion,
} from './regionSummarizer';

describe('summarizeRegion', () => {
  it('광역/도 + 시군구 2개까지', () => {
    expect(summarizeRegion('경북 영덕군 강구면 오포리 123')).toEqual({
      kind: 'provinceDistrict',
      province: '경상북도',
      districts: ['영덕군'],
    });
    expect(summarizeRegion('경기 수원시 영통구 매탄동 3')).toEqual({
      kind: 'provinceDistrict',
      province: '경기도',
      districts: ['수원시', '영통구'],
    });
  });

  it('세종', () => {
    expect(summarizeRegion('세종 반곡동 123')).toEqual({ kind: 'sejong', province: '세종특별자치시' });
  });

  it('시군구로 시작', () => {
    expect(summarizeRegion('전주시 완산구 고사동 408-3')).toEqual({
      kind: 'districtOnly',
      districts: ['전주시', '완산구'],
    });
  });

  it('광역/도 + 원시 도시명 + 동', () => {
    expect(summarizeRegion('경기 파주 야당동 한빛마을아파트')).toEqual({
      kind: 'provinceRawCity',
      province: '경기도',
      rawCity: '파주',
    });
  });

  it('광역/도 + 동', () => {
    expect(summarizeRegion('인천 만수동 3필지')).toEqual({ kind: 'provinceOnly', province: '인천광역시' });
  });

  it('접두 태그를 건너뛴다', () => {
    expect(summarizeRegion('1. [공매] 전주시 완산구 고사동')).toEqual({
      kind: 'districtOnly',
      districts: ['전주시', '완산구'],
    });
  });

  it('지명이 없으면 주소 재시도 여부와 무관하게 null', () => {
    expect(summarizeRegion('한빛빌딩 일괄매각')).toBeNull();
    expect(summarizeRegion('한빛빌딩 일괄매각', { useAddressFallback: false })).toBeNull();
    expect(summarizeRegion(null)).toBeNull();
  });
});

describe('format', () => {
  it('null은 빈 문자열', () => {
    expect(formatProvinceDistrict(null)).toBe('');
    expect(formatDistrictOnly(null)).toBe('');
  });

  it('광역/도만 있으면 시군구 출력은 비어 있다', () => {
    const summary = { kind: 'provinceOnly', province: '인천광역시' } as const;
    expect(formatProvinceDistrict(summary)).toBe('인천광역시');
    expect(formatDistrictOnly(summary)).toBe('');
  });
});

describe('extractProvinceDistrict / extractDistrictOnly', () => {
  it.each([
    ['전주시 완산구 고사동 408-3', '전주시 완산구', '전주시 완산구'],
    ['세종특별자치시 반곡동 123', '세종특별자치시', ''],
    ['경기 파주 야당동 한빛마을아파트 101동 일괄매각', '경기도 파주', '파주'],
    ['인천 만수동 3필지 외 2개 개별매각', '인천광역시', ''],
    ['경북 영덕군 강구면 오포리 123', '경상북도 영덕군', '영덕군'],
    ['서울 강남구 역삼동 123-4 대치빌딩', '서울특별시 강남구', '강남구'],
    ['전라북도 군산시 나운동 5', '전북특별자치도 군산시', '군산시'],
    ['토지 매각 공고', '', ''],
  ])('%s', (title, provinceDistrict, districtOnly) => {
    expect(extractProvinceDistrict(title)).toBe(provinceDistrict);
    expect(extractDistrictOnly(title)).toBe(districtOnly);
  });
});
