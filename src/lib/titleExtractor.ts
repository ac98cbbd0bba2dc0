import type { RegionOptions, TitleFields } from '../types';
import { extractAddress } from './addressParser';
import { extractBuildingName } from './buildingExtractor';
import { DEFAULT_LEXICON, type Lexicon } from './lexicon';
import { formatDistrictOnly, formatProvinceDistrict, summarizeRegion } from './regionSummarizer';
import { extractSaleContent } from './saleContent';

/**
 * 제목 1건 → 주소 / 시군구 / 건물명 / 매각내용
 */
export function extractTitleFields(
  title: string | null | undefined,
  options: RegionOptions = {},
  lexicon: Lexicon = DEFAULT_LEXICON
): TitleFields {
  const region = summarizeRegion(title, options, lexicon);
  return {
    address: extractAddress(title, lexicon),
    provinceDistrict: formatProvinceDistrict(region),
    districtOnly: formatDistrictOnly(region),
    building: extractBuildingName(title, lexicon),
    saleContent: extractSaleContent(title, lexicon),
  };
}

export interface TitleExtractor {
  readonly lexicon: Lexicon;
  extractAddress(title: string | null | undefined): string;
  extractProvinceDistrict(title: string | null | undefined, options?: RegionOptions): string;
  extractDistrictOnly(title: string | null | undefined, options?: RegionOptions): string;
  extractBuildingName(title: string | null | undefined): string;
  extractSaleContent(title: string | null | undefined): string;
  extractFields(title: string | null | undefined, options?: RegionOptions): TitleFields;
}

/**
 * 어휘 사전을 고정한 추출기
 */
export function createTitleExtractor(lexicon: Lexicon = DEFAULT_LEXICON): TitleExtractor {
  return {
    lexicon,
    extractAddress: title => extractAddress(title, lexicon),
    extractProvinceDistrict: (title, options = {}) =>
      formatProvinceDistrict(summarizeRegion(title, options, lexicon)),
    extractDistrictOnly: (title, options = {}) =>
      formatDistrictOnly(summarizeRegion(title, options, lexicon)),
    extractBuildingName: title => extractBuildingName(title, lexicon),
    extractSaleContent: title => extractSaleContent(title, lexicon),
    extractFields: (title, options = {}) => extractTitleFields(title, options, lexicon),
  };
}
