export * from './types';
export {
  LexiconError,
  DEFAULT_LEXICON,
  createLexicon,
  loadLexiconFile,
  canonicalize,
  isProvince,
  isSejong,
  hasBuildingSuffix,
  type Lexicon,
  type LexiconData,
  type GrammarFragments,
} from './lib/lexicon';
export {
  stripTitlePrefix,
  matchAddress,
  extractAddress,
  findPlausibleBranches,
  normalizeAddress,
} from './lib/addressParser';
export {
  summarizeRegion,
  formatProvinceDistrict,
  formatDistrictOnly,
  extractProvinceDistrict,
  extractDistrictOnly,
} from './lib/regionSummarizer';
export { findBuildingCandidate, extractBuildingName, scoreCandidate } from './lib/buildingExtractor';
export { extractSaleContent, normalizeSaleText } from './lib/saleContent';
export { extractTitleFields, createTitleExtractor, type TitleExtractor } from './lib/titleExtractor';
export { enrichListing, normalizePostDate, detectPurpose } from './lib/listingEnricher';
export { DUPLICATE_MARK, buildDuplicateState, markDuplicates, numberDuplicates } from './lib/duplicateDetector';
export {
  SheetNotFoundError,
  ColumnMappingError,
  readListingWorkbook,
  readExistingRows,
} from './lib/excelParser';
export { buildListingWorkbook, writeListingWorkbook, LISTING_HEADER } from './lib/excelExporter';
export { ConfigError, loadConfig, type AppConfig } from './lib/config';
export { logger, setLogLevel, type LogLevel } from './lib/logger';
