import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import * as XLSX from 'xlsx';
import { loadConfig, type AppConfig } from '../lib/config';
import { DEFAULT_LEXICON } from '../lib/lexicon';
import { setLogLevel } from '../lib/logger';
import { mappingFromConfig, resolveLexicon, runConvert, runFields, runReview } from './commands';

function writeBoard(path: string, rows: string[][]): void {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet([['제목', 'URL'], ...rows]), 'Sheet1');
  const out: Buffer = XLSX.write(wb, { bookType: 'xlsx', type: 'buffer' });
  writeFileSync(path, out);
}

let dir: string;
let config: AppConfig;

beforeEach(() => {
  setLogLevel('silent');
  dir = mkdtempSync(join(tmpdir(), 'title-extract-cli-'));
  config = loadConfig({ TRUST_NAME: '테스트신탁' });
});

afterEach(() => {
  setLogLevel('info');
  rmSync(dir, { recursive: true, force: true });
});

describe('runFields', () => {
  it('제목마다 필드를 돌려준다', () => {
    expect(runFields(['인천 만수동 3필지 외 2개 개별매각'], { fallback: true })).toEqual([
      {
        title: '인천 만수동 3필지 외 2개 개별매각',
        address: '인천 만수동',
        provinceDistrict: '인천광역시',
        districtOnly: '',
        building: '',
        saleContent: '3필지 외 2개 개별매각',
      },
    ]);
  });
});

describe('mappingFromConfig / resolveLexicon', () => {
  it('설정된 컬럼만 매핑에 넣는다', () => {
    expect(mappingFromConfig(loadConfig({ TITLE_COLUMN: '물건명' }))).toEqual({ title: '물건명' });
    expect(mappingFromConfig(config)).toEqual({});
  });

  it('경로가 없으면 기본 사전', () => {
    expect(resolveLexicon(config)).toBe(DEFAULT_LEXICON);
  });
});

describe('runConvert', () => {
  it('추출 필드와 중복 순번을 채워 저장하고, 다시 돌리면 본 URL은 건너뛴다', () => {
    const input = join(dir, 'board.xlsx');
    const output = join(dir, 'listings.xlsx');
    writeBoard(input, [
      ['경기 파주 야당동 한빛마을아파트 101동 일괄매각', 'u1'],
      ['경기 파주 야당동 한빛마을아파트 102동 일괄매각', 'u2'],
      ['인천 만수동 3필지 외 2개 개별매각', 'u3'],
    ]);

    const first = runConvert(input, output, config);
    expect(existsSync(output)).toBe(true);
    expect(first.map(r => [r.address, r.duplicate])).toEqual([
      ['경기 파주 야당동', '중복1'],
      ['경기 파주 야당동', '중복2'],
      ['인천 만수동', ''],
    ]);
    expect(first[0].trustName).toBe('테스트신탁');
    expect(first[0].building).toBe('한빛마을아파트');

    const second = runConvert(input, output, config);
    expect(second.map(r => r.url)).toEqual(['u1', 'u2', 'u3']);
    expect(second.map(r => r.duplicate)).toEqual(['중복1', '중복2', '']);
  });

  it('이어 붙인 행까지 포함해 중복 순번을 다시 매긴다', () => {
    const input = join(dir, 'board.xlsx');
    const output = join(dir, 'listings.xlsx');
    writeBoard(input, [
      ['경기 파주 야당동 한빛마을아파트 101동 일괄매각', 'u1'],
      ['인천 만수동 3필지 외 2개 개별매각', 'u2'],
    ]);
    expect(runConvert(input, output, config).map(r => r.duplicate)).toEqual(['', '']);

    writeBoard(input, [
      ['경기 파주 야당동 한빛마을아파트 101동 일괄매각', 'u1'],
      ['경기 파주 야당동 한빛마을아파트 103동 일괄매각', 'u3'],
    ]);
    const rows = runConvert(input, output, config);
    expect(rows.map(r => [r.url, r.duplicate])).toEqual([
      ['u1', '중복1'],
      ['u2', ''],
      ['u3', '중복2'],
    ]);
  });
});

describe('runReview', () => {
  it('분기가 여러 개 성립하는 제목만', () => {
    const input = join(dir, 'board.xlsx');
    writeBoard(input, [
      ['경기 파주시 야당동 12 토지', 'u1'],
      ['인천 만수동 3필지 외 2개 개별매각', 'u2'],
    ]);

    expect(runReview(input, config)).toEqual([
      {
        title: '경기 파주시 야당동 12 토지',
        address: '경기 파주시 야당동 12',
        branches: ['general', 'provinceRawCityTown'],
      },
    ]);
  });
});
