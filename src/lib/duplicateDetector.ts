import type { DuplicateResult, DuplicateState, ListingRow } from '../types';
import { normalizeAddress } from './addressParser';
import { logger } from './logger';

export const DUPLICATE_MARK = '중복';

/**
 * 주소 중복 판정 키 (정규화 주소, 주소 없으면 '')
 */
export function getDuplicateKey(row: Pick<ListingRow, 'address'>): string {
  return row.address.trim() ? normalizeAddress(row.address) : '';
}

/**
 * 기존 행에서 URL 셋과 주소별 누계 구축
 */
export function buildDuplicateState(existing: Array<Pick<ListingRow, 'address' | 'url'>>): DuplicateState {
  const seenUrls = new Set<string>();
  const addressCounts = new Map<string, number>();
  for (const row of existing) {
    const url = row.url.trim();
    if (url) seenUrls.add(url);
    const key = getDuplicateKey(row);
    if (key) addressCounts.set(key, (addressCounts.get(key) ?? 0) + 1);
  }
  return { seenUrls, addressCounts };
}

/**
 * 신규 행 추가 시 중복 표기
 * - 이미 본 URL은 건너뜀
 * - 같은 주소가 기존 행 또는 이번 배치 앞쪽에 있으면 '중복'
 *
 * state는 갱신되지 않으며, 갱신된 상태는 nextState로 돌려준다.
 */
export function markDuplicates(
  rows: ListingRow[],
  state: DuplicateState = { seenUrls: new Set(), addressCounts: new Map() }
): DuplicateResult & { nextState: DuplicateState } {
  const seenUrls = new Set(state.seenUrls);
  const addressCounts = new Map(state.addressCounts);
  const appended: ListingRow[] = [];
  let skippedUrls = 0;
  let duplicateCount = 0;

  for (const row of rows) {
    const url = row.url.trim();
    if (url && seenUrls.has(url)) {
      skippedUrls++;
      continue;
    }

    const key = getDuplicateKey(row);
    let duplicate = '';
    if (key) {
      const prev = addressCounts.get(key) ?? 0;
      if (prev >= 1) {
        duplicate = DUPLICATE_MARK;
        duplicateCount++;
      }
      addressCounts.set(key, prev + 1);
    }

    appended.push({ ...row, duplicate });
    if (url) seenUrls.add(url);
  }

  logger.info(
    '[중복감지] 입력:', rows.length,
    '| 추가:', appended.length,
    '| URL 중복 제외:', skippedUrls,
    '| 주소 중복:', duplicateCount
  );

  return { appended, skippedUrls, duplicateCount, nextState: { seenUrls, addressCounts } };
}

/**
 * 중복 번호 재계산
 * 같은 주소가 2건 이상인 그룹만 '중복1..N', 1건뿐이면 공란
 */
export function numberDuplicates(rows: ListingRow[]): ListingRow[] {
  const groups = new Map<string, number[]>();
  rows.forEach((row, i) => {
    const key = getDuplicateKey(row);
    if (!key) return;
    const members = groups.get(key);
    if (members) members.push(i);
    else groups.set(key, [i]);
  });

  const labels = new Map<number, string>();
  for (const members of groups.values()) {
    if (members.length < 2) continue;
    members.forEach((rowIndex, k) => labels.set(rowIndex, `${DUPLICATE_MARK}${k + 1}`));
  }

  return rows.map((row, i) => ({ ...row, duplicate: labels.get(i) ?? '' }));
}
