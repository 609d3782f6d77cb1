import type { FeedItem } from "./types";

export const DEFAULT_MAX_ITEMS = 200;

export interface MergeOptions {
  maxItems?: number; // 0 이하 = 제한 없음
}

export interface MergeResult {
  items: FeedItem[];
  added: FeedItem[];   // 새로 추가된 항목
  received: number;    // incoming 전체 건수
  dropped: number;     // 최대 개수 초과로 잘린 건수
}

/**
 * 기존 항목 + 새 항목 병합
 * - link 기준 중복 제거, 기존 항목 우선
 * - 새 항목은 수집 순서 그대로 앞에 추가, incoming 중 앞쪽 maxItems건만 대상
 * - maxItems를 넘으면 뒤쪽(오래된) 항목부터 제거
 */
export function mergeFeedItems(
  existing: readonly FeedItem[],
  incoming: Iterable<FeedItem>,
  options: MergeOptions = {}
): MergeResult {
  const { maxItems = DEFAULT_MAX_ITEMS } = options;
  const seen = new Set<string>();

  const kept: FeedItem[] = [];
  for (const item of existing) {
    if (seen.has(item.link)) continue;
    seen.add(item.link);
    kept.push(item);
  }

  const added: FeedItem[] = [];
  let received = 0;
  for (const item of incoming) {
    received++;
    if (maxItems > 0 && received > maxItems) continue;
    if (seen.has(item.link)) continue;
    seen.add(item.link);
    added.push(item);
  }

  const merged = [...added, ...kept];
  const items = maxItems > 0 ? merged.slice(0, maxItems) : merged;

  return { items, added, received, dropped: merged.length - items.length };
}
