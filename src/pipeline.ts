import path from "node:path";
import type { FeedConfig } from "./config";
import { fetchPage, extractItems } from "./scrape";
import {
  mergeFeedItems,
  parseFeed,
  readFeedFile,
  renderFeed,
  writeFeedFile,
} from "./feed";

export interface PipelineOptions {
  config: FeedConfig;
  now?: Date;
}

export interface PipelineResult {
  outputPath: string;
  received: number;  // 페이지에서 추출한 건수
  added: number;     // 신규 항목 수
  total: number;     // 최종 피드 항목 수
  changed: boolean;  // 파일 내용이 바뀌었는지
}

/**
 * 전체 파이프라인: 페이지 수집 → 기사 추출 → 기존 피드와 병합 → 파일 교체
 * 수집 실패 시 기존 피드 파일은 건드리지 않음
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const { config, now = new Date() } = options;
  const outputPath = path.resolve(config.output);

  console.log("=== 피드 갱신 시작 ===\n");

  // 1. 페이지 수집
  console.log(`[1/3] 페이지 수집 중: ${config.sourceUrl}`);
  const html = await fetchPage(config.sourceUrl, {
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
  });

  // 2. 기존 피드 로드 + 추출 결과 병합
  console.log("[2/3] 기사 추출 + 병합 중...");
  const previousXml = await readFeedFile(outputPath);
  const existing = previousXml === null ? [] : (await parseFeed(previousXml, outputPath)).items;

  const merged = mergeFeedItems(
    existing,
    extractItems(html, { baseUrl: config.baseUrl, now }),
    { maxItems: config.maxItems }
  );

  if (merged.received === 0) {
    console.warn("[extract] 추출된 기사 없음 - 기존 항목만 유지");
  }
  console.log(
    `[2/3] 완료: 추출 ${merged.received}건, 신규 ${merged.added.length}건, 기존 ${existing.length}건`
  );
  if (merged.dropped > 0) {
    console.log(`[2/3] 최대 ${config.maxItems}건 초과로 ${merged.dropped}건 제외`);
  }

  // 3. 파일 교체
  const xml = renderFeed({
    meta: {
      title: config.title,
      link: config.sourceUrl,
      description: config.description,
      language: config.language,
      selfUrl: config.selfUrl,
    },
    items: merged.items,
  });

  const changed = xml !== previousXml;
  if (changed) {
    await writeFeedFile(outputPath, xml);
    console.log(`[3/3] 피드 저장: ${outputPath} (${merged.items.length}건)`);
  } else {
    console.log(`[3/3] 변경 없음: ${outputPath}`);
  }

  console.log("\n=== 피드 갱신 종료 ===");

  return {
    outputPath,
    received: merged.received,
    added: merged.added.length,
    total: merged.items.length,
    changed,
  };
}
