import fs from "node:fs";
import path from "node:path";
import RssParser from "rss-parser";
import { FeedReadError } from "../errors";
import type { Feed, FeedItem } from "./types";

const rssParser = new RssParser();

/**
 * 피드 파일 원문 읽기
 * 파일이 없으면 null (첫 실행)
 */
export async function readFeedFile(filePath: string): Promise<string | null> {
  const resolved = path.resolve(filePath);
  try {
    return await fs.promises.readFile(resolved, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw new FeedReadError(`피드 파일 읽기 실패: ${resolved}`, {
      path: resolved,
      cause: err,
    });
  }
}

/**
 * RSS 문서 파싱
 * 제목/링크/날짜가 없는 항목은 경고 후 건너뜀, 문서 자체가 깨졌으면 FeedReadError
 */
export async function parseFeed(xml: string, filePath: string): Promise<Feed> {
  let parsed: Awaited<ReturnType<typeof rssParser.parseString>>;
  try {
    parsed = await rssParser.parseString(xml);
  } catch (err) {
    throw new FeedReadError(`기존 피드 파싱 실패: ${filePath}`, {
      path: filePath,
      cause: err,
    });
  }

  const items: FeedItem[] = [];
  for (const entry of parsed.items) {
    const title = entry.title?.trim();
    const link = entry.link?.trim();
    const publishedAt = new Date(entry.isoDate ?? entry.pubDate ?? "");

    if (!title || !link || Number.isNaN(publishedAt.getTime())) {
      console.warn(`[feed] 기존 항목 건너뜀: ${link || title || "(제목 없음)"}`);
      continue;
    }

    // description이 제목과 같으면 요약 없음으로 취급
    const description = entry.content?.trim();
    items.push({
      title,
      link,
      publishedAt,
      ...(description && description !== title ? { summary: description } : {}),
    });
  }

  return {
    meta: {
      title: parsed.title ?? "",
      link: parsed.link ?? "",
      description: parsed.description ?? "",
      language: typeof parsed.language === "string" ? parsed.language : "",
    },
    items,
  };
}

/** 기존 피드 로드, 파일이 없으면 null */
export async function loadFeed(filePath: string): Promise<Feed | null> {
  const xml = await readFeedFile(filePath);
  if (xml === null) return null;
  return parseFeed(xml, path.resolve(filePath));
}
