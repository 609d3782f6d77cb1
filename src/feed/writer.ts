import fs from "node:fs";
import path from "node:path";
import { WriteError } from "../errors";
import type { Feed, FeedItem } from "./types";

// XML 1.0에서 허용되지 않는 문자
const INVALID_XML_CHARS =
  /[^\x09\x0A\x0D\x20-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/gu;

export function stripInvalidXmlChars(text: string): string {
  return text.replace(INVALID_XML_CHARS, "");
}

export function escapeXml(text: string): string {
  return stripInvalidXmlChars(text)
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** RFC 822 형식 */
function formatDate(date: Date): string {
  return date.toUTCString();
}

/**
 * RSS 2.0 문서 생성
 * lastBuildDate는 실행 시각이 아니라 가장 최근 항목 기준 → 같은 입력이면 같은 출력
 */
export function renderFeed(feed: Feed): string {
  const { meta, items } = feed;
  const lines = [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<rss version="2.0" xmlns:atom="http://www.w3.org/2005/Atom">`,
    `  <channel>`,
    `    <title>${escapeXml(meta.title)}</title>`,
    `    <link>${escapeXml(meta.link)}</link>`,
    `    <description>${escapeXml(meta.description)}</description>`,
    `    <language>${escapeXml(meta.language)}</language>`,
  ];

  if (meta.selfUrl) {
    lines.push(
      `    <atom:link href="${escapeXml(meta.selfUrl)}" rel="self" type="application/rss+xml"/>`
    );
  }

  const lastBuild = latestPublishedAt(items);
  if (lastBuild) {
    lines.push(`    <lastBuildDate>${formatDate(lastBuild)}</lastBuildDate>`);
  }

  for (const item of items) {
    const link = escapeXml(item.link);
    lines.push(
      `    <item>`,
      `      <title>${escapeXml(item.title)}</title>`,
      `      <link>${link}</link>`,
      `      <description>${escapeXml(item.summary ?? item.title)}</description>`,
      `      <pubDate>${formatDate(item.publishedAt)}</pubDate>`,
      `      <guid isPermaLink="true">${link}</guid>`,
      `    </item>`
    );
  }

  lines.push(`  </channel>`, `</rss>`);
  return `${lines.join("\n")}\n`;
}

function latestPublishedAt(items: readonly FeedItem[]): Date | null {
  let latest: Date | null = null;
  for (const item of items) {
    if (!latest || item.publishedAt.getTime() > latest.getTime()) {
      latest = item.publishedAt;
    }
  }
  return latest;
}

/**
 * 임시 파일에 쓴 뒤 rename으로 교체
 * 실패 시 임시 파일 삭제 후 WriteError, 기존 파일은 그대로 유지
 */
export async function writeFeedFile(filePath: string, xml: string): Promise<void> {
  const resolved = path.resolve(filePath);
  const tmp = `${resolved}.${process.pid}.${Math.random().toString(16).slice(2)}.tmp`;

  try {
    await fs.promises.mkdir(path.dirname(resolved), { recursive: true });
    await fs.promises.writeFile(tmp, xml, "utf-8");
    await fs.promises.rename(tmp, resolved);
  } catch (err) {
    await fs.promises.rm(tmp, { force: true }).catch((rmErr: unknown) => {
      console.warn(`[feed] 임시 파일 삭제 실패: ${tmp}`, rmErr);
    });
    throw new WriteError(`피드 파일 쓰기 실패: ${resolved}`, {
      path: resolved,
      cause: err,
    });
  }
}
