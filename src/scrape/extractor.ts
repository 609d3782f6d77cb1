import * as cheerio from "cheerio";
import { ParseError } from "../errors";
import type { FeedItem } from "../feed/types";
import { stripInvalidXmlChars } from "../feed/writer";

// 기사 링크가 아닌 메뉴/버튼 텍스트
const NAV_LABELS = new Set(["查看更多", "下載APP", "登入", "首頁"]);
const MIN_TITLE_LENGTH = 5;
const DATE_SEARCH_DEPTH = 5;
const DATE_PATTERN = /(\d{4})-(\d{2})-(\d{2})/;

export interface ExtractOptions {
  baseUrl: string;  // 상대 링크 해석 기준
  now?: Date;       // 날짜를 못 찾은 항목의 기준일
}

/**
 * 토픽 페이지 HTML에서 기사 항목을 문서 순서대로 추출
 * - 한 번만 순회 가능한 지연 시퀀스
 * - 같은 페이지 안의 중복 링크는 첫 항목만 사용
 * - 항목 단위 파싱 실패는 경고 후 건너뜀
 */
export function* extractItems(
  html: string,
  options: ExtractOptions
): Generator<FeedItem, void, undefined> {
  const $ = cheerio.load(html);
  const now = options.now ?? new Date();
  const seen = new Set<string>();

  for (const el of $("a").toArray()) {
    const anchor = $(el);

    const title = stripInvalidXmlChars(anchor.text()).replace(/\s+/g, " ").trim();
    if (!title || NAV_LABELS.has(title)) continue;
    if ([...title].length < MIN_TITLE_LENGTH) continue;

    const href = anchor.attr("href")?.trim();
    if (!href || href === "#") continue;

    let item: FeedItem;
    try {
      const link = resolveLink(href, options.baseUrl);
      if (!link || seen.has(link)) continue;

      const ancestorTexts = anchor
        .parents()
        .slice(0, DATE_SEARCH_DEPTH)
        .toArray()
        .map((parent) => $(parent).text());

      item = { title, link, publishedAt: findPublishedAt(ancestorTexts, now) };
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      console.warn(`[extract] 항목 건너뜀 "${title}": ${err.message}`);
      continue;
    }

    seen.add(item.link);
    yield item;
  }
}

/** http(s)가 아닌 링크(javascript:, mailto: 등)는 null */
function resolveLink(href: string, baseUrl: string): string | null {
  let url: URL;
  try {
    url = new URL(href, baseUrl);
  } catch (err) {
    throw new ParseError(`잘못된 링크 "${href}"`, { cause: err });
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") return null;
  return url.toString();
}

/**
 * 상위 요소를 최대 5단계까지 올라가며 첫 YYYY-MM-DD를 찾음
 * 못 찾으면 기준일 정오(UTC)
 */
function findPublishedAt(ancestorTexts: string[], now: Date): Date {
  for (const text of ancestorTexts) {
    const match = DATE_PATTERN.exec(text);
    if (match) return noonUtc(match);
  }

  return new Date(
    Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), 12)
  );
}

function noonUtc(match: RegExpExecArray): Date {
  const [text, y, m, d] = match;
  const year = Number(y);
  const month = Number(m) - 1;
  const day = Number(d);

  // Date.UTC는 0~99년을 1900년대로 해석
  const date = new Date(Date.UTC(2000, 0, 1, 12));
  date.setUTCFullYear(year, month, day);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month ||
    date.getUTCDate() !== day
  ) {
    throw new ParseError(`잘못된 날짜 "${text}"`);
  }
  return date;
}
