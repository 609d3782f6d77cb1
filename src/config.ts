import { z } from "zod";
import { ConfigError } from "./errors";

export const DEFAULT_SOURCE_URL = "https://www.orangenews.hk/html/topic/index.html";
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

export interface FeedConfig {
  sourceUrl: string;   // 수집 대상 토픽 페이지
  baseUrl: string;     // 상대 링크 해석 기준
  title: string;
  description: string;
  language: string;
  selfUrl?: string;    // 발행 위치 (atom:link rel="self")
  maxItems: number;    // 0 = 제한 없음
  timeoutMs: number;
  userAgent: string;
  output: string;      // 피드 파일 경로
}

// 빈 문자열은 미설정으로 취급
const optionalText = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (typeof v === "string" && v.trim() === "" ? undefined : v), schema);

const EnvSchema = z.object({
  FEED_SOURCE_URL: optionalText(z.string().url().default(DEFAULT_SOURCE_URL)),
  FEED_BASE_URL: optionalText(z.string().url().optional()),
  FEED_TITLE: optionalText(z.string().default("Orange News - Commentaries")),
  FEED_DESCRIPTION: optionalText(
    z.string().default("Latest commentaries from Orange News HK")
  ),
  FEED_LANGUAGE: optionalText(z.string().default("zh-hk")),
  FEED_SELF_URL: optionalText(z.string().url().optional()),
  FEED_MAX_ITEMS: optionalText(z.coerce.number().int().min(0).default(200)),
  FETCH_TIMEOUT_MS: optionalText(z.coerce.number().int().positive().default(30_000)),
  FETCH_USER_AGENT: optionalText(z.string().default(DEFAULT_USER_AGENT)),
  FEED_OUTPUT: optionalText(z.string().default("feed.xml")),
});

export type ConfigEnv = Record<string, string | undefined>;

/**
 * 환경변수(+ CLI 덮어쓰기)에서 설정 로드
 * 잘못된 값이 있으면 ConfigError
 */
export function loadConfig(env: ConfigEnv = process.env): FeedConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`설정 오류 - ${details}`, { cause: parsed.error });
  }

  const e = parsed.data;
  return {
    sourceUrl: e.FEED_SOURCE_URL,
    baseUrl: e.FEED_BASE_URL ?? new URL(e.FEED_SOURCE_URL).origin,
    title: e.FEED_TITLE,
    description: e.FEED_DESCRIPTION,
    language: e.FEED_LANGUAGE,
    selfUrl: e.FEED_SELF_URL,
    maxItems: e.FEED_MAX_ITEMS,
    timeoutMs: e.FETCH_TIMEOUT_MS,
    userAgent: e.FETCH_USER_AGENT,
    output: e.FEED_OUTPUT,
  };
}
