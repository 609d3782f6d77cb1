/**
 * 피드 모듈 통합 엔트리
 */
export type { Feed, FeedItem, FeedMeta } from "./types";
export { loadFeed, parseFeed, readFeedFile } from "./reader";
export { mergeFeedItems, DEFAULT_MAX_ITEMS } from "./merge";
export type { MergeOptions, MergeResult } from "./merge";
export { renderFeed, writeFeedFile, escapeXml, stripInvalidXmlChars } from "./writer";
