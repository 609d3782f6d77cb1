/**
 * 페이지 수집/추출 모듈 통합 엔트리
 */
export { fetchPage } from "./fetcher";
export type { FetchPageOptions } from "./fetcher";
export { extractItems } from "./extractor";
export type { ExtractOptions } from "./extractor";
