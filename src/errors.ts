/**
 * 피드 갱신 작업의 에러 타입
 * - ParseError: 항목 단위, 경고 후 건너뜀
 * - 그 외: CLI까지 전파 → exit code 1
 */
export class FeedUpdaterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 페이지 요청 실패 (연결 오류, 타임아웃, non-2xx) */
export class NetworkError extends FeedUpdaterError {
  readonly url: string;
  readonly status?: number;

  constructor(
    message: string,
    opts: { url: string; status?: number; cause?: unknown }
  ) {
    super(message, { cause: opts.cause });
    this.url = opts.url;
    this.status = opts.status;
  }
}

/** 개별 항목 파싱 실패 */
export class ParseError extends FeedUpdaterError {}

/** 피드 파일 쓰기 실패 (기존 파일은 그대로 남음) */
export class WriteError extends FeedUpdaterError {
  readonly path: string;

  constructor(message: string, opts: { path: string; cause?: unknown }) {
    super(message, { cause: opts.cause });
    this.path = opts.path;
  }
}

/** 기존 피드 파일을 읽을 수 없음 */
export class FeedReadError extends FeedUpdaterError {
  readonly path: string;

  constructor(message: string, opts: { path: string; cause?: unknown }) {
    super(message, { cause: opts.cause });
    this.path = opts.path;
  }
}

export class ConfigError extends FeedUpdaterError {}
