import { DEFAULT_USER_AGENT } from "../config";
import { NetworkError } from "../errors";

const DEFAULT_TIMEOUT = 30_000; // 30초

export interface FetchPageOptions {
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * URL의 HTML 본문을 가져옴
 * 연결 실패, 타임아웃, non-2xx 응답은 NetworkError (재시도 없음)
 */
export async function fetchPage(
  url: string,
  options: FetchPageOptions = {}
): Promise<string> {
  const { timeoutMs = DEFAULT_TIMEOUT, userAgent = DEFAULT_USER_AGENT } = options;

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(url, {
      signal: controller.signal,
      headers: {
        "User-Agent": userAgent,
        Accept: "text/html",
        "Accept-Language": "zh-HK,zh;q=0.9,en-US;q=0.8,en;q=0.7",
      },
    });

    if (!res.ok) {
      throw new NetworkError(`HTTP ${res.status}: ${url}`, {
        url,
        status: res.status,
      });
    }

    const html = await res.text();
    console.log(`[fetch] ${url} (${html.length}자)`);
    return html;
  } catch (err) {
    if (err instanceof NetworkError) throw err;

    const reason = controller.signal.aborted
      ? `타임아웃 (${timeoutMs}ms)`
      : "요청 실패";
    throw new NetworkError(`${reason}: ${url}`, { url, cause: err });
  } finally {
    clearTimeout(timer);
  }
}
