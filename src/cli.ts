import { parseArgs } from "node:util";
import { loadConfig, type ConfigEnv } from "./config";
import { FeedUpdaterError } from "./errors";
import { runPipeline } from "./pipeline";

export const USAGE = `Usage: feed-updater [options]

Options:
  -o, --output <file>    피드 파일 경로 (기본: FEED_OUTPUT 또는 feed.xml)
      --source <url>     수집할 토픽 페이지 URL
      --max-items <n>    피드 최대 항목 수 (0 = 제한 없음)
      --timeout <ms>     페이지 요청 타임아웃
  -h, --help             도움말`;

export interface CliArgs {
  help: boolean;
  overrides: ConfigEnv; // 환경변수 이름 기준 덮어쓰기 값
}

/** 알 수 없는 옵션이나 위치 인자가 있으면 예외 */
export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      output: { type: "string", short: "o" },
      source: { type: "string" },
      "max-items": { type: "string" },
      timeout: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
    strict: true,
    allowPositionals: false,
  });

  const overrides: ConfigEnv = {};
  if (values.output !== undefined) overrides.FEED_OUTPUT = values.output;
  if (values.source !== undefined) overrides.FEED_SOURCE_URL = values.source;
  if (values["max-items"] !== undefined) overrides.FEED_MAX_ITEMS = values["max-items"];
  if (values.timeout !== undefined) overrides.FETCH_TIMEOUT_MS = values.timeout;

  return { help: values.help ?? false, overrides };
}

/**
 * CLI 실행, exit code 반환
 * 0: 성공, 1: 수집/쓰기/설정 오류
 */
export async function main(
  argv: string[],
  env: ConfigEnv = process.env
): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    console.error(`[cli] ${err instanceof Error ? err.message : String(err)}`);
    console.error(USAGE);
    return 1;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  try {
    const config = loadConfig({ ...env, ...args.overrides });
    await runPipeline({ config });
    return 0;
  } catch (err) {
    if (err instanceof FeedUpdaterError) {
      console.error(`[cli] ${err.name}: ${err.message}`);
    } else {
      console.error("[cli] 예상치 못한 오류:", err);
    }
    return 1;
  }
}
