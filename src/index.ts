import "dotenv/config";
import { main } from "./cli";

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("피드 갱신 치명적 오류:", err);
    process.exitCode = 1;
  }
);
