// apps/runner/src/index.ts
import { runCli } from "./cli";

runCli(process.argv)
  .then((code) => {
    if (code !== 0) process.exit(code);
  })
  .catch((err: unknown) => {
    console.error(String(err instanceof Error ? err.stack : err));
    process.exit(1);
  });
