// apps/runner/src/config.ts
//
// CLI flags -> RunnerConfig. Paths resolve from --repoRoot (default INIT_CWD, then cwd),
// so `npm run runner -- ...` from a workspace still writes next to the caller.

import path from "node:path";
import { randomUUID } from "node:crypto";
import { CliUsageError, makeArgvHelpers } from "cli-utils";
import { normalizeBaseUrl } from "./inference";
import { DEFAULT_CONCURRENCY } from "./runner";

export type RunnerConfig = {
  repoRoot: string;
  runId: string;

  model: string;
  temperature: number;
  numWorkers: number;
  httpUrl: string;

  dataset: string | null;
  testMode: boolean;
  resultsDir: string;
  onlyIds: string[] | null;
  dryRun: boolean;

  timeoutMs: number;
  bodySnippetBytes: number;
};

export const HELP_TEXT = `
Usage:
  runner (--dataset <path> | --testMode) --model <name> [--temperature <t>] [--numWorkers <n>]
         [--httpUrl <url>] [--resultsDir <dir>] [--only <ids>] [--dryRun] [--runId <id>]
         [--timeoutMs <ms>] [--bodySnippetBytes <n>] [--repoRoot <path>]

Options:
  --dataset                 Jobs file: JSON array, or JSONL when the name ends in .jsonl
  --testMode                Use the built-in test question instead of a dataset
  --model                   Model name sent with every request (required unless --dryRun)
  --temperature             Sampling temperature, passed through verbatim (default: 0)
  --numWorkers              Max concurrent requests, >= 1 (default: ${DEFAULT_CONCURRENCY})
  --httpUrl                 Endpoint base URL (default: http://localhost:8000/v1)
  --resultsDir              One <id>.json per finished job (default: results)
  --only                    Comma-separated job ids to consider (e.g. q_001,q_002)
  --dryRun                  Print pending jobs, send no requests
  --runId                   Run id for the run summary (default: random UUID)

Reliability:
  --timeoutMs               Max wait in ms for headers, then between body chunks (default: 300000)
  --bodySnippetBytes        Error body bytes kept in failure records (default: 4000)

  --repoRoot                Base for relative paths (default: INIT_CWD or cwd)
  --help, -h                Show this help

Exit codes:
  0  run finished (failed jobs are reported, not fatal)
  1  runtime error (dataset or results directory unusable)
  2  bad arguments / usage

Examples:
  tsx src/index.ts --testMode --model deepseek-ai/DeepSeek-R1 --httpUrl http://localhost:8000/v1
  tsx src/index.ts --dataset data/questions.jsonl --model m --temperature 0.6 --numWorkers 64
`.trim();

const ALLOWED_OPTIONS = new Set([
  "--dataset",
  "--testMode",
  "--model",
  "--temperature",
  "--numWorkers",
  "--httpUrl",
  "--resultsDir",
  "--only",
  "--dryRun",
  "--runId",
  "--timeoutMs",
  "--bodySnippetBytes",
  "--repoRoot",
  "--help",
  "-h",
]);

const VALUE_OPTIONS = [
  "--dataset",
  "--model",
  "--temperature",
  "--numWorkers",
  "--httpUrl",
  "--resultsDir",
  "--only",
  "--runId",
  "--timeoutMs",
  "--bodySnippetBytes",
  "--repoRoot",
];

function resolveFromRoot(repoRoot: string, p: string): string {
  if (path.isAbsolute(p)) return p;
  return path.resolve(repoRoot, p);
}

export function wantsHelp(argv: string[]): boolean {
  return makeArgvHelpers(argv).hasFlag("--help", "-h");
}

export function parseRunnerConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): RunnerConfig {
  const args = makeArgvHelpers(argv);

  args.assertNoUnknownOptions(ALLOWED_OPTIONS, HELP_TEXT);
  for (const flag of VALUE_OPTIONS) args.assertHasValue(flag, HELP_TEXT);

  const repoRoot = args.getArg("--repoRoot") ?? env.INIT_CWD ?? cwd;
  const dryRun = args.getFlag("--dryRun");
  const testMode = args.getFlag("--testMode");
  const datasetRaw = args.getArg("--dataset");

  if (!testMode && !datasetRaw) {
    throw new CliUsageError(`Pass --dataset <path> or --testMode\n\n${HELP_TEXT}`);
  }

  const model = args.getArg("--model") ?? "";
  if (!model && !dryRun) {
    throw new CliUsageError(`Missing required option --model\n\n${HELP_TEXT}`);
  }

  const numWorkers = args.parseIntFlag("--numWorkers", DEFAULT_CONCURRENCY, HELP_TEXT);
  if (numWorkers < 1) throw new CliUsageError(`--numWorkers must be >= 1 (got ${numWorkers})\n\n${HELP_TEXT}`);

  const timeoutMs = args.parseIntFlag("--timeoutMs", 300000, HELP_TEXT);
  if (timeoutMs < 1) throw new CliUsageError(`--timeoutMs must be >= 1 (got ${timeoutMs})\n\n${HELP_TEXT}`);

  const bodySnippetBytes = args.parseIntFlag("--bodySnippetBytes", 4000, HELP_TEXT);
  if (bodySnippetBytes < 0) {
    throw new CliUsageError(`--bodySnippetBytes must be >= 0 (got ${bodySnippetBytes})\n\n${HELP_TEXT}`);
  }

  return {
    repoRoot,
    runId: args.getArg("--runId") ?? randomUUID(),

    model,
    temperature: args.parseFloatFlag("--temperature", 0, HELP_TEXT),
    numWorkers,
    httpUrl: normalizeBaseUrl(args.getArg("--httpUrl") ?? "http://localhost:8000/v1"),

    dataset: datasetRaw ? resolveFromRoot(repoRoot, datasetRaw) : null,
    testMode,
    resultsDir: resolveFromRoot(repoRoot, args.getArg("--resultsDir") ?? "results"),
    onlyIds: args.getListArg("--only"),
    dryRun,

    timeoutMs,
    bodySnippetBytes,
  };
}
