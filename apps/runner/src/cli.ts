// apps/runner/src/cli.ts
//
// One runner invocation: config, job source, result store, selection, run, summary.
// Returns the process exit code; errors that carry an `exitCode` (usage, dataset, store)
// are reported here, anything else propagates to the caller.

import path from "node:path";
import type { RunSummary } from "shared-types";
import { HELP_TEXT, parseRunnerConfig, wantsHelp } from "./config";
import type { FetchLike } from "./inference";
import { loadJobs } from "./jobSource";
import { consoleLog, type RunnerLog } from "./log";
import { ResultStore } from "./resultStore";
import { runJobs, selectPendingJobs } from "./runner";

export type CliDeps = {
  fetch?: FetchLike;
  log?: RunnerLog;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

function exitCodeOf(err: unknown): number | null {
  if (err instanceof Error && "exitCode" in err && typeof err.exitCode === "number") return err.exitCode;
  return null;
}

async function run(argv: string[], deps: CliDeps, log: RunnerLog): Promise<number> {
  if (wantsHelp(argv)) {
    log.log(HELP_TEXT);
    return 0;
  }

  const cfg = parseRunnerConfig(argv, deps.env ?? process.env, deps.cwd ?? process.cwd());
  const rel = (p: string) => {
    const r = path.relative(cfg.repoRoot, p).split(path.sep).join("/");
    return r.length ? r : ".";
  };

  // Both may abort the run; nothing has been sent yet.
  const source = await loadJobs({ dataset: cfg.dataset, testMode: cfg.testMode });
  const store = await ResultStore.open(cfg.resultsDir);

  const selection = selectPendingJobs(source.jobs, store.completedIds(), cfg.onlyIds);

  log.log("Runner started");
  log.log("source:", cfg.testMode ? "test questions" : rel(cfg.dataset ?? ""));
  log.log("resultsDir:", rel(store.dir));
  log.log("Total jobs:", source.total);
  if (source.imageJobs > 0) log.log("Skipped (image input):", source.imageJobs);
  if (cfg.onlyIds) log.log("only:", cfg.onlyIds.join(", "));
  if (selection.excluded > 0) log.log("Excluded by --only:", selection.excluded);
  if (selection.duplicates.length > 0) {
    log.warn(`Duplicate job ids in source (first occurrence kept): ${selection.duplicates.join(", ")}`);
  }
  log.log("Skipped (already processed):", selection.skipped);

  if (selection.pending.length === 0) {
    log.log("All jobs have already been processed!");
    return 0;
  }

  if (cfg.dryRun) {
    log.log("dryRun:", true);
    for (const j of selection.pending) log.log("Job:", j.id);
    log.log(`Would process ${selection.pending.length} new jobs.`);
    return 0;
  }

  log.log("model:", cfg.model);
  log.log("httpUrl:", cfg.httpUrl);
  log.log("numWorkers:", cfg.numWorkers);
  log.log("timeoutMs:", cfg.timeoutMs);
  log.log(`Processing ${selection.pending.length} new jobs...`);

  const startedAt = Date.now();
  const outcome = await runJobs(selection.pending, {
    concurrency: cfg.numWorkers,
    client: {
      model: cfg.model,
      temperature: cfg.temperature,
      httpUrl: cfg.httpUrl,
      timeoutMs: cfg.timeoutMs,
      bodySnippetBytes: cfg.bodySnippetBytes,
    },
    store,
    fetch: deps.fetch,
    log,
  });

  const summary: RunSummary = {
    run_id: cfg.runId,
    model: cfg.model,
    http_url: cfg.httpUrl,
    temperature: cfg.temperature,
    num_workers: cfg.numWorkers,
    total_jobs: source.total,
    skipped: selection.skipped,
    pending: selection.pending.length,
    succeeded: outcome.results.length,
    failed: outcome.failures.length,
    failed_ids: outcome.failures.map((f) => f.id),
    started_at: startedAt,
    ended_at: Date.now(),
  };
  const summaryPath = await store.writeRunSummary(summary);

  log.log("Runner finished");
  log.log("Processed:", summary.succeeded);
  log.log("Failed:", summary.failed);
  if (summary.failed > 0) log.log("failures:", rel(path.join(store.dir, "_failures")));
  log.log("summary:", rel(summaryPath));
  return 0;
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const log = deps.log ?? consoleLog;
  try {
    return await run(argv, deps, log);
  } catch (err) {
    const code = exitCodeOf(err);
    if (code === null) throw err;
    log.error(err instanceof Error ? err.message : String(err));
    return code;
  }
}
