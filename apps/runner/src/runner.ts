// apps/runner/src/runner.ts
//
// Job Runner: bounded worker pool over the pending jobs.
//
// Each job is one unit of work: request -> stream parse -> extract -> persist. A unit
// that throws is converted into a JobFailure (logged, recorded under _failures/) and
// never reaches its siblings. `runJobs` resolves only after every unit has settled.

import type { FailureArtifact, FailureClass, Job, JobResult } from "shared-types";
import { PersistenceError, TransportError, errorMessage } from "./errors";
import { extractAnswer } from "./extract";
import { completionsUrl, streamCompletion, type ClientConfig, type FetchLike } from "./inference";
import { consoleLog, type RunnerLog } from "./log";
import type { ResultStore } from "./resultStore";

export const DEFAULT_CONCURRENCY = 10;

export type RunOptions = {
  concurrency: number;
  client: ClientConfig;
  store: ResultStore;
  fetch?: FetchLike;
  log?: RunnerLog;
};

export type JobFailure = {
  id: string;
  error: unknown;
  artifact: FailureArtifact;
};

export type RunOutcome = {
  results: JobResult[];
  failures: JobFailure[];
};

export type PendingSelection = {
  pending: Job[];
  /** Jobs already in the completion set. */
  skipped: number;
  /** Ids seen more than once in the source; only the first occurrence is kept. */
  duplicates: string[];
  /** Jobs left out by the --only allow-list. */
  excluded: number;
};

/**
 * Filters the source against the completion snapshot before anything is submitted.
 */
export function selectPendingJobs(
  jobs: readonly Job[],
  completed: ReadonlySet<string>,
  onlyIds: readonly string[] | null = null
): PendingSelection {
  const allow = onlyIds ? new Set(onlyIds) : null;
  const seen = new Set<string>();
  const duplicates: string[] = [];
  const pending: Job[] = [];
  let skipped = 0;
  let excluded = 0;

  for (const job of jobs) {
    if (allow && !allow.has(job.id)) {
      excluded += 1;
      continue;
    }
    if (seen.has(job.id)) {
      duplicates.push(job.id);
      continue;
    }
    seen.add(job.id);
    if (completed.has(job.id)) {
      skipped += 1;
      continue;
    }
    pending.push(job);
  }

  return { pending, skipped, duplicates, excluded };
}

export async function runWithConcurrency<T, R>(items: T[], concurrency: number, fn: (item: T, idx: number) => Promise<R>): Promise<R[]> {
  const n = Math.max(1, Math.floor(concurrency));
  const results: R[] = new Array(items.length);
  let nextIdx = 0;

  async function worker(): Promise<void> {
    for (;;) {
      const idx = nextIdx;
      nextIdx += 1;
      if (idx >= items.length) return;

      const item = items[idx];
      if (item === undefined) return;

      results[idx] = await fn(item, idx);
    }
  }

  const workers = Array.from({ length: Math.min(n, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

function failureClassOf(e: unknown): FailureClass {
  if (e instanceof TransportError) return e.failureClass;
  if (e instanceof PersistenceError) return "persistence_error";
  return "unknown";
}

export function mkFailureArtifact(job: Job, e: unknown, client: ClientConfig, latencyMs: number): FailureArtifact {
  const artifact: FailureArtifact = {
    type: "runner_job_failure",
    class: failureClassOf(e),
    id: job.id,
    url: completionsUrl(client.httpUrl),
    timeout_ms: client.timeoutMs,
    latency_ms: latencyMs,
    error_name: e instanceof Error ? e.name : "Error",
    error_message: errorMessage(e),
    failed_at: Date.now(),
  };

  if (e instanceof TransportError) {
    if (e.status !== undefined) artifact.status = e.status;
    if (e.statusText !== undefined) artifact.status_text = e.statusText;
    if (e.bodySnippet !== undefined) artifact.body_snippet = e.bodySnippet;
  }
  return artifact;
}

/** request -> parse -> persist for one job. Throws on any failure. */
export async function attemptJob(
  job: Job,
  opts: { client: ClientConfig; store: ResultStore; fetch: FetchLike; log: RunnerLog }
): Promise<JobResult> {
  const state = await streamCompletion(job, opts.client, { fetch: opts.fetch, log: opts.log });

  const result: JobResult = {
    id: job.id,
    question: job.question,
    reasoning: state.reasoning,
    raw_response: state.content,
    parsed: extractAnswer(state.content),
  };
  await opts.store.put(result);

  try {
    await opts.store.clearFailure(job.id);
  } catch (e) {
    opts.log.warn(`[${job.id}] Result saved but stale failure record was not removed: ${errorMessage(e)}`);
  }
  return result;
}

type Settled = { ok: true; result: JobResult } | { ok: false; failure: JobFailure };

export async function runJobs(jobs: Job[], opts: RunOptions): Promise<RunOutcome> {
  if (!Number.isInteger(opts.concurrency) || opts.concurrency < 1) {
    throw new RangeError(`concurrency must be an integer >= 1 (got ${opts.concurrency})`);
  }

  const log = opts.log ?? consoleLog;
  const fetchImpl: FetchLike = opts.fetch ?? fetch;
  const total = jobs.length;
  let finished = 0;

  const settled = await runWithConcurrency(jobs, opts.concurrency, async (job): Promise<Settled> => {
    const started = Date.now();
    log.log(`Starting job ${job.id}`);

    try {
      const result = await attemptJob(job, { client: opts.client, store: opts.store, fetch: fetchImpl, log });
      finished += 1;
      log.log(`[${finished}/${total}] Finished job ${job.id}`);
      return { ok: true, result };
    } catch (e) {
      finished += 1;
      const artifact = mkFailureArtifact(job, e, opts.client, Date.now() - started);
      log.error(`[${finished}/${total}] Failed job ${job.id}: ${artifact.error_name}: ${artifact.error_message}`);

      try {
        await opts.store.recordFailure(artifact);
      } catch (recordErr) {
        log.error(`[${job.id}] Could not record failure: ${errorMessage(recordErr)}`);
      }
      return { ok: false, failure: { id: job.id, error: e, artifact } };
    }
  });

  const results: JobResult[] = [];
  const failures: JobFailure[] = [];
  for (const s of settled) {
    if (s.ok) results.push(s.result);
    else failures.push(s.failure);
  }
  return { results, failures };
}
