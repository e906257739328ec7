// apps/runner/src/jobSource.ts
//
// Job Source: the built-in test set, or a dataset file (JSON array, or JSONL when the
// path ends in .jsonl). Any read or schema problem is startup-fatal.

import { readFile } from "node:fs/promises";
import type { Job } from "shared-types";
import { JobSourceError, errorMessage } from "./errors";
import { formatAjvErrors, validateJobRecord, type JobRecord } from "./schemas";

export type LoadedJobs = {
  jobs: Job[];
  /** Records read before filtering. */
  total: number;
  /** Records dropped because they need image input. */
  imageJobs: number;
};

export const TEST_JOBS: readonly Job[] = [
  {
    id: "test_q1",
    question:
      "Let $N = 36036$. Find the number of primitive Dirichlet characters of conductor $N$ and order $6$.",
    answer_type: "exact_match",
    image: "",
  },
];

function toJob(r: JobRecord): Job {
  const job: Job = { id: r.id, question: r.question, answer_type: r.answer_type };
  if (typeof r.image === "string") job.image = r.image;
  return job;
}

export function needsImage(job: Job): boolean {
  return typeof job.image === "string" && job.image.length > 0;
}

export function parseDataset(raw: string, format: "json" | "jsonl"): Job[] {
  let rows: unknown[];
  if (format === "jsonl") {
    rows = [];
    const lines = raw.split("\n");
    for (let i = 0; i < lines.length; i++) {
      const line = (lines[i] ?? "").trim();
      if (!line) continue;
      try {
        rows.push(JSON.parse(line));
      } catch (e) {
        throw new JobSourceError(`dataset line ${i + 1} is not valid JSON: ${errorMessage(e)}`);
      }
    }
  } else {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new JobSourceError(`dataset is not valid JSON: ${errorMessage(e)}`);
    }
    if (!Array.isArray(parsed)) throw new JobSourceError("dataset must be a JSON array of jobs");
    rows = parsed;
  }

  return rows.map((row, idx) => {
    if (!validateJobRecord(row)) {
      throw new JobSourceError(`dataset record ${idx} is invalid: ${formatAjvErrors(validateJobRecord.errors)}`);
    }
    return toJob(row);
  });
}

export async function loadJobs(opts: { dataset: string | null; testMode: boolean }): Promise<LoadedJobs> {
  if (opts.testMode) {
    const jobs = TEST_JOBS.map((j) => ({ ...j }));
    return { jobs, total: jobs.length, imageJobs: 0 };
  }
  if (!opts.dataset) throw new JobSourceError("No dataset given. Pass --dataset <path> or --testMode.");

  let raw: string;
  try {
    raw = await readFile(opts.dataset, "utf-8");
  } catch (e) {
    throw new JobSourceError(`Cannot read dataset ${opts.dataset}: ${errorMessage(e)}`, { cause: e });
  }

  const all = parseDataset(raw, opts.dataset.endsWith(".jsonl") ? "jsonl" : "json");
  const jobs = all.filter((j) => !needsImage(j));
  return { jobs, total: all.length, imageJobs: all.length - jobs.length };
}
