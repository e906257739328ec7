// apps/runner/src/resultStore.ts
//
// Result Store: one JSON file per job under the results directory.
//
//   <dir>/<id>.json               persisted JobResult
//   <dir>/_failures/<id>.json     last failure of a job that has no result yet
//   <dir>/_runs/<run_id>.json     run summaries
//
// Every write goes to a uniquely named temp file in the target directory and is then
// renamed into place, so a listed or read `<id>.json` is always complete. The set of
// completed ids is listed once in `open()`; `exists()` never touches the disk.

import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import type { FailureArtifact, JobResult, RunSummary } from "shared-types";
import { PersistenceError, StoreInitError, errorMessage } from "./errors";
import { formatAjvErrors, validateResult } from "./schemas";

const RESULT_EXT = ".json";
const FAILURES_DIR = "_failures";
const RUNS_DIR = "_runs";

/** Ids may contain "/" or other characters that are unsafe in a file name. */
export function fileNameForId(id: string): string {
  return `${encodeURIComponent(id)}${RESULT_EXT}`;
}

export function idFromFileName(name: string): string | null {
  if (!name.endsWith(RESULT_EXT)) return null;
  try {
    return decodeURIComponent(name.slice(0, -RESULT_EXT.length));
  } catch {
    // not a name this store wrote
    return null;
  }
}

async function writeJsonAtomic(target: string, value: unknown): Promise<void> {
  const payload = `${JSON.stringify(value, null, 2)}\n`;
  const tempPath = `${target}.tmp-${randomUUID()}`;

  try {
    await writeFile(tempPath, payload, "utf-8");
    await rename(tempPath, target);
  } catch (e) {
    await rm(tempPath, { force: true });
    throw e;
  }
}

export class ResultStore {
  private readonly completed: Set<string>;

  private constructor(
    public readonly dir: string,
    initial: Iterable<string>
  ) {
    this.completed = new Set(initial);
  }

  static async open(dir: string): Promise<ResultStore> {
    const abs = path.resolve(dir);
    try {
      await mkdir(abs, { recursive: true });
      const entries = await readdir(abs, { withFileTypes: true });
      const ids: string[] = [];
      for (const e of entries) {
        if (!e.isFile()) continue;
        const id = idFromFileName(e.name);
        if (id !== null) ids.push(id);
      }
      return new ResultStore(abs, ids);
    } catch (e) {
      throw new StoreInitError(`Cannot initialize results directory ${abs}: ${errorMessage(e)}`, { cause: e });
    }
  }

  /** Snapshot of the ids completed when the store was opened, plus those written since. */
  completedIds(): ReadonlySet<string> {
    return new Set(this.completed);
  }

  exists(id: string): boolean {
    return this.completed.has(id);
  }

  pathFor(id: string): string {
    return path.join(this.dir, fileNameForId(id));
  }

  async put(result: JobResult): Promise<void> {
    try {
      await writeJsonAtomic(this.pathFor(result.id), result);
    } catch (e) {
      throw new PersistenceError(`Cannot write result for ${result.id}: ${errorMessage(e)}`, { cause: e });
    }
    this.completed.add(result.id);
  }

  /** Returns null when nothing is persisted for `id`. */
  async read(id: string): Promise<JobResult | null> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(id), "utf-8");
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
      throw new PersistenceError(`Cannot read result for ${id}: ${errorMessage(e)}`, { cause: e });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new PersistenceError(`Result for ${id} is not valid JSON: ${errorMessage(e)}`, { cause: e });
    }
    if (!validateResult(parsed)) {
      throw new PersistenceError(`Result for ${id} is invalid: ${formatAjvErrors(validateResult.errors)}`);
    }
    return parsed;
  }

  async recordFailure(artifact: FailureArtifact): Promise<void> {
    const dir = path.join(this.dir, FAILURES_DIR);
    await mkdir(dir, { recursive: true });
    await writeJsonAtomic(path.join(dir, fileNameForId(artifact.id)), artifact);
  }

  async clearFailure(id: string): Promise<void> {
    await rm(path.join(this.dir, FAILURES_DIR, fileNameForId(id)), { force: true });
  }

  async writeRunSummary(summary: RunSummary): Promise<string> {
    const dir = path.join(this.dir, RUNS_DIR);
    await mkdir(dir, { recursive: true });
    const target = path.join(dir, fileNameForId(summary.run_id));
    await writeJsonAtomic(target, summary);
    return target;
  }
}
