// apps/runner/src/streamParser.ts
//
// Server-sent chat-completion stream parsing, in two layers.
//
// readLines turns the response body into text lines. Decoding is incremental, so a line
// or a multi-byte character may straddle network chunks.
//
// consumeStream applies each `data: {json}` line to a StreamState in wire order. A line
// that does not decode is logged and dropped; the rest of the stream still counts.
// `[DONE]` (bare or after `data:`) and the stream closing both end the response.

import { TextDecoder } from "node:util";
import type { ReadableStream } from "node:stream/web";
import type { StreamState } from "shared-types";
import { consoleLog, type RunnerLog } from "./log";

export const DONE_MARKER = "[DONE]";
export const DATA_PREFIX = "data:";

export type StreamLine =
  | { kind: "skip" }
  | { kind: "done" }
  | { kind: "chunk"; payload: string };

export function createStreamState(): StreamState {
  return { content: "", reasoning: "", done: false };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function stripCr(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

export function classifyLine(raw: string): StreamLine {
  const trimmed = raw.trim();
  if (!trimmed) return { kind: "skip" };
  if (trimmed === DONE_MARKER) return { kind: "done" };

  let payload = trimmed;
  if (payload.startsWith(DATA_PREFIX)) payload = payload.slice(DATA_PREFIX.length).trim();
  if (payload === DONE_MARKER) return { kind: "done" };
  if (!payload) return { kind: "skip" };

  return { kind: "chunk", payload };
}

/** Appends the first choice's delta to the buffers. Anything else in the chunk is ignored. */
export function applyChunk(state: StreamState, chunk: unknown): void {
  if (!isRecord(chunk) || !Array.isArray(chunk.choices)) return;
  const first: unknown = chunk.choices[0];
  if (!isRecord(first) || !isRecord(first.delta)) return;

  const { content, reasoning_content } = first.delta;
  if (typeof content === "string") state.content += content;
  if (typeof reasoning_content === "string") state.reasoning += reasoning_content;
}

export type ReadLinesOptions = {
  /** Called after every network chunk, before its lines are yielded. */
  onChunk?: () => void;
};

export async function* readLines(body: ReadableStream<Uint8Array>, opts: ReadLinesOptions = {}): AsyncGenerator<string> {
  const reader = body.getReader();
  const dec = new TextDecoder("utf-8", { fatal: false });
  let buf = "";
  let drained = false;

  try {
    for (;;) {
      const { value, done } = await reader.read();
      if (done) break;
      opts.onChunk?.();
      if (!value) continue;

      buf += dec.decode(value, { stream: true });
      let start = 0;
      let nl = buf.indexOf("\n", start);
      while (nl !== -1) {
        yield stripCr(buf.slice(start, nl));
        start = nl + 1;
        nl = buf.indexOf("\n", start);
      }
      buf = buf.slice(start);
    }

    buf += dec.decode();
    if (buf.length) yield stripCr(buf);
    drained = true;
  } finally {
    // Consumer stopped early (e.g. at [DONE]) or the read failed: close the connection.
    if (!drained) {
      try {
        await reader.cancel();
      } catch {
        // ignore
      }
    }
    reader.releaseLock();
  }
}

export async function consumeStream(
  lines: AsyncIterable<string>,
  opts: { jobId: string; log?: RunnerLog }
): Promise<StreamState> {
  const log = opts.log ?? consoleLog;
  const state = createStreamState();

  for await (const raw of lines) {
    const line = classifyLine(raw);
    if (line.kind === "skip") continue;
    if (line.kind === "done") break;

    let chunk: unknown;
    try {
      chunk = JSON.parse(line.payload);
    } catch (e) {
      log.warn(`[${opts.jobId}] Could not parse chunk: ${raw}\nError: ${e instanceof Error ? e.message : String(e)}`);
      continue;
    }
    applyChunk(state, chunk);
  }

  state.done = true;
  return state;
}
