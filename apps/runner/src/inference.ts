// apps/runner/src/inference.ts
//
// One streaming POST to <httpUrl>/chat/completions. `timeoutMs` bounds each wait on
// the wire: until the response headers, then between two body chunks. A stream that
// keeps producing may run longer than `timeoutMs` in total.

import { TextDecoder } from "node:util";
import type { ChatCompletionRequest, Job, StreamState } from "shared-types";
import { TransportError, errorMessage } from "./errors";
import type { RunnerLog } from "./log";
import { buildMessages } from "./prompt";
import { consumeStream, readLines } from "./streamParser";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type ClientConfig = {
  model: string;
  temperature: number;
  httpUrl: string;
  timeoutMs: number;
  bodySnippetBytes: number;
};

export function normalizeBaseUrl(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

export function completionsUrl(httpUrl: string): string {
  return `${normalizeBaseUrl(httpUrl)}/chat/completions`;
}

export function buildRequest(job: Job, cfg: Pick<ClientConfig, "model" | "temperature">): ChatCompletionRequest {
  return {
    model: cfg.model,
    messages: buildMessages(job),
    temperature: cfg.temperature,
    stream: true,
  };
}

export function snippetFromBytes(bytes: Uint8Array, maxBytes: number): string {
  if (maxBytes <= 0) return "";
  const cut = bytes.byteLength <= maxBytes ? bytes : bytes.slice(0, maxBytes);
  const dec = new TextDecoder("utf-8", { fatal: false });
  return dec.decode(cut);
}

export type TimeoutPhase = "headers" | "body";

function timeoutMessage(phase: TimeoutPhase, timeoutMs: number): string {
  return phase === "headers"
    ? `no response headers within ${timeoutMs} ms`
    : `stream idle for more than ${timeoutMs} ms`;
}

function toTransportError(e: unknown, timedOutIn: TimeoutPhase | null, timeoutMs: number): TransportError {
  if (e instanceof TransportError) return e;
  if (timedOutIn) return new TransportError("timeout", timeoutMessage(timedOutIn, timeoutMs), { cause: e });
  return new TransportError("network_error", errorMessage(e), { cause: e });
}

export async function streamCompletion(
  job: Job,
  cfg: ClientConfig,
  deps: { fetch: FetchLike; log: RunnerLog }
): Promise<StreamState> {
  const url = completionsUrl(cfg.httpUrl);
  const payload = JSON.stringify(buildRequest(job, cfg));

  const controller = new AbortController();
  let phase: TimeoutPhase = "headers";
  let timedOutIn: TimeoutPhase | null = null;
  let t: ReturnType<typeof setTimeout> | undefined;

  // Restarted on every body chunk.
  const arm = () => {
    clearTimeout(t);
    t = setTimeout(() => {
      timedOutIn = phase;
      controller.abort();
    }, cfg.timeoutMs);
  };

  arm();
  try {
    let res: Response;
    try {
      res = await deps.fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "text/event-stream" },
        body: payload,
        signal: controller.signal,
      });
    } catch (e) {
      throw toTransportError(e, timedOutIn, cfg.timeoutMs);
    }

    phase = "body";
    arm();

    if (!res.ok) {
      const body = await res.arrayBuffer().catch(() => null);
      const snippet = body ? snippetFromBytes(new Uint8Array(body), cfg.bodySnippetBytes) : "";
      throw new TransportError("http_error", `HTTP ${res.status} ${res.statusText}`.trim(), {
        status: res.status,
        statusText: res.statusText,
        bodySnippet: snippet,
      });
    }

    if (!res.body) throw new TransportError("network_error", "response body is null");

    try {
      return await consumeStream(readLines(res.body, { onChunk: arm }), { jobId: job.id, log: deps.log });
    } catch (e) {
      throw toTransportError(e, timedOutIn, cfg.timeoutMs);
    }
  } finally {
    clearTimeout(t);
  }
}
