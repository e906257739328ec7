import { describe, it, expect, vi } from "vitest";
import { ReadableStream } from "node:stream/web";
import { TextEncoder } from "node:util";
import type { Job } from "shared-types";
import { TransportError } from "./errors";
import {
  buildRequest,
  completionsUrl,
  normalizeBaseUrl,
  snippetFromBytes,
  streamCompletion,
  type ClientConfig,
  type FetchLike,
} from "./inference";

const job: Job = { id: "q1", question: "What is 6 x 7?", answer_type: "exact_match" };

const cfg: ClientConfig = {
  model: "test-model",
  temperature: 0.6,
  httpUrl: "http://localhost:8000/v1/",
  timeoutMs: 1000,
  bodySnippetBytes: 8,
};

function mkLog() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function sse(...deltas: Array<Record<string, unknown>>): string {
  return deltas.map((d) => `data: ${JSON.stringify({ choices: [{ index: 0, delta: d }] })}\n\n`).join("") + "data: [DONE]\n\n";
}

function abortError(): Error {
  const e = new Error("This operation was aborted");
  e.name = "AbortError";
  return e;
}

describe("url helpers", () => {
  it("normalizeBaseUrl trims trailing slash", () => {
    expect(normalizeBaseUrl("http://localhost:8000/v1/")).toBe("http://localhost:8000/v1");
    expect(normalizeBaseUrl("http://localhost:8000/v1")).toBe("http://localhost:8000/v1");
  });

  it("completionsUrl appends the chat path", () => {
    expect(completionsUrl("http://localhost:8000/v1/")).toBe("http://localhost:8000/v1/chat/completions");
  });
});

describe("buildRequest", () => {
  it("sends model, temperature and stream verbatim", () => {
    const req = buildRequest(job, cfg);
    expect(req.model).toBe("test-model");
    expect(req.temperature).toBe(0.6);
    expect(req.stream).toBe(true);
    expect(req.messages).toHaveLength(1);
  });
});

describe("snippetFromBytes", () => {
  it("cuts at the byte limit", () => {
    expect(snippetFromBytes(new TextEncoder().encode("abcdef"), 3)).toBe("abc");
    expect(snippetFromBytes(new TextEncoder().encode("abc"), 0)).toBe("");
  });
});

describe("streamCompletion", () => {
  it("posts to the completions url and accumulates the stream", async () => {
    const fetchMock = vi.fn(
      async (_url: string, _init: RequestInit) =>
        new Response(sse({ reasoning_content: "6*7" }, { content: "Exact Answer: " }, { content: "42" }), { status: 200 })
    );

    const state = await streamCompletion(job, cfg, { fetch: fetchMock, log: mkLog() });
    expect(state).toEqual({ content: "Exact Answer: 42", reasoning: "6*7", done: true });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://localhost:8000/v1/chat/completions");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toMatchObject({ model: "test-model", temperature: 0.6, stream: true });
  });

  it("turns a non-2xx status into an http_error with a body snippet", async () => {
    const fetchMock: FetchLike = async () =>
      new Response("upstream exploded badly", { status: 503, statusText: "Service Unavailable" });

    const err = await streamCompletion(job, cfg, { fetch: fetchMock, log: mkLog() }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({
      failureClass: "http_error",
      status: 503,
      statusText: "Service Unavailable",
      bodySnippet: "upstream",
      message: "HTTP 503 Service Unavailable",
    });
  });

  it("classifies a refused connection as network_error", async () => {
    const fetchMock: FetchLike = async () => {
      throw new TypeError("fetch failed");
    };
    await expect(streamCompletion(job, cfg, { fetch: fetchMock, log: mkLog() })).rejects.toMatchObject({
      name: "TransportError",
      failureClass: "network_error",
      message: "fetch failed",
    });
  });

  it("times out while waiting for headers", async () => {
    const fetchMock: FetchLike = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init.signal?.addEventListener("abort", () => reject(abortError()));
      });

    await expect(
      streamCompletion(job, { ...cfg, timeoutMs: 20 }, { fetch: fetchMock, log: mkLog() })
    ).rejects.toMatchObject({ failureClass: "timeout", message: "no response headers within 20 ms" });
  });

  it("times out when the body goes idle", async () => {
    const fetchMock: FetchLike = async (_url, init) => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode(`data: ${JSON.stringify({ choices: [{ delta: { content: "half" } }] })}\n`));
          init.signal?.addEventListener("abort", () => controller.error(abortError()));
        },
      });
      return new Response(body, { status: 200 });
    };

    await expect(
      streamCompletion(job, { ...cfg, timeoutMs: 30 }, { fetch: fetchMock, log: mkLog() })
    ).rejects.toMatchObject({ failureClass: "timeout", message: "stream idle for more than 30 ms" });
  });

  it("lets a stream that keeps producing run past the timeout", async () => {
    const pieces = ["Ex", "act", " An", "swer", ": ", "4", "2", ""];
    const fetchMock: FetchLike = async (_url, init) => {
      const enc = new TextEncoder();
      let i = 0;
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          const tick = setInterval(() => {
            const p = pieces[i];
            i += 1;
            if (p === undefined) {
              clearInterval(tick);
              controller.enqueue(enc.encode("data: [DONE]\n\n"));
              controller.close();
              return;
            }
            controller.enqueue(enc.encode(`data: ${JSON.stringify({ choices: [{ delta: { content: p } }] })}\n\n`));
          }, 15);
          init.signal?.addEventListener("abort", () => {
            clearInterval(tick);
            controller.error(abortError());
          });
        },
      });
      return new Response(body, { status: 200 });
    };

    const started = Date.now();
    const state = await streamCompletion(job, { ...cfg, timeoutMs: 60 }, { fetch: fetchMock, log: mkLog() });
    expect(state.content).toBe("Exact Answer: 42");
    expect(Date.now() - started).toBeGreaterThan(60);
  });

  it("logs and skips a malformed chunk without failing", async () => {
    const log = mkLog();
    const body = `data: {"choices":[{"delta":{"content":"Answer: A"}}]}\n\ndata: {broken\n\ndata: [DONE]\n\n`;
    const fetchMock: FetchLike = async () => new Response(body, { status: 200 });

    const state = await streamCompletion(job, cfg, { fetch: fetchMock, log });
    expect(state.content).toBe("Answer: A");
    expect(log.warn).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledWith(expect.stringContaining("[q1] Could not parse chunk: data: {broken"));
  });
});
