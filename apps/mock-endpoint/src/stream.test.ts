import { afterAll, beforeAll, describe, it, expect } from "vitest";
import type { AddressInfo } from "node:net";
import type { Server } from "node:http";
import { createApp } from "./app";
import {
  DONE_FRAME,
  MALFORMED_FRAME,
  answerFor,
  buildCompletionChunks,
  detectScenario,
  lastUserMessage,
  renderFrames,
  splitIntoPieces,
} from "./stream";

/** Joins delta fields the way a client reading the stream would. */
function collect(frames: string[]): { content: string; reasoning: string; done: boolean; bad: number } {
  const out = { content: "", reasoning: "", done: false, bad: 0 };
  for (const frame of frames) {
    const payload = frame.replace(/^data: /, "").trim();
    if (payload === "[DONE]") {
      out.done = true;
      break;
    }
    try {
      const chunk = JSON.parse(payload);
      out.content += chunk.choices?.[0]?.delta?.content ?? "";
      out.reasoning += chunk.choices?.[0]?.delta?.reasoning_content ?? "";
    } catch {
      out.bad += 1;
    }
  }
  return out;
}

describe("detectScenario", () => {
  it("reads markers from user messages only", () => {
    expect(detectScenario([{ role: "user", content: "please mock:slow" }])).toBe("slow");
    expect(detectScenario([{ role: "system", content: "mock:http_500" }])).toBe("ok");
    expect(detectScenario([{ role: "user", content: "plain question" }])).toBe("ok");
  });

  it("picks the first listed marker when several are present", () => {
    expect(detectScenario([{ role: "user", content: "mock:no_done mock:http_500" }])).toBe("http_500");
  });
});

describe("lastUserMessage", () => {
  it("returns the latest user turn", () => {
    expect(
      lastUserMessage([
        { role: "user", content: "first" },
        { role: "assistant", content: "reply" },
        { role: "user", content: "second" },
      ])
    ).toBe("second");
    expect(lastUserMessage([])).toBe("");
  });
});

describe("splitIntoPieces", () => {
  it("keeps the remainder as the last piece", () => {
    expect(splitIntoPieces("abcdefg", 3)).toEqual(["abc", "def", "g"]);
    expect(splitIntoPieces("", 3)).toEqual([]);
  });

  it("rejects a size below 1", () => {
    expect(() => splitIntoPieces("abc", 0)).toThrow(RangeError);
  });
});

describe("renderFrames", () => {
  const answer = answerFor("What is 6 x 7?");
  const chunks = buildCompletionChunks("m", answer, 5);

  it("spells a labelled answer that survives the round trip", () => {
    const got = collect(renderFrames(chunks, "ok"));
    expect(got).toEqual({
      content: "Explanation: The mock endpoint counts the words of the question.\nExact Answer: 5\nConfidence: 100%",
      reasoning: 'The question starts with "What is 6 x 7?". It has 5 words.',
      done: true,
      bad: 0,
    });
  });

  it("ends with [DONE] except for no_done", () => {
    expect(renderFrames(chunks, "ok").at(-1)).toBe(DONE_FRAME);
    expect(renderFrames(chunks, "slow").at(-1)).toBe(DONE_FRAME);
    expect(renderFrames(chunks, "no_done")).not.toContain(DONE_FRAME);
    expect(renderFrames(chunks, "no_done")).toHaveLength(chunks.length);
  });

  it("inserts one malformed frame without changing the buffers", () => {
    const frames = renderFrames(chunks, "malformed_chunk");
    expect(frames.filter((f) => f === MALFORMED_FRAME)).toHaveLength(1);
    const got = collect(frames);
    expect(got.bad).toBe(1);
    expect(got.content).toBe(collect(renderFrames(chunks, "ok")).content);
  });

  it("has nothing to stream for http_500", () => {
    expect(renderFrames(chunks, "http_500")).toEqual([]);
  });
});

describe("mock app", () => {
  let server: Server;
  let base: string;

  beforeAll(async () => {
    server = createApp({ slowFrameMs: 1 }).listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const addr: AddressInfo | string | null = server.address();
    base = typeof addr === "object" && addr ? `http://127.0.0.1:${addr.port}` : "";
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  const post = (body: unknown) =>
    fetch(`${base}/v1/chat/completions`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

  it("answers /health", async () => {
    const res = await fetch(`${base}/health`);
    expect(await res.json()).toEqual({ ok: true });
  });

  it("streams SSE for stream: true", async () => {
    const res = await post({ model: "m", stream: true, messages: [{ role: "user", content: "What is 6 x 7?" }] });
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("text/event-stream");
    const frames = (await res.text()).split(/(?<=\n\n)/);
    const got = collect(frames);
    expect(got.done).toBe(true);
    expect(got.content).toContain("Exact Answer: 5");
  });

  it("rejects non-stream requests", async () => {
    const res = await post({ model: "m", messages: [{ role: "user", content: "hi" }] });
    expect(res.status).toBe(400);
  });

  it("fails on the http_500 marker", async () => {
    const res = await post({ model: "m", stream: true, messages: [{ role: "user", content: "mock:http_500" }] });
    expect(res.status).toBe(500);
    expect(await res.text()).toBe("mock-endpoint forced 500\n");
  });
});
