// apps/mock-endpoint/src/app.ts
import express, { type Request, type Response } from "express";
import type { ChatMessage, ChatRole } from "shared-types";
import { answerFor, buildCompletionChunks, detectScenario, lastUserMessage, renderFrames } from "./stream";

export type MockOptions = {
  /** Delay between frames for `mock:slow`. */
  slowFrameMs: number;
  pieceSize: number;
};

const DEFAULT_OPTIONS: MockOptions = { slowFrameMs: 2000, pieceSize: 16 };

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

function isRole(v: unknown): v is ChatRole {
  return v === "system" || v === "user" || v === "assistant";
}

function safeMessages(v: unknown): ChatMessage[] | null {
  if (!Array.isArray(v)) return null;
  const out: ChatMessage[] = [];
  for (const m of v) {
    if (!m || typeof m !== "object") return null;
    const role: unknown = Reflect.get(m, "role");
    const content: unknown = Reflect.get(m, "content");
    if (!isRole(role) || typeof content !== "string") return null;
    out.push({ role, content });
  }
  return out;
}

function safeModel(v: unknown): string {
  return typeof v === "string" && v.length > 0 ? v : "mock-model";
}

export function createApp(opts: Partial<MockOptions> = {}) {
  const options: MockOptions = { ...DEFAULT_OPTIONS, ...opts };
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.post("/v1/chat/completions", async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const stream: unknown = body && typeof body === "object" ? Reflect.get(body, "stream") : undefined;
    const rawMessages: unknown = body && typeof body === "object" ? Reflect.get(body, "messages") : undefined;
    const rawModel: unknown = body && typeof body === "object" ? Reflect.get(body, "model") : undefined;

    if (stream !== true) {
      res.status(400).json({ error: "only stream: true is supported" });
      return;
    }
    const messages = safeMessages(rawMessages);
    if (!messages || messages.length === 0) {
      res.status(400).json({ error: "messages must be a non-empty array of {role, content}" });
      return;
    }

    const scenario = detectScenario(messages);
    if (scenario === "http_500") {
      res.status(500);
      res.setHeader("Content-Type", "text/plain; charset=utf-8");
      res.send("mock-endpoint forced 500\n");
      return;
    }

    const chunks = buildCompletionChunks(safeModel(rawModel), answerFor(lastUserMessage(messages)), options.pieceSize);
    const frames = renderFrames(chunks, scenario);

    res.status(200);
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    let closed = false;
    res.on("close", () => {
      closed = true;
    });

    for (const frame of frames) {
      if (closed) return;
      if (scenario === "slow") await sleep(options.slowFrameMs);
      res.write(frame);
    }
    res.end();
  });

  return app;
}
