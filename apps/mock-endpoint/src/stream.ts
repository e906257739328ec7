// apps/mock-endpoint/src/stream.ts
import type { ChatCompletionChunk, ChatMessage } from "shared-types";

export type Scenario = "ok" | "http_500" | "malformed_chunk" | "slow" | "no_done";

const MARKERS: Array<[string, Scenario]> = [
  ["mock:http_500", "http_500"],
  ["mock:malformed_chunk", "malformed_chunk"],
  ["mock:slow", "slow"],
  ["mock:no_done", "no_done"],
];

export const MALFORMED_FRAME = "data: {not json\n\n";
export const DONE_FRAME = "data: [DONE]\n\n";

/** First marker found in the user messages wins. */
export function detectScenario(messages: ChatMessage[]): Scenario {
  const text = messages
    .filter((m) => m.role === "user")
    .map((m) => m.content)
    .join("\n");
  for (const [marker, scenario] of MARKERS) {
    if (text.includes(marker)) return scenario;
  }
  return "ok";
}

export function lastUserMessage(messages: ChatMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const m = messages[i];
    if (m && m.role === "user") return m.content;
  }
  return "";
}

export function answerFor(question: string): { reasoning: string; content: string } {
  const words = question.split(/\s+/).filter((w) => w.length > 0);
  const head = words.slice(0, 8).join(" ");
  return {
    reasoning: `The question starts with "${head}". It has ${words.length} words.`,
    content: [
      `Explanation: The mock endpoint counts the words of the question.`,
      `Exact Answer: ${words.length}`,
      `Confidence: 100%`,
    ].join("\n"),
  };
}

export function splitIntoPieces(text: string, size: number): string[] {
  if (size < 1) throw new RangeError(`piece size must be >= 1 (got ${size})`);
  const out: string[] = [];
  for (let i = 0; i < text.length; i += size) out.push(text.slice(i, i + size));
  return out;
}

/**
 * Reasoning deltas first, then content deltas, then a closing chunk with finish_reason "stop".
 */
export function buildCompletionChunks(
  model: string,
  answer: { reasoning: string; content: string },
  pieceSize = 16
): ChatCompletionChunk[] {
  const id = "chatcmpl-mock";
  const mk = (delta: NonNullable<ChatCompletionChunk["choices"]>[number]): ChatCompletionChunk => ({
    id,
    object: "chat.completion.chunk",
    model,
    choices: [delta],
  });

  return [
    mk({ index: 0, delta: { role: "assistant", content: "" } }),
    ...splitIntoPieces(answer.reasoning, pieceSize).map((p) => mk({ index: 0, delta: { reasoning_content: p } })),
    ...splitIntoPieces(answer.content, pieceSize).map((p) => mk({ index: 0, delta: { content: p } })),
    mk({ index: 0, delta: {}, finish_reason: "stop" }),
  ];
}

export function sseFrame(chunk: ChatCompletionChunk): string {
  return `data: ${JSON.stringify(chunk)}\n\n`;
}

/**
 * Frames as they go on the wire for a scenario. `http_500` never streams, so it has none.
 */
export function renderFrames(chunks: ChatCompletionChunk[], scenario: Scenario): string[] {
  if (scenario === "http_500") return [];

  const frames = chunks.map(sseFrame);
  if (scenario === "malformed_chunk") {
    frames.splice(Math.floor(frames.length / 2), 0, MALFORMED_FRAME);
  }
  if (scenario !== "no_done") frames.push(DONE_FRAME);
  return frames;
}
