// apps/runner/src/extract.ts
//
// Fixed-format parse of a model answer:
//
//   Explanation: ...
//   Exact Answer: ...      (or "Answer: ...")
//   Confidence: NN%
//
// Total: a missing label yields "" (or null for confidence), never an error.

import type { ParsedAnswer } from "shared-types";

const EXPLANATION_RE = /^[ \t]*Explanation:[ \t]*([^\n]*)/m;
const ANSWER_RE = /^[ \t]*(?:Exact Answer|Answer):[ \t]*([^\n]*)/m;
const CONFIDENCE_RE = /Confidence:\s*(\d+)%/;

function firstGroup(re: RegExp, text: string): string {
  const m = re.exec(text);
  return m?.[1]?.trim() ?? "";
}

export function extractAnswer(content: string): ParsedAnswer {
  const conf = CONFIDENCE_RE.exec(content)?.[1];
  return {
    explanation: firstGroup(EXPLANATION_RE, content),
    answer: firstGroup(ANSWER_RE, content),
    confidence: conf === undefined ? null : Number.parseInt(conf, 10),
  };
}
