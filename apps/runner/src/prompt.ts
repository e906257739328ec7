// apps/runner/src/prompt.ts
//
// Job -> chat messages. The response format block is what extract.ts parses back.

import type { ChatMessage, Job } from "shared-types";

export const PROMPT_EXACT_ANSWER = [
  "You will be given a question and a response format. Please output the answer to the question following the format.",
  "",
  "Response format:",
  "Explanation: {your explanation for your final answer}",
  "Exact Answer: {your succinct, final answer}",
  "Confidence: {your confidence score between 0% and 100% for your answer}",
  "",
  "Question:",
  "{question}",
].join("\n");

export const PROMPT_MULTIPLE_CHOICE = [
  "You will be given a question and a response format. Please output the answer to the question following the format.",
  "",
  "Response format:",
  "Explanation: {your explanation for your answer choice}",
  "Answer: {your chosen answer}",
  "Confidence: {your confidence score between 0% and 100% for your answer}",
  "",
  "Question:",
  "{question}",
].join("\n");

export function templateFor(job: Pick<Job, "answer_type">): string {
  return job.answer_type === "exact_match" ? PROMPT_EXACT_ANSWER : PROMPT_MULTIPLE_CHOICE;
}

export function buildMessages(job: Job): ChatMessage[] {
  // Function replacer: a "$&" or "$1" inside the question stays literal.
  const content = templateFor(job).replace("{question}", () => job.question);
  return [{ role: "user", content }];
}
