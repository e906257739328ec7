// apps/runner/src/schemas.ts
//
// JSON schemas for what crosses the process boundary: dataset records coming in,
// persisted results coming back off disk.

import Ajv, { type ErrorObject } from "ajv";
import type { Job, JobResult } from "shared-types";

export const jobSchema = {
  type: "object",
  required: ["id", "question", "answer_type"],
  properties: {
    id: { type: "string", minLength: 1 },
    question: { type: "string" },
    answer_type: { type: "string" },
    image: { type: ["string", "null"] },
  },
} as const;

export const resultSchema = {
  type: "object",
  required: ["id", "question", "reasoning", "raw_response", "parsed"],
  properties: {
    id: { type: "string" },
    question: { type: "string" },
    reasoning: { type: "string" },
    raw_response: { type: "string" },
    parsed: {
      type: "object",
      required: ["explanation", "answer", "confidence"],
      properties: {
        explanation: { type: "string" },
        answer: { type: "string" },
        confidence: { type: ["integer", "null"] },
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });

/** Dataset rows may carry `image: null`; normalized away by the job source. */
export type JobRecord = Omit<Job, "image"> & { image?: string | null };

export const validateJobRecord = ajv.compile<JobRecord>(jobSchema);
export const validateResult = ajv.compile<JobResult>(resultSchema);

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return "unknown schema error";
  return errors.map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`).join("; ");
}
