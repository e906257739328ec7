// packages/shared-types/src/index.ts
//
// Canonical contract types shared across runner and mock-endpoint.
// NO runtime logic, only types.

/* ------------------------------------------------------------------ */
/*  Jobs                                                               */
/* ------------------------------------------------------------------ */

/** "exact_match" selects the exact-answer prompt; any other tag is treated as multiple choice. */
export type AnswerType = "exact_match" | "multipleChoice" | (string & {});

export type Job = {
    id: string;
    question: string;
    answer_type: AnswerType;
    /** Non-empty when the question needs image input. Used only for upstream filtering. */
    image?: string;
};

/* ------------------------------------------------------------------ */
/*  Chat completions wire format                                       */
/* ------------------------------------------------------------------ */

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = { role: ChatRole; content: string };

export type ChatCompletionRequest = {
    model: string;
    messages: ChatMessage[];
    temperature: number;
    stream: true;
};

/** One decoded server-sent chunk. Only the fields the runner reads are typed. */
export type ChatCompletionChunk = {
    id?: string;
    object?: string;
    model?: string;
    choices?: {
        index?: number;
        delta?: {
            role?: ChatRole;
            content?: string | null;
            /** Emitted by reasoning-enabled servers (e.g. vLLM with a reasoning parser). */
            reasoning_content?: string | null;
        };
        finish_reason?: string | null;
    }[];
};

/* ------------------------------------------------------------------ */
/*  Stream + parse                                                     */
/* ------------------------------------------------------------------ */

export type StreamState = {
    content: string;
    reasoning: string;
    done: boolean;
};

export type ParsedAnswer = {
    explanation: string;
    answer: string;
    /** null when no "Confidence: N%" was found. 0 is a real value. */
    confidence: number | null;
};

/* ------------------------------------------------------------------ */
/*  Persisted artifacts                                                */
/* ------------------------------------------------------------------ */

export type JobResult = {
    id: string;
    question: string;
    reasoning: string;
    raw_response: string;
    parsed: ParsedAnswer;
};

export type FailureClass = "http_error" | "timeout" | "network_error" | "persistence_error" | "unknown";

export type FailureArtifact = {
    type: "runner_job_failure";
    class: FailureClass;
    id: string;
    url: string;
    timeout_ms: number;
    latency_ms: number;

    status?: number;
    status_text?: string;

    error_name?: string;
    error_message?: string;

    body_snippet?: string;

    failed_at: number;
};

export type RunSummary = {
    run_id: string;
    model: string;
    http_url: string;
    temperature: number;
    num_workers: number;

    total_jobs: number;
    skipped: number;
    pending: number;
    succeeded: number;
    failed: number;
    failed_ids: string[];

    started_at: number;
    ended_at: number;
};
