// apps/runner/src/log.ts
//
// Progress goes to stdout, chunk diagnostics and failures to stderr. Tests pass a
// capturing object instead of the console.

export type RunnerLog = Pick<Console, "log" | "warn" | "error">;

export const consoleLog: RunnerLog = console;
