import type { RunLimits } from "../config";
import type { TraceResult } from "../trace/types";

export type RunRequest = { type: "run"; code: string; maxSteps: number };
export type RunReply = { type: "result"; result: TraceResult };

export type RunnerOptions = Partial<RunLimits> & {
  // child entry script; tests point this at a fixture
  entry?: string;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

export function isRunRequest(msg: unknown): msg is RunRequest {
  return (
    isRecord(msg) &&
    msg.type === "run" &&
    typeof msg.code === "string" &&
    typeof msg.maxSteps === "number" &&
    Number.isInteger(msg.maxSteps) &&
    msg.maxSteps > 0
  );
}

export function isRunReply(msg: unknown): msg is RunReply {
  if (!isRecord(msg) || msg.type !== "result" || !isRecord(msg.result)) return false;
  const r = msg.result;
  return (
    typeof r.stdout === "string" &&
    Array.isArray(r.trace) &&
    (r.error === null || typeof r.error === "string") &&
    typeof r.truncated === "boolean" &&
    typeof r.timedOut === "boolean"
  );
}
