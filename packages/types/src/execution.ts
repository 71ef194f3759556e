import type { ParamValue } from "./agent.js";

export type ExecutionOutcome = "success" | "failure" | "skipped";
export type ExecutionSource = "scheduler" | "manual";
export type ExecutionErrorKind =
  | "validation"
  | "decision"
  | "transport"
  | "revert"
  | "interface"
  | "timeout";

export interface ExecutionRecord {
  id: string;
  agentId: string;
  functionName: string | null;
  params: Record<string, ParamValue>;
  outcome: ExecutionOutcome;
  error: string | null;
  errorKind?: ExecutionErrorKind;
  callId: string | null;
  value?: unknown;
  source: ExecutionSource;
  startedAt: string;
  finishedAt: string;
}
