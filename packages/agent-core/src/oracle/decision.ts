import type { FunctionDirection, FunctionParam, ParamValue } from "@cadence/types";

export interface SnapshotFunction {
  name: string;
  signature: string;
  direction: FunctionDirection;
  params: FunctionParam[];
  defaults: Record<string, ParamValue>;
}

export interface AgentSnapshot {
  agentId: string;
  name: string;
  description: string;
  contractAddress: string;
  functions: SnapshotFunction[];
  state: Record<string, unknown>;
  lastExecutionAt?: string;
}

export type Decision =
  | { action: "none"; reason: string }
  | { action: "call"; functionName: string; params: Record<string, ParamValue>; reason?: string };

export interface DecisionOracle {
  decide(snapshot: AgentSnapshot, signal?: AbortSignal): Promise<Decision>;
}
