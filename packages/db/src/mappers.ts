import type {
  Agent,
  AgentFunction,
  AgentScope,
  AgentStatus,
  ExecutionErrorKind,
  ExecutionOutcome,
  ExecutionRecord,
  ExecutionSource,
  Schedule
} from "@cadence/types";
import type { agentFunctions, agentSchedules, agents, executionRecords } from "./schema.js";

const AGENT_STATUSES: readonly AgentStatus[] = ["created", "configured", "running", "stopped", "error"];
const OUTCOMES: readonly ExecutionOutcome[] = ["success", "failure", "skipped"];
const ERROR_KINDS: readonly ExecutionErrorKind[] = [
  "validation",
  "decision",
  "transport",
  "revert",
  "interface",
  "timeout"
];

function pick<T extends string>(allowed: readonly T[], value: string | null, fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

export function toAgentFunction(row: typeof agentFunctions.$inferSelect): AgentFunction {
  return {
    id: row.id,
    agentId: row.agentId,
    name: row.name,
    signature: row.signature,
    direction: row.direction === "write" ? "write" : "read",
    enabled: row.enabled,
    params: row.params,
    validationRules: row.validationRules,
    returnRules: row.returnRules ?? undefined,
    abi: row.abi,
    createdAt: row.createdAt.toISOString()
  };
}

export function toSchedule(row: typeof agentSchedules.$inferSelect): Schedule | undefined {
  if (row.kind === "interval" && row.intervalSeconds !== null) {
    return { kind: "interval", intervalSeconds: row.intervalSeconds };
  }
  if (row.kind === "cron" && row.cronExpression !== null) {
    return { kind: "cron", expression: row.cronExpression, active: row.isActive };
  }
  return undefined;
}

export function toAgent(
  row: typeof agents.$inferSelect,
  functions: Array<typeof agentFunctions.$inferSelect>,
  schedule: typeof agentSchedules.$inferSelect | undefined
): Agent {
  const scope: AgentScope = row.scope === "connection" ? "connection" : "persistent";
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    owner: row.owner,
    contractAddress: row.contractAddress,
    contractInterface: row.contractInterface,
    gasLimit: row.gasLimit ?? undefined,
    maxPriorityFeeGwei: row.maxPriorityFeeGwei ?? undefined,
    scope,
    status: pick(AGENT_STATUSES, row.status, "stopped"),
    functions: [...functions].sort((a, b) => a.position - b.position).map(toAgentFunction),
    schedule: schedule ? toSchedule(schedule) : undefined,
    lastExecutionAt: row.lastExecutionAt?.toISOString(),
    lastError: row.lastError ?? undefined,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString()
  };
}

export function toExecutionRecord(row: typeof executionRecords.$inferSelect): ExecutionRecord {
  const source: ExecutionSource = row.source === "manual" ? "manual" : "scheduler";
  return {
    id: row.id,
    agentId: row.agentId,
    functionName: row.functionName,
    params: row.params,
    outcome: pick(OUTCOMES, row.outcome, "failure"),
    error: row.error,
    errorKind: row.errorKind === null ? undefined : pick(ERROR_KINDS, row.errorKind, "transport"),
    callId: row.callId,
    value: row.value ?? undefined,
    source,
    startedAt: row.startedAt.toISOString(),
    finishedAt: row.finishedAt.toISOString()
  };
}
