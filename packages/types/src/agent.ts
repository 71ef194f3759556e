export type AgentStatus = "created" | "configured" | "running" | "stopped" | "error";
export type AgentScope = "persistent" | "connection";
export type FunctionDirection = "read" | "write";

export type ParamValue = string | number | boolean;

export interface ParamRule {
  required?: boolean;
  min?: string | number;
  max?: string | number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  oneOf?: ParamValue[];
  default?: ParamValue;
}

export type ValidationRules = Record<string, ParamRule>;

export interface FunctionParam {
  name: string;
  type: string;
}

export interface AgentFunction {
  id: string;
  agentId: string;
  name: string;
  signature: string;
  direction: FunctionDirection;
  enabled: boolean;
  params: FunctionParam[];
  validationRules: ValidationRules;
  returnRules?: ParamRule;
  abi: Record<string, unknown>;
  createdAt: string;
}

export type Schedule =
  | { kind: "interval"; intervalSeconds: number }
  | { kind: "cron"; expression: string; active: boolean };

export type ContractInterface = Array<string | Record<string, unknown>>;

export interface Agent {
  id: string;
  name: string;
  description: string;
  owner: string;
  contractAddress: string;
  contractInterface: ContractInterface;
  gasLimit?: string;
  maxPriorityFeeGwei?: string;
  scope: AgentScope;
  status: AgentStatus;
  functions: AgentFunction[];
  schedule?: Schedule;
  lastExecutionAt?: string;
  nextDueAt?: string;
  lastError?: string;
  createdAt: string;
  updatedAt: string;
}
