import { randomUUID } from "node:crypto";
import {
  ContractCallError,
  ContractInterfaceError,
  TimeoutError,
  checkValue,
  encodeCall,
  errorMessage,
  resolveParams,
  toCallArgs,
  toParamValue,
  validateParams,
  withTimeout,
  type AgentSnapshot,
  type ContractCaller,
  type ContractStateReader,
  type ContractStateSnapshot,
  type Decision,
  type DecisionOracle
} from "@cadence/agent-core";
import type {
  Agent,
  AgentFunction,
  ExecutionErrorKind,
  ExecutionRecord,
  ExecutionSource,
  LogLevel,
  ParamValue
} from "@cadence/types";
import { ExecutionFailure } from "../errors.js";
import type { Logger } from "../logger.js";
import type { AgentPersistence } from "../state/persistence.js";

export type ExecutionLogSink = (level: LogLevel, message: string) => void;

export interface ExecutionPipelineContract {
  execute(agent: Agent, source: ExecutionSource, log?: ExecutionLogSink): Promise<ExecutionRecord>;
}

export interface ExecutionPipelineOptions {
  oracle: DecisionOracle;
  caller: ContractCaller;
  stateReader?: ContractStateReader;
  persistence: Pick<AgentPersistence, "appendExecutionRecord">;
  timeoutMs: number;
  logger: Logger;
  now?: () => Date;
}

interface CallOutcome {
  functionName: string;
  params: Record<string, ParamValue>;
  callId: string | null;
  value?: unknown;
}

function failure(kind: ExecutionErrorKind, message: string, context: Partial<CallOutcome> = {}): ExecutionFailure {
  return new ExecutionFailure(message, { kind, ...context });
}

function failureKind(error: ExecutionFailure): ExecutionErrorKind {
  const kind = error.details?.kind;
  switch (kind) {
    case "validation":
    case "decision":
    case "transport":
    case "revert":
    case "interface":
    case "timeout":
      return kind;
    default:
      return "transport";
  }
}

function defaultsOf(fn: AgentFunction): Record<string, ParamValue> {
  const defaults: Record<string, ParamValue> = {};
  for (const param of fn.params) {
    const value = fn.validationRules[param.name]?.default;
    if (value !== undefined) defaults[param.name] = value;
  }
  return defaults;
}

function findFunction(agent: Agent, name: string): AgentFunction | undefined {
  return agent.functions.find((fn) => fn.enabled && (fn.name === name || fn.signature === name));
}

/**
 * One decide-validate-call cycle for a single agent. Every failure is folded
 * into the returned ExecutionRecord; nothing thrown here reaches the scheduler.
 */
export class ExecutionPipeline implements ExecutionPipelineContract {
  private readonly now: () => Date;

  constructor(private readonly options: ExecutionPipelineOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async execute(agent: Agent, source: ExecutionSource, log: ExecutionLogSink = () => undefined): Promise<ExecutionRecord> {
    const startedAt = this.now().toISOString();
    let record: ExecutionRecord;

    try {
      const outcome = await this.attempt(agent, log);
      record = outcome
        ? {
            id: randomUUID(),
            agentId: agent.id,
            functionName: outcome.functionName,
            params: outcome.params,
            outcome: "success",
            error: null,
            callId: outcome.callId,
            value: outcome.value,
            source,
            startedAt,
            finishedAt: this.now().toISOString()
          }
        : {
            id: randomUUID(),
            agentId: agent.id,
            functionName: null,
            params: {},
            outcome: "skipped",
            error: null,
            callId: null,
            source,
            startedAt,
            finishedAt: this.now().toISOString()
          };
    } catch (error) {
      const failed = this.toFailure(error);
      const details = failed.details ?? {};
      const kind = failureKind(failed);
      log(kind === "validation" ? "warn" : "error", `execution failed (${kind}): ${failed.message}`);
      record = {
        id: randomUUID(),
        agentId: agent.id,
        functionName: typeof details.functionName === "string" ? details.functionName : null,
        params: this.paramsFrom(details.params),
        outcome: "failure",
        error: failed.message,
        errorKind: kind,
        callId: null,
        source,
        startedAt,
        finishedAt: this.now().toISOString()
      };
    }

    await this.persist(record, log);
    return record;
  }

  private async attempt(agent: Agent, log: ExecutionLogSink): Promise<CallOutcome | null> {
    const enabled = agent.functions.filter((fn) => fn.enabled);
    const state = await this.readState(agent);
    for (const [name, reason] of Object.entries(state.unavailable)) {
      log("debug", `state ${name} unavailable: ${reason}`);
    }

    const snapshot: AgentSnapshot = {
      agentId: agent.id,
      name: agent.name,
      description: agent.description,
      contractAddress: agent.contractAddress,
      functions: enabled.map((fn) => ({
        name: fn.name,
        signature: fn.signature,
        direction: fn.direction,
        params: fn.params,
        defaults: defaultsOf(fn)
      })),
      state: state.values,
      lastExecutionAt: agent.lastExecutionAt
    };

    const decision = await this.decide(snapshot);
    if (decision.action === "none") {
      log("info", `no action: ${decision.reason}`);
      return null;
    }

    const fn = findFunction(agent, decision.functionName);
    if (!fn) {
      throw failure("validation", `function ${decision.functionName} is not enabled for this agent`, {
        functionName: decision.functionName,
        params: decision.params
      });
    }

    const params = resolveParams(fn, decision.params);
    const violation = validateParams(fn, params);
    if (violation) {
      throw failure("validation", violation.message, { functionName: fn.name, params });
    }

    const args = toCallArgs(fn, params);
    try {
      encodeCall(fn.abi, args);
    } catch (error) {
      throw failure("validation", errorMessage(error), { functionName: fn.name, params });
    }

    log("info", `calling ${fn.signature}${decision.reason ? ` (${decision.reason})` : ""}`);
    const result = await this.guard({ functionName: fn.name, params }, () =>
      withTimeout(
        () =>
          this.options.caller.call({
            contractAddress: agent.contractAddress,
            abi: fn.abi,
            signature: fn.signature,
            args,
            direction: fn.direction,
            overrides: {
              gasLimit: agent.gasLimit,
              maxPriorityFeeGwei: agent.maxPriorityFeeGwei
            }
          }),
        this.options.timeoutMs
      )
    );

    if (result.kind === "pending") {
      log("info", `${fn.name} submitted as ${result.callId}`);
      return { functionName: fn.name, params, callId: result.callId };
    }

    if (fn.returnRules) {
      const returned = checkValue("return value", fn.returnRules, toParamValue(result.value));
      if (returned) {
        throw failure("validation", returned.message, { functionName: fn.name, params });
      }
    }
    log("info", `${fn.name} returned ${JSON.stringify(result.value)}`);
    return { functionName: fn.name, params, callId: null, value: result.value };
  }

  private async readState(agent: Agent): Promise<ContractStateSnapshot> {
    const reader = this.options.stateReader;
    if (!reader) return { values: {}, unavailable: {} };
    return this.guard({}, () => withTimeout((signal) => reader.read(agent, signal), this.options.timeoutMs));
  }

  private async decide(snapshot: AgentSnapshot): Promise<Decision> {
    try {
      return await withTimeout((signal) => this.options.oracle.decide(snapshot, signal), this.options.timeoutMs);
    } catch (error) {
      if (error instanceof TimeoutError) throw failure("timeout", "timeout");
      throw failure("decision", `decision failed: ${errorMessage(error)}`);
    }
  }

  private async guard<T>(context: Partial<CallOutcome>, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof TimeoutError) throw failure("timeout", "timeout", context);
      if (error instanceof ContractCallError) throw failure(error.kind, error.message, context);
      if (error instanceof ContractInterfaceError) throw failure("interface", error.message, context);
      throw failure("transport", errorMessage(error), context);
    }
  }

  private toFailure(error: unknown): ExecutionFailure {
    if (error instanceof ExecutionFailure) return error;
    return failure("transport", errorMessage(error));
  }

  private paramsFrom(value: unknown): Record<string, ParamValue> {
    if (!value || typeof value !== "object") return {};
    const params: Record<string, ParamValue> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry === "string" || typeof entry === "number" || typeof entry === "boolean") {
        params[key] = entry;
      }
    }
    return params;
  }

  private async persist(record: ExecutionRecord, log: ExecutionLogSink): Promise<void> {
    try {
      await this.options.persistence.appendExecutionRecord(record);
    } catch (error) {
      this.options.logger.error({ err: error, agentId: record.agentId, recordId: record.id }, "failed to persist execution record");
      log("error", `failed to persist execution record: ${errorMessage(error)}`);
    }
  }
}
