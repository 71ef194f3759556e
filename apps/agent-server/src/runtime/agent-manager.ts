import { randomUUID } from "node:crypto";
import { isAddress } from "ethers";
import type { ZodError } from "zod";
import {
  ContractInterfaceError,
  directionOf,
  fragmentParams,
  fragmentToJson,
  functionFromJson,
  hasConstraintOrDefault,
  paramRuleSchema,
  parseContractInterface,
  resolveFunction,
  validationRulesSchema
} from "@cadence/agent-core";
import type {
  Agent,
  AgentFunction,
  AgentScope,
  AgentStatus,
  ContractInterface,
  ExecutionRecord,
  ExecutionSource,
  FunctionDirection,
  LogLevel,
  ParamRule,
  Schedule,
  WsEvent
} from "@cadence/types";
import { ConflictError, PreconditionError, ValidationError } from "../errors.js";
import type { Logger } from "../logger.js";
import { AgentStore, type AgentPatch } from "../state/agent-store.js";
import type { AgentPersistence } from "../state/persistence.js";
import type { ExecutionPipelineContract } from "./execution-pipeline.js";
import { describeSchedule, isSchedulable, nextDueAt, validateSchedule } from "./schedule.js";
import { Scheduler } from "./scheduler.js";

export interface CreateAgentInput {
  name: string;
  description?: string;
  owner: string;
  contractAddress: string;
  contractInterface: ContractInterface;
  gasLimit?: string;
  maxPriorityFeeGwei?: string;
  scope?: AgentScope;
}

export interface FunctionSpecInput {
  name?: string;
  signature: string;
  /** read | view | pure | write | nonpayable | payable */
  direction: string;
  enabled?: boolean;
  validationRules?: unknown;
  returnRules?: unknown;
  abi?: Record<string, unknown>;
}

export interface AgentManagerOptions {
  pipeline: ExecutionPipelineContract;
  persistence: AgentPersistence;
  logger: Logger;
  tickMs: number;
  maxConsecutiveFailures: number;
  now?: () => number;
  onEvent?: (agentId: string, event: WsEvent) => void;
}

const DIRECTIONS: Record<string, FunctionDirection> = {
  read: "read",
  view: "read",
  pure: "read",
  write: "write",
  nonpayable: "write",
  payable: "write"
};

const GAS_LIMIT = /^[1-9]\d*$/;
const GWEI = /^\d+(\.\d{1,9})?$/;

function zodMessage(prefix: string, error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return prefix;
  const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return `${prefix}: ${path}${issue.message}`;
}

function interfaceGuard<T>(work: () => T): T {
  try {
    return work();
  } catch (error) {
    if (error instanceof ContractInterfaceError) {
      throw new ValidationError(error.message);
    }
    throw error;
  }
}

/**
 * Owns every agent record and is the only code that changes an agent's
 * status. Lifecycle: created → configured → running ⇄ stopped, with running →
 * error on escalation and error → stopped → running to recover.
 */
export class AgentManager {
  readonly scheduler: Scheduler;
  private readonly store = new AgentStore();
  private readonly failures = new Map<string, number>();
  private readonly connectionOwners = new Map<string, string>();
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly options: AgentManagerOptions) {
    this.logger = options.logger.child({ component: "agent-manager" });
    this.now = options.now ?? Date.now;
    this.scheduler = new Scheduler({
      run: (agentId, source) => this.runExecution(agentId, source),
      tickMs: options.tickMs,
      logger: options.logger.child({ component: "scheduler" }),
      now: this.now,
      onRearmError: (agentId, error) => {
        this.unschedulable(agentId, error).catch((failure: unknown) => {
          this.logger.error({ err: failure, agentId }, "failed to move unschedulable agent to error");
        });
      }
    });
  }

  /** Starts the dispatch loop. Agents only run on their schedules after this. */
  async boot(): Promise<void> {
    this.scheduler.start();
    this.logger.info({ tickMs: this.options.tickMs }, "scheduler started");
  }

  async shutdown(): Promise<void> {
    await this.scheduler.stop();
  }

  async create(input: CreateAgentInput, connectionId?: string): Promise<Agent> {
    const name = input.name.trim();
    if (!name) throw new ValidationError("Agent name is required");
    if (!isAddress(input.owner)) {
      throw new ValidationError("owner must be a 0x-prefixed address", { owner: input.owner });
    }
    if (!isAddress(input.contractAddress)) {
      throw new ValidationError("contract_address must be a 0x-prefixed address", {
        contractAddress: input.contractAddress
      });
    }
    interfaceGuard(() => parseContractInterface(input.contractInterface));
    if (input.gasLimit !== undefined && !GAS_LIMIT.test(input.gasLimit)) {
      throw new ValidationError("gas_limit must be a positive integer", { gasLimit: input.gasLimit });
    }
    if (input.maxPriorityFeeGwei !== undefined && !GWEI.test(input.maxPriorityFeeGwei)) {
      throw new ValidationError("max_priority_fee must be a decimal gwei amount", {
        maxPriorityFee: input.maxPriorityFeeGwei
      });
    }

    const timestamp = new Date(this.now()).toISOString();
    const agent = this.store.insert({
      id: randomUUID(),
      name,
      description: input.description ?? "",
      owner: input.owner,
      contractAddress: input.contractAddress,
      contractInterface: input.contractInterface,
      gasLimit: input.gasLimit,
      maxPriorityFeeGwei: input.maxPriorityFeeGwei,
      scope: input.scope ?? "persistent",
      status: "created",
      functions: [],
      createdAt: timestamp,
      updatedAt: timestamp
    });
    if (agent.scope === "connection" && connectionId) {
      this.connectionOwners.set(agent.id, connectionId);
    }

    this.logger.info({ agentId: agent.id, name, scope: agent.scope }, "agent created");
    await this.save(agent);
    return this.view(agent);
  }

  async addFunction(agentId: string, spec: FunctionSpecInput): Promise<AgentFunction> {
    const agent = await this.resolve(agentId);
    const direction = DIRECTIONS[spec.direction.trim().toLowerCase()];
    if (!direction) {
      throw new ValidationError(`Unrecognized function direction "${spec.direction}"`, { direction: spec.direction });
    }

    const iface = interfaceGuard(() => parseContractInterface(agent.contractInterface));
    const fragment = interfaceGuard(() => {
      const declared = resolveFunction(iface, spec.signature);
      if (!spec.abi) return declared;
      const supplied = functionFromJson(spec.abi);
      if (supplied.format("sighash") !== declared.format("sighash")) {
        throw new ContractInterfaceError(
          `abi describes ${supplied.format("sighash")} but the signature is ${declared.format("sighash")}`
        );
      }
      return supplied;
    });

    const signature = fragment.format("sighash");
    if (directionOf(fragment) !== direction) {
      throw new ValidationError(
        `${signature} is ${fragment.stateMutability} but was declared as a ${direction} function`,
        { signature, direction }
      );
    }
    if (agent.functions.some((fn) => fn.signature === signature)) {
      throw new ConflictError(`${signature} is already registered on agent ${agentId}`, { agentId, signature });
    }

    const rules = validationRulesSchema.safeParse(spec.validationRules ?? {});
    if (!rules.success) {
      throw new ValidationError(zodMessage("Invalid validation_rules", rules.error));
    }
    const params = fragmentParams(fragment);
    for (const ruleName of Object.keys(rules.data)) {
      if (!params.some((param) => param.name === ruleName)) {
        throw new ValidationError(`validation_rules names unknown parameter "${ruleName}"`, { signature });
      }
    }
    if (direction === "write") {
      const uncovered = params.filter((param) => {
        const rule = rules.data[param.name];
        return !rule || !hasConstraintOrDefault(rule);
      });
      if (uncovered.length > 0) {
        throw new ValidationError(
          `write function ${signature} needs a validation rule for ${uncovered.map((param) => param.name).join(", ")}`,
          { signature }
        );
      }
    }

    let returnRules: ParamRule | undefined;
    if (spec.returnRules !== undefined) {
      const parsed = paramRuleSchema.safeParse(spec.returnRules);
      if (!parsed.success) {
        throw new ValidationError(zodMessage("Invalid return_rules", parsed.error));
      }
      returnRules = parsed.data;
    }

    const fn: AgentFunction = {
      id: randomUUID(),
      agentId,
      name: spec.name?.trim() || fragment.name,
      signature,
      direction,
      enabled: spec.enabled ?? true,
      params,
      validationRules: rules.data,
      returnRules,
      abi: fragmentToJson(fragment),
      createdAt: new Date(this.now()).toISOString()
    };

    const updated = this.store.update(agentId, { functions: [...agent.functions, fn] }, new Date(this.now()));
    this.logger.info({ agentId, signature, direction }, "function added");
    await this.save(updated);
    return fn;
  }

  /** Returns the due time the schedule would get if the agent were started now. */
  async setSchedule(agentId: string, schedule: Schedule): Promise<{ agent: Agent; nextDueAt?: number }> {
    const agent = await this.resolve(agentId);
    if (agent.status === "running") {
      throw new ConflictError(`Agent ${agentId} is running; stop it before changing its schedule`, { agentId });
    }
    validateSchedule(schedule, this.now());

    const updated = this.store.update(agentId, { schedule }, new Date(this.now()));
    this.logger.info({ agentId, schedule: describeSchedule(schedule) }, "schedule set");
    await this.save(updated);
    return {
      agent: this.view(updated),
      nextDueAt: isSchedulable(schedule) ? nextDueAt(schedule, this.now()) : undefined
    };
  }

  async configure(agentId: string): Promise<Agent> {
    const agent = await this.resolve(agentId);
    if (agent.status === "running" || agent.status === "error") {
      throw new ConflictError(`Agent ${agentId} cannot be configured while ${agent.status}`, {
        agentId,
        status: agent.status
      });
    }
    if (agent.functions.length === 0) {
      throw new PreconditionError(`Agent ${agentId} has no functions`, { agentId });
    }
    if (agent.status !== "created") return this.view(agent);
    return this.view(await this.transition(agent, "configured"));
  }

  async start(agentId: string): Promise<Agent> {
    const agent = await this.resolve(agentId);
    if (agent.status === "running" || agent.status === "error") {
      throw new ConflictError(
        agent.status === "running" ? `Agent ${agentId} is already running` : `Agent ${agentId} is in error; stop it first`,
        { agentId, status: agent.status }
      );
    }
    if (!agent.functions.some((fn) => fn.enabled)) {
      throw new PreconditionError(`Agent ${agentId} has no enabled function`, { agentId });
    }
    if (!isSchedulable(agent.schedule)) {
      throw new PreconditionError(`Agent ${agentId} has no active schedule`, { agentId });
    }

    this.failures.set(agentId, 0);
    const dueAt = this.scheduler.register(agentId, agent.schedule, this.now());
    this.logger.info(
      { agentId, schedule: describeSchedule(agent.schedule), nextDueAt: dueAt },
      "agent started"
    );
    return this.view(await this.transition(agent, "running", { lastError: undefined }));
  }

  async stop(agentId: string): Promise<Agent> {
    const agent = await this.resolve(agentId);
    if (agent.status !== "running" && agent.status !== "error") {
      throw new ConflictError(`Agent ${agentId} is not running`, { agentId, status: agent.status });
    }
    this.scheduler.deregister(agentId);
    this.logger.info({ agentId, inFlight: this.scheduler.isBusy(agentId) }, "agent stopped");
    return this.view(await this.transition(agent, "stopped"));
  }

  async remove(agentId: string): Promise<void> {
    const agent = await this.resolve(agentId);
    if (agent.status === "running") {
      throw new ConflictError(`Agent ${agentId} is running; stop it before removing`, { agentId });
    }
    this.scheduler.deregister(agentId);
    this.store.delete(agentId);
    this.failures.delete(agentId);
    this.connectionOwners.delete(agentId);
    this.logger.info({ agentId }, "agent removed");
    try {
      await this.options.persistence.deleteAgent(agentId);
    } catch (error) {
      this.logger.warn({ err: error, agentId }, "failed to delete persisted agent");
    }
  }

  /** Manual trigger. Resolves once the run is launched, not when it finishes. */
  async execute(agentId: string): Promise<void> {
    const agent = await this.resolve(agentId);
    if (agent.status === "error") {
      throw new ConflictError(`Agent ${agentId} is in error; stop it first`, { agentId });
    }
    if (!agent.functions.some((fn) => fn.enabled)) {
      throw new PreconditionError(`Agent ${agentId} has no enabled function`, { agentId });
    }
    void this.scheduler.dispatch(agentId, "manual");
  }

  async get(agentId: string): Promise<Agent> {
    return this.view(await this.resolve(agentId));
  }

  list(): Agent[] {
    return this.store.list().map((agent) => this.view(agent));
  }

  async executions(agentId: string, limit?: number): Promise<ExecutionRecord[]> {
    await this.resolve(agentId);
    return this.options.persistence.listExecutionRecords(agentId, limit);
  }

  /** Stops and removes the connection-scoped agents created over `connectionId`. */
  async releaseConnection(connectionId: string): Promise<string[]> {
    const owned = [...this.connectionOwners.entries()]
      .filter(([, owner]) => owner === connectionId)
      .map(([agentId]) => agentId);

    const released: string[] = [];
    for (const agentId of owned) {
      try {
        const agent = this.store.get(agentId);
        if (agent && (agent.status === "running" || agent.status === "error")) {
          await this.stop(agentId);
        }
        await this.remove(agentId);
        released.push(agentId);
      } catch (error) {
        this.logger.error({ err: error, agentId, connectionId }, "failed to release connection-scoped agent");
      }
    }
    return released;
  }

  /** Waits for the agent's in-flight execution, if any. */
  async whenIdle(agentId?: string): Promise<void> {
    await this.scheduler.idle(agentId);
  }

  private async runExecution(agentId: string, source: ExecutionSource): Promise<void> {
    const agent = this.store.get(agentId);
    if (!agent) return;

    this.emit(agentId, {
      type: "execution_response",
      data: { success: true, status: "started", agent_id: agentId, source }
    });
    const record = await this.options.pipeline.execute(agent, source, (level, message) =>
      this.log(agentId, level, message)
    );
    this.emit(agentId, {
      type: "execution_response",
      data: { success: record.outcome !== "failure", status: "completed", agent_id: agentId, record }
    });
    await this.recordOutcome(agentId, record);
  }

  private async recordOutcome(agentId: string, record: ExecutionRecord): Promise<void> {
    const current = this.store.get(agentId);
    if (!current) return;

    const failures = record.outcome === "failure" ? (this.failures.get(agentId) ?? 0) + 1 : 0;
    this.failures.set(agentId, failures);

    const patch: AgentPatch = {
      lastExecutionAt: record.finishedAt,
      lastError: record.outcome === "failure" ? (record.error ?? undefined) : undefined
    };

    const escalate =
      current.status === "running" &&
      record.outcome === "failure" &&
      (record.errorKind === "interface" || failures >= this.options.maxConsecutiveFailures);
    if (!escalate) {
      await this.save(this.store.update(agentId, patch, new Date(this.now())));
      return;
    }

    this.scheduler.deregister(agentId);
    const reason =
      record.errorKind === "interface"
        ? `non-recoverable interface failure: ${record.error ?? "unknown"}`
        : `${failures} consecutive failures`;
    this.logger.warn({ agentId, failures, errorKind: record.errorKind }, "agent escalated to error");
    this.log(agentId, "error", `agent moved to error after ${reason}`);
    await this.transition(current, "error", patch);
  }

  /** The scheduler could not find another due time; the agent is already deregistered. */
  private async unschedulable(agentId: string, error: unknown): Promise<void> {
    const current = this.store.get(agentId);
    if (!current || current.status !== "running") return;
    const message = error instanceof Error ? error.message : String(error);
    this.log(agentId, "error", `agent moved to error: ${message}`);
    await this.transition(current, "error", { lastError: message });
  }

  private async transition(agent: Agent, status: AgentStatus, patch: AgentPatch = {}): Promise<Agent> {
    const updated = this.store.update(agent.id, { ...patch, status }, new Date(this.now()));
    if (agent.status !== status) {
      this.emit(agent.id, {
        type: "agent_status",
        data: { agent_id: agent.id, status, previous: agent.status }
      });
    }
    await this.save(updated);
    return updated;
  }

  /** Looks the agent up in memory, falling back to persistence for agents created by an earlier process. */
  private async resolve(agentId: string): Promise<Agent> {
    const known = this.store.get(agentId);
    if (known) return known;

    const loaded = await this.options.persistence.loadAgent(agentId);
    // Scheduling does not survive a restart; a persisted running agent comes back stopped.
    const status: AgentStatus = loaded.status === "running" ? "stopped" : loaded.status;
    this.logger.info({ agentId, status }, "agent hydrated from persistence");
    return this.store.insert({ ...loaded, status, nextDueAt: undefined });
  }

  private view(agent: Agent): Agent {
    const dueAt = this.scheduler.nextDueAt(agent.id);
    return { ...agent, nextDueAt: dueAt === undefined ? undefined : new Date(dueAt).toISOString() };
  }

  private log(agentId: string, level: LogLevel, message: string): void {
    this.logger[level]({ agentId }, message);
    this.emit(agentId, {
      type: "log",
      data: { agent_id: agentId, level, message, timestamp: new Date(this.now()).toISOString() }
    });
  }

  private emit(agentId: string, event: WsEvent): void {
    this.options.onEvent?.(agentId, event);
  }

  private async save(agent: Agent): Promise<void> {
    try {
      await this.options.persistence.saveAgent(agent);
    } catch (error) {
      this.logger.warn({ err: error, agentId: agent.id }, "failed to persist agent");
    }
  }
}
