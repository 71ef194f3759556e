import type { Agent, ExecutionRecord } from "@cadence/types";
import { NotFoundError } from "../errors.js";

export interface AgentPersistence {
  readonly kind: "memory" | "database";
  saveAgent(agent: Agent): Promise<void>;
  deleteAgent(id: string): Promise<void>;
  /** Throws NotFoundError for unknown ids and IOError when the backing store fails. */
  loadAgent(id: string): Promise<Agent>;
  appendExecutionRecord(record: ExecutionRecord): Promise<void>;
  listExecutionRecords(agentId: string, limit?: number): Promise<ExecutionRecord[]>;
}

/** Oldest records are dropped once an agent has this many. */
export const MEMORY_RECORD_LIMIT = 1_000;

export class MemoryPersistence implements AgentPersistence {
  readonly kind = "memory";
  private readonly agents = new Map<string, Agent>();
  private readonly records = new Map<string, ExecutionRecord[]>();

  async saveAgent(agent: Agent): Promise<void> {
    this.agents.set(agent.id, structuredClone(agent));
  }

  async deleteAgent(id: string): Promise<void> {
    this.agents.delete(id);
    this.records.delete(id);
  }

  async loadAgent(id: string): Promise<Agent> {
    const agent = this.agents.get(id);
    if (!agent) {
      throw new NotFoundError(`Agent ${id} not found`, { agentId: id });
    }
    return structuredClone(agent);
  }

  async appendExecutionRecord(record: ExecutionRecord): Promise<void> {
    const history = this.records.get(record.agentId) ?? [];
    history.push(Object.freeze({ ...record }));
    if (history.length > MEMORY_RECORD_LIMIT) history.splice(0, history.length - MEMORY_RECORD_LIMIT);
    this.records.set(record.agentId, history);
  }

  async listExecutionRecords(agentId: string, limit = 100): Promise<ExecutionRecord[]> {
    return [...(this.records.get(agentId) ?? [])].reverse().slice(0, limit);
  }
}
