import type { Agent } from "@cadence/types";
import { NotFoundError } from "../errors.js";

export type AgentPatch = Partial<Omit<Agent, "id" | "createdAt">>;

/**
 * Arena of agent records keyed by id. Records are replaced, never mutated in
 * place, so a reference handed to an in-flight execution stays a consistent
 * snapshot while the manager moves on.
 */
export class AgentStore {
  private readonly agents = new Map<string, Agent>();

  has(id: string): boolean {
    return this.agents.has(id);
  }

  get(id: string): Agent | undefined {
    return this.agents.get(id);
  }

  require(id: string): Agent {
    const agent = this.agents.get(id);
    if (!agent) {
      throw new NotFoundError(`Agent ${id} not found`, { agentId: id });
    }
    return agent;
  }

  list(): Agent[] {
    return [...this.agents.values()];
  }

  insert(agent: Agent): Agent {
    this.agents.set(agent.id, agent);
    return agent;
  }

  update(id: string, patch: AgentPatch, now = new Date()): Agent {
    const existing = this.require(id);
    const updated: Agent = {
      ...existing,
      ...patch,
      id,
      updatedAt: now.toISOString()
    };
    this.agents.set(id, updated);
    return updated;
  }

  delete(id: string): boolean {
    return this.agents.delete(id);
  }
}
