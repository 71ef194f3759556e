import type { Repositories } from "@cadence/db";
import type { Agent, ExecutionRecord } from "@cadence/types";
import { IOError, NotFoundError } from "../errors.js";
import type { AgentPersistence } from "./persistence.js";

async function guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown database error";
    throw new IOError(`${operation} failed: ${message}`, { operation });
  }
}

export class DbPersistence implements AgentPersistence {
  readonly kind = "database";

  constructor(private readonly repos: Repositories) {}

  async saveAgent(agent: Agent): Promise<void> {
    await guard("saveAgent", () => this.repos.agentRepo.save(agent));
  }

  async deleteAgent(id: string): Promise<void> {
    await guard("deleteAgent", () => this.repos.agentRepo.delete(id));
  }

  async loadAgent(id: string): Promise<Agent> {
    const agent = await guard("loadAgent", () => this.repos.agentRepo.getById(id));
    if (!agent) {
      throw new NotFoundError(`Agent ${id} not found`, { agentId: id });
    }
    return agent;
  }

  async appendExecutionRecord(record: ExecutionRecord): Promise<void> {
    await guard("appendExecutionRecord", () => this.repos.executionRepo.append(record));
  }

  async listExecutionRecords(agentId: string, limit?: number): Promise<ExecutionRecord[]> {
    return guard("listExecutionRecords", () => this.repos.executionRepo.listByAgent(agentId, limit));
  }
}
