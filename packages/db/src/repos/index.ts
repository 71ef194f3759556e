import type { CadenceDb } from "../index.js";
import { AgentRepo } from "./agent-repo.js";
import { ExecutionRepo } from "./execution-repo.js";

export interface Repositories {
  agentRepo: AgentRepo;
  executionRepo: ExecutionRepo;
}

export function createRepositories(db: CadenceDb): Repositories {
  return {
    agentRepo: new AgentRepo(db),
    executionRepo: new ExecutionRepo(db)
  };
}

export * from "./agent-repo.js";
export * from "./execution-repo.js";
