import { asc, eq } from "drizzle-orm";
import type { Agent } from "@cadence/types";
import { toAgent } from "../mappers.js";
import { agentFunctions, agentSchedules, agents, executionRecords } from "../schema.js";
import type { CadenceDb } from "../index.js";

export class AgentRepo {
  constructor(private readonly db: CadenceDb) {}

  async getById(id: string): Promise<Agent | undefined> {
    const row = await this.db.query.agents.findFirst({ where: eq(agents.id, id) });
    if (!row) return undefined;

    const functions = await this.db
      .select()
      .from(agentFunctions)
      .where(eq(agentFunctions.agentId, id))
      .orderBy(asc(agentFunctions.position));
    const schedule = await this.db.query.agentSchedules.findFirst({ where: eq(agentSchedules.agentId, id) });
    return toAgent(row, functions, schedule);
  }

  /** Replaces the agent row together with its functions and schedule. */
  async save(agent: Agent): Promise<void> {
    const row = {
      id: agent.id,
      name: agent.name,
      description: agent.description,
      owner: agent.owner,
      contractAddress: agent.contractAddress,
      contractInterface: agent.contractInterface,
      gasLimit: agent.gasLimit ?? null,
      maxPriorityFeeGwei: agent.maxPriorityFeeGwei ?? null,
      scope: agent.scope,
      status: agent.status,
      lastExecutionAt: agent.lastExecutionAt ? new Date(agent.lastExecutionAt) : null,
      lastError: agent.lastError ?? null,
      createdAt: new Date(agent.createdAt),
      updatedAt: new Date(agent.updatedAt)
    };

    await this.db.transaction(async (tx) => {
      await tx.insert(agents).values(row).onConflictDoUpdate({ target: agents.id, set: row });

      await tx.delete(agentFunctions).where(eq(agentFunctions.agentId, agent.id));
      if (agent.functions.length > 0) {
        await tx.insert(agentFunctions).values(
          agent.functions.map((fn, position) => ({
            id: fn.id,
            agentId: agent.id,
            position,
            name: fn.name,
            signature: fn.signature,
            direction: fn.direction,
            enabled: fn.enabled,
            params: fn.params,
            validationRules: fn.validationRules,
            returnRules: fn.returnRules ?? null,
            abi: fn.abi,
            createdAt: new Date(fn.createdAt)
          }))
        );
      }

      await tx.delete(agentSchedules).where(eq(agentSchedules.agentId, agent.id));
      if (agent.schedule) {
        await tx.insert(agentSchedules).values({
          agentId: agent.id,
          kind: agent.schedule.kind,
          intervalSeconds: agent.schedule.kind === "interval" ? agent.schedule.intervalSeconds : null,
          cronExpression: agent.schedule.kind === "cron" ? agent.schedule.expression : null,
          isActive: agent.schedule.kind === "cron" ? agent.schedule.active : true
        });
      }
    });
  }

  /** Functions and schedules cascade; execution records have no foreign key and are removed here. */
  async delete(id: string): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.delete(executionRecords).where(eq(executionRecords.agentId, id));
      await tx.delete(agents).where(eq(agents.id, id));
    });
  }
}
