import { desc, eq } from "drizzle-orm";
import type { ExecutionRecord } from "@cadence/types";
import { toExecutionRecord } from "../mappers.js";
import { executionRecords } from "../schema.js";
import type { CadenceDb } from "../index.js";

export class ExecutionRepo {
  constructor(private readonly db: CadenceDb) {}

  async append(record: ExecutionRecord): Promise<void> {
    await this.db.insert(executionRecords).values({
      id: record.id,
      agentId: record.agentId,
      functionName: record.functionName,
      params: record.params,
      outcome: record.outcome,
      error: record.error,
      errorKind: record.errorKind ?? null,
      callId: record.callId,
      value: record.value ?? null,
      source: record.source,
      startedAt: new Date(record.startedAt),
      finishedAt: new Date(record.finishedAt)
    });
  }

  async listByAgent(agentId: string, limit = 100): Promise<ExecutionRecord[]> {
    const rows = await this.db
      .select()
      .from(executionRecords)
      .where(eq(executionRecords.agentId, agentId))
      .orderBy(desc(executionRecords.startedAt))
      .limit(limit);
    return rows.map(toExecutionRecord);
  }
}
