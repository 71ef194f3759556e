import assert from "node:assert/strict";
import test from "node:test";
import type { ExecutionRecord } from "@cadence/types";
import { NotFoundError } from "../errors.js";
import { T0, makeAgent } from "../test-fixtures.js";
import { MEMORY_RECORD_LIMIT, MemoryPersistence } from "./persistence.js";

function record(agentId: string, index: number): ExecutionRecord {
  const startedAt = new Date(T0 + index * 1_000).toISOString();
  return {
    id: `${agentId}-${index}`,
    agentId,
    functionName: "poke",
    params: {},
    outcome: "success",
    error: null,
    callId: "0xabc",
    source: "scheduler",
    startedAt,
    finishedAt: startedAt
  };
}

test("records are listed per agent, newest first", async () => {
  const persistence = new MemoryPersistence();
  await persistence.appendExecutionRecord(record("a", 1));
  await persistence.appendExecutionRecord(record("b", 1));
  await persistence.appendExecutionRecord(record("a", 2));

  assert.deepEqual(
    (await persistence.listExecutionRecords("a")).map((item) => item.id),
    ["a-2", "a-1"]
  );
  assert.deepEqual(
    (await persistence.listExecutionRecords("a", 1)).map((item) => item.id),
    ["a-2"]
  );
  assert.deepEqual(await persistence.listExecutionRecords("missing"), []);
});

test("deleting an agent drops its records and leaves other agents alone", async () => {
  const persistence = new MemoryPersistence();
  await persistence.saveAgent(makeAgent([], { id: "a" }));
  await persistence.appendExecutionRecord(record("a", 1));
  await persistence.appendExecutionRecord(record("b", 1));

  await persistence.deleteAgent("a");

  await assert.rejects(persistence.loadAgent("a"), NotFoundError);
  assert.deepEqual(await persistence.listExecutionRecords("a"), []);
  assert.equal((await persistence.listExecutionRecords("b")).length, 1);
});

test("each agent keeps at most the record limit, dropping the oldest", async () => {
  const persistence = new MemoryPersistence();
  for (let index = 0; index < MEMORY_RECORD_LIMIT + 5; index += 1) {
    await persistence.appendExecutionRecord(record("a", index));
  }

  const kept = await persistence.listExecutionRecords("a", MEMORY_RECORD_LIMIT * 2);
  assert.equal(kept.length, MEMORY_RECORD_LIMIT);
  assert.equal(kept[0]?.id, `a-${MEMORY_RECORD_LIMIT + 4}`);
  assert.equal(kept.at(-1)?.id, "a-5");
});
