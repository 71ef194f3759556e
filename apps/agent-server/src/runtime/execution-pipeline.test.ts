import assert from "node:assert/strict";
import test from "node:test";
import { ContractCallError, type ContractCallResult, type Decision } from "@cadence/agent-core";
import type { Agent, LogLevel } from "@cadence/types";
import { MemoryPersistence } from "../state/persistence.js";
import {
  FakeCaller,
  RECIPIENT,
  ScriptedOracle,
  makeAgent,
  makeFunction,
  silentLogger
} from "../test-fixtures.js";
import { ExecutionPipeline } from "./execution-pipeline.js";

const transfer = makeFunction("transfer(address to, uint256 amount) returns (bool)", {
  validationRules: {
    to: { required: true },
    amount: { min: "1", max: "1000", default: "10" }
  }
});
const poke = makeFunction("poke() returns (bool)");
const totalSupply = makeFunction("totalSupply() view returns (uint256)");

function pipelineWith(decision: Decision | (() => Promise<Decision>), caller = new FakeCaller(), timeoutMs = 1_000) {
  const persistence = new MemoryPersistence();
  const oracle = new ScriptedOracle(() => (typeof decision === "function" ? decision() : decision));
  const pipeline = new ExecutionPipeline({ oracle, caller, persistence, timeoutMs, logger: silentLogger() });
  return { pipeline, persistence, oracle, caller };
}

async function run(pipeline: ExecutionPipeline, agent: Agent) {
  const lines: Array<[LogLevel, string]> = [];
  const record = await pipeline.execute(agent, "manual", (level, message) => {
    lines.push([level, message]);
  });
  return { record, lines };
}

test("a write decision fills defaults, calls the contract and records the pending call", async () => {
  const { pipeline, persistence, caller, oracle } = pipelineWith({
    action: "call",
    functionName: "transfer",
    params: { to: RECIPIENT }
  });
  const agent = makeAgent([transfer, poke], { gasLimit: "90000" });

  const { record } = await run(pipeline, agent);

  assert.equal(record.outcome, "success");
  assert.equal(record.functionName, "transfer");
  assert.deepEqual(record.params, { to: RECIPIENT, amount: "10" });
  assert.equal(record.callId, "0xabc");
  assert.equal(record.error, null);
  assert.equal(record.source, "manual");
  assert.deepEqual(caller.calls[0]?.args, [RECIPIENT, "10"]);
  assert.deepEqual(caller.calls[0]?.overrides, { gasLimit: "90000", maxPriorityFeeGwei: undefined });
  assert.deepEqual(
    oracle.snapshots[0]?.functions.map((fn) => [fn.name, fn.defaults]),
    [
      ["transfer", { amount: "10" }],
      ["poke", {}]
    ]
  );
  assert.deepEqual(await persistence.listExecutionRecords(agent.id), [record]);
});

test("rule violations fail the run before any call is made", async () => {
  const { pipeline, caller } = pipelineWith({
    action: "call",
    functionName: "transfer",
    params: { to: RECIPIENT, amount: "0" }
  });

  const { record, lines } = await run(pipeline, makeAgent([transfer]));

  assert.equal(record.outcome, "failure");
  assert.equal(record.errorKind, "validation");
  assert.equal(record.error, "amount must be >= 1, got 0");
  assert.deepEqual(record.params, { to: RECIPIENT, amount: "0" });
  assert.equal(caller.calls.length, 0);
  assert.deepEqual(lines, [["warn", "execution failed (validation): amount must be >= 1, got 0"]]);
});

test("values the ABI cannot encode and unknown functions are validation failures", async () => {
  const unencodable = pipelineWith({
    action: "call",
    functionName: "transfer",
    params: { to: "not-an-address", amount: "5" }
  });
  const { record } = await run(unencodable.pipeline, makeAgent([transfer]));
  assert.equal(record.errorKind, "validation");
  assert.ok(record.error?.startsWith("invalid arguments for transfer:"));
  assert.equal(unencodable.caller.calls.length, 0);

  const disabled = pipelineWith({ action: "call", functionName: "poke", params: {} });
  const result = await run(disabled.pipeline, makeAgent([{ ...poke, enabled: false }, transfer]));
  assert.equal(result.record.error, "function poke is not enabled for this agent");
  assert.equal(result.record.functionName, "poke");
});

test("a none decision is recorded as skipped", async () => {
  const { pipeline, caller } = pipelineWith({ action: "none", reason: "vault is balanced" });
  const { record, lines } = await run(pipeline, makeAgent([poke]));

  assert.equal(record.outcome, "skipped");
  assert.equal(record.functionName, null);
  assert.equal(record.error, null);
  assert.equal(caller.calls.length, 0);
  assert.deepEqual(lines, [["info", "no action: vault is balanced"]]);
});

test("read results are returned and checked against return rules", async () => {
  const caller = new FakeCaller(() => ({ kind: "value", value: "1000" }));
  const decision: Decision = { action: "call", functionName: "totalSupply", params: {} };

  const ok = pipelineWith(decision, caller);
  const { record } = await run(ok.pipeline, makeAgent([totalSupply]));
  assert.equal(record.outcome, "success");
  assert.equal(record.value, "1000");
  assert.equal(record.callId, null);

  const capped = pipelineWith(decision, caller);
  const result = await run(capped.pipeline, makeAgent([{ ...totalSupply, returnRules: { max: "10" } }]));
  assert.equal(result.record.outcome, "failure");
  assert.equal(result.record.errorKind, "validation");
  assert.equal(result.record.error, "return value must be <= 10, got 1000");
});

test("collaborator failures become typed failure records", async () => {
  const reverting = pipelineWith(
    { action: "call", functionName: "poke", params: {} },
    new FakeCaller(() => {
      throw new ContractCallError("revert", "vault is paused");
    })
  );
  const reverted = await run(reverting.pipeline, makeAgent([poke]));
  assert.equal(reverted.record.errorKind, "revert");
  assert.equal(reverted.record.error, "vault is paused");
  assert.equal(reverted.record.functionName, "poke");

  const oracleDown = pipelineWith(async () => {
    throw new Error("oracle down");
  });
  const undecided = await run(oracleDown.pipeline, makeAgent([poke]));
  assert.equal(undecided.record.errorKind, "decision");
  assert.equal(undecided.record.error, "decision failed: oracle down");
});

test("collaborator calls are bounded by the execution timeout", async () => {
  const stalled = pipelineWith(() => new Promise<Decision>(() => undefined), new FakeCaller(), 20);
  const { record } = await run(stalled.pipeline, makeAgent([poke]));
  assert.equal(record.outcome, "failure");
  assert.equal(record.errorKind, "timeout");
  assert.equal(record.error, "timeout");

  const slowCall = pipelineWith(
    { action: "call", functionName: "poke", params: {} },
    new FakeCaller(() => new Promise<ContractCallResult>(() => undefined)),
    20
  );
  const result = await run(slowCall.pipeline, makeAgent([poke]));
  assert.equal(result.record.errorKind, "timeout");
  assert.equal(result.record.functionName, "poke");
});

test("a persistence failure is reported but the record is still returned", async () => {
  const failing = new ExecutionPipeline({
    oracle: new ScriptedOracle(() => ({ action: "none", reason: "idle" })),
    caller: new FakeCaller(),
    persistence: {
      async appendExecutionRecord(): Promise<void> {
        throw new Error("disk full");
      }
    },
    timeoutMs: 1_000,
    logger: silentLogger()
  });

  const { record, lines } = await run(failing, makeAgent([poke]));
  assert.equal(record.outcome, "skipped");
  assert.deepEqual(lines.at(-1), ["error", "failed to persist execution record: disk full"]);
});
