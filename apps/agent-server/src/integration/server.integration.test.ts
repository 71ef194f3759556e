import assert from "node:assert/strict";
import test from "node:test";
import { setTimeout as delay } from "node:timers/promises";
import type { ExecutionRecord } from "@cadence/types";
import { loadEnv } from "../env.js";
import { createServer } from "../server.js";
import { MemoryPersistence } from "../state/persistence.js";
import { FakeCaller, T0, agentInput, makeAgent, makeFunction, silentLogger } from "../test-fixtures.js";

function record(id: string, startedAt: number): ExecutionRecord {
  return {
    id,
    agentId: "agent-1",
    functionName: "poke",
    params: {},
    outcome: "success",
    error: null,
    callId: `0x${id}`,
    source: "scheduler",
    startedAt: new Date(startedAt).toISOString(),
    finishedAt: new Date(startedAt + 10).toISOString()
  };
}

async function startServer(persistence = new MemoryPersistence()) {
  return createServer({ env: loadEnv({}), logger: silentLogger(), persistence });
}

test("GET /health returns service health payload", async (t) => {
  const app = await startServer();
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({
    method: "GET",
    url: "/health"
  });

  assert.equal(response.statusCode, 200);
  const payload = response.json();
  assert.equal(payload.status, "ok");
  assert.equal(payload.service, "agent-server");
  assert.equal(typeof payload.timestamp, "string");
  assert.equal(payload.agents, 0);
  assert.equal(payload.connections, 0);
  assert.deepEqual(payload.dependencies, { persistence: "memory", oracle: "rotating", rpc: "not_configured" });
});

test("health reports an injected caller as configured", async (t) => {
  const app = await createServer({ env: loadEnv({}), logger: silentLogger(), caller: new FakeCaller() });
  t.after(async () => {
    await app.close();
  });

  const payload = (await app.inject({ method: "GET", url: "/health" })).json();
  assert.equal(payload.dependencies.rpc, "configured");
});

test("GET /api/agents lists no agents on a fresh server", async (t) => {
  const app = await startServer();
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({ method: "GET", url: "/api/agents" });

  assert.equal(response.statusCode, 200);
  const payload = response.json();
  assert.equal(payload.code, "OK");
  assert.deepEqual(payload.data, { agents: [] });
});

test("GET /api/agents/:id returns a not-found envelope for unknown agents", async (t) => {
  const app = await startServer();
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({ method: "GET", url: "/api/agents/missing" });

  assert.equal(response.statusCode, 404);
  const payload = response.json();
  assert.equal(payload.code, "NOT_FOUND");
  assert.equal(payload.message, "Agent missing not found");
  assert.equal(typeof payload.requestId, "string");
});

test("agents persisted by an earlier process come back stopped", async (t) => {
  const persistence = new MemoryPersistence();
  await persistence.saveAgent(makeAgent([makeFunction("function poke() returns (bool)")]));
  const app = await startServer(persistence);
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject({ method: "GET", url: "/api/agents/agent-1" });

  assert.equal(response.statusCode, 200);
  const agent = response.json().data.agent;
  assert.equal(agent.id, "agent-1");
  assert.equal(agent.status, "stopped");
  assert.equal(agent.functions[0].signature, "poke()");

  const listed = (await app.inject({ method: "GET", url: "/api/agents" })).json();
  assert.deepEqual(
    listed.data.agents.map((item: { id: string }) => item.id),
    ["agent-1"]
  );
});

test("GET /api/agents/:id/executions returns records newest first and honours limit", async (t) => {
  const persistence = new MemoryPersistence();
  await persistence.saveAgent(makeAgent([makeFunction("function poke() returns (bool)")], { status: "stopped" }));
  await persistence.appendExecutionRecord(record("a1", T0));
  await persistence.appendExecutionRecord(record("a2", T0 + 5_000));
  await persistence.appendExecutionRecord(record("a3", T0 + 10_000));
  const app = await startServer(persistence);
  t.after(async () => {
    await app.close();
  });

  const all = await app.inject({ method: "GET", url: "/api/agents/agent-1/executions" });
  assert.equal(all.statusCode, 200);
  assert.deepEqual(
    all.json().data.executions.map((item: ExecutionRecord) => item.id),
    ["a3", "a2", "a1"]
  );

  const limited = await app.inject({ method: "GET", url: "/api/agents/agent-1/executions?limit=1" });
  assert.deepEqual(
    limited.json().data.executions.map((item: ExecutionRecord) => item.id),
    ["a3"]
  );

  const missing = await app.inject({ method: "GET", url: "/api/agents/ghost/executions" });
  assert.equal(missing.statusCode, 404);
});

test("cors preflight allows localhost dev origins across ports", async (t) => {
  const app = await startServer();
  t.after(async () => {
    await app.close();
  });

  const preflight = await app.inject({
    method: "OPTIONS",
    url: "/api/agents",
    headers: {
      origin: "http://localhost:5173",
      "access-control-request-method": "GET"
    }
  });

  assert.equal(preflight.statusCode, 204);
  assert.equal(preflight.headers["access-control-allow-origin"], "http://localhost:5173");
});

test("a booted server runs started agents on their schedule without manual ticks", async (t) => {
  const unhandled: unknown[] = [];
  const onUnhandled = (reason: unknown) => {
    unhandled.push(reason);
  };
  process.on("unhandledRejection", onUnhandled);

  const persistence = new MemoryPersistence();
  const caller = new FakeCaller();
  const app = await createServer({
    env: loadEnv({ SCHEDULER_TICK_MS: "10" }),
    logger: silentLogger(),
    persistence,
    caller
  });
  t.after(async () => {
    await app.close();
    process.off("unhandledRejection", onUnhandled);
  });
  await app.ready();

  const agent = await app.agents.create(agentInput());
  await app.agents.addFunction(agent.id, { signature: "poke()", direction: "write" });
  await app.agents.setSchedule(agent.id, { kind: "interval", intervalSeconds: 0.05 });
  await app.agents.start(agent.id);

  let records: ExecutionRecord[] = [];
  for (let attempt = 0; attempt < 200 && records.length < 2; attempt += 1) {
    await delay(10);
    records = await persistence.listExecutionRecords(agent.id);
  }

  assert.ok(records.length >= 2, `expected scheduled executions, saw ${records.length}`);
  assert.ok(records.every((item) => item.source === "scheduler" && item.outcome === "success"));
  assert.equal(caller.calls[0]?.signature, "poke()");
  assert.deepEqual(unhandled, []);
});
