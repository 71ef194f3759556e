import assert from "node:assert/strict";
import test from "node:test";
import { RotatingOracle } from "@cadence/agent-core";
import { AgentManager } from "../runtime/agent-manager.js";
import { ExecutionPipeline } from "../runtime/execution-pipeline.js";
import { MemoryPersistence } from "../state/persistence.js";
import { CONTRACT, FakeCaller, KEEPER_ABI, OWNER, silentLogger } from "../test-fixtures.js";
import { CLOSE_INVALID_PAYLOAD, ProtocolHandler } from "./handler.js";
import { ConnectionRegistry } from "./hub.js";

interface Frame {
  type: string;
  data: Record<string, unknown>;
}

class FakeSocket {
  public readonly sent: string[] = [];
  public closedWith: [number | undefined, string | undefined] | undefined;

  send(payload: string): void {
    this.sent.push(payload);
  }

  close(code?: number, reason?: string): void {
    this.closedWith = [code, reason];
  }

  frames(): Frame[] {
    return this.sent.map((payload) => {
      const parsed: unknown = JSON.parse(payload);
      if (!parsed || typeof parsed !== "object" || !("type" in parsed) || typeof parsed.type !== "string") {
        throw new Error(`unexpected frame ${payload}`);
      }
      const data = "data" in parsed && parsed.data && typeof parsed.data === "object" ? parsed.data : {};
      return { type: parsed.type, data: Object.fromEntries(Object.entries(data)) };
    });
  }

  types(): string[] {
    return this.frames().map((frame) => frame.type);
  }
}

function setup() {
  const persistence = new MemoryPersistence();
  const registry = new ConnectionRegistry();
  const manager = new AgentManager({
    pipeline: new ExecutionPipeline({
      oracle: new RotatingOracle(),
      caller: new FakeCaller(),
      persistence,
      timeoutMs: 1_000,
      logger: silentLogger()
    }),
    persistence,
    logger: silentLogger(),
    tickMs: 250,
    maxConsecutiveFailures: 3,
    onEvent: (agentId, event) => {
      registry.publish(agentId, event);
    }
  });

  const connect = (connectionId: string) => {
    const socket = new FakeSocket();
    registry.register(socket, connectionId);
    const handler = new ProtocolHandler(connectionId, socket, { manager, registry, logger: silentLogger() });
    const send = (frame: unknown) => handler.receive(JSON.stringify(frame));
    return { socket, handler, send };
  };

  return { manager, registry, persistence, connect };
}

async function createRunningAgent(send: (frame: unknown) => Promise<void>, socket: FakeSocket, scope = "persistent") {
  await send({
    type: "create_agent",
    data: { name: "keeper", owner: OWNER, contract_address: CONTRACT, abi: KEEPER_ABI, scope }
  });
  const created = socket.frames().at(-1);
  const agentId = String(created?.data.agent_id);
  await send({
    type: "create_function",
    data: { agent_id: agentId, function_signature: "poke()", function_type: "write" }
  });
  await send({ type: "create_schedule", data: { agent_id: agentId, schedule_type: "interval", interval_seconds: 5 } });
  await send({ type: "start_agent", data: { agent_id: agentId } });
  return agentId;
}

test("create → function → schedule → start → execute over frames", async () => {
  const { manager, persistence, connect } = setup();
  const { socket, send } = connect("conn-1");

  const agentId = await createRunningAgent(send, socket);
  await send({ type: "execute", data: { agent_id: agentId } });
  await manager.whenIdle(agentId);

  assert.deepEqual(
    socket.types().filter((type) => type !== "log"),
    [
      "create_agent_response",
      "create_function_response",
      "create_schedule_response",
      "agent_status",
      "start_agent_response",
      "execution_response",
      "execution_response"
    ]
  );
  const frames = socket.frames();
  assert.deepEqual(frames[0]?.data, { success: true, agent_id: agentId, status: "created" });
  const started = frames.find((frame) => frame.type === "start_agent_response");
  assert.equal(started?.data.status, "running");
  assert.equal(typeof started?.data.next_due_at, "string");

  const completed = frames.filter((frame) => frame.type === "execution_response").at(-1);
  assert.equal(completed?.data.status, "completed");
  assert.equal(completed?.data.success, true);
  assert.equal((await persistence.listExecutionRecords(agentId)).length, 1);
  assert.equal(socket.types().includes("execute_response"), false);
  await manager.shutdown();
});

test("undecodable frames close the connection; later frames are ignored", async () => {
  const { connect } = setup();
  const { socket, handler, send } = connect("conn-1");

  await handler.receive("{oops");
  assert.deepEqual(socket.closedWith, [CLOSE_INVALID_PAYLOAD, "Frame is not valid JSON"]);

  await send({ type: "list_agents" });
  assert.deepEqual(socket.sent, []);
});

test("unknown types and failed operations produce error frames and keep the connection", async () => {
  const { registry, connect } = setup();
  const { socket, send } = connect("conn-1");

  await send({ type: "dance", data: {} });
  await send({ type: "start_agent", data: { agent_id: "nope" } });
  await send({ type: "list_agents" });

  assert.equal(socket.closedWith, undefined);
  assert.deepEqual(socket.frames(), [
    {
      type: "error",
      data: {
        success: false,
        code: "VALIDATION_ERROR",
        message: 'Unknown message type "dance"',
        request_type: "dance"
      }
    },
    {
      type: "error",
      data: {
        success: false,
        code: "NOT_FOUND",
        message: "Agent nope not found",
        request_type: "start_agent",
        agent_id: "nope"
      }
    },
    { type: "list_agents_response", data: { success: true, agents: [] } }
  ]);
  assert.deepEqual(registry.subscriptions("conn-1"), []);
});

test("events reach every connection subscribed to the agent", async () => {
  const { manager, connect } = setup();
  const owner = connect("conn-1");
  const watcher = connect("conn-2");
  const bystander = connect("conn-3");

  const agentId = await createRunningAgent(owner.send, owner.socket);
  await watcher.send({ type: "subscribe", data: { agent_id: agentId } });
  await owner.send({ type: "stop_agent", data: { agent_id: agentId } });

  assert.deepEqual(watcher.socket.types(), ["subscribe_response", "agent_status"]);
  assert.deepEqual(watcher.socket.frames()[1]?.data, { agent_id: agentId, status: "stopped", previous: "running" });
  assert.deepEqual(bystander.socket.sent, []);
  await manager.shutdown();
});

test("disconnecting leaves persistent agents intact and releases connection-scoped ones", async () => {
  const { manager, registry, connect } = setup();
  const { socket, handler, send } = connect("conn-1");

  const persistentId = await createRunningAgent(send, socket);
  const scopedId = await createRunningAgent(send, socket, "connection");
  const before = await manager.get(persistentId);

  await handler.disconnect();

  assert.equal(registry.connectedClients(), 0);
  const after = await manager.get(persistentId);
  assert.equal(after.status, "running");
  assert.deepEqual(after.schedule, before.schedule);
  assert.equal(after.nextDueAt, before.nextDueAt);
  await assert.rejects(manager.get(scopedId), { name: "NotFoundError" });
  await manager.shutdown();
});
