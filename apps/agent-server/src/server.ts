import Fastify from "fastify";
import websocket from "@fastify/websocket";
import cors from "@fastify/cors";
import type { FastifyBaseLogger, FastifyInstance } from "fastify";
import type { RawData, WebSocket } from "ws";
import {
  ContractCallError,
  EthersContractCaller,
  HttpDecisionOracle,
  RotatingOracle,
  CallerStateReader,
  type ContractCaller,
  type ContractCallResult,
  type DecisionOracle
} from "@cadence/agent-core";
import { closeDbClient, createDbClient, createRepositories } from "@cadence/db";
import { loadEnv, type AgentServerEnv } from "./env.js";
import { createLogger, type Logger } from "./logger.js";
import { registerAgentRoutes } from "./routes/agents.js";
import { AgentManager } from "./runtime/agent-manager.js";
import { ExecutionPipeline } from "./runtime/execution-pipeline.js";
import { DbPersistence } from "./state/db-persistence.js";
import { MemoryPersistence, type AgentPersistence } from "./state/persistence.js";
import { ProtocolHandler } from "./ws/handler.js";
import { ConnectionRegistry } from "./ws/hub.js";

export interface ServerOptions {
  env?: AgentServerEnv;
  logger?: Logger;
  persistence?: AgentPersistence;
  oracle?: DecisionOracle;
  caller?: ContractCaller;
  now?: () => number;
  heartbeatMs?: number;
}

const DEFAULT_HEARTBEAT_MS = 30_000;

/** Stands in for the RPC caller when RPC_URL is unset, so every call is recorded as a transport failure. */
class UnconfiguredCaller implements ContractCaller {
  async call(): Promise<ContractCallResult> {
    throw new ContractCallError("transport", "RPC_URL is not configured");
  }
}

function isLocalDevOrigin(origin: string): boolean {
  try {
    const parsed = new URL(origin);
    return parsed.hostname === "localhost" || parsed.hostname === "127.0.0.1";
  } catch {
    return false;
  }
}

function createPersistence(env: AgentServerEnv): AgentPersistence {
  if (!env.databaseUrl) {
    return new MemoryPersistence();
  }
  return new DbPersistence(createRepositories(createDbClient(env.databaseUrl)));
}

function createCaller(env: AgentServerEnv): ContractCaller {
  if (!env.rpcUrl) return new UnconfiguredCaller();
  return new EthersContractCaller({
    rpcUrl: env.rpcUrl,
    chainId: env.chainId,
    privateKey: env.agentPrivateKey || undefined
  });
}

export async function createServer(options: ServerOptions = {}): Promise<FastifyInstance> {
  const env = options.env ?? loadEnv();
  const logger = options.logger ?? createLogger(env.logLevel);
  const fastifyLogger: FastifyBaseLogger = logger;
  const app = Fastify({ loggerInstance: fastifyLogger });

  const persistence = options.persistence ?? createPersistence(env);
  const caller = options.caller ?? createCaller(env);
  const oracle =
    options.oracle ?? (env.decisionOracleUrl ? new HttpDecisionOracle(env.decisionOracleUrl) : new RotatingOracle());
  const registry = new ConnectionRegistry();

  const pipeline = new ExecutionPipeline({
    oracle,
    caller,
    stateReader: new CallerStateReader(caller),
    persistence,
    timeoutMs: env.executionTimeoutMs,
    logger: logger.child({ component: "execution-pipeline" })
  });
  const manager = new AgentManager({
    pipeline,
    persistence,
    logger,
    tickMs: env.schedulerTickMs,
    maxConsecutiveFailures: env.maxConsecutiveFailures,
    now: options.now,
    onEvent: (agentId, event) => {
      registry.publish(agentId, event);
    }
  });

  app.decorate("agents", manager);

  await app.register(cors, {
    methods: ["GET", "OPTIONS"],
    origin(origin, cb) {
      if (!origin) return cb(null, true);
      const normalized = origin.replace(/\/$/, "");
      cb(null, normalized === env.corsOrigin.replace(/\/$/, "") || isLocalDevOrigin(normalized));
    }
  });

  await app.register(websocket);

  app.get("/health", async () => ({
    status: "ok",
    service: "agent-server",
    timestamp: new Date().toISOString(),
    agents: manager.list().length,
    connections: registry.connectedClients(),
    dependencies: {
      persistence: persistence.kind,
      oracle: options.oracle ? "custom" : env.decisionOracleUrl ? "http" : "rotating",
      rpc: options.caller || env.rpcUrl ? "configured" : "not_configured"
    }
  }));

  const attach = (socket: WebSocket, subscribeTo?: string): void => {
    const connectionId = registry.register(socket);
    const handler = new ProtocolHandler(connectionId, socket, { manager, registry, logger });
    if (subscribeTo) registry.subscribe(connectionId, subscribeTo);
    app.log.debug({ connectionId, subscribeTo }, "connection opened");

    socket.on("message", (raw: RawData) => {
      void handler.receive(raw);
    });
    socket.on("pong", () => {
      registry.markAlive(connectionId);
    });
    socket.on("error", (error: Error) => {
      app.log.warn({ err: error, connectionId }, "connection error");
    });
    socket.on("close", () => {
      void handler.disconnect();
    });
  };

  app.get("/ws", { websocket: true }, (socket) => {
    attach(socket);
  });

  app.get<{ Params: { agentId: string } }>("/ws/agent/:agentId", { websocket: true }, (socket, request) => {
    attach(socket, request.params.agentId);
  });

  await registerAgentRoutes(app, manager);

  let heartbeat: NodeJS.Timeout | undefined;
  app.addHook("onReady", async () => {
    await manager.boot();
    heartbeat = setInterval(() => {
      const dropped = registry.sweep();
      if (dropped.length > 0) app.log.info({ dropped }, "dropped unresponsive connections");
    }, options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS);
    heartbeat.unref();
  });
  app.addHook("onClose", async () => {
    clearInterval(heartbeat);
    await manager.shutdown();
    if (persistence.kind === "database") {
      await closeDbClient();
    }
  });

  return app;
}
