export interface AgentServerEnv {
  port: number;
  host: string;
  logLevel: string;
  corsOrigin: string;
  schedulerTickMs: number;
  executionTimeoutMs: number;
  maxConsecutiveFailures: number;
  rpcUrl: string;
  chainId: number;
  agentPrivateKey: string;
  decisionOracleUrl: string;
  databaseUrl: string;
}

const DEFAULT_CHAIN_ID = 57054;

function readNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readString(...values: Array<string | undefined>): string {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return "";
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AgentServerEnv {
  return {
    port: readNumber(source.PORT ?? source.WEBSOCKET_PORT, 8765),
    host: readString(source.HOST, source.WEBSOCKET_HOST) || "0.0.0.0",
    logLevel: readString(source.LOG_LEVEL) || "info",
    corsOrigin: readString(source.CORS_ORIGIN, source.DASHBOARD_URL) || "http://localhost:3000",
    schedulerTickMs: readNumber(source.SCHEDULER_TICK_MS, 250),
    executionTimeoutMs: readNumber(source.EXECUTION_TIMEOUT_MS, 30_000),
    maxConsecutiveFailures: Math.floor(readNumber(source.AGENT_MAX_CONSECUTIVE_FAILURES, 3)),
    rpcUrl: readString(source.RPC_URL, source.BLOCKCHAIN_RPC_URL),
    chainId: readNumber(source.CHAIN_ID, DEFAULT_CHAIN_ID),
    agentPrivateKey: readString(source.AGENT_PRIVATE_KEY),
    decisionOracleUrl: readString(source.DECISION_ORACLE_URL),
    databaseUrl: readString(source.DATABASE_URL)
  };
}
