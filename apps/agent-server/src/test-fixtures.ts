import pino from "pino";
import {
  directionOf,
  fragmentParams,
  fragmentToJson,
  parseFunctionSignature,
  type AgentSnapshot,
  type ContractCaller,
  type ContractCallRequest,
  type ContractCallResult,
  type Decision,
  type DecisionOracle
} from "@cadence/agent-core";
import type { Agent, AgentFunction, WsEvent } from "@cadence/types";
import type { Logger } from "./logger.js";
import type { CreateAgentInput } from "./runtime/agent-manager.js";

export const OWNER = "0x1111111111111111111111111111111111111111";
export const CONTRACT = "0x2222222222222222222222222222222222222222";
export const OTHER_CONTRACT = "0x3333333333333333333333333333333333333333";
export const RECIPIENT = "0x4444444444444444444444444444444444444444";
export const T0 = Date.parse("2026-05-04T12:00:00.000Z");

export const KEEPER_ABI = [
  "function totalSupply() view returns (uint256)",
  "function balanceOf(address owner) view returns (uint256)",
  "function poke() returns (bool)",
  "function transfer(address to, uint256 amount) returns (bool)"
];

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function agentInput(overrides: Partial<CreateAgentInput> = {}): CreateAgentInput {
  return {
    name: "keeper",
    description: "pokes the vault",
    owner: OWNER,
    contractAddress: CONTRACT,
    contractInterface: KEEPER_ABI,
    ...overrides
  };
}

export function makeFunction(declaration: string, overrides: Partial<AgentFunction> = {}): AgentFunction {
  const fragment = parseFunctionSignature(declaration);
  return {
    id: `fn-${fragment.name}`,
    agentId: "agent-1",
    name: fragment.name,
    signature: fragment.format("sighash"),
    direction: directionOf(fragment),
    enabled: true,
    params: fragmentParams(fragment),
    validationRules: {},
    abi: fragmentToJson(fragment),
    createdAt: new Date(T0).toISOString(),
    ...overrides
  };
}

export function makeAgent(functions: AgentFunction[], overrides: Partial<Agent> = {}): Agent {
  return {
    id: "agent-1",
    name: "keeper",
    description: "",
    owner: OWNER,
    contractAddress: CONTRACT,
    contractInterface: KEEPER_ABI,
    scope: "persistent",
    status: "running",
    functions,
    createdAt: new Date(T0).toISOString(),
    updatedAt: new Date(T0).toISOString(),
    ...overrides
  };
}

/** Oracle driven by a callback so each test scripts its own decisions. */
export class ScriptedOracle implements DecisionOracle {
  readonly snapshots: AgentSnapshot[] = [];

  constructor(private readonly next: (snapshot: AgentSnapshot) => Decision | Promise<Decision>) {}

  async decide(snapshot: AgentSnapshot): Promise<Decision> {
    this.snapshots.push(snapshot);
    return this.next(snapshot);
  }
}

export class FakeCaller implements ContractCaller {
  readonly calls: ContractCallRequest[] = [];

  constructor(
    private readonly respond: (request: ContractCallRequest) => ContractCallResult | Promise<ContractCallResult> = () => ({
      kind: "pending",
      callId: "0xabc"
    })
  ) {}

  async call(request: ContractCallRequest): Promise<ContractCallResult> {
    this.calls.push(request);
    return this.respond(request);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

export class FakeClock {
  constructor(public current = T0) {}

  now = (): number => this.current;

  set(value: number): void {
    this.current = value;
  }
}

export class EventLog {
  readonly events: Array<{ agentId: string; event: WsEvent }> = [];

  readonly push = (agentId: string, event: WsEvent): void => {
    this.events.push({ agentId, event });
  };

  ofType<K extends WsEvent["type"]>(type: K): Array<Extract<WsEvent, { type: K }>> {
    const matches: Array<Extract<WsEvent, { type: K }>> = [];
    for (const { event } of this.events) {
      if (isType(event, type)) matches.push(event);
    }
    return matches;
  }
}

function isType<K extends WsEvent["type"]>(event: WsEvent, type: K): event is Extract<WsEvent, { type: K }> {
  return event.type === type;
}
