import { z } from "zod";
import type { InboundMessageType, Schedule, WsEvent } from "@cadence/types";
import { TransportError, ValidationError } from "../errors.js";
import type { CreateAgentInput, FunctionSpecInput } from "../runtime/agent-manager.js";

export type RawFrame = string | Buffer | ArrayBuffer | Buffer[];

export interface Envelope {
  type: string;
  data: Record<string, unknown>;
}

type AgentScopedType = Exclude<InboundMessageType, "create_agent" | "create_function" | "create_schedule" | "list_agents">;

export type InboundMessage =
  | { type: "create_agent"; input: CreateAgentInput }
  | { type: "create_function"; agentId: string; spec: FunctionSpecInput }
  | { type: "create_schedule"; agentId: string; schedule: Schedule }
  | { type: AgentScopedType; agentId: string }
  | { type: "list_agents" };

const INBOUND_TYPES = [
  "create_agent",
  "create_function",
  "create_schedule",
  "configure_agent",
  "start_agent",
  "stop_agent",
  "execute",
  "remove_agent",
  "get_agent",
  "list_agents",
  "subscribe"
] as const satisfies readonly InboundMessageType[];

/** Deprecated message kinds still accepted from older clients. */
const TYPE_ALIASES: Record<string, InboundMessageType> = {
  websocket_execution: "execute",
  execute_agent: "execute"
};

/** Deprecated field names, after camelCase keys have been snake_cased. */
const FIELD_ALIASES: Record<string, string> = {
  contract_id: "contract_address",
  contract_interface: "abi",
  contract_abi: "abi",
  max_priority_fee_gwei: "max_priority_fee",
  signature: "function_signature",
  direction: "function_type",
  cron: "cron_expression"
};

const utf8 = new TextDecoder("utf-8", { fatal: true });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isInboundType(value: string): value is InboundMessageType {
  return INBOUND_TYPES.some((type) => type === value);
}

function snakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

/** Older clients send nested JSON documents as strings. */
function parseEmbeddedJson(value: unknown): unknown {
  if (typeof value !== "string") return value;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

const agentIdField = z.string().trim().min(1, "agent_id is required");
const embeddedJson = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(parseEmbeddedJson, schema);

const agentIdSchema = z.object({ agent_id: agentIdField });

const createAgentSchema = z.object({
  name: z.string().trim().min(1, "name is required"),
  description: z.string().optional(),
  owner: z.string().trim().min(1, "owner is required"),
  contract_address: z.string().trim().min(1, "contract_address is required"),
  abi: embeddedJson(
    z.array(z.union([z.string(), z.record(z.unknown())])).min(1, "abi must list at least one fragment")
  ),
  gas_limit: z.union([z.string(), z.number().int().positive()]).transform(String).optional(),
  max_priority_fee: z.union([z.string(), z.number().nonnegative()]).transform(String).optional(),
  scope: z.enum(["persistent", "connection"]).optional()
});

const createFunctionSchema = z.object({
  agent_id: agentIdField,
  function_name: z.string().optional(),
  function_signature: z.string().trim().min(1, "function_signature is required"),
  function_type: z.string().trim().min(1, "function_type is required"),
  is_enabled: z.boolean().optional(),
  validation_rules: embeddedJson(z.record(z.unknown())).optional(),
  return_rules: embeddedJson(z.record(z.unknown())).optional(),
  abi: embeddedJson(z.record(z.unknown())).optional()
});

const createScheduleSchema = z
  .object({
    agent_id: agentIdField,
    schedule_type: z.enum(["interval", "cron"]),
    interval_seconds: z.number().optional(),
    cron_expression: z.string().trim().optional(),
    is_active: z.boolean().optional()
  })
  .superRefine((value, ctx) => {
    if (value.schedule_type === "interval" && value.interval_seconds === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["interval_seconds"], message: "interval_seconds is required" });
    }
    if (value.schedule_type === "cron" && !value.cron_expression) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["cron_expression"], message: "cron_expression is required" });
    }
  });

function parseData<T extends z.ZodTypeAny>(schema: T, type: string, data: Record<string, unknown>): z.output<T> {
  const parsed = schema.safeParse(data);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  const path = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  throw new ValidationError(`Invalid ${type} payload: ${path}${issue?.message ?? "malformed"}`, {
    requestType: type
  });
}

export function frameText(raw: RawFrame): string {
  if (typeof raw === "string") return raw;
  const bytes = Array.isArray(raw) ? Buffer.concat(raw) : raw instanceof ArrayBuffer ? new Uint8Array(raw) : raw;
  try {
    return utf8.decode(bytes);
  } catch {
    throw new TransportError("Frame is not valid UTF-8");
  }
}

/** Parses the `{ type, data }` envelope. Anything that is not one is a transport-level failure. */
export function decodeEnvelope(raw: RawFrame): Envelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(frameText(raw));
  } catch (error) {
    if (error instanceof TransportError) throw error;
    throw new TransportError("Frame is not valid JSON");
  }
  if (!isRecord(parsed) || typeof parsed.type !== "string") {
    throw new TransportError("Frame is not a { type, data } envelope");
  }

  const rawData = parseEmbeddedJson(parsed.data ?? {});
  const data: Record<string, unknown> = {};
  if (isRecord(rawData)) {
    for (const [key, value] of Object.entries(rawData)) {
      const snake = snakeCase(key);
      data[FIELD_ALIASES[snake] ?? snake] = value;
    }
  }
  const topLevelAgentId = parsed.agent_id ?? parsed.agentId;
  if (data.agent_id === undefined && typeof topLevelAgentId === "string") {
    data.agent_id = topLevelAgentId;
  }

  return { type: parsed.type, data };
}

export function decodeMessage(envelope: Envelope): InboundMessage {
  const type = TYPE_ALIASES[envelope.type] ?? envelope.type;
  if (!isInboundType(type)) {
    throw new ValidationError(`Unknown message type "${envelope.type}"`, { requestType: envelope.type });
  }
  const { data } = envelope;

  switch (type) {
    case "create_agent": {
      const body = parseData(createAgentSchema, type, data);
      return {
        type,
        input: {
          name: body.name,
          description: body.description,
          owner: body.owner,
          contractAddress: body.contract_address,
          contractInterface: body.abi,
          gasLimit: body.gas_limit,
          maxPriorityFeeGwei: body.max_priority_fee,
          scope: body.scope
        }
      };
    }
    case "create_function": {
      const body = parseData(createFunctionSchema, type, data);
      return {
        type,
        agentId: body.agent_id,
        spec: {
          name: body.function_name,
          signature: body.function_signature,
          direction: body.function_type,
          enabled: body.is_enabled,
          validationRules: body.validation_rules,
          returnRules: body.return_rules,
          abi: body.abi
        }
      };
    }
    case "create_schedule": {
      const body = parseData(createScheduleSchema, type, data);
      const schedule: Schedule =
        body.schedule_type === "interval"
          ? { kind: "interval", intervalSeconds: body.interval_seconds ?? 0 }
          : { kind: "cron", expression: body.cron_expression ?? "", active: body.is_active ?? true };
      return { type, agentId: body.agent_id, schedule };
    }
    case "list_agents":
      return { type };
    case "configure_agent":
    case "start_agent":
    case "stop_agent":
    case "execute":
    case "remove_agent":
    case "get_agent":
    case "subscribe":
      return { type, agentId: parseData(agentIdSchema, type, data).agent_id };
  }
}

export function encodeEvent(event: WsEvent): string {
  return JSON.stringify(event, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value));
}
