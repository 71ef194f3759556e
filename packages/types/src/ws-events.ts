import type { Agent, AgentStatus } from "./agent.js";
import type { ExecutionRecord } from "./execution.js";

export type InboundMessageType =
  | "create_agent"
  | "create_function"
  | "create_schedule"
  | "configure_agent"
  | "start_agent"
  | "stop_agent"
  | "execute"
  | "remove_agent"
  | "get_agent"
  | "list_agents"
  | "subscribe";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type WsEvent =
  | {
      type: "create_agent_response";
      data: { success: true; agent_id: string; status: AgentStatus };
    }
  | {
      type: "create_function_response";
      data: { success: true; agent_id: string; function_id: string };
    }
  | {
      type: "create_schedule_response";
      data: { success: true; agent_id: string; next_due_at: string | null };
    }
  | {
      type: "configure_agent_response" | "stop_agent_response";
      data: { success: true; agent_id: string; status: AgentStatus };
    }
  | {
      type: "start_agent_response";
      data: { success: true; agent_id: string; status: AgentStatus; next_due_at: string | null };
    }
  | { type: "remove_agent_response" | "subscribe_response"; data: { success: true; agent_id: string } }
  | { type: "get_agent_response"; data: { success: true; agent: Agent } }
  | { type: "list_agents_response"; data: { success: true; agents: Agent[] } }
  | {
      type: "execution_response";
      data:
        | { success: true; status: "started"; agent_id: string; source: ExecutionRecord["source"] }
        | { success: boolean; status: "completed"; agent_id: string; record: ExecutionRecord };
    }
  | { type: "agent_status"; data: { agent_id: string; status: AgentStatus; previous: AgentStatus } }
  | { type: "log"; data: { agent_id: string; level: LogLevel; message: string; timestamp: string } }
  | {
      type: "error";
      data: {
        success: false;
        code: string;
        message: string;
        request_type?: string;
        agent_id?: string;
      };
    };

export type WsEventType = WsEvent["type"];
