import type { WsEvent } from "@cadence/types";
import { NotFoundError, toAgentError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { AgentManager } from "../runtime/agent-manager.js";
import { decodeEnvelope, decodeMessage, type Envelope, type InboundMessage, type RawFrame } from "./codec.js";
import { sendEvent, type ConnectionRegistry } from "./hub.js";

/** RFC 6455: the frame payload was not consistent with the message type. */
export const CLOSE_INVALID_PAYLOAD = 1007;

export interface ProtocolSocket {
  send: (payload: string) => void;
  close: (code?: number, reason?: string) => void;
}

export interface ProtocolHandlerDeps {
  manager: AgentManager;
  registry: ConnectionRegistry;
  logger: Logger;
}

function isoOrNull(value: string | number | undefined): string | null {
  if (value === undefined) return null;
  return typeof value === "number" ? new Date(value).toISOString() : value;
}

/**
 * One per connection. Frames are processed strictly in arrival order; each
 * maps to exactly one manager operation and at most one direct reply.
 */
export class ProtocolHandler {
  private chain: Promise<void> = Promise.resolve();
  private closed = false;
  private readonly logger: Logger;

  constructor(
    readonly connectionId: string,
    private readonly socket: ProtocolSocket,
    private readonly deps: ProtocolHandlerDeps
  ) {
    this.logger = deps.logger.child({ component: "protocol-handler", connectionId });
  }

  receive(raw: RawFrame): Promise<void> {
    this.chain = this.chain.then(() => this.process(raw));
    return this.chain;
  }

  /** Drops subscriptions and releases the connection-scoped agents this connection created. */
  async disconnect(): Promise<void> {
    this.closed = true;
    await this.chain;
    this.deps.registry.unregister(this.connectionId);
    const released = await this.deps.manager.releaseConnection(this.connectionId);
    this.logger.info({ released }, "connection closed");
  }

  private async process(raw: RawFrame): Promise<void> {
    if (this.closed) return;

    let envelope: Envelope;
    try {
      envelope = decodeEnvelope(raw);
    } catch (error) {
      const failure = toAgentError(error);
      this.logger.warn({ code: failure.code }, `closing connection: ${failure.message}`);
      this.closed = true;
      this.socket.close(CLOSE_INVALID_PAYLOAD, failure.message);
      return;
    }

    const agentId = typeof envelope.data.agent_id === "string" ? envelope.data.agent_id : undefined;
    try {
      const response = await this.dispatch(decodeMessage(envelope));
      if (response) this.reply(response);
    } catch (error) {
      const failure = toAgentError(error);
      if (failure.code === "INTERNAL_ERROR") {
        this.logger.error({ err: error, requestType: envelope.type, agentId }, "request failed");
      } else {
        this.logger.debug({ code: failure.code, requestType: envelope.type, agentId }, failure.message);
      }
      this.reply({
        type: "error",
        data: {
          success: false,
          code: failure.code,
          message: failure.message,
          request_type: envelope.type,
          agent_id: agentId
        }
      });
    }
  }

  private async dispatch(message: InboundMessage): Promise<WsEvent | undefined> {
    const { manager, registry } = this.deps;

    switch (message.type) {
      case "create_agent": {
        const agent = await manager.create(message.input, this.connectionId);
        registry.subscribe(this.connectionId, agent.id);
        return { type: "create_agent_response", data: { success: true, agent_id: agent.id, status: agent.status } };
      }
      case "create_function": {
        const fn = await this.follow(message.agentId, () => manager.addFunction(message.agentId, message.spec));
        return {
          type: "create_function_response",
          data: { success: true, agent_id: message.agentId, function_id: fn.id }
        };
      }
      case "create_schedule": {
        const result = await this.follow(message.agentId, () => manager.setSchedule(message.agentId, message.schedule));
        return {
          type: "create_schedule_response",
          data: { success: true, agent_id: message.agentId, next_due_at: isoOrNull(result.nextDueAt) }
        };
      }
      case "configure_agent":
      case "stop_agent": {
        const { type, agentId } = message;
        const agent = await this.follow(agentId, () =>
          type === "configure_agent" ? manager.configure(agentId) : manager.stop(agentId)
        );
        return {
          type: type === "configure_agent" ? "configure_agent_response" : "stop_agent_response",
          data: { success: true, agent_id: agent.id, status: agent.status }
        };
      }
      case "start_agent": {
        const agent = await this.follow(message.agentId, () => manager.start(message.agentId));
        return {
          type: "start_agent_response",
          data: { success: true, agent_id: agent.id, status: agent.status, next_due_at: isoOrNull(agent.nextDueAt) }
        };
      }
      case "execute":
        // started/completed frames reach this connection through its subscription.
        await this.follow(message.agentId, () => manager.execute(message.agentId));
        return undefined;
      case "remove_agent":
        await this.follow(message.agentId, () => manager.remove(message.agentId));
        return { type: "remove_agent_response", data: { success: true, agent_id: message.agentId } };
      case "get_agent": {
        const agent = await this.follow(message.agentId, () => manager.get(message.agentId));
        return { type: "get_agent_response", data: { success: true, agent } };
      }
      case "subscribe":
        await this.follow(message.agentId, () => manager.get(message.agentId));
        return { type: "subscribe_response", data: { success: true, agent_id: message.agentId } };
      case "list_agents":
        return { type: "list_agents_response", data: { success: true, agents: manager.list() } };
    }
  }

  /**
   * Subscribes this connection to the agent before running the operation, so
   * events it emits are delivered here; undone if the agent does not exist.
   */
  private async follow<T>(agentId: string, work: () => Promise<T>): Promise<T> {
    const registry = this.deps.registry;
    const alreadyFollowing = registry.subscriptions(this.connectionId).includes(agentId);
    registry.subscribe(this.connectionId, agentId);
    try {
      return await work();
    } catch (error) {
      if (!alreadyFollowing && error instanceof NotFoundError) {
        registry.unsubscribe(this.connectionId, agentId);
      }
      throw error;
    }
  }

  private reply(event: WsEvent): void {
    try {
      sendEvent(this.socket, event);
    } catch (error) {
      this.logger.warn({ err: error, type: event.type }, "failed to write frame");
    }
  }
}
