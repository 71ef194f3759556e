import { randomUUID } from "node:crypto";
import type { WsEvent } from "@cadence/types";
import { encodeEvent } from "./codec.js";

export interface ConnectionSocket {
  send: (payload: string) => void;
  ping?: () => void;
  terminate?: () => void;
}

interface ConnectionEntry {
  socket: ConnectionSocket;
  agents: Set<string>;
  alive: boolean;
}

export function sendEvent(socket: Pick<ConnectionSocket, "send">, event: WsEvent): void {
  socket.send(encodeEvent(event));
}

/**
 * Tracks open connections and which agents each one follows. Holds no agent
 * data; dropping a connection only forgets its subscriptions.
 */
export class ConnectionRegistry {
  private readonly connections = new Map<string, ConnectionEntry>();
  private readonly subscribers = new Map<string, Set<string>>();

  register(socket: ConnectionSocket, connectionId: string = randomUUID()): string {
    this.connections.set(connectionId, { socket, agents: new Set(), alive: true });
    return connectionId;
  }

  /** Forgets the connection and returns the agent ids it was subscribed to. */
  unregister(connectionId: string): string[] {
    const entry = this.connections.get(connectionId);
    if (!entry) return [];
    this.connections.delete(connectionId);
    for (const agentId of entry.agents) {
      this.detach(agentId, connectionId);
    }
    return [...entry.agents];
  }

  subscribe(connectionId: string, agentId: string): boolean {
    const entry = this.connections.get(connectionId);
    if (!entry) return false;
    entry.agents.add(agentId);
    const current = this.subscribers.get(agentId) ?? new Set<string>();
    current.add(connectionId);
    this.subscribers.set(agentId, current);
    return true;
  }

  unsubscribe(connectionId: string, agentId: string): void {
    this.connections.get(connectionId)?.agents.delete(agentId);
    this.detach(agentId, connectionId);
  }

  subscriptions(connectionId: string): string[] {
    return [...(this.connections.get(connectionId)?.agents ?? [])];
  }

  subscribersOf(agentId: string): string[] {
    return [...(this.subscribers.get(agentId) ?? [])];
  }

  send(connectionId: string, event: WsEvent): boolean {
    const entry = this.connections.get(connectionId);
    if (!entry) return false;
    try {
      sendEvent(entry.socket, event);
      return true;
    } catch {
      this.unregister(connectionId);
      return false;
    }
  }

  /** Delivers an agent event to every subscribed connection; returns the delivery count. */
  publish(agentId: string, event: WsEvent): number {
    let delivered = 0;
    for (const connectionId of this.subscribersOf(agentId)) {
      if (this.send(connectionId, event)) delivered += 1;
    }
    return delivered;
  }

  markAlive(connectionId: string): void {
    const entry = this.connections.get(connectionId);
    if (entry) entry.alive = true;
  }

  /**
   * Heartbeat pass: terminates connections that never answered the previous
   * ping, pings the rest. Returns the ids of terminated connections.
   */
  sweep(): string[] {
    const dead: string[] = [];
    for (const [connectionId, entry] of this.connections) {
      if (!entry.alive) {
        dead.push(connectionId);
        continue;
      }
      entry.alive = false;
      entry.socket.ping?.();
    }
    for (const connectionId of dead) {
      this.connections.get(connectionId)?.socket.terminate?.();
      this.unregister(connectionId);
    }
    return dead;
  }

  connectedClients(): number {
    return this.connections.size;
  }

  private detach(agentId: string, connectionId: string): void {
    const current = this.subscribers.get(agentId);
    if (!current) return;
    current.delete(connectionId);
    if (current.size === 0) this.subscribers.delete(agentId);
  }
}
