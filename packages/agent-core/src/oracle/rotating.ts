import type { AgentSnapshot, Decision, DecisionOracle, SnapshotFunction } from "./decision.js";

function isCallable(fn: SnapshotFunction): boolean {
  return fn.params.every((param) => fn.defaults[param.name] !== undefined);
}

/**
 * Deterministic oracle used when no remote decision service is configured:
 * walks the agent's enabled functions in order, one per cycle, calling each
 * with its default parameter values.
 */
export class RotatingOracle implements DecisionOracle {
  private readonly cursors = new Map<string, number>();

  async decide(snapshot: AgentSnapshot): Promise<Decision> {
    const callable = snapshot.functions.filter(isCallable);
    if (callable.length === 0) {
      return { action: "none", reason: "no enabled function can be called with default parameters" };
    }

    const cursor = this.cursors.get(snapshot.agentId) ?? 0;
    const chosen = callable[cursor % callable.length];
    this.cursors.set(snapshot.agentId, (cursor + 1) % callable.length);
    if (!chosen) {
      return { action: "none", reason: "no enabled function" };
    }

    return {
      action: "call",
      functionName: chosen.name,
      params: { ...chosen.defaults },
      reason: `rotation ${(cursor % callable.length) + 1}/${callable.length}`
    };
  }
}
