import type { ExecutionSource, Schedule } from "@cadence/types";
import { ConflictError } from "../errors.js";
import type { Logger } from "../logger.js";
import { DueQueue } from "./due-queue.js";
import { isSchedulable, nextDueAt } from "./schedule.js";

export interface SchedulerHandle {
  stop: () => void;
}

export function startScheduler(run: () => void, intervalMs: number): SchedulerHandle {
  const handle = setInterval(run, intervalMs);

  return {
    stop: () => clearInterval(handle)
  };
}

export type ExecutionRunner = (agentId: string, source: ExecutionSource) => Promise<void>;

export interface SchedulerOptions {
  run: ExecutionRunner;
  tickMs: number;
  logger: Logger;
  now?: () => number;
  /** Called when a due agent's next occurrence cannot be computed; the agent is deregistered first. */
  onRearmError?: (agentId: string, error: unknown) => void;
}

export interface TickResult {
  dispatched: string[];
  skipped: string[];
  failed: string[];
}

/**
 * Wakes every `tickMs`, hands due agents to the runner and re-arms them. Each
 * agent has at most one execution in flight; a due time that arrives while the
 * previous run is still going is skipped rather than queued.
 */
export class Scheduler {
  private readonly queue = new DueQueue();
  private readonly schedules = new Map<string, Schedule>();
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly now: () => number;
  private handle: SchedulerHandle | null = null;

  constructor(private readonly options: SchedulerOptions) {
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.handle) return;
    this.handle = startScheduler(() => {
      try {
        this.tick();
      } catch (error) {
        this.options.logger.error({ err: error }, "scheduler tick failed");
      }
    }, this.options.tickMs);
  }

  /** Stops waking up and waits for in-flight executions to settle. */
  async stop(): Promise<void> {
    this.handle?.stop();
    this.handle = null;
    await this.idle();
  }

  register(agentId: string, schedule: Schedule, from = this.now()): number | undefined {
    this.schedules.set(agentId, schedule);
    if (!isSchedulable(schedule)) {
      this.queue.cancel(agentId);
      return undefined;
    }
    const dueAt = nextDueAt(schedule, from);
    this.queue.schedule(agentId, dueAt);
    return dueAt;
  }

  deregister(agentId: string): boolean {
    const known = this.schedules.delete(agentId);
    return this.queue.cancel(agentId) || known;
  }

  isRegistered(agentId: string): boolean {
    return this.schedules.has(agentId);
  }

  isBusy(agentId: string): boolean {
    return this.inFlight.has(agentId);
  }

  nextDueAt(agentId: string): number | undefined {
    return this.queue.dueAt(agentId);
  }

  /** Starts one execution now. Throws ConflictError when one is already running. */
  dispatch(agentId: string, source: ExecutionSource): Promise<void> {
    if (this.inFlight.has(agentId)) {
      throw new ConflictError(`Agent ${agentId} already has an execution in flight`, { agentId });
    }

    const run = this.options
      .run(agentId, source)
      .catch((error: unknown) => {
        this.options.logger.error({ err: error, agentId, source }, "execution runner failed");
      })
      .finally(() => {
        this.inFlight.delete(agentId);
      });
    this.inFlight.set(agentId, run);
    return run;
  }

  tick(now = this.now()): TickResult {
    const result: TickResult = { dispatched: [], skipped: [], failed: [] };

    for (const entry of this.queue.popDue(now)) {
      const schedule = this.schedules.get(entry.agentId);
      if (!schedule) continue;
      try {
        this.queue.schedule(entry.agentId, nextDueAt(schedule, now));
      } catch (error) {
        this.deregister(entry.agentId);
        this.options.logger.error({ err: error, agentId: entry.agentId }, "could not compute next due time");
        result.failed.push(entry.agentId);
        this.options.onRearmError?.(entry.agentId, error);
        continue;
      }

      if (this.inFlight.has(entry.agentId)) {
        this.options.logger.debug({ agentId: entry.agentId }, "skipping due time; previous execution still running");
        result.skipped.push(entry.agentId);
        continue;
      }
      void this.dispatch(entry.agentId, "scheduler");
      result.dispatched.push(entry.agentId);
    }

    return result;
  }

  async idle(agentId?: string): Promise<void> {
    if (agentId !== undefined) {
      await this.inFlight.get(agentId);
      return;
    }
    await Promise.all([...this.inFlight.values()]);
  }
}
