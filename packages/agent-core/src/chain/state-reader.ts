import type { Agent } from "@cadence/types";
import { errorMessage } from "../contract/interface.js";
import type { ContractCaller } from "./contract-caller.js";

export interface ContractStateSnapshot {
  values: Record<string, unknown>;
  unavailable: Record<string, string>;
}

export interface ContractStateReader {
  read(agent: Agent, signal?: AbortSignal): Promise<ContractStateSnapshot>;
}

/** Reads every enabled zero-argument view function; individual failures are reported, not thrown. */
export class CallerStateReader implements ContractStateReader {
  constructor(private readonly caller: ContractCaller) {}

  async read(agent: Agent): Promise<ContractStateSnapshot> {
    const snapshot: ContractStateSnapshot = { values: {}, unavailable: {} };
    const readers = agent.functions.filter(
      (fn) => fn.enabled && fn.direction === "read" && fn.params.length === 0
    );

    await Promise.all(
      readers.map(async (fn) => {
        try {
          const result = await this.caller.call({
            contractAddress: agent.contractAddress,
            abi: fn.abi,
            signature: fn.signature,
            args: [],
            direction: "read"
          });
          if (result.kind === "value") {
            snapshot.values[fn.name] = result.value;
          }
        } catch (error) {
          snapshot.unavailable[fn.name] = errorMessage(error);
        }
      })
    );

    return snapshot;
  }
}
