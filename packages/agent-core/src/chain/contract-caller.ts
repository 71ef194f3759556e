import { Contract, JsonRpcProvider, Wallet, isError, parseUnits } from "ethers";
import type { FunctionDirection, ParamValue } from "@cadence/types";
import { errorMessage, functionFromJson } from "../contract/interface.js";
import { toJsonSafe } from "../utils/json.js";

export type ContractCallResult = { kind: "value"; value: unknown } | { kind: "pending"; callId: string };

export type ContractCallErrorKind = "transport" | "revert" | "interface";

export interface ContractCallRequest {
  contractAddress: string;
  abi: Record<string, unknown>;
  signature: string;
  args: ParamValue[];
  direction: FunctionDirection;
  overrides?: {
    gasLimit?: string;
    maxPriorityFeeGwei?: string;
  };
}

export interface ContractCaller {
  call(request: ContractCallRequest): Promise<ContractCallResult>;
}

export class ContractCallError extends Error {
  constructor(
    readonly kind: ContractCallErrorKind,
    message: string
  ) {
    super(message);
    this.name = "ContractCallError";
  }
}

const INTERFACE_ERROR_CODES = ["BAD_DATA", "UNSUPPORTED_OPERATION", "NUMERIC_FAULT", "INVALID_ARGUMENT"] as const;

/**
 * Maps ethers errors onto the three failure classes the pipeline cares about:
 * reverts come from the contract, interface errors mean the configured ABI
 * cannot talk to the deployed code, everything else is the RPC transport.
 */
export function classifyContractError(error: unknown): ContractCallError {
  if (error instanceof ContractCallError) return error;
  if (isError(error, "CALL_EXCEPTION")) {
    return new ContractCallError("revert", error.reason ?? error.shortMessage);
  }
  for (const code of INTERFACE_ERROR_CODES) {
    if (isError(error, code)) {
      return new ContractCallError("interface", error.shortMessage);
    }
  }
  return new ContractCallError("transport", errorMessage(error));
}

export class EthersContractCaller implements ContractCaller {
  private readonly provider: JsonRpcProvider;
  private readonly wallet: Wallet | undefined;

  constructor(input: { rpcUrl: string; chainId: number; privateKey?: string }) {
    this.provider = new JsonRpcProvider(input.rpcUrl, input.chainId, { staticNetwork: true });
    this.wallet = input.privateKey ? new Wallet(input.privateKey, this.provider) : undefined;
  }

  async call(request: ContractCallRequest): Promise<ContractCallResult> {
    const fragment = functionFromJson(request.abi);

    if (request.direction === "write" && !this.wallet) {
      throw new ContractCallError("interface", "write call requested but no signer is configured");
    }

    const contract = new Contract(request.contractAddress, [fragment], this.wallet ?? this.provider);
    const method = contract.getFunction(fragment.format("sighash"));

    try {
      if (request.direction === "read") {
        const value: unknown = await method.staticCall(...request.args);
        return { kind: "value", value: toJsonSafe(value) };
      }

      const tx = await method.send(...request.args, {
        gasLimit: request.overrides?.gasLimit ? BigInt(request.overrides.gasLimit) : undefined,
        maxPriorityFeePerGas: request.overrides?.maxPriorityFeeGwei
          ? parseUnits(request.overrides.maxPriorityFeeGwei, "gwei")
          : undefined
      });
      return { kind: "pending", callId: tx.hash };
    } catch (error) {
      throw classifyContractError(error);
    }
  }
}
