import { Fragment, FunctionFragment, Interface } from "ethers";
import type { ContractInterface, FunctionDirection, FunctionParam } from "@cadence/types";

export class ContractInterfaceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractInterfaceError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return "shortMessage" in error && typeof error.shortMessage === "string" ? error.shortMessage : error.message;
  }
  return String(error);
}

/**
 * Builds an ethers Interface from a mixed list of JSON fragments and
 * human-readable signatures. Non-function fragments (events, errors,
 * constructors) are kept so the interface can decode revert data.
 */
export function parseContractInterface(abi: ContractInterface): Interface {
  if (abi.length === 0) {
    throw new ContractInterfaceError("contract interface is empty");
  }

  const fragments: Fragment[] = [];
  for (const [index, entry] of abi.entries()) {
    try {
      fragments.push(Fragment.from(entry));
    } catch (error) {
      throw new ContractInterfaceError(`invalid fragment at index ${index}: ${errorMessage(error)}`);
    }
  }

  const iface = new Interface(fragments);
  let functionCount = 0;
  iface.forEachFunction(() => {
    functionCount += 1;
  });
  if (functionCount === 0) {
    throw new ContractInterfaceError("contract interface declares no functions");
  }
  return iface;
}

export function parseFunctionSignature(signature: string): FunctionFragment {
  const trimmed = signature.trim();
  const normalized = trimmed.startsWith("function ") ? trimmed : `function ${trimmed}`;
  try {
    return FunctionFragment.from(normalized);
  } catch (error) {
    throw new ContractInterfaceError(`malformed function signature '${signature}': ${errorMessage(error)}`);
  }
}

export function functionFromJson(abi: Record<string, unknown>): FunctionFragment {
  let fragment: Fragment;
  try {
    fragment = Fragment.from(abi);
  } catch (error) {
    throw new ContractInterfaceError(`invalid function descriptor: ${errorMessage(error)}`);
  }
  if (!FunctionFragment.isFragment(fragment)) {
    throw new ContractInterfaceError(`descriptor is a ${fragment.type}, not a function`);
  }
  return fragment;
}

export function resolveFunction(iface: Interface, signature: string): FunctionFragment {
  const wanted = parseFunctionSignature(signature);
  const fragment = iface.getFunction(wanted.format("sighash"));
  if (!fragment) {
    throw new ContractInterfaceError(`function ${wanted.format("sighash")} is not part of the contract interface`);
  }
  return fragment;
}

export function directionOf(fragment: FunctionFragment): FunctionDirection {
  return fragment.constant ? "read" : "write";
}

export function fragmentParams(fragment: FunctionFragment): FunctionParam[] {
  return fragment.inputs.map((input, index) => ({
    name: input.name || `arg${index}`,
    type: input.type
  }));
}

export function fragmentToJson(fragment: FunctionFragment): Record<string, unknown> {
  const parsed: unknown = JSON.parse(fragment.format("json"));
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ContractInterfaceError("fragment did not serialize to an object");
  }
  return Object.fromEntries(Object.entries(parsed));
}

/** Encodes calldata without sending it, so bad argument values surface before any RPC traffic. */
export function encodeCall(abi: Record<string, unknown>, args: readonly unknown[]): string {
  const fragment = functionFromJson(abi);
  try {
    return new Interface([fragment]).encodeFunctionData(fragment, args);
  } catch (error) {
    throw new ContractInterfaceError(`invalid arguments for ${fragment.name}: ${errorMessage(error)}`);
  }
}
