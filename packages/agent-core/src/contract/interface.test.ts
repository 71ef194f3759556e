import assert from "node:assert/strict";
import test from "node:test";
import {
  ContractInterfaceError,
  directionOf,
  encodeCall,
  fragmentParams,
  fragmentToJson,
  functionFromJson,
  parseContractInterface,
  parseFunctionSignature,
  resolveFunction
} from "./interface.js";

const TOKEN_ABI = [
  "function balanceOf(address owner) view returns (uint256)",
  "function totalSupply() view returns (uint256)",
  "function transfer(address to, uint256 amount) returns (bool)",
  "event Transfer(address indexed from, address indexed to, uint256 value)"
];
const RECIPIENT = "0x1111111111111111111111111111111111111111";

test("contract interface resolves declared functions with direction and params", () => {
  const iface = parseContractInterface(TOKEN_ABI);

  const transfer = resolveFunction(iface, "transfer(address,uint256)");
  assert.equal(transfer.name, "transfer");
  assert.equal(directionOf(transfer), "write");
  assert.deepEqual(fragmentParams(transfer), [
    { name: "to", type: "address" },
    { name: "amount", type: "uint256" }
  ]);

  const balanceOf = resolveFunction(iface, "function balanceOf(address)");
  assert.equal(directionOf(balanceOf), "read");
});

test("contract interface rejects empty, function-less and malformed ABIs", () => {
  assert.throws(() => parseContractInterface([]), {
    name: "ContractInterfaceError",
    message: "contract interface is empty"
  });
  assert.throws(() => parseContractInterface(["event Ping(uint256 value)"]), {
    message: "contract interface declares no functions"
  });
  assert.throws(() => parseContractInterface(["function broken("]), (error: unknown) => {
    return error instanceof ContractInterfaceError && error.message.startsWith("invalid fragment at index 0");
  });
});

test("signatures outside the interface or with bad syntax are reported", () => {
  const iface = parseContractInterface(TOKEN_ABI);
  assert.throws(() => resolveFunction(iface, "mint(address,uint256)"), {
    message: "function mint(address,uint256) is not part of the contract interface"
  });
  assert.throws(() => parseFunctionSignature("transfer(address,"), /malformed function signature/);
});

test("fragments survive a trip through their stored JSON form", () => {
  const iface = parseContractInterface(TOKEN_ABI);
  const stored = fragmentToJson(resolveFunction(iface, "transfer(address,uint256)"));
  assert.equal(stored.name, "transfer");
  assert.equal(functionFromJson(stored).format("sighash"), "transfer(address,uint256)");
  assert.throws(() => functionFromJson({ type: "event", name: "Ping", inputs: [] }), /not a function/);
});

test("encodeCall produces calldata and rejects values the ABI cannot encode", () => {
  const iface = parseContractInterface(TOKEN_ABI);
  const stored = fragmentToJson(resolveFunction(iface, "transfer(address,uint256)"));

  const calldata = encodeCall(stored, [RECIPIENT, "5"]);
  assert.equal(calldata.slice(0, 10), "0xa9059cbb");
  assert.equal(calldata.length, 2 + 8 + 64 * 2);

  assert.throws(() => encodeCall(stored, ["not-an-address", "5"]), (error: unknown) => {
    return error instanceof ContractInterfaceError && error.message.startsWith("invalid arguments for transfer:");
  });
});
