import { decodeErrorResult } from "viem";
import { type Address, type CallNode, STATUS_SUCCESS } from "../evm/types";
import { bigintToAddressString, uint8ArrayToHex } from "../utils/converter";

export const formatContractName = (address: Address, labels?: Map<Address, string>) => {
  return labels?.get(address) || bigintToAddressString(address);
};

export const formatFuncName = (calldata: Uint8Array) => {
  if (calldata.length === 0) return "fallback";
  return uint8ArrayToHex(calldata.slice(0, 4));
};

export const formatFuncArgs = (calldata: Uint8Array) => {
  return calldata.length > 4 ? uint8ArrayToHex(calldata.slice(4)) : "";
};

export const formatFuncResult = (result: Uint8Array) => {
  if (result.length === 0) return "()";
  return uint8ArrayToHex(result);
};

// Error(string) and Panic(uint256) are the only reasons decodable without an ABI
export const formatErrorResult = (status: number, result: Uint8Array) => {
  if (result.length === 0) return `EvmError: status ${status}`;

  const data = uint8ArrayToHex(result);
  try {
    const decoded = decodeErrorResult({ data });
    return `${decoded.errorName}: ${(decoded.args ?? []).map(String).join(", ")}`;
  } catch {
    return `EvmError: status ${status} ${data}`;
  }
};

export const isSuccess = (node: CallNode) => node.status === STATUS_SUCCESS;
