import type { Address } from "../evm/types";
import { hexToUint8Array } from "./converter";

export const normalizeAddress = (address: Address | string | null | undefined): Address => {
  if (!address) return 0n;
  if (typeof address === "string") return BigInt(address);
  else return address;
};

export const normalizeHex = (data: string | Uint8Array | undefined): Uint8Array => {
  if (!data) return new Uint8Array();
  if (typeof data === "string") return hexToUint8Array(data);
  else return data;
};

export const normalizeQuantity = (value: string | number | bigint): bigint => {
  return typeof value === "bigint" ? value : BigInt(value);
};
