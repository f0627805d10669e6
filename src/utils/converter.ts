import { type Hex, bytesToHex, hexToBytes, isHex, numberToHex } from "viem";

export const hexToUint8Array = (hex: string): Uint8Array => {
  if (!isHex(hex, { strict: true })) throw new Error(`Invalid hex string: ${hex}`);
  return hexToBytes(hex);
};

export const uint8ArrayToHex = (uint8Array: Uint8Array): Hex => {
  return bytesToHex(uint8Array);
};

export const bigintToAddressString = (bigint: bigint): Hex => {
  return `0x${bigint.toString(16).padStart(40, "0")}`;
};

export const bigintToBytes32String = (bigint: bigint): Hex => {
  return `0x${bigint.toString(16).padStart(64, "0")}`;
};

// minimal 0x-prefixed quantity, "0x0" for zero
export const toQuantity = (value: bigint | number): Hex => {
  return numberToHex(value);
};
