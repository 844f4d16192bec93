import { getAddress } from "ethers";
import { Address, Hash } from "./types/game";

const EVM_ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const BYTES32_RE = /^0x[0-9a-fA-F]{64}$/;
const HEX_BYTES_RE = /^0x(?:[0-9a-fA-F]{2})*$/;
const UINT_RE = /^(?:0|[1-9][0-9]*)$/;

/**
 * Returns true if `value` is a valid EVM address (0x followed by 40 hex chars).
 */
export function isEvmAddress(value: unknown): value is string {
  return typeof value === "string" && EVM_ADDRESS_RE.test(value);
}

export function isBytes32(value: unknown): value is string {
  return typeof value === "string" && BYTES32_RE.test(value);
}

/** 0x-prefixed, even-length hex. */
export function isHexBytes(value: unknown): value is string {
  return typeof value === "string" && HEX_BYTES_RE.test(value);
}

/** Decimal string of an unsigned integer. */
export function isUintString(value: unknown): value is string {
  return typeof value === "string" && UINT_RE.test(value);
}

/** Checksummed form of `value`; throws on anything that is not an address. */
export function parseAddress(value: unknown): Address {
  if (!isEvmAddress(value)) {
    throw new TypeError(`Invalid address: ${String(value)}`);
  }
  return getAddress(value);
}

/** Lowercased 32-byte hex; throws on anything else. */
export function parseBytes32(value: unknown): Hash {
  if (!isBytes32(value)) {
    throw new TypeError(`Invalid bytes32: ${String(value)}`);
  }
  return value.toLowerCase();
}

export function parseUint(value: unknown): bigint {
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (!isUintString(value)) {
    throw new TypeError(`Invalid unsigned integer: ${String(value)}`);
  }
  return BigInt(value);
}
