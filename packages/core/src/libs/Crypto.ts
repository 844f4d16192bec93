import {
  AbiCoder,
  dataLength,
  keccak256,
  toBeHex,
  toBigInt,
  zeroPadValue,
} from "ethers";
import { Address, Claim, GameType, Hash, Position, Timestamp, VMStatus } from "../types/game";

const abi = AbiCoder.defaultAbiCoder();

/** Factory identity of a game: keccak256(abi.encode(gameType, rootClaim, extraData)). */
export function gameUUID(gameType: GameType, rootClaim: Claim, extraData: string): Hash {
  return keccak256(abi.encode(["uint32", "bytes32", "bytes"], [gameType, rootClaim, extraData]));
}

export function hashStateData(stateData: string): Hash {
  return keccak256(stateData);
}

export function vmStatusOf(claim: Claim): VMStatus {
  const status = parseInt(claim.slice(2, 4), 16);
  switch (status) {
    case VMStatus.VALID:
    case VMStatus.INVALID:
    case VMStatus.PANIC:
    case VMStatus.UNFINISHED:
      return status;
    default:
      // Unknown status bytes are treated as a panicked VM.
      return VMStatus.PANIC;
  }
}

/** Overwrite the high-order byte of `hash` with `status`. */
export function withVMStatus(hash: Hash, status: VMStatus): Claim {
  return "0x" + status.toString(16).padStart(2, "0") + hash.slice(4).toLowerCase();
}

/** Compare two commitments while ignoring their status bytes. */
export function sameIgnoringStatus(a: Hash, b: Hash): boolean {
  return a.slice(4).toLowerCase() === b.slice(4).toLowerCase();
}

/** A game's extra data: the claimed L2 sequence number as one big-endian word. */
export function encodeSequenceNumber(sequenceNumber: bigint): string {
  return zeroPadValue(toBeHex(sequenceNumber), 32);
}

export function decodeSequenceNumber(extraData: string): bigint {
  if (dataLength(extraData) !== 32) {
    throw new RangeError(`Extra data must be exactly 32 bytes, got ${dataLength(extraData)}`);
  }
  return toBigInt(extraData);
}

/**
 * Identity of an execution sub-game, handed to the VM as its local context.
 * When the starting output is the anchor (position 0) only the disputed
 * output is committed to.
 */
export function localContextHash(
  startingClaim: Claim,
  startingPosition: Position,
  disputedClaim: Claim,
  disputedPosition: Position
): Hash {
  if (startingPosition === 0n) {
    return keccak256(abi.encode(["bytes32", "uint128"], [disputedClaim, disputedPosition]));
  }
  return keccak256(
    abi.encode(
      ["bytes32", "uint128", "bytes32", "uint128"],
      [startingClaim, startingPosition, disputedClaim, disputedPosition]
    )
  );
}

/** `gameType (32 bits) | timestamp (64 bits) | proxy (160 bits)` packed in one word. */
export function packGameId(gameType: GameType, timestamp: Timestamp, proxy: Address): Hash {
  const packed = (BigInt(gameType) << 224n) | (timestamp << 160n) | toBigInt(proxy);
  return zeroPadValue(toBeHex(packed), 32);
}
