/** Checksummed 20-byte hex address. */
export type Address = string;

/** 0x-prefixed 32-byte hex string, lowercase. */
export type Hash = string;

/** A claim is a 32-byte commitment: an output root, or a VM state hash with a status byte. */
export type Claim = Hash;

/** Generalized index of a node in the bisection tree. The root is 1. */
export type Position = bigint;

/** `(duration << 64) | timestamp`, see LibClock. */
export type Clock = bigint;

export type Duration = bigint;
export type Timestamp = bigint;

/** uint32 identifier of a dispute game implementation. */
export type GameType = number;

export const GameTypes = {
  CANNON: 0,
  PERMISSIONED_CANNON: 1,
  ASTERISC: 2,
  ASTERISC_KONA: 3,
  SUPER_CANNON: 4,
  SUPER_PERMISSIONED_CANNON: 5,
  OP_SUCCINCT: 6,
  FAST: 254,
  ALPHABET: 255,
} as const;

export enum GameStatus {
  IN_PROGRESS = 0,
  CHALLENGER_WINS = 1,
  DEFENDER_WINS = 2,
}

export enum BondDistributionMode {
  UNDECIDED = 0,
  NORMAL = 1,
  REFUND = 2,
}

/** Status byte carried in the high-order byte of every execution trace claim. */
export enum VMStatus {
  VALID = 0,
  INVALID = 1,
  PANIC = 2,
  UNFINISHED = 3,
}

export const ROOT_PARENT_INDEX = 0xffffffff;

export interface ClaimData {
  parentIndex: number;
  /** Zero address while uncountered. */
  counteredBy: Address;
  claimant: Address;
  bond: bigint;
  claim: Claim;
  position: Position;
  clock: Clock;
}

/** A committed output root and the L2 sequence number it is for. */
export interface Proposal {
  root: Hash;
  l2SequenceNumber: bigint;
}

export interface GameData {
  gameType: GameType;
  rootClaim: Claim;
  extraData: string;
}

/**
 * One-step state transition function of a fault proof VM.
 *
 * `step` executes a single instruction from the state whose preimage is
 * `stateData` and returns the status-tagged hash of the post-state.
 */
export interface IBigStepper {
  step(stateData: string, proof: string, localContext: Hash): Hash;
  /** Seconds the VM's preimage oracle needs to settle a large-preimage challenge. */
  challengePeriod(): bigint;
}
