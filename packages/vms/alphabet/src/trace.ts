import { AbiCoder, keccak256 } from "ethers";
import { Claim, Hash, LibPosition, Position } from "@refute/core";
import { ABSOLUTE_PRESTATE_DATA, alphabetStateClaim, encodeAlphabetState } from "./vm";

const abi = AbiCoder.defaultAbiCoder();

/** The honest output root of L2 sequence number `n` on the alphabet chain. */
export function alphabetOutputRoot(sequenceNumber: bigint): Hash {
  return keccak256(abi.encode(["string", "uint256"], ["alphabet", sequenceNumber]));
}

export interface AlphabetTraceOptions {
  maxGameDepth: number;
  splitDepth: number;
  /** Sequence number of the anchor the game starts from. */
  startingSequenceNumber: bigint;
  /** Sequence number the root claim is about. */
  l2SequenceNumber: bigint;
}

/**
 * What an honest actor claims at every position of an alphabet game.
 *
 * Output index `i` (at split-depth granularity) is the output root of
 * `start + 1 + i`, padded with the claimed sequence number's output past
 * it. Execution index `r` within its sub-game is the state after `r + 1`
 * instructions.
 */
export class AlphabetTrace {
  private readonly maxGameDepth: number;
  private readonly splitDepth: number;
  private readonly startingSequenceNumber: bigint;
  private readonly l2SequenceNumber: bigint;

  constructor(opts: AlphabetTraceOptions) {
    this.maxGameDepth = opts.maxGameDepth;
    this.splitDepth = opts.splitDepth;
    this.startingSequenceNumber = opts.startingSequenceNumber;
    this.l2SequenceNumber = opts.l2SequenceNumber;
  }

  rootClaim(): Claim {
    return this.claimAt(LibPosition.ROOT_POSITION);
  }

  /** Sequence number the output claim at `position` is about. */
  sequenceNumberAt(position: Position): bigint {
    const outputIndex = LibPosition.traceIndex(position, this.splitDepth);
    const sequenceNumber = this.startingSequenceNumber + 1n + outputIndex;
    return sequenceNumber < this.l2SequenceNumber ? sequenceNumber : this.l2SequenceNumber;
  }

  claimAt(position: Position): Claim {
    if (LibPosition.depth(position) <= this.splitDepth) {
      return alphabetOutputRoot(this.sequenceNumberAt(position));
    }
    const r = this.executionIndex(position);
    return alphabetStateClaim(r + 1n, r + 1n);
  }

  /**
   * Preimage of the pre-state for a step against the max-depth claim at
   * `position`.
   */
  stepData(position: Position, isAttack: boolean): string {
    const r = this.executionIndex(position);
    if (isAttack) {
      return r === 0n ? ABSOLUTE_PRESTATE_DATA : encodeAlphabetState(r, r);
    }
    return encodeAlphabetState(r + 1n, r + 1n);
  }

  /** Index of `position` within its execution sub-game's trace. */
  private executionIndex(position: Position): bigint {
    const span = 1n << BigInt(this.maxGameDepth - this.splitDepth);
    return LibPosition.traceIndex(position, this.maxGameDepth) % span;
  }
}
