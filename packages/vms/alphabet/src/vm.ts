import { AbiCoder, dataLength, dataSlice, keccak256, toBigInt } from "ethers";
import { Claim, Hash, IBigStepper, VMStatus, withVMStatus } from "@refute/core";

const abi = AbiCoder.defaultAbiCoder();

/** VM state data: `abi.encode(uint256 step, uint256 value)`. */
export function encodeAlphabetState(step: bigint, value: bigint): string {
  return abi.encode(["uint256", "uint256"], [step, value]);
}

export function decodeAlphabetState(stateData: string): { step: bigint; value: bigint } {
  if (dataLength(stateData) !== 64) {
    throw new Error(`Alphabet state must be 64 bytes, got ${dataLength(stateData)}`);
  }
  return {
    step: toBigInt(dataSlice(stateData, 0, 32)),
    value: toBigInt(dataSlice(stateData, 32, 64)),
  };
}

export function alphabetStateClaim(
  step: bigint,
  value: bigint,
  status: VMStatus = VMStatus.INVALID
): Claim {
  return withVMStatus(keccak256(encodeAlphabetState(step, value)), status);
}

export const ABSOLUTE_PRESTATE_DATA = encodeAlphabetState(0n, 0n);
export const ABSOLUTE_PRESTATE: Claim = alphabetStateClaim(0n, 0n, VMStatus.UNFINISHED);

/**
 * A VM whose every instruction increments both words of its state. It
 * never halts, so each post-state is tagged INVALID.
 */
export class AlphabetVM implements IBigStepper {
  constructor(private readonly oracleChallengePeriod: bigint = 0n) {}

  step(stateData: string, _proof: string, _localContext: Hash): Hash {
    const { step, value } = decodeAlphabetState(stateData);
    return alphabetStateClaim(step + 1n, value + 1n);
  }

  challengePeriod(): bigint {
    return this.oracleChallengePeriod;
  }
}
