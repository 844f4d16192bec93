import { parseEther } from "ethers";
import { Revert } from "@refute/core";

export const BPS = 10_000n;

/** Bond schedule: `base * multiplierBps^depth / 10000^depth`. */
export interface BondCurve {
  base: bigint;
  multiplierBps: bigint;
}

export const DEFAULT_BOND_CURVE: BondCurve = {
  base: parseEther("0.08"),
  multiplierBps: 12_500n,
};

export function validateBondCurve(curve: BondCurve): void {
  if (curve.base <= 0n) {
    throw new Revert("InvalidBondCurve", "base bond must be positive");
  }
  // A multiplier below 1.0 would make deeper claims cheaper than shallower ones.
  if (curve.multiplierBps < BPS) {
    throw new Revert("InvalidBondCurve", `multiplier ${curve.multiplierBps} bps is below ${BPS}`);
  }
}

export function requiredBond(curve: BondCurve, depth: number): bigint {
  const d = BigInt(depth);
  return (curve.base * curve.multiplierBps ** d) / BPS ** d;
}
