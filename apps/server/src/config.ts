import { parseEther } from "ethers";

function int(value: string | undefined, fallback: number): number {
  return parseInt(value || String(fallback), 10);
}

function uint(value: string | undefined, fallback: bigint): bigint {
  return BigInt(value || fallback.toString());
}

export default {
  port: int(process.env.PORT, 8080),

  // Game implementation
  gameType: int(process.env.GAME_TYPE, 255),
  maxGameDepth: int(process.env.MAX_GAME_DEPTH, 8),
  splitDepth: int(process.env.SPLIT_DEPTH, 4),
  clockExtension: uint(process.env.CLOCK_EXTENSION, 3_600n),
  maxClockDuration: uint(process.env.MAX_CLOCK_DURATION, 43_200n),
  initBond: uint(process.env.INIT_BOND, parseEther("0.08")),
  bondMultiplierBps: uint(process.env.BOND_MULTIPLIER_BPS, 12_500n),
  l2ChainId: uint(process.env.L2_CHAIN_ID, 10n),

  // Escrow and registry
  withdrawalDelaySeconds: uint(process.env.WITHDRAWAL_DELAY, 86_400n),
  finalityDelaySeconds: uint(process.env.FINALITY_DELAY, 3_600n),
  /** Defaults to the alphabet chain's output root at the starting sequence number. */
  startingAnchorRoot: process.env.STARTING_ANCHOR_ROOT || "",
  startingSequenceNumber: uint(process.env.STARTING_SEQUENCE_NUMBER, 0n),

  // Roles
  owner: process.env.OWNER || "0x00000000000000000000000000000000000000a1",
  guardian: process.env.GUARDIAN || "0x00000000000000000000000000000000000000a2",
  deployer: process.env.DEPLOYER || "0x00000000000000000000000000000000000000a3",

  get bondCurve(): { base: bigint; multiplierBps: bigint } {
    return { base: this.initBond, multiplierBps: this.bondMultiplierBps };
  },
};
