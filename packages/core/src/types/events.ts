import {
  Address,
  BondDistributionMode,
  Claim,
  GameStatus,
  GameType,
  Hash,
  Position,
} from "./game";

export type DisputeEvent =
  // Dispute game
  | {
      name: "Move";
      args: { parentIndex: number; claimIndex: number; position: Position; claim: Claim; claimant: Address };
    }
  | { name: "SubgameResolved"; args: { claimIndex: number; counteredBy: Address } }
  | { name: "Resolved"; args: { status: GameStatus } }
  | { name: "GameClosed"; args: { bondDistributionMode: BondDistributionMode } }
  // Factory
  | { name: "DisputeGameCreated"; args: { disputeProxy: Address; gameType: GameType; rootClaim: Claim } }
  | { name: "ImplementationSet"; args: { impl: Address; gameType: GameType } }
  | { name: "InitBondUpdated"; args: { gameType: GameType; newBond: bigint } }
  | { name: "OwnershipTransferred"; args: { previousOwner: Address; newOwner: Address } }
  // Anchor state registry
  | { name: "AnchorUpdated"; args: { game: Address; gameType: GameType; root: Hash; l2SequenceNumber: bigint } }
  | { name: "StartingAnchorRootSet"; args: { gameType: GameType; root: Hash; l2SequenceNumber: bigint } }
  | { name: "RespectedGameTypeSet"; args: { gameType: GameType } }
  | { name: "DisputeGameBlacklisted"; args: { game: Address } }
  | { name: "RetirementTimestampSet"; args: { timestamp: bigint } }
  // Escrow
  | { name: "Deposit"; args: { dst: Address; wad: bigint } }
  | { name: "Unlock"; args: { src: Address; guy: Address; wad: bigint } }
  | { name: "Withdrawal"; args: { src: Address; wad: bigint } }
  | { name: "Recovered"; args: { to: Address; wad: bigint } }
  | { name: "Held"; args: { guy: Address; wad: bigint } }
  // Pause flag
  | { name: "Paused"; args: { identifier: Address } }
  | { name: "Unpaused"; args: { identifier: Address } };

export type DisputeEventName = DisputeEvent["name"];

export type EventOf<N extends DisputeEventName> = Extract<DisputeEvent, { name: N }>;

export interface LogMeta {
  address: Address;
  blockNumber: bigint;
  timestamp: bigint;
  logIndex: number;
}

export type EventLog<E extends DisputeEvent = DisputeEvent> = E & LogMeta;
