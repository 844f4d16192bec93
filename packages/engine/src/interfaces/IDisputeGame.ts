import {
  Address,
  Claim,
  GameData,
  GameStatus,
  GameType,
  Proposal,
  Timestamp,
} from "@refute/core";

// ---------------------------------------------------------------------------
// Dispute games: what the factory and the anchor registry see of a game
// ---------------------------------------------------------------------------

/** Immutable arguments a game instance is cloned with. */
export interface GameCloneArgs {
  creator: Address;
  rootClaim: Claim;
  /** 32-byte big-endian L2 sequence number. */
  extraData: string;
}

export interface IDisputeGame {
  readonly address: Address;
  readonly gameType: GameType;
  readonly gameCreator: Address;
  readonly rootClaim: Claim;
  readonly extraData: string;
  readonly l2SequenceNumber: bigint;
  readonly createdAt: Timestamp;
  /** Zero until resolved. */
  readonly resolvedAt: Timestamp;
  readonly status: GameStatus;
  /** Whether this game's type was the respected one at the moment it was created. */
  readonly wasRespectedGameTypeWhenCreated: boolean;
  /** Address of the registry this game reports to. */
  readonly anchorStateRegistry: Address;

  gameData(): GameData;

  /**
   * Called exactly once by the factory, in the same operation that creates
   * the game. `value` is the root bond, paid by the creator.
   */
  initialize(value: bigint): void;
}

/**
 * A registered game implementation. The factory clones it once per game.
 */
export interface IDisputeGameImplementation {
  readonly gameType: GameType;
  readonly address: Address;
  clone(address: Address, args: GameCloneArgs): IDisputeGame;
}

// ---------------------------------------------------------------------------
// Anchor state registry: what a game needs from its registry
// ---------------------------------------------------------------------------

export interface IAnchorStateRegistry {
  readonly address: Address;
  readonly respectedGameType: GameType;

  getAnchorRoot(gameType: GameType): Proposal;
  paused(): boolean;
  isGameProper(game: IDisputeGame): boolean;
  isGameFinalized(game: IDisputeGame): boolean;
  setAnchorState(caller: Address, game: IDisputeGame): void;
}
