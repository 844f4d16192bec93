import { ZeroHash } from "ethers";
import {
  Address,
  GameStatus,
  GameType,
  Proposal,
  Revert,
  Timestamp,
  parseBytes32,
} from "@refute/core";
import { Contract } from "./Contract";
import { DisputeGameFactory } from "./DisputeGameFactory";
import { IAnchorStateRegistry, IDisputeGame } from "./interfaces/IDisputeGame";
import { GLOBAL_PAUSE_IDENTIFIER, IPauseFlag } from "./SuperchainConfig";
import { World } from "./World";

export interface AnchorStateRegistryOptions {
  guardian: Address;
  factory: DisputeGameFactory;
  pauseFlag: IPauseFlag;
  /** Identifier checked on the pause flag; the global one by default. */
  pauseIdentifier?: Address;
  finalityDelaySeconds: bigint;
  respectedGameType: GameType;
  startingAnchorRoots: Array<{ gameType: GameType; root: Proposal }>;
}

/**
 * Source of truth for which games may be trusted, and holder of the anchor
 * (latest finalized, valid root) that new games of each type start from.
 */
export class AnchorStateRegistry extends Contract implements IAnchorStateRegistry {
  readonly guardian: Address;
  readonly factory: DisputeGameFactory;
  readonly disputeGameFinalityDelaySeconds: bigint;
  private readonly pauseFlag: IPauseFlag;
  private readonly pauseIdentifier: Address;

  private _respectedGameType: GameType;
  private _retirementTimestamp: Timestamp;
  private startingAnchorRoots = new Map<GameType, Proposal>();
  private anchorGames = new Map<GameType, IDisputeGame>();
  private blacklist = new Set<Address>();

  constructor(world: World, address: Address, opts: AnchorStateRegistryOptions) {
    super(world, address);
    this.guardian = opts.guardian;
    this.factory = opts.factory;
    this.pauseFlag = opts.pauseFlag;
    this.pauseIdentifier = opts.pauseIdentifier ?? GLOBAL_PAUSE_IDENTIFIER;
    this.disputeGameFinalityDelaySeconds = opts.finalityDelaySeconds;
    this._respectedGameType = opts.respectedGameType;
    // Games created in the same block as the registry are already retired.
    this._retirementTimestamp = this.now;
    for (const { gameType, root } of opts.startingAnchorRoots) {
      this.startingAnchorRoots.set(gameType, {
        root: parseBytes32(root.root),
        l2SequenceNumber: root.l2SequenceNumber,
      });
    }
  }

  get respectedGameType(): GameType {
    return this._respectedGameType;
  }

  get retirementTimestamp(): Timestamp {
    return this._retirementTimestamp;
  }

  anchorGame(gameType: GameType): IDisputeGame | undefined {
    return this.anchorGames.get(gameType);
  }

  getAnchorRoot(gameType: GameType): Proposal {
    const game = this.anchorGames.get(gameType);
    if (game) {
      return { root: game.rootClaim, l2SequenceNumber: game.l2SequenceNumber };
    }
    const starting = this.startingAnchorRoots.get(gameType);
    return starting ? { ...starting } : { root: ZeroHash, l2SequenceNumber: 0n };
  }

  anchors(gameType: GameType): Proposal {
    return this.getAnchorRoot(gameType);
  }

  paused(): boolean {
    return this.pauseFlag.paused(this.pauseIdentifier);
  }

  // ---------------------------------------------------------------------------
  // Predicates
  // ---------------------------------------------------------------------------

  /** Created by our factory under its own identity, and reporting to this registry. */
  isGameRegistered(game: IDisputeGame): boolean {
    const { gameType, rootClaim, extraData } = game.gameData();
    const record = this.factory.games(gameType, rootClaim, extraData);
    return record?.proxy.address === game.address && game.anchorStateRegistry === this.address;
  }

  isGameBlacklisted(game: IDisputeGame): boolean {
    return this.blacklist.has(game.address);
  }

  isGameRetired(game: IDisputeGame): boolean {
    return game.createdAt <= this._retirementTimestamp;
  }

  /** Whether the game's type was respected when it was created, not whether it is now. */
  isGameRespected(game: IDisputeGame): boolean {
    return game.wasRespectedGameTypeWhenCreated;
  }

  isGameProper(game: IDisputeGame): boolean {
    return (
      this.isGameRegistered(game) &&
      !this.isGameBlacklisted(game) &&
      !this.isGameRetired(game) &&
      !this.paused()
    );
  }

  isGameResolved(game: IDisputeGame): boolean {
    return (
      game.resolvedAt !== 0n &&
      (game.status === GameStatus.DEFENDER_WINS || game.status === GameStatus.CHALLENGER_WINS)
    );
  }

  /** Strictly more than the finality delay has passed since resolution. */
  isGameAirgapped(game: IDisputeGame): boolean {
    return this.now - game.resolvedAt > this.disputeGameFinalityDelaySeconds;
  }

  isGameFinalized(game: IDisputeGame): boolean {
    return this.isGameResolved(game) && this.isGameAirgapped(game);
  }

  isGameClaimValid(game: IDisputeGame): boolean {
    return (
      this.isGameProper(game) &&
      this.isGameRespected(game) &&
      this.isGameFinalized(game) &&
      game.status === GameStatus.DEFENDER_WINS
    );
  }

  // ---------------------------------------------------------------------------
  // Anchor updates
  // ---------------------------------------------------------------------------

  /** Make `game` the anchor of its type. Anchors only move forward. */
  setAnchorState(_caller: Address, game: IDisputeGame): void {
    if (!this.isGameClaimValid(game)) {
      throw new Revert("InvalidAnchorGame", `${game.address} is not a valid claim`);
    }
    const current = this.getAnchorRoot(game.gameType);
    if (game.l2SequenceNumber <= current.l2SequenceNumber) {
      throw new Revert(
        "InvalidAnchorGame",
        `sequence number ${game.l2SequenceNumber} does not advance the anchor at ${current.l2SequenceNumber}`
      );
    }
    this.anchorGames.set(game.gameType, game);
    this.emit({
      name: "AnchorUpdated",
      args: {
        game: game.address,
        gameType: game.gameType,
        root: game.rootClaim,
        l2SequenceNumber: game.l2SequenceNumber,
      },
    });
  }

  // ---------------------------------------------------------------------------
  // Guardian
  // ---------------------------------------------------------------------------

  setRespectedGameType(caller: Address, gameType: GameType): void {
    this.requireGuardian(caller);
    this._respectedGameType = gameType;
    this.emit({ name: "RespectedGameTypeSet", args: { gameType } });
  }

  blacklistDisputeGame(caller: Address, game: IDisputeGame): void {
    this.requireGuardian(caller);
    this.blacklist.add(game.address);
    this.emit({ name: "DisputeGameBlacklisted", args: { game: game.address } });
  }

  /** Retire every game created up to now. */
  updateRetirementTimestamp(caller: Address): void {
    this.requireGuardian(caller);
    if (this.now > this._retirementTimestamp) {
      this._retirementTimestamp = this.now;
    }
    this.emit({ name: "RetirementTimestampSet", args: { timestamp: this._retirementTimestamp } });
  }

  /** Seed the anchor of a game type that has no anchor game yet. */
  setStartingAnchorRoot(caller: Address, gameType: GameType, root: Proposal): void {
    this.requireGuardian(caller);
    if (this.anchorGames.has(gameType)) {
      throw new Revert("AnchorGameExists", `game type ${gameType} already has an anchor game`);
    }
    const current = this.getAnchorRoot(gameType);
    if (root.l2SequenceNumber < current.l2SequenceNumber) {
      throw new Revert(
        "AnchorRootRegression",
        `sequence number ${root.l2SequenceNumber} is below the anchor at ${current.l2SequenceNumber}`
      );
    }
    const proposal = { root: parseBytes32(root.root), l2SequenceNumber: root.l2SequenceNumber };
    this.startingAnchorRoots.set(gameType, proposal);
    this.emit({ name: "StartingAnchorRootSet", args: { gameType, ...proposal } });
  }

  private requireGuardian(caller: Address): void {
    if (caller !== this.guardian) {
      throw new Revert("Unauthorized", "only the guardian");
    }
  }
}
