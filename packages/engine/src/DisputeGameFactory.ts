import { getCreate2Address, keccak256 } from "ethers";
import {
  Address,
  Claim,
  GameType,
  Hash,
  Revert,
  Timestamp,
  gameUUID,
  isHexBytes,
  packGameId,
  parseBytes32,
} from "@refute/core";
import { Contract } from "./Contract";
import { IDisputeGame, IDisputeGameImplementation } from "./interfaces/IDisputeGame";
import { World } from "./World";

export interface GameRecord {
  proxy: IDisputeGame;
  gameType: GameType;
  timestamp: Timestamp;
}

export interface GameSearchResult {
  index: number;
  /** Packed `(gameType, timestamp, proxy)` word. */
  metadata: Hash;
  timestamp: Timestamp;
  rootClaim: Claim;
  extraData: string;
}

/**
 * Creates dispute games from registered implementations and indexes every
 * game it created, both by its (gameType, rootClaim, extraData) identity
 * and in creation order.
 */
export class DisputeGameFactory extends Contract {
  private _owner: Address;
  private implementations = new Map<GameType, IDisputeGameImplementation>();
  private bonds = new Map<GameType, bigint>();
  private byUUID = new Map<Hash, GameRecord>();
  private byAddress = new Map<Address, GameRecord>();
  private gameList: GameRecord[] = [];

  constructor(world: World, address: Address, owner: Address) {
    super(world, address);
    this._owner = owner;
  }

  get owner(): Address {
    return this._owner;
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.requireOwner(caller);
    const previousOwner = this._owner;
    this._owner = newOwner;
    this.emit({ name: "OwnershipTransferred", args: { previousOwner, newOwner } });
  }

  /** Register the implementation for `gameType`. A type's implementation can be set once. */
  setImplementation(caller: Address, gameType: GameType, impl: IDisputeGameImplementation): void {
    this.requireOwner(caller);
    if (this.implementations.has(gameType)) {
      throw new Revert("ImplementationAlreadySet", `game type ${gameType}`);
    }
    if (impl.gameType !== gameType) {
      throw new RangeError(`Implementation is for game type ${impl.gameType}, not ${gameType}`);
    }
    this.implementations.set(gameType, impl);
    this.emit({ name: "ImplementationSet", args: { impl: impl.address, gameType } });
  }

  setInitBond(caller: Address, gameType: GameType, initBond: bigint): void {
    this.requireOwner(caller);
    this.bonds.set(gameType, initBond);
    this.emit({ name: "InitBondUpdated", args: { gameType, newBond: initBond } });
  }

  gameImpls(gameType: GameType): IDisputeGameImplementation | undefined {
    return this.implementations.get(gameType);
  }

  initBonds(gameType: GameType): bigint {
    return this.bonds.get(gameType) ?? 0n;
  }

  getGameUUID(gameType: GameType, rootClaim: Claim, extraData: string): Hash {
    return gameUUID(gameType, parseBytes32(rootClaim), extraData);
  }

  /**
   * Create, initialize and record a new game. `value` is the root bond and
   * must equal the init bond of `gameType`.
   */
  create(
    caller: Address,
    value: bigint,
    gameType: GameType,
    rootClaim: Claim,
    extraData: string
  ): IDisputeGame {
    const impl = this.implementations.get(gameType);
    if (!impl) {
      throw new Revert("NoImplementation", `game type ${gameType}`);
    }
    if (value !== this.initBonds(gameType)) {
      throw new Revert("IncorrectBondAmount", `expected ${this.initBonds(gameType)}, got ${value}`);
    }
    if (!isHexBytes(extraData)) {
      throw new Revert("BadExtraData", "extra data must be hex bytes");
    }
    const root = parseBytes32(rootClaim);
    const uuid = gameUUID(gameType, root, extraData);
    if (this.byUUID.has(uuid)) {
      throw new Revert("GameAlreadyExists", uuid);
    }

    const address = getCreate2Address(this.address, uuid, keccak256(impl.address));
    const proxy = impl.clone(address, { creator: caller, rootClaim: root, extraData });
    proxy.initialize(value);

    const record: GameRecord = { proxy, gameType, timestamp: this.now };
    this.byUUID.set(uuid, record);
    this.byAddress.set(address, record);
    this.gameList.push(record);
    this.emit({ name: "DisputeGameCreated", args: { disputeProxy: address, gameType, rootClaim: root } });
    return proxy;
  }

  games(gameType: GameType, rootClaim: Claim, extraData: string): GameRecord | undefined {
    return this.byUUID.get(this.getGameUUID(gameType, rootClaim, extraData));
  }

  gameByAddress(address: Address): GameRecord | undefined {
    return this.byAddress.get(address);
  }

  gameAtIndex(index: number): GameRecord {
    const record = this.gameList[index];
    if (!record) {
      throw new RangeError(`No game at index ${index}`);
    }
    return record;
  }

  gameCount(): number {
    return this.gameList.length;
  }

  /**
   * Walk backwards from index `start` and return up to `n` games of
   * `gameType`, newest first.
   */
  findLatestGames(gameType: GameType, start: number, n: number): GameSearchResult[] {
    const results: GameSearchResult[] = [];
    if (start >= this.gameList.length || n === 0) {
      return results;
    }
    for (let i = start; i >= 0 && results.length < n; i--) {
      const record = this.gameList[i];
      if (record.gameType !== gameType) continue;
      const { rootClaim, extraData } = record.proxy.gameData();
      results.push({
        index: i,
        metadata: packGameId(record.gameType, record.timestamp, record.proxy.address),
        timestamp: record.timestamp,
        rootClaim,
        extraData,
      });
    }
    return results;
  }

  private requireOwner(caller: Address): void {
    if (caller !== this._owner) {
      throw new Revert("NotOwner");
    }
  }
}
