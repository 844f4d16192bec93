import type Logger from "bunyan";
import { ZeroAddress } from "ethers";
import {
  Address,
  BondDistributionMode,
  Claim,
  ClaimData,
  EventLog,
  GameStatus,
  GameType,
  IBigStepper,
  LibClock,
  LibPosition,
  Proposal,
  ROOT_PARENT_INDEX,
  encodeSequenceNumber,
  isRevert,
  jsonReplacer,
} from "@refute/core";
import {
  BondCurve,
  DisputeSystem,
  FaultDisputeGame,
  World,
  deployDisputeSystem,
} from "@refute/engine";
import { ABSOLUTE_PRESTATE, AlphabetVM } from "@refute/vm-alphabet";

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export interface DisputeServiceOptions {
  deployer: Address;
  owner: Address;
  guardian: Address;
  gameType: GameType;
  maxGameDepth: number;
  splitDepth: number;
  clockExtension: bigint;
  maxClockDuration: bigint;
  bondCurve: BondCurve;
  l2ChainId: bigint;
  withdrawalDelaySeconds: bigint;
  finalityDelaySeconds: bigint;
  startingAnchor: Proposal;
  /** Genesis timestamp of the devnet ledger; the wall clock when omitted. */
  genesisTimestamp?: bigint;
  vm?: IBigStepper;
}

export interface ClaimView {
  index: number;
  parentIndex: number | null;
  position: string;
  depth: number;
  claim: Claim;
  claimant: Address;
  counteredBy: Address | null;
  bond: string;
  clockDuration: string;
  clockTimestamp: string;
  resolved: boolean;
}

export interface GameSummary {
  index: number;
  address: Address;
  gameType: GameType;
  rootClaim: Claim;
  l2SequenceNumber: string;
  status: keyof typeof GameStatus;
  createdAt: string;
}

export interface GameView extends GameSummary {
  creator: Address;
  startingOutputRoot: { root: Claim; l2SequenceNumber: string };
  resolvedAt: string | null;
  bondDistributionMode: keyof typeof BondDistributionMode;
  maxGameDepth: number;
  splitDepth: number;
  claims: ClaimView[];
}

export interface MoveParams {
  parentIndex: number;
  claim: Claim;
  isAttack: boolean;
  disputed?: Claim;
  value?: bigint;
}

export interface ValidityView {
  registered: boolean;
  respected: boolean;
  blacklisted: boolean;
  retired: boolean;
  proper: boolean;
  resolved: boolean;
  finalized: boolean;
  claimValid: boolean;
}

export interface CreditView {
  recipient: Address;
  credit: string;
  unlocked: boolean;
  withdrawal: { amount: string; timestamp: string };
}

/**
 * Devnet front for one in-memory ledger and one deployed dispute system.
 * Every state change is logged; reverts are logged and rethrown for the
 * transport to report.
 */
export class DisputeService {
  readonly world: World;
  readonly system: DisputeSystem;
  readonly gameType: GameType;

  constructor(
    opts: DisputeServiceOptions,
    private log: Logger
  ) {
    this.world = new World({
      timestamp: opts.genesisTimestamp ?? BigInt(Math.floor(Date.now() / 1000)),
    });
    this.gameType = opts.gameType;
    this.system = deployDisputeSystem(this.world, {
      deployer: opts.deployer,
      owner: opts.owner,
      guardian: opts.guardian,
      withdrawalDelaySeconds: opts.withdrawalDelaySeconds,
      finalityDelaySeconds: opts.finalityDelaySeconds,
      respectedGameType: opts.gameType,
      gameTypes: [
        {
          kind: "permissionless",
          gameType: opts.gameType,
          absolutePrestate: ABSOLUTE_PRESTATE,
          maxGameDepth: opts.maxGameDepth,
          splitDepth: opts.splitDepth,
          clockExtension: opts.clockExtension,
          maxClockDuration: opts.maxClockDuration,
          vm: opts.vm ?? new AlphabetVM(),
          l2ChainId: opts.l2ChainId,
          bondCurve: opts.bondCurve,
          startingAnchorRoot: opts.startingAnchor,
        },
      ],
    });
    // Games created in the deployment block count as retired.
    this.world.warp(1n);
    this.log.info(
      {
        factory: this.system.factory.address,
        registry: this.system.anchorStateRegistry.address,
        weth: this.system.weth.address,
        gameType: opts.gameType,
      },
      "Dispute system deployed"
    );
  }

  onEvent(listener: (log: EventLog) => void): () => void {
    return this.world.subscribe(listener);
  }

  health(): { timestamp: string; blockNumber: string; paused: boolean; games: number } {
    return {
      timestamp: this.world.timestamp.toString(),
      blockNumber: this.world.blockNumber.toString(),
      paused: this.system.anchorStateRegistry.paused(),
      games: this.system.factory.gameCount(),
    };
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  anchor(gameType: GameType): { root: Claim; l2SequenceNumber: string; game: Address | null } {
    const registry = this.system.anchorStateRegistry;
    const { root, l2SequenceNumber } = registry.getAnchorRoot(gameType);
    return {
      root,
      l2SequenceNumber: l2SequenceNumber.toString(),
      game: registry.anchorGame(gameType)?.address ?? null,
    };
  }

  listGames(): GameSummary[] {
    const summaries: GameSummary[] = [];
    for (let i = 0; i < this.system.factory.gameCount(); i++) {
      const { proxy } = this.system.factory.gameAtIndex(i);
      if (proxy instanceof FaultDisputeGame) {
        summaries.push(this.summarize(i, proxy));
      }
    }
    return summaries;
  }

  getGame(address: Address): GameView {
    const game = this.gameAt(address);
    const index = this.indexOf(game);
    const claims: ClaimView[] = [];
    for (let i = 0; i < game.claimDataLen; i++) {
      claims.push(this.viewClaim(game, i, game.claimData(i)));
    }
    return {
      ...this.summarize(index, game),
      creator: game.gameCreator,
      startingOutputRoot: {
        root: game.startingRootHash,
        l2SequenceNumber: game.startingSequenceNumber.toString(),
      },
      resolvedAt: game.resolvedAt === 0n ? null : game.resolvedAt.toString(),
      bondDistributionMode: modeName(game.bondDistributionMode),
      maxGameDepth: game.maxGameDepth,
      splitDepth: game.splitDepth,
      claims,
    };
  }

  validity(address: Address): ValidityView {
    const game = this.gameAt(address);
    const registry = this.system.anchorStateRegistry;
    return {
      registered: registry.isGameRegistered(game),
      respected: registry.isGameRespected(game),
      blacklisted: registry.isGameBlacklisted(game),
      retired: registry.isGameRetired(game),
      proper: registry.isGameProper(game),
      resolved: registry.isGameResolved(game),
      finalized: registry.isGameFinalized(game),
      claimValid: registry.isGameClaimValid(game),
    };
  }

  credit(address: Address, recipient: Address): CreditView {
    const game = this.gameAt(address);
    const { amount, timestamp } = this.system.weth.withdrawal(game.address, recipient);
    return {
      recipient,
      credit: game.credit(recipient).toString(),
      unlocked: game.hasUnlockedCredit(recipient),
      withdrawal: { amount: amount.toString(), timestamp: timestamp.toString() },
    };
  }

  // ---------------------------------------------------------------------------
  // Game operations
  // ---------------------------------------------------------------------------

  /** Propose `rootClaim` for `l2SequenceNumber`, paying the init bond unless `value` is given. */
  createGame(caller: Address, rootClaim: Claim, l2SequenceNumber: bigint, value?: bigint): GameView {
    const factory = this.system.factory;
    const bond = value ?? factory.initBonds(this.gameType);
    const game = this.execute("createGame", { caller, rootClaim, l2SequenceNumber }, () =>
      factory.create(caller, bond, this.gameType, rootClaim, encodeSequenceNumber(l2SequenceNumber))
    );
    return this.getGame(game.address);
  }

  /**
   * Attack or defend the claim at `parentIndex`. The disputed claim defaults
   * to the parent's current claim and the bond to the one required at the
   * new position.
   */
  move(address: Address, caller: Address, params: MoveParams): ClaimView {
    const game = this.gameAt(address);
    const { parentIndex, claim, isAttack } = params;
    const op = isAttack ? "attack" : "defend";
    const index = this.execute(op, { game: address, caller, parentIndex, claim }, () => {
      const parent = game.claimData(parentIndex);
      const bond = params.value ?? game.getRequiredBond(LibPosition.move(parent.position, isAttack));
      return game.move(caller, bond, params.disputed ?? parent.claim, parentIndex, claim, isAttack);
    });
    return this.viewClaim(game, index, game.claimData(index));
  }

  step(
    address: Address,
    caller: Address,
    claimIndex: number,
    isAttack: boolean,
    stateData: string,
    proof: string
  ): ClaimView {
    const game = this.gameAt(address);
    this.execute("step", { game: address, caller, claimIndex, isAttack }, () =>
      game.step(caller, claimIndex, isAttack, stateData, proof)
    );
    return this.viewClaim(game, claimIndex, game.claimData(claimIndex));
  }

  resolveClaim(address: Address, caller: Address, claimIndex: number, numToResolve = 0): ClaimView {
    const game = this.gameAt(address);
    this.execute("resolveClaim", { game: address, claimIndex, numToResolve }, () =>
      game.resolveClaim(caller, claimIndex, numToResolve)
    );
    return this.viewClaim(game, claimIndex, game.claimData(claimIndex));
  }

  resolve(address: Address, caller: Address): GameView {
    const game = this.gameAt(address);
    this.execute("resolve", { game: address }, () => game.resolve(caller));
    return this.getGame(address);
  }

  closeGame(address: Address, caller: Address): GameView {
    const game = this.gameAt(address);
    this.execute("closeGame", { game: address }, () => game.closeGame(caller));
    return this.getGame(address);
  }

  claimCredit(address: Address, caller: Address, recipient: Address): CreditView {
    const game = this.gameAt(address);
    this.execute("claimCredit", { game: address, recipient }, () => game.claimCredit(caller, recipient));
    return this.credit(address, recipient);
  }

  // ---------------------------------------------------------------------------
  // Escrow
  // ---------------------------------------------------------------------------

  escrowDeposit(caller: Address, amount: bigint): { balance: string } {
    const weth = this.system.weth;
    this.execute("escrowDeposit", { caller, amount }, () => weth.deposit(caller, amount));
    return { balance: weth.balanceOf(caller).toString() };
  }

  escrowUnlock(caller: Address, recipient: Address, amount: bigint): { amount: string; timestamp: string } {
    const weth = this.system.weth;
    this.execute("escrowUnlock", { caller, recipient, amount }, () => weth.unlock(caller, recipient, amount));
    const request = weth.withdrawal(caller, recipient);
    return { amount: request.amount.toString(), timestamp: request.timestamp.toString() };
  }

  escrowWithdraw(caller: Address, recipient: Address, amount: bigint): { balance: string } {
    const weth = this.system.weth;
    this.execute("escrowWithdraw", { caller, recipient, amount }, () =>
      weth.withdraw(caller, recipient, amount)
    );
    return { balance: weth.balanceOf(caller).toString() };
  }

  // ---------------------------------------------------------------------------
  // Guardian
  // ---------------------------------------------------------------------------

  setRespectedGameType(caller: Address, gameType: GameType): void {
    this.execute("setRespectedGameType", { caller, gameType }, () =>
      this.system.anchorStateRegistry.setRespectedGameType(caller, gameType)
    );
  }

  blacklist(caller: Address, address: Address): void {
    const game = this.gameAt(address);
    this.execute("blacklist", { caller, game: address }, () =>
      this.system.anchorStateRegistry.blacklistDisputeGame(caller, game)
    );
  }

  retire(caller: Address): { retirementTimestamp: string } {
    const registry = this.system.anchorStateRegistry;
    this.execute("retire", { caller }, () => registry.updateRetirementTimestamp(caller));
    return { retirementTimestamp: registry.retirementTimestamp.toString() };
  }

  pause(caller: Address, identifier?: Address): void {
    this.execute("pause", { caller, identifier }, () =>
      this.system.superchainConfig.pause(caller, identifier)
    );
  }

  unpause(caller: Address, identifier?: Address): void {
    this.execute("unpause", { caller, identifier }, () =>
      this.system.superchainConfig.unpause(caller, identifier)
    );
  }

  // ---------------------------------------------------------------------------
  // Devnet chain controls
  // ---------------------------------------------------------------------------

  warp(seconds: bigint): { timestamp: string } {
    this.world.warp(seconds);
    this.log.info({ seconds: seconds.toString(), timestamp: this.world.timestamp.toString() }, "Time warped");
    return { timestamp: this.world.timestamp.toString() };
  }

  deal(address: Address, amount: bigint): { balance: string } {
    this.world.deal(address, amount);
    this.log.info({ address, amount: amount.toString() }, "Funded account");
    return { balance: this.world.balanceOf(address).toString() };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private execute<T>(op: string, fields: Record<string, unknown>, fn: () => T): T {
    const logFields = { op, ...stringifyBigints(fields) };
    try {
      const result = fn();
      this.log.info(logFields, "Operation applied");
      return result;
    } catch (err) {
      if (isRevert(err)) {
        this.log.warn({ ...logFields, reason: err.reason, err: err.message }, "Operation reverted");
      } else {
        this.log.error({ ...logFields, err: err instanceof Error ? err.message : String(err) }, "Operation failed");
      }
      throw err;
    }
  }

  private gameAt(address: Address): FaultDisputeGame {
    const record = this.system.factory.gameByAddress(address);
    if (!record || !(record.proxy instanceof FaultDisputeGame)) {
      throw new NotFoundError(`No dispute game at ${address}`);
    }
    return record.proxy;
  }

  private indexOf(game: FaultDisputeGame): number {
    const factory = this.system.factory;
    for (let i = factory.gameCount() - 1; i >= 0; i--) {
      if (factory.gameAtIndex(i).proxy === game) return i;
    }
    throw new NotFoundError(`Game ${game.address} is not indexed`);
  }

  private summarize(index: number, game: FaultDisputeGame): GameSummary {
    return {
      index,
      address: game.address,
      gameType: game.gameType,
      rootClaim: game.rootClaim,
      l2SequenceNumber: game.l2SequenceNumber.toString(),
      status: statusName(game.status),
      createdAt: game.createdAt.toString(),
    };
  }

  private viewClaim(game: FaultDisputeGame, index: number, data: ClaimData): ClaimView {
    return {
      index,
      parentIndex: data.parentIndex === ROOT_PARENT_INDEX ? null : data.parentIndex,
      position: data.position.toString(),
      depth: LibPosition.depth(data.position),
      claim: data.claim,
      claimant: data.claimant,
      counteredBy: data.counteredBy === ZeroAddress ? null : data.counteredBy,
      bond: data.bond.toString(),
      clockDuration: LibClock.duration(data.clock).toString(),
      clockTimestamp: LibClock.timestamp(data.clock).toString(),
      resolved: game.resolvedSubgames(index),
    };
  }
}

function statusName(status: GameStatus): keyof typeof GameStatus {
  switch (status) {
    case GameStatus.IN_PROGRESS:
      return "IN_PROGRESS";
    case GameStatus.CHALLENGER_WINS:
      return "CHALLENGER_WINS";
    case GameStatus.DEFENDER_WINS:
      return "DEFENDER_WINS";
  }
}

function modeName(mode: BondDistributionMode): keyof typeof BondDistributionMode {
  switch (mode) {
    case BondDistributionMode.UNDECIDED:
      return "UNDECIDED";
    case BondDistributionMode.NORMAL:
      return "NORMAL";
    case BondDistributionMode.REFUND:
      return "REFUND";
  }
}

function stringifyBigints(fields: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = jsonReplacer(key, value);
  }
  return out;
}
