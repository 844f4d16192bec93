import { ZeroAddress, ZeroHash, dataLength } from "ethers";
import {
  Address,
  BondDistributionMode,
  Claim,
  ClaimData,
  Duration,
  GameData,
  GameStatus,
  GameType,
  Hash,
  IBigStepper,
  LibClock,
  LibPosition,
  MAX_POSITION_BITLEN,
  Position,
  Proposal,
  ROOT_PARENT_INDEX,
  ROOT_POSITION,
  Revert,
  Timestamp,
  VMStatus,
  decodeSequenceNumber,
  hashStateData,
  isRevert,
  localContextHash,
  parseBytes32,
  sameIgnoringStatus,
  vmStatusOf,
} from "@refute/core";
import { BondCurve, requiredBond, validateBondCurve } from "./bonds";
import { Contract } from "./Contract";
import { DelayedWETH } from "./DelayedWETH";
import {
  GameCloneArgs,
  IAnchorStateRegistry,
  IDisputeGame,
  IDisputeGameImplementation,
} from "./interfaces/IDisputeGame";
import { World } from "./World";

export interface FaultDisputeGameParams {
  gameType: GameType;
  /** Claim committing to the VM state before the first instruction of every execution trace. */
  absolutePrestate: Claim;
  maxGameDepth: number;
  /** Deepest output-bisection level; execution bisection starts one below it. */
  splitDepth: number;
  clockExtension: Duration;
  maxClockDuration: Duration;
  vm: IBigStepper;
  weth: DelayedWETH;
  anchorStateRegistry: IAnchorStateRegistry;
  l2ChainId: bigint;
  bondCurve: BondCurve;
}

export interface ResolutionCheckpoint {
  initialCheckpointComplete: boolean;
  subgameIndex: number;
  leftmostPosition: Position;
  counteredBy: Address;
}

/** The two output roots an execution sub-game is bisecting between. */
export interface ExecutionBounds {
  startingClaim: Claim;
  /** 0 when the starting output is the anchor. */
  startingPosition: Position;
  disputedClaim: Claim;
  disputedPosition: Position;
}

const MAX_UINT128 = (1n << 128n) - 1n;

export function validateFaultGameParams(params: FaultDisputeGameParams): void {
  if (params.maxGameDepth > MAX_POSITION_BITLEN - 1) {
    throw new Revert("MaxDepthTooLarge", `max depth ${params.maxGameDepth}`);
  }
  if (params.splitDepth >= params.maxGameDepth - 1 || params.splitDepth < 2) {
    throw new Revert(
      "InvalidSplitDepth",
      `split depth ${params.splitDepth} with max depth ${params.maxGameDepth}`
    );
  }
  const atSplit = params.clockExtension * 2n;
  const atBottom = params.clockExtension + params.vm.challengePeriod();
  const largest = atSplit > atBottom ? atSplit : atBottom;
  if (largest > params.maxClockDuration) {
    throw new Revert(
      "InvalidClockExtension",
      `extension of ${largest}s exceeds the ${params.maxClockDuration}s clock`
    );
  }
  validateBondCurve(params.bondCurve);
}

/**
 * Registered implementation of a permissionless fault dispute game. Its
 * parameters are checked once here and shared by every clone.
 */
export class FaultGameImplementation implements IDisputeGameImplementation {
  readonly gameType: GameType;

  constructor(
    protected readonly world: World,
    readonly address: Address,
    readonly params: FaultDisputeGameParams
  ) {
    validateFaultGameParams(params);
    this.gameType = params.gameType;
  }

  clone(address: Address, args: GameCloneArgs): FaultDisputeGame {
    return new FaultDisputeGame(this.world, address, this.params, args);
  }
}

/**
 * A bisection game over a proposed output root. Output roots are bisected
 * down to `splitDepth`; below it, claims commit to VM states and the game
 * ends in a single-instruction `step` checked by the VM.
 *
 * Each side plays against a chess clock. Once the clock of the side that
 * would have to answer a claim runs out, that claim can be resolved, and
 * resolution walks the tree bottom-up: a claim stands iff none of its
 * children stands.
 */
export class FaultDisputeGame extends Contract implements IDisputeGame {
  readonly gameType: GameType;
  readonly absolutePrestate: Claim;
  readonly maxGameDepth: number;
  readonly splitDepth: number;
  readonly clockExtension: Duration;
  readonly maxClockDuration: Duration;
  readonly l2ChainId: bigint;
  readonly gameCreator: Address;
  readonly rootClaim: Claim;
  readonly extraData: string;

  private readonly vm: IBigStepper;
  private readonly weth: DelayedWETH;
  private readonly registry: IAnchorStateRegistry;
  private readonly bondCurve: BondCurve;

  private initialized = false;
  private _status = GameStatus.IN_PROGRESS;
  private _createdAt: Timestamp = 0n;
  private _resolvedAt: Timestamp = 0n;
  private _l2SequenceNumber = 0n;
  private _startingOutputRoot: Proposal = { root: ZeroHash, l2SequenceNumber: 0n };
  private _wasRespectedGameTypeWhenCreated = false;
  private _bondDistributionMode = BondDistributionMode.UNDECIDED;

  private claims: ClaimData[] = [];
  /** `${parentIndex}:${position}` => claim index */
  private claimIndexes = new Map<string, number>();
  private subgames = new Map<number, number[]>();
  private resolvedClaims = new Set<number>();
  private checkpoints = new Map<number, ResolutionCheckpoint>();
  private normalCredit = new Map<Address, bigint>();
  private refundCredit = new Map<Address, bigint>();
  private unlockedCredit = new Set<Address>();

  constructor(world: World, address: Address, params: FaultDisputeGameParams, args: GameCloneArgs) {
    super(world, address);
    this.gameType = params.gameType;
    this.absolutePrestate = parseBytes32(params.absolutePrestate);
    this.maxGameDepth = params.maxGameDepth;
    this.splitDepth = params.splitDepth;
    this.clockExtension = params.clockExtension;
    this.maxClockDuration = params.maxClockDuration;
    this.l2ChainId = params.l2ChainId;
    this.vm = params.vm;
    this.weth = params.weth;
    this.registry = params.anchorStateRegistry;
    this.bondCurve = params.bondCurve;
    this.gameCreator = args.creator;
    this.rootClaim = parseBytes32(args.rootClaim);
    this.extraData = args.extraData;
  }

  // ---------------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------------

  get status(): GameStatus {
    return this._status;
  }

  get createdAt(): Timestamp {
    return this._createdAt;
  }

  get resolvedAt(): Timestamp {
    return this._resolvedAt;
  }

  get l2SequenceNumber(): bigint {
    return this._l2SequenceNumber;
  }

  get startingOutputRoot(): Proposal {
    return { ...this._startingOutputRoot };
  }

  get startingRootHash(): Hash {
    return this._startingOutputRoot.root;
  }

  get startingSequenceNumber(): bigint {
    return this._startingOutputRoot.l2SequenceNumber;
  }

  get wasRespectedGameTypeWhenCreated(): boolean {
    return this._wasRespectedGameTypeWhenCreated;
  }

  get anchorStateRegistry(): Address {
    return this.registry.address;
  }

  get bondDistributionMode(): BondDistributionMode {
    return this._bondDistributionMode;
  }

  get claimDataLen(): number {
    return this.claims.length;
  }

  gameData(): GameData {
    return { gameType: this.gameType, rootClaim: this.rootClaim, extraData: this.extraData };
  }

  claimData(index: number): ClaimData {
    return { ...this.claimAt(index) };
  }

  getSubgames(index: number): number[] {
    this.claimAt(index);
    return [...(this.subgames.get(index) ?? [])];
  }

  resolvedSubgames(index: number): boolean {
    return this.resolvedClaims.has(index);
  }

  resolutionCheckpoint(index: number): ResolutionCheckpoint | undefined {
    const checkpoint = this.checkpoints.get(index);
    return checkpoint ? { ...checkpoint } : undefined;
  }

  /** Children of `index` still to be scanned before it can resolve. */
  getNumToResolve(index: number): number {
    const children = this.subgames.get(index) ?? [];
    return children.length - (this.checkpoints.get(index)?.subgameIndex ?? 0);
  }

  /** Credit for the current distribution mode; normal-mode credit while undecided. */
  credit(recipient: Address): bigint {
    return this._bondDistributionMode === BondDistributionMode.REFUND
      ? this.refundModeCredit(recipient)
      : this.normalModeCredit(recipient);
  }

  normalModeCredit(recipient: Address): bigint {
    return this.normalCredit.get(recipient) ?? 0n;
  }

  refundModeCredit(recipient: Address): bigint {
    return this.refundCredit.get(recipient) ?? 0n;
  }

  hasUnlockedCredit(recipient: Address): boolean {
    return this.unlockedCredit.has(recipient);
  }

  getRequiredBond(position: Position): bigint {
    const depth = LibPosition.depth(position);
    if (depth > this.maxGameDepth) {
      throw new Revert("GameDepthExceeded", `depth ${depth}`);
    }
    return requiredBond(this.bondCurve, depth);
  }

  /**
   * Time consumed by the side that would counter claim `index`: the clock
   * carried by its parent plus the time elapsed since `index` was made,
   * capped at the maximum clock duration.
   */
  getChallengerDuration(index: number): Duration {
    this.requireInProgress();
    const subject = this.claimAt(index);
    const carried =
      subject.parentIndex === ROOT_PARENT_INDEX
        ? 0n
        : LibClock.duration(this.claims[subject.parentIndex].clock);
    const elapsed = carried + (this.now - LibClock.timestamp(subject.clock));
    return elapsed > this.maxClockDuration ? this.maxClockDuration : elapsed;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  initialize(value: bigint): void {
    if (this.initialized) {
      throw new Revert("AlreadyInitialized");
    }
    const anchor = this.registry.getAnchorRoot(this.gameType);
    if (anchor.root === ZeroHash) {
      throw new Revert("AnchorRootNotFound", `no anchor for game type ${this.gameType}`);
    }
    if (dataLength(this.extraData) !== 32) {
      throw new Revert("BadExtraData", `extra data is ${dataLength(this.extraData)} bytes`);
    }
    const sequenceNumber = decodeSequenceNumber(this.extraData);
    if (sequenceNumber <= anchor.l2SequenceNumber) {
      throw new Revert(
        "UnexpectedRootClaim",
        `sequence number ${sequenceNumber} is not past the anchor at ${anchor.l2SequenceNumber}`
      );
    }

    this.world.transfer(this.gameCreator, this.address, value);
    this.weth.deposit(this.address, value);

    this.claims.push({
      parentIndex: ROOT_PARENT_INDEX,
      counteredBy: ZeroAddress,
      claimant: this.gameCreator,
      bond: value,
      claim: this.rootClaim,
      position: ROOT_POSITION,
      clock: LibClock.wrap(0n, this.now),
    });
    this.addRefundCredit(this.gameCreator, value);

    this._startingOutputRoot = { ...anchor };
    this._l2SequenceNumber = sequenceNumber;
    this._wasRespectedGameTypeWhenCreated = this.registry.respectedGameType === this.gameType;
    this._createdAt = this.now;
    this.initialized = true;
  }

  // ---------------------------------------------------------------------------
  // Moves
  // ---------------------------------------------------------------------------

  attack(caller: Address, value: bigint, disputed: Claim, parentIndex: number, claim: Claim): number {
    return this.move(caller, value, disputed, parentIndex, claim, true);
  }

  defend(caller: Address, value: bigint, disputed: Claim, parentIndex: number, claim: Claim): number {
    return this.move(caller, value, disputed, parentIndex, claim, false);
  }

  /**
   * Counter the claim at `parentIndex`. An attack disagrees with the parent;
   * a defence agrees with it and disagrees with the trace beyond it.
   * Returns the index of the new claim.
   */
  move(
    caller: Address,
    value: bigint,
    disputed: Claim,
    parentIndex: number,
    claim: Claim,
    isAttack: boolean
  ): number {
    this.requireInProgress();
    const parent = this.claimAt(parentIndex);
    if (this.resolvedClaims.has(parentIndex)) {
      throw new Revert("ClaimAlreadyResolved", `claim ${parentIndex}`);
    }
    if (parent.claim !== parseBytes32(disputed)) {
      throw new Revert("InvalidDisputedClaimIndex", `claim ${parentIndex} is ${parent.claim}`);
    }
    const claimHash = parseBytes32(claim);

    const nextPosition = LibPosition.move(parent.position, isAttack);
    const nextDepth = LibPosition.depth(nextPosition);

    // The root and every execution sub-game root may only be attacked.
    if ((parentIndex === 0 || nextDepth === this.splitDepth + 2) && !isAttack) {
      throw new Revert("CannotDefendRootClaim");
    }
    if (nextDepth > this.maxGameDepth) {
      throw new Revert("GameDepthExceeded", `depth ${nextDepth}`);
    }
    if (nextDepth === this.splitDepth + 1) {
      this.verifyExecBisectionRoot(claimHash, parentIndex, parent.position, isAttack);
    }
    const bond = this.getRequiredBond(nextPosition);
    if (value !== bond) {
      throw new Revert("IncorrectBondAmount", `expected ${bond}, got ${value}`);
    }

    let nextDuration = this.getChallengerDuration(parentIndex);
    if (nextDuration === this.maxClockDuration) {
      throw new Revert("ClockTimeExceeded");
    }
    const extension = this.extensionFor(nextDepth);
    if (nextDuration > this.maxClockDuration - extension) {
      nextDuration = this.maxClockDuration - extension;
    }

    const key = `${parentIndex}:${nextPosition}`;
    if (this.claimIndexes.has(key)) {
      throw new Revert("ClaimAlreadyExists", `position ${nextPosition} under claim ${parentIndex}`);
    }

    this.world.transfer(caller, this.address, value);
    this.weth.deposit(this.address, value);

    const claimIndex = this.claims.length;
    this.claims.push({
      parentIndex,
      counteredBy: ZeroAddress,
      claimant: caller,
      bond: value,
      claim: claimHash,
      position: nextPosition,
      clock: LibClock.wrap(nextDuration, this.now),
    });
    this.claimIndexes.set(key, claimIndex);
    const siblings = this.subgames.get(parentIndex) ?? [];
    siblings.push(claimIndex);
    this.subgames.set(parentIndex, siblings);
    this.addRefundCredit(caller, value);

    this.emit({
      name: "Move",
      args: { parentIndex, claimIndex, position: nextPosition, claim: claimHash, claimant: caller },
    });
    return claimIndex;
  }

  /**
   * Counter the max-depth claim at `claimIndex` by executing one instruction
   * on the VM. `stateData` is the preimage of the pre-state: the absolute
   * prestate for the first instruction of an execution trace, else the
   * claim one trace index to the left of the step.
   */
  step(caller: Address, claimIndex: number, isAttack: boolean, stateData: string, proof: string): void {
    this.nonReentrant(() => {
      this.requireInProgress();
      const parent = this.claimAt(claimIndex);
      const stepPosition = LibPosition.move(parent.position, isAttack);
      if (LibPosition.depth(stepPosition) !== this.maxGameDepth + 1) {
        throw new Revert("InvalidParent", `claim ${claimIndex} is not at max depth`);
      }

      const parentTraceIndex = LibPosition.traceIndex(parent.position, this.maxGameDepth);
      let preStateClaim: Claim;
      let postState: ClaimData;
      if (isAttack) {
        const firstInstruction =
          parentTraceIndex % (1n << BigInt(this.maxGameDepth - this.splitDepth)) === 0n;
        preStateClaim = firstInstruction
          ? this.absolutePrestate
          : this.findTraceAncestor(claimIndex, parentTraceIndex - 1n, true).claim;
        postState = parent;
      } else {
        preStateClaim = parent.claim;
        postState = this.findTraceAncestor(claimIndex, parentTraceIndex + 1n, true);
      }

      if (!sameIgnoringStatus(hashStateData(stateData), preStateClaim)) {
        throw new Revert("InvalidPrestate");
      }

      const context = this.localContext(claimIndex);
      const postClaim = this.vm.step(stateData, proof, context).toLowerCase();
      const validStep = postClaim === postState.claim;
      // Whether the parent claim and the post-state claim were made by the same side.
      const parentPostAgree =
        (LibPosition.depth(parent.position) - LibPosition.depth(postState.position)) % 2 === 0;
      if (parentPostAgree === validStep) {
        throw new Revert("ValidStep");
      }
      if (parent.counteredBy !== ZeroAddress) {
        throw new Revert("DuplicateStep", `claim ${claimIndex} already countered`);
      }
      parent.counteredBy = caller;
    });
  }

  // ---------------------------------------------------------------------------
  // Resolution
  // ---------------------------------------------------------------------------

  /**
   * Resolve the subgame rooted at `claimIndex`, scanning at most
   * `numToResolve` children in this call (0 scans all that remain).
   */
  resolveClaim(_caller: Address, claimIndex: number, numToResolve = 0): void {
    this.requireInProgress();
    const subgameRoot = this.claimAt(claimIndex);
    if (this.getChallengerDuration(claimIndex) < this.maxClockDuration) {
      throw new Revert("ClockNotExpired", `claim ${claimIndex}`);
    }
    if (this.resolvedClaims.has(claimIndex)) {
      throw new Revert("ClaimAlreadyResolved", `claim ${claimIndex}`);
    }

    const children = this.subgames.get(claimIndex) ?? [];

    // Leaves: a max-depth claim may have been countered by a step.
    if (children.length === 0 && claimIndex !== 0) {
      const countered = subgameRoot.counteredBy;
      this.resolvedClaims.add(claimIndex);
      this.distributeBond(countered === ZeroAddress ? subgameRoot.claimant : countered, subgameRoot);
      this.emit({ name: "SubgameResolved", args: { claimIndex, counteredBy: countered } });
      return;
    }

    const checkpoint: ResolutionCheckpoint = this.checkpoints.get(claimIndex) ?? {
      initialCheckpointComplete: false,
      subgameIndex: 0,
      leftmostPosition: MAX_UINT128,
      counteredBy: ZeroAddress,
    };
    const next = { ...checkpoint, initialCheckpointComplete: true };
    const batch = numToResolve === 0 ? children.length : numToResolve;
    const end = Math.min(next.subgameIndex + batch, children.length);

    for (let i = next.subgameIndex; i < end; i++) {
      const childIndex = children[i];
      if (!this.resolvedClaims.has(childIndex)) {
        throw new Revert("OutOfOrderResolution", `child ${childIndex} of claim ${claimIndex}`);
      }
      const child = this.claims[childIndex];
      if (child.counteredBy === ZeroAddress && child.position < next.leftmostPosition) {
        next.counteredBy = child.claimant;
        next.leftmostPosition = child.position;
      }
    }
    next.subgameIndex = end;
    this.checkpoints.set(claimIndex, next);

    if (end === children.length) {
      this.resolvedClaims.add(claimIndex);
      subgameRoot.counteredBy = next.counteredBy;
      this.distributeBond(
        next.counteredBy === ZeroAddress ? subgameRoot.claimant : next.counteredBy,
        subgameRoot
      );
      this.emit({ name: "SubgameResolved", args: { claimIndex, counteredBy: next.counteredBy } });
    }
  }

  /** Settle the game once the root subgame is resolved. */
  resolve(_caller: Address): GameStatus {
    this.requireInProgress();
    if (!this.resolvedClaims.has(0)) {
      throw new Revert("OutOfOrderResolution", "root claim is not resolved");
    }
    this._status =
      this.claims[0].counteredBy === ZeroAddress
        ? GameStatus.DEFENDER_WINS
        : GameStatus.CHALLENGER_WINS;
    this._resolvedAt = this.now;
    this.emit({ name: "Resolved", args: { status: this._status } });
    return this._status;
  }

  // ---------------------------------------------------------------------------
  // Bonds
  // ---------------------------------------------------------------------------

  /**
   * Decide how bonds are paid out: normally when the registry considers the
   * game proper, else every claimant is refunded. Also offers the game to
   * the registry as the new anchor.
   */
  closeGame(caller: Address): void {
    if (this._bondDistributionMode !== BondDistributionMode.UNDECIDED) {
      return;
    }
    if (this.registry.paused()) {
      throw new Revert("GamePaused");
    }
    if (!this.registry.isGameFinalized(this)) {
      throw new Revert("GameNotFinalized");
    }

    try {
      this.registry.setAnchorState(caller, this);
    } catch (err) {
      // Losing or stale games are not anchor candidates.
      if (!isRevert(err, "InvalidAnchorGame")) throw err;
    }

    this._bondDistributionMode = this.registry.isGameProper(this)
      ? BondDistributionMode.NORMAL
      : BondDistributionMode.REFUND;
    this.emit({ name: "GameClosed", args: { bondDistributionMode: this._bondDistributionMode } });
  }

  /**
   * First call for a recipient unlocks their credit in the escrow; a later
   * call, once the escrow delay has passed, pays it out.
   */
  claimCredit(caller: Address, recipient: Address): void {
    this.nonReentrant(() => {
      this.closeGame(caller);
      const mode = this._bondDistributionMode;
      if (mode === BondDistributionMode.UNDECIDED) {
        throw new Revert("InvalidBondDistributionMode");
      }
      const credit =
        mode === BondDistributionMode.REFUND
          ? this.refundModeCredit(recipient)
          : this.normalModeCredit(recipient);

      if (!this.unlockedCredit.has(recipient)) {
        this.unlockedCredit.add(recipient);
        this.weth.unlock(this.address, recipient, credit);
        return;
      }
      if (credit === 0n) {
        throw new Revert("NoCreditToClaim", recipient);
      }

      this.weth.withdraw(this.address, recipient, credit);
      this.refundCredit.delete(recipient);
      this.normalCredit.delete(recipient);
      this.world.transfer(this.address, recipient, credit);
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  protected requireInProgress(): void {
    if (this._status !== GameStatus.IN_PROGRESS) {
      throw new Revert("GameNotInProgress");
    }
  }

  private claimAt(index: number): ClaimData {
    if (!Number.isInteger(index) || index < 0 || index >= this.claims.length) {
      throw new Revert("InvalidClaimIndex", `no claim at index ${index}`);
    }
    return this.claims[index];
  }

  private addRefundCredit(recipient: Address, amount: bigint): void {
    this.refundCredit.set(recipient, this.refundModeCredit(recipient) + amount);
  }

  private distributeBond(recipient: Address, claim: ClaimData): void {
    this.normalCredit.set(recipient, this.normalModeCredit(recipient) + claim.bond);
  }

  private extensionFor(nextDepth: number): Duration {
    if (nextDepth === this.maxGameDepth - 1) {
      return this.clockExtension + this.vm.challengePeriod();
    }
    if (nextDepth === this.splitDepth - 1) {
      return this.clockExtension * 2n;
    }
    return this.clockExtension;
  }

  /**
   * The first claim below the split commits to the final state of an
   * execution trace. Its status byte must say whether the claimant thinks
   * the disputed output is reachable: it cannot be VALID when the claimant
   * is arguing against that output.
   */
  private verifyExecBisectionRoot(
    rootClaim: Claim,
    parentIndex: number,
    parentPosition: Position,
    isAttack: boolean
  ): void {
    const status = vmStatusOf(rootClaim);
    let againstDisputed = isAttack;
    if (!isAttack) {
      const disputed = this.findTraceAncestor(
        parentIndex,
        LibPosition.traceIndex(parentPosition, this.splitDepth) + 1n,
        false
      );
      againstDisputed = LibPosition.depth(disputed.position) % 2 === this.splitDepth % 2;
    }
    if (againstDisputed) {
      if (status !== VMStatus.INVALID && status !== VMStatus.PANIC) {
        throw new Revert("UnexpectedRootClaim", `status ${VMStatus[status]} must be INVALID or PANIC`);
      }
    } else if (status !== VMStatus.VALID) {
      throw new Revert("UnexpectedRootClaim", `status ${VMStatus[status]} must be VALID`);
    }
  }

  /**
   * Walk from `start` towards the root and return the first claim that
   * commits to `traceIndex`, looking either at execution claims (trace
   * indices at max depth) or at output claims (indices at the split depth).
   */
  private findTraceAncestor(start: number, traceIndex: bigint, execution: boolean): ClaimData {
    const granularity = execution ? this.maxGameDepth : this.splitDepth;
    let index = start;
    for (;;) {
      const claim = this.claims[index];
      const depth = LibPosition.depth(claim.position);
      const inRange = execution ? depth > this.splitDepth : depth <= this.splitDepth;
      if (inRange && LibPosition.traceIndex(claim.position, granularity) === traceIndex) {
        return claim;
      }
      if (claim.parentIndex === ROOT_PARENT_INDEX) {
        // Unreachable through move and step.
        throw new Error(
          `Invariant violated: no ancestor of claim ${start} commits to trace index ${traceIndex}`
        );
      }
      index = claim.parentIndex;
    }
  }

  /** Output roots bounding the execution sub-game that contains `claimIndex`. */
  findExecutionBounds(claimIndex: number): ExecutionBounds {
    let claim = this.claimAt(claimIndex);
    let index = claimIndex;
    if (LibPosition.depth(claim.position) <= this.splitDepth) {
      throw new Revert("ClaimAboveSplit", `claim ${claimIndex}`);
    }

    let execRoot = claim;
    while (LibPosition.depth(claim.position) > this.splitDepth) {
      execRoot = claim;
      index = claim.parentIndex;
      claim = this.claims[index];
    }

    const outputIndex = LibPosition.traceIndex(claim.position, this.splitDepth);
    if (LibPosition.isAttackPosition(execRoot.position)) {
      if (outputIndex === 0n) {
        return {
          startingClaim: this._startingOutputRoot.root,
          startingPosition: 0n,
          disputedClaim: claim.claim,
          disputedPosition: claim.position,
        };
      }
      const starting = this.findTraceAncestor(index, outputIndex - 1n, false);
      return {
        startingClaim: starting.claim,
        startingPosition: starting.position,
        disputedClaim: claim.claim,
        disputedPosition: claim.position,
      };
    }

    const disputed = this.findTraceAncestor(index, outputIndex + 1n, false);
    return {
      startingClaim: claim.claim,
      startingPosition: claim.position,
      disputedClaim: disputed.claim,
      disputedPosition: disputed.position,
    };
  }

  private localContext(claimIndex: number): Hash {
    const bounds = this.findExecutionBounds(claimIndex);
    return localContextHash(
      bounds.startingClaim,
      bounds.startingPosition,
      bounds.disputedClaim,
      bounds.disputedPosition
    );
  }
}
