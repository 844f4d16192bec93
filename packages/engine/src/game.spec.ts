import { strict as assert } from "assert";
import { ZeroAddress, keccak256, toUtf8Bytes } from "ethers";
import {
  BondDistributionMode,
  GameStatus,
  Hash,
  IBigStepper,
  LibClock,
  ROOT_PARENT_INDEX,
  RevertReason,
  VMStatus,
  encodeSequenceNumber,
  isRevert,
  localContextHash,
  withVMStatus,
} from "@refute/core";
import { AlphabetVM, alphabetOutputRoot, encodeAlphabetState } from "@refute/vm-alphabet";
import { FaultDisputeGame, FaultGameImplementation } from "./FaultDisputeGame";
import {
  CHALLENGER,
  CLOCK_EXTENSION,
  FINALITY_DELAY,
  FUNDING,
  GAME_TYPE,
  GUARDIAN,
  Harness,
  MAX_CLOCK_DURATION,
  PERMISSIONED_GAME_TYPE,
  PROPOSER,
  STARTING_ANCHOR,
  STRANGER,
  TRACE,
  WITHDRAWAL_DELAY,
  addr,
  bond,
  createGame,
  resolveAll,
  setup,
} from "./testing/harness";

const BAD_ROOT = keccak256(toUtf8Bytes("bad root"));
const BOGUS_OUTPUT = keccak256(toUtf8Bytes("bogus output"));
const BOGUS_LEAF = withVMStatus(keccak256(toUtf8Bytes("bogus leaf")), VMStatus.INVALID);

function reverts(reason: RevertReason) {
  return (err: unknown) => isRevert(err, reason);
}

/**
 * Dishonest proposer: the root is wrong about sequence number 4, and the
 * challenger bisects down to a single instruction.
 *
 *   0 root  pos 1   proposer   BAD_ROOT
 *   1       pos 2   challenger output(2)     attack 0
 *   2       pos 5   proposer   output(3)     defend 1
 *   3       pos 11  challenger exec root     defend 2
 *   4       pos 22  proposer   leaf          attack 3
 */
function playToLeaf(h: Harness, leafClaim: Hash): FaultDisputeGame {
  const game = createGame(h, { rootClaim: BAD_ROOT });
  game.attack(CHALLENGER, bond(1), BAD_ROOT, 0, TRACE.claimAt(2n));
  game.defend(PROPOSER, bond(2), TRACE.claimAt(2n), 1, TRACE.claimAt(5n));
  game.defend(CHALLENGER, bond(3), TRACE.claimAt(5n), 2, TRACE.claimAt(11n));
  game.attack(PROPOSER, bond(4), TRACE.claimAt(11n), 3, leafClaim);
  return game;
}

describe("FaultDisputeGame", () => {
  let h: Harness;

  beforeEach(() => {
    h = setup();
  });

  describe("initialize", () => {
    it("should push the root claim and escrow its bond", () => {
      const game = createGame(h);
      const createdAt = h.world.timestamp;

      assert.deepEqual(game.claimData(0), {
        parentIndex: ROOT_PARENT_INDEX,
        counteredBy: ZeroAddress,
        claimant: PROPOSER,
        bond: 100n,
        claim: TRACE.rootClaim(),
        position: 1n,
        clock: LibClock.wrap(0n, createdAt),
      });
      assert.equal(game.status, GameStatus.IN_PROGRESS);
      assert.equal(game.createdAt, createdAt);
      assert.equal(game.l2SequenceNumber, 4n);
      assert.deepEqual(game.startingOutputRoot, STARTING_ANCHOR);
      assert.equal(game.wasRespectedGameTypeWhenCreated, true);
      assert.equal(game.refundModeCredit(PROPOSER), 100n);
      assert.equal(h.system.weth.balanceOf(game.address), 100n);
      assert.equal(h.world.balanceOf(PROPOSER), FUNDING - 100n);
    });

    it("should reject a root that does not advance the anchor, leaving nothing behind", () => {
      assert.throws(() => createGame(h, { sequenceNumber: 0n }), reverts("UnexpectedRootClaim"));
      assert.equal(h.system.factory.gameCount(), 0);
      assert.equal(h.world.balanceOf(PROPOSER), FUNDING);
    });

    it("should reject extra data that is not one word", () => {
      assert.throws(
        () => h.system.factory.create(PROPOSER, 100n, GAME_TYPE, TRACE.rootClaim(), "0x1234"),
        reverts("BadExtraData")
      );
    });

    it("should not initialize twice", () => {
      const game = createGame(h);
      assert.throws(() => game.initialize(0n), reverts("AlreadyInitialized"));
    });
  });

  describe("implementation parameters", () => {
    function params(overrides: Partial<FaultGameImplementation["params"]>) {
      const impl = h.system.implementations.get(GAME_TYPE);
      assert.ok(impl);
      return { ...impl.params, ...overrides };
    }

    it("should require the split above the last two levels", () => {
      assert.throws(
        () => new FaultGameImplementation(h.world, addr(0x99), params({ splitDepth: 3 })),
        reverts("InvalidSplitDepth")
      );
      assert.throws(
        () => new FaultGameImplementation(h.world, addr(0x99), params({ splitDepth: 1 })),
        reverts("InvalidSplitDepth")
      );
    });

    it("should bound the maximum depth", () => {
      assert.throws(
        () => new FaultGameImplementation(h.world, addr(0x99), params({ maxGameDepth: 126 })),
        reverts("MaxDepthTooLarge")
      );
    });

    it("should keep every clock extension within the clock", () => {
      assert.throws(
        () => new FaultGameImplementation(h.world, addr(0x99), params({ clockExtension: 30_000n })),
        reverts("InvalidClockExtension")
      );
      assert.throws(
        () =>
          new FaultGameImplementation(h.world, addr(0x99), params({ vm: new AlphabetVM(40_000n) })),
        reverts("InvalidClockExtension")
      );
    });

    it("should reject a bond curve that shrinks with depth", () => {
      assert.throws(
        () =>
          new FaultGameImplementation(
            h.world,
            addr(0x99),
            params({ bondCurve: { base: 100n, multiplierBps: 9_000n } })
          ),
        reverts("InvalidBondCurve")
      );
    });
  });

  describe("move", () => {
    it("should attack the root at position 2", () => {
      const game = createGame(h);
      const now = h.world.timestamp;
      const index = game.attack(CHALLENGER, bond(1), TRACE.rootClaim(), 0, BOGUS_OUTPUT);

      assert.equal(index, 1);
      const claim = game.claimData(1);
      assert.equal(claim.position, 2n);
      assert.equal(claim.parentIndex, 0);
      assert.equal(claim.bond, 200n);
      assert.equal(claim.claimant, CHALLENGER);
      assert.equal(claim.clock, LibClock.wrap(0n, now));
      assert.deepEqual(game.getSubgames(0), [1]);
      assert.equal(h.system.weth.balanceOf(game.address), 300n);

      const [log] = h.world.logsOf("Move", game.address);
      assert.deepEqual(log.args, {
        parentIndex: 0,
        claimIndex: 1,
        position: 2n,
        claim: BOGUS_OUTPUT,
        claimant: CHALLENGER,
      });
    });

    it("should defend at 2p + 1", () => {
      const game = createGame(h);
      game.attack(CHALLENGER, bond(1), TRACE.rootClaim(), 0, BOGUS_OUTPUT);
      game.defend(PROPOSER, bond(2), BOGUS_OUTPUT, 1, TRACE.claimAt(5n));
      assert.equal(game.claimData(2).position, 5n);
    });

    it("should reject a second claim at the same position under the same parent", () => {
      const game = createGame(h);
      game.attack(CHALLENGER, bond(1), TRACE.rootClaim(), 0, BOGUS_OUTPUT);
      const before = h.world.balanceOf(STRANGER);

      assert.throws(
        () => game.attack(STRANGER, bond(1), TRACE.rootClaim(), 0, TRACE.claimAt(2n)),
        reverts("ClaimAlreadyExists")
      );
      assert.equal(game.claimDataLen, 2);
      assert.equal(h.world.balanceOf(STRANGER), before);
      assert.equal(h.system.weth.balanceOf(game.address), 300n);
    });

    it("should check the disputed claim, the parent index and the bond", () => {
      const game = createGame(h);
      assert.throws(
        () => game.attack(CHALLENGER, bond(1), BAD_ROOT, 0, BOGUS_OUTPUT),
        reverts("InvalidDisputedClaimIndex")
      );
      assert.throws(
        () => game.attack(CHALLENGER, bond(1), BAD_ROOT, 5, BOGUS_OUTPUT),
        reverts("InvalidClaimIndex")
      );
      assert.throws(
        () => game.attack(CHALLENGER, bond(0), TRACE.rootClaim(), 0, BOGUS_OUTPUT),
        reverts("IncorrectBondAmount")
      );
      assert.equal(h.world.balanceOf(CHALLENGER), FUNDING);
    });

    it("should not defend the root", () => {
      const game = createGame(h);
      assert.throws(
        () => game.defend(CHALLENGER, bond(1), TRACE.rootClaim(), 0, BOGUS_OUTPUT),
        reverts("CannotDefendRootClaim")
      );
    });

    it("should not defend the root of an execution sub-game", () => {
      const game = createGame(h, { rootClaim: BAD_ROOT });
      game.attack(CHALLENGER, bond(1), BAD_ROOT, 0, TRACE.claimAt(2n));
      game.defend(PROPOSER, bond(2), TRACE.claimAt(2n), 1, TRACE.claimAt(5n));
      game.defend(CHALLENGER, bond(3), TRACE.claimAt(5n), 2, TRACE.claimAt(11n));
      assert.throws(
        () => game.defend(PROPOSER, bond(4), TRACE.claimAt(11n), 3, BOGUS_LEAF),
        reverts("CannotDefendRootClaim")
      );
    });

    it("should not move below the maximum depth", () => {
      const game = playToLeaf(h, BOGUS_LEAF);
      assert.throws(
        () => game.attack(CHALLENGER, bond(4), BOGUS_LEAF, 4, BOGUS_LEAF),
        reverts("GameDepthExceeded")
      );
    });

    it("should check the status byte of an execution sub-game root", () => {
      const game = createGame(h, { rootClaim: BAD_ROOT });
      game.attack(CHALLENGER, bond(1), BAD_ROOT, 0, TRACE.claimAt(2n));
      game.defend(PROPOSER, bond(2), TRACE.claimAt(2n), 1, TRACE.claimAt(5n));
      // Disputing the root output, which the other side posted: must not be VALID.
      const valid = withVMStatus(TRACE.claimAt(11n), VMStatus.VALID);
      assert.throws(
        () => game.defend(CHALLENGER, bond(3), TRACE.claimAt(5n), 2, valid),
        reverts("UnexpectedRootClaim")
      );
      // Attacking an output always argues the transition is invalid.
      assert.throws(
        () => game.attack(CHALLENGER, bond(3), TRACE.claimAt(5n), 2, valid),
        reverts("UnexpectedRootClaim")
      );
      const panic = withVMStatus(TRACE.claimAt(11n), VMStatus.PANIC);
      assert.equal(game.attack(CHALLENGER, bond(3), TRACE.claimAt(5n), 2, panic), 3);
    });

    it("should not move on a resolved claim", () => {
      const game = createGame(h);
      game.attack(CHALLENGER, bond(1), TRACE.rootClaim(), 0, BOGUS_OUTPUT);
      h.world.warp(MAX_CLOCK_DURATION);
      game.resolveClaim(STRANGER, 1);
      assert.throws(
        () => game.attack(PROPOSER, bond(2), BOGUS_OUTPUT, 1, TRACE.claimAt(4n)),
        reverts("ClaimAlreadyResolved")
      );
    });
  });

  describe("clocks", () => {
    it("should cap the mover's clock so the grace extension remains", () => {
      const game = createGame(h);
      h.world.warp(MAX_CLOCK_DURATION - 100n);
      game.attack(CHALLENGER, bond(1), TRACE.rootClaim(), 0, BOGUS_OUTPUT);

      // Depth 1 sits right above the split, where the extension doubles.
      const clock = game.claimData(1).clock;
      assert.equal(LibClock.duration(clock), MAX_CLOCK_DURATION - 2n * CLOCK_EXTENSION);
      assert.equal(LibClock.timestamp(clock), h.world.timestamp);
    });

    it("should accumulate each side's time across moves", () => {
      const game = createGame(h);
      h.world.warp(100n);
      game.attack(CHALLENGER, bond(1), TRACE.rootClaim(), 0, BOGUS_OUTPUT);
      h.world.warp(50n);
      game.attack(PROPOSER, bond(2), BOGUS_OUTPUT, 1, TRACE.claimAt(4n));
      h.world.warp(30n);

      assert.equal(LibClock.duration(game.claimData(1).clock), 100n);
      assert.equal(LibClock.duration(game.claimData(2).clock), 50n);
      // The challenger answering claim 2 has used 100s plus the 30s since.
      assert.equal(game.getChallengerDuration(2), 130n);
    });

    it("should refuse moves once the mover's clock has run out", () => {
      const game = createGame(h);
      h.world.warp(MAX_CLOCK_DURATION);
      assert.equal(game.getChallengerDuration(0), MAX_CLOCK_DURATION);
      assert.throws(
        () => game.attack(CHALLENGER, bond(1), TRACE.rootClaim(), 0, BOGUS_OUTPUT),
        reverts("ClockTimeExceeded")
      );
    });
  });

  describe("step", () => {
    it("should counter a wrong leaf from the absolute prestate", () => {
      const game = playToLeaf(h, BOGUS_LEAF);
      assert.equal(game.claimData(4).position, 22n);

      game.step(CHALLENGER, 4, true, TRACE.stepData(22n, true), "0x");
      assert.equal(game.claimData(4).counteredBy, CHALLENGER);
    });

    it("should counter a correct leaf by defending into the execution root", () => {
      const game = playToLeaf(h, TRACE.claimAt(22n));
      assert.throws(
        () => game.step(CHALLENGER, 4, true, TRACE.stepData(22n, true), "0x"),
        reverts("ValidStep")
      );
      game.step(CHALLENGER, 4, false, TRACE.stepData(22n, false), "0x");
      assert.equal(game.claimData(4).counteredBy, CHALLENGER);
    });

    it("should check the prestate preimage", () => {
      const game = playToLeaf(h, BOGUS_LEAF);
      assert.throws(
        () => game.step(CHALLENGER, 4, true, encodeAlphabetState(5n, 5n), "0x"),
        reverts("InvalidPrestate")
      );
    });

    it("should only step against max-depth claims", () => {
      const game = playToLeaf(h, BOGUS_LEAF);
      assert.throws(
        () => game.step(CHALLENGER, 3, true, TRACE.stepData(22n, true), "0x"),
        reverts("InvalidParent")
      );
    });

    it("should not counter the same claim twice", () => {
      const game = playToLeaf(h, BOGUS_LEAF);
      game.step(CHALLENGER, 4, true, TRACE.stepData(22n, true), "0x");
      assert.throws(
        () => game.step(STRANGER, 4, true, TRACE.stepData(22n, true), "0x"),
        reverts("DuplicateStep")
      );
      assert.equal(game.claimData(4).counteredBy, CHALLENGER);
    });

    it("should hand the VM the outputs bounding the execution sub-game", () => {
      const contexts: Hash[] = [];
      const inner = new AlphabetVM();
      const recording: IBigStepper = {
        step(stateData, proof, localContext) {
          contexts.push(localContext);
          return inner.step(stateData, proof, localContext);
        },
        challengePeriod: () => 0n,
      };
      h = setup({ vm: recording });
      const game = playToLeaf(h, BOGUS_LEAF);
      game.step(CHALLENGER, 4, true, TRACE.stepData(22n, true), "0x");

      // The execution root defended output(3) at position 5, so the sub-game
      // runs from output(3) to the root claim.
      assert.deepEqual(game.findExecutionBounds(4), {
        startingClaim: TRACE.claimAt(5n),
        startingPosition: 5n,
        disputedClaim: BAD_ROOT,
        disputedPosition: 1n,
      });
      assert.deepEqual(contexts, [localContextHash(TRACE.claimAt(5n), 5n, BAD_ROOT, 1n)]);
    });

    it("should use the anchor as the starting output of the first sub-game", () => {
      const game = createGame(h, { rootClaim: BAD_ROOT });
      game.attack(CHALLENGER, bond(1), BAD_ROOT, 0, BOGUS_OUTPUT);
      game.attack(PROPOSER, bond(2), BOGUS_OUTPUT, 1, TRACE.claimAt(4n));
      game.attack(CHALLENGER, bond(3), TRACE.claimAt(4n), 2, TRACE.claimAt(8n));
      assert.deepEqual(game.findExecutionBounds(3), {
        startingClaim: STARTING_ANCHOR.root,
        startingPosition: 0n,
        disputedClaim: TRACE.claimAt(4n),
        disputedPosition: 4n,
      });
      assert.throws(() => game.findExecutionBounds(2), reverts("ClaimAboveSplit"));
    });

    it("should not let the VM re-enter the game", () => {
      let target: FaultDisputeGame | undefined;
      const inner = new AlphabetVM();
      const reentrant: IBigStepper = {
        step(stateData, proof, localContext) {
          target?.step(STRANGER, 4, true, stateData, proof);
          return inner.step(stateData, proof, localContext);
        },
        challengePeriod: () => 0n,
      };
      h = setup({ vm: reentrant });
      const game = playToLeaf(h, BOGUS_LEAF);
      target = game;

      assert.throws(
        () => game.step(CHALLENGER, 4, true, TRACE.stepData(22n, true), "0x"),
        reverts("Reentrancy")
      );
      assert.equal(game.claimData(4).counteredBy, ZeroAddress);
    });
  });

  describe("resolution", () => {
    it("should wait for the challenger's clock", () => {
      const game = createGame(h);
      h.world.warp(MAX_CLOCK_DURATION - 1n);
      assert.throws(() => game.resolveClaim(STRANGER, 0), reverts("ClockNotExpired"));
      h.world.warp(1n);
      game.resolveClaim(STRANGER, 0);
      assert.equal(game.resolve(STRANGER), GameStatus.DEFENDER_WINS);
    });

    it("should resolve children before their parent", () => {
      const game = createGame(h);
      game.attack(CHALLENGER, bond(1), TRACE.rootClaim(), 0, BOGUS_OUTPUT);
      h.world.warp(MAX_CLOCK_DURATION);
      assert.throws(() => game.resolveClaim(STRANGER, 0), reverts("OutOfOrderResolution"));
      assert.throws(() => game.resolve(STRANGER), reverts("OutOfOrderResolution"));
      game.resolveClaim(STRANGER, 1);
      assert.throws(() => game.resolveClaim(STRANGER, 1), reverts("ClaimAlreadyResolved"));
      game.resolveClaim(STRANGER, 0);
      assert.equal(game.resolve(STRANGER), GameStatus.CHALLENGER_WINS);
      assert.throws(() => game.resolve(STRANGER), reverts("GameNotInProgress"));
    });

    it("should credit the left-most uncountered child, in batches", () => {
      const game = createGame(h);
      game.attack(CHALLENGER, bond(1), TRACE.rootClaim(), 0, BOGUS_OUTPUT);
      game.defend(STRANGER, bond(2), BOGUS_OUTPUT, 1, TRACE.claimAt(5n));
      game.attack(PROPOSER, bond(2), BOGUS_OUTPUT, 1, TRACE.claimAt(4n));
      h.world.warp(MAX_CLOCK_DURATION);
      game.resolveClaim(STRANGER, 3);
      game.resolveClaim(STRANGER, 2);

      assert.equal(game.getNumToResolve(1), 2);
      game.resolveClaim(STRANGER, 1, 1);
      assert.equal(game.getNumToResolve(1), 1);
      assert.equal(game.resolvedSubgames(1), false);
      game.resolveClaim(STRANGER, 1, 1);
      assert.equal(game.resolvedSubgames(1), true);

      // Position 4 (the attack) lies left of position 5 (the defence).
      assert.equal(game.claimData(1).counteredBy, PROPOSER);
      assert.equal(game.normalModeCredit(PROPOSER), bond(2) + bond(1));
      assert.equal(game.normalModeCredit(STRANGER), bond(2));

      game.resolveClaim(STRANGER, 0);
      assert.equal(game.resolve(STRANGER), GameStatus.DEFENDER_WINS);
      assert.equal(game.normalModeCredit(PROPOSER), bond(2) + bond(1) + bond(0));
      assert.equal(game.normalModeCredit(CHALLENGER), 0n);
    });
  });

  describe("dishonest proposer", () => {
    it("should end in CHALLENGER_WINS and pay every bond to the challenger", () => {
      const game = playToLeaf(h, BOGUS_LEAF);
      game.step(CHALLENGER, 4, true, TRACE.stepData(22n, true), "0x");
      h.world.warp(MAX_CLOCK_DURATION);

      assert.equal(resolveAll(game), GameStatus.CHALLENGER_WINS);
      assert.deepEqual(
        [0, 1, 2, 3, 4].map((i) => game.claimData(i).counteredBy),
        [CHALLENGER, ZeroAddress, CHALLENGER, ZeroAddress, CHALLENGER]
      );
      assert.equal(game.normalModeCredit(CHALLENGER), 3100n);
      assert.equal(game.normalModeCredit(PROPOSER), 0n);

      assert.throws(() => game.claimCredit(CHALLENGER, CHALLENGER), reverts("GameNotFinalized"));
      h.world.warp(FINALITY_DELAY + 1n);

      game.claimCredit(CHALLENGER, CHALLENGER);
      assert.equal(game.bondDistributionMode, BondDistributionMode.NORMAL);
      assert.deepEqual(h.system.weth.withdrawal(game.address, CHALLENGER), {
        amount: 3100n,
        timestamp: h.world.timestamp,
      });
      // A losing game never becomes the anchor.
      assert.deepEqual(h.system.anchorStateRegistry.getAnchorRoot(GAME_TYPE), STARTING_ANCHOR);

      assert.throws(() => game.claimCredit(CHALLENGER, CHALLENGER), reverts("DelayNotMet"));
      h.world.warp(WITHDRAWAL_DELAY);
      game.claimCredit(STRANGER, CHALLENGER);

      assert.equal(h.world.balanceOf(CHALLENGER), FUNDING + 2100n);
      assert.equal(h.world.balanceOf(PROPOSER), FUNDING - 2100n);
      assert.equal(h.system.weth.balanceOf(game.address), 0n);
      assert.equal(h.world.balanceOf(game.address), 0n);
      assert.throws(() => game.claimCredit(CHALLENGER, CHALLENGER), reverts("NoCreditToClaim"));
    });
  });

  describe("honest proposer", () => {
    function playHonest(): FaultDisputeGame {
      const game = createGame(h);
      const bogusExec = withVMStatus(keccak256(toUtf8Bytes("bogus exec")), VMStatus.VALID);
      game.attack(CHALLENGER, bond(1), TRACE.rootClaim(), 0, BOGUS_OUTPUT);
      game.attack(PROPOSER, bond(2), BOGUS_OUTPUT, 1, TRACE.claimAt(4n));
      // Agrees with claim 2 and stands by its own output at claim 1, so VALID.
      game.defend(CHALLENGER, bond(3), TRACE.claimAt(4n), 2, bogusExec);
      game.attack(PROPOSER, bond(4), bogusExec, 3, TRACE.claimAt(18n));
      return game;
    }

    it("should reject every step against an honest leaf", () => {
      const game = playHonest();
      assert.throws(
        () => game.step(CHALLENGER, 4, true, TRACE.stepData(18n, true), "0x"),
        reverts("ValidStep")
      );
      assert.throws(
        () => game.step(CHALLENGER, 4, false, TRACE.stepData(18n, false), "0x"),
        reverts("ValidStep")
      );
    });

    it("should end in DEFENDER_WINS and advance the anchor on close", () => {
      const game = playHonest();
      h.world.warp(MAX_CLOCK_DURATION);
      assert.equal(resolveAll(game), GameStatus.DEFENDER_WINS);
      assert.equal(game.normalModeCredit(PROPOSER), 3100n);

      h.world.warp(FINALITY_DELAY + 1n);
      game.closeGame(STRANGER);
      assert.equal(game.bondDistributionMode, BondDistributionMode.NORMAL);
      assert.deepEqual(h.system.anchorStateRegistry.getAnchorRoot(GAME_TYPE), {
        root: alphabetOutputRoot(4n),
        l2SequenceNumber: 4n,
      });
      const [closed] = h.world.logsOf("GameClosed", game.address);
      assert.equal(closed.args.bondDistributionMode, BondDistributionMode.NORMAL);

      // Closing again is a no-op.
      game.closeGame(STRANGER);
      assert.equal(h.world.logsOf("GameClosed", game.address).length, 1);
    });
  });

  describe("bond distribution", () => {
    function resolvedGame(): FaultDisputeGame {
      const game = createGame(h);
      game.attack(CHALLENGER, bond(1), TRACE.rootClaim(), 0, BOGUS_OUTPUT);
      h.world.warp(MAX_CLOCK_DURATION);
      resolveAll(game);
      h.world.warp(FINALITY_DELAY + 1n);
      return game;
    }

    it("should refund every claimant when the game is blacklisted", () => {
      const game = resolvedGame();
      h.system.anchorStateRegistry.blacklistDisputeGame(GUARDIAN, game);

      game.claimCredit(PROPOSER, PROPOSER);
      game.claimCredit(CHALLENGER, CHALLENGER);
      assert.equal(game.bondDistributionMode, BondDistributionMode.REFUND);
      assert.equal(game.credit(PROPOSER), 100n);
      assert.equal(game.credit(CHALLENGER), 200n);

      h.world.warp(WITHDRAWAL_DELAY);
      game.claimCredit(PROPOSER, PROPOSER);
      game.claimCredit(CHALLENGER, CHALLENGER);
      assert.equal(h.world.balanceOf(PROPOSER), FUNDING);
      assert.equal(h.world.balanceOf(CHALLENGER), FUNDING);
    });

    it("should not close while paused", () => {
      const game = resolvedGame();
      h.system.superchainConfig.pause(GUARDIAN);
      assert.throws(() => game.closeGame(STRANGER), reverts("GamePaused"));
      h.system.superchainConfig.unpause(GUARDIAN);
      game.closeGame(STRANGER);
      assert.equal(game.bondDistributionMode, BondDistributionMode.NORMAL);
    });

    it("should keep the escrow solvent", () => {
      const game = resolvedGame();
      const total = h.system.weth.balanceOf(game.address);
      assert.equal(total, 300n);
      assert.equal(
        game.normalModeCredit(PROPOSER) + game.normalModeCredit(CHALLENGER),
        total
      );
      assert.equal(
        game.refundModeCredit(PROPOSER) + game.refundModeCredit(CHALLENGER),
        total
      );
      assert.equal(h.world.balanceOf(h.system.weth.address), h.system.weth.totalSupply());
    });
  });

  describe("PermissionedDisputeGame", () => {
    it("should only let the proposer create games", () => {
      assert.throws(
        () => createGame(h, { gameType: PERMISSIONED_GAME_TYPE, creator: STRANGER }),
        reverts("BadAuth")
      );
      const game = createGame(h, { gameType: PERMISSIONED_GAME_TYPE });
      assert.equal(game.gameType, PERMISSIONED_GAME_TYPE);
      // Only the respected type counts as respected.
      assert.equal(game.wasRespectedGameTypeWhenCreated, false);
    });

    it("should only let the proposer and challenger move", () => {
      const game = createGame(h, { gameType: PERMISSIONED_GAME_TYPE });
      assert.throws(
        () => game.attack(STRANGER, bond(1), TRACE.rootClaim(), 0, BOGUS_OUTPUT),
        reverts("BadAuth")
      );
      game.attack(CHALLENGER, bond(1), TRACE.rootClaim(), 0, BOGUS_OUTPUT);
      h.world.warp(MAX_CLOCK_DURATION);
      game.resolveClaim(STRANGER, 1);
      game.resolveClaim(STRANGER, 0);
      assert.equal(game.resolve(STRANGER), GameStatus.CHALLENGER_WINS);
    });
  });

  it("should derive its extra data from the sequence number", () => {
    const game = createGame(h, { sequenceNumber: 7n });
    assert.equal(game.extraData, encodeSequenceNumber(7n));
    assert.deepEqual(game.gameData(), {
      gameType: GAME_TYPE,
      rootClaim: TRACE.rootClaim(),
      extraData: encodeSequenceNumber(7n),
    });
  });
});
