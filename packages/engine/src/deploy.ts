import {
  Address,
  Claim,
  Duration,
  GameType,
  IBigStepper,
  Proposal,
} from "@refute/core";
import { AnchorStateRegistry } from "./AnchorStateRegistry";
import { BondCurve, requiredBond } from "./bonds";
import { DelayedWETH } from "./DelayedWETH";
import { DisputeGameFactory } from "./DisputeGameFactory";
import { FaultGameImplementation } from "./FaultDisputeGame";
import { PermissionedGameImplementation, PermissionedRoles } from "./PermissionedDisputeGame";
import { SuperchainConfig } from "./SuperchainConfig";
import { World } from "./World";

interface GameTypeBase {
  gameType: GameType;
  absolutePrestate: Claim;
  maxGameDepth: number;
  splitDepth: number;
  clockExtension: Duration;
  maxClockDuration: Duration;
  vm: IBigStepper;
  l2ChainId: bigint;
  bondCurve: BondCurve;
  /** Root bond; the bond curve at depth 0 when omitted. */
  initBond?: bigint;
  startingAnchorRoot: Proposal;
}

export type GameTypeConfig =
  | (GameTypeBase & { kind: "permissionless" })
  | (GameTypeBase & { kind: "permissioned"; roles: PermissionedRoles });

export interface DeployOptions {
  /** Account whose nonce allocates contract addresses. */
  deployer: Address;
  owner: Address;
  guardian: Address;
  withdrawalDelaySeconds: bigint;
  finalityDelaySeconds: bigint;
  respectedGameType: GameType;
  gameTypes: GameTypeConfig[];
}

export interface DisputeSystem {
  superchainConfig: SuperchainConfig;
  weth: DelayedWETH;
  factory: DisputeGameFactory;
  anchorStateRegistry: AnchorStateRegistry;
  implementations: Map<GameType, FaultGameImplementation>;
}

/**
 * Deploy and wire the pause flag, bond escrow, factory, anchor registry and
 * one game implementation per configured game type.
 */
export function deployDisputeSystem(world: World, opts: DeployOptions): DisputeSystem {
  const superchainConfig = new SuperchainConfig(world, world.nextAddress(opts.deployer), opts.guardian);
  const weth = new DelayedWETH(world, world.nextAddress(opts.deployer), {
    owner: opts.owner,
    delaySeconds: opts.withdrawalDelaySeconds,
    config: superchainConfig,
  });
  const factory = new DisputeGameFactory(world, world.nextAddress(opts.deployer), opts.owner);
  const anchorStateRegistry = new AnchorStateRegistry(world, world.nextAddress(opts.deployer), {
    guardian: opts.guardian,
    factory,
    pauseFlag: superchainConfig,
    finalityDelaySeconds: opts.finalityDelaySeconds,
    respectedGameType: opts.respectedGameType,
    startingAnchorRoots: opts.gameTypes.map((config) => ({
      gameType: config.gameType,
      root: config.startingAnchorRoot,
    })),
  });

  const implementations = new Map<GameType, FaultGameImplementation>();
  for (const config of opts.gameTypes) {
    const params = {
      gameType: config.gameType,
      absolutePrestate: config.absolutePrestate,
      maxGameDepth: config.maxGameDepth,
      splitDepth: config.splitDepth,
      clockExtension: config.clockExtension,
      maxClockDuration: config.maxClockDuration,
      vm: config.vm,
      weth,
      anchorStateRegistry,
      l2ChainId: config.l2ChainId,
      bondCurve: config.bondCurve,
    };
    const address = world.nextAddress(opts.deployer);
    const impl =
      config.kind === "permissioned"
        ? new PermissionedGameImplementation(world, address, params, config.roles)
        : new FaultGameImplementation(world, address, params);

    factory.setImplementation(opts.owner, config.gameType, impl);
    factory.setInitBond(opts.owner, config.gameType, config.initBond ?? requiredBond(config.bondCurve, 0));
    implementations.set(config.gameType, impl);
  }

  return { superchainConfig, weth, factory, anchorStateRegistry, implementations };
}
