export { World } from "./World";
export type { WorldOptions, LogListener } from "./World";
export { Contract } from "./Contract";
export { SuperchainConfig, GLOBAL_PAUSE_IDENTIFIER } from "./SuperchainConfig";
export type { IPauseFlag } from "./SuperchainConfig";
export { DelayedWETH } from "./DelayedWETH";
export type { DelayedWETHOptions, WithdrawalRequest } from "./DelayedWETH";
export { BPS, DEFAULT_BOND_CURVE, requiredBond, validateBondCurve } from "./bonds";
export type { BondCurve } from "./bonds";
export {
  FaultDisputeGame,
  FaultGameImplementation,
  validateFaultGameParams,
} from "./FaultDisputeGame";
export type {
  FaultDisputeGameParams,
  ResolutionCheckpoint,
  ExecutionBounds,
} from "./FaultDisputeGame";
export { PermissionedDisputeGame, PermissionedGameImplementation } from "./PermissionedDisputeGame";
export type { PermissionedRoles } from "./PermissionedDisputeGame";
export { DisputeGameFactory } from "./DisputeGameFactory";
export type { GameRecord, GameSearchResult } from "./DisputeGameFactory";
export { AnchorStateRegistry } from "./AnchorStateRegistry";
export type { AnchorStateRegistryOptions } from "./AnchorStateRegistry";
export { deployDisputeSystem } from "./deploy";
export type { DeployOptions, DisputeSystem, GameTypeConfig } from "./deploy";
export type {
  GameCloneArgs,
  IDisputeGame,
  IDisputeGameImplementation,
  IAnchorStateRegistry,
} from "./interfaces/IDisputeGame";
