import { Address, Claim, Revert } from "@refute/core";
import {
  FaultDisputeGame,
  FaultDisputeGameParams,
  FaultGameImplementation,
} from "./FaultDisputeGame";
import { GameCloneArgs } from "./interfaces/IDisputeGame";
import { World } from "./World";

export interface PermissionedRoles {
  proposer: Address;
  challenger: Address;
}

export class PermissionedGameImplementation extends FaultGameImplementation {
  constructor(
    world: World,
    address: Address,
    params: FaultDisputeGameParams,
    readonly roles: PermissionedRoles
  ) {
    super(world, address, params);
  }

  override clone(address: Address, args: GameCloneArgs): PermissionedDisputeGame {
    return new PermissionedDisputeGame(this.world, address, this.params, args, this.roles);
  }
}

/**
 * Fault dispute game in which only the proposer may create games and only
 * the proposer or the challenger may move or step. Resolution and credit
 * claims stay open to anyone.
 */
export class PermissionedDisputeGame extends FaultDisputeGame {
  readonly proposer: Address;
  readonly challenger: Address;

  constructor(
    world: World,
    address: Address,
    params: FaultDisputeGameParams,
    args: GameCloneArgs,
    roles: PermissionedRoles
  ) {
    super(world, address, params, args);
    this.proposer = roles.proposer;
    this.challenger = roles.challenger;
  }

  override initialize(value: bigint): void {
    if (this.gameCreator !== this.proposer) {
      throw new Revert("BadAuth", `${this.gameCreator} is not the proposer`);
    }
    super.initialize(value);
  }

  override move(
    caller: Address,
    value: bigint,
    disputed: Claim,
    parentIndex: number,
    claim: Claim,
    isAttack: boolean
  ): number {
    this.requireAuthorized(caller);
    return super.move(caller, value, disputed, parentIndex, claim, isAttack);
  }

  override step(
    caller: Address,
    claimIndex: number,
    isAttack: boolean,
    stateData: string,
    proof: string
  ): void {
    this.requireAuthorized(caller);
    super.step(caller, claimIndex, isAttack, stateData, proof);
  }

  private requireAuthorized(caller: Address): void {
    if (caller !== this.proposer && caller !== this.challenger) {
      throw new Revert("BadAuth", `${caller} is neither proposer nor challenger`);
    }
  }
}
