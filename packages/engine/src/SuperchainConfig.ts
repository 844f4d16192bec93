import { ZeroAddress } from "ethers";
import { Address, Revert } from "@refute/core";
import { Contract } from "./Contract";
import { World } from "./World";

/** Identifier that pauses everything. */
export const GLOBAL_PAUSE_IDENTIFIER: Address = ZeroAddress;

export interface IPauseFlag {
  paused(identifier?: Address): boolean;
}

/**
 * Guardian-held pause switch. Pausing an identifier (typically an escrow
 * address) halts it; pausing the zero identifier halts everything.
 */
export class SuperchainConfig extends Contract implements IPauseFlag {
  private pausedIdentifiers = new Set<Address>();

  constructor(world: World, address: Address, readonly guardian: Address) {
    super(world, address);
  }

  pause(caller: Address, identifier: Address = GLOBAL_PAUSE_IDENTIFIER): void {
    this.requireGuardian(caller);
    this.pausedIdentifiers.add(identifier);
    this.emit({ name: "Paused", args: { identifier } });
  }

  unpause(caller: Address, identifier: Address = GLOBAL_PAUSE_IDENTIFIER): void {
    this.requireGuardian(caller);
    this.pausedIdentifiers.delete(identifier);
    this.emit({ name: "Unpaused", args: { identifier } });
  }

  paused(identifier: Address = GLOBAL_PAUSE_IDENTIFIER): boolean {
    return (
      this.pausedIdentifiers.has(GLOBAL_PAUSE_IDENTIFIER) || this.pausedIdentifiers.has(identifier)
    );
  }

  private requireGuardian(caller: Address): void {
    if (caller !== this.guardian) {
      throw new Revert("Unauthorized", "only the guardian can pause");
    }
  }
}
