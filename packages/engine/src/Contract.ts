import { Address, DisputeEvent, Revert, Timestamp } from "@refute/core";
import { World } from "./World";

/**
 * Base for every object that lives at an address on the World ledger.
 */
export abstract class Contract {
  private entered = false;

  constructor(protected readonly world: World, readonly address: Address) {}

  protected get now(): Timestamp {
    return this.world.timestamp;
  }

  protected emit(event: DisputeEvent): void {
    this.world.emit(this.address, event);
  }

  /** Run `fn` with the reentrancy lock held; a nested entry reverts. */
  protected nonReentrant<T>(fn: () => T): T {
    if (this.entered) {
      throw new Revert("Reentrancy");
    }
    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }
}
