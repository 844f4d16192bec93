export type RevertReason =
  // Moves and steps
  | "GameNotInProgress"
  | "InvalidClaimIndex"
  | "InvalidDisputedClaimIndex"
  | "CannotDefendRootClaim"
  | "GameDepthExceeded"
  | "UnexpectedRootClaim"
  | "IncorrectBondAmount"
  | "ClockTimeExceeded"
  | "ClaimAlreadyExists"
  | "ClaimAlreadyResolved"
  | "InvalidParent"
  | "InvalidPrestate"
  | "ValidStep"
  | "DuplicateStep"
  | "ClaimAboveSplit"
  // Resolution
  | "ClockNotExpired"
  | "OutOfOrderResolution"
  // Game lifecycle and bonds
  | "AlreadyInitialized"
  | "AnchorRootNotFound"
  | "BadExtraData"
  | "GamePaused"
  | "GameNotFinalized"
  | "InvalidBondDistributionMode"
  | "NoCreditToClaim"
  | "BadAuth"
  // Construction
  | "MaxDepthTooLarge"
  | "InvalidSplitDepth"
  | "InvalidClockExtension"
  | "InvalidBondCurve"
  // Escrow
  | "NotUnlocked"
  | "DelayNotMet"
  | "InsufficientUnlocked"
  | "InsufficientBalance"
  | "EscrowPaused"
  | "NotOwner"
  // Factory
  | "NoImplementation"
  | "ImplementationAlreadySet"
  | "GameAlreadyExists"
  // Anchor state registry
  | "InvalidAnchorGame"
  | "AnchorGameExists"
  | "AnchorRootRegression"
  | "Unauthorized"
  // Ledger
  | "InsufficientFunds"
  | "Reentrancy";

/**
 * A protocol-level failure. Every public operation either completes or
 * throws a Revert before it has mutated any state.
 */
export class Revert extends Error {
  readonly reason: RevertReason;

  constructor(reason: RevertReason, detail?: string) {
    super(detail ? `${reason}: ${detail}` : reason);
    this.name = "Revert";
    this.reason = reason;
  }
}

export function isRevert(err: unknown, reason?: RevertReason): err is Revert {
  return err instanceof Revert && (reason === undefined || err.reason === reason);
}
