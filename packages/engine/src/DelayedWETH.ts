import { Address, Revert, Timestamp } from "@refute/core";
import { Contract } from "./Contract";
import { IPauseFlag } from "./SuperchainConfig";
import { World } from "./World";

export interface DelayedWETHOptions {
  owner: Address;
  delaySeconds: bigint;
  config: IPauseFlag;
}

export interface WithdrawalRequest {
  amount: bigint;
  timestamp: Timestamp;
}

/**
 * Wrapped ETH with two-phase withdrawals: an owner of WETH first unlocks an
 * amount for a recipient, and may only withdraw it once the delay has passed.
 * Dispute games hold their bonds here.
 */
export class DelayedWETH extends Contract {
  readonly owner: Address;
  private readonly delaySeconds: bigint;
  private readonly config: IPauseFlag;
  private balances = new Map<Address, bigint>();
  /** owner => recipient => request */
  private requests = new Map<Address, Map<Address, WithdrawalRequest>>();

  constructor(world: World, address: Address, opts: DelayedWETHOptions) {
    super(world, address);
    this.owner = opts.owner;
    this.delaySeconds = opts.delaySeconds;
    this.config = opts.config;
  }

  delay(): bigint {
    return this.delaySeconds;
  }

  balanceOf(owner: Address): bigint {
    return this.balances.get(owner) ?? 0n;
  }

  totalSupply(): bigint {
    let total = 0n;
    for (const balance of this.balances.values()) total += balance;
    return total;
  }

  withdrawal(owner: Address, recipient: Address): WithdrawalRequest {
    const request = this.requests.get(owner)?.get(recipient);
    return request ? { ...request } : { amount: 0n, timestamp: 0n };
  }

  deposit(caller: Address, value: bigint): void {
    this.world.transfer(caller, this.address, value);
    this.balances.set(caller, this.balanceOf(caller) + value);
    this.emit({ name: "Deposit", args: { dst: caller, wad: value } });
  }

  /** Start (or top up and restart) the delay on `amount` owed by `caller` to `recipient`. */
  unlock(caller: Address, recipient: Address, amount: bigint): void {
    let byRecipient = this.requests.get(caller);
    if (!byRecipient) {
      byRecipient = new Map();
      this.requests.set(caller, byRecipient);
    }
    const prior = byRecipient.get(recipient)?.amount ?? 0n;
    byRecipient.set(recipient, { amount: prior + amount, timestamp: this.now });
    this.emit({ name: "Unlock", args: { src: caller, guy: recipient, wad: amount } });
  }

  withdraw(caller: Address, amount: bigint): void;
  withdraw(caller: Address, recipient: Address, amount: bigint): void;
  withdraw(caller: Address, recipientOrAmount: Address | bigint, maybeAmount?: bigint): void {
    const recipient = typeof recipientOrAmount === "bigint" ? caller : recipientOrAmount;
    const amount = typeof recipientOrAmount === "bigint" ? recipientOrAmount : maybeAmount ?? 0n;

    if (this.config.paused(this.address)) {
      throw new Revert("EscrowPaused");
    }
    const request = this.requests.get(caller)?.get(recipient);
    if (!request || request.timestamp === 0n) {
      throw new Revert("NotUnlocked", `${caller} has not unlocked funds for ${recipient}`);
    }
    if (request.amount < amount) {
      throw new Revert("InsufficientUnlocked", `unlocked ${request.amount}, requested ${amount}`);
    }
    if (this.now < request.timestamp + this.delaySeconds) {
      throw new Revert("DelayNotMet", `available at ${request.timestamp + this.delaySeconds}`);
    }
    if (this.balanceOf(caller) < amount) {
      throw new Revert("InsufficientBalance");
    }
    this.world.requireBalance(this.address, amount);

    request.amount -= amount;
    this.balances.set(caller, this.balanceOf(caller) - amount);
    this.world.transfer(this.address, caller, amount);
    this.emit({ name: "Withdrawal", args: { src: caller, wad: amount } });
  }

  /** Owner sweep of ETH the escrow holds beyond its WETH supply. */
  recover(caller: Address, amount: bigint): void {
    this.requireOwner(caller);
    const held = this.world.balanceOf(this.address);
    const supply = this.totalSupply();
    const untracked = held > supply ? held - supply : 0n;
    const wad = amount < untracked ? amount : untracked;
    this.world.transfer(this.address, this.owner, wad);
    this.emit({ name: "Recovered", args: { to: this.owner, wad } });
  }

  /** Owner seizure of `account`'s WETH (all of it when `amount` is omitted). */
  hold(caller: Address, account: Address, amount?: bigint): void {
    this.requireOwner(caller);
    const balance = this.balanceOf(account);
    const wad = amount ?? balance;
    if (wad > balance) {
      throw new Revert("InsufficientBalance", `${account} holds ${balance} WETH`);
    }
    this.balances.set(account, balance - wad);
    this.balances.set(this.owner, this.balanceOf(this.owner) + wad);
    this.emit({ name: "Held", args: { guy: account, wad } });
  }

  private requireOwner(caller: Address): void {
    if (caller !== this.owner) {
      throw new Revert("NotOwner");
    }
  }
}
