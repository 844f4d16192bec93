import { getCreateAddress } from "ethers";
import {
  Address,
  DisputeEvent,
  DisputeEventName,
  EventLog,
  EventOf,
  Revert,
  Timestamp,
} from "@refute/core";

export interface WorldOptions {
  /** Genesis block timestamp, in seconds. */
  timestamp?: Timestamp;
}

export type LogListener = (log: EventLog) => void;

/**
 * The single, totally ordered ledger every contract object runs against:
 * block time, ETH balances, the event log and address allocation.
 */
export class World {
  private _timestamp: Timestamp;
  private _blockNumber = 1n;
  private balances = new Map<Address, bigint>();
  private nonces = new Map<Address, number>();
  private eventLog: EventLog[] = [];
  private listeners = new Set<LogListener>();

  constructor(opts: WorldOptions = {}) {
    this._timestamp = opts.timestamp ?? 1n;
  }

  get timestamp(): Timestamp {
    return this._timestamp;
  }

  get blockNumber(): bigint {
    return this._blockNumber;
  }

  /** Advance time by `seconds`, sealing a new block. */
  warp(seconds: bigint): void {
    if (seconds < 0n) {
      throw new RangeError("Cannot move time backwards");
    }
    this._timestamp += seconds;
    this._blockNumber += 1n;
  }

  setTimestamp(timestamp: Timestamp): void {
    if (timestamp < this._timestamp) {
      throw new RangeError(`Cannot move time backwards from ${this._timestamp} to ${timestamp}`);
    }
    this.warp(timestamp - this._timestamp);
  }

  mine(): void {
    this._blockNumber += 1n;
  }

  balanceOf(address: Address): bigint {
    return this.balances.get(address) ?? 0n;
  }

  /** Mint ETH out of thin air (devnet faucet and test funding). */
  deal(address: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError("Cannot deal a negative amount");
    }
    this.balances.set(address, this.balanceOf(address) + amount);
  }

  requireBalance(address: Address, amount: bigint): void {
    const balance = this.balanceOf(address);
    if (balance < amount) {
      throw new Revert("InsufficientFunds", `${address} holds ${balance}, needs ${amount}`);
    }
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError("Cannot transfer a negative amount");
    }
    this.requireBalance(from, amount);
    this.balances.set(from, this.balanceOf(from) - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  /** Next CREATE address of `deployer`; bumps its nonce. */
  nextAddress(deployer: Address): Address {
    const nonce = this.nonces.get(deployer) ?? 0;
    this.nonces.set(deployer, nonce + 1);
    return getCreateAddress({ from: deployer, nonce });
  }

  emit(address: Address, event: DisputeEvent): void {
    const log: EventLog = {
      ...event,
      address,
      blockNumber: this._blockNumber,
      timestamp: this._timestamp,
      logIndex: this.eventLog.length,
    };
    this.eventLog.push(log);
    for (const listener of this.listeners) {
      listener(log);
    }
  }

  logs(): readonly EventLog[] {
    return this.eventLog;
  }

  logsOf<N extends DisputeEventName>(name: N, address?: Address): EventLog<EventOf<N>>[] {
    return this.eventLog.filter(
      (log): log is EventLog<EventOf<N>> =>
        log.name === name && (address === undefined || log.address === address)
    );
  }

  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
