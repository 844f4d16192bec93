import { Revert } from "../errors";
import { Position } from "../types/game";

/** Deepest representable position: depth must fit a uint128 generalized index. */
export const MAX_POSITION_BITLEN = 126;

export const ROOT_POSITION: Position = 1n;

export function wrap(depth: number, indexAtDepth: bigint): Position {
  if (depth < 0 || depth > MAX_POSITION_BITLEN) {
    throw new Revert("GameDepthExceeded", `depth ${depth}`);
  }
  if (indexAtDepth < 0n || indexAtDepth >= 1n << BigInt(depth)) {
    throw new RangeError(`Index ${indexAtDepth} out of range at depth ${depth}`);
  }
  return (1n << BigInt(depth)) | indexAtDepth;
}

/** floor(log2(position)). */
export function depth(position: Position): number {
  if (position <= 0n) {
    throw new Revert("GameDepthExceeded", `position ${position}`);
  }
  const d = position.toString(2).length - 1;
  if (d > MAX_POSITION_BITLEN) {
    throw new Revert("GameDepthExceeded", `depth ${d}`);
  }
  return d;
}

export function indexAtDepth(position: Position): bigint {
  return position - (1n << BigInt(depth(position)));
}

export function left(position: Position): Position {
  return move(position, true);
}

export function right(position: Position): Position {
  return move(position, false);
}

export function parent(position: Position): Position {
  if (depth(position) === 0) {
    throw new RangeError("The root position has no parent");
  }
  return position >> 1n;
}

/** The child a move on `position` lands on: attack `2p`, defend `2p + 1`. */
export function move(position: Position, isAttack: boolean): Position {
  const next = isAttack ? position << 1n : (position << 1n) | 1n;
  depth(next);
  return next;
}

/** True when `position` was reached by attacking its parent. */
export function isAttackPosition(position: Position): boolean {
  return depth(position) > 0 && (position & 1n) === 0n;
}

/**
 * Trace index, at `maxDepth` granularity, that the claim at `position`
 * commits to. Claims sit in order over the trace: each one commits to the
 * midpoint of the interval left open by its ancestors, so an attack lands
 * left of its parent and a defence lands right of it. The root commits to
 * `2^maxDepth - 1`.
 */
export function traceIndex(position: Position, maxDepth: number): bigint {
  const d = depth(position);
  if (d > maxDepth) {
    throw new Revert("GameDepthExceeded", `depth ${d} is below granularity ${maxDepth}`);
  }
  return ((2n * indexAtDepth(position) + 1n) << BigInt(maxDepth - d)) - 1n;
}
