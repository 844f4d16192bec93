export * from "./types/game";
export * from "./types/events";
export * from "./libs/Encoding";
export * from "./libs/Crypto";
export * as LibPosition from "./libs/Position";
export * as LibClock from "./libs/Clock";
export { MAX_POSITION_BITLEN, ROOT_POSITION } from "./libs/Position";

// Errors
export { Revert, isRevert } from "./errors";
export type { RevertReason } from "./errors";

// Validation
export {
  isEvmAddress,
  isBytes32,
  isHexBytes,
  isUintString,
  parseAddress,
  parseBytes32,
  parseUint,
} from "./validation";
