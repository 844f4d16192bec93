export {
  AlphabetVM,
  ABSOLUTE_PRESTATE,
  ABSOLUTE_PRESTATE_DATA,
  alphabetStateClaim,
  decodeAlphabetState,
  encodeAlphabetState,
} from "./vm";
export { AlphabetTrace, alphabetOutputRoot } from "./trace";
export type { AlphabetTraceOptions } from "./trace";
