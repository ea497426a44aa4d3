// packages/jobs/src/cycle/index.ts

export {
  parseIsoDuration,
  isIsoDuration,
  addIsoDuration,
  type IsoDuration,
} from "./iso-duration";

export {
  CycleAnchor,
  RetryCycleSpec,
  INTERVAL_DELIMITER,
  parseCycle,
  parseRetryIntervals,
  parseRetryCycleSpec,
  type ParsedCycle,
} from "./parser";

export {
  evaluateCycle,
  resolveCycle,
  type DurationCycle,
} from "./duration-cycle";

export { selectInterval, type IntervalSelection } from "./interval-selector";
