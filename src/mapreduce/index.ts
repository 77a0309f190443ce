/**
 * Map/Reduce module exports.
 * @module mapreduce
 */

export type {
  ErlangFunction,
  FunctionPhaseOptions,
  FunctionStepDefinition,
  IndexMatchQuery,
  IndexQuery,
  IndexRangeQuery,
  JobInput,
  JobInputKind,
  JobState,
  KeyFilter,
  KeyInput,
  Link,
  LinkPhase,
  LinkPhaseOptions,
  LinkPhaseParams,
  LinkPhaseResult,
  LinkStepDefinition,
  MapPhase,
  MapPhaseParams,
  MapReducePhase,
  MapReduceRequest,
  NamedJsFunction,
  PhaseFunction,
  PhaseFunctionLike,
  PhaseKind,
  PhaseResult,
  ReducePhase,
  ReducePhaseParams,
  SearchPhaseParams,
  SerializedInputs,
  SerializedPhase,
  SourceJsFunction,
  StoredJsFunction,
  ValuePhaseResult,
} from './types.js';
export {
  LINK_WILDCARD,
  keptPhaseIndexes,
  normalizePhaseFunction,
  serializePhase,
  serializePhases,
} from './phases.js';
export { parseJsonBody, parseLinks, parseMapReduceResponse } from './results.js';
export { MAPRED_TIMEOUT_GRACE, MapReduceJob } from './job.js';
export type { JobContext } from './job.js';
