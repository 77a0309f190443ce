/**
 * Map/Reduce job types.
 * @module mapreduce/types
 */

// ============================================================================
// Phase functions
// ============================================================================

/**
 * A built-in or previously registered JavaScript function, e.g. "Riak.mapValuesJson".
 */
export interface NamedJsFunction {
  language: 'javascript';
  name: string;
}

/**
 * Inline JavaScript source.
 */
export interface SourceJsFunction {
  language: 'javascript';
  source: string;
}

/**
 * JavaScript source stored as a Riak object.
 */
export interface StoredJsFunction {
  language: 'javascript';
  bucket: string;
  key: string;
}

/**
 * An exported Erlang function.
 */
export interface ErlangFunction {
  language: 'erlang';
  module: string;
  function: string;
}

export type PhaseFunction = NamedJsFunction | SourceJsFunction | StoredJsFunction | ErlangFunction;

/**
 * Shorthand accepted wherever a PhaseFunction is: a string is a named
 * function unless it contains "{" (then it is source); a tuple is an Erlang
 * [module, function] pair.
 */
export type PhaseFunctionLike = PhaseFunction | string | readonly [module: string, fn: string];

// ============================================================================
// Phases
// ============================================================================

export type PhaseKind = 'map' | 'reduce' | 'link';

/**
 * Options shared by map and reduce phases.
 */
export interface FunctionPhaseOptions {
  /** Static argument passed to the function. */
  arg?: unknown;
  /** Include this phase's output in the result set. */
  keep?: boolean;
}

export interface MapPhase extends FunctionPhaseOptions {
  kind: 'map';
  fn: PhaseFunctionLike;
}

export interface ReducePhase extends FunctionPhaseOptions {
  kind: 'reduce';
  fn: PhaseFunctionLike;
}

/**
 * Options for a link phase. Absent bucket or tag match anything.
 */
export interface LinkPhaseOptions {
  bucket?: string;
  tag?: string;
  keep?: boolean;
}

export interface LinkPhase extends LinkPhaseOptions {
  kind: 'link';
}

export type MapReducePhase = MapPhase | ReducePhase | LinkPhase;

/**
 * Arguments for starting a job with a map phase.
 */
export type MapPhaseParams = Omit<MapPhase, 'kind'>;

/**
 * Arguments for starting a job with a reduce phase.
 */
export type ReducePhaseParams = Omit<ReducePhase, 'kind'>;

/**
 * Arguments for starting a job with a link phase.
 */
export type LinkPhaseParams = LinkPhaseOptions;

/**
 * Arguments for starting a job from a search query.
 */
export interface SearchPhaseParams {
  bucket: string;
  query: string;
}

// ============================================================================
// Inputs
// ============================================================================

/**
 * A key filter as Riak expects it, e.g. ["tokenize", "-", 1] or ["eq", "2010"].
 */
export type KeyFilter = readonly [string, ...unknown[]];

/**
 * Secondary-index equality query.
 */
export interface IndexMatchQuery {
  bucket: string;
  index: string;
  key: string | number;
}

/**
 * Secondary-index range query.
 */
export interface IndexRangeQuery {
  bucket: string;
  index: string;
  start: string | number;
  end: string | number;
}

export type IndexQuery = IndexMatchQuery | IndexRangeQuery;

/**
 * One input object reference with optional key data.
 */
export interface KeyInput {
  bucket: string;
  key: string;
  keyData?: unknown;
}

/**
 * The single input specification of a job.
 */
export type JobInput =
  | { kind: 'bucket'; bucket: string }
  | { kind: 'keys'; keys: KeyInput[] }
  | { kind: 'search'; bucket: string; query: string }
  | { kind: 'index'; query: IndexQuery };

export type JobInputKind = JobInput['kind'];

// ============================================================================
// Wire format
// ============================================================================

/**
 * Serialized phase step definition.
 */
export interface FunctionStepDefinition {
  language: 'javascript' | 'erlang';
  keep: boolean;
  arg?: unknown;
  name?: string;
  source?: string;
  bucket?: string;
  key?: string;
  module?: string;
  function?: string;
}

export interface LinkStepDefinition {
  bucket: string;
  tag: string;
  keep: boolean;
}

export type SerializedPhase =
  | { map: FunctionStepDefinition }
  | { reduce: FunctionStepDefinition }
  | { link: LinkStepDefinition };

export type SerializedInputs =
  | string
  | { bucket: string; key_filters: KeyFilter[] }
  | Array<[string, string] | [string, string, unknown]>
  | { module: 'riak_search'; function: 'mapred_search'; arg: [string, string] }
  | { bucket: string; index: string; key: string | number }
  | { bucket: string; index: string; start: string | number; end: string | number };

/**
 * The JSON document POSTed to the Map/Reduce endpoint.
 */
export interface MapReduceRequest {
  inputs: SerializedInputs;
  query: SerializedPhase[];
  timeout?: number;
}

// ============================================================================
// Results
// ============================================================================

/**
 * A link returned by a link phase.
 */
export interface Link {
  bucket: string;
  key: string;
  tag: string;
}

export interface ValuePhaseResult {
  phaseIndex: number;
  kind: 'map' | 'reduce';
  values: unknown[];
}

export interface LinkPhaseResult {
  phaseIndex: number;
  kind: 'link';
  links: Link[];
}

/**
 * Output of one kept phase.
 */
export type PhaseResult = ValuePhaseResult | LinkPhaseResult;

/**
 * Lifecycle of a job.
 */
export type JobState = 'empty' | 'accumulating' | 'finalized';
