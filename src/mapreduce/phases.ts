/**
 * Phase normalization and serialization.
 * @module mapreduce/phases
 */

import type {
  FunctionStepDefinition,
  MapReducePhase,
  PhaseFunction,
  PhaseFunctionLike,
  SerializedPhase,
} from './types.js';

/** Wildcard used by link phases for "any bucket" / "any tag". */
export const LINK_WILDCARD = '_';

/**
 * Expand the shorthand forms of a phase function.
 */
export function normalizePhaseFunction(fn: PhaseFunctionLike): PhaseFunction {
  if (typeof fn === 'string') {
    return fn.includes('{')
      ? { language: 'javascript', source: fn }
      : { language: 'javascript', name: fn };
  }
  if ('language' in fn) {
    return fn;
  }
  const [module, name] = fn;
  return { language: 'erlang', module, function: name };
}

function serializeFunction(
  fnLike: PhaseFunctionLike,
  arg: unknown,
  keep: boolean
): FunctionStepDefinition {
  const fn = normalizePhaseFunction(fnLike);
  const step: FunctionStepDefinition = { language: fn.language, keep };
  if (arg !== undefined) {
    step.arg = arg;
  }

  if (fn.language === 'erlang') {
    step.module = fn.module;
    step.function = fn.function;
  } else if ('name' in fn) {
    step.name = fn.name;
  } else if ('source' in fn) {
    step.source = fn.source;
  } else {
    step.bucket = fn.bucket;
    step.key = fn.key;
  }
  return step;
}

/**
 * Serialize one phase. `keep` is passed separately because the job forces
 * the last phase to be kept when no phase asks for it.
 */
export function serializePhase(phase: MapReducePhase, keep: boolean): SerializedPhase {
  switch (phase.kind) {
    case 'map':
      return { map: serializeFunction(phase.fn, phase.arg, keep) };
    case 'reduce':
      return { reduce: serializeFunction(phase.fn, phase.arg, keep) };
    case 'link':
      return {
        link: {
          bucket: phase.bucket ?? LINK_WILDCARD,
          tag: phase.tag ?? LINK_WILDCARD,
          keep,
        },
      };
  }
}

/**
 * Indexes of the phases whose output the server will return. If no phase
 * is flagged, Riak would return nothing, so the last phase is kept.
 */
export function keptPhaseIndexes(phases: readonly MapReducePhase[]): number[] {
  const flagged = phases.flatMap((phase, index) => (phase.keep === true ? [index] : []));
  if (flagged.length === 0 && phases.length > 0) {
    return [phases.length - 1];
  }
  return flagged;
}

/**
 * Serialize the phase list in order, applying the implicit keep on the last phase.
 */
export function serializePhases(phases: readonly MapReducePhase[]): SerializedPhase[] {
  const kept = new Set(keptPhaseIndexes(phases));
  return phases.map((phase, index) => serializePhase(phase, kept.has(index)));
}
