/**
 * Map/Reduce response parsing.
 * @module mapreduce/results
 */

import { z } from 'zod';
import { ProtocolError } from '../errors.js';
import { keptPhaseIndexes } from './phases.js';
import type { Link, MapReducePhase, PhaseResult } from './types.js';

const resultListSchema = z.array(z.unknown());

const linkSchema = z.tuple([z.string(), z.string(), z.string()]);

/**
 * Parse a JSON body, reporting anything that is not JSON as a ProtocolError.
 */
export function parseJsonBody(body: string, operation: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new ProtocolError(
      `${operation} returned a body that is not JSON`,
      { body: body.slice(0, 512) },
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Convert a link phase's [bucket, key, tag] triples into Link records.
 */
export function parseLinks(values: unknown[], phaseIndex: number): Link[] {
  return values.map((value, position) => {
    const parsed = linkSchema.safeParse(value);
    if (!parsed.success) {
      throw new ProtocolError(`Link phase ${phaseIndex} returned a malformed link`, {
        phaseIndex,
        position,
      });
    }
    const [bucket, key, tag] = parsed.data;
    return { bucket, key, tag };
  });
}

/**
 * Split the server's answer into one result per kept phase.
 *
 * With a single kept phase Riak answers with that phase's flat list; with
 * several it answers with one list per kept phase, in phase order, or with
 * an empty list when no phase produced output.
 *
 * @throws {ProtocolError} If the body is not JSON or does not match the kept phases.
 */
export function parseMapReduceResponse(
  body: string,
  phases: readonly MapReducePhase[]
): PhaseResult[] {
  const kept = keptPhaseIndexes(phases);
  const json = parseJsonBody(body, 'Map/Reduce');

  const top = resultListSchema.safeParse(json);
  if (!top.success) {
    throw new ProtocolError('Map/Reduce response is not a JSON array', { body: body.slice(0, 512) });
  }

  let perPhase: unknown[][];
  if (kept.length === 1) {
    perPhase = [top.data];
  } else if (top.data.length === 0) {
    // Kept phases without output are left out, so an empty answer is valid.
    perPhase = kept.map(() => []);
  } else {
    const nested = z.array(resultListSchema).length(kept.length).safeParse(top.data);
    if (!nested.success) {
      throw new ProtocolError(
        `Map/Reduce response does not hold one result list per kept phase (expected ${kept.length})`,
        { keptPhases: kept }
      );
    }
    perPhase = nested.data;
  }

  return kept.map((phaseIndex, position): PhaseResult => {
    const values = perPhase[position] ?? [];
    const phase = phases[phaseIndex];
    if (phase.kind === 'link') {
      return { phaseIndex, kind: 'link', links: parseLinks(values, phaseIndex) };
    }
    return { phaseIndex, kind: phase.kind, values };
  });
}
