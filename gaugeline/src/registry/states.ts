/**
 * Partition keys: the 50 states plus DC, as NWIS `stateCd` values.
 */
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { FatalError } from '../core/errors.js';

const STATES_PATH = new URL('./us-states.json', import.meta.url);

export const US_STATES: readonly string[] = z
  .array(z.string().regex(/^[A-Z]{2}$/))
  .parse(JSON.parse(readFileSync(STATES_PATH, 'utf8')));

export function isStateCode(value: string): boolean {
  return US_STATES.includes(value.toUpperCase());
}

/**
 * Resolve CLI/env state arguments against the known list. An empty input
 * means every state.
 */
export function resolveStates(requested: readonly string[]): string[] {
  if (requested.length === 0) return [...US_STATES];

  const unknown = requested.filter((s) => !isStateCode(s));
  if (unknown.length > 0) {
    throw new FatalError(`Unknown state code(s): ${unknown.join(', ')}`);
  }
  return [...new Set(requested.map((s) => s.toUpperCase()))];
}
