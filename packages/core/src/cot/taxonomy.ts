/**
 * CoT type-code taxonomy.
 *
 * A type code is dash-delimited: `<atom>-<affiliation>-<battle dimension>-<function...>`
 * for entities (`a-f-G-E-S`), or a `b-`/`u-`/`t-` prefixed code for non-entity data.
 */

import type { z } from 'zod';
import type { AffiliationSchema, BattleDimensionSchema } from '../schemas/cot-schemas';

export type Affiliation = z.infer<typeof AffiliationSchema>;

export type BattleDimension = z.infer<typeof BattleDimensionSchema>;

const AFFILIATION_CODES: Record<string, Affiliation> = {
  f: 'friend',
  h: 'hostile',
  n: 'neutral',
  u: 'unknown',
  a: 'assumed_friend',
  s: 'suspect',
  p: 'pending',
  j: 'joker',
  k: 'faker',
  o: 'none',
};

const DIMENSION_CODES: Record<string, BattleDimension> = {
  P: 'space',
  A: 'air',
  G: 'ground',
  S: 'sea_surface',
  U: 'subsurface',
  F: 'sof',
};

/**
 * Affiliation from the second segment of an atom type. Codes outside the
 * MIL-STD-2525 set map to `none`; a type without a second segment is `unknown`.
 */
export function getAffiliation(type: string): Affiliation {
  const code = type.split('-')[1];
  if (!code) {
    return 'unknown';
  }
  return AFFILIATION_CODES[code.toLowerCase()] ?? 'none';
}

/**
 * Battle dimension from the third segment of an atom type.
 */
export function getBattleDimension(type: string): BattleDimension {
  const code = type.split('-')[2];
  if (!code) {
    return 'other';
  }
  return DIMENSION_CODES[code.toUpperCase()] ?? 'other';
}

export function isAtomType(type: string): boolean {
  return type.startsWith('a-');
}

export function isFriendlyType(type: string): boolean {
  return type.startsWith('a-f-');
}
