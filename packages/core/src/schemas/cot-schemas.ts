// packages/core/src/schemas/cot-schemas.ts
import { z } from 'zod';

// --- Taxonomy ---

export const AffiliationSchema = z.enum([
  'friend',
  'hostile',
  'neutral',
  'unknown',
  'assumed_friend',
  'suspect',
  'pending',
  'joker',
  'faker',
  'none',
]);

export const BattleDimensionSchema = z.enum([
  'space',
  'air',
  'ground',
  'sea_surface',
  'subsurface',
  'sof',
  'other',
]);

// --- Geometry ---

export const CotPointSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  hae: z.number(),
  ce: z.number(),
  le: z.number(),
});
