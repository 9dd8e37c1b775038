import { z } from 'zod';

const TRUTHY = new Set(['true', '1', 'yes', 'on']);
const FALSY = new Set(['false', '0', 'no', 'off']);

// Accepts the usual form/query spellings of a boolean on top of true/false.
export const LaxBoolean = z.preprocess((value) => {
  if (value === 0 || value === 1) return value === 1;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (TRUTHY.has(normalized)) return true;
    if (FALSY.has(normalized)) return false;
  }
  return value;
}, z.boolean());

export const JourneyRequestSchema = z.object({
  origin: z.string(),
  destination: z.string(),
  language: z.string().default('en'),
  mode_preference: z.string().default('fastest'),
  accessibility_needs: LaxBoolean.default(false),
});

export type JourneyRequest = z.infer<typeof JourneyRequestSchema>;
