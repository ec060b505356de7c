import { z } from 'zod';

import { parseTimestamp, startOfUtcDay } from '../utils/date.js';
import { normalizeCategory } from '../utils/validation.js';

// Absent and blank parameters both mean "no restriction"
const categoryParam = z
  .string()
  .max(200)
  .optional()
  .transform((value) => normalizeCategory(value));

const dayParam = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value.trim() === '') return null;
    const parsed = parseTimestamp(value);
    if (!parsed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid date: ${value}`,
      });
      return z.NEVER;
    }
    return startOfUtcDay(parsed);
  });

// Blank means "use the default", not zero
const topNParam = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.coerce.number().int().min(0).max(100).optional()
);

export const filterQuerySchema = z.object({
  platform: categoryParam,
  team: categoryParam,
  pipeline: categoryParam,
  appVersion: categoryParam,
  start: dayParam,
  end: dayParam,
  topN: topNParam,
});

export type FilterQueryInput = z.input<typeof filterQuerySchema>;
export type FilterQuery = z.output<typeof filterQuerySchema>;
