/**
 * Zod schemas for swap puzzle documents
 */

import { z } from 'zod';

// ════════════════════════════════════════════════════════════════════════════
// Grid Schema
// ════════════════════════════════════════════════════════════════════════════

/**
 * A grid is either one multi-line string or a list of row strings
 */
export const GridSchema = z.union([
  z.string().min(1, 'grid must not be empty'),
  z.array(z.string()).min(1, 'grid must have at least one row'),
]);

export type GridSchemaType = z.infer<typeof GridSchema>;

// ════════════════════════════════════════════════════════════════════════════
// Swap Puzzle Schema
// ════════════════════════════════════════════════════════════════════════════

export const SwapPuzzleSchema = z.object({
  id: z
    .union([z.string(), z.number()])
    .optional()
    .transform(v => (v === undefined ? undefined : String(v))),
  name: z.string().optional(),
  from: GridSchema,
  to: GridSchema,
});

export function formatZodIssues(error: z.ZodError): string {
  return error.issues.map((e: z.ZodIssue) => `${e.path.join('.') || '(root)'}: ${e.message}`).join(', ');
}
