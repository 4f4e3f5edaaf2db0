import { z } from 'zod';

export const OutcomeStatusSchema = z.enum(['success', 'timeout', 'error']);

export const StepOutcomeSchema = z.object({
  requestId: z.string().min(1),
  status: OutcomeStatusSchema,
  selector: z.string(),
  message: z.string(),
  result: z.string().optional(),
});

export const SelectorTestResultSchema = z.union([
  z.object({
    count: z.number().int().nonnegative(),
    found: z.array(
      z.object({
        tagName: z.string(),
        id: z.string(),
        className: z.string(),
        text: z.string(),
      }),
    ),
  }),
  z.object({ error: z.string() }),
]);
