import { z } from 'zod';

export const budgetConfigSchema = z
  .object({
    tool: z.string().min(1).max(200),
    total: z.number().int().min(1),
    commit: z.number().int().min(0),
    max_overage: z.number().int().min(0),
    commit_price: z.number().min(0),
    overage_price_per_license: z.number().min(0),
  })
  .refine((data) => data.commit <= data.total, {
    message: 'commit cannot exceed total',
    path: ['commit'],
  });

export type BudgetConfigInput = z.infer<typeof budgetConfigSchema>;
