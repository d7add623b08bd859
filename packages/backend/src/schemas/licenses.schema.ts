import { z } from 'zod';

export const borrowSchema = z.object({
  tool: z.string().min(1).max(200),
  user: z.string().min(1).max(200),
});

export type BorrowInput = z.infer<typeof borrowSchema>;

export const returnSchema = z.object({
  id: z.string().min(1),
});

export type ReturnInput = z.infer<typeof returnSchema>;

export const borrowFiltersSchema = z.object({
  user: z.string().min(1).optional(),
});

export type BorrowFiltersInput = z.infer<typeof borrowFiltersSchema>;

export const overageChargeFiltersSchema = z.object({
  tool: z.string().min(1).optional(),
});

export type OverageChargeFiltersInput = z.infer<typeof overageChargeFiltersSchema>;

export const toolParamsSchema = z.object({
  tool: z.string().min(1),
});
