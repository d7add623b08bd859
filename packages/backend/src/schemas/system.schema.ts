import { z } from 'zod';

export const frontendErrorSchema = z.object({
  message: z.string().min(1).max(2000),
  stack: z.string().max(10000).optional(),
  source: z.string().max(500).optional(),
  lineno: z.number().int().optional(),
  colno: z.number().int().optional(),
  url: z.string().max(2000).optional(),
  userAgent: z.string().max(500).optional(),
});

export type FrontendErrorInput = z.infer<typeof frontendErrorSchema>;
