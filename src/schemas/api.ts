import { z } from 'zod';
import { DomainStatusSchema } from './report.js';

export const DomainListQuerySchema = z.object({
  status: DomainStatusSchema.optional(),
  minScore: z.string().transform(Number).pipe(z.number().int().min(1).max(10)).optional(),
  year: z.string().transform(Number).pipe(z.number().int()).optional(),
  limit: z.string().transform(Number).pipe(z.number().int().min(1).max(500)).default('100'),
  offset: z.string().transform(Number).pipe(z.number().int().min(0)).default('0'),
});

export const DomainParamsSchema = z.object({
  domain: z.string().min(1).max(253).transform((value) => value.toLowerCase()),
});

export type DomainListQuery = z.infer<typeof DomainListQuerySchema>;
export type DomainParams = z.infer<typeof DomainParamsSchema>;
