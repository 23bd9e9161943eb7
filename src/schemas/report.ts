import { z } from 'zod';

export const DomainStatusSchema = z.enum(['active', 'parked', 'for_sale', 'redirect', 'expired', 'available']);

export const ConfidenceSchema = z.enum(['high', 'medium', 'low']);

export const ScoreBreakdownSchema = z.object({
  base: z.number(),
  age: z.number(),
  length: z.number(),
  tld: z.number(),
  popularity: z.number(),
  keywords: z.number(),
  brandability: z.number(),
  status: z.number(),
});

export const HttpInfoSchema = z.object({
  finalUrl: z.string().nullable(),
  statusCode: z.number().int().nullable(),
  redirected: z.boolean(),
  pageTitle: z.string().nullable(),
});

export const WhoisInfoSchema = z.object({
  registrar: z.string().nullable(),
  createdOn: z.string().nullable(),
  expiresOn: z.string().nullable(),
  nameServers: z.array(z.string()),
  registrant: z.string().nullable(),
});

export const ReportRecordSchema = z.object({
  domain: z.string(),
  years: z.array(z.number().int()),
  status: DomainStatusSchema,
  confidence: ConfidenceSchema,
  reason: z.string(),
  salePlatform: z.string().nullable(),
  score: z.number().int().min(1).max(10),
  scoreBreakdown: ScoreBreakdownSchema,
  recommendation: z.object({
    reasons: z.array(z.string()),
    estimatedValue: z.string(),
  }),
  httpInfo: HttpInfoSchema.nullable(),
  whoisInfo: WhoisInfoSchema.nullable(),
  checkedAt: z.string(),
});

export const ReportSchema = z.object({
  generatedAt: z.string(),
  totalDomains: z.number().int().min(0),
  workerCount: z.number().int().min(1),
  summary: z.object({
    active: z.number().int(),
    parked: z.number().int(),
    for_sale: z.number().int(),
    redirect: z.number().int(),
    expired: z.number().int(),
    available: z.number().int(),
  }),
  results: z.array(ReportRecordSchema),
});

export type ReportFile = z.infer<typeof ReportSchema>;
