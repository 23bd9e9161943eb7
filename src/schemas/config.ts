import { z } from 'zod';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'silent']);

export const ScanConfigSchema = z.object({
  workers: z.coerce.number().int().min(1).default(10),
  catalogPath: z.string().min(1).optional(),
  outputPath: z.string().min(1).default('domain_results.json'),
  probeTimeoutMs: z.coerce.number().int().positive().default(10000),
  maxRedirects: z.coerce.number().int().min(0).default(5),
  maxContentBytes: z.coerce.number().int().positive().default(2 * 1024 * 1024),
  userAgent: z.string().min(1).optional(),
  proxyUrl: z.string().url().optional(),
  registryTimeoutMs: z.coerce.number().int().positive().default(10000),
  registryRetryAttempts: z.coerce.number().int().min(1).default(2),
  registryRetryDelayMs: z.coerce.number().int().min(0).default(2000),
  rdapBootstrapUrl: z.string().url().default('https://data.iana.org/rdap/dns.json'),
  domainDelayMs: z.coerce.number().int().min(0).default(500),
  quickLimit: z.coerce.number().int().min(1).default(5),
  logLevel: LogLevelSchema.default('info'),
  logDir: z.string().min(1).optional(),
});

export const ServeConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(8090),
  reportPath: z.string().min(1).default('domain_results.json'),
});

export type ScanConfigInput = z.input<typeof ScanConfigSchema>;
export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type ServeConfig = z.infer<typeof ServeConfigSchema>;
