import { z } from 'zod';
import { validateDomain } from '../utils/domain.js';

export const MIN_CATALOG_YEAR = 2000;
export const MAX_CATALOG_YEAR = 2025;
export const MAX_DOMAINS_PER_YEAR = 50;

export const CatalogYearSchema = z.coerce.number().int().min(MIN_CATALOG_YEAR).max(MAX_CATALOG_YEAR);

// Blank entries are allowed and dropped when the catalog is built
export const CatalogDomainSchema = z
  .string()
  .refine((name) => name.trim() === '' || validateDomain(name), { message: 'Not a valid domain name' });

export const CatalogFileSchema = z
  .record(z.array(CatalogDomainSchema).max(MAX_DOMAINS_PER_YEAR))
  .superRefine((value, ctx) => {
    for (const key of Object.keys(value)) {
      if (!CatalogYearSchema.safeParse(key).success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `Year must be an integer between ${MIN_CATALOG_YEAR} and ${MAX_CATALOG_YEAR}`,
        });
      }
    }
  });

export type CatalogFile = z.infer<typeof CatalogFileSchema>;
