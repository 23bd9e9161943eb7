import { z } from 'zod';

// IANA bootstrap file: services are [tlds[], baseUrls[]] pairs
export const RdapBootstrapSchema = z.object({
  services: z.array(z.tuple([z.array(z.string()), z.array(z.string())])),
});

// jCard: ["vcard", [[name, params, type, value], ...]]
export const VcardArraySchema = z.tuple([z.literal('vcard'), z.array(z.array(z.unknown()))]);

export interface RdapEntity {
  roles?: string[] | undefined;
  vcardArray?: unknown;
  entities?: RdapEntity[] | undefined;
}

export const RdapEntitySchema: z.ZodType<RdapEntity> = z.lazy(() =>
  z.object({
    roles: z.array(z.string()).optional(),
    vcardArray: z.unknown().optional(),
    entities: z.array(RdapEntitySchema).optional(),
  })
);

export const RdapEventSchema = z.object({
  eventAction: z.string(),
  eventDate: z.string(),
});

export const RdapDomainSchema = z.object({
  objectClassName: z.string(),
  ldhName: z.string().optional(),
  status: z.array(z.string()).default([]),
  events: z.array(RdapEventSchema).default([]),
  entities: z.array(RdapEntitySchema).default([]),
  nameservers: z.array(z.object({ ldhName: z.string().optional() })).default([]),
});

export type RdapBootstrap = z.infer<typeof RdapBootstrapSchema>;
export type RdapDomain = z.infer<typeof RdapDomainSchema>;
