// Second-level labels that sit under a ccTLD as part of the public suffix (example.co.uk)
const SECOND_LEVEL_SUFFIXES = new Set(['co', 'com', 'net', 'org', 'ac', 'gov', 'edu', 'ne', 'or', 'go']);

const DOMAIN_REGEX = /^(?=.{1,253}$)([a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z][a-z0-9-]{0,62}$/;

export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/\.$/, '');
}

export function validateDomain(domain: string): boolean {
  if (!domain || typeof domain !== 'string') return false;
  return DOMAIN_REGEX.test(normalizeDomain(domain));
}

/**
 * Registrable part of a host name: the label under the public suffix plus the suffix.
 * Only the common ccTLD second-level suffixes are recognised.
 */
export function registrableDomain(host: string): string {
  const labels = normalizeDomain(host).split('.').filter(Boolean);
  if (labels.length <= 2) return labels.join('.');

  const tld = labels[labels.length - 1] ?? '';
  const second = labels[labels.length - 2] ?? '';
  const keep = tld.length === 2 && SECOND_LEVEL_SUFFIXES.has(second) ? 3 : 2;
  return labels.slice(-keep).join('.');
}

export function extractHost(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

export function isSameRegistrableDomain(a: string, b: string): boolean {
  return registrableDomain(a) === registrableDomain(b);
}

/** Name part used for scoring: everything before the first dot. */
export function domainLabel(domain: string): string {
  return normalizeDomain(domain).split('.')[0] ?? '';
}

export function domainTld(domain: string): string {
  const labels = normalizeDomain(domain).split('.');
  return labels[labels.length - 1] ?? '';
}
