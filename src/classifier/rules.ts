export interface ClassifierRules {
  /** Pages with fewer non-space characters than this count as thin */
  thinPageThreshold: number;
  /** Phrases offering the domain itself for purchase; decisive at any page length */
  saleMarkers: string[];
  /** Brokers and marketplaces; only trusted on thin pages, real sites carry them in ads */
  salePlatforms: string[];
  /** Registrar placeholders and ad-only parking copy */
  parkedMarkers: string[];
  /** Phrases a parking page does not carry; their presence keeps a thin page active */
  realContentMarkers: string[];
}

export const DEFAULT_CLASSIFIER_RULES: ClassifierRules = {
  thinPageThreshold: 2000,
  saleMarkers: [
    'buy this domain',
    'purchase this domain',
    'make an offer on this domain',
    'acquire this domain',
    'this domain is for sale',
    'domain is available for purchase',
    'domain may be for sale',
    'domain for sale',
  ],
  salePlatforms: [
    'sedo',
    'afternic',
    'dan.com',
    'hugedomains',
    'godaddy',
    'namecheap',
    'flippa',
    'squadhelp',
    'brandpa',
    'atom.com',
    'undeveloped',
    'domainagents',
    'buy.it',
  ],
  parkedMarkers: [
    'this domain is parked',
    'domain is parked',
    'parked free',
    'parked by',
    'parked domain',
    'domain parking',
    'this webpage was generated',
    'sponsored listings',
    'related searches',
    'get this domain',
  ],
  realContentMarkers: [
    'sign in',
    'sign up',
    'log in',
    'my account',
    'add to cart',
    'checkout',
    'subscribe',
    'latest news',
    'read more',
  ],
};
