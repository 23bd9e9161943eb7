import type { CatalogEntry } from '../types/catalog.js';
import type { ProbeResult } from '../types/probe.js';
import type { Classification } from '../types/record.js';
import { DEFAULT_CLASSIFIER_RULES, type ClassifierRules } from './rules.js';

export class PageClassifier {
  private readonly rules: ClassifierRules;

  constructor(rules: ClassifierRules = DEFAULT_CLASSIFIER_RULES) {
    this.rules = rules;
  }

  classify(entry: CatalogEntry, probe: ProbeResult): Classification {
    if (!probe.reached) {
      return {
        status: 'unknown',
        confidence: 'low',
        reason: `No HTTP response for ${entry.domain}${probe.failure ? ` (${probe.failure.kind})` : ''}`,
        salePlatform: null,
      };
    }

    if (probe.crossDomainRedirect) {
      return {
        status: 'redirect',
        confidence: 'high',
        reason: `Redirects to ${probe.finalUrl ?? 'another domain'}`,
        salePlatform: null,
      };
    }

    const text = `${probe.pageTitle ?? ''} ${probe.bodyText}`.toLowerCase();
    const isThin = text.replace(/\s/g, '').length < this.rules.thinPageThreshold;

    const saleMarker = this.findMarker(text, this.rules.saleMarkers);
    if (saleMarker) {
      return {
        status: 'for_sale',
        confidence: 'high',
        reason: `Page offers the domain for sale ("${saleMarker}")`,
        salePlatform: this.findMarker(text, this.rules.salePlatforms),
      };
    }

    // Parking keywords only count on thin pages that show no sign of real content
    if (isThin && !this.findMarker(text, this.rules.realContentMarkers)) {
      const platform = this.findMarker(text, this.rules.salePlatforms);
      if (platform) {
        return {
          status: 'for_sale',
          confidence: 'medium',
          reason: `Thin page mentioning a domain marketplace (${platform})`,
          salePlatform: platform,
        };
      }

      const parkedMarker = this.findMarker(text, this.rules.parkedMarkers);
      if (parkedMarker) {
        return {
          status: 'parked',
          confidence: 'high',
          reason: `Thin placeholder page ("${parkedMarker}")`,
          salePlatform: null,
        };
      }
    }

    return {
      status: 'active',
      confidence: isThin ? 'medium' : 'high',
      reason: isThin ? 'Short page without parking markers' : 'Substantial page content',
      salePlatform: null,
    };
  }

  private findMarker(text: string, markers: string[]): string | null {
    return markers.find((marker) => text.includes(marker)) ?? null;
  }
}

export function classify(entry: CatalogEntry, probe: ProbeResult, rules?: ClassifierRules): Classification {
  return new PageClassifier(rules).classify(entry, probe);
}
