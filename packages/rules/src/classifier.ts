import { errors, withDisclaimer, type AreaClassification } from '@juridico/shared';

import { buildCorpus, matchedKeywords, normalizeFacts } from './keywords';
import type { LegalContentLibrary } from './loader';

/**
 * Proposes an area of law by counting keyword hits per area. The area with the most
 * hits wins; ties go to the area listed first. Areas switched off in the library are
 * never proposed.
 */
export class AreaClassifier {
  constructor(private library: LegalContentLibrary) {}

  classify(facts: readonly string[], legalQuestion = ''): AreaClassification {
    const parts = normalizeFacts([...facts, legalQuestion]);
    if (parts.length === 0) {
      throw errors.emptyFactSet();
    }

    const table = this.library.getClassificationTable();
    const enabled = new Set(this.library.listAreas());
    const corpus = buildCorpus(parts);

    let best: { area: AreaClassification['area']; hits: string[] } | undefined;
    for (const entry of table.areas) {
      if (!enabled.has(entry.area)) continue;
      const hits = matchedKeywords(corpus, entry.keywords);
      if (hits.length > 0 && (!best || hits.length > best.hits.length)) {
        best = { area: entry.area, hits };
      }
    }

    if (!best) {
      return withDisclaimer({ area: table.default_area, matchedKeywords: [], defaulted: true });
    }

    return withDisclaimer({ area: best.area, matchedKeywords: best.hits, defaulted: false });
  }
}
