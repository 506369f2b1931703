/**
 * Keyword Taxonomy
 *
 * Immutable lookup from pain category to its keywords, severity weight and
 * MECE pillar. Built once per run from the validated pain_keywords.json and
 * handed to every component that needs it.
 */

import type { TaxonomyConfig } from '../config';
import type { KeywordCategory, Pillar } from '../types';

/**
 * Fixed category -> pillar mapping. Every category resolves to exactly one pillar.
 */
export const PILLAR_MAPPING: Readonly<Record<string, Pillar>> = Object.freeze({
  critical: 'Functional',
  performance: 'Functional',
  privacy: 'Functional',
  ai_quality: 'Functional',
  scam_financial: 'Economic',
  subscription: 'Economic',
  broken_promise: 'Economic',
  ads: 'Economic',
  usability: 'Experience',
  competitor_mention: 'Experience',
  generic_pain: 'Experience',
});

const FALLBACK_PILLAR: Pillar = 'Experience';

export class KeywordTaxonomy {
  private readonly categories: ReadonlyMap<string, KeywordCategory>;

  constructor(categories: KeywordCategory[]) {
    const byName = new Map<string, KeywordCategory>();
    for (const category of categories) {
      byName.set(
        category.name,
        Object.freeze({
          ...category,
          keywords: Object.freeze(category.keywords.map((keyword) => keyword.toLowerCase())),
        })
      );
    }
    this.categories = byName;
  }

  /**
   * Build the taxonomy from pain_keywords.json.
   *
   * Mapped categories missing from the file get weight 0; categories the
   * mapping does not know land in the Experience pillar. Both produce a warning.
   */
  static fromConfig(config: TaxonomyConfig): KeywordTaxonomy {
    const categories: KeywordCategory[] = [];

    for (const [name, data] of Object.entries(config.categories)) {
      const pillar = PILLAR_MAPPING[name];
      if (!pillar) {
        console.warn(`⚠️  Category '${name}' has no pillar mapping, assigning ${FALLBACK_PILLAR}`);
      }
      categories.push({
        name,
        keywords: data.keywords,
        weight: data.weight,
        pillar: pillar ?? FALLBACK_PILLAR,
      });
    }

    for (const [name, pillar] of Object.entries(PILLAR_MAPPING)) {
      if (!(name in config.categories)) {
        console.warn(`⚠️  Category '${name}' missing from taxonomy, weight set to 0`);
        categories.push({ name, keywords: [], weight: 0, pillar });
      }
    }

    return new KeywordTaxonomy(categories);
  }

  list(): KeywordCategory[] {
    return Array.from(this.categories.values());
  }

  get(name: string): KeywordCategory | undefined {
    return this.categories.get(name);
  }

  weightOf(name: string): number {
    return this.categories.get(name)?.weight ?? 0;
  }

  pillarOf(name: string): Pillar {
    return this.categories.get(name)?.pillar ?? PILLAR_MAPPING[name] ?? FALLBACK_PILLAR;
  }

  keywordsOf(name: string): readonly string[] {
    return this.categories.get(name)?.keywords ?? [];
  }
}
