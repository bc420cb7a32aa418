/**
 * Rule Catalog
 *
 * Immutable, ordered collection of rules. Built once at startup and shared
 * by reference with every analysis worker.
 */

import { SUPPORTED_LANGUAGES, type Language } from '../language/classifier.js';
import type { Rule } from './types.js';
import { CatalogError } from './types.js';

export class RuleCatalog {
  /** All rules in load order */
  readonly rules: readonly Rule[];
  private readonly byLanguage: ReadonlyMap<Language, readonly Rule[]>;

  /**
   * @throws {CatalogError} If two rules share an id
   */
  constructor(rules: readonly Rule[]) {
    const seen = new Map<string, Rule>();
    for (const rule of rules) {
      const existing = seen.get(rule.id);
      if (existing !== undefined) {
        throw new CatalogError(
          `Duplicate rule id "${rule.id}" (${existing.source} and ${rule.source})`,
          'DUPLICATE_ID',
          rule.source
        );
      }
      seen.set(rule.id, rule);
    }

    this.rules = Object.freeze([...rules]);

    const generic = this.rules.filter((rule) => rule.languages === 'generic');
    const byLanguage = new Map<Language, readonly Rule[]>([['unknown', Object.freeze(generic)]]);
    for (const language of SUPPORTED_LANGUAGES) {
      const specific = this.rules.filter(
        (rule) => rule.languages !== 'generic' && rule.languages.includes(language)
      );
      byLanguage.set(language, Object.freeze([...specific, ...generic]));
    }
    this.byLanguage = byLanguage;

    Object.freeze(this);
  }

  get size(): number {
    return this.rules.length;
  }

  /**
   * Language-specific rules in catalog order, then the generic rules.
   * A rule's index in this list is its rank for tie-breaking.
   */
  rulesFor(language: Language): readonly Rule[] {
    return this.byLanguage.get(language) ?? [];
  }
}
