/**
 * Rule-Based Auto-Categorizer
 *
 * Deterministic categorization for the rule-based processor. Descriptions
 * are matched against keyword rules loaded from `data/category-rules.json`.
 *
 * Matching strategy:
 * - Plain keyword: case-insensitive `.includes()`
 * - Word-boundary: only matches whole words (e.g., "bus" won't match "business")
 * - Exclusions: rejects a match if an exclude pattern is also found
 *
 * Rules are tried in file order; the first rule whose own keywords or any
 * sub-category keywords match wins.
 */

import { z } from 'zod';

import categoryRulesJson from '@/data/category-rules.json';
import type { CategorizedTransaction, NormalizedTransaction } from '@/types/pipeline';

// ============================================
// Rule Schema
// ============================================

const VendorPatternSchema = z.object({
  keyword: z.string().min(1),
  wordBoundary: z.boolean().optional(),
  exclude: z.array(z.string()).optional(),
});

const KeywordSchema = z.union([z.string().min(1), VendorPatternSchema]);

export const CategoryRulesSchema = z.object({
  defaultCategory: z.string().min(1),
  rules: z.array(
    z.object({
      category: z.string().min(1),
      keywords: z.array(KeywordSchema),
      subCategories: z
        .array(z.object({ name: z.string().min(1), keywords: z.array(KeywordSchema) }))
        .default([]),
    })
  ),
});

export type CategoryRules = z.infer<typeof CategoryRulesSchema>;
export type VendorKeyword = z.infer<typeof KeywordSchema>;

export const DEFAULT_CATEGORY_RULES: CategoryRules = CategoryRulesSchema.parse(categoryRulesJson);

// ============================================
// Keyword Matching
// ============================================

/**
 * Test whether a description matches a single keyword.
 */
export function matchesKeyword(textLower: string, keyword: VendorKeyword): boolean {
  if (typeof keyword === 'string') {
    return textLower.includes(keyword.toLowerCase());
  }

  const kw = keyword.keyword.toLowerCase();

  if (keyword.wordBoundary) {
    const escaped = kw.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const regex = new RegExp(`(?:^|[^a-z0-9])${escaped}(?:$|[^a-z0-9])`, 'i');
    if (!regex.test(textLower)) {
      return false;
    }
  } else if (!textLower.includes(kw)) {
    return false;
  }

  if (keyword.exclude?.some((ex) => textLower.includes(ex.toLowerCase()))) {
    return false;
  }

  return true;
}

// ============================================
// Categorizer
// ============================================

export interface RuleSuggestion {
  category: string;
  subCategory: string;
  /** Keyword that triggered the match, null for the default */
  matchedKeyword: string | null;
}

export class RuleBasedCategorizer {
  constructor(private rules: CategoryRules = DEFAULT_CATEGORY_RULES) {}

  suggest(description: string): RuleSuggestion {
    const text = description.toLowerCase().trim();

    if (text) {
      for (const rule of this.rules.rules) {
        const sub = rule.subCategories.find((s) => s.keywords.some((k) => matchesKeyword(text, k)));
        const own = rule.keywords.find((k) => matchesKeyword(text, k));

        if (sub || own) {
          const subKeyword = sub?.keywords.find((k) => matchesKeyword(text, k));
          const matched = own ?? subKeyword;
          return {
            category: rule.category,
            subCategory: sub?.name ?? '',
            matchedKeyword:
              matched === undefined ? null : typeof matched === 'string' ? matched : matched.keyword,
          };
        }
      }
    }

    return { category: this.rules.defaultCategory, subCategory: '', matchedKeyword: null };
  }

  categorize(rows: NormalizedTransaction[]): CategorizedTransaction[] {
    return rows.map((row) => {
      const { category, subCategory } = this.suggest(row.description);
      return { ...row, category, subCategory };
    });
  }

  getAvailableCategories(): string[] {
    return [...this.rules.rules.map((r) => r.category), this.rules.defaultCategory];
  }
}
