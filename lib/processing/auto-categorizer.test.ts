/**
 * Unit Tests for the Rule-Based Auto-Categorizer
 *
 * Tests the keyword rules' ability to:
 * - Pick a category and sub-category from description keywords
 * - Respect word boundaries and exclusions
 * - Fall back to the default category
 */

import { describe, it, expect } from 'vitest';

import { createNormalizedTransaction } from '@/tests/factories/transaction';

import { CategoryRulesSchema, matchesKeyword, RuleBasedCategorizer } from './auto-categorizer';

const categorizer = new RuleBasedCategorizer();

// ============================================
// Keyword Matching
// ============================================

describe('matchesKeyword', () => {
  it('should match plain keywords as substrings', () => {
    expect(matchesKeyword('weekly groceries at supermarket', 'supermarket')).toBe(true);
  });

  it('should respect word boundaries', () => {
    expect(matchesKeyword('business lunch', { keyword: 'bus', wordBoundary: true })).toBe(false);
    expect(matchesKeyword('city bus pass', { keyword: 'bus', wordBoundary: true })).toBe(true);
  });

  it('should reject excluded phrases', () => {
    expect(
      matchesKeyword('uber eats order', { keyword: 'uber', wordBoundary: true, exclude: ['uber eats'] })
    ).toBe(false);
  });
});

// ============================================
// Suggestions
// ============================================

describe('RuleBasedCategorizer.suggest', () => {
  it('should pick food delivery for Uber Eats', () => {
    expect(categorizer.suggest('UBER EATS ORDER 123')).toEqual({
      category: 'Food & Dining',
      subCategory: 'Food Delivery',
      matchedKeyword: 'uber eats',
    });
  });

  it('should pick ride hailing for an Uber trip', () => {
    expect(categorizer.suggest('Uber trip 42')).toEqual({
      category: 'Transportation',
      subCategory: 'Ride Hailing',
      matchedKeyword: 'uber',
    });
  });

  it('should leave the sub-category empty when only the parent matches', () => {
    expect(categorizer.suggest('ATM WDL 1234')).toEqual({
      category: 'ATM',
      subCategory: '',
      matchedKeyword: 'atm',
    });
  });

  it('should fall back to the default category', () => {
    expect(categorizer.suggest('Business lunch')).toEqual({
      category: 'Other',
      subCategory: '',
      matchedKeyword: null,
    });
    expect(categorizer.suggest('   ').category).toBe('Other');
  });
});

describe('RuleBasedCategorizer.categorize', () => {
  it('should attach a category to every row', () => {
    const rows = categorizer.categorize([
      createNormalizedTransaction({ description: 'Netflix subscription' }),
      createNormalizedTransaction({ description: 'Unknown merchant' }),
    ]);

    expect(rows.map((r) => [r.category, r.subCategory])).toEqual([
      ['Entertainment', 'Streaming'],
      ['Other', ''],
    ]);
    expect(rows[0]?.amount).toBe(-42.5);
  });

  it('should accept custom rules', () => {
    const custom = new RuleBasedCategorizer(
      CategoryRulesSchema.parse({
        defaultCategory: 'Misc',
        rules: [{ category: 'Pets', keywords: ['vet'] }],
      })
    );

    expect(custom.suggest('City Vet Clinic').category).toBe('Pets');
    expect(custom.getAvailableCategories()).toEqual(['Pets', 'Misc']);
  });

  it('should list the default categories with the fallback last', () => {
    const categories = categorizer.getAvailableCategories();

    expect(categories[0]).toBe('Food & Dining');
    expect(categories[categories.length - 1]).toBe('Other');
  });
});
