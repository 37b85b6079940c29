/**
 * Category Repository
 *
 * Read side of the store: the category hierarchy handed to the categorizer
 * as prompt context, default-category seeding and the denormalized
 * transaction table.
 */

import { z } from 'zod';

import defaultCategoriesJson from '@/data/default-categories.json';
import type { HierarchyCachePolicy } from '@/lib/config';
import type { HierarchySource } from '@/lib/processing/processor';
import type { Category, CategoryId, CategoryPair } from '@/types/database';
import type { CategoryHierarchy, FinalTable, FinalTransaction } from '@/types/pipeline';

import { CategoryResolver } from './category-resolver';
import type { LedgerDatabase } from './db';
import { runInTransaction } from './transaction-context';

// ============================================
// Seed Data
// ============================================

const DefaultCategoriesSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

export type DefaultCategories = z.infer<typeof DefaultCategoriesSchema>;

export const DEFAULT_CATEGORIES: DefaultCategories =
  DefaultCategoriesSchema.parse(defaultCategoriesJson);

// ============================================
// Types
// ============================================

export interface TransactionFilters {
  /** Inclusive ISO date bounds */
  dateRange?: { start?: string; end?: string };

  /** Parent category names; empty or missing means all */
  categories?: string[];

  /** Inclusive signed amount bounds */
  amountRange?: { min?: number; max?: number };
}

export interface CategoryRepositoryOptions {
  cachePolicy?: HierarchyCachePolicy;
}

/**
 * Build the parent → children map from `(name, parentName)` pairs.
 */
export function buildHierarchy(pairs: CategoryPair[]): CategoryHierarchy {
  const hierarchy: CategoryHierarchy = {};

  for (const pair of pairs) {
    if (pair.parentName === null) {
      hierarchy[pair.name] ??= [];
    }
  }

  for (const pair of pairs) {
    if (pair.parentName !== null) {
      const children = (hierarchy[pair.parentName] ??= []);
      children.push(pair.name);
    }
  }

  for (const children of Object.values(hierarchy)) {
    children.sort((a, b) => a.localeCompare(b));
  }

  return hierarchy;
}

// ============================================
// Repository
// ============================================

export class CategoryRepository implements HierarchySource {
  private cachePolicy: HierarchyCachePolicy;
  private cached: CategoryHierarchy | null = null;

  constructor(
    private db: LedgerDatabase,
    options: CategoryRepositoryOptions = {}
  ) {
    this.cachePolicy = options.cachePolicy ?? 'per-run';
  }

  // ============================================
  // Hierarchy
  // ============================================

  async getCategoryPairs(): Promise<CategoryPair[]> {
    return this.db.getCategoryPairs();
  }

  async getHierarchy(): Promise<CategoryHierarchy> {
    if (this.cachePolicy !== 'none' && this.cached) {
      return this.cached;
    }

    const hierarchy = buildHierarchy(await this.getCategoryPairs());

    if (this.cachePolicy !== 'none') {
      this.cached = hierarchy;
    }

    return hierarchy;
  }

  /**
   * Mark the start of an import. Under the per-run policy the next read
   * goes back to the store.
   */
  beginRun(): void {
    if (this.cachePolicy === 'per-run') {
      this.cached = null;
    }
  }

  /** Drop any cached snapshot regardless of policy */
  invalidate(): void {
    this.cached = null;
  }

  // ============================================
  // Seeding
  // ============================================

  /**
   * Create the default categories that do not exist yet.
   * Returns the number of rows created.
   */
  async seedDefaultCategories(
    defaults: DefaultCategories = DEFAULT_CATEGORIES
  ): Promise<number> {
    const resolver = new CategoryResolver();

    const { context } = await runInTransaction(this.db, async (ctx) => {
      for (const [parent, children] of Object.entries(defaults)) {
        await resolver.resolveOrCreate(parent, '', ctx, { isDefault: true });
        for (const child of children) {
          await resolver.resolveOrCreate(parent, child, ctx, { isDefault: true });
        }
      }
    });

    const created = context.createdCategories.length;
    if (created > 0) {
      this.invalidate();
      console.log(`[CategoryRepository] Seeded ${created} default categories`);
    }

    return created;
  }

  // ============================================
  // Transactions
  // ============================================

  /**
   * All persisted transactions as final-table rows, ordered by date.
   * `category` is the parent name; `subCategory` the child name or "".
   */
  async getTransactionsTable(): Promise<FinalTable> {
    const [transactions, categories] = await Promise.all([
      this.db.transactions.orderBy('transactionDate').toArray(),
      this.db.categories.toArray(),
    ]);

    const byId = new Map<CategoryId, Category>(categories.map((c) => [c.id, c]));

    return transactions.map((tx): FinalTransaction => {
      const category = byId.get(tx.categoryId);
      const parent = category?.parentId ? byId.get(category.parentId) : undefined;

      return {
        description: tx.description,
        transactionDate: tx.transactionDate,
        amount: tx.amount,
        category: parent?.name ?? category?.name ?? '',
        subCategory: parent && category ? category.name : '',
      };
    });
  }

  async getTransactionsFiltered(filters: TransactionFilters = {}): Promise<FinalTable> {
    const { dateRange, categories, amountRange } = filters;
    const wanted = categories && categories.length > 0 ? new Set(categories) : null;

    const rows = await this.getTransactionsTable();

    return rows.filter((row) => {
      if (dateRange?.start && row.transactionDate < dateRange.start) return false;
      if (dateRange?.end && row.transactionDate > dateRange.end) return false;
      if (wanted && !wanted.has(row.category)) return false;
      if (amountRange?.min !== undefined && row.amount < amountRange.min) return false;
      if (amountRange?.max !== undefined && row.amount > amountRange.max) return false;
      return true;
    });
  }
}
