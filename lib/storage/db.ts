/**
 * Ledger Database
 *
 * Dexie.js database holding categories and persisted transactions.
 *
 * Under Node there is no IndexedDB, so the fake-indexeddb implementation is
 * injected through Dexie's options. A browser host can pass its own
 * `indexedDB` / `IDBKeyRange` instead.
 *
 * Constraints IndexedDB cannot express (foreign keys, not-null) are checked
 * by the transaction coordinator inside the same Dexie transaction.
 */

import Dexie, { type DexieOptions, type Table } from 'dexie';
import {
  IDBKeyRange as fakeIDBKeyRange,
  indexedDB as fakeIndexedDB,
} from 'fake-indexeddb';

import type {
  Category,
  CategoryId,
  CategoryPair,
  StoredTransaction,
  TransactionId,
} from '@/types/database';

// ============================================
// Options
// ============================================

export interface LedgerDatabaseOptions {
  /** Database name (default "StatementLedger") */
  name?: string;

  /** IndexedDB factory; defaults to fake-indexeddb */
  indexedDB?: DexieOptions['indexedDB'];

  /** IDBKeyRange implementation matching `indexedDB` */
  IDBKeyRange?: DexieOptions['IDBKeyRange'];
}

export const DEFAULT_DATABASE_NAME = 'StatementLedger';

// ============================================
// Database Class
// ============================================

/**
 * LedgerDatabase - Dexie.js database for imported statements.
 */
export class LedgerDatabase extends Dexie {
  transactions!: Table<StoredTransaction, TransactionId>;
  categories!: Table<Category, CategoryId>;

  constructor(options: LedgerDatabaseOptions = {}) {
    super(options.name ?? DEFAULT_DATABASE_NAME, {
      indexedDB: options.indexedDB ?? fakeIndexedDB,
      IDBKeyRange: options.IDBKeyRange ?? fakeIDBKeyRange,
    });

    // Version 1: Initial schema
    this.version(1).stores({
      // Categories - roots have parentKey '' and parentId null
      // Indexes: id (PK), name, parentId, [parentKey+name] (unique among siblings)
      categories: 'id, name, parentId, &[parentKey+name]',

      // Transactions - one row per imported statement line
      // Indexes: id (PK), transactionDate, categoryId, importId, createdAt
      transactions: 'id, transactionDate, categoryId, importId, createdAt',
    });
  }

  // ============================================
  // Category Queries
  // ============================================

  /**
   * All categories as `(name, parentName)` pairs.
   */
  async getCategoryPairs(): Promise<CategoryPair[]> {
    const categories = await this.categories.toArray();
    const byId = new Map(categories.map((c) => [c.id, c]));

    return categories.map((c) => ({
      name: c.name,
      parentName: c.parentId ? (byId.get(c.parentId)?.name ?? null) : null,
    }));
  }

  // ============================================
  // Utilities
  // ============================================

  /**
   * Get database statistics.
   */
  async getStats(): Promise<{ transactionCount: number; categoryCount: number }> {
    const [transactionCount, categoryCount] = await Promise.all([
      this.transactions.count(),
      this.categories.count(),
    ]);

    return { transactionCount, categoryCount };
  }
}
