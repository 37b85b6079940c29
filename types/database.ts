/**
 * Local Database Types
 *
 * These types define the structure of data stored in IndexedDB via Dexie.js.
 * The store is denormalized only at its edges: transactions reference a
 * single category row, and sub-categories reference their parent.
 */

// ============================================
// Branded Types for Type Safety
// ============================================

/** Unique identifier for transactions */
export type TransactionId = string & { readonly __brand: 'TransactionId' };

/** Unique identifier for categories */
export type CategoryId = string & { readonly __brand: 'CategoryId' };

/** Unique identifier for a single import (one saveBatch call) */
export type ImportId = string & { readonly __brand: 'ImportId' };

// ============================================
// Helper Functions for Branded Types
// ============================================

export function createTransactionId(id: string): TransactionId {
  return id as TransactionId;
}

export function createCategoryId(id: string): CategoryId {
  return id as CategoryId;
}

export function createImportId(id: string): ImportId {
  return id as ImportId;
}

// ============================================
// Category
// ============================================

/**
 * A category row. Root categories have `parentId === null`;
 * sub-categories point at their parent.
 */
export interface Category {
  /** Unique identifier */
  id: CategoryId;

  /** Category display name (case-sensitive, unique among siblings) */
  name: string;

  /** Parent category ID for nested categories */
  parentId: CategoryId | null;

  /**
   * `parentId` or `''` for roots. IndexedDB does not index null, so
   * sibling lookups and the sibling-name unique index go through this.
   */
  parentKey: string;

  /** Whether this row came from the default seed */
  isDefault: boolean;

  /** Record creation timestamp */
  createdAt: Date;

  /** Last update timestamp */
  updatedAt: Date;
}

// ============================================
// Stored Transaction
// ============================================

/**
 * A persisted transaction.
 */
export interface StoredTransaction {
  /** Unique identifier (UUID) */
  id: TransactionId;

  /** Free-text description (may be empty, never null) */
  description: string;

  /** Transaction date in ISO 8601 format (YYYY-MM-DD) */
  transactionDate: string;

  /** Signed amount: negative = debit, positive = credit */
  amount: number;

  /** Category ID reference (sub-category when one was assigned) */
  categoryId: CategoryId;

  /** Import this row was written by */
  importId: ImportId;

  /** Record creation timestamp */
  createdAt: Date;
}

/**
 * A `(name, parentName)` pair as returned by the hierarchy source.
 */
export interface CategoryPair {
  name: string;
  parentName: string | null;
}
