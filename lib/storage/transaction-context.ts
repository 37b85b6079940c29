/**
 * Transaction Context
 *
 * Exclusively-owned handle to one in-flight Dexie read-write transaction
 * over the categories and transactions tables.
 *
 * State machine: begun → committed | rolled_back. Terminal states are
 * final; every accessor throws TransactionStateError afterwards.
 *
 * Tables are taken from the Dexie `Transaction` itself rather than from the
 * database, so reads and writes stay bound to it across nested async calls.
 */

import type { Table, Transaction } from 'dexie';
import { v4 as uuidv4 } from 'uuid';

import { TransactionStateError } from '@/lib/errors';
import type {
  Category,
  CategoryId,
  StoredTransaction,
  TransactionId,
} from '@/types/database';

import type { LedgerDatabase } from './db';

// ============================================
// Types
// ============================================

export type TransactionState = 'begun' | 'committed' | 'rolled_back';

// ============================================
// Context
// ============================================

export class TransactionContext {
  readonly id: string = uuidv4();

  private state: TransactionState = 'begun';
  private rollbackReason: unknown = null;

  /** `parent\u0000child` → resolved category id, scoped to this transaction */
  private resolved = new Map<string, CategoryId>();

  /** Categories created inside this transaction */
  private created: Category[] = [];

  constructor(private tx: Transaction) {}

  get status(): TransactionState {
    return this.state;
  }

  get isActive(): boolean {
    return this.state === 'begun';
  }

  get reason(): unknown {
    return this.rollbackReason;
  }

  assertActive(): void {
    if (this.state !== 'begun') {
      throw new TransactionStateError(
        `Transaction ${this.id} is ${this.state} and cannot be used`
      );
    }
  }

  // ============================================
  // Table Access
  // ============================================

  get categories(): Table<Category, CategoryId> {
    this.assertActive();
    return this.tx.table<Category, CategoryId>('categories');
  }

  get transactions(): Table<StoredTransaction, TransactionId> {
    this.assertActive();
    return this.tx.table<StoredTransaction, TransactionId>('transactions');
  }

  /**
   * Find a category by exact (case-sensitive) name under a parent.
   * `parentId === null` searches the roots.
   */
  async findCategory(name: string, parentId: CategoryId | null): Promise<Category | undefined> {
    return this.categories
      .where('[parentKey+name]')
      .equals([parentId ?? '', name])
      .first();
  }

  // ============================================
  // Resolution Bookkeeping
  // ============================================

  getResolved(key: string): CategoryId | undefined {
    this.assertActive();
    return this.resolved.get(key);
  }

  setResolved(key: string, id: CategoryId): void {
    this.assertActive();
    this.resolved.set(key, id);
  }

  recordCreated(category: Category): void {
    this.assertActive();
    this.created.push(category);
  }

  /** Categories created in this transaction (readable in any state) */
  get createdCategories(): readonly Category[] {
    return this.created;
  }

  // ============================================
  // Transitions
  // ============================================

  markCommitted(): void {
    this.assertActive();
    this.state = 'committed';
  }

  markRolledBack(reason: unknown): void {
    this.assertActive();
    this.state = 'rolled_back';
    this.rollbackReason = reason;
    // Anything created inside was undone with the transaction
    this.created = [];
  }
}

// ============================================
// Runner
// ============================================

/**
 * Run `work` inside one atomic Dexie transaction.
 * A throw from `work` rolls everything back and is rethrown.
 */
export async function runInTransaction<T>(
  db: LedgerDatabase,
  work: (ctx: TransactionContext) => Promise<T>
): Promise<{ value: T; context: TransactionContext }> {
  const scope: { context?: TransactionContext } = {};

  try {
    const value = await db.transaction('rw', [db.categories, db.transactions], (tx) => {
      scope.context = new TransactionContext(tx);
      return work(scope.context);
    });
    const context = scope.context;
    if (!context) {
      throw new TransactionStateError('Transaction scope did not run');
    }
    context.markCommitted();
    return { value, context };
  } catch (error) {
    if (scope.context?.isActive) {
      scope.context.markRolledBack(error);
    }
    throw error;
  }
}
