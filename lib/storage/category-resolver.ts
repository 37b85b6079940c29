/**
 * Category Resolver
 *
 * Resolves a (category, sub-category) name pair to a category id inside an
 * active transaction, creating the parent and then the child when they do
 * not exist yet. Creation happens in the caller's transaction, so it
 * commits or rolls back together with the rows that needed it.
 *
 * Lookup is by exact, case-sensitive name after trimming. Resolving the
 * same pair again never creates a duplicate.
 */

import { v4 as uuidv4 } from 'uuid';

import { ConstraintViolation } from '@/lib/errors';
import { createCategoryId, type Category, type CategoryId } from '@/types/database';

import type { TransactionContext } from './transaction-context';

export interface ResolveOptions {
  /** Mark newly created rows as part of the default seed */
  isDefault?: boolean;
}

function pairKey(category: string, subCategory: string): string {
  return `${category}\u0000${subCategory}`;
}

export class CategoryResolver {
  /**
   * Id of the sub-category, or of the parent when `subCategoryName` is empty.
   */
  async resolveOrCreate(
    categoryName: string,
    subCategoryName: string,
    ctx: TransactionContext,
    options: ResolveOptions = {}
  ): Promise<CategoryId> {
    ctx.assertActive();

    const parentName = categoryName.trim();
    const childName = subCategoryName.trim();

    if (!parentName) {
      throw new ConstraintViolation('Category name must not be empty', 'not_null', null, 'category');
    }

    const key = pairKey(parentName, childName);
    const cached = ctx.getResolved(key);
    if (cached) return cached;

    const parentKey = pairKey(parentName, '');
    let parentId = ctx.getResolved(parentKey);
    if (!parentId) {
      const parent =
        (await ctx.findCategory(parentName, null)) ??
        (await this.create(parentName, null, ctx, options));
      parentId = parent.id;
      ctx.setResolved(parentKey, parentId);
    }

    if (!childName) {
      return parentId;
    }

    const child =
      (await ctx.findCategory(childName, parentId)) ??
      (await this.create(childName, parentId, ctx, options));
    ctx.setResolved(key, child.id);

    return child.id;
  }

  private async create(
    name: string,
    parentId: CategoryId | null,
    ctx: TransactionContext,
    options: ResolveOptions
  ): Promise<Category> {
    const now = new Date();
    const category: Category = {
      id: createCategoryId(uuidv4()),
      name,
      parentId,
      parentKey: parentId ?? '',
      isDefault: options.isDefault ?? false,
      createdAt: now,
      updatedAt: now,
    };

    await ctx.categories.add(category);
    ctx.recordCreated(category);

    if (!options.isDefault) {
      console.log(
        `[CategoryResolver] Created ${parentId ? 'sub-category' : 'category'} "${name}"`
      );
    }

    return category;
  }
}
