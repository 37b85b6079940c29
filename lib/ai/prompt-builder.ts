/**
 * Prompt Builder
 *
 * Builds the three prompts of the normalization pipeline:
 * structural analysis, description mapping and batch categorization.
 * Every prompt asks for a bare JSON payload; responses are validated by
 * the caller.
 */

import type {
  AmountRepresentation,
  CategoryHierarchy,
  NormalizedTransaction,
} from '@/types/pipeline';

// ============================================
// Constants
// ============================================

export const AMOUNT_REPRESENTATIONS: readonly AmountRepresentation[] = [
  'dual_column_debit_credit',
  'single_column_signed',
  'single_column_with_type',
];

/** Category the model is told to use, with an empty sub-category, when nothing fits */
export const FALLBACK_CATEGORY = 'Other';

// ============================================
// Pass 1: Structural Analysis
// ============================================

export function buildStructuralPrompt(columns: string[], sampleCsv: string): string {
  return `You are a data structure analyst. Analyze the following sample of bank statement rows and determine how dates and transaction amounts are stored.

Available columns: ${JSON.stringify(columns)}

Identify:
1. Date information:
   - The column containing the transaction date.
   - The strftime format string for that column (e.g. "%Y-%m-%d", "%d/%m/%Y", "%m/%d/%Y", "%d %b %Y").

2. Amount representation, exactly one of:
   - "dual_column_debit_credit": separate columns for debit and credit amounts.
   - "single_column_signed": one column where debits are negative and credits positive.
   - "single_column_with_type": one amount column plus a column saying whether the row is a debit or a credit (e.g. "DR"/"CR", "Debit"/"Credit").

3. For "dual_column_debit_credit", the debit column and the credit column.
4. For "single_column_signed", the amount column.
5. For "single_column_with_type", the amount column, the type column, and the exact text used for debits and for credits in the type column.

Ignore header, footer and balance rows.

Respond with a single JSON object of this shape:
{
  "date_info": {
    "column_name": "<column name>",
    "format_string": "<strftime format>"
  },
  "amount_info": {
    "representation": "<one of ${AMOUNT_REPRESENTATIONS.join(', ')}>",
    "debit_column": "<column name or null>",
    "credit_column": "<column name or null>",
    "amount_column": "<column name or null>",
    "type_column": "<column name or null>",
    "debit_identifier": "<text or null>",
    "credit_identifier": "<text or null>"
  }
}

Data sample:
---
${sampleCsv}
---

Respond ONLY with the JSON object, no markdown fences.`;
}

// ============================================
// Pass 2: Semantic Mapping
// ============================================

export function buildSemanticPrompt(
  usedColumns: string[],
  remainingColumns: string[],
  sampleCsv: string
): string {
  return `You are a financial data analyst. Identify the column that best describes each transaction (the narrative, payee or details text).

Columns already mapped to date and amount: ${JSON.stringify(usedColumns)}

Choose ONE of the remaining columns: ${JSON.stringify(remainingColumns)}

Sample of the remaining columns:
---
${sampleCsv}
---

Respond with a single JSON object:
{ "description_column": "<column name>" }

If none of the columns describes the transaction, respond with:
{ "description_column": null }

Respond ONLY with the JSON object, no markdown fences.`;
}

// ============================================
// Pass 3: Categorization
// ============================================

export function buildCategorizationPrompt(
  rows: NormalizedTransaction[],
  hierarchy: CategoryHierarchy
): string {
  const txList = rows
    .map(
      (row, i) =>
        `${i + 1}. description=${JSON.stringify(row.description)} | amount=${row.amount} | date=${row.transactionDate}`
    )
    .join('\n');

  return `You are an expert financial categorisation engine. Assign a category and sub-category to each transaction below.

Category hierarchy (parent category → allowed sub-categories):
${JSON.stringify(hierarchy, null, 2)}

Transactions to categorise:
${txList}

Respond with a JSON array of exactly ${rows.length} objects, one per transaction, in the same order:
[
  { "category": "<parent category from the hierarchy>", "sub_category": "<sub-category of that parent, or empty string>" }
]

Rules:
- "category" must be one of the parent keys of the hierarchy.
- "sub_category" must be one of that parent's sub-categories, or "" when none fits.
- If no category fits, use "${FALLBACK_CATEGORY}" with an empty "sub_category".
- Never split or merge transactions.
- Respond ONLY with the JSON array, nothing else.`;
}
