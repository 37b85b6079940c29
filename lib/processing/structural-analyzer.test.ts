/**
 * Unit Tests for the Structural Analyzer
 *
 * Covers response validation, the date-format sample check, the LLM
 * analyzer's failure modes and the header heuristics of the rule-based
 * analyzer.
 */

import { describe, it, expect } from 'vitest';

import { StructuralDiscoveryFailure } from '@/lib/errors';
import {
  createMockLLMClient,
  dualColumnResponse,
  signedColumnResponse,
  typedColumnResponse,
} from '@/tests/factories/llm';

import { frameFromRows } from './frame';
import {
  getConsumedColumns,
  HeuristicStructuralAnalyzer,
  LLMStructuralAnalyzer,
  StructuralResponseSchema,
  toStructuralInfo,
  type StructuralResponse,
} from './structural-analyzer';

// ============================================
// Test Helpers
// ============================================

function parseResponse(text: string): StructuralResponse {
  return StructuralResponseSchema.parse(JSON.parse(text));
}

const dualSample = frameFromRows(['Date', 'Description', 'Debit', 'Credit'], [
  { Date: '01/15/2024', Description: 'Coffee', Debit: '50.00', Credit: '' },
  { Date: '01/16/2024', Description: 'Salary', Debit: '', Credit: '1,000.00' },
]);

const typedSample = frameFromRows(['Txn Date', 'Narration', 'Amount', 'Type'], [
  { 'Txn Date': '2024-03-01', Narration: 'Rent', Amount: '900.00', Type: 'DR' },
  { 'Txn Date': '2024-03-02', Narration: 'Refund', Amount: '20.00', Type: 'CR' },
]);

// ============================================
// toStructuralInfo
// ============================================

describe('toStructuralInfo', () => {
  it('should build a dual-column result', () => {
    const info = toStructuralInfo(
      parseResponse(dualColumnResponse('Date', '%m/%d/%Y', 'Debit', 'Credit')),
      dualSample
    );

    expect(info).toEqual({
      dateColumn: 'Date',
      dateFormat: '%m/%d/%Y',
      amount: {
        representation: 'dual_column_debit_credit',
        debitColumn: 'Debit',
        creditColumn: 'Credit',
      },
    });
    expect(Object.isFrozen(info)).toBe(true);
  });

  it('should reject a column that does not exist', () => {
    expect(() =>
      toStructuralInfo(
        parseResponse(signedColumnResponse('Date', '%m/%d/%Y', 'Amount')),
        dualSample
      )
    ).toThrow(StructuralDiscoveryFailure);
  });

  it('should keep headers that carry surrounding spaces', () => {
    const padded = frameFromRows(['Date ', 'Amount'], [{ 'Date ': '2024-01-15', Amount: '-5.00' }]);

    const exact = toStructuralInfo(
      parseResponse(signedColumnResponse('Date ', '%Y-%m-%d', 'Amount')),
      padded
    );
    const trimmed = toStructuralInfo(
      parseResponse(signedColumnResponse('Date', '%Y-%m-%d', ' Amount')),
      padded
    );

    expect(exact.dateColumn).toBe('Date ');
    expect(trimmed.dateColumn).toBe('Date ');
    expect(trimmed.amount).toEqual({ representation: 'single_column_signed', amountColumn: 'Amount' });
  });

  it('should reject identical debit and credit columns', () => {
    expect(() =>
      toStructuralInfo(
        parseResponse(dualColumnResponse('Date', '%m/%d/%Y', 'Debit', 'Debit')),
        dualSample
      )
    ).toThrow('Debit and credit columns must differ');
  });

  it('should require the identifiers of a typed column', () => {
    const response = parseResponse(
      typedColumnResponse('Txn Date', '%Y-%m-%d', 'Amount', 'Type', 'DR', 'CR')
    );
    response.amount_info.credit_identifier = null;

    expect(() => toStructuralInfo(response, typedSample)).toThrow(
      'Missing required field "amount_info.credit_identifier"'
    );
  });
});

describe('getConsumedColumns', () => {
  it('should list the date and amount columns', () => {
    const info = toStructuralInfo(
      parseResponse(typedColumnResponse('Txn Date', '%Y-%m-%d', 'Amount', 'Type', 'DR', 'CR')),
      typedSample
    );

    expect([...getConsumedColumns(info)]).toEqual(['Txn Date', 'Amount', 'Type']);
  });
});

// ============================================
// LLMStructuralAnalyzer
// ============================================

describe('LLMStructuralAnalyzer', () => {
  it('should return the validated structure', async () => {
    const { client, generate } = createMockLLMClient(() =>
      '```json\n' + dualColumnResponse('Date', '%m/%d/%Y', 'Debit', 'Credit') + '\n```'
    );

    const info = await new LLMStructuralAnalyzer(client).analyze(dualSample);

    expect(info.dateColumn).toBe('Date');
    expect(info.amount.representation).toBe('dual_column_debit_credit');
    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate.mock.calls[0]?.[1]).toEqual({ json: true });
  });

  it('should fail when no sample date matches the format', async () => {
    const { client } = createMockLLMClient(() =>
      dualColumnResponse('Date', '%Y-%m-%d', 'Debit', 'Credit')
    );

    await expect(new LLMStructuralAnalyzer(client).analyze(dualSample)).rejects.toThrow(
      'No value in "Date" matches date format "%Y-%m-%d"'
    );
  });

  it('should fail on an unreadable response', async () => {
    const { client } = createMockLLMClient(() => 'I am not sure.');

    await expect(new LLMStructuralAnalyzer(client).analyze(dualSample)).rejects.toBeInstanceOf(
      StructuralDiscoveryFailure
    );
  });

  it('should wrap inference errors', async () => {
    const { client } = createMockLLMClient(() => {
      throw new Error('socket hang up');
    });

    await expect(new LLMStructuralAnalyzer(client).analyze(dualSample)).rejects.toThrow(
      'Inference call failed: socket hang up'
    );
  });
});

// ============================================
// HeuristicStructuralAnalyzer
// ============================================

describe('HeuristicStructuralAnalyzer', () => {
  const analyzer = new HeuristicStructuralAnalyzer();

  it('should detect dual debit/credit columns', async () => {
    const info = await analyzer.analyze(dualSample);

    expect(info).toEqual({
      dateColumn: 'Date',
      dateFormat: '%m/%d/%Y',
      amount: {
        representation: 'dual_column_debit_credit',
        debitColumn: 'Debit',
        creditColumn: 'Credit',
      },
    });
  });

  it('should detect an amount column with a DR/CR type column', async () => {
    const info = await analyzer.analyze(typedSample);

    expect(info).toEqual({
      dateColumn: 'Txn Date',
      dateFormat: '%Y-%m-%d',
      amount: {
        representation: 'single_column_with_type',
        amountColumn: 'Amount',
        typeColumn: 'Type',
        debitIdentifier: 'DR',
        creditIdentifier: 'CR',
      },
    });
  });

  it('should detect a signed amount column', async () => {
    const sample = frameFromRows(['Posting Date', 'Memo', 'Amount', 'Balance'], [
      { 'Posting Date': '15/01/2024', Memo: 'Fuel', Amount: '-40.00', Balance: '960.00' },
      { 'Posting Date': '28/01/2024', Memo: 'Refund', Amount: '10.00', Balance: '970.00' },
    ]);

    const info = await analyzer.analyze(sample);

    expect(info.dateFormat).toBe('%d/%m/%Y');
    expect(info.amount).toEqual({
      representation: 'single_column_signed',
      amountColumn: 'Amount',
    });
  });

  it('should fail without an amount column', async () => {
    const sample = frameFromRows(['Date', 'Note'], [{ Date: '2024-01-01', Note: 'x' }]);

    await expect(analyzer.analyze(sample)).rejects.toThrow('No amount column found');
  });
});
