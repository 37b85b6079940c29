/**
 * Unit Tests for Amount Parsing
 */

import { describe, it, expect } from 'vitest';

import { parseAmount, roundAmount } from './amount-parser';

describe('parseAmount', () => {
  it('should pass finite numbers through', () => {
    expect(parseAmount(12.5)).toBe(12.5);
    expect(parseAmount(Number.NaN)).toBeNull();
  });

  it('should strip currency symbols and thousands separators', () => {
    expect(parseAmount('$1,234.56')).toBe(1234.56);
    expect(parseAmount('₹1,23,456.00')).toBe(123456);
    expect(parseAmount('USD 99')).toBe(99);
  });

  it('should reject commas that are not thousands separators', () => {
    expect(parseAmount('12,50')).toBeNull();
    expect(parseAmount('1.234,56')).toBeNull();
    expect(parseAmount('1,2,3')).toBeNull();
    expect(parseAmount('1,2345.00')).toBeNull();
    expect(parseAmount('12,34,567.89')).toBe(1234567.89);
    expect(parseAmount('-1,000,000')).toBe(-1000000);
  });

  it('should read parentheses as negative', () => {
    expect(parseAmount('(25.00)')).toBe(-25);
    expect(parseAmount('($25.00)')).toBe(-25);
  });

  it('should honor leading and trailing minus', () => {
    expect(parseAmount('-10.50')).toBe(-10.5);
    expect(parseAmount('-$1,000')).toBe(-1000);
    expect(parseAmount('10.50-')).toBe(-10.5);
  });

  it('should honor CR/DR suffixes', () => {
    expect(parseAmount('500.00 DR')).toBe(-500);
    expect(parseAmount('500.00 Cr.')).toBe(500);
    expect(parseAmount('50CR')).toBe(50);
  });

  it('should return null for blanks and text', () => {
    expect(parseAmount('')).toBeNull();
    expect(parseAmount(null)).toBeNull();
    expect(parseAmount('N/A')).toBeNull();
  });
});

describe('roundAmount', () => {
  it('should round to cents', () => {
    expect(roundAmount(0.1 + 0.2)).toBe(0.3);
  });

  it('should normalize negative zero', () => {
    expect(Object.is(roundAmount(-0.001), 0)).toBe(true);
  });
});
