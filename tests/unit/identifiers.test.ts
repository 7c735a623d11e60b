import { describe, it, expect } from 'vitest';
import { isSafeIdentifier, quoteIdentifier } from '../../src/core/catalog/identifiers.js';
import { UnsafeIdentifierError } from '../../src/core/errors.js';

describe('quoteIdentifier', () => {
  it('brackets an allowed identifier', () => {
    expect(quoteIdentifier('Sales_2024')).toBe('[Sales_2024]');
    expect(quoteIdentifier('My DB-1.archive')).toBe('[My DB-1.archive]');
  });

  it('accepts non-ASCII letters', () => {
    expect(isSafeIdentifier('Données')).toBe(true);
  });

  it('rejects a closing bracket', () => {
    expect(() => quoteIdentifier('evil]; DROP TABLE x; --')).toThrow(UnsafeIdentifierError);
  });

  it('rejects quotes, semicolons and empty names', () => {
    expect(isSafeIdentifier("o'brien")).toBe(false);
    expect(isSafeIdentifier('a;b')).toBe(false);
    expect(isSafeIdentifier('')).toBe(false);
  });

  it('rejects names that are relative path segments', () => {
    expect(isSafeIdentifier('.')).toBe(false);
    expect(isSafeIdentifier('..')).toBe(false);
    expect(() => quoteIdentifier('..')).toThrow(UnsafeIdentifierError);
    expect(isSafeIdentifier('...')).toBe(true);
    expect(isSafeIdentifier('.archive')).toBe(true);
  });

  it('rejects identifiers longer than 128 characters', () => {
    expect(isSafeIdentifier('a'.repeat(128))).toBe(true);
    expect(isSafeIdentifier('a'.repeat(129))).toBe(false);
  });
});
