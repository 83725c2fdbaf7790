import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { ZodError } from 'zod/v4';
import { parseRelations, parseRelationsFile } from '../../src/core/relations/parse.js';

const FIXTURES_DIR = resolve(import.meta.dirname, '../fixtures/relations');

describe('parseRelationsFile', () => {
  it('parses a valid relations file', () => {
    const parsed = parseRelationsFile(resolve(FIXTURES_DIR, 'university.json'));
    expect(Object.keys(parsed.relations)).toEqual(['Enrollment', 'Employee', 'Account']);
    expect(parsed.relations['Employee']?.attributes).toEqual(['id', 'deptId', 'deptName']);
    expect(parsed.relations['Enrollment']?.functionalDependencies?.[2]?.note).toBe('catalog lookup');
    expect(parsed.suppress).toEqual([]);
  });

  it('extracts the suppress list', () => {
    const parsed = parseRelationsFile(resolve(FIXTURES_DIR, 'suppressed.json'));
    expect(parsed.suppress).toEqual([
      'NF2_PARTIAL_DEPENDENCY:Enrollment.studentName',
      'NF3_TRANSITIVE_DEPENDENCY:Employee',
    ]);
    expect(Object.keys(parsed.relations)).toEqual(['Enrollment', 'Employee']);
  });

  it('throws on malformed JSON', () => {
    expect(() => parseRelationsFile(resolve(FIXTURES_DIR, 'malformed.json'))).toThrow(SyntaxError);
  });

  it('throws on an invalid structure', () => {
    expect(() => parseRelationsFile(resolve(FIXTURES_DIR, 'invalid-structure.json'))).toThrow(
      ZodError,
    );
  });

  it('throws when the file does not exist', () => {
    expect(() => parseRelationsFile(resolve(FIXTURES_DIR, 'missing.json'))).toThrow();
  });
});

describe('parseRelations', () => {
  it('accepts relations without declared attributes', () => {
    const parsed = parseRelations({
      R: { functionalDependencies: [{ determinant: ['a'], dependent: ['b'] }] },
    });
    expect(parsed.relations['R']?.attributes).toBeUndefined();
  });

  it('accepts relations without dependencies', () => {
    const parsed = parseRelations({ R: { attributes: ['a', 'b'] } });
    expect(parsed.relations['R']?.functionalDependencies).toBeUndefined();
  });

  it('rejects repeated attribute names', () => {
    expect(() => parseRelations({ R: { attributes: ['a', 'a'] } })).toThrow(
      'Attribute names must be distinct',
    );
  });

  it('rejects empty dependent lists', () => {
    expect(() =>
      parseRelations({ R: { functionalDependencies: [{ determinant: ['a'], dependent: [] }] } }),
    ).toThrow(ZodError);
  });

  it('rejects a top-level array', () => {
    expect(() => parseRelations([])).toThrow(ZodError);
  });

  it('rejects malformed suppress entries', () => {
    expect(() => parseRelations({ suppress: ['not a rule'], R: {} })).toThrow(ZodError);
  });
});
