import { describe, it, expect } from 'vitest';
import {
  NormalFormClassifier,
  containsKey,
  is2nf,
  is3nf,
  isBcnf,
  isPartialOfKey,
} from '../../src/core/analysis/normalizeChecks/normalForms.js';
import { attrs, fds, letters } from '../helpers/attributes.js';

const F5 = fds(5, 'AB->CDE, AC->BDE, B->C, C->B, C->D, B->E, C->E');

describe('isBcnf', () => {
  it('fails when a determinant is not a superkey', () => {
    expect(isBcnf(5, F5)).toBe(false);
  });

  it('passes when every non-trivial determinant is a superkey', () => {
    expect(isBcnf(5, fds(5, 'AB->CDE, AC->BDE, BC->C'))).toBe(true);
  });

  it('holds vacuously without dependencies', () => {
    expect(isBcnf(3, [])).toBe(true);
  });
});

describe('is3nf', () => {
  it('fails on a transitive dependency', () => {
    expect(is3nf(3, fds(3, 'A->B, B->C'))).toBe(false);
  });

  it('passes when every dependent attribute outside the determinant is prime', () => {
    expect(is3nf(3, fds(3, 'AB->C, C->B'))).toBe(true);
  });

  it('fails when C determines the non-prime D and E', () => {
    expect(is3nf(5, F5)).toBe(false);
  });

  it('ignores attributes shared by both sides', () => {
    // CD->BD: B is prime, non-prime D is already in the determinant.
    expect(is3nf(4, fds(4, 'AB->CD, C->B, CD->BD'))).toBe(true);
  });

  it('holds vacuously without dependencies', () => {
    expect(is3nf(3, [])).toBe(true);
  });
});

describe('is2nf', () => {
  it('fails on a partial dependency', () => {
    expect(is2nf(3, fds(3, 'AB->C, B->C'))).toBe(false);
  });

  it('passes when keys are single attributes', () => {
    expect(is2nf(3, fds(3, 'A->B, B->C'))).toBe(true);
  });

  it('allows prime attributes to depend on part of a key', () => {
    expect(is2nf(3, fds(3, 'AB->C, C->B'))).toBe(true);
  });

  it('holds vacuously without dependencies', () => {
    expect(is2nf(3, [])).toBe(true);
  });
});

describe('key helpers', () => {
  const keys = [attrs(3, 'AB')];

  it('detects superkeys', () => {
    expect(containsKey(attrs(3, 'ABC'), keys)).toBe(true);
    expect(containsKey(attrs(3, 'A'), keys)).toBe(false);
  });

  it('detects proper parts of keys', () => {
    expect(isPartialOfKey(attrs(3, 'A'), keys)).toBe(true);
    expect(isPartialOfKey(attrs(3, 'AB'), keys)).toBe(false);
    expect(isPartialOfKey(attrs(3, 'C'), keys)).toBe(false);
  });
});

describe('NormalFormClassifier', () => {
  it('reports the strongest normal form', () => {
    expect(new NormalFormClassifier(5, fds(5, 'AB->CDE, AC->BDE, BC->C')).highestNormalForm()).toBe('BCNF');
    expect(new NormalFormClassifier(3, fds(3, 'AB->C, C->B')).highestNormalForm()).toBe('3NF');
    expect(new NormalFormClassifier(3, fds(3, 'A->B, B->C')).highestNormalForm()).toBe('2NF');
    expect(new NormalFormClassifier(3, fds(3, 'AB->C, B->C')).highestNormalForm()).toBe('1NF');
  });

  it('computes keys once', () => {
    const classifier = new NormalFormClassifier(5, F5);
    const first = classifier.candidateKeys();
    expect(classifier.candidateKeys()).toBe(first);
    expect(first.map(letters)).toEqual(['AB', 'AC']);
  });

  it('exposes prime attributes', () => {
    expect(letters(new NormalFormClassifier(5, F5).primeAttributes())).toBe('ABC');
  });

  it('rejects dependencies over another universe', () => {
    expect(() => new NormalFormClassifier(4, F5)).toThrow('Attribute set length mismatch');
  });
});
