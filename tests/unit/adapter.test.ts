import { describe, it, expect } from 'vitest';
import { AttributeNameAdapter } from '../../src/core/relations/adapter.js';
import { AttributeSet } from '../../src/core/attributes/attributeSet.js';
import {
  DuplicateAttributeError,
  LengthMismatchError,
  UnknownAttributeError,
} from '../../src/core/errors.js';

describe('AttributeNameAdapter', () => {
  const adapter = new AttributeNameAdapter(['name', 'id', 'email']);

  it('assigns positions in sorted name order', () => {
    expect(adapter.attributes).toEqual(['email', 'id', 'name']);
    expect(adapter.size).toBe(3);
  });

  it('encodes names as attribute sets', () => {
    expect(adapter.toAttributeSet(['name', 'email']).value).toBe(0b101n);
  });

  it('decodes attribute sets in position order', () => {
    expect(adapter.fromAttributeSet(new AttributeSet(3, 0b110))).toEqual(['id', 'name']);
  });

  it('round-trips dependencies', () => {
    const encoded = adapter.toDependency({ determinant: ['id'], dependent: ['name', 'email'] });
    expect(encoded.lhs.value).toBe(0b010n);
    expect(encoded.rhs.value).toBe(0b101n);
    expect(adapter.fromDependency(encoded)).toEqual({
      determinant: ['id'],
      dependent: ['email', 'name'],
    });
  });

  it('reports membership', () => {
    expect(adapter.has('id')).toBe(true);
    expect(adapter.has('phone')).toBe(false);
  });

  it('rejects unknown names', () => {
    expect(() => adapter.toAttributeSet(['phone'])).toThrow(UnknownAttributeError);
    expect(() => adapter.toAttributeSet(['phone'])).toThrow(
      'Attribute "phone" is not part of the relation.',
    );
  });

  it('rejects sets over another universe', () => {
    expect(() => adapter.fromAttributeSet(AttributeSet.empty(4))).toThrow(LengthMismatchError);
  });

  it('rejects duplicate names', () => {
    expect(() => new AttributeNameAdapter(['id', 'id'])).toThrow(DuplicateAttributeError);
    expect(() => new AttributeNameAdapter(['id', 'id'])).toThrow(
      'Attribute "id" is declared more than once.',
    );
  });

  it('collects the names used by dependencies', () => {
    const fromDeps = AttributeNameAdapter.fromDependencies([
      { determinant: ['b'], dependent: ['c'] },
      { determinant: ['a', 'b'], dependent: ['c'] },
    ]);
    expect(fromDeps.attributes).toEqual(['a', 'b', 'c']);
  });
});
