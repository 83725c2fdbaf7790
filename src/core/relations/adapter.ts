import { AttributeSet } from '../attributes/attributeSet.js';
import type { FunctionalDependency } from '../dependencies/functionalDependency.js';
import { dependency } from '../dependencies/functionalDependency.js';
import { DuplicateAttributeError, LengthMismatchError, UnknownAttributeError } from '../errors.js';
import type { NamedDependency } from '../report/reportTypes.js';
import { sortBy } from '../../util/index.js';

/**
 * Translates between attribute names and bit positions.
 *
 * Names are sorted and mapped to dense positions `0..n-1`, so the same set
 * of names always produces the same encoding.
 */
export class AttributeNameAdapter {
  readonly attributes: readonly string[];
  private readonly positions: ReadonlyMap<string, number>;

  constructor(names: readonly string[]) {
    const seen = new Set<string>();
    for (const name of names) {
      if (seen.has(name)) {
        throw new DuplicateAttributeError(name);
      }
      seen.add(name);
    }

    this.attributes = sortBy(names, (name) => name);
    this.positions = new Map(this.attributes.map((name, position) => [name, position]));
  }

  /** Build an adapter over every name used by the given dependencies. */
  static fromDependencies(fds: readonly NamedDependency[]): AttributeNameAdapter {
    const names = new Set<string>();
    for (const fd of fds) {
      for (const name of [...fd.determinant, ...fd.dependent]) {
        names.add(name);
      }
    }
    return new AttributeNameAdapter([...names]);
  }

  get size(): number {
    return this.attributes.length;
  }

  has(name: string): boolean {
    return this.positions.has(name);
  }

  toAttributeSet(names: readonly string[]): AttributeSet {
    const positions = names.map((name) => {
      const position = this.positions.get(name);
      if (position === undefined) {
        throw new UnknownAttributeError(name);
      }
      return position;
    });
    return AttributeSet.of(this.size, positions);
  }

  fromAttributeSet(set: AttributeSet): string[] {
    if (set.length !== this.size) {
      throw new LengthMismatchError(this.size, set.length);
    }
    return set.indices().flatMap((position) => {
      const name = this.attributes[position];
      return name === undefined ? [] : [name];
    });
  }

  toDependency(fd: NamedDependency): FunctionalDependency {
    return dependency(this.toAttributeSet(fd.determinant), this.toAttributeSet(fd.dependent));
  }

  fromDependency(fd: FunctionalDependency): NamedDependency {
    return {
      determinant: this.fromAttributeSet(fd.lhs),
      dependent: this.fromAttributeSet(fd.rhs),
    };
  }

  toDependencies(fds: readonly NamedDependency[]): FunctionalDependency[] {
    return fds.map((fd) => this.toDependency(fd));
  }

  fromDependencies(fds: readonly FunctionalDependency[]): NamedDependency[] {
    return fds.map((fd) => this.fromDependency(fd));
  }
}
